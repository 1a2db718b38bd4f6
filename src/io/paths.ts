import path from "path";

export function runDir(outDir: string, organization: string, runId: string): string {
  return path.join(outDir, organization, runId);
}

export function runReportPath(outDir: string, organization: string, runId: string): string {
  return path.join(runDir(outDir, organization, runId), "run_report.json");
}
