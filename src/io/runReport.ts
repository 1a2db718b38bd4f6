import { runDir, runReportPath } from "./paths";
import { writeJson } from "../utils/fs";
import { RunReport, RunReportError } from "../types/runReport";
import type { IntegrationReport } from "../pipeline/report";

export interface RunReportParams {
  runId: string;
  command: RunReport["command"];
  organization: string;
  outDir: string;
  startedAt: string;
  endedAt: string;
  result: IntegrationReport | null;
  error: RunReportError | null;
}

export function buildRunReport(params: RunReportParams): RunReport {
  let status: RunReport["status"] = "success";
  if (params.error || !params.result) {
    status = "error";
  } else if (params.result.failed > 0) {
    status = "partial";
  }

  return {
    schema_version: "1.0",
    run_id: params.runId,
    command: params.command,
    organization: params.organization,
    run_dir: runDir(params.outDir, params.organization, params.runId),
    started_at: params.startedAt,
    ended_at: params.endedAt,
    status,
    error: params.error,
    result: params.result
  };
}

export async function writeRunReport(outDir: string, report: RunReport): Promise<string> {
  const filePath = runReportPath(outDir, report.organization, report.run_id);
  await writeJson(filePath, report);
  return filePath;
}
