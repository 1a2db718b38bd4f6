import type { IntegrationReport } from "../pipeline/report";
import type { PipelineStage } from "../pipeline/errors";

export interface RunReportError {
  stage: PipelineStage | null;
  message: string;
}

export interface RunReport {
  schema_version: "1.0";
  run_id: string;
  command: "integrate";
  organization: string;
  run_dir: string;
  started_at: string;
  ended_at: string;
  status: "success" | "partial" | "error";
  error: RunReportError | null;
  result: IntegrationReport | null;
}
