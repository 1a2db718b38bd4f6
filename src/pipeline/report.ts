import type { RegulationBuildStats } from "../normalize/regulations";

export interface LoadStats {
  input_rows: number;
  validated_rows: number;
  clean_rows: number;
}

export interface ItemFailure {
  identifier: string;
  status: number | null;
  body: string;
}

export interface IntegrationReport {
  organization: string | null;
  dry_run: boolean;
  load: LoadStats | null;
  build: RegulationBuildStats;
  known_identifiers: number;
  already_registered: number;
  submitted: number;
  failed: number;
  total: number;
  submitted_identifiers: string[];
  failures: ItemFailure[];
}

export interface PublishReport {
  organization: string | null;
  succeeded: number;
  failed: number;
  total: number;
  failures: ItemFailure[];
}

export function integrationExitCode(report: IntegrationReport): number {
  return report.failed > 0 ? 1 : 0;
}

export function publishExitCode(report: PublishReport): number {
  return report.failed > 0 ? 1 : 0;
}

export function summarizeIntegration(report: IntegrationReport): Record<string, unknown> {
  return {
    organization: report.organization,
    dry_run: report.dry_run,
    input_rows: report.load?.input_rows ?? null,
    validated_rows: report.load?.validated_rows ?? null,
    clean_rows: report.load?.clean_rows ?? null,
    regulations: report.build.regulations,
    measures: report.build.measures,
    skipped_measures: report.build.skipped_measures,
    dropped_regulations: report.build.dropped_regulations,
    already_registered: report.already_registered,
    submitted: report.submitted,
    failed: report.failed,
    total: report.total
  };
}
