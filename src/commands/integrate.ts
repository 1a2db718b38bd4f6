import { createIntegration } from "../config/registry";
import { loadBaseSettings, loadOrganizationSettings } from "../config/settings";
import { HttpRegistryClient } from "../registry/client";
import type { RegulationRegistry } from "../registry/registry";
import type { CleanDataSource } from "../pipeline/integration";
import { IntegrationRunner } from "../pipeline/runner";
import { IntegrationReport } from "../pipeline/report";
import { PipelineError, errorMessage } from "../pipeline/errors";
import { buildRunReport, writeRunReport } from "../io/runReport";
import { runDir } from "../io/paths";
import { Logger, makeLogger } from "../logging/logger";
import { nowUtcIsoFileSafe, nowUtcIsoSeconds } from "../utils/time";

export interface IntegrateCommandOptions {
  organization: string;
  outDir?: string | null;
  identifierSuffix?: string;
  dryRun?: boolean;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Overrides the HTTP client built from the organization's settings. */
  registry?: RegulationRegistry;
  /** Overrides the adapter registered for the organization. */
  source?: CleanDataSource;
  runId?: string;
}

export async function runIntegrateCommand(options: IntegrateCommandOptions): Promise<IntegrationReport> {
  const base = loadBaseSettings(options.env);
  const logger =
    options.logger ?? makeLogger({ organization: options.organization, command: "integrate" }, base.LOG_LEVEL);
  const source = options.source ?? createIntegration(options.organization, logger);
  const settings = loadOrganizationSettings(options.organization, options.env);
  const registry = options.registry ?? new HttpRegistryClient(settings);

  const runId = options.runId ?? nowUtcIsoFileSafe();
  const outDir = options.outDir ?? null;
  const artifactDir = outDir ? runDir(outDir, options.organization, runId) : null;
  const startedAt = nowUtcIsoSeconds();

  const runner = new IntegrationRunner({
    registry,
    organization: options.organization,
    identifierSuffix: options.identifierSuffix,
    dryRun: options.dryRun,
    logger
  });

  let report: IntegrationReport;
  try {
    report = await runner.integrate(source, { artifactDir });
  } catch (error) {
    if (outDir) {
      await writeRunReport(
        outDir,
        buildRunReport({
          runId,
          command: "integrate",
          organization: options.organization,
          outDir,
          startedAt,
          endedAt: nowUtcIsoSeconds(),
          result: null,
          error: {
            stage: error instanceof PipelineError ? error.stage : null,
            message: errorMessage(error)
          }
        })
      );
    }
    throw error;
  }

  if (outDir) {
    const reportPath = await writeRunReport(
      outDir,
      buildRunReport({
        runId,
        command: "integrate",
        organization: options.organization,
        outDir,
        startedAt,
        endedAt: nowUtcIsoSeconds(),
        result: report,
        error: null
      })
    );
    logger.info({ path: reportPath }, "Run report written");
  }

  return report;
}
