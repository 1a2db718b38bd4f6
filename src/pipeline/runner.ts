import type { RegistryResponse, RegulationRegistry } from "../registry/registry";
import type { CleanRecord } from "../validation/flatRecordSchema";
import { createRegulations, MeasureFactory } from "../normalize/regulations";
import { DEFAULT_IDENTIFIER_SUFFIX, diffAgainstKnown, withIdentifierSuffix } from "../diff/identifiers";
import { Logger, makeNoopLogger } from "../logging/logger";
import { PublishError, RegistryFetchError, SubmissionError, errorMessage } from "./errors";
import type { CleanDataSource, FetchContext } from "./integration";
import {
  IntegrationReport,
  ItemFailure,
  LoadStats,
  PublishReport,
  summarizeIntegration
} from "./report";

export interface RunnerOptions {
  registry: RegulationRegistry;
  organization?: string | null;
  identifierSuffix?: string;
  dryRun?: boolean;
  logger?: Logger;
}

export interface IntegrateRecordsOptions {
  createMeasure?: MeasureFactory;
  load?: LoadStats | null;
}

async function attempt(
  call: () => Promise<RegistryResponse>
): Promise<{ response: RegistryResponse | null; error: string | null }> {
  try {
    return { response: await call(), error: null };
  } catch (error) {
    return { response: null, error: errorMessage(error) };
  }
}

/**
 * Sends built regulations to the registry one call at a time. Only a failed
 * identifier snapshot aborts a run; per-item failures are counted and reported.
 */
export class IntegrationRunner {
  private registry: RegulationRegistry;
  private organization: string | null;
  private identifierSuffix: string;
  private dryRun: boolean;
  private logger: Logger;

  constructor(options: RunnerOptions) {
    this.registry = options.registry;
    this.organization = options.organization ?? null;
    this.identifierSuffix = options.identifierSuffix ?? DEFAULT_IDENTIFIER_SUFFIX;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? makeNoopLogger();
  }

  async integrate(source: CleanDataSource, context: FetchContext): Promise<IntegrationReport> {
    const cleanData = await source.loadCleanData(context);
    return this.integrateRecords(cleanData.records, {
      createMeasure: (record) => source.createMeasure(record),
      load: cleanData.stats
    });
  }

  async integrateRecords(
    records: CleanRecord[],
    options: IntegrateRecordsOptions = {}
  ): Promise<IntegrationReport> {
    const built = createRegulations(records, {
      createMeasure: options.createMeasure,
      logger: this.logger.child({ stage: "grouping" })
    });
    const regulations = built.regulations.map((regulation) =>
      withIdentifierSuffix(regulation, this.identifierSuffix)
    );

    const known = await this.fetchKnownIdentifiers();
    const toSubmit = diffAgainstKnown(regulations, known);
    this.logger.info(
      { built: regulations.length, known: known.length, new: toSubmit.length },
      "Diffed built regulations against the registry"
    );

    const report: IntegrationReport = {
      organization: this.organization,
      dry_run: this.dryRun,
      load: options.load ?? null,
      build: built.stats,
      known_identifiers: known.length,
      already_registered: regulations.length - toSubmit.length,
      submitted: 0,
      failed: 0,
      total: toSubmit.length,
      submitted_identifiers: [],
      failures: []
    };

    if (this.dryRun) {
      this.logger.info(
        { identifiers: toSubmit.map((regulation) => regulation.identifier) },
        "Dry run: nothing submitted"
      );
      this.logger.info(summarizeIntegration(report), "Integration finished");
      return report;
    }

    for (const regulation of toSubmit) {
      const { response, error } = await attempt(() => this.registry.addRegulation(regulation));
      if (response?.ok) {
        report.submitted += 1;
        report.submitted_identifiers.push(regulation.identifier);
        this.logger.debug({ identifier: regulation.identifier }, "Regulation submitted");
        continue;
      }

      const failure = new SubmissionError(
        regulation.identifier,
        response?.status ?? null,
        response?.body ?? error ?? ""
      );
      report.failed += 1;
      report.failures.push(toItemFailure(failure));
      this.logger.error(
        { identifier: failure.identifier, status: failure.status, body: failure.body },
        failure.message
      );
    }

    this.logger.info(summarizeIntegration(report), "Integration finished");
    return report;
  }

  async publishAll(): Promise<PublishReport> {
    const identifiers = Array.from(new Set(await this.fetchKnownIdentifiers()));
    const report: PublishReport = {
      organization: this.organization,
      succeeded: 0,
      failed: 0,
      total: identifiers.length,
      failures: []
    };

    for (const identifier of identifiers) {
      const { response, error } = await attempt(() => this.registry.publishRegulation(identifier));
      if (response?.ok) {
        report.succeeded += 1;
        this.logger.debug({ identifier }, "Regulation published");
        continue;
      }

      const failure = new PublishError(identifier, response?.status ?? null, response?.body ?? error ?? "");
      report.failed += 1;
      report.failures.push(toItemFailure(failure));
      this.logger.error(
        { identifier, status: failure.status, body: failure.body },
        failure.message
      );
    }

    this.logger.info(
      { succeeded: report.succeeded, failed: report.failed, total: report.total },
      "Publication finished"
    );
    return report;
  }

  private async fetchKnownIdentifiers(): Promise<string[]> {
    try {
      return await this.registry.listIdentifiers();
    } catch (error) {
      throw new RegistryFetchError(errorMessage(error), { cause: error });
    }
  }
}

function toItemFailure(error: SubmissionError | PublishError): ItemFailure {
  return { identifier: error.identifier, status: error.status, body: error.body };
}
