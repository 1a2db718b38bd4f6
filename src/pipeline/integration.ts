import type { z } from "zod";
import type { Frame, RawFrame } from "../io/frame";
import type { MeasureDto, RegulationStatus } from "../registry/models";
import type { CleanRecord, FlatRecord } from "../validation/flatRecordSchema";
import { RawDataRow, RawDataSchema, validateRawData } from "../validation/frameValidator";
import { buildMeasure } from "../normalize/dto";
import { Logger, makeNoopLogger } from "../logging/logger";
import type { LoadStats } from "./report";
import { FetchError, errorMessage } from "./errors";

export interface FetchContext {
  /** Directory where the fetcher keeps a copy of what it downloaded, if any. */
  artifactDir: string | null;
}

export interface CleanData {
  records: CleanRecord[];
  stats: LoadStats;
}

/** What the runner needs from a source, whatever its raw shape. */
export interface CleanDataSource {
  readonly organization: string;
  loadCleanData(context: FetchContext): Promise<CleanData>;
  createMeasure(record: FlatRecord): MeasureDto;
}

export interface SourceAdapter<Shape extends z.ZodRawShape> {
  readonly organization: string;
  readonly rawDataSchema: RawDataSchema<Shape>;
  fetchRawData(context: FetchContext): Promise<RawFrame>;
  preprocessRawData(frame: RawFrame): RawFrame;
  computeCleanData(frame: Frame<RawDataRow<Shape>>): CleanRecord[];
  createMeasure(record: FlatRecord): MeasureDto;
}

export interface IntegrationOptions {
  draft?: boolean;
  logger?: Logger;
}

/**
 * Base for per-source integrations: fetch, validate against the declared raw
 * schema, then map to clean rows. Sources override the hooks they need.
 */
export abstract class RegulationIntegration<Shape extends z.ZodRawShape>
  implements SourceAdapter<Shape>, CleanDataSource
{
  abstract readonly organization: string;
  abstract readonly rawDataSchema: RawDataSchema<Shape>;
  protected readonly draft: boolean;
  protected readonly logger: Logger;

  constructor(options: IntegrationOptions = {}) {
    this.draft = options.draft ?? false;
    this.logger = options.logger ?? makeNoopLogger();
  }

  abstract fetchRawData(context: FetchContext): Promise<RawFrame>;

  abstract computeCleanData(frame: Frame<RawDataRow<Shape>>): CleanRecord[];

  preprocessRawData(frame: RawFrame): RawFrame {
    return frame;
  }

  createMeasure(record: FlatRecord): MeasureDto {
    return buildMeasure(record);
  }

  get regulationStatus(): RegulationStatus {
    return this.draft ? "draft" : "published";
  }

  validateRawData(frame: RawFrame): Frame<RawDataRow<Shape>> {
    return validateRawData(frame, this.rawDataSchema, {
      preprocess: (selected) => this.preprocessRawData(selected),
      logger: this.logger.child({ stage: "validation" })
    });
  }

  async loadCleanData(context: FetchContext): Promise<CleanData> {
    let raw: RawFrame;
    try {
      raw = await this.fetchRawData(context);
    } catch (error) {
      throw new FetchError(this.organization, errorMessage(error), { cause: error });
    }
    this.logger.info({ rows: raw.rows.length, columns: raw.columns.length }, "Raw data fetched");

    const validated = this.validateRawData(raw);
    const records = this.computeCleanData(validated);
    this.logger.info({ rows: records.length }, "Clean data computed");

    return {
      records,
      stats: {
        input_rows: raw.rows.length,
        validated_rows: validated.rows.length,
        clean_rows: records.length
      }
    };
  }
}
