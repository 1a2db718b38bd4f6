import { z } from "zod";
import type { MeasureDto, RegulationDto } from "../registry/models";
import { CleanRecord, FlatRecord, FlatRecordSchema } from "../validation/flatRecordSchema";
import { GroupError, PipelineError, RecordError, errorMessage } from "../pipeline/errors";
import { Logger, makeNoopLogger } from "../logging/logger";
import { buildMeasure } from "./dto";

export type MeasureFactory = (record: FlatRecord) => MeasureDto;

export interface CreateRegulationsOptions {
  createMeasure?: MeasureFactory;
  logger?: Logger;
}

export interface RegulationBuildStats {
  rows: number;
  measures: number;
  skipped_measures: number;
  regulations: number;
  dropped_regulations: number;
}

export interface RegulationBuildResult {
  regulations: RegulationDto[];
  stats: RegulationBuildStats;
  errors: PipelineError[];
}

interface IndexedRecord {
  index: number;
  record: CleanRecord;
}

const REGULATION_FIELD_KEYS = [
  "regulation_identifier",
  "regulation_status",
  "regulation_category",
  "regulation_subject",
  "regulation_title",
  "regulation_other_category_text"
] as const;

const RegulationFieldsSchema = FlatRecordSchema.pick({
  regulation_identifier: true,
  regulation_status: true,
  regulation_category: true,
  regulation_subject: true,
  regulation_title: true,
  regulation_other_category_text: true
});

type RegulationFields = z.infer<typeof RegulationFieldsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<row>"}: ${issue.message}`)
    .join("; ");
}

function groupByIdentifier(
  records: CleanRecord[],
  onUngroupable: (error: RecordError) => void
): Map<string, IndexedRecord[]> {
  const groups = new Map<string, IndexedRecord[]>();
  for (const [index, record] of records.entries()) {
    const identifier = record.regulation_identifier;
    if (typeof identifier !== "string" || identifier.length === 0) {
      onUngroupable(new RecordError(null, index, "regulation_identifier is missing"));
      continue;
    }
    const group = groups.get(identifier) ?? [];
    group.push({ index, record });
    groups.set(identifier, group);
  }
  return groups;
}

function sameRegulationFields(a: RegulationFields, b: CleanRecord): boolean {
  return REGULATION_FIELD_KEYS.every((key) => a[key] === b[key]);
}

/**
 * Groups clean rows by `regulation_identifier` and builds one regulation per
 * group, one measure per row. A failing row only loses its own measure; a
 * group without any measure is dropped.
 */
export function createRegulations(
  records: CleanRecord[],
  options: CreateRegulationsOptions = {}
): RegulationBuildResult {
  const logger = options.logger ?? makeNoopLogger();
  const createMeasure = options.createMeasure ?? buildMeasure;
  const errors: PipelineError[] = [];
  const stats: RegulationBuildStats = {
    rows: records.length,
    measures: 0,
    skipped_measures: 0,
    regulations: 0,
    dropped_regulations: 0
  };

  const recordError = (error: RecordError): void => {
    stats.skipped_measures += 1;
    errors.push(error);
    logger.error({ row: error.row, identifier: error.identifier }, error.message);
  };

  const groups = groupByIdentifier(records, recordError);
  const regulations: RegulationDto[] = [];

  for (const [identifier, rows] of groups) {
    const measures: MeasureDto[] = [];
    let firstValid: FlatRecord | null = null;

    for (const { index, record } of rows) {
      const parsed = FlatRecordSchema.safeParse(record);
      if (!parsed.success) {
        recordError(new RecordError(identifier, index, formatIssues(parsed.error)));
        continue;
      }
      try {
        measures.push(createMeasure(parsed.data));
        firstValid = firstValid ?? parsed.data;
      } catch (error) {
        recordError(new RecordError(identifier, index, errorMessage(error)));
      }
    }

    if (measures.length === 0 || firstValid === null) {
      const error = new GroupError(identifier, rows.length);
      stats.dropped_regulations += 1;
      errors.push(error);
      logger.warn({ identifier }, error.message);
      continue;
    }

    const firstRow = rows[0].record;
    const fromFirstRow = RegulationFieldsSchema.safeParse(firstRow);
    const fields: RegulationFields = fromFirstRow.success ? fromFirstRow.data : firstValid;

    const inconsistent = rows.filter(({ record }) => !sameRegulationFields(fields, record));
    if (inconsistent.length > 0) {
      logger.warn(
        { identifier, rows: inconsistent.map(({ index }) => index) },
        "Rows disagree on regulation fields; keeping the first row's values"
      );
    }

    stats.measures += measures.length;
    regulations.push({
      identifier: fields.regulation_identifier,
      category: fields.regulation_category,
      status: fields.regulation_status,
      subject: fields.regulation_subject,
      title: fields.regulation_title,
      other_category_text: fields.regulation_other_category_text,
      measures
    });
  }

  stats.regulations = regulations.length;
  logger.info(stats, "Regulations built");

  return { regulations, stats, errors };
}
