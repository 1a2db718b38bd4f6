import { z } from "zod";
import { Frame, RawFrame, selectColumns } from "../io/frame";
import { SchemaError, SchemaIssue } from "../pipeline/errors";
import { Logger, makeNoopLogger } from "../logging/logger";

export type RawDataSchema<Shape extends z.ZodRawShape> = z.ZodObject<Shape>;

export type RawDataRow<Shape extends z.ZodRawShape> = z.infer<z.ZodObject<Shape>>;

export interface ValidateRawDataOptions {
  preprocess?: (frame: RawFrame) => RawFrame;
  logger?: Logger;
}

function identity(frame: RawFrame): RawFrame {
  return frame;
}

/**
 * Restricts a raw frame to the declared columns, runs the source's
 * pre-processing, then coerces every cell. Any violation aborts with a single
 * SchemaError listing all issues.
 */
export function validateRawData<Shape extends z.ZodRawShape>(
  frame: RawFrame,
  schema: RawDataSchema<Shape>,
  options: ValidateRawDataOptions = {}
): Frame<RawDataRow<Shape>> {
  const logger = options.logger ?? makeNoopLogger();
  const declared = Object.keys(schema.shape);
  const available = new Set(frame.columns);

  const missing = declared.filter((name) => !available.has(name));
  if (missing.length > 0) {
    throw new SchemaError(
      missing.map((name) => ({ column: name, row: null, message: "required column is missing" }))
    );
  }

  const discarded = frame.columns.filter((name) => !(name in schema.shape));
  if (discarded.length > 0) {
    logger.info({ discarded }, `Discarding ${discarded.length} undeclared column(s)`);
  }

  const preprocess = options.preprocess ?? identity;
  const prepared = preprocess(selectColumns(frame, declared));

  const issues: SchemaIssue[] = [];
  const rows: RawDataRow<Shape>[] = [];
  for (const [index, row] of prepared.rows.entries()) {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      rows.push(parsed.data);
      continue;
    }
    for (const issue of parsed.error.issues) {
      issues.push({
        column: issue.path.length > 0 ? issue.path.join(".") : "<row>",
        row: index,
        message: issue.message
      });
    }
  }

  if (issues.length > 0) {
    throw new SchemaError(issues);
  }

  logger.info(
    {
      input_rows: frame.rows.length,
      kept_rows: rows.length,
      kept_columns: declared.length,
      discarded_columns: discarded.length
    },
    "Raw data validated"
  );

  return { columns: declared, rows };
}
