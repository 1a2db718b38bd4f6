import { parse } from "csv-parse";
import { RawFrame, RawRecord } from "./frame";

export interface ReadCsvOptions {
  delimiter?: string;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a headed CSV document. Empty cells read as null.
 */
export async function readCsv(content: Buffer | string, options: ReadCsvOptions = {}): Promise<RawFrame> {
  let columns: string[] = [];
  const parser = parse(content, {
    delimiter: options.delimiter ?? ",",
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    columns: (header: string[]) => {
      columns = header.map((name) => name.trim());
      return columns;
    },
    cast: (value, context) => (context.header || value !== "" ? value : null)
  });

  const rows: RawRecord[] = [];
  for await (const record of parser) {
    if (isRecord(record)) rows.push(record);
  }
  return { columns, rows };
}
