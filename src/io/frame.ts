export type RawRecord = Record<string, unknown>;

export interface Frame<Row> {
  columns: string[];
  rows: Row[];
}

export type RawFrame = Frame<RawRecord>;

export function frameFromRecords(records: RawRecord[]): RawFrame {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) columns.add(key);
  }
  return { columns: Array.from(columns), rows: records };
}

export function selectColumns(frame: RawFrame, columns: string[]): RawFrame {
  return {
    columns: [...columns],
    rows: frame.rows.map((row) => {
      const selected: RawRecord = {};
      for (const column of columns) {
        selected[column] = row[column] ?? null;
      }
      return selected;
    })
  };
}

export function filterRows<Row>(frame: Frame<Row>, predicate: (row: Row) => boolean): Frame<Row> {
  return { columns: frame.columns, rows: frame.rows.filter(predicate) };
}
