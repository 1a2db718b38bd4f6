import { z } from "zod";

function undefinedToNull(value: unknown): unknown {
  return value === undefined ? null : value;
}

function blankToNull(value: unknown): unknown {
  return value === undefined || value === "" ? null : value;
}

const BOOLEAN_TEXT = new Map<string, boolean>([
  ["true", true],
  ["false", false],
  ["1", true],
  ["0", false]
]);

const numericText = z.string().trim().min(1);

const StringColumn = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const IntColumn = z.union([z.number(), numericText]).pipe(z.coerce.number().int());

const FloatColumn = z.union([z.number(), numericText]).pipe(z.coerce.number().finite());

const BoolColumn = z.union([
  z.boolean(),
  z.union([z.string(), z.number()]).transform((value, ctx) => {
    const parsed = BOOLEAN_TEXT.get(String(value).trim().toLowerCase());
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Cannot read "${value}" as a boolean` });
      return z.NEVER;
    }
    return parsed;
  })
]);

const TimestampColumn = z.union([z.date(), z.string().min(1), z.number()]).pipe(z.coerce.date());

function defineColumn<T extends z.ZodTypeAny>(base: T, normalize: (value: unknown) => unknown) {
  return {
    required: () => z.preprocess(normalize, base),
    nullable: () => z.preprocess(normalize, base.nullable())
  };
}

/**
 * Typed column declarations for raw-data schemas. A raw-data schema is a
 * `z.object` of these; blank cells of non-string columns read as null.
 */
export const column = {
  string: defineColumn(StringColumn, undefinedToNull),
  int: defineColumn(IntColumn, blankToNull),
  float: defineColumn(FloatColumn, blankToNull),
  bool: defineColumn(BoolColumn, blankToNull),
  timestamp: defineColumn(TimestampColumn, blankToNull)
};
