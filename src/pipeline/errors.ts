export type PipelineStage =
  | "configuration"
  | "fetch"
  | "validation"
  | "grouping"
  | "registry"
  | "submission"
  | "publication";

export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class ConfigurationError extends PipelineError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super("configuration", message);
    this.missing = missing;
  }
}

export class FetchError extends PipelineError {
  readonly organization: string;

  constructor(organization: string, message: string, options?: { cause?: unknown }) {
    super("fetch", `Could not fetch raw data for ${organization}: ${message}`, options);
    this.organization = organization;
  }
}

export interface SchemaIssue {
  column: string;
  row: number | null;
  message: string;
}

export class SchemaError extends PipelineError {
  readonly issues: SchemaIssue[];

  constructor(issues: SchemaIssue[]) {
    const details = issues
      .slice(0, 20)
      .map((issue) => `${issue.column}${issue.row === null ? "" : `[${issue.row}]`} ${issue.message}`)
      .join("; ");
    const more = issues.length > 20 ? ` (+${issues.length - 20} more)` : "";
    super("validation", `Raw data failed schema validation: ${details}${more}`);
    this.issues = issues;
  }
}

export class RecordError extends PipelineError {
  readonly identifier: string | null;
  readonly row: number;

  constructor(identifier: string | null, row: number, message: string) {
    super("grouping", `Row ${row} (regulation ${identifier ?? "<unknown>"}): ${message}`);
    this.identifier = identifier;
    this.row = row;
  }
}

export class GroupError extends PipelineError {
  readonly identifier: string;

  constructor(identifier: string, rowCount: number) {
    super("grouping", `Regulation ${identifier} has no valid measure out of ${rowCount} row(s)`);
    this.identifier = identifier;
  }
}

export class RegistryFetchError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("registry", `Could not fetch known identifiers: ${message}`, options);
  }
}

export class SubmissionError extends PipelineError {
  readonly identifier: string;
  readonly status: number | null;
  readonly body: string;

  constructor(identifier: string, status: number | null, body: string) {
    super("submission", `Submission of ${identifier} failed (${status ?? "no response"}): ${body}`);
    this.identifier = identifier;
    this.status = status;
    this.body = body;
  }
}

export class PublishError extends PipelineError {
  readonly identifier: string;
  readonly status: number | null;
  readonly body: string;

  constructor(identifier: string, status: number | null, body: string) {
    super("publication", `Publication of ${identifier} failed (${status ?? "no response"}): ${body}`);
    this.identifier = identifier;
    this.status = status;
    this.body = body;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
