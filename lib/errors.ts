export type AnalysisErrorCode = "input_unreadable" | "schema_invalid" | "report_failed";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly details?: unknown;

  constructor(code: AnalysisErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InputFileError extends AnalysisError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super("input_unreadable", `input file not readable: ${path}`, { path }, { cause });
    this.path = path;
  }
}

export class SchemaError extends AnalysisError {
  readonly missing: string[];

  constructor(missing: string[], columns: string[]) {
    super("schema_invalid", `required columns missing: ${missing.join(", ")}`, { missing, columns });
    this.missing = missing;
  }
}

export class ReportError extends AnalysisError {
  constructor(file: string, cause?: unknown) {
    super("report_failed", `failed to write ${file}`, { file }, { cause });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof AnalysisError) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : "";
    return `[${err.code}] ${err.message}${cause}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
