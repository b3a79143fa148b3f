export class JobScriptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JobScriptError";
  }
}

export class ConfigurationError extends JobScriptError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.field = field;
  }
}

/** The submission command itself failed (non-zero exit or spawn failure). */
export class SubmissionError extends JobScriptError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SubmissionError";
  }
}

/** The submission command answered, but no job id could be read from it. */
export class SubmissionParseError extends SubmissionError {
  readonly output: string;

  constructor(output: string) {
    super(`Unable to parse job id from sbatch output: ${output.trim() || "<empty>"}`);
    this.name = "SubmissionParseError";
    this.output = output;
  }
}

export class QueryError extends JobScriptError {
  readonly jobId: string;
  readonly output?: string;

  constructor(message: string, params: { jobId: string; output?: string; cause?: unknown }) {
    super(message, params.cause !== undefined ? { cause: params.cause } : undefined);
    this.name = "QueryError";
    this.jobId = params.jobId;
    this.output = params.output;
  }
}

export type FilesystemOperation = "write" | "chmod" | "remove";

export class FilesystemError extends JobScriptError {
  readonly path: string;
  readonly operation: FilesystemOperation;

  constructor(operation: FilesystemOperation, path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${path}: ${detail}`, { cause });
    this.name = "FilesystemError";
    this.path = path;
    this.operation = operation;
  }
}

export function toErrorText(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
