export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "TEMPLATE_ERROR"
  | "RETRIEVAL_ERROR"
  | "GENERATION_ERROR"
  | "JUDGE_ERROR"
  | "DATASET_ERROR"
  | "SYSTEMIC_RUN_ERROR"
  | "RUN_NOT_FOUND"
  | "RUN_IN_PROGRESS"
  | "PROVIDER_TIMEOUT"
  | "UNKNOWN_ERROR";

/**
 * Base class for every error this service raises on purpose.
 * Anything else reaching a boundary is reported as UNKNOWN_ERROR.
 */
export class RagEvalError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid static configuration; fatal at startup or when a run is requested. */
export class ConfigurationError extends RagEvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION_ERROR", message, options);
  }
}

export class TemplateError extends RagEvalError {
  constructor(message: string) {
    super("TEMPLATE_ERROR", message);
  }
}

/** Vector index or embedding provider unreachable, or the index looks corrupt. */
export class RetrievalError extends RagEvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RETRIEVAL_ERROR", message, options);
  }
}

export class GenerationError extends RagEvalError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super("GENERATION_ERROR", message, options);
    this.attempts = attempts;
  }
}

/** Judge backend failure or a judge response that does not match the rubric schema. */
export class JudgeError extends RagEvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("JUDGE_ERROR", message, options);
  }
}

export class DatasetError extends RagEvalError {
  readonly lineNumber?: number;

  constructor(message: string, lineNumber?: number, options?: { cause?: unknown }) {
    super(
      "DATASET_ERROR",
      lineNumber !== undefined ? `line ${lineNumber}: ${message}` : message,
      options
    );
    this.lineNumber = lineNumber;
  }
}

export class SystemicRunError extends RagEvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SYSTEMIC_RUN_ERROR", message, options);
  }
}

export class RunNotFoundError extends RagEvalError {
  constructor(runId: string) {
    super("RUN_NOT_FOUND", `Run "${runId}" does not exist`);
  }
}

export class RunInProgressError extends RagEvalError {
  constructor(runId: string) {
    super("RUN_IN_PROGRESS", `Run "${runId}" has not finished yet`);
  }
}

export class ProviderTimeoutError extends RagEvalError {
  constructor(provider: string, timeoutMs: number) {
    super("PROVIDER_TIMEOUT", `${provider} did not respond within ${timeoutMs}ms`);
  }
}

export interface ErrorRecord {
  code: ErrorCode;
  message: string;
}

export function describeError(error: unknown): ErrorRecord {
  if (error instanceof RagEvalError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "UNKNOWN_ERROR", message: error.message };
  }
  return { code: "UNKNOWN_ERROR", message: String(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Rebuilds a throwable from a persisted record, e.g. the failure of a stored run. */
export function restoreError(record: ErrorRecord): RagEvalError {
  switch (record.code) {
    case "DATASET_ERROR":
      return new DatasetError(record.message);
    case "CONFIGURATION_ERROR":
      return new ConfigurationError(record.message);
    case "RETRIEVAL_ERROR":
      return new RetrievalError(record.message);
    default:
      return new SystemicRunError(record.message);
  }
}
