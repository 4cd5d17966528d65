export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export type PipelineErrorCode = 'fetch_failed' | 'decode_failed' | 'store_failed' | 'invalid_config';

/**
 * Stage-level failure. Any of these aborts the current pipeline run; row-level
 * problems never surface as errors, the offending row is dropped instead.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchError extends PipelineError {
  readonly dataset: string;
  readonly status: number | null;

  constructor(dataset: string, message: string, status: number | null = null, cause?: unknown) {
    super('fetch_failed', `fetching ${dataset} failed: ${message}`, cause);
    this.dataset = dataset;
    this.status = status;
  }
}

export class DecodeError extends PipelineError {
  readonly key: string;

  constructor(key: string, message: string, cause?: unknown) {
    super('decode_failed', `cannot decode observation "${key}": ${message}`, cause);
    this.key = key;
  }
}

export class StoreError extends PipelineError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('store_failed', `${operation} failed: ${describeError(cause)}`, cause);
    this.operation = operation;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('invalid_config', `invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
