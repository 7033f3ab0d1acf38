/**
 * Pipeline error taxonomy.
 *
 * Everything raised below the job boundary is one of these; the orchestrators
 * turn it into the job's failed state through toDetail().
 */

import type { JobErrorDetail, PipelineErrorKind } from '../types/job.types.js';

/** Base pipeline error with a machine-readable kind */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly retryable: boolean;
  readonly reason?: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    kind: PipelineErrorKind,
    options: { retryable?: boolean; reason?: string; statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.kind = kind;
    this.retryable = options.retryable ?? false;
    this.reason = options.reason;
    this.statusCode = options.statusCode;
  }

  toDetail(): JobErrorDetail {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.reason ? { reason: this.reason } : {}),
      ...(this.statusCode !== undefined ? { statusCode: this.statusCode } : {}),
      retryable: this.retryable,
    };
  }
}

/** Timeouts, rate limits, 5xx, dropped connections */
export class TransientProviderError extends PipelineError {
  constructor(message: string, options: { reason?: string; statusCode?: number; cause?: unknown } = {}) {
    super(message, 'transient_provider', { ...options, retryable: true });
    this.name = 'TransientProviderError';
  }
}

/** Auth failures, malformed requests, content-policy blocks */
export class PermanentProviderError extends PipelineError {
  constructor(message: string, options: { reason?: string; statusCode?: number; cause?: unknown } = {}) {
    super(message, 'permanent_provider', options);
    this.name = 'PermanentProviderError';
  }
}

/** Provider output holds no recognizable room or entry list */
export class NormalizationError extends PipelineError {
  constructor(message: string, reason?: string) {
    super(message, 'normalization', { reason });
    this.name = 'NormalizationError';
  }
}

/** Blob, config or plan store unavailable */
export class StorageError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'storage', { cause });
    this.name = 'StorageError';
  }
}

/** Job-level deadline exceeded */
export class JobTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super(`Job exceeded the maximum wait of ${timeoutMs} ms`, 'timeout', { reason: 'job_deadline' });
    this.name = 'JobTimeoutError';
  }
}

/** Request the pipeline cannot act on (unknown file id, empty gateway inputs) */
export class InvalidRequestError extends PipelineError {
  constructor(message: string, reason?: string) {
    super(message, 'invalid_request', { reason });
    this.name = 'InvalidRequestError';
  }
}

/**
 * Maps any thrown value to the job-facing detail.
 * Unknown errors keep their message in the log only.
 */
export function toErrorDetail(err: unknown): JobErrorDetail {
  if (err instanceof PipelineError) {
    return err.toDetail();
  }
  return {
    kind: 'internal',
    message: 'Unexpected error while generating the plan',
    retryable: false,
  };
}

/** Wraps a store failure; pipeline errors pass through untouched */
export async function guardStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new StorageError(`${operation} failed: ${message}`, err);
  }
}
