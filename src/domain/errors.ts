/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Validation, namespace and quota outcomes are returned to the gateway as
 * values and surfaced to producers per event. Publish, forward and
 * bulk-write errors are thrown inside their component and handled there.
 */

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'UNKNOWN_NAMESPACE'
  | 'QUOTA_EXCEEDED'
  | 'PUBLISH_FAILED'
  | 'FORWARD_FAILED'
  | 'BULK_WRITE_FAILED'
  | 'ATTEMPT_TIMEOUT';

export class PipelineError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    retryable: boolean,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.retryable = retryable;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

/** Malformed input. Identifies the first violated field. */
export class ValidationError extends PipelineError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, 'VALIDATION_FAILED', false, { field });
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class UnknownNamespaceError extends PipelineError {
  constructor(namespace: string, reason = 'namespace is not registered') {
    super(`Unknown namespace '${namespace}': ${reason}`, 'UNKNOWN_NAMESPACE', false, { namespace });
    this.name = 'UnknownNamespaceError';
  }
}

export class QuotaExceededError extends PipelineError {
  public readonly limit: number;
  public readonly used: number;
  public readonly day: string;

  constructor(namespace: string, limit: number, used: number, day: string) {
    super(
      `Namespace '${namespace}' exhausted its daily quota of ${limit} events for ${day}`,
      'QUOTA_EXCEEDED',
      false,
      { namespace, limit, used, day },
    );
    this.name = 'QuotaExceededError';
    this.limit = limit;
    this.used = used;
    this.day = day;
  }
}

export type PublishFailureKind = 'transient' | 'permanent';

export class PublishError extends PipelineError {
  public readonly kind: PublishFailureKind;

  constructor(message: string, kind: PublishFailureKind, context: Record<string, unknown> = {}) {
    super(message, 'PUBLISH_FAILED', kind === 'transient', context);
    this.name = 'PublishError';
    this.kind = kind;
  }
}

/** Lineage store rejected or failed to accept a single event. */
export class ForwardError extends PipelineError {
  public readonly status: number | undefined;

  constructor(message: string, retryable: boolean, status?: number) {
    super(message, 'FORWARD_FAILED', retryable, { status });
    this.name = 'ForwardError';
    this.status = status;
  }
}

/** Time-series store failed to accept a batch. */
export class BulkWriteError extends PipelineError {
  constructor(message: string, table: string, rows: number) {
    super(message, 'BULK_WRITE_FAILED', true, { table, rows });
    this.name = 'BulkWriteError';
  }
}

/** A single attempt outlived its per-attempt budget. */
export class AttemptTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`, 'ATTEMPT_TIMEOUT', true, { timeoutMs });
    this.name = 'AttemptTimeoutError';
  }
}

/** Describes any thrown value for logs and dead-letter records. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
