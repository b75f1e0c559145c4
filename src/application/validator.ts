import type { ZodError } from 'zod';
import { ValidationError } from '../domain/index.js';
import type { EventKind, ValidatedEvent } from '../domain/index.js';
import { lineageEventSchema, spanSchema, metricSchema } from './event-schema.js';

export interface ValidatorOptions {
  /** Upper bound on the serialized payload, in bytes. */
  maxEventBytes: number;
}

export type ValidationResult =
  | { readonly ok: true; readonly value: ValidatedEvent; readonly sizeBytes: number }
  | { readonly ok: false; readonly error: ValidationError };

const ROOT_FIELD = '(root)';

/**
 * Validates one raw payload of the given kind.
 *
 * Pure: no I/O, no mutation of `raw`. Either the whole event is accepted
 * (with defaults applied) or the first violated field is reported.
 */
export function validateEvent(
  kind: EventKind,
  raw: unknown,
  options: ValidatorOptions,
): ValidationResult {
  const sizeBytes = estimateSerializedSize(raw);
  if (sizeBytes === null) {
    return reject(ROOT_FIELD, 'Payload is not JSON-serializable');
  }
  if (sizeBytes > options.maxEventBytes) {
    return reject(
      ROOT_FIELD,
      `Payload is ${sizeBytes} bytes, exceeding the ${options.maxEventBytes} byte limit`,
    );
  }

  switch (kind) {
    case 'lineage': {
      const parsed = lineageEventSchema.safeParse(raw);
      if (!parsed.success) return fromZod(parsed.error);
      return { ok: true, value: { kind, event: parsed.data }, sizeBytes };
    }
    case 'span': {
      const parsed = spanSchema.safeParse(raw);
      if (!parsed.success) return fromZod(parsed.error);
      return { ok: true, value: { kind, event: parsed.data }, sizeBytes };
    }
    case 'metric': {
      const parsed = metricSchema.safeParse(raw);
      if (!parsed.success) return fromZod(parsed.error);
      return { ok: true, value: { kind, event: parsed.data }, sizeBytes };
    }
  }
}

/** UTF-8 length of the JSON text of `raw`, or null if it cannot be serialized. */
export function estimateSerializedSize(raw: unknown): number | null {
  try {
    const text = JSON.stringify(raw);
    if (text === undefined) return null;
    return Buffer.byteLength(text, 'utf-8');
  } catch {
    return null;
  }
}

function fromZod(error: ZodError): ValidationResult {
  const issue = error.issues[0];
  if (issue === undefined) return reject(ROOT_FIELD, 'Invalid payload');
  const field = issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD;
  return reject(field, issue.message);
}

function reject(field: string, message: string): ValidationResult {
  return { ok: false, error: new ValidationError(field, message) };
}
