import { z } from 'zod';
import { EVENT_KINDS } from '../domain/index.js';
import type { Envelope } from '../domain/index.js';
import { canonicalStringify } from './canonical-json.js';

/**
 * Stream entry layout. The canonical envelope is the source of truth;
 * `tenant_namespace` and `payload_kind` are duplicated as plain fields so
 * a record can be attributed without decoding it.
 */
export const ENVELOPE_FIELD = 'envelope';

const envelopeSchema = z.object({
  event_id: z.string().min(1),
  tenant_namespace: z.string().min(1),
  partition_key: z.string().min(1),
  payload_kind: z.enum(EVENT_KINDS),
  payload_bytes: z.string(),
  ingested_at: z.string().datetime(),
});

export function encodeEnvelope(envelope: Envelope): Record<string, string> {
  return {
    [ENVELOPE_FIELD]: canonicalStringify(envelope),
    tenant_namespace: envelope.tenant_namespace,
    payload_kind: envelope.payload_kind,
  };
}

export type DecodeResult =
  | { readonly ok: true; readonly envelope: Envelope }
  | { readonly ok: false; readonly reason: string };

export function decodeEnvelope(fields: Readonly<Record<string, string>>): DecodeResult {
  const text = fields[ENVELOPE_FIELD];
  if (text === undefined) {
    return { ok: false, reason: `Stream entry has no '${ENVELOPE_FIELD}' field` };
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    return { ok: false, reason: `Envelope is not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: `Malformed envelope: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}` };
  }
  return { ok: true, envelope: parsed.data };
}
