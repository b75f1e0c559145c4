/**
 * Deterministic JSON serialization: object keys are emitted in sorted
 * order at every depth, so structurally equal values always produce the
 * same text (and therefore the same bytes on the log).
 *
 * Follows JSON.stringify semantics for everything else: `undefined`
 * properties are dropped, `toJSON()` is honoured, non-finite numbers
 * become null.
 */
export function canonicalStringify(value: unknown): string {
  const normalized = normalize(value);
  if (normalized === undefined || typeof normalized === 'function' || typeof normalized === 'symbol') {
    throw new TypeError('Value is not JSON-serializable');
  }
  return JSON.stringify(normalized);
}

function normalize(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    if (typeof value === 'bigint') {
      throw new TypeError('BigInt values are not JSON-serializable');
    }
    return value;
  }

  if (hasToJSON(value)) {
    return normalize(value.toJSON());
  }

  if (Array.isArray(value)) {
    return value.map((item) => {
      const n = normalize(item);
      return n === undefined ? null : n;
    });
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const n = normalize(Reflect.get(value, key));
    if (n !== undefined && typeof n !== 'function' && typeof n !== 'symbol') {
      // Plain assignment would treat an own "__proto__" key as the prototype.
      Object.defineProperty(sorted, key, { value: n, enumerable: true, writable: true, configurable: true });
    }
  }
  return sorted;
}

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return typeof Reflect.get(value, 'toJSON') === 'function';
}
