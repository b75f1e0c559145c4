import { describe, it, expect, vi } from 'vitest';
import { HttpLineageStore } from '../../src/infrastructure/lineage/http-lineage-store.js';
import { ForwardError } from '../../src/domain/index.js';

const signal = new AbortController().signal;

function respondWith(status: number, body = '') {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body || null, { status }));
}

async function rejection(store: HttpLineageStore): Promise<ForwardError> {
  try {
    await store.accept('{"eventType":"START"}', signal);
  } catch (err) {
    if (err instanceof ForwardError) return err;
    throw err;
  }
  throw new Error('expected a ForwardError');
}

describe('HttpLineageStore', () => {
  it('posts the payload bytes as JSON to the lineage endpoint', async () => {
    const fetchFn = respondWith(201);
    const store = new HttpLineageStore('http://marquez:5000/', fetchFn);

    await store.accept('{"eventType":"START"}', signal);

    expect(fetchFn).toHaveBeenCalledWith('http://marquez:5000/api/v1/lineage', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"eventType":"START"}',
      signal,
    });
  });

  it('treats a client rejection as final', async () => {
    const store = new HttpLineageStore('http://marquez:5000', respondWith(400, 'runId must be a UUID'));

    const err = await rejection(store);

    expect(err.retryable).toBe(false);
    expect(err.status).toBe(400);
    expect(err.message).toBe('Lineage store responded 400: runId must be a UUID');
  });

  it.each([500, 503, 408, 429])('retries status %i', async (status) => {
    const store = new HttpLineageStore('http://marquez:5000', respondWith(status));

    const err = await rejection(store);

    expect(err.retryable).toBe(true);
    expect(err.message).toBe(`Lineage store responded ${status}`);
  });

  it('retries when the store cannot be reached', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const store = new HttpLineageStore('http://marquez:5000', fetchFn);

    const err = await rejection(store);

    expect(err.retryable).toBe(true);
    expect(err.message).toBe('Lineage store unreachable: fetch failed');
  });
});
