import { ForwardError } from '../../domain/index.js';
import type { LineageStore } from '../../application/ports.js';

/** Statuses worth another attempt even though they are 4xx. */
const RETRYABLE_CLIENT_STATUSES = new Set([408, 429]);

/**
 * Client for an OpenLineage-compatible HTTP endpoint
 * (`POST {baseUrl}/api/v1/lineage`). Any 2xx is an acceptance.
 *
 * Rejections (4xx) are final; server errors, timeouts and network
 * failures are retryable.
 */
export class HttpLineageStore implements LineageStore {
  private readonly endpoint: string;

  constructor(
    baseUrl: string,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    this.endpoint = `${baseUrl.replace(/\/+$/, '')}/api/v1/lineage`;
  }

  async accept(payloadJson: string, signal: AbortSignal): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: payloadJson,
        signal,
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ForwardError(`Lineage store unreachable: ${message}`, true);
    }

    if (response.ok) return;

    const body = await response.text().catch(() => '');
    const retryable = response.status >= 500 || RETRYABLE_CLIENT_STATUSES.has(response.status);
    throw new ForwardError(
      `Lineage store responded ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`,
      retryable,
      response.status,
    );
  }
}
