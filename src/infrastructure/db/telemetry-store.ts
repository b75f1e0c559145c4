import { BulkWriteError, describeError } from '../../domain/index.js';
import type { TimeSeriesStore } from '../../application/ports.js';
import type { MetricRow, TraceRow } from '../../application/telemetry-rows.js';
import type { Database } from './client.js';
import { otelMetrics, otelTraces } from './schema.js';

/**
 * Time-series store on Postgres. Each call is one multi-row INSERT, so a
 * batch is written entirely or not at all.
 *
 * postgres.js queries cannot be cancelled mid-flight; the signal only
 * stops a write from starting after its attempt already timed out.
 */
export class PostgresTimeSeriesStore implements TimeSeriesStore {
  constructor(private readonly db: Database) {}

  async insertTraces(rows: readonly TraceRow[], signal: AbortSignal): Promise<void> {
    if (rows.length === 0 || signal.aborted) return;
    try {
      await this.db.insert(otelTraces).values(rows.map((row) => ({ ...row })));
    } catch (err: unknown) {
      throw new BulkWriteError(`Insert into otel_traces failed: ${describeError(err)}`, 'otel_traces', rows.length);
    }
  }

  async insertMetrics(rows: readonly MetricRow[], signal: AbortSignal): Promise<void> {
    if (rows.length === 0 || signal.aborted) return;
    try {
      await this.db.insert(otelMetrics).values(rows.map((row) => ({ ...row })));
    } catch (err: unknown) {
      throw new BulkWriteError(`Insert into otel_metrics failed: ${describeError(err)}`, 'otel_metrics', rows.length);
    }
  }
}
