import type { Redis } from 'ioredis';
import type { DeadLetterRecord, DeadLetterSink } from '../../application/ports.js';

/**
 * Appends undeliverable events to a dedicated stream for manual
 * inspection. Nothing in the pipeline reads it back.
 */
export class RedisDeadLetterSink implements DeadLetterSink {
  constructor(
    private readonly redis: Redis,
    private readonly stream: string,
  ) {}

  async append(record: DeadLetterRecord): Promise<void> {
    await this.redis.xadd(
      this.stream,
      '*',
      'original_envelope', record.original_envelope,
      'failure_reason', record.failure_reason,
      'attempt_count', String(record.attempt_count),
      'topic', record.topic,
      'stream_id', record.stream_id,
      'tenant_namespace', record.tenant_namespace,
      'failed_at', record.failed_at,
    );
  }
}
