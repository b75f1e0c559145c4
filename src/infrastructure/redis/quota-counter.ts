import type { Redis } from 'ioredis';
import type { QuotaCounter, QuotaIncrement } from '../../application/ports.js';

/**
 * Compare-and-increment in one server-side step. Counts the event only
 * while the counter is below the limit; the key expires two days after
 * its last write, which bounds the number of live counters.
 */
const TRY_INCREMENT_SCRIPT = `
local current = tonumber(redis.call('GET', KEYS[1]) or '0')
local limit = tonumber(ARGV[1])
if current >= limit then
  return {0, current}
end
current = redis.call('INCR', KEYS[1])
redis.call('EXPIRE', KEYS[1], ARGV[2])
return {1, current}
`;

const COUNTER_TTL_SECONDS = 48 * 60 * 60;

export function quotaKey(namespace: string, day: string): string {
  return `quota:${namespace}:${day}`;
}

/** Daily quota counters shared by every gateway replica. */
export class RedisQuotaCounter implements QuotaCounter {
  constructor(private readonly redis: Redis) {}

  async tryIncrement(namespace: string, day: string, limit: number): Promise<QuotaIncrement> {
    const reply: unknown = await this.redis.eval(
      TRY_INCREMENT_SCRIPT,
      1,
      quotaKey(namespace, day),
      limit,
      COUNTER_TTL_SECONDS,
    );

    if (!Array.isArray(reply) || reply.length !== 2) {
      throw new Error(`Unexpected quota script reply: ${JSON.stringify(reply)}`);
    }
    const [admitted, used]: unknown[] = reply;
    return { admitted: Number(admitted) === 1, used: Number(used) };
  }

  async current(namespace: string, day: string): Promise<number> {
    const value = await this.redis.get(quotaKey(namespace, day));
    return value === null ? 0 : Number(value);
  }
}
