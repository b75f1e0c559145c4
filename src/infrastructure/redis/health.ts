import type { Redis } from 'ioredis';
import type { HealthProbe } from '../../application/ports.js';

export function redisHealthProbe(redis: Redis): HealthProbe {
  return {
    name: 'redis',
    async check() {
      return (await redis.ping()) === 'PONG';
    },
  };
}
