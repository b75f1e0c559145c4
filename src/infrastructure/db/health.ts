import type { Sql } from 'postgres';
import type { HealthProbe } from '../../application/ports.js';

export function databaseHealthProbe(sql: Sql): HealthProbe {
  return {
    name: 'database',
    async check() {
      await sql`select 1`;
      return true;
    },
  };
}
