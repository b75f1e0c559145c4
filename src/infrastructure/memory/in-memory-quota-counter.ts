import type { QuotaCounter, QuotaIncrement } from '../../application/ports.js';

/**
 * Single-process quota counters. When a newer day is first counted,
 * counters of every earlier day are dropped.
 */
export class InMemoryQuotaCounter implements QuotaCounter {
  private readonly days = new Map<string, Map<string, number>>();
  private latestDay = '';

  async tryIncrement(namespace: string, day: string, limit: number): Promise<QuotaIncrement> {
    const counts = this.countsFor(day);
    const used = counts.get(namespace) ?? 0;
    if (used >= limit) {
      return { admitted: false, used };
    }
    counts.set(namespace, used + 1);
    return { admitted: true, used: used + 1 };
  }

  async current(namespace: string, day: string): Promise<number> {
    return this.days.get(day)?.get(namespace) ?? 0;
  }

  /** Days still held in memory. */
  get retainedDays(): string[] {
    return [...this.days.keys()].sort();
  }

  private countsFor(day: string): Map<string, number> {
    if (day > this.latestDay) {
      this.latestDay = day;
      for (const key of this.days.keys()) {
        if (key < day) this.days.delete(key);
      }
    }

    let counts = this.days.get(day);
    if (!counts) {
      counts = new Map();
      this.days.set(day, counts);
    }
    return counts;
  }
}
