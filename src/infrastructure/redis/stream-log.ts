import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import { partitionStreams } from '../../application/partitioning.js';
import type {
  LogRecord,
  LogSubscription,
  LogTransport,
  PollOptions,
} from '../../application/ports.js';

/**
 * Redis Streams as the partitioned log.
 *
 * Each partition of a topic is its own stream. `XADD` appends, consumer
 * groups give each consumer its own offsets, `XACK` is the commit.
 */
export class RedisStreamTransport implements LogTransport {
  constructor(private readonly redis: Redis) {}

  async append(stream: string, fields: Readonly<Record<string, string>>): Promise<string> {
    const args = Object.entries(fields).flat();
    const entryId = await this.redis.xadd(stream, '*', ...args);
    if (entryId === null) {
      throw new Error(`XADD to ${stream} returned no entry id`);
    }
    return entryId;
  }
}

export interface StreamSubscriptionOptions {
  topic: string;
  partitions: number;
  group: string;
  consumer: string;
}

/**
 * Consumer-group subscription over every partition stream of a topic.
 *
 * XREADGROUP blocks its connection, so each subscription needs a
 * dedicated ioredis client.
 *
 * On start the subscription first walks this consumer's pending entries
 * list (delivered before a crash, never acknowledged), then switches to
 * new entries (`>`).
 */
export class RedisStreamSubscription implements LogSubscription {
  readonly topic: string;
  private readonly streams: string[];
  private readonly pendingCursors: Map<string, string>;
  private recovering = true;
  private buffered: LogRecord[] = [];

  constructor(
    private readonly redis: Redis,
    private readonly options: StreamSubscriptionOptions,
    private readonly log: BaseLogger,
  ) {
    this.topic = options.topic;
    this.streams = partitionStreams(options.topic, options.partitions);
    this.pendingCursors = new Map(this.streams.map((s) => [s, '0']));
  }

  /**
   * Creates the consumer group on every partition stream.
   *
   * Groups start at "0" so entries published before the first consumer
   * came up are still delivered. MKSTREAM creates missing streams.
   */
  async ensureGroups(): Promise<void> {
    for (const stream of this.streams) {
      try {
        await this.redis.xgroup('CREATE', stream, this.options.group, '0', 'MKSTREAM');
        this.log.info({ group: this.options.group, stream }, 'Consumer group created');
      } catch (err: unknown) {
        if (err instanceof Error && err.message.includes('BUSYGROUP')) {
          this.log.debug({ group: this.options.group, stream }, 'Consumer group already exists');
          continue;
        }
        throw err;
      }
    }
  }

  async poll(options: PollOptions): Promise<LogRecord[]> {
    if (options.signal.aborted || options.max < 1) return [];

    if (this.buffered.length === 0) {
      this.buffered = await this.read(options);
    }
    return this.buffered.splice(0, options.max);
  }

  /**
   * COUNT applies per stream, so a reply can hold up to `max` entries
   * for every partition. All of them are already in this consumer's
   * pending list; they are kept in `buffered` until handed out.
   */
  private async read(options: PollOptions): Promise<LogRecord[]> {
    while (this.recovering) {
      const pending = await this.readPending(options.max);
      if (pending === undefined) {
        this.recovering = false;
        this.log.info({ topic: this.topic, group: this.options.group }, 'Pending entries recovered');
      } else if (pending.length > 0) {
        return pending;
      }
    }

    const reply: unknown = await this.redis.xreadgroup(
      'GROUP', this.options.group, this.options.consumer,
      'COUNT', options.max,
      'BLOCK', Math.max(1, Math.floor(options.blockMs)),
      'STREAMS', ...this.streams, ...this.streams.map(() => '>'),
    );

    return parseStreamReply(reply);
  }

  async commit(records: readonly LogRecord[]): Promise<void> {
    const byStream = new Map<string, string[]>();
    for (const record of records) {
      const ids = byStream.get(record.stream) ?? [];
      ids.push(record.id);
      byStream.set(record.stream, ids);
    }

    for (const [stream, ids] of byStream) {
      await this.redis.xack(stream, this.options.group, ...ids);
    }
  }

  /**
   * Reads this consumer's unacknowledged entries, past the last one seen.
   * Resolves undefined once the pending list is exhausted.
   */
  private async readPending(max: number): Promise<LogRecord[] | undefined> {
    const reply: unknown = await this.redis.xreadgroup(
      'GROUP', this.options.group, this.options.consumer,
      'COUNT', max,
      'STREAMS', ...this.streams, ...this.streams.map((s) => this.pendingCursors.get(s) ?? '0'),
    );

    const records = parseStreamReply(reply);
    if (records.length === 0) return undefined;
    for (const record of records) {
      this.pendingCursors.set(record.stream, record.id);
    }

    // Entries acknowledged or trimmed meanwhile come back with no fields.
    return records.filter((r) => Object.keys(r.fields).length > 0);
  }
}

/**
 * Normalises an XREAD/XREADGROUP reply:
 * `[[stream, [[id, [field, value, ...]], ...]], ...] | null`.
 */
export function parseStreamReply(reply: unknown): LogRecord[] {
  if (!Array.isArray(reply)) return [];

  const records: LogRecord[] = [];
  for (const streamEntry of reply) {
    if (!Array.isArray(streamEntry)) continue;
    const [stream, entries] = streamEntry;
    if (typeof stream !== 'string' || !Array.isArray(entries)) continue;

    for (const entry of entries) {
      if (!Array.isArray(entry)) continue;
      const [id, rawFields] = entry;
      if (typeof id !== 'string') continue;
      records.push({ id, stream, fields: toFieldMap(rawFields) });
    }
  }
  return records;
}

function toFieldMap(raw: unknown): Record<string, string> {
  const map: Record<string, string> = {};
  if (!Array.isArray(raw)) return map;

  for (let i = 0; i + 1 < raw.length; i += 2) {
    const key: unknown = raw[i];
    const value: unknown = raw[i + 1];
    if (typeof key === 'string' && typeof value === 'string') {
      map[key] = value;
    }
  }
  return map;
}
