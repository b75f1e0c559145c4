import type { BaseLogger } from 'pino';
import { describeError, PublishError } from '../domain/index.js';
import type { Envelope, TopicRole } from '../domain/index.js';
import { encodeEnvelope } from './envelope-codec.js';
import { partitionFor, streamName } from './partitioning.js';
import { retryWithBackoff } from './retry.js';
import type { RetryPolicy } from './retry.js';
import type { LogTransport } from './ports.js';

export interface PublisherOptions {
  /** Concrete topic name for each logical topic. */
  topics: Readonly<Record<TopicRole, string>>;
  partitions: number;
  retry: RetryPolicy;
  /** Largest encoded entry the log accepts, in bytes. */
  maxMessageBytes: number;
}

/** Delivery acknowledgment for one appended envelope. */
export interface Ack {
  readonly event_id: string;
  readonly topic: string;
  readonly stream: string;
  readonly partition: number;
  readonly entry_id: string;
  readonly attempts: number;
}

/** A submitted envelope. `ack` settles once the log confirms (or gives up). */
export interface Submission {
  readonly stream: string;
  readonly partition: number;
  readonly ack: Promise<Ack>;
}

/**
 * Appends envelopes to the partitioned log.
 *
 * Serialization and size checks run synchronously inside `submit`, so a
 * permanent failure is reported to the caller right away. Delivery is
 * asynchronous: appends to one partition are chained so that a retried
 * entry can never be overtaken by a later one with the same key.
 */
export class Publisher {
  private readonly tails = new Map<string, Promise<unknown>>();

  constructor(
    private readonly transport: LogTransport,
    private readonly options: PublisherOptions,
    private readonly log: BaseLogger,
  ) {}

  /**
   * Encodes and queues `envelope` for delivery.
   *
   * @throws PublishError (permanent) when the envelope cannot be serialized
   *   or exceeds the message size limit. Never retried.
   */
  submit(topic: TopicRole, partitionKey: string, envelope: Envelope): Submission {
    const topicName = this.options.topics[topic];
    const partition = partitionFor(partitionKey, this.options.partitions);
    const stream = streamName(topicName, partition);

    let fields: Record<string, string>;
    try {
      fields = encodeEnvelope(envelope);
    } catch (err: unknown) {
      throw new PublishError(`Envelope serialization failed: ${describeError(err)}`, 'permanent', {
        event_id: envelope.event_id,
        topic: topicName,
      });
    }

    const size = Object.entries(fields).reduce(
      (sum, [k, v]) => sum + Buffer.byteLength(k) + Buffer.byteLength(v),
      0,
    );
    if (size > this.options.maxMessageBytes) {
      throw new PublishError(
        `Message of ${size} bytes exceeds the ${this.options.maxMessageBytes} byte limit`,
        'permanent',
        { event_id: envelope.event_id, topic: topicName, size },
      );
    }

    const previous = this.tails.get(stream) ?? Promise.resolve();
    const ack = previous.then(() => this.deliver(topicName, stream, partition, envelope, fields));

    const tail = ack.catch(() => undefined);
    this.tails.set(stream, tail);
    void tail.then(() => {
      if (this.tails.get(stream) === tail) this.tails.delete(stream);
    });

    return { stream, partition, ack };
  }

  /** Submits and waits for the acknowledgment. */
  async publish(topic: TopicRole, partitionKey: string, envelope: Envelope): Promise<Ack> {
    return this.submit(topic, partitionKey, envelope).ack;
  }

  /** Resolves once every queued delivery has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }

  private async deliver(
    topic: string,
    stream: string,
    partition: number,
    envelope: Envelope,
    fields: Record<string, string>,
  ): Promise<Ack> {
    const outcome = await retryWithBackoff(
      () => this.transport.append(stream, fields),
      this.options.retry,
      {
        onRetry: (err, attempt, delayMs) => {
          this.log.warn(
            { err, event_id: envelope.event_id, stream, attempt, delayMs },
            'Publish attempt failed, retrying',
          );
        },
      },
    );

    if (!outcome.ok) {
      throw new PublishError(
        `Publish to ${stream} failed after ${outcome.attempts} attempts: ${describeError(outcome.error)}`,
        'transient',
        { event_id: envelope.event_id, stream, attempts: outcome.attempts },
      );
    }

    this.log.debug(
      { event_id: envelope.event_id, stream, entry_id: outcome.value, attempts: outcome.attempts },
      'Envelope appended',
    );

    return {
      event_id: envelope.event_id,
      topic,
      stream,
      partition,
      entry_id: outcome.value,
      attempts: outcome.attempts,
    };
  }
}
