/**
 * Maps partition keys onto the fixed set of streams backing a topic.
 *
 * A topic `t` with `P` partitions is materialised as streams `t:0` … `t:P-1`.
 * The same key always lands on the same stream, which is what keeps a
 * run's lineage events (or a trace's spans) in submission order.
 */

/** 32-bit FNV-1a over the UTF-8 bytes of `key`. */
export function fnv1a32(key: string): number {
  let hash = 0x811c9dc5;
  for (const byte of Buffer.from(key, 'utf-8')) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function partitionFor(key: string, partitions: number): number {
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new RangeError(`partitions must be a positive integer, got ${partitions}`);
  }
  return fnv1a32(key) % partitions;
}

export function streamName(topic: string, partition: number): string {
  return `${topic}:${partition}`;
}

/** All stream names backing `topic`, in partition order. */
export function partitionStreams(topic: string, partitions: number): string[] {
  return Array.from({ length: partitions }, (_, p) => streamName(topic, p));
}
