import { describe, it, expect } from 'vitest';
import {
  fnv1a32,
  partitionFor,
  partitionStreams,
  streamName,
} from '../../src/application/partitioning.js';

describe('fnv1a32', () => {
  it('matches the reference vectors', () => {
    expect(fnv1a32('')).toBe(0x811c9dc5);
    expect(fnv1a32('a')).toBe(0xe40c292c);
    expect(fnv1a32('foobar')).toBe(0xbf9cf968);
  });
});

describe('partitionFor', () => {
  it('is stable for a key', () => {
    const key = '3f2b8c1e-0a4d-4c6b-9e7f-1a2b3c4d5e6f';
    expect(partitionFor(key, 8)).toBe(partitionFor(key, 8));
  });

  it('stays within range', () => {
    for (let i = 0; i < 200; i++) {
      const p = partitionFor(`key-${i}`, 4);
      expect(p).toBeGreaterThanOrEqual(0);
      expect(p).toBeLessThan(4);
    }
  });

  it('maps everything to partition 0 with a single partition', () => {
    expect(partitionFor('anything', 1)).toBe(0);
  });

  it('rejects a non-positive partition count', () => {
    expect(() => partitionFor('k', 0)).toThrow(RangeError);
    expect(() => partitionFor('k', 1.5)).toThrow(RangeError);
  });
});

describe('stream names', () => {
  it('suffixes the topic with the partition', () => {
    expect(streamName('otel-spans', 2)).toBe('otel-spans:2');
    expect(partitionStreams('lineage-events', 3)).toEqual([
      'lineage-events:0',
      'lineage-events:1',
      'lineage-events:2',
    ]);
  });
});
