import { describe, expect, it } from 'vitest';
import { EventChannel } from '../event-channel.js';
import { canonicalJson, generateCacheKey } from '../cache.js';

describe('EventChannel', () => {
  it('delivers buffered and later items in order, then ends', async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);

    const received: number[] = [];
    const reading = (async () => {
      for await (const item of channel) received.push(item);
    })();

    channel.push(3);
    channel.close();
    channel.push(4);
    await reading;

    expect(received).toEqual([1, 2, 3]);
    expect(channel.isClosed).toBe(true);
  });
});

describe('cache keys', () => {
  it('ignores key order and undefined fields', () => {
    expect(canonicalJson({ b: 1, a: [2, { d: undefined, c: 3 }] })).toBe('{"a":[2,{"c":3}],"b":1}');
    expect(generateCacheKey({ a: 1, b: 2 })).toBe(generateCacheKey({ b: 2, a: 1 }));
    expect(generateCacheKey({ a: 1 })).toHaveLength(16);
  });
});
