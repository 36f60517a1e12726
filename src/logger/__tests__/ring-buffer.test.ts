import { describe, it, expect } from 'vitest';
import { RingBuffer } from '../ring-buffer.js';

describe('RingBuffer', () => {
  it('starts empty', () => {
    const buf = new RingBuffer<number>(5);
    expect(buf.size).toBe(0);
    expect(buf.toArray()).toEqual([]);
  });

  it('returns items in insertion order below capacity', () => {
    const buf = new RingBuffer<string>(5);
    buf.push('a');
    buf.push('b');
    expect(buf.size).toBe(2);
    expect(buf.toArray()).toEqual(['a', 'b']);
  });

  it('returns items in insertion order after overflow', () => {
    const buf = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) buf.push(n);
    expect(buf.size).toBe(3);
    expect(buf.toArray()).toEqual([3, 4, 5]);
  });

  it('rejects a capacity below 1', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
  });
});
