import { describe, it, expect } from '@jest/globals';
import { RingBuffer } from './RingBuffer';

describe('RingBuffer', () => {
  it('keeps insertion order below capacity', () => {
    const buffer = new RingBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.toArray()).toEqual([1, 2]);
    expect(buffer.latest()).toBe(2);
    expect(buffer.length).toBe(2);
  });

  it('drops the oldest entries past capacity', () => {
    const buffer = new RingBuffer<number>(3);
    for (let i = 1; i <= 5; i++) {
      buffer.push(i);
    }

    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.latest()).toBe(5);
    expect(buffer.length).toBe(3);
  });

  it('clears', () => {
    const buffer = new RingBuffer<string>(2);
    buffer.push('a');
    buffer.clear();

    expect(buffer.toArray()).toEqual([]);
    expect(buffer.latest()).toBeUndefined();
  });

  it('rejects invalid capacities', () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
    expect(() => new RingBuffer(1.5)).toThrow(RangeError);
  });
});
