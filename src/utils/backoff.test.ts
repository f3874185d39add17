import { describe, it, expect } from '@jest/globals';
import { computeBackoff, randomInt } from './backoff';

describe('backoff', () => {
  it('doubles the base delay per attempt without jitter', () => {
    const noJitter = (): number => 0;
    expect(computeBackoff(0, 2, 60, noJitter)).toBe(2);
    expect(computeBackoff(1, 2, 60, noJitter)).toBe(4);
    expect(computeBackoff(3, 2, 60, noJitter)).toBe(16);
  });

  it('treats negative attempts as the first', () => {
    expect(computeBackoff(-1, 2, 60, () => 0)).toBe(2);
  });

  it('adds up to half the delay as jitter', () => {
    expect(computeBackoff(3, 2, 60, () => 0.999)).toBe(24);
  });

  it('caps at the maximum including jitter', () => {
    expect(computeBackoff(10, 2, 60, () => 0)).toBe(60);
    expect(computeBackoff(10, 2, 60, () => 0.999)).toBe(60);
  });

  it('draws integers within bounds', () => {
    expect(randomInt(0, () => 0.9)).toBe(0);
    expect(randomInt(8, () => 0.999)).toBe(8);
    expect(randomInt(8, () => 0)).toBe(0);
  });
});
