/**
 * @fileoverview Exponential backoff with jitter for retry scheduling.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export function randomInt(maxInclusive: number, random: RandomSource = Math.random): number {
  if (maxInclusive <= 0) {
    return 0;
  }
  return Math.min(maxInclusive, Math.floor(random() * (maxInclusive + 1)));
}

/**
 * Delay in whole seconds before retry number `attempts`:
 * `min(base * 2^attempts, max)` plus up to 50% jitter, capped at `max`.
 */
export function computeBackoff(
  attempts: number,
  baseSeconds: number,
  maxSeconds: number,
  random: RandomSource = Math.random
): number {
  let seconds = Math.trunc(baseSeconds * Math.pow(2, Math.max(0, attempts)));
  if (seconds > maxSeconds) {
    seconds = maxSeconds;
  }
  seconds += randomInt(Math.floor(seconds / 2), random);
  return Math.min(seconds, maxSeconds);
}
