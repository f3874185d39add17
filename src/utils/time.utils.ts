/**
 * @fileoverview Time helpers: abortable delays, HH:MM:SS formatting and
 * layer-duration unit detection.
 */

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format whole seconds as zero-padded HH:MM:SS.
 */
export function formatHms(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  const two = (value: number): string => String(value).padStart(2, '0');
  return `${two(Math.floor(total / 3600))}:${two(Math.floor((total % 3600) / 60))}:${two(total % 60)}`;
}

/** Longest layer duration accepted as a real measurement */
export const MAX_LAYER_SECONDS = 24 * 60 * 60;

/**
 * Seconds from a layer duration reported in nanoseconds, microseconds or
 * seconds, picked by magnitude.
 */
export function layerDurationToSeconds(raw: number): number {
  if (raw >= 1e9) {
    return raw / 1e9;
  }
  if (raw >= 1e3) {
    return raw / 1e6;
  }
  return raw;
}

export function isPlausibleLayerSeconds(seconds: number): boolean {
  return seconds > 0 && seconds < MAX_LAYER_SECONDS;
}
