/**
 * @fileoverview Z-height unit conversion.
 *
 * NanoDLP reports `CurrentHeight` in motor ticks (6400 per millimeter on the
 * supported machines). Other height fields arrive in millimeters, microns or
 * nanometers without a unit marker; `normalizeZ` picks the unit by magnitude.
 * The thresholds below decide what the UI shows as the plate position, so
 * changing them changes behavior.
 */

export const NANODLP_TICKS_PER_MM = 6400;

/** Values up to this magnitude are already millimeters */
export const MAX_RAW_MILLIMETERS = 1000;

/** Largest plausible build height */
export const MAX_PLAUSIBLE_Z_MM = 300;

export function ticksToMillimeters(ticks: number): number {
  return ticks / NANODLP_TICKS_PER_MM;
}

export type ZUnit = 'mm' | 'um' | 'nm';

export function detectZUnit(raw: number): ZUnit {
  const magnitude = Math.abs(raw);
  if (magnitude <= MAX_RAW_MILLIMETERS) {
    return 'mm';
  }
  if (magnitude / 1000 <= MAX_PLAUSIBLE_Z_MM) {
    return 'um';
  }
  if (magnitude / 1_000_000 <= MAX_PLAUSIBLE_Z_MM) {
    return 'nm';
  }
  // Out of range either way; microns is the least surprising reading
  return 'um';
}

export function normalizeZ(raw: number): number {
  switch (detectZUnit(raw)) {
    case 'mm':
      return raw;
    case 'um':
      return raw / 1000;
    case 'nm':
      return raw / 1_000_000;
  }
}
