/**
 * @fileoverview Lenient readers for loosely-typed backend JSON.
 *
 * Backends report the same attribute under different keys and types
 * (`"LayerID": "12"`, `"temp": "24.85°C"`). These helpers never throw: a value
 * of the wrong shape reads as null so parsers can fall through to the next
 * alias or heuristic.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First value among `keys` that is neither null nor undefined.
 */
export function firstPresent(source: JsonRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = source[key];
    if (value !== null && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * First value among `keys` that is a JSON object.
 */
export function firstRecord(source: JsonRecord, keys: readonly string[]): JsonRecord | null {
  for (const key of keys) {
    const value = source[key];
    if (isRecord(value)) {
      return value;
    }
  }
  return null;
}

export function hasAnyKey(source: JsonRecord, keys: readonly string[]): boolean {
  return keys.some((key) => Object.prototype.hasOwnProperty.call(source, key));
}

/**
 * Integer from a number or an integer string. Fractional numbers truncate;
 * fractional strings are rejected.
 */
export function toInt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
  }
  return null;
}

/**
 * Float from a number or a string, ignoring units and symbols in the string.
 */
export function toFloat(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/[^0-9+\-.]/g, '');
    if (cleaned.length === 0) {
      return null;
    }
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * String form of scalars; objects and arrays read as null.
 */
export function toStr(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

export function toBool(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
