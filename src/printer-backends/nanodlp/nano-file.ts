/**
 * @fileoverview NanoDLP plate/file record parsing.
 *
 * Plates come from `/plates/list/json` or are embedded in `/status`. Units
 * vary by firmware: print time may be seconds or `~h:m:s`, resin volume may
 * be mL, µL or L, layer height may be mm or microns.
 */

import { formatHms } from '../../utils/time.utils';
import { firstPresent, toInt, toStr, type JsonRecord } from '../../utils/value-parsers';
import { FILE_ALIASES } from './field-aliases';

export interface NanoFile {
  readonly path: string;
  readonly name: string;
  readonly layerCount: number | null;
  /** Seconds */
  readonly printTime: number | null;
  readonly lastModified: number | null;
  readonly parentPath: string;
  readonly fileSize: number | null;
  readonly materialName: string;
  /** Millilitres */
  readonly usedMaterial: number | null;
  /** Millimetres */
  readonly layerHeight: number | null;
  readonly locationCategory: string;
  readonly plateId: number | null;
  readonly previewAvailable: boolean;
}

const NON_NUMERIC = /[^0-9+\-.]/g;

function parseNumber(text: string): number | null {
  if (text.length === 0) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parsePreviewFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true' || lowered === 't' || lowered === 'yes') {
      return true;
    }
    const numeric = toInt(lowered);
    return numeric !== null && numeric !== 0;
  }
  return false;
}

/**
 * Seconds from a number, a `~h:m:s` duration or a string with units.
 */
export function parsePrintTime(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  const duration = /~?(\d{1,2}):(\d{1,2}):(\d{1,2})/.exec(trimmed);
  if (duration) {
    const [, hours, minutes, seconds] = duration;
    return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
  }
  return parseNumber(trimmed.replace(NON_NUMERIC, ''));
}

/**
 * Millilitres. Bare numbers are already mL; strings are read by unit suffix.
 */
export function parseVolume(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const text = toStr(value)?.trim();
  if (!text) {
    return null;
  }
  const lower = text.toLowerCase();
  const parsed = parseNumber(lower.replace(/[^0-9+\-.eE]/g, ''));
  if (parsed === null) {
    return null;
  }
  if (lower.includes('µ') || lower.includes('ul') || lower.includes('microl')) {
    return parsed / 1000;
  }
  if (lower.includes('l') && !lower.includes('ml') && !lower.includes('ul')) {
    return parsed * 1000;
  }
  if (lower.includes('ml') || lower.includes('cc') || lower.includes('cm3')) {
    return parsed;
  }
  // Large unitless values are microlitres
  return parsed >= 1000 ? parsed / 1000 : parsed;
}

/**
 * Millimetres. Unitless values of 10 or more are microns.
 */
export function parseLayerHeight(value: unknown, assumeMicrons = false): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  let numeric: number | null;
  let source = '';
  if (typeof value === 'number') {
    numeric = Number.isFinite(value) ? value : null;
  } else {
    source = toStr(value) ?? '';
    numeric = parseNumber(source.replace(NON_NUMERIC, ''));
  }
  if (numeric === null) {
    return null;
  }

  const lower = source.toLowerCase();
  if (assumeMicrons || lower.includes('µ') || lower.includes('micron')) {
    return numeric / 1000;
  }
  if (lower.includes('mm')) {
    return numeric;
  }
  if (!/[a-z]/.test(lower) && numeric >= 10) {
    return numeric / 1000;
  }
  return numeric;
}

function parentOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index >= 0 ? path.substring(0, index) : '';
}

export function parseNanoFile(json: JsonRecord): NanoFile {
  let path = toStr(firstPresent(json, FILE_ALIASES.path));
  let name = toStr(firstPresent(json, FILE_ALIASES.name));
  if (name === null && path !== null) {
    name = path.split('/').pop() ?? path;
  }
  if (path === null && name !== null) {
    path = name;
  }
  const resolvedPath = path ?? '';

  let parentPath = toStr(firstPresent(json, FILE_ALIASES.parentPath));
  if (!parentPath && resolvedPath.includes('/')) {
    parentPath = parentOf(resolvedPath);
  }

  let layerHeight = parseLayerHeight(firstPresent(json, FILE_ALIASES.layerHeight));
  if (layerHeight === null) {
    for (const key of FILE_ALIASES.layerHeightMicrons) {
      layerHeight = parseLayerHeight(json[key], true);
      if (layerHeight !== null) break;
    }
  }

  return {
    path: resolvedPath,
    name: name ?? resolvedPath,
    layerCount: toInt(firstPresent(json, FILE_ALIASES.layerCount)),
    printTime: parsePrintTime(firstPresent(json, FILE_ALIASES.printTime)),
    lastModified: toInt(firstPresent(json, FILE_ALIASES.lastModified)),
    parentPath: parentPath ?? '',
    fileSize: toInt(firstPresent(json, FILE_ALIASES.fileSize)),
    materialName: toStr(firstPresent(json, FILE_ALIASES.materialName)) ?? 'N/A',
    usedMaterial: parseVolume(firstPresent(json, FILE_ALIASES.usedMaterial) ?? 0),
    layerHeight,
    locationCategory: toStr(firstPresent(json, FILE_ALIASES.locationCategory)) ?? 'Local',
    plateId: toInt(firstPresent(json, FILE_ALIASES.plateId)),
    previewAvailable: parsePreviewFlag(firstPresent(json, FILE_ALIASES.preview)),
  };
}

function fileDataOf(file: NanoFile): JsonRecord {
  return {
    path: file.path,
    name: file.name || file.path,
    last_modified: file.lastModified ?? 0,
    parent_path: file.parentPath || parentOf(file.path),
    file_size: file.fileSize,
  };
}

/**
 * Entry in the shape of a file listing row.
 */
export function toFileEntry(file: NanoFile): JsonRecord {
  const entry: JsonRecord = {
    file_data: fileDataOf(file),
    location_category: file.locationCategory,
    material_name: file.materialName,
    used_material: file.usedMaterial ?? 0,
    print_time: file.printTime ?? 0,
  };
  if (file.printTime !== null) {
    entry.print_time_formatted = formatHms(file.printTime);
  }
  entry.layer_count = file.layerCount ?? 0;
  if (file.layerHeight !== null) {
    entry.layer_height = file.layerHeight;
  }
  if (file.plateId !== null) {
    entry.plate_id = file.plateId;
  }
  entry.preview_available = file.previewAvailable;
  return entry;
}

export function toFileMetadata(file: NanoFile): JsonRecord {
  const metadata: JsonRecord = {
    file_data: fileDataOf(file),
    layer_height: file.layerHeight,
    material_name: file.materialName,
    used_material: file.usedMaterial ?? 0,
    print_time: file.printTime ?? 0,
  };
  if (file.printTime !== null) {
    metadata.print_time_formatted = formatHms(file.printTime);
  }
  metadata.plate_id = file.plateId;
  metadata.preview_available = file.previewAvailable;
  return metadata;
}
