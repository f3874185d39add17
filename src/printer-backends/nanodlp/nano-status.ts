/**
 * @fileoverview NanoDLP `/status` payload parsing.
 *
 * Produces a typed NanoStatus from the raw map. Nothing here throws on odd
 * payloads; unknown or mistyped fields read as null.
 */

import {
  clamp,
  firstPresent,
  firstRecord,
  toFloat,
  toInt,
  toStr,
  type JsonRecord,
} from '../../utils/value-parsers';
import { normalizeZ, ticksToMillimeters } from '../../utils/z-units';
import { STATUS_ALIASES } from './field-aliases';
import { parseNanoFile, type NanoFile } from './nano-file';

export type NanoStateText = 'printing' | 'paused' | 'idle';

export interface NanoStatus {
  readonly printing: boolean;
  readonly paused: boolean;
  readonly statusMessage: string | null;
  /** Raw device ticks */
  readonly currentHeight: number | null;
  readonly layerId: number | null;
  readonly layersCount: number | null;
  readonly resinLevel: number | null;
  readonly temperature: number | null;
  readonly mcuTemperature: number | null;
  readonly state: NanoStateText;
  /** Numeric `State` code when the firmware reports one */
  readonly stateCode: number | null;
  readonly plateId: number | null;
  /** 0..1 */
  readonly progress: number | null;
  readonly file: NanoFile | null;
  /** Millimetres */
  readonly z: number | null;
  readonly curing: boolean;
}

function anyEquals(json: JsonRecord, keys: readonly string[], expected: unknown): boolean {
  return keys.some((key) => json[key] === expected);
}

export function parseNanoStatus(json: JsonRecord): NanoStatus {
  const fileJson = firstRecord(json, STATUS_ALIASES.file);
  const printing = anyEquals(json, STATUS_ALIASES.printing, true) || anyEquals(json, STATUS_ALIASES.started, 1);
  const paused = anyEquals(json, STATUS_ALIASES.paused, true);
  const currentHeight = toInt(firstPresent(json, STATUS_ALIASES.currentHeight));
  const layerId = toInt(firstPresent(json, STATUS_ALIASES.layerId));
  const layersCount = toInt(firstPresent(json, STATUS_ALIASES.layersCount));

  let state: NanoStateText = 'idle';
  if (printing) {
    state = 'printing';
  } else if (paused) {
    state = 'paused';
  }

  let progress: number | null = null;
  if (layerId !== null && layersCount !== null && layersCount > 0) {
    progress = clamp(layerId / layersCount, 0, 1);
  }

  let z: number | null = null;
  if (currentHeight !== null) {
    z = ticksToMillimeters(currentHeight);
  } else {
    const rawZ = toFloat(firstPresent(json, STATUS_ALIASES.z));
    z = rawZ === null ? null : normalizeZ(rawZ);
  }

  return {
    printing,
    paused,
    statusMessage: toStr(firstPresent(json, STATUS_ALIASES.statusMessage)),
    currentHeight,
    layerId,
    layersCount,
    resinLevel: toFloat(firstPresent(json, STATUS_ALIASES.resinLevel)),
    temperature: toFloat(firstPresent(json, STATUS_ALIASES.temperature)),
    mcuTemperature: toFloat(firstPresent(json, STATUS_ALIASES.mcuTemperature)),
    state,
    stateCode: toInt(firstPresent(json, STATUS_ALIASES.stateCode)),
    plateId: toInt(firstPresent(json, STATUS_ALIASES.plateId)),
    progress,
    file: fileJson ? parseNanoFile(fileJson) : null,
    z,
    curing: anyEquals(json, STATUS_ALIASES.curing, true),
  };
}

/**
 * Copy of `status` with resolved plate metadata attached.
 */
export function withFile(status: NanoStatus, file: NanoFile): NanoStatus {
  return { ...status, file };
}
