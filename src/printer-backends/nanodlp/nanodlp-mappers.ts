/**
 * @fileoverview Maps parsed NanoDLP status into the canonical wire shape
 * read by StatusModel.fromJson.
 */

import type { RawStatus } from '../../types/backend-client';
import type { StatusJson } from '../../types/status';
import type { NanoStatus } from './nano-status';
import type { CanonicalTuple } from './state-canonicalizer';

export type MappedNanoStatus = StatusJson & RawStatus;

function printDataFor(status: NanoStatus): StatusJson['print_data'] {
  const file = status.file;
  if (file) {
    return {
      layer_count: file.layerCount ?? status.layersCount ?? 0,
      used_material: file.usedMaterial ?? 0,
      print_time: file.printTime ?? 0,
      file_data: {
        name: file.name || file.path,
        path: file.path || file.name,
        location_category: 'Local',
      },
    };
  }
  // Job without file metadata yet: report a bare print so it is not shown as "no job"
  if (status.printing || status.paused || status.layerId !== null || status.layersCount !== null) {
    return {
      layer_count: status.layersCount ?? 0,
      used_material: 0,
      print_time: 0,
      file_data: null,
    };
  }
  return null;
}

/**
 * Layer to report. A completed cancel reports no layer so the snapshot reads
 * as canceled; a finished job without a layer reports its last layer.
 */
function mappedLayer(status: NanoStatus, canonical: CanonicalTuple): number | null {
  if (canonical.status !== 'Idle') {
    return status.layerId;
  }
  if (canonical.cancelLatched) {
    return null;
  }
  if (canonical.finished && status.layerId === null) {
    return status.file ? status.file.layerCount ?? status.layersCount : status.layersCount;
  }
  return status.layerId;
}

export function nanoStatusToStatusMap(status: NanoStatus, canonical: CanonicalTuple): MappedNanoStatus {
  const mapped: MappedNanoStatus = {
    status: canonical.status,
    paused: canonical.paused,
    layer: mappedLayer(status, canonical),
    print_data: printDataFor(status),
    physical_state: { z: status.z ?? 0, curing: status.curing },
    cancel_latched: canonical.cancelLatched,
    pause_latched: canonical.pauseLatched,
    finished: canonical.finished,
  };
  if (status.statusMessage !== null) {
    mapped.device_status_message = status.statusMessage;
  }
  // Board temperatures pass through for the status engine
  if (status.temperature !== null) {
    mapped.temp = status.temperature;
  }
  if (status.mcuTemperature !== null) {
    mapped.mcu = status.mcuTemperature;
  }
  return mapped;
}
