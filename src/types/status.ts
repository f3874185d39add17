/**
 * @fileoverview Canonical printer status model.
 *
 * Both backends end up in the same wire shape (snake_case JSON, the shape
 * the Odyssey service emits natively). `StatusModel` is built fresh from
 * each payload and frozen; derived getters interpret it for display.
 */

import { formatHms } from '../utils/time.utils';
import { clamp, isRecord, toBool, toFloat, toInt, toStr, type JsonRecord } from '../utils/value-parsers';

export type PrinterStatus = 'Idle' | 'Printing' | 'Paused' | 'Pausing' | 'Canceling' | 'Unknown';

export type DisplayLabel = PrinterStatus | 'Canceled' | 'Finished' | 'Curing' | (string & {});

export interface FileDataJson {
  name: string;
  path: string;
  location_category?: string | null;
}

export interface PrintDataJson {
  layer_count: number;
  used_material: number;
  print_time: number;
  file_data: FileDataJson | null;
}

export interface PhysicalStateJson {
  z: number;
  curing: boolean;
}

export interface StatusJson {
  status: string;
  paused: boolean | null;
  layer: number | null;
  print_data: PrintDataJson | null;
  physical_state: PhysicalStateJson;
  cancel_latched?: boolean;
  pause_latched?: boolean;
  finished?: boolean;
  device_status_message?: string;
}

export interface FileData {
  readonly name: string;
  readonly path: string;
  readonly locationCategory: string | null;
}

export interface PrintData {
  readonly layerCount: number;
  readonly usedMaterial: number;
  readonly printTime: number;
  readonly fileData: FileData | null;
}

export interface PhysicalState {
  readonly z: number;
  readonly curing: boolean;
}

function parseFileData(value: unknown): FileData | null {
  if (!isRecord(value)) {
    return null;
  }
  return {
    name: toStr(value.name) ?? '',
    path: toStr(value.path) ?? '',
    locationCategory: toStr(value.location_category),
  };
}

function parsePrintData(value: unknown): PrintData | null {
  if (!isRecord(value)) {
    return null;
  }
  return {
    layerCount: toInt(value.layer_count) ?? 0,
    usedMaterial: toFloat(value.used_material) ?? 0,
    printTime: toFloat(value.print_time) ?? 0,
    fileData: parseFileData(value.file_data),
  };
}

function parsePhysicalState(value: unknown): PhysicalState {
  const source: JsonRecord = isRecord(value) ? value : {};
  return {
    z: toFloat(source.z) ?? 0,
    curing: source.curing === true,
  };
}

export class StatusModel {
  readonly status: string;
  readonly paused: boolean | null;
  readonly layer: number | null;
  readonly cancelLatched: boolean | null;
  readonly pauseLatched: boolean | null;
  readonly finished: boolean | null;
  readonly printData: PrintData | null;
  readonly physicalState: PhysicalState;
  readonly deviceStatusMessage: string | null;

  private constructor(source: JsonRecord) {
    this.status = toStr(source.status) ?? 'Unknown';
    this.paused = toBool(source.paused);
    this.layer = toInt(source.layer);
    this.cancelLatched = toBool(source.cancel_latched);
    this.pauseLatched = toBool(source.pause_latched);
    this.finished = toBool(source.finished);
    this.printData = parsePrintData(source.print_data);
    this.physicalState = parsePhysicalState(source.physical_state);
    this.deviceStatusMessage = toStr(source.device_status_message);
    Object.freeze(this);
  }

  static fromJson(source: JsonRecord): StatusModel {
    return new StatusModel(source);
  }

  get isPrinting(): boolean {
    return this.status === 'Printing' && !this.isCanceled;
  }

  get isIdle(): boolean {
    return this.status === 'Idle';
  }

  get isPaused(): boolean {
    return this.paused === true;
  }

  get isCanceled(): boolean {
    return this.layer === null && (this.printData !== null || this.status !== 'Printing');
  }

  get isCuring(): boolean {
    return this.physicalState.curing;
  }

  /**
   * A canceled snapshot that still refers to a job. Plain `isCanceled` also
   * holds for an idle printer that never printed.
   */
  get hasCanceledJob(): boolean {
    return this.isCanceled && (this.cancelLatched === true || this.printData !== null);
  }

  get layerCount(): number | null {
    return this.printData?.layerCount ?? null;
  }

  /** 0..1, zero when the layer or layer count is unknown */
  get progress(): number {
    if (this.layer === null) {
      return 0;
    }
    const total = this.printData?.layerCount ?? 0;
    if (total === 0) {
      return 0;
    }
    return clamp(this.layer, 0, total) / total;
  }

  get formattedElapsedPrintTime(): string {
    return formatHms(this.printData?.printTime ?? 0);
  }

  displayLabel(transitionalCancel: boolean, transitionalPause: boolean): DisplayLabel {
    if (transitionalCancel && !this.isCanceled) return 'Canceling';
    if (this.isCanceled) return 'Canceled';
    if (transitionalPause && !this.isPaused) return 'Pausing';
    if (this.isPaused) return 'Paused';
    if (this.isIdle && this.layer !== null) return 'Finished';
    if (this.isCuring) return 'Curing';
    return this.status;
  }

  toJSON(): StatusJson {
    const fileData = this.printData?.fileData ?? null;
    const json: StatusJson = {
      status: this.status,
      paused: this.paused,
      layer: this.layer,
      print_data: this.printData
        ? {
            layer_count: this.printData.layerCount,
            used_material: this.printData.usedMaterial,
            print_time: this.printData.printTime,
            file_data: fileData
              ? { name: fileData.name, path: fileData.path, location_category: fileData.locationCategory }
              : null,
          }
        : null,
      physical_state: { z: this.physicalState.z, curing: this.physicalState.curing },
    };
    if (this.cancelLatched !== null) json.cancel_latched = this.cancelLatched;
    if (this.pauseLatched !== null) json.pause_latched = this.pauseLatched;
    if (this.finished !== null) json.finished = this.finished;
    if (this.deviceStatusMessage !== null) json.device_status_message = this.deviceStatusMessage;
    return json;
  }
}
