/**
 * @fileoverview In-process simulated NanoDLP device for development without
 * a printer.
 *
 * A print advances one layer per tick (one second by default) through 200
 * layers. Control calls go through the same canonicalization as the HTTP
 * client: start reports state 1 once before printing, cancel reports state 4
 * once before returning to idle, so the cancel latch behaves like real
 * hardware.
 */

import type {
  ActionResult,
  AnalyticsRecord,
  BackendClient,
  FileListing,
  RawStatus,
  ThumbnailResult,
  ThumbnailSize,
} from '../../types/backend-client';
import { EventEmitter } from '../../utils/EventEmitter';
import { createLogger } from '../../utils/logging';
import { placeholderForSize } from '../../services/ThumbnailPlaceholder';
import type { JsonRecord } from '../../utils/value-parsers';
import { parseNanoStatus } from './nano-status';
import { nanoStatusToStatusMap } from './nanodlp-mappers';
import { NanoDlpStateHandler, STATE_CODE } from './state-canonicalizer';

export const SIMULATED_TOTAL_LAYERS = 200;
export const SIMULATED_TICK_MS = 1_000;
const SIMULATED_FILE_COUNT = 5;

interface SimulatorEvents extends Record<string, unknown[]> {
  status: [RawStatus];
  closed: [];
}

type SimPhase = 'idle' | 'starting' | 'printing' | 'canceling';

export interface NanoDlpSimulatedClientOptions {
  tickMs?: number;
  totalLayers?: number;
  now?: () => number;
}

export class NanoDlpSimulatedClient implements BackendClient {
  readonly name = 'NanoDLP (simulated)';
  readonly pushCapable = true;

  private readonly log = createLogger('NanoDlpSimulatedClient');
  private readonly events = new EventEmitter<SimulatorEvents>();
  private readonly stateHandler = new NanoDlpStateHandler();
  private readonly totalLayers: number;
  private readonly now: () => number;
  private readonly tickTimer: NodeJS.Timeout;

  private phase: SimPhase = 'idle';
  private paused = false;
  private currentLayer = 0;
  private activeFile: string | null = null;
  /** Last job ran to its final layer */
  private completed = false;
  private disposed = false;

  constructor(options: NanoDlpSimulatedClientOptions = {}) {
    this.totalLayers = options.totalLayers ?? SIMULATED_TOTAL_LAYERS;
    this.now = options.now ?? Date.now;
    this.tickTimer = setInterval(() => this.tick(), options.tickMs ?? SIMULATED_TICK_MS);
    this.log.info('Simulated NanoDLP backend started');
  }

  /**
   * Advance the simulated job by one step and publish the status.
   */
  tick(): void {
    if (this.disposed) {
      return;
    }
    switch (this.phase) {
      case 'starting':
        this.phase = 'printing';
        break;
      case 'canceling':
        this.phase = 'idle';
        break;
      case 'printing':
        if (!this.paused) {
          this.currentLayer = Math.min(this.totalLayers, this.currentLayer + 1);
          if (this.currentLayer >= this.totalLayers) {
            this.log.info('Simulated print finished');
            this.phase = 'idle';
            this.completed = true;
          }
        }
        break;
      case 'idle':
        break;
    }
    this.publish();
  }

  private stateCode(): number {
    switch (this.phase) {
      case 'starting':
        return STATE_CODE.STARTING;
      case 'canceling':
        return STATE_CODE.CANCEL_REQUESTED;
      case 'printing':
        return this.paused ? STATE_CODE.PAUSED : STATE_CODE.PRINTING;
      case 'idle':
        return STATE_CODE.IDLE;
    }
  }

  private makeStatusJson(): JsonRecord {
    const active = this.phase !== 'idle';
    const hasJob = active || this.completed;
    const json: JsonRecord = {
      Printing: this.phase === 'printing' || this.phase === 'starting',
      Paused: this.paused,
      State: this.stateCode(),
      LayerID: hasJob ? this.currentLayer : null,
      LayersCount: hasJob ? this.totalLayers : null,
      Status: active ? 'Printing' : 'Idle',
      CurrentHeight: this.currentLayer * 50 * 64,
      temp: 24.5,
      mcu: 41.2,
    };
    if (hasJob && this.activeFile) {
      json.file = { name: this.activeFile, path: `/sim/${this.activeFile}`, layer_count: this.totalLayers };
    }
    return json;
  }

  private currentStatus(): RawStatus {
    const status = parseNanoStatus(this.makeStatusJson());
    return nanoStatusToStatusMap(status, this.stateHandler.canonicalize(status));
  }

  private publish(): void {
    this.events.emit('status', this.currentStatus());
  }

  async getStatus(): Promise<RawStatus> {
    return this.currentStatus();
  }

  async *getStatusStream(signal?: AbortSignal, onOpen?: () => void): AsyncIterable<RawStatus> {
    const queue: RawStatus[] = [];
    let wake: (() => void) | null = null;
    const onStatus = (status: RawStatus): void => {
      queue.push(status);
      wake?.();
    };
    const onStop = (): void => wake?.();

    this.events.on('status', onStatus);
    this.events.on('closed', onStop);
    signal?.addEventListener('abort', onStop);
    onOpen?.();
    try {
      while (!this.disposed && !signal?.aborted) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      this.events.off('status', onStatus);
      this.events.off('closed', onStop);
      signal?.removeEventListener('abort', onStop);
    }
  }

  async listItems(_location: string, pageSize: number, pageIndex: number): Promise<FileListing> {
    const now = this.now();
    const files = Array.from({ length: SIMULATED_FILE_COUNT }, (_, index) => ({
      name: `sim_model_${index + 1}.stl`,
      path: `/sim/sim_model_${index + 1}.stl`,
      last_modified: now - index * 1000,
    }));
    return { files, dirs: [], page_index: pageIndex, page_size: pageSize };
  }

  async getFileMetadata(_location: string, filePath: string): Promise<Record<string, unknown>> {
    return {
      file_data: {
        path: filePath,
        name: filePath.split('/').pop() ?? filePath,
        last_modified: this.now(),
        parent_path: '/sim',
      },
    };
  }

  async getFileThumbnail(_location: string, _filePath: string, size: ThumbnailSize): Promise<ThumbnailResult> {
    return { bytes: await placeholderForSize(size), placeholder: true };
  }

  async deleteFile(): Promise<ActionResult> {
    return { deleted: true };
  }

  async usbAvailable(): Promise<boolean> {
    return false;
  }

  async getConfig(): Promise<Record<string, unknown>> {
    return {
      general: { hostname: 'sim-nanodlp' },
      advanced: { backend: 'nanodlp' },
    };
  }

  async startPrint(_location: string, filePath: string): Promise<ActionResult> {
    this.phase = 'starting';
    this.paused = false;
    this.completed = false;
    this.currentLayer = 0;
    this.activeFile = filePath.split('/').pop() ?? filePath;
    this.log.info(`Simulated print started: ${this.activeFile}`);
    this.publish();
    return { ok: true };
  }

  async cancelPrint(): Promise<ActionResult> {
    if (this.phase === 'idle') {
      return { ok: true };
    }
    this.phase = 'canceling';
    this.paused = false;
    this.completed = false;
    this.publish();
    return { ok: true };
  }

  async pausePrint(): Promise<ActionResult> {
    if (this.phase === 'printing' && !this.paused) {
      this.paused = true;
      this.publish();
    }
    return { ok: true };
  }

  async resumePrint(): Promise<ActionResult> {
    if (this.phase === 'printing' && this.paused) {
      this.paused = false;
      this.publish();
    }
    return { ok: true };
  }

  async canMoveToTop(): Promise<boolean> {
    return false;
  }

  async move(): Promise<ActionResult> {
    return { ok: true };
  }

  async moveDelta(): Promise<ActionResult> {
    return { ok: true };
  }

  async moveToTop(): Promise<ActionResult> {
    return { ok: true };
  }

  async manualHome(): Promise<ActionResult> {
    return { ok: true };
  }

  async manualCure(): Promise<ActionResult> {
    return { ok: true };
  }

  async manualCommand(): Promise<ActionResult> {
    return { ok: true };
  }

  async displayTest(): Promise<ActionResult> {
    return { ok: true };
  }

  async getAnalytics(): Promise<AnalyticsRecord[]> {
    return [];
  }

  async getAnalyticValue(): Promise<number | null> {
    return null;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    clearInterval(this.tickTimer);
    this.events.emit('closed');
    this.events.removeAllListeners();
  }
}
