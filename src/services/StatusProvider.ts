/**
 * @fileoverview Status reconciliation engine.
 *
 * Owns the connection to the printer backend and turns its payloads into one
 * canonical StatusModel plus the UI-facing flags around it:
 * - transport selection: a push stream when the backend has one, polling
 *   otherwise, with separate backoff budgets for each path
 * - optimistic pausing/canceling flags, cleared once the backend confirms
 * - the "awaiting new print" gate armed by resetStatus()
 * - lazy thumbnail acquisition with bounded retries for placeholders
 * - fingerprint-based change suppression for the `changed` event
 *
 * Poll results and stream events go through the same snapshot processing.
 * Transport errors never escape; they land in `error` and drive backoff.
 */

import type { BackendClient, RawStatus } from '../types/backend-client';
import { StatusModel, type DisplayLabel, type StatusJson } from '../types/status';
import { computeBackoff, type RandomSource } from '../utils/backoff';
import { EventEmitter } from '../utils/EventEmitter';
import { toAppError, type AppError } from '../utils/error.utils';
import { createLogger } from '../utils/logging';
import { isPlausibleLayerSeconds, layerDurationToSeconds } from '../utils/time.utils';
import { firstPresent, toFloat, toStr } from '../utils/value-parsers';
import { ThumbnailService } from './ThumbnailService';

export const STATUS_PROVIDER_TIMING = {
  minPollIntervalSeconds: 2,
  maxPollIntervalSeconds: 60,
  /** Poll backoff cap until the first successful status */
  initialMaxBackoffSeconds: 5,
  sseReconnectBaseSeconds: 3,
  /** Consecutive poll errors at which stream attempts are skipped */
  ssePollErrorThreshold: 3,
  maxReconnectAttempts: 20,
  awaitingTimeoutMs: 12_000,
  minSpinnerMs: 2_000,
  maxThumbnailRetries: 3,
  streamRetryAfterRecoveryMs: 250,
  /** A stream subscription that has not opened by then is abandoned */
  streamOpenTimeoutMs: 15_000,
} as const;

export type TransportState = 'uninitialized' | 'polling' | 'streaming' | 'backing-off';

export type PollPhase = 'idle' | 'fetching' | 'backing-off';

const DEVICE_MESSAGE_KEYS = ['device_status_message', 'Status', 'status'] as const;
const RESIN_TEMPERATURE_KEYS = ['resin', 'Resin', 'resin_temperature', 'ResinTemperature'] as const;
const CPU_TEMPERATURE_KEYS = ['temp', 'Temp', 'cpu_temp'] as const;
const PREV_LAYER_TIME_KEYS = ['PrevLayerTime', 'prev_layer_seconds'] as const;

export type StatusProviderClient = Pick<
  BackendClient,
  'pushCapable' | 'getStatus' | 'getStatusStream' | 'pausePrint' | 'resumePrint' | 'cancelPrint' | 'getFileThumbnail'
>;

/** Latest-value lookup into analytics series */
export interface AnalyticsSource {
  getLatest(key: string): number | null;
}

export type ThumbnailSource = Pick<ThumbnailService, 'getThumbnail'>;

export interface StatusProviderOptions {
  /** Skip stream attempts entirely. Defaults to `!client.pushCapable` */
  pollingOnly?: boolean;
  analytics?: AnalyticsSource | null;
  thumbnails?: ThumbnailSource;
  random?: RandomSource;
  now?: () => number;
}

/** JSON view of the engine, published with every `changed` event */
export interface StatusProviderSnapshot {
  status: StatusJson | null;
  displayStatus: DisplayLabel;
  progress: number;
  error: string | null;
  errorCode: string | null;
  isLoading: boolean;
  consecutiveErrors: number;
  pollAttemptCount: number;
  sseAttemptCount: number;
  nextRetryAt: number | null;
  transportState: TransportState;
  pollPhase: PollPhase;
  sseSupported: boolean | null;
  hasEverConnected: boolean;
  initialAttemptInProgress: boolean;
  isPausing: boolean;
  isCanceling: boolean;
  awaitingNewPrint: boolean;
  newPrintReady: boolean;
  minSpinnerActive: boolean;
  thumbnailReady: boolean;
  hasThumbnail: boolean;
  deviceStatusMessage: string | null;
  resinTemperature: number | null;
  cpuTemperature: number | null;
  mcuTemperature: number | null;
  uvTemperature: number | null;
  lastLayerSeconds: number | null;
  currentLayerSeconds: number | null;
}

interface StatusProviderEventMap extends Record<string, unknown[]> {
  changed: [StatusProviderSnapshot];
}

interface ObservedState {
  error: AppError | null;
  consecutiveErrors: number;
  loading: boolean;
  sseSupported: boolean | null;
  isPausing: boolean;
  isCanceling: boolean;
  fingerprint: string;
  statusJson: string;
}

/**
 * Fields that move during an active print. Rounding z keeps float noise out.
 */
export function statusFingerprint(status: StatusModel | null): string {
  if (!status) {
    return '';
  }
  const layer = status.layer === null ? '' : String(status.layer);
  const total = status.printData ? String(status.printData.layerCount) : '';
  return `${status.status}|${status.isPaused ? '1' : '0'}|${layer}|${total}|${status.physicalState.z.toFixed(3)}`;
}

/**
 * Temperature from a number or a string such as `"23.5 °C"`.
 */
export function parseTemperature(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const cleaned = value.trim().toLowerCase().replace(/°/g, '').replace(/c/g, '').replace(/[^0-9+\-.e]/g, '');
  if (cleaned.length === 0) {
    return null;
  }
  const parsed = Number.parseFloat(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

function formatElapsed(millis: number): string {
  return millis >= 1000 ? `${(millis / 1000).toFixed(1)}s` : `${millis}ms`;
}

function subdirectoryOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index >= 0 ? path.slice(0, index) : '';
}

export class StatusProvider extends EventEmitter<StatusProviderEventMap> {
  private readonly log = createLogger('StatusProvider');
  private readonly client: StatusProviderClient;
  private readonly thumbnails: ThumbnailSource;
  private readonly pollingOnly: boolean;
  private readonly random: RandomSource;
  private readonly now: () => number;
  private analytics: AnalyticsSource | null;

  // Snapshot state
  private currentStatus: StatusModel | null = null;
  private errorState: AppError | null = null;
  private loading = true;
  private deviceMessage: string | null = null;
  private resinTemp: number | null = null;
  private cpuTemp: number | null = null;
  private mcuTempRaw: number | null = null;
  private prevLayerSeconds: number | null = null;
  private liveLayerSeconds: number | null = null;
  private lastObservedLayer: number | null = null;
  private lastObservedLayerAt: number | null = null;

  // Transitional flags and gates
  private pausing = false;
  private canceling = false;
  private awaiting = false;
  private awaitingSince: number | null = null;
  private minSpinnerUntil: number | null = null;

  // Thumbnail
  private thumbnailBytes: Buffer | null = null;
  private thumbnailIsPlaceholder = false;
  private thumbnailIsReady = false;
  private readonly thumbnailRetries = new Map<string, number>();

  // Polling
  private polling = false;
  private pollIntervalSeconds: number = STATUS_PROVIDER_TIMING.minPollIntervalSeconds;
  private fetchInFlight = false;
  private consecutiveErrorCount = 0;
  private nextPollRetryAt: number | null = null;
  private everHadSuccessfulStatus = false;
  private initialAttempt = true;
  private phase: PollPhase = 'idle';

  // Stream
  private streamController: AbortController | null = null;
  private streamConnected = false;
  private sseSupportedState: boolean | null = null;
  private sseEverConnected = false;
  private sseConsecutiveErrors = 0;
  private nextSseRetryAt: number | null = null;

  private transport: TransportState = 'uninitialized';
  private started = false;
  private disposed = false;

  // Timers
  private pollTimer: NodeJS.Timeout | null = null;
  private backoffTimer: NodeJS.Timeout | null = null;
  private sseRetryTimer: NodeJS.Timeout | null = null;
  private streamRecoveryTimer: NodeJS.Timeout | null = null;
  private awaitingTimer: NodeJS.Timeout | null = null;
  private spinnerTimer: NodeJS.Timeout | null = null;

  constructor(client: StatusProviderClient, options: StatusProviderOptions = {}) {
    super();
    this.client = client;
    this.pollingOnly = options.pollingOnly ?? !client.pushCapable;
    this.analytics = options.analytics ?? null;
    this.thumbnails = options.thumbnails ?? new ThumbnailService(client);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  // ============================================================================
  // GETTERS
  // ============================================================================

  get status(): StatusModel | null {
    return this.currentStatus;
  }

  get error(): AppError | null {
    return this.errorState;
  }

  get isLoading(): boolean {
    return this.loading;
  }

  get consecutiveErrors(): number {
    return this.consecutiveErrorCount;
  }

  get pollAttemptCount(): number {
    return this.consecutiveErrorCount;
  }

  get sseAttemptCount(): number {
    return this.sseConsecutiveErrors;
  }

  /** Earliest scheduled retry of either transport, epoch ms */
  get nextRetryAt(): number | null {
    if (this.nextPollRetryAt === null) return this.nextSseRetryAt;
    if (this.nextSseRetryAt === null) return this.nextPollRetryAt;
    return Math.min(this.nextPollRetryAt, this.nextSseRetryAt);
  }

  /** null until a stream attempt has decided it either way */
  get sseSupported(): boolean | null {
    return this.sseSupportedState;
  }

  get hasEverConnected(): boolean {
    return this.everHadSuccessfulStatus;
  }

  get initialAttemptInProgress(): boolean {
    return this.initialAttempt;
  }

  get isPausing(): boolean {
    return this.pausing;
  }

  get isCanceling(): boolean {
    return this.canceling;
  }

  get awaitingNewPrint(): boolean {
    return this.awaiting;
  }

  /**
   * An active job with file metadata whose thumbnail attempt has finished.
   */
  get newPrintReady(): boolean {
    const status = this.currentStatus;
    if (!status) {
      return false;
    }
    const active = status.isPrinting || status.isPaused;
    return active && status.printData?.fileData != null && this.thumbnailIsReady;
  }

  get minSpinnerActive(): boolean {
    return this.minSpinnerUntil !== null && this.now() < this.minSpinnerUntil;
  }

  get thumbnail(): Buffer | null {
    return this.thumbnailBytes;
  }

  get thumbnailReady(): boolean {
    return this.thumbnailIsReady;
  }

  get deviceStatusMessage(): string | null {
    return this.deviceMessage;
  }

  get resinTemperature(): number | null {
    return this.resinTemp === null ? null : Math.round(this.resinTemp);
  }

  get cpuTemperature(): number | null {
    return this.cpuTemp;
  }

  get mcuTemperature(): number | null {
    return this.analytics?.getLatest('TemperatureMCU') ?? this.mcuTempRaw;
  }

  get uvTemperature(): number | null {
    return this.analytics?.getLatest('TemperatureOutside') ?? null;
  }

  get lastLayerSeconds(): number | null {
    return this.prevLayerSeconds;
  }

  get currentLayerSeconds(): number | null {
    return this.liveLayerSeconds;
  }

  get displayStatus(): DisplayLabel {
    return this.currentStatus?.displayLabel(this.canceling, this.pausing) ?? 'Unknown';
  }

  get progress(): number {
    return this.currentStatus?.progress ?? 0;
  }

  get transportState(): TransportState {
    return this.transport;
  }

  get pollPhase(): PollPhase {
    return this.phase;
  }

  setAnalytics(analytics: AnalyticsSource | null): void {
    this.analytics = analytics;
  }

  getSnapshot(): StatusProviderSnapshot {
    return {
      status: this.currentStatus?.toJSON() ?? null,
      displayStatus: this.displayStatus,
      progress: this.progress,
      error: this.errorState?.message ?? null,
      errorCode: this.errorState?.code ?? null,
      isLoading: this.loading,
      consecutiveErrors: this.consecutiveErrorCount,
      pollAttemptCount: this.pollAttemptCount,
      sseAttemptCount: this.sseAttemptCount,
      nextRetryAt: this.nextRetryAt,
      transportState: this.transport,
      pollPhase: this.phase,
      sseSupported: this.sseSupportedState,
      hasEverConnected: this.everHadSuccessfulStatus,
      initialAttemptInProgress: this.initialAttempt,
      isPausing: this.pausing,
      isCanceling: this.canceling,
      awaitingNewPrint: this.awaiting,
      newPrintReady: this.newPrintReady,
      minSpinnerActive: this.minSpinnerActive,
      thumbnailReady: this.thumbnailIsReady,
      hasThumbnail: this.thumbnailBytes !== null,
      deviceStatusMessage: this.deviceMessage,
      resinTemperature: this.resinTemperature,
      cpuTemperature: this.cpuTemp,
      mcuTemperature: this.mcuTemperature,
      uvTemperature: this.uvTemperature,
      lastLayerSeconds: this.prevLayerSeconds,
      currentLayerSeconds: this.liveLayerSeconds,
    };
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Begin watching the backend: stream first when possible, else polling.
   */
  start(): void {
    if (this.started || this.disposed) {
      return;
    }
    this.started = true;
    this.tryStartStream();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.polling = false;
    this.clearTimers();
    this.closeStream();
    this.removeAllListeners();
  }

  /**
   * Suspend both transports, e.g. while the backend restarts on purpose.
   */
  pausePolling(): void {
    this.polling = false;
    this.clearTimer('pollTimer');
    this.clearTimer('backoffTimer');
    this.clearTimer('sseRetryTimer');
    this.clearTimer('streamRecoveryTimer');
    this.nextPollRetryAt = null;
    this.nextSseRetryAt = null;
    this.closeStream();
    this.transport = 'uninitialized';
    this.phase = 'idle';
    this.errorState = null;
    this.emitChanged();
  }

  /**
   * Restart the transport stopped by pausePolling(): the stream where the
   * backend supports it, polling otherwise.
   */
  resumePolling(): void {
    if (this.polling || this.streamController || this.disposed) {
      return;
    }
    this.tryStartStream();
  }

  clearError(): void {
    this.errorState = null;
    this.emitChanged();
  }

  // ============================================================================
  // POLLING
  // ============================================================================

  private startPolling(): void {
    if (this.polling || this.streamController || this.disposed) {
      return;
    }
    this.polling = true;
    this.transport = 'polling';
    void this.pollOnce();
  }

  private stopPolling(): void {
    this.polling = false;
    this.clearTimer('pollTimer');
  }

  private async pollOnce(): Promise<void> {
    this.pollTimer = null;
    if (!this.polling || this.streamController || this.disposed) {
      return;
    }
    await this.refresh();
    if (!this.polling || this.streamController || this.disposed) {
      return;
    }
    this.pollTimer = setTimeout(() => {
      void this.pollOnce();
    }, this.pollIntervalSeconds * 1000);
  }

  /**
   * Fetch one status snapshot. Skipped while another fetch is in flight, and
   * while a poll backoff is armed unless `force` is set. Never throws.
   */
  async refresh(force = false): Promise<void> {
    if (this.fetchInFlight || this.disposed) {
      return;
    }
    if (!force && this.backoffTimer) {
      this.log.verbose(`Skipping refresh during backoff (next retry at ${this.nextPollRetryAt})`);
      return;
    }

    this.fetchInFlight = true;
    this.phase = 'fetching';
    const before = this.observe();
    const startedAt = this.now();
    try {
      const raw = await this.client.getStatus();
      if (this.disposed) {
        return;
      }
      await this.applySnapshot(raw);
      this.pollIntervalSeconds = STATUS_PROVIDER_TIMING.minPollIntervalSeconds;
      const wasErroring = this.consecutiveErrorCount > 0;
      this.consecutiveErrorCount = 0;
      if (wasErroring) {
        this.log.verbose('Status refresh succeeded; consecutive error counter reset');
        this.scheduleStreamAfterRecovery();
      }
    } catch (error) {
      this.handlePollFailure(error, startedAt);
    } finally {
      this.fetchInFlight = false;
      this.initialAttempt = false;
      if (this.phase === 'fetching') {
        this.phase = 'idle';
      }
      if (!this.disposed) {
        this.notifyIfChanged(before);
      }
    }
  }

  private handlePollFailure(error: unknown, startedAt: number): void {
    const appError = toAppError(error);
    this.log.error(`Status refresh failed: ${appError.message}`);
    this.errorState = appError;
    this.loading = false;
    this.consecutiveErrorCount = Math.min(this.consecutiveErrorCount + 1, STATUS_PROVIDER_TIMING.maxReconnectAttempts);

    const maxBackoff = this.everHadSuccessfulStatus
      ? STATUS_PROVIDER_TIMING.maxPollIntervalSeconds
      : STATUS_PROVIDER_TIMING.initialMaxBackoffSeconds;
    const backoff = computeBackoff(
      this.consecutiveErrorCount,
      STATUS_PROVIDER_TIMING.minPollIntervalSeconds,
      maxBackoff,
      this.random
    );
    this.pollIntervalSeconds = backoff;
    this.nextPollRetryAt = this.now() + backoff * 1000;

    // One timer governs the next attempt; the loop stops until it fires
    this.clearTimer('backoffTimer');
    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = null;
      this.nextPollRetryAt = null;
      this.phase = 'idle';
      this.log.verbose('Backoff expired; restarting polling');
      if (!this.streamController && !this.disposed) {
        this.startPolling();
      }
    }, backoff * 1000);
    this.stopPolling();
    this.phase = 'backing-off';
    if (!this.streamController) {
      this.transport = 'backing-off';
    }

    this.log.warn(
      `Status refresh failed after ${formatElapsed(this.now() - startedAt)}; backing off polling for ${backoff}s` +
        ` (attempt ${this.consecutiveErrorCount})`
    );
  }

  // ============================================================================
  // STREAMING
  // ============================================================================

  private tryStartStream(): void {
    if (this.streamController || this.disposed) {
      return;
    }
    if (this.pollingOnly) {
      this.log.info('Backend is polling-only; using polling');
      this.startPolling();
      return;
    }
    if (this.sseSupportedState === false) {
      this.log.info('Status stream previously found unsupported; using polling');
      this.startPolling();
      return;
    }
    if (this.consecutiveErrorCount >= STATUS_PROVIDER_TIMING.ssePollErrorThreshold) {
      this.log.info(`Skipping stream attempt: polling has ${this.consecutiveErrorCount} consecutive errors`);
      this.startPolling();
      return;
    }

    const controller = new AbortController();
    this.streamController = controller;
    this.stopPolling();
    this.transport = 'streaming';
    this.log.info('Attempting status stream subscription');
    void this.consumeStream(controller);
  }

  private async consumeStream(controller: AbortController): Promise<void> {
    let opened = false;
    let failure: unknown = null;
    const openTimer = setTimeout(() => {
      if (!opened) {
        this.log.warn('Status stream did not open; abandoning it');
        controller.abort();
      }
    }, STATUS_PROVIDER_TIMING.streamOpenTimeoutMs);

    const markOpen = (): void => {
      if (opened || controller.signal.aborted || this.streamController !== controller || this.disposed) {
        return;
      }
      opened = true;
      clearTimeout(openTimer);
      this.onStreamConnected();
    };

    try {
      for await (const raw of this.client.getStatusStream(controller.signal, markOpen)) {
        if (this.disposed || controller.signal.aborted) {
          break;
        }
        // Clients that never signal the open count as open on their first event
        markOpen();
        await this.processStreamEvent(raw);
      }
    } catch (error) {
      failure = error;
    } finally {
      clearTimeout(openTimer);
    }

    // Closed on purpose by pausePolling() or dispose()
    if (this.streamController !== controller || this.disposed) {
      return;
    }
    this.streamController = null;
    this.streamConnected = false;
    this.handleStreamEnded(failure);
  }

  private onStreamConnected(): void {
    this.streamConnected = true;
    this.sseEverConnected = true;
    this.sseSupportedState = true;
    this.sseConsecutiveErrors = 0;
    this.transport = 'streaming';
    this.log.info('Status stream connected');
  }

  private async processStreamEvent(raw: RawStatus): Promise<void> {
    const before = this.observe();
    await this.applySnapshot(raw);
    this.consecutiveErrorCount = 0;
    this.pollIntervalSeconds = STATUS_PROVIDER_TIMING.minPollIntervalSeconds;
    this.initialAttempt = false;
    this.notifyIfChanged(before);
  }

  private handleStreamEnded(failure: unknown): void {
    if (failure !== null) {
      this.log.warn(`Status stream error, falling back to polling: ${toAppError(failure).message}`);
    } else {
      this.log.info('Status stream closed; falling back to polling');
    }
    const before = this.observe();
    this.startPolling();

    if (this.sseEverConnected) {
      this.sseConsecutiveErrors = Math.min(this.sseConsecutiveErrors + 1, STATUS_PROVIDER_TIMING.maxReconnectAttempts);
      const delaySeconds = computeBackoff(
        this.sseConsecutiveErrors,
        STATUS_PROVIDER_TIMING.sseReconnectBaseSeconds,
        STATUS_PROVIDER_TIMING.maxPollIntervalSeconds,
        this.random
      );
      this.log.warn(`Scheduling stream reconnect in ${delaySeconds}s (attempt ${this.sseConsecutiveErrors})`);
      this.nextSseRetryAt = this.now() + delaySeconds * 1000;
      this.clearTimer('sseRetryTimer');
      this.sseRetryTimer = setTimeout(() => {
        this.sseRetryTimer = null;
        this.nextSseRetryAt = null;
        if (!this.streamController && !this.disposed) {
          this.tryStartStream();
        }
      }, delaySeconds * 1000);
    } else if (this.consecutiveErrorCount < STATUS_PROVIDER_TIMING.ssePollErrorThreshold) {
      this.sseSupportedState = false;
      this.log.info('Status stream appears unsupported (failed while polling healthy); disabling stream attempts');
    } else {
      this.log.info('Status stream failed while polls unhealthy; will retry after poll recovery');
    }
    this.notifyIfChanged(before);
  }

  /** Retry the stream shortly after polling recovers from errors */
  private scheduleStreamAfterRecovery(): void {
    if (this.pollingOnly || this.streamController || this.disposed || this.sseSupportedState === false) {
      return;
    }
    this.clearTimer('streamRecoveryTimer');
    this.streamRecoveryTimer = setTimeout(() => {
      this.streamRecoveryTimer = null;
      if (!this.streamController && !this.disposed) {
        this.tryStartStream();
      }
    }, STATUS_PROVIDER_TIMING.streamRetryAfterRecoveryMs);
  }

  private closeStream(): void {
    const controller = this.streamController;
    this.streamController = null;
    this.streamConnected = false;
    controller?.abort();
  }

  // ============================================================================
  // SNAPSHOT PROCESSING
  // ============================================================================

  private async applySnapshot(raw: RawStatus): Promise<void> {
    this.deviceMessage = toStr(firstPresent(raw, DEVICE_MESSAGE_KEYS));
    this.resinTemp = parseTemperature(firstPresent(raw, RESIN_TEMPERATURE_KEYS));
    this.cpuTemp = parseTemperature(firstPresent(raw, CPU_TEMPERATURE_KEYS));
    this.mcuTempRaw = parseTemperature(raw.mcu);

    const parsed = StatusModel.fromJson(raw);
    this.updateLayerTiming(parsed, raw);

    if (parsed.isPrinting && this.thumbnailBytes === null && !this.thumbnailIsReady) {
      const fileData = parsed.printData?.fileData;
      if (fileData) {
        await this.fetchThumbnail(fileData.locationCategory ?? 'Local', fileData.path, fileData.name);
      }
    }

    this.currentStatus = parsed;
    this.errorState = null;
    this.loading = false;
    this.everHadSuccessfulStatus = true;

    this.updateAwaitingGate(parsed);
    this.updateTransitionalFlags(parsed);
  }

  private updateLayerTiming(parsed: StatusModel, raw: RawStatus): void {
    const now = this.now();
    const observedLayer = parsed.layer;
    if (observedLayer !== null) {
      if (this.lastObservedLayer === null) {
        this.lastObservedLayer = observedLayer;
        this.lastObservedLayerAt = now;
      } else if (observedLayer !== this.lastObservedLayer) {
        // A lower layer means a new job; only re-seed the timestamp
        if (observedLayer > this.lastObservedLayer) {
          const seconds = (now - (this.lastObservedLayerAt ?? now)) / 1000;
          if (isPlausibleLayerSeconds(seconds)) {
            this.prevLayerSeconds = seconds;
            this.log.verbose(`Layer time from layer change: ${seconds}s`);
          }
        }
        this.lastObservedLayer = observedLayer;
        this.lastObservedLayerAt = now;
      }
    }

    // A reported duration wins over the observed one; absence keeps the last value
    const reported = toFloat(firstPresent(raw, PREV_LAYER_TIME_KEYS));
    if (reported !== null) {
      this.prevLayerSeconds = layerDurationToSeconds(reported);
    }

    if (parsed.isPrinting && this.analytics) {
      const live = this.analytics.getLatest('LayerTime');
      if (live !== null) {
        this.liveLayerSeconds = live;
        this.prevLayerSeconds = live;
      }
    } else {
      this.liveLayerSeconds = null;
    }
  }

  private updateAwaitingGate(parsed: StatusModel): void {
    if (!this.awaiting) {
      return;
    }
    const timedOut =
      this.awaitingSince !== null && this.now() - this.awaitingSince > STATUS_PROVIDER_TIMING.awaitingTimeoutMs;
    if (
      this.newPrintReady ||
      parsed.isPrinting ||
      parsed.isPaused ||
      (parsed.isIdle && parsed.layer !== null) ||
      parsed.hasCanceledJob ||
      timedOut
    ) {
      this.clearAwaiting();
    }
  }

  private updateTransitionalFlags(parsed: StatusModel): void {
    const cancelLatched = parsed.cancelLatched === true;
    if (parsed.status === 'Canceling' || (cancelLatched && parsed.status !== 'Idle')) {
      this.canceling = true;
    } else if (this.canceling && (parsed.isCanceled || parsed.finished === true || parsed.status === 'Idle')) {
      this.canceling = false;
    }

    if (parsed.pauseLatched === true || parsed.status === 'Pausing') {
      this.pausing = true;
    } else if (this.pausing && parsed.isPaused) {
      this.pausing = false;
    }
  }

  /**
   * Resolve the job thumbnail. Placeholders are retried a bounded number of
   * times per path before being accepted.
   */
  private async fetchThumbnail(location: string, path: string, fileName: string): Promise<void> {
    const subdirectory = subdirectoryOf(path);
    const fileRef = { path, lastModified: 0 };
    try {
      const result = await this.thumbnails.getThumbnail(location, subdirectory, fileName, fileRef, 'Large');
      if (!result.placeholder) {
        this.setThumbnail(result.bytes, false);
        return;
      }
      if (this.thumbnailBytes !== null && !this.thumbnailIsPlaceholder) {
        this.thumbnailIsReady = true;
        return;
      }

      const tried = this.thumbnailRetries.get(path) ?? 0;
      if (tried < STATUS_PROVIDER_TIMING.maxThumbnailRetries) {
        this.thumbnailRetries.set(path, tried + 1);
        const fresh = await this.thumbnails.getThumbnail(location, subdirectory, fileName, fileRef, 'Large', true);
        if (!fresh.placeholder) {
          this.setThumbnail(fresh.bytes, false);
        }
        // Still a placeholder: try again on a later snapshot
        return;
      }

      if (this.thumbnailBytes === null || this.thumbnailIsPlaceholder) {
        this.setThumbnail(result.bytes, true);
      }
      this.thumbnailIsReady = true;
    } catch (error) {
      this.log.warn(`Thumbnail fetch failed: ${toAppError(error).message}`);
      this.thumbnailBytes = null;
      this.thumbnailIsReady = true;
    }
  }

  private setThumbnail(bytes: Buffer, placeholder: boolean): void {
    this.thumbnailBytes = bytes;
    this.thumbnailIsPlaceholder = placeholder;
    this.thumbnailIsReady = true;
  }

  // ============================================================================
  // ACTIONS
  // ============================================================================

  /**
   * Pause a running print or resume a paused one. A call while a pause or
   * resume is already in flight does nothing.
   */
  async pauseOrResume(): Promise<void> {
    const status = this.currentStatus;
    if (!status || this.pausing) {
      return;
    }
    this.pausing = true;
    this.emitChanged();

    if (status.isPaused) {
      try {
        await this.client.resumePrint();
        this.pausing = false;
        this.emitChanged();
      } catch (error) {
        this.log.error(`Resume failed: ${toAppError(error).message}`);
        this.pausing = false;
      } finally {
        await this.refresh();
      }
      return;
    }

    try {
      await this.client.pausePrint();
    } catch (error) {
      this.log.error(`Pause failed: ${toAppError(error).message}`);
      this.pausing = false;
    } finally {
      await this.refresh();
    }
  }

  /**
   * Request cancellation. The canceling flag stays up, even on failure,
   * until a snapshot confirms the job is gone.
   */
  async cancel(): Promise<void> {
    if (this.canceling) {
      return;
    }
    this.canceling = true;
    this.emitChanged();
    try {
      await this.client.cancelPrint();
    } catch (error) {
      this.log.error(`Cancel failed: ${toAppError(error).message}`);
    } finally {
      await this.refresh();
    }
  }

  /**
   * Clear the current status before a new print so observers show a
   * loading state instead of the previous job. A cached thumbnail, when
   * given, is shown right away.
   */
  resetStatus(cachedThumbnail?: Buffer): void {
    this.log.verbose('resetStatus: purging status and thumbnails');
    this.currentStatus = null;
    this.thumbnailBytes = cachedThumbnail ?? null;
    this.thumbnailIsPlaceholder = false;
    this.thumbnailIsReady = cachedThumbnail !== undefined;
    this.thumbnailRetries.clear();
    this.errorState = null;
    this.loading = true;
    this.canceling = false;
    this.pausing = false;
    this.prevLayerSeconds = null;
    this.liveLayerSeconds = null;
    this.lastObservedLayer = null;
    this.lastObservedLayerAt = null;

    this.awaiting = true;
    this.awaitingSince = this.now();
    this.clearTimer('awaitingTimer');
    this.awaitingTimer = setTimeout(() => {
      this.awaitingTimer = null;
      if (this.awaiting) {
        this.log.verbose('Awaiting new print timed out');
        this.clearAwaiting();
        this.emitChanged();
      }
    }, STATUS_PROVIDER_TIMING.awaitingTimeoutMs);

    this.minSpinnerUntil = this.now() + STATUS_PROVIDER_TIMING.minSpinnerMs;
    this.clearTimer('spinnerTimer');
    this.spinnerTimer = setTimeout(() => {
      this.spinnerTimer = null;
      this.minSpinnerUntil = null;
      this.emitChanged();
    }, STATUS_PROVIDER_TIMING.minSpinnerMs);

    this.emitChanged();
    queueMicrotask(() => {
      void this.refresh();
    });
  }

  // ============================================================================
  // NOTIFICATION
  // ============================================================================

  private clearAwaiting(): void {
    this.awaiting = false;
    this.awaitingSince = null;
    this.clearTimer('awaitingTimer');
  }

  private observe(): ObservedState {
    return {
      error: this.errorState,
      consecutiveErrors: this.consecutiveErrorCount,
      loading: this.loading,
      sseSupported: this.sseSupportedState,
      isPausing: this.pausing,
      isCanceling: this.canceling,
      fingerprint: statusFingerprint(this.currentStatus),
      statusJson: JSON.stringify(this.currentStatus?.toJSON() ?? null),
    };
  }

  private notifyIfChanged(before: ObservedState): void {
    const after = this.observe();
    const status = this.currentStatus;
    const shouldNotify =
      before.error !== after.error ||
      before.consecutiveErrors !== after.consecutiveErrors ||
      before.loading !== after.loading ||
      before.sseSupported !== after.sseSupported ||
      before.isPausing !== after.isPausing ||
      before.isCanceling !== after.isCanceling ||
      before.fingerprint !== after.fingerprint ||
      before.statusJson !== after.statusJson ||
      status?.isPrinting === true ||
      status?.isPaused === true;
    if (shouldNotify) {
      this.emitChanged();
    }
  }

  private emitChanged(): void {
    if (!this.disposed) {
      this.emit('changed', this.getSnapshot());
    }
  }

  private clearTimer(
    name: 'pollTimer' | 'backoffTimer' | 'sseRetryTimer' | 'streamRecoveryTimer' | 'awaitingTimer' | 'spinnerTimer'
  ): void {
    const timer = this[name];
    if (timer) {
      clearTimeout(timer);
      this[name] = null;
    }
  }

  private clearTimers(): void {
    this.clearTimer('pollTimer');
    this.clearTimer('backoffTimer');
    this.clearTimer('sseRetryTimer');
    this.clearTimer('streamRecoveryTimer');
    this.clearTimer('awaitingTimer');
    this.clearTimer('spinnerTimer');
  }
}
