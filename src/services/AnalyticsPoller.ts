/**
 * @fileoverview Rolling telemetry series sampled from the printer backend.
 *
 * Polling-only backends are sampled on two clocks: one latency-sensitive
 * metric (Pressure by default) is read through its scalar endpoint at
 * `fastHz`, and every `slowEvery`-th fast cycle a batched `getAnalytics`
 * call refreshes all other metrics. Push-capable backends are read from the
 * status stream instead, one sample per event, falling back to polling
 * `getStatus` when the stream ends.
 *
 * Each metric keeps a RingBuffer of `windowSeconds x frequency` points.
 * Failed cycles are skipped; gaps in a series are expected.
 */

import type { BackendClient, RawStatus } from '../types/backend-client';
import { ANALYTICS_METRICS, metricIdForKey, metricKeyForId } from '../printer-backends/nanodlp/analytics-metrics';
import { EventEmitter } from '../utils/EventEmitter';
import { toAppError } from '../utils/error.utils';
import { logInfo, logVerbose } from '../utils/logging';
import { RingBuffer } from '../utils/RingBuffer';
import { delay } from '../utils/time.utils';

const LOG_NAMESPACE = 'AnalyticsPoller';

export const DEFAULT_ANALYTICS_OPTIONS = {
  fastHz: 2,
  slowEvery: 10,
  windowSeconds: 60,
  fastMetricKey: 'Pressure',
  batchSize: 200,
} as const;

/** One sample: `id` is the device sample id or a local timestamp */
export interface AnalyticsPoint {
  id: number;
  v: number;
}

export type AnalyticsSnapshot = Record<string, AnalyticsPoint[]>;

export type AnalyticsMode = 'stopped' | 'polling' | 'streaming';

export type AnalyticsClient = Pick<
  BackendClient,
  'pushCapable' | 'getStatus' | 'getStatusStream' | 'getAnalytics' | 'getAnalyticValue'
>;

export interface AnalyticsPollerOptions {
  fastHz?: number;
  slowEvery?: number;
  windowSeconds?: number;
  fastMetricKey?: string;
  batchSize?: number;
  /** Defaults to `!client.pushCapable` */
  pollingOnly?: boolean;
  now?: () => number;
}

interface AnalyticsPollerEventMap extends Record<string, unknown[]> {
  updated: [AnalyticsSnapshot];
}

export function ringCapacity(windowSeconds: number, frequencyHz: number): number {
  return Math.max(1, Math.ceil(windowSeconds * frequencyHz));
}

export class AnalyticsPoller extends EventEmitter<AnalyticsPollerEventMap> {
  private readonly series = new Map<string, RingBuffer<AnalyticsPoint>>();
  private readonly fastHz: number;
  private readonly slowEvery: number;
  private readonly windowSeconds: number;
  private readonly fastMetricKey: string;
  private readonly fastMetricId: number | null;
  private readonly batchSize: number;
  private readonly pollingOnly: boolean;
  private readonly now: () => number;

  private controller: AbortController | null = null;
  private currentMode: AnalyticsMode = 'stopped';
  private cycleCount = 0;
  private cycleInFlight = false;

  constructor(
    private readonly client: AnalyticsClient,
    options: AnalyticsPollerOptions = {}
  ) {
    super();
    this.fastHz = options.fastHz ?? DEFAULT_ANALYTICS_OPTIONS.fastHz;
    this.slowEvery = Math.max(1, Math.trunc(options.slowEvery ?? DEFAULT_ANALYTICS_OPTIONS.slowEvery));
    this.windowSeconds = options.windowSeconds ?? DEFAULT_ANALYTICS_OPTIONS.windowSeconds;
    this.fastMetricKey = options.fastMetricKey ?? DEFAULT_ANALYTICS_OPTIONS.fastMetricKey;
    this.fastMetricId = metricIdForKey(this.fastMetricKey);
    this.batchSize = options.batchSize ?? DEFAULT_ANALYTICS_OPTIONS.batchSize;
    this.pollingOnly = options.pollingOnly ?? !client.pushCapable;
    this.now = options.now ?? Date.now;

    if (!(this.fastHz > 0)) {
      throw new RangeError(`fastHz must be positive, got ${this.fastHz}`);
    }
  }

  get mode(): AnalyticsMode {
    return this.currentMode;
  }

  get fastIntervalMs(): number {
    return 1000 / this.fastHz;
  }

  get slowIntervalMs(): number {
    return this.fastIntervalMs * this.slowEvery;
  }

  /** Ring capacity for a metric, based on the rate it is sampled at */
  capacityFor(key: string): number {
    const frequencyHz = this.pollingOnly && key === this.fastMetricKey ? this.fastHz : this.fastHz / this.slowEvery;
    return ringCapacity(this.windowSeconds, frequencyHz);
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    if (this.pollingOnly) {
      logInfo(LOG_NAMESPACE, `Sampling ${this.fastMetricKey} at ${this.fastHz}Hz, batch every ${this.slowEvery} cycles`);
      void this.runPollLoop(controller.signal);
    } else {
      logInfo(LOG_NAMESPACE, 'Sampling analytics from the status stream');
      void this.runStreamLoop(controller.signal);
    }
  }

  stop(): void {
    this.controller?.abort();
    this.controller = null;
    this.currentMode = 'stopped';
  }

  dispose(): void {
    this.stop();
    this.series.clear();
    this.removeAllListeners();
  }

  // ============================================================================
  // QUERIES
  // ============================================================================

  getSeries(key: string): AnalyticsPoint[] {
    return this.series.get(key)?.toArray() ?? [];
  }

  getLatest(key: string): number | null {
    return this.series.get(key)?.latest()?.v ?? null;
  }

  snapshot(): AnalyticsSnapshot {
    const result: AnalyticsSnapshot = {};
    for (const [key, buffer] of this.series) {
      result[key] = buffer.toArray();
    }
    return result;
  }

  /**
   * Run one full sample cycle now, including the batched fetch.
   */
  async refresh(): Promise<void> {
    if (this.pollingOnly) {
      await this.runCycle(true);
    } else {
      await this.sampleStatus();
    }
  }

  // ============================================================================
  // POLLING
  // ============================================================================

  private async runPollLoop(signal: AbortSignal): Promise<void> {
    this.currentMode = 'polling';
    while (!signal.aborted) {
      const startedAt = this.now();
      await this.runCycle(false);
      const elapsed = this.now() - startedAt;
      await delay(Math.max(0, this.fastIntervalMs - elapsed), signal);
    }
  }

  private async runCycle(forceBatch: boolean): Promise<void> {
    if (this.cycleInFlight) {
      return;
    }
    this.cycleInFlight = true;
    let changed = false;
    try {
      const runBatch = forceBatch || this.cycleCount % this.slowEvery === 0;
      this.cycleCount++;

      if (this.fastMetricId !== null) {
        try {
          const value = await this.client.getAnalyticValue(this.fastMetricId);
          if (value !== null) {
            this.append(this.fastMetricKey, { id: this.now(), v: value });
            changed = true;
          }
        } catch (error) {
          logVerbose(LOG_NAMESPACE, `Skipping ${this.fastMetricKey} sample: ${toAppError(error).message}`);
        }
      }

      if (runBatch) {
        try {
          changed = (await this.sampleBatch()) || changed;
        } catch (error) {
          logVerbose(LOG_NAMESPACE, `Skipping analytics batch: ${toAppError(error).message}`);
        }
      }
    } finally {
      this.cycleInFlight = false;
    }
    if (changed) {
      this.emit('updated', this.snapshot());
    }
  }

  /**
   * Group batched records by metric id; points already held are skipped.
   */
  private async sampleBatch(): Promise<boolean> {
    const records = await this.client.getAnalytics(this.batchSize);
    const grouped = new Map<string, AnalyticsPoint[]>();
    for (const record of records) {
      const key = metricKeyForId(record.T) ?? String(record.T);
      if (key === this.fastMetricKey && this.fastMetricId !== null) {
        continue;
      }
      const points = grouped.get(key) ?? [];
      points.push({ id: record.ID, v: record.V });
      grouped.set(key, points);
    }

    let added = false;
    for (const [key, points] of grouped) {
      const held = new Set(this.getSeries(key).map((point) => point.id));
      for (const point of points) {
        if (held.has(point.id)) continue;
        held.add(point.id);
        this.append(key, point);
        added = true;
      }
    }
    return added;
  }

  // ============================================================================
  // STREAMING
  // ============================================================================

  private async runStreamLoop(signal: AbortSignal): Promise<void> {
    this.currentMode = 'streaming';
    try {
      for await (const status of this.client.getStatusStream(signal)) {
        if (signal.aborted) break;
        this.ingestStatus(status);
      }
      if (!signal.aborted) {
        logInfo(LOG_NAMESPACE, 'Status stream closed; falling back to polling');
      }
    } catch (error) {
      logInfo(LOG_NAMESPACE, `Status stream failed, falling back to polling: ${toAppError(error).message}`);
    }

    if (signal.aborted) {
      return;
    }
    this.currentMode = 'polling';
    while (!signal.aborted) {
      const startedAt = this.now();
      await this.sampleStatus();
      const elapsed = this.now() - startedAt;
      await delay(Math.max(0, this.slowIntervalMs - elapsed), signal);
    }
  }

  private async sampleStatus(): Promise<void> {
    try {
      this.ingestStatus(await this.client.getStatus());
    } catch (error) {
      logVerbose(LOG_NAMESPACE, `Skipping status sample: ${toAppError(error).message}`);
    }
  }

  /**
   * Treat one status payload as a sample of every metric it names.
   */
  ingestStatus(status: RawStatus): void {
    const id = this.now();
    let changed = false;
    for (const metric of ANALYTICS_METRICS) {
      const value = status[metric.key];
      if (typeof value === 'number' && Number.isFinite(value)) {
        this.append(metric.key, { id, v: value });
        changed = true;
      }
    }
    if (changed) {
      this.emit('updated', this.snapshot());
    }
  }

  private append(key: string, point: AnalyticsPoint): void {
    let buffer = this.series.get(key);
    if (!buffer) {
      buffer = new RingBuffer<AnalyticsPoint>(this.capacityFor(key));
      this.series.set(key, buffer);
    }
    buffer.push(point);
  }
}
