/**
 * @fileoverview NanoDLP backend adapter.
 *
 * NanoDLP exposes plain HTTP GET endpoints and cannot push status, so
 * `getStatusStream` is a fixed two-second poll. Status payloads are parsed,
 * canonicalized through a per-client NanoDlpStateHandler (cancel latching)
 * and mapped into the canonical wire shape.
 *
 * Plate metadata comes from `/plates/list/json`, cached for two minutes with
 * one shared request in flight. Thumbnails are plate previews served from
 * `/static/plates/<id>/3d.png`; missing plates and previews resolve to
 * generated placeholders.
 */

import {
  THUMBNAIL_DIMENSIONS,
  type ActionResult,
  type AnalyticsRecord,
  type BackendClient,
  type FileListing,
  type RawStatus,
  type ThumbnailResult,
  type ThumbnailSize,
} from '../../types/backend-client';
import { backendError, toAppError, unsupportedError } from '../../utils/error.utils';
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  ensureOk,
  fetchWithTimeout,
  readBytes,
  readJsonOrText,
  trimTrailingSlashes,
} from '../../utils/http.utils';
import { createLogger } from '../../utils/logging';
import { delay } from '../../utils/time.utils';
import { firstPresent, isRecord, toFloat, toInt, type JsonRecord } from '../../utils/value-parsers';
import { ThumbnailCache, type PlaceholderFactory } from '../../services/ThumbnailCache';
import { CONFIG_ALIASES, DISCARDED_STATUS_KEYS, STATUS_ALIASES, Z_CONTROL_KEYS } from './field-aliases';
import { parseNanoFile, toFileEntry, toFileMetadata, type NanoFile } from './nano-file';
import { parseNanoStatus, withFile } from './nano-status';
import { nanoStatusToStatusMap } from './nanodlp-mappers';
import { NanoDlpStateHandler } from './state-canonicalizer';

export const NANODLP_DEFAULT_BASE_URL = 'http://localhost';
export const PLATES_CACHE_TTL_MS = 120_000;
export const PLATE_THUMBNAIL_TTL_MS = 30_000;
export const STATUS_STREAM_INTERVAL_MS = 2_000;
/** Plate resolution is skipped this soon after construction */
export const STARTUP_RESOLVE_GRACE_MS = 2_000;

export interface NanoDlpHttpClientOptions {
  baseUrl?: string;
  requestTimeoutMs?: number;
  /** Delay before the single `/status` retry */
  statusRetryDelayMs?: number;
  streamIntervalMs?: number;
  placeholderFactory?: PlaceholderFactory;
  now?: () => number;
}

interface ResolvedPlate {
  plateId: number;
  file: NanoFile;
  resolvedAt: number;
}

/**
 * Interpret the body of a manual-control endpoint. Installs answer with
 * JSON, plain text or nothing; a 200 is success either way.
 */
export function toManualResult(body: unknown): ActionResult {
  if (isRecord(body)) {
    const ok = typeof body.ok === 'boolean' ? body.ok : body.result === 'ok';
    const message = body.message;
    return message === undefined || message === null ? { ok } : { ok, message: String(message) };
  }
  if (typeof body === 'string') {
    const text = body.trim();
    return text.length > 0 ? { ok: true, message: text } : { ok: true };
  }
  if (typeof body === 'boolean') {
    return { ok: body };
  }
  return { ok: true };
}

export function extractPlateEntries(decoded: unknown): unknown[] {
  if (Array.isArray(decoded)) {
    return decoded;
  }
  if (isRecord(decoded)) {
    for (const key of ['plates', 'files', 'data']) {
      const value = decoded[key];
      if (Array.isArray(value)) {
        return value;
      }
    }
    const nested = Object.values(decoded).filter(isRecord);
    return nested.length > 0 ? nested : [decoded];
  }
  return [];
}

function matchesPath(candidate: string | null | undefined, target: string): boolean {
  if (!candidate) {
    return false;
  }
  return candidate.trim().toLowerCase() === target.trim().toLowerCase();
}

function stripLeadingSlashes(path: string): string {
  return path.replace(/^\/+/, '');
}

export class NanoDlpHttpClient implements BackendClient {
  readonly name = 'NanoDLP';
  readonly pushCapable = false;

  private readonly log = createLogger('NanoDlpHttpClient');
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly statusRetryDelayMs: number;
  private readonly streamIntervalMs: number;
  private readonly now: () => number;
  private readonly createdAt: number;
  private readonly stateHandler = new NanoDlpStateHandler();
  private readonly thumbnails: ThumbnailCache;

  private platesCache: { plates: NanoFile[]; fetchedAt: number } | null = null;
  private platesInFlight: Promise<NanoFile[]> | null = null;
  private resolvedPlate: ResolvedPlate | null = null;
  private readonly disposeController = new AbortController();

  constructor(options: NanoDlpHttpClientOptions = {}) {
    this.baseUrl = trimTrailingSlashes(options.baseUrl || NANODLP_DEFAULT_BASE_URL);
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.statusRetryDelayMs = options.statusRetryDelayMs ?? 200;
    this.streamIntervalMs = options.streamIntervalMs ?? STATUS_STREAM_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.createdAt = this.now();
    this.thumbnails = new ThumbnailCache({
      realTtlMs: PLATE_THUMBNAIL_TTL_MS,
      placeholderFactory: options.placeholderFactory,
      now: this.now,
    });
    this.log.info(`Using NanoDLP at ${this.baseUrl}`);
  }

  // ============================================================================
  // STATUS
  // ============================================================================

  async getStatus(): Promise<RawStatus> {
    let attempt = 0;
    for (;;) {
      attempt++;
      try {
        return await this.fetchStatusOnce();
      } catch (error) {
        this.log.verbose(`GET /status attempt #${attempt} failed: ${toAppError(error).message}`);
        if (attempt >= 2) {
          throw error;
        }
        this.log.info(`Retrying NanoDLP /status (attempt ${attempt + 1})`);
        await delay(this.statusRetryDelayMs);
      }
    }
  }

  async *getStatusStream(signal?: AbortSignal, onOpen?: () => void): AsyncIterable<RawStatus> {
    onOpen?.();
    while (!signal?.aborted && !this.disposeController.signal.aborted) {
      try {
        yield await this.getStatus();
      } catch (error) {
        this.log.verbose(`Status stream poll failed: ${toAppError(error).message}`);
      }
      await delay(this.streamIntervalMs, signal);
    }
  }

  /**
   * Canonical status plus the cancel latch state, for tests and diagnostics.
   */
  get cancelLatched(): boolean {
    return this.stateHandler.cancelLatched;
  }

  resetLatches(): void {
    this.stateHandler.reset();
  }

  private async fetchStatusOnce(): Promise<RawStatus> {
    const decoded = await this.getJsonRecord('/status');
    for (const key of DISCARDED_STATUS_KEYS) {
      delete decoded[key];
    }

    let status = parseNanoStatus(decoded);
    if (status.file === null && status.plateId !== null) {
      const plateId = status.plateId;
      const resolved = this.resolvedPlate;
      if (resolved && resolved.plateId === plateId && this.now() - resolved.resolvedAt < PLATES_CACHE_TTL_MS) {
        status = withFile(status, resolved.file);
      } else if (status.printing) {
        this.scheduleResolvePlate(plateId);
      }
    }

    const canonical = this.stateHandler.canonicalize(status);
    return nanoStatusToStatusMap(status, canonical);
  }

  /**
   * Look the active plate up in the background so later polls carry its
   * metadata. Skipped right after startup, when many installs poll at once.
   */
  private scheduleResolvePlate(plateId: number): void {
    const age = this.now() - this.createdAt;
    if (age < STARTUP_RESOLVE_GRACE_MS) {
      this.log.verbose(`Skipping PlateID ${plateId} resolve during startup (age=${age}ms)`);
      return;
    }
    this.log.verbose(`Scheduling async resolve for PlateID ${plateId}`);
    void this.fetchPlates()
      .then((plates) => {
        const found = plates.find((plate) => plate.plateId === plateId);
        if (found) {
          this.rememberPlate(plateId, found);
        }
      })
      .catch((error: unknown) => {
        this.log.verbose(`Async PlateID resolve failed: ${toAppError(error).message}`);
      });
  }

  private rememberPlate(plateId: number, file: NanoFile): void {
    this.log.verbose(`Resolved PlateID ${plateId} -> ${file.name}`);
    this.resolvedPlate = { plateId, file, resolvedAt: this.now() };
  }

  // ============================================================================
  // FILES
  // ============================================================================

  async listItems(_location: string, pageSize: number, pageIndex: number, _subdirectory: string): Promise<FileListing> {
    const plates = await this.fetchPlates();
    const files = plates.map(toFileEntry);
    this.log.info(`listItems: mapped ${files.length} files from NanoDLP payload`);
    return { files, dirs: [], page_index: pageIndex, page_size: pageSize };
  }

  async getFileMetadata(_location: string, filePath: string): Promise<Record<string, unknown>> {
    const plate = await this.findPlateForPath(filePath);
    if (plate) {
      return toFileMetadata(plate);
    }
    return { file_data: { path: filePath, name: filePath, last_modified: 0, parent_path: '' } };
  }

  async getFileThumbnail(_location: string, filePath: string, size: ThumbnailSize): Promise<ThumbnailResult> {
    const dimensions = THUMBNAIL_DIMENSIONS[size];
    const dimensionSuffix = `${dimensions.width}|${dimensions.height}`;
    const normalizedPath = stripLeadingSlashes(filePath).toLowerCase();
    const missingKey = `missing:${normalizedPath}|${dimensionSuffix}`;

    const knownMissing = this.thumbnails.peek(missingKey);
    if (knownMissing) {
      return { bytes: knownMissing.bytes, placeholder: knownMissing.placeholder };
    }

    let plate: NanoFile | null;
    try {
      plate = await this.findPlateForPath(filePath);
    } catch (error) {
      this.log.warn(`Failed locating plate for thumbnail ${filePath}: ${toAppError(error).message}`);
      return this.thumbnails.storePlaceholder(missingKey, dimensions);
    }
    if (!plate) {
      this.log.verbose(`No plate found for ${filePath}`);
      return this.thumbnails.storePlaceholder(missingKey, dimensions);
    }

    // Plate ids churn when files are replaced; path and modification time do not
    const resolvedPath = plate.path.length > 0 ? plate.path.toLowerCase() : normalizedPath;
    const plateKey = `path:${resolvedPath}|lm:${plate.lastModified ?? 0}|${dimensionSuffix}`;
    const plateId = plate.plateId;
    if (plateId === null || !plate.previewAvailable) {
      this.log.verbose(`Plate ${plate.path} has no preview (plateId=${plateId}, preview=${plate.previewAvailable})`);
      return this.thumbnails.get(plateKey, dimensions, async () => ({ bytes: Buffer.alloc(0), placeholder: true }));
    }
    return this.thumbnails.get(plateKey, dimensions, () => this.downloadPreview(plateId));
  }

  private async downloadPreview(plateId: number): Promise<ThumbnailResult> {
    const { status, bytes } = await fetchWithTimeout(
      `${this.baseUrl}/static/plates/${plateId}/3d.png`,
      {},
      this.timeoutMs,
      async (response) => ({ status: response.status, bytes: await readBytes(response) })
    );
    if (status === 200 && bytes.length > 0) {
      return { bytes, placeholder: false };
    }
    this.log.verbose(`Preview request returned ${status} for plate ${plateId}`);
    return { bytes: Buffer.alloc(0), placeholder: true };
  }

  async deleteFile(): Promise<ActionResult> {
    throw unsupportedError('deleteFile', this.name);
  }

  async usbAvailable(): Promise<boolean> {
    return false;
  }

  /**
   * Config summary derived from `/status`; NanoDLP has no config endpoint.
   */
  async getConfig(): Promise<Record<string, unknown>> {
    const decoded = await this.getJsonRecord('/status');
    const pick = (keys: readonly string[]): unknown => firstPresent(decoded, keys);
    return {
      general: {
        hostname: pick(CONFIG_ALIASES.hostname) ?? '',
        ip: pick(CONFIG_ALIASES.ip) ?? '',
        status: pick(CONFIG_ALIASES.status) ?? '',
      },
      advanced: {
        backend: 'nanodlp',
        nanodlp: {
          build: pick(CONFIG_ALIASES.build) ?? null,
          version: pick(CONFIG_ALIASES.version) ?? null,
        },
      },
      machine: {
        disk: pick(CONFIG_ALIASES.disk) ?? null,
        wifi: pick(CONFIG_ALIASES.wifi) ?? null,
        resin_level: pick(STATUS_ALIASES.resinLevel) ?? null,
      },
      vendor: {},
    };
  }

  // ============================================================================
  // PRINT CONTROL
  // ============================================================================

  async startPrint(_location: string, filePath: string): Promise<ActionResult> {
    let plateId: number | null = null;
    try {
      plateId = (await this.findPlateForPath(filePath))?.plateId ?? null;
    } catch (error) {
      this.log.verbose(`Plate lookup before start failed, using path as id: ${toAppError(error).message}`);
    }

    const target = plateId !== null ? String(plateId) : filePath;
    await this.getOk(`/printer/start/${target}`, 'startPrint');
    this.prefetchPlatesAfterStart(filePath, plateId);
    return { ok: true };
  }

  private prefetchPlatesAfterStart(filePath: string, plateId: number | null): void {
    const normalized = stripLeadingSlashes(filePath);
    void this.fetchPlates(true)
      .then((plates) => {
        const found =
          plateId !== null
            ? plates.find((plate) => plate.plateId === plateId)
            : plates.find((plate) => matchesPath(plate.path, normalized) || matchesPath(plate.name, normalized));
        if (found && found.plateId !== null) {
          this.rememberPlate(found.plateId, found);
        }
      })
      .catch((error: unknown) => {
        this.log.verbose(`Plate prefetch after start failed: ${toAppError(error).message}`);
      });
  }

  async cancelPrint(): Promise<ActionResult> {
    await this.getOk('/printer/stop', 'cancelPrint');
    return { ok: true };
  }

  async pausePrint(): Promise<ActionResult> {
    await this.getOk('/printer/pause', 'pausePrint');
    return { ok: true };
  }

  async resumePrint(): Promise<ActionResult> {
    await this.getOk('/printer/unpause', 'resumePrint');
    return { ok: true };
  }

  // ============================================================================
  // MOTION
  // ============================================================================

  async canMoveToTop(): Promise<boolean> {
    try {
      const decoded = await this.getJsonRecord('/status');
      return Z_CONTROL_KEYS.some((key) => key in decoded);
    } catch (error) {
      this.log.verbose(`canMoveToTop probe failed: ${toAppError(error).message}`);
      return false;
    }
  }

  /**
   * Move to an absolute height. NanoDLP only moves relatively, so the delta
   * is computed against the current Z from `/status`.
   */
  async move(heightMm: number): Promise<ActionResult> {
    let currentZ = 0;
    try {
      const status = await this.getStatus();
      const physical = status.physical_state;
      currentZ = (isRecord(physical) ? toFloat(physical.z) : null) ?? 0;
    } catch (error) {
      throw backendError(`Failed to read NanoDLP status: ${toAppError(error).message}`, 'move', { heightMm });
    }
    this.log.info(`Absolute move to ${heightMm}mm from ${currentZ}mm`);
    return this.moveMicrons(Math.round((heightMm - currentZ) * 1000));
  }

  async moveDelta(deltaMm: number): Promise<ActionResult> {
    return this.moveMicrons(Math.round(deltaMm * 1000));
  }

  private async moveMicrons(deltaMicrons: number): Promise<ActionResult> {
    if (deltaMicrons === 0) {
      return { ok: true, message: 'no-op' };
    }
    const direction = deltaMicrons > 0 ? 'up' : 'down';
    return this.getManual(`/z-axis/move/${direction}/micron/${Math.abs(deltaMicrons)}`, 'move');
  }

  async moveToTop(): Promise<ActionResult> {
    return this.getManual('/z-axis/top', 'moveToTop');
  }

  async manualHome(): Promise<ActionResult> {
    return this.getManual('/z-axis/calibrate', 'manualHome');
  }

  async manualCure(): Promise<ActionResult> {
    throw unsupportedError('manualCure', this.name);
  }

  async manualCommand(): Promise<ActionResult> {
    throw unsupportedError('manualCommand', this.name);
  }

  async displayTest(): Promise<ActionResult> {
    throw unsupportedError('displayTest', this.name);
  }

  // ============================================================================
  // ANALYTICS
  // ============================================================================

  async getAnalytics(count: number): Promise<AnalyticsRecord[]> {
    const decoded = await this.getDecoded(`/analytic/data/${count}`, 'getAnalytics');
    if (!Array.isArray(decoded)) {
      return [];
    }
    const records: AnalyticsRecord[] = [];
    for (const item of decoded) {
      if (!isRecord(item)) continue;
      const type = toInt(item.T);
      const id = toInt(item.ID);
      const value = toFloat(item.V);
      if (type === null || id === null || value === null) continue;
      records.push({ T: type, ID: id, V: value });
    }
    return records;
  }

  async getAnalyticValue(id: number): Promise<number | null> {
    return toFloat(await this.getDecoded(`/analytic/value/${id}`, 'getAnalyticValue'));
  }

  dispose(): void {
    this.disposeController.abort();
    this.thumbnails.clear();
  }

  // ============================================================================
  // PLATES
  // ============================================================================

  /**
   * Plates list, cached for two minutes. Concurrent callers share one request.
   */
  fetchPlates(forceRefresh = false): Promise<NanoFile[]> {
    if (!forceRefresh) {
      const cached = this.platesCache;
      if (cached && this.now() - cached.fetchedAt < PLATES_CACHE_TTL_MS) {
        return Promise.resolve(cached.plates);
      }
      if (this.platesInFlight) {
        return this.platesInFlight;
      }
    } else {
      this.platesCache = null;
    }

    const request = this.loadPlates();
    this.platesInFlight = request;
    return request.then(
      (plates) => {
        if (this.platesInFlight === request) {
          this.platesInFlight = null;
          this.platesCache = { plates, fetchedAt: this.now() };
        }
        return plates;
      },
      (error: unknown) => {
        if (this.platesInFlight === request) {
          this.platesInFlight = null;
        }
        throw error;
      }
    );
  }

  private async loadPlates(): Promise<NanoFile[]> {
    let decoded: unknown;
    try {
      const listing = await fetchWithTimeout(`${this.baseUrl}/plates/list/json`, {}, this.timeoutMs, async (response) => ({
        status: response.status,
        body: response.status === 200 ? await readJsonOrText(response) : null,
      }));
      if (listing.status !== 200) {
        this.log.warn(`Plates list call failed: HTTP ${listing.status}`);
        return [];
      }
      decoded = listing.body;
    } catch (error) {
      this.log.warn(`Plates list request failed: ${toAppError(error).message}`);
      return [];
    }
    return extractPlateEntries(decoded).filter(isRecord).map(parseNanoFile);
  }

  async findPlateForPath(filePath: string): Promise<NanoFile | null> {
    const normalized = stripLeadingSlashes(filePath);
    const plates = await this.fetchPlates();
    return (
      plates.find(
        (plate) =>
          matchesPath(plate.path, filePath) ||
          matchesPath(plate.path, normalized) ||
          matchesPath(`/${plate.path}`, filePath) ||
          (plate.name.length > 0 && (matchesPath(plate.name, filePath) || matchesPath(plate.name, normalized)))
      ) ?? null
    );
  }

  // ============================================================================
  // HTTP
  // ============================================================================

  /**
   * GET with the status check and body read under the request deadline
   */
  private getDecoded(path: string, operation: string): Promise<unknown> {
    return fetchWithTimeout(`${this.baseUrl}${path}`, {}, this.timeoutMs, async (response) =>
      readJsonOrText(await ensureOk(response, operation))
    );
  }

  private async getJsonRecord(path: string): Promise<JsonRecord> {
    const decoded = await this.getDecoded(path, `GET ${path}`);
    if (!isRecord(decoded)) {
      throw backendError(`NanoDLP ${path} returned a non-object payload`, `GET ${path}`);
    }
    return decoded;
  }

  private async getOk(path: string, operation: string): Promise<unknown> {
    this.log.info(`${operation} request: ${this.baseUrl}${path}`);
    try {
      return await this.getDecoded(path, operation);
    } catch (error) {
      this.log.warn(`${operation} failed: ${toAppError(error).message}`);
      throw error;
    }
  }

  private async getManual(path: string, operation: string): Promise<ActionResult> {
    return toManualResult(await this.getOk(path, operation));
  }
}
