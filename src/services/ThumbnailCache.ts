/**
 * @fileoverview Single-flight TTL cache for thumbnail bytes.
 *
 * Keys are built by callers from stable identifiers (location, path,
 * modification time) plus the pixel size. Behavior:
 * - fresh hits return immediately; concurrent misses share one load
 * - a failed or empty load yields a generated placeholder of the requested
 *   size, cached briefly so the next request retries
 * - a placeholder never replaces real bytes already held for the key; the
 *   real bytes are served and a retry is scheduled after the placeholder TTL
 * - total size is bounded, evicting least recently used entries
 */

import type { ThumbnailDimensions, ThumbnailResult } from '../types/backend-client';
import { toAppError } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';
import { generatePlaceholder } from './ThumbnailPlaceholder';

const LOG_NAMESPACE = 'ThumbnailCache';

export const PLACEHOLDER_TTL_MS = 5_000;
export const DEFAULT_MAX_CACHE_BYTES = 50 * 1024 * 1024;

export type ThumbnailLoader = () => Promise<ThumbnailResult>;
export type PlaceholderFactory = (width: number, height: number) => Promise<Buffer>;

export interface ThumbnailCacheOptions {
  realTtlMs: number;
  placeholderTtlMs?: number;
  maxBytes?: number;
  placeholderFactory?: PlaceholderFactory;
  now?: () => number;
}

export interface ThumbnailCacheEntry {
  readonly bytes: Buffer;
  readonly fetchedAt: number;
  readonly expiresAt: number;
  readonly placeholder: boolean;
}

export interface ThumbnailRequestOptions {
  forceRefresh?: boolean;
}

export class ThumbnailCache {
  private readonly entries = new Map<string, ThumbnailCacheEntry>();
  private readonly inFlight = new Map<string, Promise<ThumbnailResult>>();
  private readonly realTtlMs: number;
  private readonly placeholderTtlMs: number;
  private readonly maxBytes: number;
  private readonly placeholderFactory: PlaceholderFactory;
  private readonly now: () => number;
  private totalBytes = 0;

  constructor(options: ThumbnailCacheOptions) {
    this.realTtlMs = options.realTtlMs;
    this.placeholderTtlMs = options.placeholderTtlMs ?? PLACEHOLDER_TTL_MS;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_CACHE_BYTES;
    this.placeholderFactory = options.placeholderFactory ?? generatePlaceholder;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get byteSize(): number {
    return this.totalBytes;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /**
   * Fresh entry for `key`, or null.
   */
  peek(key: string): ThumbnailCacheEntry | null {
    const entry = this.entries.get(key);
    if (!entry || this.now() >= entry.expiresAt) {
      return null;
    }
    return entry;
  }

  async get(
    key: string,
    dimensions: ThumbnailDimensions,
    loader: ThumbnailLoader,
    options: ThumbnailRequestOptions = {}
  ): Promise<ThumbnailResult> {
    if (!options.forceRefresh) {
      const cached = this.peek(key);
      if (cached) {
        this.touch(key, cached);
        return { bytes: cached.bytes, placeholder: cached.placeholder };
      }
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.load(key, dimensions, loader);
    this.inFlight.set(key, request);
    try {
      return await request;
    } finally {
      if (this.inFlight.get(key) === request) {
        this.inFlight.delete(key);
      }
    }
  }

  /**
   * Store a placeholder for `key` without calling a loader.
   */
  async storePlaceholder(key: string, dimensions: ThumbnailDimensions): Promise<ThumbnailResult> {
    const held = this.entries.get(key);
    if (held && !held.placeholder) {
      return { bytes: held.bytes, placeholder: false };
    }
    const bytes = await this.makePlaceholder(dimensions);
    this.store(key, { bytes, placeholder: true, fetchedAt: this.now(), expiresAt: this.now() + this.placeholderTtlMs });
    return { bytes, placeholder: true };
  }

  invalidate(key: string): void {
    const entry = this.entries.get(key);
    if (entry) {
      this.entries.delete(key);
      this.totalBytes -= entry.bytes.length;
    }
  }

  /**
   * Drop every entry whose key matches, except `keepKey`.
   */
  evictWhere(predicate: (key: string) => boolean, keepKey?: string): number {
    let evicted = 0;
    for (const key of [...this.entries.keys()]) {
      if (key !== keepKey && predicate(key)) {
        this.invalidate(key);
        evicted++;
      }
    }
    return evicted;
  }

  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
  }

  private async load(key: string, dimensions: ThumbnailDimensions, loader: ThumbnailLoader): Promise<ThumbnailResult> {
    let result: ThumbnailResult | null = null;
    try {
      result = await loader();
    } catch (error) {
      logWarning(LOG_NAMESPACE, `Thumbnail load failed for ${key}: ${toAppError(error).message}`);
    }

    const now = this.now();
    if (result && !result.placeholder && result.bytes.length > 0) {
      this.store(key, { bytes: result.bytes, placeholder: false, fetchedAt: now, expiresAt: now + this.realTtlMs });
      return { bytes: result.bytes, placeholder: false };
    }

    const held = this.entries.get(key);
    if (held && !held.placeholder) {
      logVerbose(LOG_NAMESPACE, `Keeping previous thumbnail for ${key}; retrying in ${this.placeholderTtlMs}ms`);
      this.store(key, { ...held, expiresAt: now + this.placeholderTtlMs });
      return { bytes: held.bytes, placeholder: false };
    }

    const bytes = result && result.bytes.length > 0 ? result.bytes : await this.makePlaceholder(dimensions);
    this.store(key, { bytes, placeholder: true, fetchedAt: now, expiresAt: now + this.placeholderTtlMs });
    return { bytes, placeholder: true };
  }

  private async makePlaceholder(dimensions: ThumbnailDimensions): Promise<Buffer> {
    try {
      return await this.placeholderFactory(dimensions.width, dimensions.height);
    } catch (error) {
      logWarning(LOG_NAMESPACE, `Placeholder generation failed: ${toAppError(error).message}`);
      return Buffer.alloc(0);
    }
  }

  private touch(key: string, entry: ThumbnailCacheEntry): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private store(key: string, entry: ThumbnailCacheEntry): void {
    this.invalidate(key);
    this.entries.set(key, entry);
    this.totalBytes += entry.bytes.length;

    for (const candidate of this.entries.keys()) {
      if (this.totalBytes <= this.maxBytes) {
        break;
      }
      if (candidate !== key) {
        this.invalidate(candidate);
      }
    }
  }
}
