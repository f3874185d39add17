/**
 * @fileoverview Shared thumbnail lookup for file listings and the status engine.
 *
 * Keys on location, path, modification time and size rather than any
 * backend-assigned id, since ids can change when a file is replaced.
 */

import {
  THUMBNAIL_DIMENSIONS,
  type BackendClient,
  type ThumbnailResult,
  type ThumbnailSize,
} from '../types/backend-client';
import { ThumbnailCache, type PlaceholderFactory } from './ThumbnailCache';

/** Real thumbnails are refreshed after this long */
export const SHARED_THUMBNAIL_TTL_MS = 120_000;

export interface ThumbnailFileRef {
  path?: string | null;
  lastModified?: number | null;
}

export interface ThumbnailServiceOptions {
  realTtlMs?: number;
  maxBytes?: number;
  placeholderFactory?: PlaceholderFactory;
  now?: () => number;
}

export function joinFilePath(subdirectory: string, fileName: string): string {
  const directory = subdirectory.replace(/\/+$/, '');
  return directory.length > 0 ? `${directory}/${fileName}` : fileName;
}

export function thumbnailCacheKey(location: string, path: string, lastModified: number, size: ThumbnailSize): string {
  return `${location}|${path}|${lastModified}|${size}`;
}

export class ThumbnailService {
  private readonly cache: ThumbnailCache;

  constructor(
    private readonly client: Pick<BackendClient, 'getFileThumbnail'>,
    options: ThumbnailServiceOptions = {}
  ) {
    this.cache = new ThumbnailCache({
      realTtlMs: options.realTtlMs ?? SHARED_THUMBNAIL_TTL_MS,
      maxBytes: options.maxBytes,
      placeholderFactory: options.placeholderFactory,
      now: options.now,
    });
  }

  async getThumbnail(
    location: string,
    subdirectory: string,
    fileName: string,
    fileRef: ThumbnailFileRef | null,
    size: ThumbnailSize,
    forceRefresh = false
  ): Promise<ThumbnailResult> {
    const path = fileRef?.path || joinFilePath(subdirectory, fileName);
    const lastModified = fileRef?.lastModified ?? 0;
    const key = thumbnailCacheKey(location, path, lastModified, size);

    if (lastModified > 0) {
      // Older versions of the same file at the same size are stale
      const prefix = `${location}|${path}|`;
      this.cache.evictWhere((candidate) => candidate.startsWith(prefix) && candidate.endsWith(`|${size}`), key);
    }

    return this.cache.get(
      key,
      THUMBNAIL_DIMENSIONS[size],
      () => this.client.getFileThumbnail(location, path, size),
      { forceRefresh }
    );
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
