/**
 * @fileoverview Odyssey REST + SSE backend adapter.
 *
 * Odyssey already speaks the canonical status shape, so payloads pass
 * through unchanged. Status is pushed over `/status/stream` as server-sent
 * events; every other call is a plain request that rejects on non-200.
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
import { backendError, networkError, toAppError, unsupportedError } from '../../utils/error.utils';
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  buildQuery,
  ensureOk,
  fetchWithTimeout,
  readBytes,
  readJsonOrText,
  trimTrailingSlashes,
  type ResponseReader,
} from '../../utils/http.utils';
import { createLogger } from '../../utils/logging';
import { isRecord, toFloat, toInt, type JsonRecord } from '../../utils/value-parsers';
import { parseSseLines, parseSsePayload } from './sse-parser';

export const ODYSSEY_DEFAULT_URL = 'http://localhost:12357';

export interface OdysseyHttpClientOptions {
  apiUrl?: string;
  requestTimeoutMs?: number;
}

type QueryParams = Record<string, string | number | boolean | undefined>;

export class OdysseyHttpClient implements BackendClient {
  readonly name = 'Odyssey';
  readonly pushCapable = true;

  private readonly log = createLogger('OdysseyHttpClient');
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly disposeController = new AbortController();

  constructor(options: OdysseyHttpClientOptions = {}) {
    const apiUrl = trimTrailingSlashes(options.apiUrl || ODYSSEY_DEFAULT_URL);
    if (!/^https?:\/\//.test(apiUrl)) {
      throw backendError('apiUrl must start with either http:// or https://', 'configure', { apiUrl });
    }
    this.apiUrl = apiUrl;
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async getStatus(): Promise<RawStatus> {
    return this.getRecord('/status');
  }

  async *getStatusStream(signal?: AbortSignal, onOpen?: () => void): AsyncIterable<RawStatus> {
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    signal?.addEventListener('abort', abort);
    this.disposeController.signal.addEventListener('abort', abort);

    try {
      let response: Response;
      try {
        response = await fetch(`${this.apiUrl}/status/stream`, {
          headers: { Accept: 'text/event-stream' },
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          return;
        }
        throw networkError(`Status stream failed: ${toAppError(error).message}`, { url: this.apiUrl });
      }
      await ensureOk(response, 'GET /status/stream');
      if (!response.body) {
        return;
      }
      onOpen?.();

      const reader = response.body.getReader();
      const cancelRead = (): void => {
        reader.cancel().catch((error: unknown) => {
          this.log.verbose(`Status stream cancel failed: ${toAppError(error).message}`);
        });
      };
      controller.signal.addEventListener('abort', cancelRead);
      const decoder = new TextDecoder();
      let buffer = '';
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) {
            break;
          }
          buffer += decoder.decode(value, { stream: true });
          const { payloads, remaining } = parseSseLines(buffer);
          buffer = remaining;
          for (const payload of payloads) {
            const status = parseSsePayload(payload);
            if (status) {
              yield status;
            } else {
              this.log.verbose('Skipping malformed status event');
            }
          }
        }
      } catch (error) {
        if (!controller.signal.aborted) {
          throw networkError(`Status stream interrupted: ${toAppError(error).message}`, { url: this.apiUrl });
        }
      } finally {
        controller.signal.removeEventListener('abort', cancelRead);
        reader.releaseLock();
      }
    } finally {
      controller.abort();
      signal?.removeEventListener('abort', abort);
      this.disposeController.signal.removeEventListener('abort', abort);
    }
  }

  async listItems(location: string, pageSize: number, pageIndex: number, subdirectory: string): Promise<FileListing> {
    const decoded = await this.getRecord('/files', {
      location,
      subdirectory,
      page_index: pageIndex,
      page_size: pageSize,
    });
    const files = Array.isArray(decoded.files) ? decoded.files.filter(isRecord) : [];
    const dirs = Array.isArray(decoded.dirs) ? decoded.dirs.filter(isRecord) : [];
    return {
      files,
      dirs,
      page_index: toInt(decoded.page_index) ?? pageIndex,
      page_size: toInt(decoded.page_size) ?? pageSize,
    };
  }

  /**
   * USB counts as available when both the local and the USB listing succeed.
   */
  async usbAvailable(): Promise<boolean> {
    try {
      await this.listItems('Local', 1, 0, '');
    } catch (error) {
      this.log.verbose(`Local listing failed: ${toAppError(error).message}`);
      return false;
    }
    try {
      await this.listItems('Usb', 1, 0, '');
      return true;
    } catch (error) {
      this.log.verbose(`USB listing failed: ${toAppError(error).message}`);
      return false;
    }
  }

  async getFileMetadata(location: string, filePath: string): Promise<Record<string, unknown>> {
    return this.getRecord('/file/metadata', { location, file_path: cleanFilePath(filePath) });
  }

  async getConfig(): Promise<Record<string, unknown>> {
    return this.getRecord('/config');
  }

  async getFileThumbnail(location: string, filePath: string, size: ThumbnailSize): Promise<ThumbnailResult> {
    const bytes = await this.request(
      'GET',
      '/file/thumbnail',
      { location, file_path: cleanFilePath(filePath), size },
      readBytes
    );
    return { bytes, placeholder: bytes.length === 0 };
  }

  async deleteFile(location: string, filePath: string): Promise<ActionResult> {
    return asRecord(
      await this.request('DELETE', '/file', { location, file_path: cleanFilePath(filePath) }, readJsonOrText)
    );
  }

  async startPrint(location: string, filePath: string): Promise<ActionResult> {
    await this.request('POST', '/print/start', { location, file_path: cleanFilePath(filePath) }, readJsonOrText);
    return { ok: true };
  }

  async cancelPrint(): Promise<ActionResult> {
    await this.request('POST', '/print/cancel', {}, readJsonOrText);
    return { ok: true };
  }

  async pausePrint(): Promise<ActionResult> {
    await this.request('POST', '/print/pause', {}, readJsonOrText);
    return { ok: true };
  }

  async resumePrint(): Promise<ActionResult> {
    await this.request('POST', '/print/resume', {}, readJsonOrText);
    return { ok: true };
  }

  async canMoveToTop(): Promise<boolean> {
    return false;
  }

  async move(heightMm: number): Promise<ActionResult> {
    return this.postForRecord('/manual', { z: heightMm });
  }

  /**
   * Relative move, computed against the reported Z position.
   */
  async moveDelta(deltaMm: number): Promise<ActionResult> {
    const status = await this.getStatus();
    const physical = status.physical_state;
    const currentZ = (isRecord(physical) ? toFloat(physical.z) : null) ?? 0;
    return this.move(currentZ + deltaMm);
  }

  async moveToTop(): Promise<ActionResult> {
    throw unsupportedError('moveToTop', this.name);
  }

  async manualCure(cure: boolean): Promise<ActionResult> {
    return this.postForRecord('/manual', { cure });
  }

  async manualHome(): Promise<ActionResult> {
    return this.postForRecord('/manual/home');
  }

  async manualCommand(command: string): Promise<ActionResult> {
    return this.postForRecord('/manual/hardware_command', { command });
  }

  async displayTest(test: string): Promise<ActionResult> {
    await this.request('POST', '/manual/display_test', { test }, readJsonOrText);
    return { ok: true };
  }

  async getAnalytics(): Promise<AnalyticsRecord[]> {
    throw unsupportedError('getAnalytics', this.name);
  }

  async getAnalyticValue(): Promise<number | null> {
    throw unsupportedError('getAnalyticValue', this.name);
  }

  dispose(): void {
    this.disposeController.abort();
  }

  // ============================================================================
  // HTTP
  // ============================================================================

  /**
   * Status check and body read share the request deadline
   */
  private async request<T>(method: string, endpoint: string, params: QueryParams, read: ResponseReader<T>): Promise<T> {
    const url = `${this.apiUrl}${endpoint}${buildQuery(params)}`;
    const operation = `Odyssey ${method} ${endpoint}`;
    return fetchWithTimeout(url, { method }, this.timeoutMs, async (response) =>
      read(await ensureOk(response, operation))
    );
  }

  private async getRecord(endpoint: string, params: QueryParams = {}): Promise<JsonRecord> {
    const decoded = await this.request('GET', endpoint, params, readJsonOrText);
    if (!isRecord(decoded)) {
      throw backendError(`Odyssey ${endpoint} returned a non-object payload`, `GET ${endpoint}`);
    }
    return decoded;
  }

  private async postForRecord(endpoint: string, params: QueryParams = {}): Promise<ActionResult> {
    return asRecord(await this.request('POST', endpoint, params, readJsonOrText));
  }
}

/** Odyssey rejects doubled separators in file paths */
function cleanFilePath(filePath: string): string {
  return filePath.replaceAll('//', '');
}

function asRecord(decoded: unknown): JsonRecord {
  return isRecord(decoded) ? decoded : {};
}
