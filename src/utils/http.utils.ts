/**
 * @fileoverview HTTP helpers shared by the backend clients.
 *
 * Every request runs under an AbortController deadline; aborts become
 * TIMEOUT errors and socket failures become NETWORK errors so the status
 * engine can treat both as transport failures.
 */

import { httpStatusError, isAppError, networkError, timeoutError } from './error.utils';

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

export function buildQuery(params: Record<string, string | number | boolean | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query.length > 0 ? `?${query}` : '';
}

export type ResponseReader<T> = (response: Response) => Promise<T>;

/**
 * Issue a request and read its response under one deadline. The timer
 * stays armed until `read` settles, so a stalled body also times out.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: ResponseReader<T>
): Promise<T> {
  const controller = new AbortController();
  const operation = `${init.method ?? 'GET'} ${url}`;
  let timeoutId: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(timeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  const exchange = async (): Promise<T> => {
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      return await read(response);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw timeoutError(operation, timeoutMs);
      }
      if (isAppError(error)) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      throw networkError(`${operation} failed: ${cause?.message ?? String(error)}`, { url }, cause);
    }
  };

  try {
    return await Promise.race([exchange(), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Reject non-2xx responses with a BACKEND_HTTP_STATUS error.
 */
export async function ensureOk(response: Response, operation: string): Promise<Response> {
  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw httpStatusError(operation, response.status, body.slice(0, 200));
  }
  return response;
}

/**
 * Parse a response body as JSON; an empty or non-JSON body reads as its text.
 */
export async function readJsonOrText(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.trim().length === 0) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export async function readBytes(response: Response): Promise<Buffer> {
  return Buffer.from(await response.arrayBuffer());
}
