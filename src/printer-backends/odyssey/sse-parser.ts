/**
 * @fileoverview Incremental `text/event-stream` line splitting.
 *
 * Odyssey sends one JSON object per `data:` line. Only data lines are read;
 * `event:`, `id:` and comment lines are skipped.
 */

import { isRecord, type JsonRecord } from '../../utils/value-parsers';

export interface SseChunkResult {
  payloads: string[];
  remaining: string;
}

/**
 * Split buffered stream text into complete lines and collect their data
 * payloads. The trailing partial line is returned for the next chunk.
 */
export function parseSseLines(buffer: string): SseChunkResult {
  const lines = buffer.split('\n');
  const remaining = lines.pop() ?? '';
  const payloads: string[] = [];

  for (const rawLine of lines) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!line.startsWith('data:')) {
      continue;
    }
    const payload = line.slice(5).trim();
    if (payload.length > 0) {
      payloads.push(payload);
    }
  }

  return { payloads, remaining };
}

/**
 * Parse a data payload as a JSON object; anything else reads as null.
 */
export function parseSsePayload(payload: string): JsonRecord | null {
  try {
    const parsed: unknown = JSON.parse(payload);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
