/**
 * @fileoverview Shared types for the HTTP API and the WebSocket protocol.
 *
 * Key exports:
 * - StandardAPIResponse: `{ success, message?, error? }` envelope for every route
 * - WebSocketMessage: discriminated union of server to client messages
 * - WebSocketCommand: client to server commands
 */

import type { StatusProviderSnapshot } from '../../services/StatusProvider';
import type { AnalyticsPoint, AnalyticsSnapshot } from '../../services/AnalyticsPoller';
import type { FileListing } from '../../types/backend-client';

// ============================================================================
// WEBSOCKET TYPES
// ============================================================================

export type WebSocketCommandType = 'REQUEST_STATUS' | 'PING';

export interface WebSocketCommand {
  readonly command: WebSocketCommandType;
}

interface WebSocketMessageBase {
  readonly timestamp: string;
}

export type WebSocketMessage =
  | (WebSocketMessageBase & { readonly type: 'CONNECTED'; readonly clientId: string })
  | (WebSocketMessageBase & { readonly type: 'STATUS_UPDATE'; readonly status: StatusProviderSnapshot | null })
  | (WebSocketMessageBase & { readonly type: 'PONG' })
  | (WebSocketMessageBase & { readonly type: 'ERROR'; readonly error: string });

// ============================================================================
// API ENDPOINT TYPES
// ============================================================================

export interface StandardAPIResponse {
  readonly success: boolean;
  readonly message?: string;
  readonly error?: string;
}

export interface StatusResponse extends StandardAPIResponse {
  readonly status?: StatusProviderSnapshot;
}

export interface ActionResponse extends StandardAPIResponse {
  readonly result?: Record<string, unknown>;
}

export interface FileListResponse extends StandardAPIResponse {
  readonly location?: string;
  readonly listing?: FileListing;
}

export interface FileMetadataResponse extends StandardAPIResponse {
  readonly metadata?: Record<string, unknown>;
}

export interface AnalyticsResponse extends StandardAPIResponse {
  readonly series?: AnalyticsSnapshot;
}

export interface AnalyticsSeriesResponse extends StandardAPIResponse {
  readonly key?: string;
  readonly points?: AnalyticsPoint[];
  readonly latest?: number | null;
}
