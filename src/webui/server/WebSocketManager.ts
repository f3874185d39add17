/**
 * @fileoverview WebSocket server for pushing status engine snapshots to browser clients.
 *
 * Clients connect on `/ws`, receive CONNECTED followed by the latest
 * STATUS_UPDATE, then every snapshot the status engine emits. Clients may
 * send PING or REQUEST_STATUS at any time. A protocol-level ping keeps idle
 * connections alive through proxies.
 *
 * Key exports:
 * - WebSocketManager class: initialize, broadcastStatus, getClientCount, shutdown
 * - WEBSOCKET_PATH
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type * as http from 'http';
import { randomUUID } from 'crypto';
import { EventEmitter } from '../../utils/EventEmitter';
import { createLogger } from '../../utils/logging';
import { toAppError } from '../../utils/error.utils';
import type { StatusProviderSnapshot } from '../../services/StatusProvider';
import { WebSocketCommandSchema, createValidationError } from '../schemas/web-api.schemas';
import type { WebSocketCommand, WebSocketMessage } from '../types/web-api.types';

export const WEBSOCKET_PATH = '/ws';

const PING_INTERVAL_MS = 30_000;

interface ClientInfo {
  readonly clientId: string;
  readonly connectedAt: Date;
  lastActivity: Date;
}

interface WebSocketManagerEventMap extends Record<string, unknown[]> {
  'client-count': [number];
}

export interface WebSocketManagerOptions {
  /** Snapshot sent to new clients before any broadcast has happened */
  readonly initialSnapshot?: () => StatusProviderSnapshot | null;
  readonly pingIntervalMs?: number;
}

function timestamp(): string {
  return new Date().toISOString();
}

export class WebSocketManager extends EventEmitter<WebSocketManagerEventMap> {
  private readonly log = createLogger('WebSocket');
  private readonly clients = new Map<WebSocket, ClientInfo>();
  private readonly initialSnapshot: () => StatusProviderSnapshot | null;
  private readonly pingIntervalMs: number;
  private wss: WebSocketServer | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private latestSnapshot: StatusProviderSnapshot | null = null;

  constructor(options: WebSocketManagerOptions = {}) {
    super();
    this.initialSnapshot = options.initialSnapshot ?? (() => null);
    this.pingIntervalMs = options.pingIntervalMs ?? PING_INTERVAL_MS;
  }

  /**
   * Attach to an HTTP server
   */
  public initialize(httpServer: http.Server): void {
    if (this.wss) {
      this.log.warn('WebSocket server already initialized');
      return;
    }

    this.wss = new WebSocketServer({ server: httpServer, path: WEBSOCKET_PATH });
    this.wss.on('connection', (ws) => this.handleConnection(ws));
    this.wss.on('error', (error) => this.log.error('WebSocket server error:', error));

    this.pingTimer = setInterval(() => this.pingClients(), this.pingIntervalMs);
    this.log.info('WebSocket server initialized');
  }

  private handleConnection(ws: WebSocket): void {
    const clientId = randomUUID();
    this.clients.set(ws, { clientId, connectedAt: new Date(), lastActivity: new Date() });
    this.emit('client-count', this.clients.size);
    this.log.info(`Client connected: ${clientId} - Total clients: ${this.clients.size}`);

    this.sendToClient(ws, { type: 'CONNECTED', timestamp: timestamp(), clientId });
    this.sendStatus(ws);

    ws.on('message', (data) => this.handleMessage(ws, data));
    ws.on('close', () => this.handleDisconnect(ws));
    ws.on('error', (error) => {
      this.log.error(`Client ${clientId} error:`, error.message);
      ws.close();
    });
    ws.on('pong', () => this.touch(ws));
  }

  private handleMessage(ws: WebSocket, data: RawData): void {
    this.touch(ws);

    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString());
    } catch {
      this.sendToClient(ws, { type: 'ERROR', timestamp: timestamp(), error: 'Invalid JSON format' });
      return;
    }

    const validation = WebSocketCommandSchema.safeParse(parsed);
    if (!validation.success) {
      this.sendToClient(ws, {
        type: 'ERROR',
        timestamp: timestamp(),
        error: createValidationError(validation.error).error,
      });
      return;
    }

    this.handleCommand(ws, validation.data);
  }

  private handleCommand(ws: WebSocket, command: WebSocketCommand): void {
    switch (command.command) {
      case 'REQUEST_STATUS':
        this.sendStatus(ws);
        break;
      case 'PING':
        this.sendToClient(ws, { type: 'PONG', timestamp: timestamp() });
        break;
      default: {
        const exhaustive: never = command.command;
        this.sendToClient(ws, { type: 'ERROR', timestamp: timestamp(), error: `Unknown command: ${String(exhaustive)}` });
      }
    }
  }

  private handleDisconnect(ws: WebSocket): void {
    const info = this.clients.get(ws);
    if (!info) {
      return;
    }
    this.clients.delete(ws);
    this.emit('client-count', this.clients.size);
    this.log.info(`Client disconnected: ${info.clientId}`);
  }

  private touch(ws: WebSocket): void {
    const info = this.clients.get(ws);
    if (info) {
      info.lastActivity = new Date();
    }
  }

  private pingClients(): void {
    for (const ws of this.clients.keys()) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    }
  }

  private currentSnapshot(): StatusProviderSnapshot | null {
    return this.latestSnapshot ?? this.initialSnapshot();
  }

  private sendStatus(ws: WebSocket): void {
    this.sendToClient(ws, { type: 'STATUS_UPDATE', timestamp: timestamp(), status: this.currentSnapshot() });
  }

  private sendToClient(ws: WebSocket, message: WebSocketMessage): void {
    if (ws.readyState !== WebSocket.OPEN) {
      return;
    }
    ws.send(JSON.stringify(message), (error) => {
      if (error) {
        this.log.warn('Send failed:', toAppError(error).message);
      }
    });
  }

  /**
   * Store the snapshot for late joiners and push it to every open client
   */
  public broadcastStatus(snapshot: StatusProviderSnapshot): void {
    this.latestSnapshot = snapshot;
    if (this.clients.size === 0) {
      return;
    }
    const message = JSON.stringify({ type: 'STATUS_UPDATE', timestamp: timestamp(), status: snapshot } satisfies WebSocketMessage);
    for (const ws of this.clients.keys()) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(message);
      }
    }
  }

  public getClientCount(): number {
    return this.clients.size;
  }

  public isServerRunning(): boolean {
    return this.wss !== null;
  }

  /**
   * Close every client and the server. Resolves once the server has closed.
   */
  public shutdown(): Promise<void> {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    const wss = this.wss;
    if (!wss) {
      return Promise.resolve();
    }
    this.wss = null;

    for (const ws of this.clients.keys()) {
      ws.close(1001, 'Server shutting down');
    }
    this.clients.clear();
    this.emit('client-count', 0);

    return new Promise((resolve) => {
      wss.close(() => {
        this.log.info('WebSocket server shut down');
        resolve();
      });
    });
  }

  public async dispose(): Promise<void> {
    await this.shutdown();
    this.removeAllListeners();
  }
}
