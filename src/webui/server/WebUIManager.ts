/**
 * @fileoverview HTTP and WebSocket server coordinator for the backend service.
 *
 * Builds the Express application around the API routes, attaches the
 * WebSocket server and forwards every status engine snapshot to connected
 * clients. Reacts to `webUIEnabled` and `webUIPort` changes by starting,
 * stopping or restarting the server.
 *
 * Key exports:
 * - createWebUIApp(): Express application without a listening server
 * - WebUIManager class: start, stop, getStatus, dispose
 * - Events: 'server-started', 'server-stopped'
 */

import * as http from 'http';
import * as os from 'os';
import express from 'express';
import type { ConfigManager } from '../../managers/ConfigManager';
import type { ConfigUpdateEvent } from '../../types/config';
import type { StatusProviderSnapshot } from '../../services/StatusProvider';
import { AppError, ErrorCode, toAppError } from '../../utils/error.utils';
import { EventEmitter } from '../../utils/EventEmitter';
import { createLogger } from '../../utils/logging';
import { createAPIRoutes } from './api-routes';
import { createErrorMiddleware, createNotFoundHandler, createRequestLogger } from './middleware';
import type { RouteDependencies } from './routes/route-helpers';
import { WebSocketManager } from './WebSocketManager';

/**
 * Server status information
 */
export interface WebUIServerStatus {
  readonly isRunning: boolean;
  readonly serverIP: string;
  readonly port: number;
  readonly url: string;
  readonly clientCount: number;
  readonly webUIEnabled: boolean;
}

interface WebUIManagerEventMap extends Record<string, unknown[]> {
  'server-started': [{ url: string; port: number }];
  'server-stopped': [];
}

const WEBUI_CONFIG_KEYS = new Set<string>(['webUIEnabled', 'webUIPort']);

/**
 * Express application serving the API under `/api`
 */
export function createWebUIApp(deps: RouteDependencies): express.Application {
  const app = express();
  app.use(createRequestLogger());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ success: true, backend: deps.backend.name, selection: deps.backend.selection });
  });
  app.use('/api', createAPIRoutes(deps));
  app.use('/api', createNotFoundHandler());

  // Error handling (must be last)
  app.use(createErrorMiddleware());
  return app;
}

export class WebUIManager extends EventEmitter<WebUIManagerEventMap> {
  private readonly log = createLogger('WebUI');
  private readonly webSocketManager: WebSocketManager;
  private httpServer: http.Server | null = null;
  private isRunning = false;
  private serverIP = 'localhost';
  private port: number;
  private connectedClients = 0;
  private transition: Promise<unknown> = Promise.resolve();

  private readonly onSnapshot = (snapshot: StatusProviderSnapshot): void => {
    this.webSocketManager.broadcastStatus(snapshot);
  };

  private readonly onConfigUpdated = (event: ConfigUpdateEvent): void => {
    if (event.changedKeys.some((key) => WEBUI_CONFIG_KEYS.has(key))) {
      this.queue(() => this.handleConfigurationChange());
    }
  };

  constructor(
    private readonly deps: RouteDependencies,
    private readonly configManager: ConfigManager
  ) {
    super();
    this.port = configManager.get('webUIPort');
    this.webSocketManager = new WebSocketManager({
      initialSnapshot: () => deps.statusProvider.getSnapshot(),
    });
    this.webSocketManager.on('client-count', (count) => {
      this.connectedClients = count;
      this.log.verbose(`Client count updated: ${count}`);
    });
    deps.statusProvider.on('changed', this.onSnapshot);
    configManager.on('configUpdated', this.onConfigUpdated);
  }

  /**
   * Serialize start/stop so config changes arriving together cannot interleave
   */
  private queue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.transition.then(task, task);
    this.transition = next.catch((error: unknown) => {
      this.log.error('WebUI transition failed:', toAppError(error).message);
    });
    return next;
  }

  private async handleConfigurationChange(): Promise<void> {
    const config = this.configManager.getConfig();

    if (config.webUIEnabled && !this.isRunning) {
      await this.startServer();
      return;
    }
    if (!config.webUIEnabled && this.isRunning) {
      await this.stopServer();
      return;
    }
    if (this.isRunning && config.webUIPort !== this.port) {
      this.log.info('WebUI port changed, restarting server...');
      await this.stopServer();
      await this.startServer();
    }
  }

  /**
   * Start the server when enabled. Resolves false when disabled or when the
   * port cannot be bound.
   */
  public start(): Promise<boolean> {
    return this.queue(() => this.startServer());
  }

  public stop(): Promise<boolean> {
    return this.queue(() => this.stopServer());
  }

  private async startServer(): Promise<boolean> {
    if (this.isRunning) {
      return true;
    }

    const config = this.configManager.getConfig();
    if (!config.webUIEnabled) {
      this.log.info('WebUI is disabled in configuration');
      return false;
    }

    try {
      this.port = config.webUIPort;
      this.serverIP = this.determineServerIP();
      const server = http.createServer(createWebUIApp(this.deps));
      await this.listen(server);

      this.httpServer = server;
      this.webSocketManager.initialize(server);
      this.isRunning = true;

      const url = `http://${this.serverIP}:${this.port}`;
      this.log.info(`WebUI server running at ${url}`);
      this.emit('server-started', { url, port: this.port });
      return true;
    } catch (error) {
      this.log.error('Failed to start WebUI server:', toAppError(error).message);
      return false;
    }
  }

  private async stopServer(): Promise<boolean> {
    const server = this.httpServer;
    if (!server) {
      return true;
    }

    await this.webSocketManager.shutdown();
    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          this.log.warn('HTTP server close reported:', error.message);
        }
        resolve();
      });
      server.closeAllConnections();
    });

    this.httpServer = null;
    this.isRunning = false;
    this.connectedClients = 0;
    this.log.info('WebUI server stopped');
    this.emit('server-stopped');
    return true;
  }

  private listen(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException): void => {
        if (err.code === 'EADDRINUSE') {
          reject(
            new AppError(`Port ${this.port} is already in use. Choose a different webUIPort.`, ErrorCode.NETWORK, {
              port: this.port,
            })
          );
        } else if (err.code === 'EACCES') {
          reject(
            new AppError(`Access denied to port ${this.port}. Try a port number above 1024.`, ErrorCode.NETWORK, {
              port: this.port,
            })
          );
        } else {
          reject(err);
        }
      };

      server.once('error', onError);
      server.listen(this.port, '0.0.0.0', () => {
        server.removeListener('error', onError);
        resolve();
      });
    });
  }

  /**
   * Prefer a 192.168.x.x address, then any external IPv4 address
   */
  private determineServerIP(): string {
    let bestIP = 'localhost';
    const networkInterfaces = os.networkInterfaces();

    for (const name in networkInterfaces) {
      const interfaces = networkInterfaces[name];
      if (!interfaces) continue;

      for (const iface of interfaces) {
        if (iface.internal || iface.family !== 'IPv4') continue;
        if (iface.address.startsWith('192.168.')) {
          return iface.address;
        }
        if (bestIP === 'localhost') {
          bestIP = iface.address;
        }
      }
    }
    return bestIP;
  }

  public getHttpServer(): http.Server | null {
    return this.httpServer;
  }

  public getStatus(): WebUIServerStatus {
    return {
      isRunning: this.isRunning,
      serverIP: this.serverIP,
      port: this.port,
      url: `http://${this.serverIP}:${this.port}`,
      clientCount: this.connectedClients,
      webUIEnabled: this.configManager.get('webUIEnabled'),
    };
  }

  public isServerRunning(): boolean {
    return this.isRunning;
  }

  public async dispose(): Promise<void> {
    this.deps.statusProvider.off('changed', this.onSnapshot);
    this.configManager.off('configUpdated', this.onConfigUpdated);
    await this.stop();
    await this.webSocketManager.dispose();
    this.removeAllListeners();
  }
}
