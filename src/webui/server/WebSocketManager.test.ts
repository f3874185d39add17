import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as http from 'http';
import WebSocket from 'ws';
import type { StatusProviderSnapshot } from '../../services/StatusProvider';
import { WebSocketManager } from './WebSocketManager';

type Received = { type: string; [key: string]: unknown };

function snapshot(overrides: Partial<StatusProviderSnapshot> = {}): StatusProviderSnapshot {
  return {
    status: null,
    displayStatus: 'Unknown',
    progress: 0,
    error: null,
    errorCode: null,
    isLoading: true,
    consecutiveErrors: 0,
    pollAttemptCount: 0,
    sseAttemptCount: 0,
    nextRetryAt: null,
    transportState: 'polling',
    pollPhase: 'idle',
    sseSupported: null,
    hasEverConnected: false,
    initialAttemptInProgress: true,
    isPausing: false,
    isCanceling: false,
    awaitingNewPrint: false,
    newPrintReady: false,
    minSpinnerActive: false,
    thumbnailReady: false,
    hasThumbnail: false,
    deviceStatusMessage: null,
    resinTemperature: null,
    cpuTemperature: null,
    mcuTemperature: null,
    uvTemperature: null,
    lastLayerSeconds: null,
    currentLayerSeconds: null,
    ...overrides,
  };
}

/**
 * Client that records every message and resolves waits by count
 */
class TestClient {
  readonly messages: Received[] = [];
  private waiters: Array<{ count: number; resolve: () => void }> = [];

  private constructor(readonly socket: WebSocket) {
    socket.on('message', (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (typeof parsed === 'object' && parsed !== null && 'type' in parsed && typeof parsed.type === 'string') {
        this.messages.push({ ...parsed, type: parsed.type });
      }
      this.waiters = this.waiters.filter((waiter) => {
        if (this.messages.length >= waiter.count) {
          waiter.resolve();
          return false;
        }
        return true;
      });
    });
  }

  static connect(port: number): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(`ws://127.0.0.1:${port}/ws`);
      const client = new TestClient(socket);
      socket.once('open', () => resolve(client));
      socket.once('error', reject);
    });
  }

  waitFor(count: number): Promise<void> {
    if (this.messages.length >= count) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push({ count, resolve }));
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.close();
    });
  }
}

describe('WebSocketManager', () => {
  let server: http.Server;
  let manager: WebSocketManager;
  let port: number;
  const clients: TestClient[] = [];

  const connect = async (): Promise<TestClient> => {
    const client = await TestClient.connect(port);
    clients.push(client);
    return client;
  };

  beforeEach(async () => {
    server = http.createServer();
    manager = new WebSocketManager({ initialSnapshot: () => snapshot({ displayStatus: 'Idle' }) });
    manager.initialize(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    port = typeof address === 'object' && address !== null ? address.port : 0;
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
    await manager.dispose();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('greets a new client and sends the current snapshot', async () => {
    const client = await connect();
    await client.waitFor(2);

    expect(client.messages[0].type).toBe('CONNECTED');
    expect(typeof client.messages[0].clientId).toBe('string');
    expect(client.messages[1].type).toBe('STATUS_UPDATE');
    expect(client.messages[1].status).toMatchObject({ displayStatus: 'Idle' });
    expect(manager.getClientCount()).toBe(1);
  });

  it('answers PING and REQUEST_STATUS', async () => {
    const client = await connect();
    await client.waitFor(2);

    client.socket.send(JSON.stringify({ command: 'PING' }));
    await client.waitFor(3);
    expect(client.messages[2].type).toBe('PONG');

    client.socket.send(JSON.stringify({ command: 'REQUEST_STATUS' }));
    await client.waitFor(4);
    expect(client.messages[3].type).toBe('STATUS_UPDATE');
  });

  it('reports invalid messages', async () => {
    const client = await connect();
    await client.waitFor(2);

    client.socket.send('not json');
    await client.waitFor(3);
    expect(client.messages[2]).toMatchObject({ type: 'ERROR', error: 'Invalid JSON format' });

    client.socket.send(JSON.stringify({ command: 'EXECUTE' }));
    await client.waitFor(4);
    expect(client.messages[3]).toMatchObject({ type: 'ERROR', error: 'Validation failed' });
  });

  it('broadcasts snapshots and replays the latest to late joiners', async () => {
    const first = await connect();
    await first.waitFor(2);

    manager.broadcastStatus(snapshot({ displayStatus: 'Printing', progress: 0.5 }));
    await first.waitFor(3);
    expect(first.messages[2].status).toMatchObject({ displayStatus: 'Printing', progress: 0.5 });

    const late = await connect();
    await late.waitFor(2);
    expect(late.messages[1].status).toMatchObject({ displayStatus: 'Printing' });
  });

  it('emits client counts as clients come and go', async () => {
    const counts: number[] = [];
    manager.on('client-count', (count) => counts.push(count));

    const client = await connect();
    await client.waitFor(2);
    await client.close();
    await new Promise<void>((resolve) => setTimeout(resolve, 20));

    expect(counts).toEqual([1, 0]);
    expect(manager.getClientCount()).toBe(0);
  });
});
