import WebSocket, { WebSocketServer } from 'ws';
import { IncomingMessage, Server } from 'http';
import { MetricsSnapshot, WsEnvelope } from '../types/metrics';
import { toJson } from '../utils/json';
import { log } from '../utils/logger';
import { RuntimeStats } from './RuntimeStats';

export const SERIES_EVERY_N_TICKS = 5;
export const PING_INTERVAL_MS = 30_000;
export const CLOSE_GRACE_MS = 1_000;
export const STALE_AFTER_PINGS = 2;

export interface SnapshotSource {
  getLatestSnapshot(includeSeries?: boolean): MetricsSnapshot;
}

export interface WebSocketHubOptions {
  metricsIntervalMs: number;
  pingIntervalMs?: number;
  closeGraceMs?: number;
}

interface ClientConnection {
  id: string;
  websocket: WebSocket;
  ticks: number;
  streamTimer: NodeJS.Timeout;
  lastActivity: Date;
  ip: string;
}

/**
 * Streams metrics snapshots to dashboard clients on /ws.
 *
 * Each client gets its own tick timer: an `init` frame with series on connect, then
 * `metrics` frames, with a `series` frame every fifth tick in place of `metrics`.
 */
export class WebSocketHub {
  private wss: WebSocketServer | null = null;
  private clients: Map<string, ClientConnection> = new Map();
  private pingInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly metrics: SnapshotSource,
    private readonly runtimeStats: RuntimeStats,
    private readonly options: WebSocketHubOptions
  ) {}

  /**
   * Attach to an HTTP server; upgrade requests on other paths are rejected by ws.
   */
  public attach(server: Server, path = '/ws'): void {
    this.wss = new WebSocketServer({
      server,
      path,
      perMessageDeflate: false,
    });

    this.wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
      this.handleNewConnection(ws, request);
    });

    this.wss.on('error', error => {
      log.error('WebSocket server error', 'WebSocketHub', error);
    });

    this.startPingInterval();
    log.info(`WebSocket endpoint ready at ${path}`, 'WebSocketHub');
  }

  private handleNewConnection(ws: WebSocket, request: IncomingMessage): void {
    const clientId = this.generateClientId();
    const client: ClientConnection = {
      id: clientId,
      websocket: ws,
      ticks: 0,
      streamTimer: setInterval(() => this.streamTick(clientId), this.options.metricsIntervalMs),
      lastActivity: new Date(),
      ip: this.cleanIpAddress(request.socket.remoteAddress ?? 'unknown'),
    };

    this.clients.set(clientId, client);
    this.runtimeStats.clientConnected();
    log.info(`Client connected: ${clientId} (${client.ip})`, 'WebSocketHub');

    this.send(client, { type: 'init', data: this.metrics.getLatestSnapshot(true) });

    // Inbound frames carry nothing the server acts on
    ws.on('message', () => {
      client.lastActivity = new Date();
    });

    ws.on('pong', () => {
      client.lastActivity = new Date();
    });

    ws.on('close', () => {
      this.handleClientDisconnection(clientId, 'closed');
    });

    ws.on('error', error => {
      log.warn(`WebSocket error for client ${clientId}`, 'WebSocketHub', error);
      this.handleClientDisconnection(clientId, 'transport error');
    });
  }

  private streamTick(clientId: string): void {
    const client = this.clients.get(clientId);
    if (!client) {
      return;
    }

    client.ticks++;
    const withSeries = client.ticks % SERIES_EVERY_N_TICKS === 0;
    this.send(client, {
      type: withSeries ? 'series' : 'metrics',
      data: this.metrics.getLatestSnapshot(withSeries),
    });
  }

  /**
   * Tear down one client. Safe to call more than once; only the first call counts.
   */
  private handleClientDisconnection(clientId: string, reason: string, closeCode?: number): void {
    const client = this.clients.get(clientId);
    if (!client) {
      return;
    }

    this.clients.delete(clientId);
    clearInterval(client.streamTimer);
    this.runtimeStats.clientDisconnected();
    this.closeSocket(client.websocket, closeCode, reason);
    log.info(`Client disconnected: ${clientId} (${reason})`, 'WebSocketHub');
  }

  private closeSocket(ws: WebSocket, code?: number, reason?: string): void {
    if (ws.readyState === WebSocket.CLOSED) {
      return;
    }
    if (ws.readyState === WebSocket.OPEN) {
      ws.close(code, reason);
    }

    const grace = setTimeout(() => {
      if (ws.readyState !== WebSocket.CLOSED) {
        ws.terminate();
      }
    }, this.options.closeGraceMs ?? CLOSE_GRACE_MS);
    grace.unref();
    ws.once('close', () => clearTimeout(grace));
  }

  private send(client: ClientConnection, envelope: WsEnvelope): void {
    if (client.websocket.readyState !== WebSocket.OPEN) {
      return;
    }

    client.websocket.send(toJson(envelope), error => {
      if (error) {
        log.debug(`Send to client ${client.id} failed`, 'WebSocketHub', error);
        this.handleClientDisconnection(client.id, 'send failed');
      }
    });
  }

  /**
   * Ping every open client and drop the ones that have not answered
   * (or sent anything) for two ping periods.
   */
  private startPingInterval(): void {
    const pingIntervalMs = this.options.pingIntervalMs ?? PING_INTERVAL_MS;

    this.pingInterval = setInterval(() => {
      const now = Date.now();
      const stale: string[] = [];

      for (const client of this.clients.values()) {
        if (now - client.lastActivity.getTime() > pingIntervalMs * STALE_AFTER_PINGS) {
          stale.push(client.id);
        } else if (client.websocket.readyState === WebSocket.OPEN) {
          client.websocket.ping();
        }
      }

      for (const clientId of stale) {
        const client = this.clients.get(clientId);
        if (client) {
          log.warn(`Client ${clientId} stopped answering pings`, 'WebSocketHub');
          client.websocket.terminate();
          this.handleClientDisconnection(clientId, 'unresponsive');
        }
      }
    }, pingIntervalMs);
  }

  /**
   * Convert IPv6-mapped IPv4 (::ffff:192.168.1.1) to IPv4
   */
  private cleanIpAddress(ip: string): string {
    if (ip.startsWith('::ffff:')) {
      return ip.substring(7);
    }
    if (ip === '::1' || ip === '127.0.0.1') {
      return 'localhost';
    }
    return ip;
  }

  private generateClientId(): string {
    return `client_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  /**
   * Close every client and stop accepting upgrades. The HTTP server is left to its owner.
   */
  public cleanup(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }

    for (const clientId of Array.from(this.clients.keys())) {
      this.handleClientDisconnection(clientId, 'server shutting down', 1001);
    }

    if (this.wss) {
      this.wss.close();
      this.wss = null;
    }

    log.info('WebSocket hub cleaned up', 'WebSocketHub');
  }
}
