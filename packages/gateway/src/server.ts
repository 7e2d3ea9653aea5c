import type { IncomingMessage, Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { Logger } from 'pino';
import type { ClientFrame } from '@agent-studio/schemas';
import {
  createLogger,
  errorMessage,
  rawDataToString,
  type AgentGateway,
  type ChatStore,
  type SessionManager,
} from '@agent-studio/core';
import { ConnectionManager, type Connection } from './connections.js';
import { createApi } from './api.js';
import { INVALID_FRAME_REASON, SESSION_NOT_FOUND_CLOSE_CODE, parseFrame } from './protocol.js';
import { ConnectionRelay } from './relay.js';

export interface GatewayConfig {
  host: string;
  port: number;
  wsPath: string;
  /** Number of stored messages replayed when a connection opens. */
  historyLimit: number;
  corsOrigins?: string[];
  heartbeatIntervalMs?: number;
}

export interface GatewayDeps {
  store: ChatStore;
  sessions: SessionManager;
  agents: AgentGateway;
}

export class GatewayServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private connections: ConnectionManager;
  private app: Hono;
  private log: Logger;

  constructor(
    private config: GatewayConfig,
    private deps: GatewayDeps,
  ) {
    this.connections = new ConnectionManager();
    this.log = createLogger('gateway');

    const api = createApi({
      listAgents: () => deps.agents.listAgents(),
      getAgent: (id) => deps.agents.getAgent(id),
      createSession: (agentId) => deps.sessions.resolve(undefined, agentId),
      getSession: (id) => deps.sessions.get(id),
      listSessions: () => deps.sessions.list(),
      getMessages: (sessionId, limit) => deps.sessions.getHistory(sessionId, limit),
      wsPath: config.wsPath,
      corsOrigins: config.corsOrigins,
    });

    this.app = new Hono();
    this.app.route('/', api);

    // Catch-all 404 for unmatched routes
    this.app.notFound((c) => {
      return c.json({ success: false, error: 'Not found' }, 404);
    });
  }

  private setupWebSocket(server: Server): void {
    this.wss = new WebSocketServer({ server, path: this.config.wsPath });

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      const connId = randomUUID();
      const relay = new ConnectionRelay({
        store: this.deps.store,
        sessions: this.deps.sessions,
        gateway: this.deps.agents,
        send: (frame) => this.connections.send(connId, frame),
        broadcast: (sessionId, frame) => this.connections.broadcast(sessionId, frame),
      });
      const conn = this.connections.add(connId, ws, relay);

      this.log.info({ connId }, 'WebSocket connected');

      ws.on('pong', () => {
        conn.alive = true;
        conn.lastPingAt = new Date();
      });

      ws.on('message', (raw: RawData) => {
        const frame = parseFrame(rawDataToString(raw));
        if (!frame) {
          this.connections.send(connId, { type: 'error', reason: INVALID_FRAME_REASON });
          return;
        }
        this.handleFrame(conn, frame);
      });

      ws.on('close', () => {
        this.log.info({ connId }, 'WebSocket disconnected');
        relay.close();
        this.connections.remove(connId);
      });

      ws.on('error', (err) => {
        this.log.error({ connId, err: err.message }, 'WebSocket error');
      });

      const requestedSession = new URL(req.url ?? '/', 'http://localhost').searchParams.get('sessionId');
      this.sendHistory(conn, requestedSession);
    });
  }

  private sendHistory(conn: Connection, sessionId: string | null): void {
    if (!sessionId) {
      this.connections.send(conn.id, { type: 'history', messages: [] });
      return;
    }

    try {
      const session = this.deps.sessions.get(sessionId);
      if (!session) {
        this.connections.send(conn.id, { type: 'error', reason: `Session not found: ${sessionId}` });
        conn.relay.close();
        conn.ws.close(SESSION_NOT_FOUND_CLOSE_CODE, 'Session not found');
        return;
      }

      conn.relay.bind(session.id);
      const messages = this.deps.sessions.getHistory(session.id, this.config.historyLimit);
      this.connections.send(conn.id, { type: 'history', messages });
    } catch (err) {
      this.log.error({ connId: conn.id, sessionId, err: errorMessage(err) }, 'Failed to load history');
      this.connections.send(conn.id, { type: 'error', reason: errorMessage(err) });
    }
  }

  private handleFrame(conn: Connection, frame: ClientFrame): void {
    switch (frame.type) {
      case 'ping':
        this.connections.send(conn.id, { type: 'pong' });
        return;
      case 'message':
        conn.relay.handleMessage(frame).catch((err) => {
          this.log.error({ connId: conn.id, err: errorMessage(err) }, 'Relay error');
          this.connections.send(conn.id, { type: 'error', reason: errorMessage(err) });
        });
        return;
    }
  }

  getConnections(): ConnectionManager {
    return this.connections;
  }

  /** Bound address once started; the port differs from the config when it was 0. */
  address(): AddressInfo | null {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr : null;
  }

  async start(): Promise<void> {
    return new Promise((resolve) => {
      const nodeServer = serve(
        {
          fetch: this.app.fetch,
          port: this.config.port,
          hostname: this.config.host,
        },
        (info) => {
          this.log.info({ host: this.config.host, port: info.port, wsPath: this.config.wsPath }, 'Server listening');
          this.connections.startHeartbeat(this.config.heartbeatIntervalMs);
          resolve();
        },
      );

      this.server = nodeServer as Server;
      this.setupWebSocket(this.server);
    });
  }

  async stop(): Promise<void> {
    await this.connections.dispose();
    const wss = this.wss;
    const server = this.server;
    this.wss = null;
    this.server = null;
    return new Promise((resolve, reject) => {
      if (wss) {
        wss.close(() => {
          if (server) {
            server.close((err) => {
              if (err) reject(err);
              else resolve();
            });
          } else {
            resolve();
          }
        });
      } else {
        resolve();
      }
    });
  }
}
