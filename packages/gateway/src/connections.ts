import { WebSocket } from 'ws';
import type { ServerFrame } from '@agent-studio/schemas';
import { encodeFrame } from './protocol.js';
import type { ConnectionRelay } from './relay.js';

export interface Connection {
  id: string;
  ws: WebSocket;
  relay: ConnectionRelay;
  connectedAt: Date;
  lastPingAt: Date;
  alive: boolean;
}

export class ConnectionManager {
  private connections = new Map<string, Connection>();
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  add(id: string, ws: WebSocket, relay: ConnectionRelay): Connection {
    const conn: Connection = {
      id,
      ws,
      relay,
      connectedAt: new Date(),
      lastPingAt: new Date(),
      alive: true,
    };
    this.connections.set(id, conn);
    return conn;
  }

  remove(id: string): void {
    this.connections.delete(id);
  }

  /** Connections whose relay is currently bound to the session. */
  getBySession(sessionId: string): Connection[] {
    return Array.from(this.connections.values()).filter(c => c.relay.sessionId === sessionId);
  }

  send(connectionId: string, frame: ServerFrame): void {
    const conn = this.connections.get(connectionId);
    if (conn && conn.ws.readyState === WebSocket.OPEN) {
      conn.ws.send(encodeFrame(frame));
    }
  }

  broadcast(sessionId: string, frame: ServerFrame): void {
    const data = encodeFrame(frame);
    for (const conn of this.getBySession(sessionId)) {
      if (conn.ws.readyState === WebSocket.OPEN) {
        conn.ws.send(data);
      }
    }
  }

  startHeartbeat(intervalMs: number = 30000): void {
    this.pingInterval = setInterval(() => {
      for (const [id, conn] of this.connections) {
        if (!conn.alive) {
          conn.relay.close();
          conn.ws.terminate();
          this.connections.delete(id);
          continue;
        }
        conn.alive = false;
        conn.ws.ping();
      }
    }, intervalMs);
  }

  stopHeartbeat(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  get count(): number {
    return this.connections.size;
  }

  /**
   * Close every connection. Resolves once in-flight exchanges have stored
   * their partial replies.
   */
  async dispose(): Promise<void> {
    this.stopHeartbeat();
    const relays = Array.from(this.connections.values(), (conn) => {
      conn.relay.close();
      conn.ws.close(1001, 'Server shutting down');
      return conn.relay.settled();
    });
    this.connections.clear();
    await Promise.all(relays);
  }
}
