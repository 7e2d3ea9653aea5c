import { randomBytes } from 'node:crypto';
import { WebSocket, type RawData } from 'ws';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  AgentListBodySchema,
  AgentSocketFrameSchema,
  SocketTokenBodySchema,
  type Agent,
} from '@agent-studio/schemas';
import { GatewayError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { FrameQueue } from './frame-queue.js';

export type AgentStreamEvent =
  | { type: 'fragment'; text: string }
  | { type: 'thread'; threadId: string };

export interface SendMessageOptions {
  /** Upstream thread to continue, as previously announced by the agent. */
  threadId?: string;
  /** Aborting closes the upstream socket and ends the stream with a GatewayError. */
  signal?: AbortSignal;
}

/**
 * Outbound contract to the external agent service.
 */
export interface AgentGateway {
  listAgents(): Promise<Agent[]>;
  getAgent(agentId: string): Promise<Agent | null>;
  sendMessage(agentId: string, sessionId: string, text: string, options?: SendMessageOptions): AsyncIterable<AgentStreamEvent>;
}

export type SocketFactory = (url: string, headers: Record<string, string>) => WebSocket;

export interface AgentGatewayClientConfig {
  baseUrl: string;
  apiKey: string;
  /** Longest silence tolerated on an open stream (default 30000). */
  streamTimeoutMs?: number;
  /** Timeout for plain HTTP requests and the socket handshake (default 10000). */
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
  createSocket?: SocketFactory;
}

const USER_AGENT = 'Agent-Studio/2.0';
const SOCKET_TOKEN_TTL_SECONDS = 3600;
const SOCKET_USER_ID = '1';

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

export class AgentGatewayClient implements AgentGateway {
  private baseUrl: string;
  private streamTimeoutMs: number;
  private requestTimeoutMs: number;
  private fetchImpl: typeof fetch;
  private createSocket: SocketFactory;
  private log: Logger;

  constructor(private config: AgentGatewayClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.streamTimeoutMs = config.streamTimeoutMs ?? 30_000;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 10_000;
    this.fetchImpl = config.fetch ?? fetch;
    this.createSocket = config.createSocket ?? ((url, headers) =>
      new WebSocket(url, { headers, handshakeTimeout: this.requestTimeoutMs }));
    this.log = createLogger('agent-gateway');
  }

  // ── HTTP ──────────────────────────────────────────────────────────────

  private async request<T>(path: string, schema: z.ZodType<T>, init?: RequestInit): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        ...init,
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': USER_AGENT,
          Authorization: `Bearer ${this.config.apiKey}`,
          ...init?.headers,
        },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new GatewayError(`Agent service unreachable at ${url}: ${errorMessage(err)}`, undefined, { cause: err });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => res.statusText);
      throw new GatewayError(`Agent service error ${res.status} for ${path}: ${body}`, res.status);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new GatewayError(`Agent service returned invalid JSON for ${path}`, res.status, { cause: err });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new GatewayError(`Unexpected response shape from ${path}: ${parsed.error.message}`, res.status);
    }
    return parsed.data;
  }

  async listAgents(): Promise<Agent[]> {
    const body = await this.request('/agents', AgentListBodySchema);
    if (Array.isArray(body)) return body;
    if ('agents' in body) return body.agents;
    if ('data' in body) return body.data;
    return body.results;
  }

  async getAgent(agentId: string): Promise<Agent | null> {
    const agents = await this.listAgents();
    return agents.find((a) => a.id === agentId) ?? null;
  }

  /**
   * Probe the agent listing endpoint. Never throws; used for a startup
   * warning only.
   */
  async checkConnection(): Promise<boolean> {
    try {
      await this.listAgents();
      return true;
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'Agent service connection check failed');
      return false;
    }
  }

  /**
   * Token for the streaming socket. Deployments without the token endpoint
   * (404) accept the API key directly.
   */
  private async getSocketToken(agentId: string): Promise<string> {
    try {
      const body = await this.request('/agents/auth/websocket', SocketTokenBodySchema, {
        method: 'POST',
        body: JSON.stringify({ agentId, expiresIn: SOCKET_TOKEN_TTL_SECONDS }),
      });
      return body.token;
    } catch (err) {
      if (err instanceof GatewayError && err.status === 404) {
        this.log.info('Socket token endpoint not found, using API key');
        return this.config.apiKey;
      }
      throw err;
    }
  }

  private socketUrl(agentId: string, sessionId: string, tabId: string): string {
    const url = new URL(`${this.baseUrl}/agents/${encodeURIComponent(agentId)}/ws`);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    url.searchParams.set('session_id', sessionId);
    url.searchParams.set('tab_id', tabId);
    url.searchParams.set('auth', 'true');
    return url.toString();
  }

  // ── Streaming ─────────────────────────────────────────────────────────

  /**
   * Send one user message and stream the agent's reply. The sequence ends
   * when the agent signals completion. Fragments already yielded are never
   * retracted when the stream later fails.
   *
   * @throws GatewayError on token, connection, protocol or timeout failure
   *         and when the signal is aborted.
   */
  async *sendMessage(
    agentId: string,
    sessionId: string,
    text: string,
    options: SendMessageOptions = {},
  ): AsyncGenerator<AgentStreamEvent, void, undefined> {
    const { signal, threadId } = options;
    if (signal?.aborted) {
      throw new GatewayError('Agent stream cancelled');
    }

    const token = await this.getSocketToken(agentId);
    if (signal?.aborted) {
      throw new GatewayError('Agent stream cancelled');
    }
    const tabId = randomBytes(13).toString('hex');
    const url = this.socketUrl(agentId, sessionId, tabId);
    const queue = new FrameQueue<AgentStreamEvent>();

    this.log.debug({ agentId, sessionId }, 'Opening agent stream');
    const socket = this.createSocket(url, { Authorization: `Bearer ${token}` });

    let idleTimer: ReturnType<typeof setTimeout> | undefined;
    const armIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        queue.fail(new GatewayError(`Agent stream timed out after ${this.streamTimeoutMs}ms without data`));
      }, this.streamTimeoutMs);
    };
    const onAbort = () => queue.fail(new GatewayError('Agent stream cancelled'));
    signal?.addEventListener('abort', onAbort, { once: true });

    socket.on('open', () => {
      const timestamp = new Date().toISOString();
      socket.send(JSON.stringify({ type: 'auth', sessionId, agentId, timestamp }));
      socket.send(JSON.stringify({
        type: 'message',
        content: text,
        userId: SOCKET_USER_ID,
        sessionId,
        agentId,
        timestamp,
        tabId,
        ...(threadId ? { threadId } : {}),
      }));
      armIdleTimer();
    });

    socket.on('message', (data: RawData) => {
      armIdleTimer();
      this.handleFrame(rawDataToString(data), queue);
    });

    socket.on('error', (err: Error) => {
      queue.fail(new GatewayError(`Agent stream failed: ${err.message}`, undefined, { cause: err }));
    });

    socket.on('close', (code: number) => {
      queue.fail(new GatewayError(`Agent stream closed before completion (code ${code})`));
    });

    try {
      while (true) {
        const next = await queue.next();
        if (next.done) return;
        yield next.value;
      }
    } finally {
      clearTimeout(idleTimer);
      signal?.removeEventListener('abort', onAbort);
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(1000);
      } else if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      }
    }
  }

  private handleFrame(raw: string, queue: FrameQueue<AgentStreamEvent>): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.log.warn({ length: raw.length }, 'Ignoring non-JSON frame from agent');
      return;
    }

    const parsed = AgentSocketFrameSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn('Ignoring malformed frame from agent');
      return;
    }
    const frame = parsed.data;

    switch (frame.type) {
      case 'chunk':
        if (frame.content) queue.push({ type: 'fragment', text: frame.content });
        return;
      case 'complete':
        queue.end();
        return;
      case 'thread_info':
        if (frame.threadId) queue.push({ type: 'thread', threadId: frame.threadId });
        return;
      case 'connected':
        this.log.debug('Agent stream connected');
        return;
      case 'typing':
        this.log.debug({ isTyping: frame.isTyping ?? false }, 'Agent typing');
        return;
      default:
        if (frame.error) {
          queue.fail(new GatewayError(`Agent error: ${typeof frame.error === 'string' ? frame.error : JSON.stringify(frame.error)}`));
          return;
        }
        this.log.debug({ type: frame.type }, 'Ignoring agent frame');
    }
  }
}
