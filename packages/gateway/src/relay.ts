import type { Logger } from 'pino';
import type { ClientMessageFrame, ServerFrame, Session } from '@agent-studio/schemas';
import {
  createLogger,
  errorMessage,
  type AgentGateway,
  type ChatStore,
  type SessionManager,
} from '@agent-studio/core';

export type RelayState =
  | { status: 'idle' }
  | {
      status: 'awaiting-response';
      sessionId: string;
      accumulated: string;
      controller: AbortController;
    };

type AwaitingState = Extract<RelayState, { status: 'awaiting-response' }>;

/**
 * How a single inbound message was handled:
 * - `completed`: the reply was streamed and stored
 * - `failed`: the stream broke; the partial reply was stored as incomplete
 * - `cancelled`: the connection closed mid-stream
 * - `busy`: another exchange was still running, nothing was stored
 * - `rejected`: the session could not be resolved or the user message not stored
 */
export type ExchangeOutcome = 'completed' | 'failed' | 'cancelled' | 'busy' | 'rejected';

export interface RelayDeps {
  store: ChatStore;
  sessions: SessionManager;
  gateway: AgentGateway;
  /** Frames meant only for this connection. */
  send: (frame: ServerFrame) => void;
  /** Frames for every connection bound to the session, this one included. */
  broadcast: (sessionId: string, frame: ServerFrame) => void;
}

/**
 * Per-connection bridge between the browser socket, the agent gateway and the
 * store. At most one exchange runs at a time; the user message is always
 * stored before the agent is contacted. Reply frames go to every socket
 * open on the session, while `busy`, `session` and rejection errors go to
 * the sender only.
 */
export class ConnectionRelay {
  private state: RelayState = { status: 'idle' };
  private boundSessionId: string | undefined;
  private closed = false;
  private pending: Promise<ExchangeOutcome> | null = null;
  private log: Logger;

  constructor(private deps: RelayDeps) {
    this.log = createLogger('relay');
  }

  get status(): RelayState['status'] {
    return this.state.status;
  }

  get sessionId(): string | undefined {
    return this.boundSessionId;
  }

  /** Attach the connection to a session before its first message. */
  bind(sessionId: string): void {
    this.boundSessionId = sessionId;
  }

  handleMessage(frame: ClientMessageFrame): Promise<ExchangeOutcome> {
    if (this.closed) {
      return Promise.resolve('cancelled');
    }
    if (this.state.status === 'awaiting-response') {
      this.send({ type: 'busy' });
      return Promise.resolve('busy');
    }

    let session: Session;
    try {
      session = this.deps.sessions.resolve(frame.sessionId ?? this.boundSessionId, frame.agentId);
      this.deps.store.appendMessage(session.id, 'user', frame.text);
    } catch (err) {
      this.log.warn({ err: errorMessage(err), sessionId: frame.sessionId }, 'Rejected inbound message');
      this.send({ type: 'error', reason: errorMessage(err) });
      return Promise.resolve('rejected');
    }

    if (session.id !== this.boundSessionId) {
      this.boundSessionId = session.id;
      this.send({ type: 'session', session });
    }

    const state: AwaitingState = {
      status: 'awaiting-response',
      sessionId: session.id,
      accumulated: '',
      controller: new AbortController(),
    };
    this.state = state;

    const exchange = this.stream(session, frame, state).finally(() => {
      this.state = { status: 'idle' };
      this.pending = null;
    });
    this.pending = exchange;
    return exchange;
  }

  /**
   * Stop any running exchange and refuse further messages. The partial reply
   * is still stored, best-effort; this connection gets no further frames.
   */
  close(): void {
    this.closed = true;
    if (this.state.status === 'awaiting-response') {
      this.state.controller.abort();
    }
  }

  /** Resolves once the running exchange, if any, has finished its writes. */
  async settled(): Promise<void> {
    if (this.pending) {
      await this.pending;
    }
  }

  private async stream(session: Session, frame: ClientMessageFrame, state: AwaitingState): Promise<ExchangeOutcome> {
    try {
      const events = this.deps.gateway.sendMessage(session.agentId, session.id, frame.text, {
        threadId: frame.threadId,
        signal: state.controller.signal,
      });
      for await (const event of events) {
        if (event.type === 'fragment') {
          state.accumulated += event.text;
          this.publish(session.id, { type: 'fragment', text: event.text });
        } else {
          this.publish(session.id, { type: 'thread', threadId: event.threadId });
        }
      }

      const reply = this.deps.store.appendMessage(session.id, 'assistant', state.accumulated);
      this.publish(session.id, { type: 'done', messageId: reply.id });
      return 'completed';
    } catch (err) {
      this.log.warn({ err: errorMessage(err), sessionId: session.id }, 'Exchange failed');
      this.persistPartial(state);
      this.publish(session.id, { type: 'error', reason: errorMessage(err) });
      return this.closed ? 'cancelled' : 'failed';
    }
  }

  private persistPartial(state: AwaitingState): void {
    try {
      this.deps.store.appendMessage(state.sessionId, 'assistant', state.accumulated, { incomplete: true });
    } catch (err) {
      this.log.error({ err: errorMessage(err), sessionId: state.sessionId }, 'Failed to store partial reply');
    }
  }

  private send(frame: ServerFrame): void {
    if (this.closed) return;
    this.deps.send(frame);
  }

  // Keeps going after close so other sockets on the session see the exchange end.
  private publish(sessionId: string, frame: ServerFrame): void {
    this.deps.broadcast(sessionId, frame);
  }
}
