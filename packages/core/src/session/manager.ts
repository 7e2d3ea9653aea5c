import type { Message, Session, SessionSummary } from '@agent-studio/schemas';
import type { Logger } from 'pino';
import { SessionNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ChatStore } from '../storage/chat-store.js';

const PREVIEW_LENGTH = 100;
const EMPTY_PREVIEW = 'New chat';

export class SessionManager {
  private log: Logger;

  constructor(private store: ChatStore) {
    this.log = createLogger('session-manager');
  }

  /**
   * Return the named session, or create a new one for `agentId` when no id
   * is given. An explicit id that does not exist is an error; no session is
   * created in its place.
   *
   * @throws SessionNotFoundError
   */
  resolve(existingSessionId: string | undefined, agentId: string): Session {
    if (existingSessionId === undefined) {
      const session = this.store.createSession(agentId);
      this.log.info({ sessionId: session.id, agentId }, 'Session created');
      return session;
    }

    const session = this.store.getSession(existingSessionId);
    if (!session) {
      throw new SessionNotFoundError(existingSessionId);
    }
    return session;
  }

  get(sessionId: string): Session | null {
    return this.store.getSession(sessionId);
  }

  getHistory(sessionId: string, limit?: number): Message[] {
    return this.store.listMessages(sessionId, { limit });
  }

  list(): SessionSummary[] {
    return this.store.listSessions().map((session) => {
      const first = this.store.firstMessage(session.id);
      return {
        ...session,
        preview: first ? first.content.slice(0, PREVIEW_LENGTH) : EMPTY_PREVIEW,
      };
    });
  }
}
