import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import type { Message, MessageRole, Session } from '@agent-studio/schemas';
import { AppError, SessionReferenceError, StorageError, errorMessage } from '../errors.js';

interface SessionRow {
  id: string;
  agent_id: string;
  created_at: string;
  last_active_at: string;
}

interface MessageRow {
  id: string;
  session_id: string;
  role: MessageRole;
  content: string;
  incomplete: number;
  created_at: string;
}

export interface ChatStoreOptions {
  /** Clock used for row timestamps. */
  now?: () => Date;
}

export interface AppendMessageOptions {
  incomplete?: boolean;
}

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    agentId: row.agent_id,
    createdAt: row.created_at,
    lastActiveAt: row.last_active_at,
  };
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
    incomplete: row.incomplete === 1,
  };
}

/**
 * SQLite-backed store for sessions and their messages. Every call is a
 * synchronous statement against the database, so reads always see the latest
 * committed write.
 */
export class ChatStore {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath: string, options: ChatStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    try {
      this.db = new Database(dbPath);
      if (dbPath !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('foreign_keys = ON');
      this.initialize();
    } catch (err) {
      throw new StorageError(`Failed to open database at ${dbPath}`, { cause: err });
    }
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL,
        created_at TEXT NOT NULL,
        last_active_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        session_id TEXT NOT NULL REFERENCES sessions(id),
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        incomplete INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, seq);
    `);
  }

  createSession(agentId: string): Session {
    return this.guard('create session', () => {
      const now = this.now().toISOString();
      const row: SessionRow = {
        id: randomUUID(),
        agent_id: agentId,
        created_at: now,
        last_active_at: now,
      };
      this.db
        .prepare('INSERT INTO sessions (id, agent_id, created_at, last_active_at) VALUES (@id, @agent_id, @created_at, @last_active_at)')
        .run(row);
      return toSession(row);
    });
  }

  getSession(id: string): Session | null {
    return this.guard('read session', () => {
      const row = this.db
        .prepare<[string], SessionRow>('SELECT id, agent_id, created_at, last_active_at FROM sessions WHERE id = ?')
        .get(id);
      return row ? toSession(row) : null;
    });
  }

  /** All sessions, most recently active first. */
  listSessions(): Session[] {
    return this.guard('list sessions', () =>
      this.db
        .prepare<[], SessionRow>('SELECT id, agent_id, created_at, last_active_at FROM sessions ORDER BY last_active_at DESC, rowid DESC')
        .all()
        .map(toSession),
    );
  }

  /**
   * Append a message to a session. The timestamp never runs backwards within
   * a session, even if the wall clock does.
   *
   * @throws SessionReferenceError when the session row does not exist.
   */
  appendMessage(sessionId: string, role: MessageRole, content: string, options: AppendMessageOptions = {}): Message {
    return this.guard('append message', () => {
      const insert = this.db.transaction((): MessageRow => {
        const session = this.db
          .prepare<[string], { id: string }>('SELECT id FROM sessions WHERE id = ?')
          .get(sessionId);
        if (!session) {
          throw new SessionReferenceError(sessionId);
        }

        const last = this.db
          .prepare<[string], { created_at: string }>('SELECT created_at FROM messages WHERE session_id = ? ORDER BY seq DESC LIMIT 1')
          .get(sessionId);
        const now = this.now().toISOString();
        const createdAt = last && last.created_at > now ? last.created_at : now;

        const row: MessageRow = {
          id: randomUUID(),
          session_id: sessionId,
          role,
          content,
          incomplete: options.incomplete ? 1 : 0,
          created_at: createdAt,
        };
        this.db
          .prepare(`
            INSERT INTO messages (id, session_id, role, content, incomplete, created_at)
            VALUES (@id, @session_id, @role, @content, @incomplete, @created_at)
          `)
          .run(row);
        this.db
          .prepare('UPDATE sessions SET last_active_at = ? WHERE id = ?')
          .run(createdAt, sessionId);
        return row;
      });

      return toMessage(insert());
    });
  }

  /**
   * Messages of a session in insertion order. With `limit`, only the most
   * recent `limit` messages are returned, still oldest first.
   */
  listMessages(sessionId: string, options: { limit?: number } = {}): Message[] {
    return this.guard('list messages', () => {
      const columns = 'id, session_id, role, content, incomplete, created_at';
      if (options.limit === undefined) {
        return this.db
          .prepare<[string], MessageRow>(`SELECT ${columns} FROM messages WHERE session_id = ? ORDER BY seq ASC`)
          .all(sessionId)
          .map(toMessage);
      }

      return this.db
        .prepare<[string, number], MessageRow & { seq: number }>(`
          SELECT * FROM (
            SELECT seq, ${columns} FROM messages WHERE session_id = ? ORDER BY seq DESC LIMIT ?
          ) ORDER BY seq ASC
        `)
        .all(sessionId, options.limit)
        .map(toMessage);
    });
  }

  /** First message of a session, if any. */
  firstMessage(sessionId: string): Message | null {
    return this.guard('read message', () => {
      const row = this.db
        .prepare<[string], MessageRow>('SELECT id, session_id, role, content, incomplete, created_at FROM messages WHERE session_id = ? ORDER BY seq ASC LIMIT 1')
        .get(sessionId);
      return row ? toMessage(row) : null;
    });
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new StorageError(`Failed to ${operation}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
