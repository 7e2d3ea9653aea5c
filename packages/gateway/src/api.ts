import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import {
  CreateSessionBodySchema,
  MessagesQuerySchema,
  type Agent,
  type ApiEnvelope,
  type Message,
  type Session,
  type SessionSummary,
} from '@agent-studio/schemas';
import { GatewayError, createLogger, errorMessage } from '@agent-studio/core';

export interface ApiContext {
  listAgents: () => Promise<Agent[]>;
  getAgent: (id: string) => Promise<Agent | null>;
  createSession: (agentId: string) => Session;
  getSession: (id: string) => Session | null;
  listSessions: () => SessionSummary[];
  getMessages: (sessionId: string, limit: number) => Message[];
  /** Path of the chat socket, used to build per-session socket URLs. */
  wsPath: string;
  corsOrigins?: string[];
}

function fail(error: string): ApiEnvelope<never> {
  return { success: false, error };
}

export function createApi(ctx: ApiContext) {
  const app = new Hono().basePath('/api');
  const log = createLogger('api');

  const origins = ctx.corsOrigins ?? ['*'];
  app.use('*', cors({ origin: origins.includes('*') ? '*' : origins }));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(fail(err.message), err.status);
    }
    if (err instanceof GatewayError) {
      log.warn({ err: err.message }, 'Agent service request failed');
      return c.json(fail(err.message), 502);
    }
    log.error({ err: errorMessage(err), path: c.req.path }, 'Request failed');
    return c.json(fail(errorMessage(err)), 500);
  });

  // GET /api/health
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // GET /api/agents
  app.get('/agents', async (c) => {
    const agents = await ctx.listAgents();
    return c.json({ success: true, data: { agents } } satisfies ApiEnvelope<{ agents: Agent[] }>);
  });

  // POST /api/sessions { agentId }
  app.post('/sessions', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = CreateSessionBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new HTTPException(400, { message: 'agentId is required' });
    }

    const agent = await ctx.getAgent(parsed.data.agentId);
    if (!agent) {
      throw new HTTPException(404, { message: 'Agent not found' });
    }

    const session = ctx.createSession(agent.id);
    const websocketUrl = `${ctx.wsPath}?sessionId=${encodeURIComponent(session.id)}`;
    return c.json({ success: true, data: { session, agent, websocketUrl } }, 201);
  });

  // GET /api/sessions
  app.get('/sessions', (c) => {
    const sessions = ctx.listSessions();
    return c.json({ success: true, data: { sessions } } satisfies ApiEnvelope<{ sessions: SessionSummary[] }>);
  });

  // GET /api/sessions/:id/messages?limit=50
  app.get('/sessions/:id/messages', (c) => {
    const query = MessagesQuerySchema.safeParse({ limit: c.req.query('limit') });
    if (!query.success) {
      throw new HTTPException(400, { message: 'limit must be a positive integer up to 500' });
    }

    const sessionId = c.req.param('id');
    if (!ctx.getSession(sessionId)) {
      throw new HTTPException(404, { message: 'Session not found' });
    }

    const messages = ctx.getMessages(sessionId, query.data.limit);
    return c.json({ success: true, data: { messages } } satisfies ApiEnvelope<{ messages: Message[] }>);
  });

  return app;
}
