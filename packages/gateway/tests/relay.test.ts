import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import {
  ChatStore,
  FrameQueue,
  GatewayError,
  SessionManager,
  StorageError,
  type AgentStreamEvent,
} from '@agent-studio/core';
import type { ServerFrame } from '@agent-studio/schemas';
import { ConnectionRelay } from '../src/relay.js';
import { FakeAgentGateway } from './fakes.js';

describe('ConnectionRelay', () => {
  let store: ChatStore;
  let sessions: SessionManager;
  let gateway: FakeAgentGateway;
  /** Everything this connection would see, in order. */
  let frames: ServerFrame[];
  let direct: ServerFrame[];
  let published: { sessionId: string; frame: ServerFrame }[];
  let relay: ConnectionRelay;

  beforeEach(() => {
    store = new ChatStore(':memory:');
    sessions = new SessionManager(store);
    gateway = new FakeAgentGateway(store);
    frames = [];
    direct = [];
    published = [];
    relay = new ConnectionRelay({
      store,
      sessions,
      gateway,
      send: (frame) => {
        frames.push(frame);
        direct.push(frame);
      },
      broadcast: (sessionId, frame) => {
        frames.push(frame);
        published.push({ sessionId, frame });
      },
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    store.close();
  });

  function stored(sessionId: string) {
    return store.listMessages(sessionId).map((m) => ({ role: m.role, content: m.content, incomplete: m.incomplete }));
  }

  test('creates a session, streams the reply and stores both sides', async () => {
    gateway.reply('Hel', 'lo');

    const outcome = await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' });

    expect(outcome).toBe('completed');
    const [session] = store.listSessions();
    const history = store.listMessages(session.id);
    expect(frames).toEqual([
      { type: 'session', session: expect.objectContaining({ id: session.id, agentId: 'a1' }) },
      { type: 'fragment', text: 'Hel' },
      { type: 'fragment', text: 'lo' },
      { type: 'done', messageId: history[1].id },
    ]);
    expect(stored(session.id)).toEqual([
      { role: 'user', content: 'hi', incomplete: false },
      { role: 'assistant', content: 'Hello', incomplete: false },
    ]);
    expect(relay.sessionId).toBe(session.id);
    expect(relay.status).toBe('idle');
  });

  test('stores the user message before contacting the agent', async () => {
    gateway.reply('ok');

    await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'first question' });

    expect(gateway.sends).toHaveLength(1);
    expect(gateway.sends[0].storedBefore).toEqual(['first question']);
  });

  test('uses the bound session and forwards the thread id', async () => {
    const session = sessions.resolve(undefined, 'a1');
    relay.bind(session.id);
    gateway.stream.push({ type: 'thread', threadId: 't-2' });
    gateway.reply('sure');

    await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'again', threadId: 't-1' });

    expect(gateway.sends[0]).toMatchObject({ agentId: 'a1', sessionId: session.id, threadId: 't-1' });
    expect(frames.map((f) => f.type)).toEqual(['thread', 'fragment', 'done']);
    expect(frames[0]).toEqual({ type: 'thread', threadId: 't-2' });
  });

  test('sends the agent the session agent rather than the frame agent', async () => {
    const session = sessions.resolve(undefined, 'a1');
    gateway.reply('ok');

    await relay.handleMessage({ type: 'message', sessionId: session.id, agentId: 'other', text: 'hi' });

    expect(gateway.sends[0].agentId).toBe('a1');
  });

  test('answers busy to a message sent while a reply is streaming', async () => {
    gateway.stream.push({ type: 'fragment', text: 'working' });
    const first = relay.handleMessage({ type: 'message', agentId: 'a1', text: 'one' });

    expect(relay.status).toBe('awaiting-response');
    const second = await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'two' });

    expect(second).toBe('busy');
    expect(direct).toContainEqual({ type: 'busy' });
    expect(published.map((p) => p.frame)).not.toContainEqual({ type: 'busy' });
    expect(gateway.sends).toHaveLength(1);

    gateway.stream.end();
    expect(await first).toBe('completed');
    const [session] = store.listSessions();
    expect(stored(session.id).map((m) => m.content)).toEqual(['one', 'working']);
  });

  test('accepts the next message once the reply has finished', async () => {
    gateway.reply('one');
    await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'q1' });

    gateway.stream = new FrameQueue<AgentStreamEvent>();
    gateway.reply('two');
    const outcome = await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'q2' });

    expect(outcome).toBe('completed');
    const [session] = store.listSessions();
    expect(stored(session.id).map((m) => m.content)).toEqual(['q1', 'one', 'q2', 'two']);
    expect(gateway.sends.map((s) => s.sessionId)).toEqual([session.id, session.id]);
    expect(frames.filter((f) => f.type === 'session')).toHaveLength(1);
  });

  test('stores the partial reply as incomplete when the stream fails', async () => {
    gateway.stream.push({ type: 'fragment', text: 'Hel' });
    gateway.stream.push({ type: 'fragment', text: 'lo' });
    gateway.stream.fail(new GatewayError('Agent stream closed before completion (code 1006)'));

    const outcome = await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' });

    expect(outcome).toBe('failed');
    const [session] = store.listSessions();
    expect(stored(session.id)).toEqual([
      { role: 'user', content: 'hi', incomplete: false },
      { role: 'assistant', content: 'Hello', incomplete: true },
    ]);
    expect(frames.at(-1)).toEqual({ type: 'error', reason: 'Agent stream closed before completion (code 1006)' });
    expect(relay.status).toBe('idle');
  });

  test('sends reply frames to the session and the session frame to the sender', async () => {
    gateway.stream.push({ type: 'thread', threadId: 't-1' });
    gateway.reply('ok');

    await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' });

    const [session] = store.listSessions();
    expect(direct.map((f) => f.type)).toEqual(['session']);
    expect(published.map((p) => [p.sessionId, p.frame.type])).toEqual([
      [session.id, 'thread'],
      [session.id, 'fragment'],
      [session.id, 'done'],
    ]);
  });

  test('stores the partial reply and tells the session when the connection closes', async () => {
    gateway.stream.push({ type: 'fragment', text: 'Hel' });
    const exchange = relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' });
    await vi.waitFor(() => expect(frames).toContainEqual({ type: 'fragment', text: 'Hel' }));
    const sentBeforeClose = direct.length;

    relay.close();

    expect(await exchange).toBe('cancelled');
    await relay.settled();
    const [session] = store.listSessions();
    expect(stored(session.id)).toEqual([
      { role: 'user', content: 'hi', incomplete: false },
      { role: 'assistant', content: 'Hel', incomplete: true },
    ]);
    expect(direct).toHaveLength(sentBeforeClose);
    expect(published.at(-1)).toEqual({
      sessionId: session.id,
      frame: { type: 'error', reason: 'Agent stream cancelled' },
    });
  });

  test('rejects a message whose user write fails without contacting the agent', async () => {
    const session = sessions.resolve(undefined, 'a1');
    relay.bind(session.id);
    vi.spyOn(store, 'appendMessage').mockImplementation(() => {
      throw new StorageError('Failed to append message: disk full');
    });

    const outcome = await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' });

    expect(outcome).toBe('rejected');
    expect(direct).toEqual([{ type: 'error', reason: 'Failed to append message: disk full' }]);
    expect(published).toEqual([]);
    expect(gateway.sends).toEqual([]);
    expect(relay.status).toBe('idle');
  });

  test('reports a failed reply write and keeps the text as incomplete', async () => {
    const session = sessions.resolve(undefined, 'a1');
    relay.bind(session.id);
    const append = store.appendMessage.bind(store);
    vi.spyOn(store, 'appendMessage').mockImplementation((sessionId, role, content, options) => {
      if (role === 'assistant' && !options?.incomplete) {
        throw new StorageError('Failed to append message: disk full');
      }
      return append(sessionId, role, content, options);
    });
    gateway.reply('Hel', 'lo');

    const outcome = await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' });

    expect(outcome).toBe('failed');
    expect(published.at(-1)).toEqual({
      sessionId: session.id,
      frame: { type: 'error', reason: 'Failed to append message: disk full' },
    });
    expect(stored(session.id)).toEqual([
      { role: 'user', content: 'hi', incomplete: false },
      { role: 'assistant', content: 'Hello', incomplete: true },
    ]);
    expect(relay.status).toBe('idle');
  });

  test('still reports the error when the partial reply cannot be stored either', async () => {
    const session = sessions.resolve(undefined, 'a1');
    relay.bind(session.id);
    const append = store.appendMessage.bind(store);
    vi.spyOn(store, 'appendMessage').mockImplementation((sessionId, role, content, options) => {
      if (role === 'assistant') {
        throw new StorageError('Failed to append message: disk full');
      }
      return append(sessionId, role, content, options);
    });
    gateway.reply('Hel', 'lo');

    const outcome = await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' });

    expect(outcome).toBe('failed');
    expect(frames.at(-1)).toEqual({ type: 'error', reason: 'Failed to append message: disk full' });
    expect(stored(session.id)).toEqual([{ role: 'user', content: 'hi', incomplete: false }]);
    expect(relay.status).toBe('idle');
  });

  test('rejects a message for an unknown session without storing anything', async () => {
    const outcome = await relay.handleMessage({ type: 'message', sessionId: 'missing', agentId: 'a1', text: 'hi' });

    expect(outcome).toBe('rejected');
    expect(frames).toEqual([{ type: 'error', reason: 'Session not found: missing' }]);
    expect(store.listSessions()).toEqual([]);
    expect(gateway.sends).toEqual([]);
  });

  test('ignores messages after close', async () => {
    relay.close();

    expect(await relay.handleMessage({ type: 'message', agentId: 'a1', text: 'hi' })).toBe('cancelled');
    expect(frames).toEqual([]);
    expect(store.listSessions()).toEqual([]);
  });
});
