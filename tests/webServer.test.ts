import fetch from 'node-fetch';
import WebSocket from 'ws';
import { ChatbotService } from '../src/application/services/ChatbotService.js';
import { ConversationFlow } from '../src/application/services/ConversationFlow.js';
import { ConversationManagerRegistry } from '../src/application/services/ConversationManagerRegistry.js';
import { SessionRegistry } from '../src/application/services/SessionRegistry.js';
import { ok } from '../src/core/result.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { FakeBackend } from './helpers/fakes.js';

interface SocketEvent {
  type: string;
  [key: string]: unknown;
}

function isSocketEvent(value: unknown): value is SocketEvent {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

/**
 * Collect socket events until one of the given type arrives
 */
function eventsUntil(ws: WebSocket, type: string): Promise<SocketEvent[]> {
  return new Promise((resolve, reject) => {
    const events: SocketEvent[] = [];
    ws.on('message', (data) => {
      const event: unknown = JSON.parse(data.toString());
      if (!isSocketEvent(event)) return;
      events.push(event);
      if (event.type === type) resolve(events);
    });
    ws.on('error', reject);
  });
}

describe('WebServer', () => {
  let backend: FakeBackend;
  let conversations: ConversationManagerRegistry;
  let server: WebServer;
  let baseUrl: string;
  let port: number;

  beforeEach(async () => {
    backend = new FakeBackend();
    conversations = new ConversationManagerRegistry();
    const chatbot = new ChatbotService(backend, new SessionRegistry(), { chatbotName: 'Nova' });
    server = new WebServer({
      flow: new ConversationFlow(chatbot, conversations),
      conversations,
      chatbot,
      ui: {
        pageTitle: 'Nova Chat',
        layout: 'centered',
        appTitle: 'Talk to Nova',
        appMessage: 'Ask me anything.',
        chatbotName: 'Nova',
      },
    });
    port = await server.start(0);
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  function postJson(path: string, body: unknown, method = 'POST') {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('binds an ephemeral port', () => {
    expect(port).toBeGreaterThan(0);
    expect(server.getPort()).toBe(port);
  });

  it('serves the UI configuration', async () => {
    const res = await fetch(`${baseUrl}/api/ui-config`);

    expect(await res.json()).toEqual({
      success: true,
      data: {
        pageTitle: 'Nova Chat',
        layout: 'centered',
        appTitle: 'Talk to Nova',
        appMessage: 'Ask me anything.',
        chatbotName: 'Nova',
        responseTypes: ['standard', 'creative', 'factual'],
        search: false,
      },
    });
  });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.data).toMatchObject({ backend: 'local', model: 'fake-model', healthy: true });
  });

  it('answers a chat turn and records it', async () => {
    backend.invokeResult = ok('Hello from Nova');

    const res = await postJson('/api/chat', { session_id: 's1', message: 'Hello', response_type: 'factual' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: {
        message: 'Hello from Nova',
        confidence: 1,
        responseType: 'factual',
        metadata: { temperature: 0.3, session_id: 's1', model: 'fake-model', backend: 'local' },
      },
    });

    const history = await (await fetch(`${baseUrl}/api/conversations/s1`)).json();
    expect(history.data.response_style).toBe('factual');
    expect(history.data.messages.map((m: { role: string; content: string }) => [m.role, m.content])).toEqual([
      ['user', 'Hello'],
      ['assistant', 'Hello from Nova'],
    ]);
  });

  it('rejects a malformed chat body', async () => {
    const res = await postJson('/api/chat', { session_id: 's1', message: 5 });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'message: Expected string, received number' });
  });

  it('rejects unparseable JSON', async () => {
    const res = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Malformed JSON body' });
  });

  it('streams a reply as plain text', async () => {
    backend.streamSteps = [ok('Hi '), ok({ content: 'there' })];

    const res = await postJson('/api/chat/stream', { session_id: 's2', message: 'Hello' });

    expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(await res.text()).toBe('Hi there');
    expect(conversations.get('s2')?.history().map((m) => m.content)).toEqual(['Hello', 'Hi there']);
  });

  it('sets, shows and clears a conversation', async () => {
    const style = await postJson('/api/conversations/s3/style', { response_type: 'creative' }, 'PUT');
    expect(await style.json()).toEqual({ success: true, data: { session_id: 's3', response_style: 'creative' } });

    await postJson('/api/chat', { session_id: 's3', message: 'Hello' });

    const sessions = await (await fetch(`${baseUrl}/api/sessions`)).json();
    expect(sessions.data).toEqual({
      active: [{ sessionId: 's3', messageCount: 2, responseStyle: 'creative' }],
      archived: [],
    });

    const cleared = await fetch(`${baseUrl}/api/conversations/s3`, { method: 'DELETE' });
    expect(await cleared.json()).toEqual({ success: true, message: 'Conversation cleared' });

    const history = await (await fetch(`${baseUrl}/api/conversations/s3`)).json();
    expect(history.data.messages).toEqual([]);
  });

  it('rejects an unknown response style', async () => {
    const res = await postJson('/api/conversations/s4/style', { response_type: 'sarcastic' }, 'PUT');

    expect(res.status).toBe(400);
    expect(conversations.get('s4')).toBeUndefined();
  });

  it('returns an empty history for an unknown session', async () => {
    const res = await fetch(`${baseUrl}/api/conversations/nobody`);

    expect(await res.json()).toEqual({
      success: true,
      data: { session_id: 'nobody', response_style: 'standard', messages: [] },
    });
  });

  it('streams chat over WebSocket', async () => {
    backend.streamSteps = [ok('Hi '), ok('there')];
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    const connected = eventsUntil(ws, 'connected');
    await connected;

    const done = eventsUntil(ws, 'done');
    ws.send(JSON.stringify({ type: 'chat', session_id: 'ws1', message: 'Hello' }));
    const events = await done;
    ws.close();

    expect(events.filter((e) => e.type === 'chunk').map((e) => e.content)).toEqual(['Hi ', 'there']);
    expect(events.find((e) => e.type === 'done')).toEqual({ type: 'done', session_id: 'ws1', message: 'Hi there' });
  });

  it('answers an invalid WebSocket message with an error event', async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    await eventsUntil(ws, 'connected');

    const failed = eventsUntil(ws, 'error');
    ws.send('{"type":"chat"}');
    const events = await failed;
    ws.close();

    expect(events[events.length - 1]).toEqual({ type: 'error', error: 'message: Required' });
  });
});
