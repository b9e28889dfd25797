import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ChatbotService } from '../src/application/services/ChatbotService.js';
import { ConversationFlow } from '../src/application/services/ConversationFlow.js';
import { ConversationManagerRegistry } from '../src/application/services/ConversationManagerRegistry.js';
import { SessionRegistry } from '../src/application/services/SessionRegistry.js';
import { ok } from '../src/core/result.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { McpServer } from '../src/presentation/McpServer.js';
import { handleChat } from '../src/presentation/tools/ChatTool.js';
import { handleHealthCheck } from '../src/presentation/tools/HealthCheckTool.js';
import { handleManageConversation } from '../src/presentation/tools/ManageConversationTool.js';
import { FakeBackend } from './helpers/fakes.js';

function textOf(result: CallToolResult): string {
  const first = result.content[0];
  return first && first.type === 'text' ? first.text : '';
}

describe('MCP tools', () => {
  let backend: FakeBackend;
  let chatbot: ChatbotService;
  let conversations: ConversationManagerRegistry;
  let flow: ConversationFlow;

  beforeEach(() => {
    backend = new FakeBackend();
    chatbot = new ChatbotService(backend, new SessionRegistry(), { chatbotName: 'Nova' });
    conversations = new ConversationManagerRegistry();
    flow = new ConversationFlow(chatbot, conversations);
  });

  describe('chat', () => {
    it('returns the reply and notifies listeners', async () => {
      backend.invokeResult = ok('Hello from Nova');
      const notified: string[] = [];

      const result = await handleChat(flow, { message: 'Hello', session_id: 'm1' }, (id) => notified.push(id));

      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe('Hello from Nova');
      expect(notified).toEqual(['m1']);
      expect(conversations.get('m1')?.history()).toHaveLength(2);
    });

    it('uses the default session when none is given', async () => {
      await handleChat(flow, { message: 'Hello' });

      expect(conversations.get('default_session')).toBeDefined();
    });

    it('collects a streamed reply when search is requested', async () => {
      backend.streamSteps = [ok('Streamed '), ok('answer')];

      const result = await handleChat(flow, { message: 'News?', session_id: 'm2', search: true });

      expect(textOf(result)).toBe('Streamed answer');
    });
  });

  describe('manage-conversation', () => {
    it('lists, views and clears sessions', async () => {
      backend.invokeResult = ok('Hi!');
      await handleChat(flow, { message: 'Hello', session_id: 'm1' });

      expect(textOf(handleManageConversation(conversations, { session_id: 'm1', action: 'list' }))).toBe(
        '# Active Conversation Sessions\n\n- **m1**: 2 messages (standard)'
      );

      const view = textOf(handleManageConversation(conversations, { session_id: 'm1', action: 'view' }));
      expect(view.startsWith('# Conversation History for m1\n\n1. **👤 User** (')).toBe(true);
      expect(view).toContain('\nHello\n');
      expect(view).toContain('2. **🤖 Assistant** (');

      expect(textOf(handleManageConversation(conversations, { session_id: 'm1', action: 'clear' }))).toBe(
        '✓ Conversation history cleared for session ID: m1'
      );
      expect(textOf(handleManageConversation(conversations, { session_id: 'm1', action: 'view' }))).toBe(
        'No conversation history found for session ID: m1'
      );
    });

    it('reports when there are no sessions', () => {
      expect(textOf(handleManageConversation(conversations, { session_id: 'x', action: 'list' }))).toBe(
        'No active conversation sessions found.'
      );
    });

    it('reads and sets the response style', () => {
      expect(
        textOf(handleManageConversation(conversations, { session_id: 'm3', action: 'style', response_type: 'factual' }))
      ).toBe('✓ Response style for m3 set to factual');
      expect(textOf(handleManageConversation(conversations, { session_id: 'm3', action: 'style' }))).toBe(
        'Response style for m3: factual'
      );
    });
  });

  describe('health-check', () => {
    it('reports a healthy backend and the archive', async () => {
      const dbConnection = new DatabaseConnection(':memory:');
      try {
        const text = textOf(await handleHealthCheck({ chatbot, dbConnection }));
        const json: unknown = JSON.parse(text.replace('# System Health Check\n\n```json\n', '').replace(/\n```$/, ''));

        expect(json).toMatchObject({
          status: 'healthy',
          components: {
            model: { status: 'healthy', message: 'local backend reachable (fake-model)' },
            database: {
              status: 'healthy',
              message: 'Database connected - 0 messages in 0 sessions',
            },
            sessions: { count: 0, totalMessages: 0 },
            search: { enabled: false },
            cache: null,
          },
        });
      } finally {
        dbConnection.close();
      }
    });

    it('is degraded when the backend is unreachable', async () => {
      backend.healthy = false;

      const text = textOf(await handleHealthCheck({ chatbot }));

      expect(text).toContain('"status": "degraded"');
      expect(text).toContain('"message": "Transcript archive is off"');
    });
  });

  it('registers its tools on construction', () => {
    expect(
      () => new McpServer({ name: 'test-server', version: '0.0.1' }, { flow, conversations, chatbot })
    ).not.toThrow();
  });
});
