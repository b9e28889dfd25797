import { ChatbotService } from '../src/application/services/ChatbotService.js';
import { ConversationFlow } from '../src/application/services/ConversationFlow.js';
import { ConversationManagerRegistry } from '../src/application/services/ConversationManagerRegistry.js';
import { SessionRegistry } from '../src/application/services/SessionRegistry.js';
import { ok } from '../src/core/result.js';
import { FakeBackend, backendError, collect } from './helpers/fakes.js';

describe('ConversationFlow', () => {
  let backend: FakeBackend;
  let conversations: ConversationManagerRegistry;
  let flow: ConversationFlow;

  beforeEach(() => {
    backend = new FakeBackend();
    conversations = new ConversationManagerRegistry();
    flow = new ConversationFlow(
      new ChatbotService(backend, new SessionRegistry(), { chatbotName: 'Nova' }),
      conversations
    );
  });

  it('streams a turn and mirrors both messages', async () => {
    backend.streamSteps = [ok('Hi '), ok('there')];

    const chunks = await collect(flow.streamTurn('s1', 'Hello', { responseType: 'creative' }));

    expect(chunks).toEqual(['Hi ', 'there']);
    const messages = conversations.getOrCreate('s1').getMessages().messages;
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'Hello'],
      ['assistant', 'Hi there'],
    ]);
    expect(messages[0].metadata).toEqual({ response_type: 'creative' });
    expect(messages[1].metadata).toEqual({ response_type: 'creative', temperature: 1.0, search: false });
  });

  it('keeps the session style for later turns', async () => {
    backend.streamSteps = [ok('ok')];
    await collect(flow.streamTurn('s1', 'First', { responseType: 'factual' }));
    await collect(flow.streamTurn('s1', 'Second'));

    expect(backend.streamCalls[1].options).toEqual({ temperature: 0.3 });
    expect(conversations.getOrCreate('s1').getResponseStyle()).toBe('factual');
  });

  it('mirrors the error text as the assistant reply', async () => {
    backend.streamSteps = [backendError('timeout')];

    await collect(flow.streamTurn('s1', 'Hello'));

    const history = conversations.getOrCreate('s1').history();
    expect(history[1].content).toBe('Error generating response: timeout');
  });

  it('records nothing for an abandoned stream', async () => {
    backend.streamSteps = [ok('one'), ok('two')];

    for await (const chunk of flow.streamTurn('s1', 'Hello')) {
      expect(chunk).toBe('one');
      break;
    }

    expect(conversations.getOrCreate('s1').history()).toEqual([]);
  });

  it('tags a streamed user message with the style chosen for its turn', async () => {
    backend.streamSteps = [ok('ok')];

    await collect(flow.streamTurn('s1', 'Be precise', { responseType: 'factual' }));

    expect(conversations.getOrCreate('s1').getMessages().messages[0].metadata).toEqual({ response_type: 'factual' });
  });

  it('completes a non-streaming turn with confidence in the metadata', async () => {
    backend.invokeResult = ok('Answer');

    const response = await flow.completeTurn('s1', 'Question', { temperature: 0.2 });

    expect(response.message).toBe('Answer');
    expect(backend.invokeCalls[0].options).toEqual({ temperature: 0.2 });
    const messages = conversations.getOrCreate('s1').getMessages().messages;
    expect(messages[1].metadata).toEqual({
      response_type: 'standard',
      temperature: 0.2,
      search: false,
      confidence: 1,
    });
  });
});
