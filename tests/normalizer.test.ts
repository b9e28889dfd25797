import {
  ResponseStreamNormalizer,
  SEARCH_INDICATOR,
} from '../src/application/streaming/ResponseStreamNormalizer.js';
import { classifyChunk } from '../src/core/entities/StreamChunk.js';
import { RecordingLogger, collect } from './helpers/fakes.js';

describe('classifyChunk', () => {
  it('classifies in priority order', () => {
    expect(classifyChunk('hi').kind).toBe('text');
    expect(classifyChunk({ model: { messages: [{ content: 'a' }] } }).kind).toBe('agent-model');
    expect(classifyChunk({ messages: [{ content: 'a' }], content: 'b' }).kind).toBe('messages');
    expect(classifyChunk({ tools: { messages: [{ content: 'r' }] } }).kind).toBe('agent-tools');
    expect(classifyChunk({ content: 'a' }).kind).toBe('message');
    expect(classifyChunk({ unrecognized: 1 }).kind).toBe('unrecognized');
    expect(classifyChunk(42).kind).toBe('unrecognized');
    expect(classifyChunk(null).kind).toBe('unrecognized');
  });

  it('joins content parts', () => {
    expect(classifyChunk({ content: [{ text: 'Hel' }, { text: 'lo' }, { image: 'x' }] })).toEqual({
      kind: 'message',
      message: { content: 'Hello', hasToolCalls: false },
    });
  });

  it('detects tool calls in either spelling', () => {
    expect(classifyChunk({ content: '', tool_calls: [{ name: 'x' }] })).toEqual({
      kind: 'message',
      message: { content: '', hasToolCalls: true },
    });
    expect(classifyChunk({ content: '', toolCalls: [] })).toEqual({
      kind: 'message',
      message: { content: '', hasToolCalls: false },
    });
  });
});

describe('ResponseStreamNormalizer', () => {
  it('concatenates heterogeneous chunks and drops unrecognized ones', async () => {
    const logger = new RecordingLogger();
    const normalizer = new ResponseStreamNormalizer(logger);

    const pieces = await collect(
      normalizer.normalize(['hi', { content: 'there' }, { messages: [{ content: '!' }] }, { unrecognized: 1 }])
    );

    expect(pieces.join('')).toBe('hithere!');
    expect(normalizer.getUnrecognizedCount()).toBe(1);
    expect(logger.at('warn')).toEqual([
      {
        level: 'warn',
        message: 'Dropping unrecognized stream chunk',
        fields: { chunk_type: 'object', preview: '{"unrecognized":1}' },
      },
    ]);
  });

  it('emits the search indicator once, before the text of the chunk that triggered it', () => {
    const normalizer = new ResponseStreamNormalizer(new RecordingLogger());

    expect(normalizer.push({ model: { messages: [{ content: 'Let me check.', tool_calls: [{ name: 'internet_search' }] }] } })).toEqual([
      { kind: 'indicator', text: SEARCH_INDICATOR },
      { kind: 'text', text: 'Let me check.' },
    ]);
    expect(normalizer.push({ model: { messages: [{ content: '', tool_calls: [{ name: 'internet_search' }] }] } })).toEqual([]);
    expect(normalizer.push({ model: { messages: [{ content: 'Found it.' }] } })).toEqual([{ kind: 'text', text: 'Found it.' }]);
  });

  it('contributes nothing for tool output', () => {
    const normalizer = new ResponseStreamNormalizer(new RecordingLogger());

    expect(normalizer.push({ tools: { messages: [{ name: 'internet_search', content: 'raw results' }] } })).toEqual([]);
  });

  it('uses only the first message of a messages envelope', () => {
    const normalizer = new ResponseStreamNormalizer(new RecordingLogger());

    expect(normalizer.push({ messages: [{ content: 'first' }, { content: 'second' }] })).toEqual([{ kind: 'text', text: 'first' }]);
    expect(normalizer.push({ messages: [] })).toEqual([]);
  });

  it('skips empty text', () => {
    const normalizer = new ResponseStreamNormalizer(new RecordingLogger());

    expect(normalizer.push('')).toEqual([]);
  });

  it('accepts a custom indicator', () => {
    const normalizer = new ResponseStreamNormalizer(new RecordingLogger(), '[searching]');

    expect(normalizer.push({ content: 'ok', tool_calls: [{}] })).toEqual([
      { kind: 'indicator', text: '[searching]' },
      { kind: 'text', text: 'ok' },
    ]);
  });
});
