/**
 * Chunk protocol spoken by streaming backends and the search agent.
 *
 * Raw chunks arrive untyped; `classifyChunk` maps each one onto this union in a fixed
 * priority order so that consumers can match exhaustively.
 */
export interface ChunkMessage {
  content: string;
  hasToolCalls: boolean;
}

export type StreamChunk =
  | { kind: 'agent-model'; messages: ChunkMessage[] }
  | { kind: 'messages'; messages: ChunkMessage[] }
  | { kind: 'agent-tools'; messages: ChunkMessage[] }
  | { kind: 'message'; message: ChunkMessage }
  | { kind: 'text'; text: string }
  | { kind: 'unrecognized'; raw: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Content is either a string or a list of parts carrying `text`
 */
function extractContent(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value
      .map((part) => {
        if (typeof part === 'string') return part;
        if (isRecord(part) && typeof part.text === 'string') return part.text;
        return '';
      })
      .join('');
  }
  return '';
}

function hasToolCalls(message: Record<string, unknown>): boolean {
  const calls = message.tool_calls ?? message.toolCalls;
  return Array.isArray(calls) && calls.length > 0;
}

function toChunkMessage(value: unknown): ChunkMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  return {
    content: extractContent(value.content),
    hasToolCalls: hasToolCalls(value),
  };
}

function toChunkMessages(value: unknown): ChunkMessage[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  return value.flatMap((item) => {
    const message = toChunkMessage(item);
    return message ? [message] : [];
  });
}

/**
 * Priority: agent model update, messages envelope, agent tool update,
 * message object with content, plain string.
 */
export function classifyChunk(raw: unknown): StreamChunk {
  if (typeof raw === 'string') {
    return { kind: 'text', text: raw };
  }

  if (!isRecord(raw)) {
    return { kind: 'unrecognized', raw };
  }

  if (isRecord(raw.model)) {
    const messages = toChunkMessages(raw.model.messages);
    if (messages) {
      return { kind: 'agent-model', messages };
    }
  }

  if ('messages' in raw) {
    const messages = toChunkMessages(raw.messages);
    if (messages) {
      return { kind: 'messages', messages };
    }
  }

  if (isRecord(raw.tools)) {
    const messages = toChunkMessages(raw.tools.messages);
    if (messages) {
      return { kind: 'agent-tools', messages };
    }
  }

  if ('content' in raw) {
    const message = toChunkMessage(raw);
    if (message) {
      return { kind: 'message', message };
    }
  }

  return { kind: 'unrecognized', raw };
}
