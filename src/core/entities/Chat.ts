import { ResponseType } from './Conversation.js';

/**
 * One turn submitted to the chatbot service
 */
export interface ChatRequest {
  userInput: string;
  responseType: ResponseType;
  sessionId: string;
  /** Overrides the temperature mapped from the response type, range [0, 1] */
  temperature?: number;
}

export interface ChatResponse {
  message: string;
  confidence: number;
  responseType: ResponseType;
  metadata: Record<string, unknown>;
}

export const DEFAULT_SESSION_ID = 'default_session';

/**
 * Messages exchanged with a model backend
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  toolCalls?: ToolCall[];
  toolCallId?: string;
  name?: string;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required: string[];
  };
}

export interface AssistantTurn {
  content: string;
  toolCalls: ToolCall[];
}

export interface GenerationOptions {
  temperature: number;
}
