import { ChatMessage, GenerationOptions } from '../entities/Chat.js';
import { BackendResult } from '../result.js';

/**
 * A model-driven loop that may call tools before answering.
 * Emits raw agent events in the stream chunk protocol.
 */
export interface IAgent {
  stream(messages: ChatMessage[], options: GenerationOptions): AsyncIterable<BackendResult<unknown>>;
}
