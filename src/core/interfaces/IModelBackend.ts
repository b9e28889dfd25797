import {
  AssistantTurn,
  ChatMessage,
  GenerationOptions,
  ToolDefinition,
} from '../entities/Chat.js';
import { BackendResult } from '../result.js';

export type BackendKind = 'local' | 'hosted';

/**
 * Capability the chatbot service needs from a model server.
 * Implementations report failures through the result variant instead of throwing.
 */
export interface IModelBackend {
  readonly kind: BackendKind;
  readonly modelName: string;

  /**
   * Complete a conversation in one call
   */
  invoke(messages: ChatMessage[], options: GenerationOptions): Promise<BackendResult<string>>;

  /**
   * Stream raw chunks as the server produces them. A failure is yielded once as an
   * error result and ends the stream.
   */
  stream(messages: ChatMessage[], options: GenerationOptions): AsyncIterable<BackendResult<unknown>>;

  /**
   * One assistant turn with tools offered to the model
   */
  invokeWithTools(
    messages: ChatMessage[],
    tools: ToolDefinition[],
    options: GenerationOptions
  ): Promise<BackendResult<AssistantTurn>>;

  healthCheck(): Promise<boolean>;
}
