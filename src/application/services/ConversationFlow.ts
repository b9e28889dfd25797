import { ChatRequest, ChatResponse } from '../../core/entities/Chat.js';
import { ResponseType } from '../../core/entities/Conversation.js';
import { ChatbotService } from './ChatbotService.js';
import { ConversationManagerRegistry } from './ConversationManagerRegistry.js';

export interface TurnOptions {
  responseType?: ResponseType;
  temperature?: number;
  search?: boolean;
}

/**
 * One UI chat turn: ask the chatbot, then mirror the user message and the reply.
 * A stream its consumer abandons leaves the conversation untouched.
 */
export class ConversationFlow {
  constructor(
    private chatbotService: ChatbotService,
    private conversations: ConversationManagerRegistry
  ) {}

  async *streamTurn(
    sessionId: string,
    userInput: string,
    options: TurnOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    const { request, manager } = this.begin(sessionId, userInput, options);
    const stream = options.search
      ? this.chatbotService.respondWithSearch(request)
      : this.chatbotService.respondStream(request);

    let reply = '';
    for await (const chunk of stream) {
      reply += chunk;
      yield chunk;
    }

    manager.addUserMessage(userInput);
    manager.addAssistantMessage(reply, this.replyMetadata(request, options));
  }

  async completeTurn(
    sessionId: string,
    userInput: string,
    options: TurnOptions = {}
  ): Promise<ChatResponse> {
    const { request, manager } = this.begin(sessionId, userInput, options);
    manager.addUserMessage(userInput);
    const response = await this.chatbotService.respond(request);
    manager.addAssistantMessage(response.message, {
      ...this.replyMetadata(request, options),
      confidence: response.confidence,
    });
    return response;
  }

  private begin(sessionId: string, userInput: string, options: TurnOptions) {
    const manager = this.conversations.getOrCreate(sessionId);
    if (options.responseType) {
      manager.setResponseStyle(options.responseType);
    }

    const request: ChatRequest = {
      userInput,
      responseType: manager.getResponseStyle(),
      sessionId,
      temperature: options.temperature,
    };
    return { request, manager };
  }

  private replyMetadata(request: ChatRequest, options: TurnOptions): Record<string, unknown> {
    return {
      response_type: request.responseType,
      temperature: this.chatbotService.resolveTemperature(request.responseType, request.temperature),
      search: options.search === true,
    };
  }
}
