import { ChatMessage, ChatRequest, ChatResponse, GenerationOptions } from '../../core/entities/Chat.js';
import { ResponseType } from '../../core/entities/Conversation.js';
import { BackendInvocationError, EmptyInputError } from '../../core/errors.js';
import { IAgent } from '../../core/interfaces/IAgent.js';
import { IModelBackend } from '../../core/interfaces/IModelBackend.js';
import { BackendResult } from '../../core/result.js';
import { TemplateFactory } from '../../core/templates/TemplateFactory.js';
import { PromptTemplate } from '../../core/templates/types.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { ResponseStreamNormalizer } from '../streaming/ResponseStreamNormalizer.js';
import { ResponseCache } from './ResponseCache.js';
import { SessionHistory } from './SessionHistory.js';
import { SessionRegistry } from './SessionRegistry.js';

export const ERROR_PREFIX = 'Error generating response:';

export const DEFAULT_TEMPERATURES: Readonly<Record<ResponseType, number>> = {
  standard: 0.7,
  factual: 0.3,
  creative: 1.0,
};

export interface ChatbotServiceOptions {
  chatbotName: string;
  temperatures?: Record<ResponseType, number>;
  cache?: ResponseCache;
  agent?: IAgent;
  logger?: Logger;
}

type StreamOpener = (
  messages: ChatMessage[],
  options: GenerationOptions
) => AsyncIterable<BackendResult<unknown>>;

/**
 * Service for answering chat turns.
 *
 * Every failure, whether returned by the backend or thrown, is turned into a textual
 * reply here; callers never see an exception from this class.
 */
export class ChatbotService {
  private readonly logger: Logger;
  private readonly temperatures: Record<ResponseType, number>;
  private readonly personaTemplate: PromptTemplate;
  private readonly searchTemplate: PromptTemplate;

  constructor(
    private backend: IModelBackend,
    private sessions: SessionRegistry,
    private options: ChatbotServiceOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.temperatures = { ...DEFAULT_TEMPERATURES, ...options.temperatures };
    this.personaTemplate = TemplateFactory.getTemplate('persona');
    this.searchTemplate = TemplateFactory.getTemplate('search');
  }

  /**
   * Temperature for a turn, within [0, 1]: an explicit override wins over the style mapping
   */
  resolveTemperature(responseType: ResponseType, override?: number): number {
    const temperature =
      override !== undefined && Number.isFinite(override) ? override : this.temperatures[responseType];
    return Math.min(1, Math.max(0, temperature));
  }

  hasSearch(): boolean {
    return this.options.agent !== undefined;
  }

  getModelName(): string {
    return this.backend.modelName;
  }

  /**
   * Backend reachability plus in-memory session and cache figures
   */
  async getStatus() {
    return {
      backend: this.backend.kind,
      model: this.backend.modelName,
      healthy: await this.backend.healthCheck(),
      search: this.hasSearch(),
      sessions: this.sessions.size,
      messages: this.sessions.getTotalMessages(),
      cache: this.options.cache?.getStats() ?? null,
    };
  }

  /**
   * Non-streaming reply
   */
  async respond(request: ChatRequest): Promise<ChatResponse> {
    const prompt = this.personaTemplate.build(
      request.userInput,
      request.responseType,
      this.options.chatbotName
    );
    if (prompt === null) {
      return this.emptyInputResponse(request);
    }

    const temperature = this.resolveTemperature(request.responseType, request.temperature);

    try {
      const history = this.sessions.getOrCreate(request.sessionId);
      const cacheKey = ResponseCache.key(prompt, temperature, request.sessionId);
      const cached = this.options.cache?.get(cacheKey);

      if (cached !== undefined) {
        this.logger.debug(`Cache hit for session ${request.sessionId}`);
        this.recordTurn(history, request, cached);
        return this.successResponse(request, cached, temperature, { cached: true });
      }

      const result = await this.backend.invoke(this.composeMessages(history, prompt), {
        temperature,
      });

      if (!result.ok) {
        return this.failureResponse(request, result.error);
      }

      this.recordTurn(history, request, result.value);
      this.options.cache?.set(cacheKey, result.value);
      return this.successResponse(request, result.value, temperature);
    } catch (error) {
      return this.failureResponse(request, BackendInvocationError.from(error, this.backend.kind));
    }
  }

  /**
   * Streaming reply. Lazy, finite and single-use: the consumer pulls chunks and may stop
   * at any time, in which case nothing is recorded for the turn.
   */
  async *respondStream(request: ChatRequest): AsyncGenerator<string, void, undefined> {
    const prompt = this.personaTemplate.build(
      request.userInput,
      request.responseType,
      this.options.chatbotName
    );
    if (prompt === null) {
      yield new EmptyInputError().message;
      return;
    }

    yield* this.streamTurn(request, prompt, (messages, options) =>
      this.backend.stream(messages, options)
    );
  }

  /**
   * Streaming reply through the search agent. The agent decides per turn whether to search.
   */
  async *respondWithSearch(request: ChatRequest): AsyncGenerator<string, void, undefined> {
    const agent = this.options.agent;
    if (!agent) {
      this.logger.warn('Search requested but no search agent is configured', {
        session_id: request.sessionId,
      });
      yield* this.respondStream(request);
      return;
    }

    const prompt = this.searchTemplate.build(
      request.userInput,
      request.responseType,
      this.options.chatbotName
    );
    if (prompt === null) {
      yield new EmptyInputError().message;
      return;
    }

    yield* this.streamTurn(request, prompt, (messages, options) => agent.stream(messages, options));
  }

  private async *streamTurn(
    request: ChatRequest,
    prompt: string,
    open: StreamOpener
  ): AsyncGenerator<string, void, undefined> {
    const temperature = this.resolveTemperature(request.responseType, request.temperature);
    const normalizer = new ResponseStreamNormalizer(this.logger);
    let reply = '';

    try {
      const history = this.sessions.getOrCreate(request.sessionId);
      const source = open(this.composeMessages(history, prompt), { temperature });

      for await (const event of source) {
        if (!event.ok) {
          yield this.failureText(request, event.error);
          return;
        }
        for (const piece of normalizer.push(event.value)) {
          if (piece.kind === 'text') {
            reply += piece.text;
          }
          yield piece.text;
        }
      }

      this.recordTurn(history, request, reply);
      this.logger.debug(
        `Stream finished for session ${request.sessionId} (${reply.length} chars, ${normalizer.getUnrecognizedCount()} dropped chunks)`
      );
    } catch (error) {
      yield this.failureText(request, BackendInvocationError.from(error, this.backend.kind));
    }
  }

  private composeMessages(history: SessionHistory, prompt: string): ChatMessage[] {
    const messages: ChatMessage[] = history.messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
    messages.push({ role: 'user', content: prompt });
    return messages;
  }

  private recordTurn(history: SessionHistory, request: ChatRequest, reply: string): void {
    history.append('user', request.userInput, { response_type: request.responseType });
    history.append('assistant', reply, { model: this.backend.modelName });
  }

  private emptyInputResponse(request: ChatRequest): ChatResponse {
    const error = new EmptyInputError();
    return {
      message: error.message,
      confidence: 0,
      responseType: request.responseType,
      metadata: { error: error.code },
    };
  }

  private successResponse(
    request: ChatRequest,
    message: string,
    temperature: number,
    extra: Record<string, unknown> = {}
  ): ChatResponse {
    return {
      message,
      confidence: 1,
      responseType: request.responseType,
      metadata: {
        temperature,
        session_id: request.sessionId,
        model: this.backend.modelName,
        backend: this.backend.kind,
        ...extra,
      },
    };
  }

  private failureResponse(request: ChatRequest, error: BackendInvocationError): ChatResponse {
    return {
      message: this.failureText(request, error),
      confidence: 0,
      responseType: request.responseType,
      metadata: { error: error.message },
    };
  }

  private failureText(request: ChatRequest, error: BackendInvocationError): string {
    this.logger.error('Model backend call failed', {
      session_id: request.sessionId,
      backend: error.backend,
      model: this.backend.modelName,
      error: error.message,
    });
    return `${ERROR_PREFIX} ${error.message}`;
  }
}
