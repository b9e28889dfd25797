import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import {
  AssistantTurn,
  ChatMessage,
  GenerationOptions,
  ToolCall,
  ToolDefinition,
} from '../../core/entities/Chat.js';
import { BackendInvocationError } from '../../core/errors.js';
import { IModelBackend } from '../../core/interfaces/IModelBackend.js';
import { BackendResult, fail, ok } from '../../core/result.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import {
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  isRetryableError,
  withRetry,
} from '../../utils/retry.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

const OllamaToolCallSchema = z.object({
  function: z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).default({}),
  }),
});

const OllamaMessageSchema = z.object({
  role: z.string().default('assistant'),
  content: z.string().default(''),
  tool_calls: z.array(OllamaToolCallSchema).optional(),
});

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  created_at: z.string().optional(),
  message: OllamaMessageSchema.optional(),
  done: z.boolean().default(false),
  error: z.string().optional(),
});

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).default([]),
});

export type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;

/**
 * Sampling defaults sent with every request; temperature comes from the turn
 */
const BASE_OPTIONS = {
  num_ctx: 4096,
  num_predict: 1024,
  top_k: 40,
  top_p: 0.9,
  repeat_penalty: 1.05,
};

/**
 * Local model backend talking to an Ollama server
 */
export class OllamaApiClient implements IModelBackend {
  readonly kind = 'local' as const;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;
  private fetchFn: FetchFn;
  private logger: Logger;

  constructor(
    private apiUrl: string,
    readonly modelName: string,
    options: {
      circuitBreaker?: CircuitBreaker;
      retryConfig?: RetryConfig;
      fetchFn?: FetchFn;
      logger?: Logger;
    } = {}
  ) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
    this.circuitBreaker = options.circuitBreaker || new CircuitBreaker(5, 60000);
    this.retryConfig = {
      shouldRetry: isRetryableError,
      ...(options.retryConfig || DEFAULT_RETRY_CONFIG),
    };
    this.fetchFn = options.fetchFn || fetch;
    this.logger = options.logger || silentLogger;
  }

  async invoke(messages: ChatMessage[], options: GenerationOptions): Promise<BackendResult<string>> {
    const turn = await this.chat(messages, options);
    return turn.ok ? ok(turn.value.content) : turn;
  }

  async invokeWithTools(
    messages: ChatMessage[],
    tools: ToolDefinition[],
    options: GenerationOptions
  ): Promise<BackendResult<AssistantTurn>> {
    return this.chat(messages, options, tools);
  }

  async *stream(
    messages: ChatMessage[],
    options: GenerationOptions
  ): AsyncGenerator<BackendResult<unknown>, void, undefined> {
    let response: Response;
    try {
      response = await this.post('/api/chat', this.chatBody(messages, options, true));
    } catch (error) {
      yield fail(BackendInvocationError.from(error, this.kind));
      return;
    }

    const decoder = new TextDecoder();
    let buffer = '';

    try {
      for await (const part of response.body) {
        buffer += typeof part === 'string' ? part : decoder.decode(part, { stream: true });

        let newline = buffer.indexOf('\n');
        while (newline >= 0) {
          const line = buffer.slice(0, newline).trim();
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf('\n');

          if (line) {
            const event = this.parseStreamLine(line);
            yield event;
            if (!event.ok) return;
          }
        }
      }

      const rest = (buffer + decoder.decode()).trim();
      if (rest) {
        yield this.parseStreamLine(rest);
      }
    } catch (error) {
      yield fail(BackendInvocationError.from(error, this.kind));
    }
  }

  async listModels(): Promise<string[]> {
    const response = await withRetry(
      async () => {
        const res = await this.fetchFn(`${this.apiUrl}/api/tags`, {
          method: 'GET',
          headers: { 'Content-Type': 'application/json' },
        });
        if (!res.ok) throw new Error(`HTTP error! status: ${res.status}`);
        return res;
      },
      { ...this.retryConfig, maxAttempts: 2 }
    );

    const data = OllamaTagsSchema.parse(await response.json());
    return data.models.map((model) => model.name);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch (error) {
      this.logger.debug(`Ollama health check failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }

  getCircuitBreakerStats() {
    return this.circuitBreaker.getStats();
  }

  private async chat(
    messages: ChatMessage[],
    options: GenerationOptions,
    tools?: ToolDefinition[]
  ): Promise<BackendResult<AssistantTurn>> {
    try {
      const response = await this.post('/api/chat', this.chatBody(messages, options, false, tools));
      const data = OllamaChatResponseSchema.parse(await response.json());

      if (data.error) {
        return fail(new BackendInvocationError(data.error, this.kind));
      }

      return ok({
        content: data.message?.content ?? '',
        toolCalls: toToolCalls(data.message?.tool_calls),
      });
    } catch (error) {
      return fail(BackendInvocationError.from(error, this.kind));
    }
  }

  private parseStreamLine(line: string): BackendResult<unknown> {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      return fail(
        new BackendInvocationError(`Malformed stream line from Ollama: ${line.substring(0, 80)}`, this.kind, {
          cause: error,
        })
      );
    }

    const parsed = OllamaChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      // Hand unknown shapes to the normalizer untouched
      return ok(json);
    }
    if (parsed.data.error) {
      return fail(new BackendInvocationError(parsed.data.error, this.kind));
    }

    return ok({
      content: parsed.data.message?.content ?? '',
      tool_calls: parsed.data.message?.tool_calls ?? [],
      done: parsed.data.done,
    });
  }

  private chatBody(
    messages: ChatMessage[],
    options: GenerationOptions,
    stream: boolean,
    tools?: ToolDefinition[]
  ) {
    return {
      model: this.modelName,
      messages: messages.map(toOllamaMessage),
      stream,
      ...(tools && tools.length > 0
        ? { tools: tools.map((tool) => ({ type: 'function', function: tool })) }
        : {}),
      options: {
        ...BASE_OPTIONS,
        temperature: options.temperature,
      },
      keep_alive: '10m',
    };
  }

  private async post(path: string, body: unknown): Promise<Response> {
    return this.circuitBreaker.execute(async () => {
      return withRetry(
        async () => {
          const res = await this.fetchFn(`${this.apiUrl}${path}`, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
            },
            body: JSON.stringify(body),
          });

          if (!res.ok) {
            const detail = await res.text().catch(() => '');
            throw new Error(`HTTP error! status: ${res.status}${detail ? ` ${detail}` : ''}`);
          }

          return res;
        },
        this.retryConfig,
        (log) => {
          if (!log.success) {
            this.logger.warn('Ollama request attempt failed', {
              attempt: log.attempt,
              error: log.error,
              next_retry_in_ms: log.nextRetryInMs,
            });
          }
        }
      );
    });
  }
}

function toOllamaMessage(message: ChatMessage) {
  return {
    role: message.role,
    content: message.content,
    ...(message.toolCalls && message.toolCalls.length > 0
      ? {
          tool_calls: message.toolCalls.map((call) => ({
            function: { name: call.name, arguments: call.arguments },
          })),
        }
      : {}),
    ...(message.role === 'tool' && message.name ? { tool_name: message.name } : {}),
  };
}

function toToolCalls(calls: z.infer<typeof OllamaToolCallSchema>[] | undefined): ToolCall[] {
  return (calls ?? []).map((call, index) => ({
    id: `call_${index}`,
    name: call.function.name,
    arguments: call.function.arguments,
  }));
}
