import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
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

export interface HuggingFaceClientOptions {
  repo: string;
  apiToken: string;
  apiEndpoint: string;
  maxRetries?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Hosted model backend: Hugging Face inference through its OpenAI-compatible router
 */
export class HuggingFaceClient implements IModelBackend {
  readonly kind = 'hosted' as const;
  readonly modelName: string;
  private client: OpenAI;
  private logger: Logger;

  constructor(options: HuggingFaceClientOptions, client?: OpenAI) {
    this.modelName = options.repo;
    this.logger = options.logger ?? silentLogger;
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiToken,
        baseURL: options.apiEndpoint,
        maxRetries: options.maxRetries ?? 2,
        timeout: options.timeoutMs ?? 120000,
      });
  }

  async invoke(messages: ChatMessage[], options: GenerationOptions): Promise<BackendResult<string>> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.modelName,
        messages: toOpenAIMessages(messages),
        temperature: options.temperature,
      });
      return ok(completion.choices[0]?.message?.content ?? '');
    } catch (error) {
      return fail(this.toError(error));
    }
  }

  async invokeWithTools(
    messages: ChatMessage[],
    tools: ToolDefinition[],
    options: GenerationOptions
  ): Promise<BackendResult<AssistantTurn>> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.modelName,
        messages: toOpenAIMessages(messages),
        temperature: options.temperature,
        tools: tools.map(toOpenAITool),
      });
      const message = completion.choices[0]?.message;
      return ok({
        content: message?.content ?? '',
        toolCalls: parseToolCalls(message?.tool_calls),
      });
    } catch (error) {
      return fail(this.toError(error));
    }
  }

  async *stream(
    messages: ChatMessage[],
    options: GenerationOptions
  ): AsyncGenerator<BackendResult<unknown>, void, undefined> {
    try {
      const stream = await this.client.chat.completions.create({
        model: this.modelName,
        messages: toOpenAIMessages(messages),
        temperature: options.temperature,
        stream: true,
      });

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta;
        if (!delta) continue;
        yield ok({
          content: delta.content ?? '',
          tool_calls: delta.tool_calls ?? [],
        });
      }
    } catch (error) {
      yield fail(this.toError(error));
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      this.logger.debug(
        `Hugging Face health check failed: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }

  private toError(error: unknown): BackendInvocationError {
    if (error instanceof OpenAI.APIError) {
      return new BackendInvocationError(
        `Hugging Face request failed (${error.status ?? 'no status'}): ${error.message}`,
        this.kind,
        { cause: error }
      );
    }
    return BackendInvocationError.from(error, this.kind);
  }
}

export function toOpenAIMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function',
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: message.content };
      case 'tool':
        return {
          role: 'tool',
          content: message.content,
          tool_call_id: message.toolCallId ?? '',
        };
    }
  });
}

function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

const ToolArgumentsSchema = z.record(z.unknown());

/**
 * Tool call arguments arrive as a JSON string; unparseable text is kept as the query
 */
export function parseToolCalls(calls: ChatCompletionMessageToolCall[] | undefined): ToolCall[] {
  return (calls ?? []).map((call) => {
    let args: Record<string, unknown>;
    try {
      const parsed = ToolArgumentsSchema.safeParse(JSON.parse(call.function.arguments));
      args = parsed.success ? parsed.data : { query: call.function.arguments };
    } catch {
      args = { query: call.function.arguments };
    }
    return { id: call.id, name: call.function.name, arguments: args };
  });
}
