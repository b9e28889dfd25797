import { ChatMessage, GenerationOptions, ToolDefinition } from '../../core/entities/Chat.js';
import { IAgent } from '../../core/interfaces/IAgent.js';
import { IModelBackend } from '../../core/interfaces/IModelBackend.js';
import { ISearchTool } from '../../core/interfaces/ISearchTool.js';
import { BackendResult, ok } from '../../core/result.js';
import { Logger, silentLogger } from '../../utils/logger.js';

/**
 * Tool-calling loop bound to a single search tool.
 *
 * Each iteration asks the model for a turn with the tool on offer. A turn with tool calls
 * is followed by the searches and another iteration; a turn without is the answer. Events
 * follow the agent chunk protocol:
 *
 *   { model: { messages: [{ content, tool_calls }] } }   assistant turn
 *   { tools: { messages: [{ name, content }] } }         tool output
 */
export class SearchAgent implements IAgent {
  private readonly tool: ToolDefinition;
  private readonly logger: Logger;

  constructor(
    private backend: IModelBackend,
    private searchTool: ISearchTool,
    private options: { maxIterations?: number; logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.tool = {
      name: searchTool.name,
      description: searchTool.description,
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'The search query' },
        },
        required: ['query'],
      },
    };
  }

  async *stream(
    messages: ChatMessage[],
    options: GenerationOptions
  ): AsyncGenerator<BackendResult<unknown>, void, undefined> {
    const conversation = [...messages];
    const maxIterations = this.options.maxIterations ?? 3;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      const turn = await this.backend.invokeWithTools(conversation, [this.tool], options);
      if (!turn.ok) {
        yield turn;
        return;
      }

      const { content, toolCalls } = turn.value;
      yield ok({
        model: {
          messages: [
            {
              content,
              tool_calls: toolCalls.map((call) => ({ id: call.id, name: call.name, args: call.arguments })),
            },
          ],
        },
      });

      if (toolCalls.length === 0) {
        return;
      }

      conversation.push({ role: 'assistant', content, toolCalls });

      for (const call of toolCalls) {
        const output = await this.runTool(call.name, call.arguments);
        yield ok({ tools: { messages: [{ name: call.name, content: output }] } });
        conversation.push({ role: 'tool', content: output, toolCallId: call.id, name: call.name });
      }

      this.logger.debug(`Agent iteration ${iteration} ran ${toolCalls.length} tool call(s)`);
    }

    // Out of iterations: ask for an answer from what has been gathered so far
    const final = await this.backend.invoke(conversation, options);
    if (!final.ok) {
      yield final;
      return;
    }
    yield ok({ model: { messages: [{ content: final.value, tool_calls: [] }] } });
  }

  private async runTool(name: string, args: Record<string, unknown>): Promise<string> {
    if (name !== this.searchTool.name) {
      this.logger.warn('Model requested an unknown tool', { tool: name });
      return `Unknown tool: ${name}`;
    }

    const query = typeof args.query === 'string' ? args.query : '';
    const result = await this.searchTool.search(query);
    if (!result.ok) {
      this.logger.warn('Search failed', { query, error: result.error.message });
      return `Search failed: ${result.error.message}`;
    }
    return result.value;
  }
}
