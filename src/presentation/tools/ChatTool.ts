import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ConversationFlow } from '../../application/services/ConversationFlow.js';
import { DEFAULT_SESSION_ID } from '../../core/entities/Chat.js';
import { ResponseType } from '../../core/entities/Conversation.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface ChatToolArgs {
  message: string;
  session_id?: string;
  response_type?: ResponseType;
  search?: boolean;
}

/**
 * Run one chat turn and return the full reply as tool output
 */
export async function handleChat(
  flow: ConversationFlow,
  args: ChatToolArgs,
  notifyConversationUpdate?: (sessionId: string) => void,
  logger: Logger = silentLogger
): Promise<CallToolResult> {
  const sessionId = args.session_id || DEFAULT_SESSION_ID;

  try {
    let reply: string;
    if (args.search) {
      reply = '';
      for await (const chunk of flow.streamTurn(sessionId, args.message, {
        responseType: args.response_type,
        search: true,
      })) {
        reply += chunk;
      }
    } else {
      const response = await flow.completeTurn(sessionId, args.message, {
        responseType: args.response_type,
      });
      reply = response.message;
    }

    notifyConversationUpdate?.(sessionId);

    return {
      content: [{ type: 'text', text: reply }],
    };
  } catch (error) {
    logger.error('Error in chat tool', { session_id: sessionId, error });
    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `Error in chat tool: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }
}

/**
 * Register the chat tool
 */
export function registerChatTool(
  server: McpServer,
  flow: ConversationFlow,
  notifyConversationUpdate?: (sessionId: string) => void,
  logger: Logger = silentLogger
) {
  server.tool(
    'chat',
    'Send a message to the chatbot and get its reply. Keeps per-session history.',
    {
      message: z.string().describe('The user message'),
      session_id: z
        .string()
        .optional()
        .describe(`Conversation session ID (default: ${DEFAULT_SESSION_ID})`),
      response_type: z
        .enum(['standard', 'creative', 'factual'])
        .optional()
        .describe('Response style; stays in effect for the session once set'),
      search: z.boolean().optional().describe('Let the assistant search the web before answering'),
    },
    async (args: ChatToolArgs) => handleChat(flow, args, notifyConversationUpdate, logger)
  );
}
