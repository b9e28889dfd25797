import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ConversationManagerRegistry } from '../../application/services/ConversationManagerRegistry.js';
import { ResponseType } from '../../core/entities/Conversation.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export type ConversationAction = 'view' | 'clear' | 'list' | 'style';

export interface ManageConversationArgs {
  session_id: string;
  action: ConversationAction;
  response_type?: ResponseType;
}

function text(value: string): CallToolResult {
  return { content: [{ type: 'text', text: value }] };
}

export function handleManageConversation(
  conversations: ConversationManagerRegistry,
  { session_id, action, response_type }: ManageConversationArgs,
  notifyConversationUpdate?: (sessionId: string) => void,
  logger: Logger = silentLogger
): CallToolResult {
  try {
    switch (action) {
      case 'list': {
        const sessionList = conversations
          .list()
          .map((s) => `- **${s.sessionId}**: ${s.messageCount} messages (${s.responseStyle})`)
          .join('\n');

        return text(
          sessionList.length > 0
            ? `# Active Conversation Sessions\n\n${sessionList}`
            : 'No active conversation sessions found.'
        );
      }

      case 'view': {
        const history = conversations.get(session_id)?.history() ?? [];
        if (history.length === 0) {
          return text(`No conversation history found for session ID: ${session_id}`);
        }

        const historyText = history
          .map((msg, idx) => {
            const role = msg.role === 'user' ? '👤 User' : '🤖 Assistant';
            return `${idx + 1}. **${role}** (${msg.timestamp})\n${msg.content}\n`;
          })
          .join('\n---\n\n');

        return text(`# Conversation History for ${session_id}\n\n${historyText}`);
      }

      case 'clear': {
        conversations.get(session_id)?.clear();
        notifyConversationUpdate?.(session_id);
        return text(`✓ Conversation history cleared for session ID: ${session_id}`);
      }

      case 'style': {
        const manager = conversations.getOrCreate(session_id);
        if (!response_type) {
          return text(`Response style for ${session_id}: ${manager.getResponseStyle()}`);
        }
        manager.setResponseStyle(response_type);
        return text(`✓ Response style for ${session_id} set to ${response_type}`);
      }
    }
  } catch (error) {
    logger.error('Error managing conversation', { session_id, error });
    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `Error managing conversation: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }
}

/**
 * Register the manage-conversation tool
 */
export function registerManageConversationTool(
  server: McpServer,
  conversations: ConversationManagerRegistry,
  notifyConversationUpdate?: (sessionId: string) => void,
  logger: Logger = silentLogger
) {
  server.tool(
    'manage-conversation',
    'Manage conversation history - view, clear, list sessions, or read/set the response style',
    {
      session_id: z.string().describe('The session ID to manage'),
      action: z
        .enum(['view', 'clear', 'list', 'style'])
        .describe(
          "Action to perform: 'view' to see history, 'clear' to reset, 'list' to see all sessions, 'style' to read or set the response style"
        ),
      response_type: z
        .enum(['standard', 'creative', 'factual'])
        .optional()
        .describe("New response style, used with action 'style'"),
    },
    async (args: ManageConversationArgs) => handleManageConversation(conversations, args, notifyConversationUpdate, logger)
  );
}
