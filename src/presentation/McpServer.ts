import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConversationFlow } from '../application/services/ConversationFlow.js';
import { ConversationManagerRegistry } from '../application/services/ConversationManagerRegistry.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { registerChatTool } from './tools/ChatTool.js';
import { HealthCheckDeps, registerHealthCheckTool } from './tools/HealthCheckTool.js';
import { registerManageConversationTool } from './tools/ManageConversationTool.js';

export interface McpServerDeps extends HealthCheckDeps {
  flow: ConversationFlow;
  conversations: ConversationManagerRegistry;
  notifyConversationUpdate?: (sessionId: string) => void;
  logger?: Logger;
}

/**
 * MCP surface over stdio exposing the chat, manage-conversation and health-check tools
 */
export class McpServer {
  private server: BaseMcpServer;
  private logger: Logger;
  private connected = false;

  constructor(
    info: { name: string; version: string },
    private deps: McpServerDeps
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.server = new BaseMcpServer({ name: info.name, version: info.version });
    this.registerTools();
  }

  private registerTools() {
    const { flow, conversations, notifyConversationUpdate } = this.deps;

    registerChatTool(this.server, flow, notifyConversationUpdate, this.logger);
    registerManageConversationTool(this.server, conversations, notifyConversationUpdate, this.logger);
    registerHealthCheckTool(this.server, this.deps);
  }

  /**
   * Connect the stdio transport. Stdout belongs to the protocol from here on.
   */
  async start() {
    const transport = new StdioServerTransport();

    // Add stdio error handling to prevent unexpected disconnections
    process.stdin.on('error', (error) => {
      this.logger.warn('stdin error (non-fatal)', { error });
    });

    process.stdout.on('error', (error) => {
      this.logger.warn('stdout error (non-fatal)', { error });
    });

    process.stdin.on('end', () => {
      this.logger.warn('stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    this.connected = true;
    this.logger.info('MCP server running on stdio');
  }

  async close() {
    if (this.connected) {
      await this.server.close();
      this.connected = false;
    }
  }
}
