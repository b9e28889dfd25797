#!/usr/bin/env node

/**
 * Chatbot service entry point: wires configuration, backends, services and surfaces
 */

import { ChatbotService } from './application/services/ChatbotService.js';
import { ConversationFlow } from './application/services/ConversationFlow.js';
import { ConversationManagerRegistry } from './application/services/ConversationManagerRegistry.js';
import { ResponseCache } from './application/services/ResponseCache.js';
import { SessionRegistry } from './application/services/SessionRegistry.js';
import { Config, getConfig, printConfigInfo } from './config.js';
import { IModelBackend } from './core/interfaces/IModelBackend.js';
import { SearchAgent } from './infrastructure/agent/SearchAgent.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from './infrastructure/database/repositories/ConversationRepository.js';
import { DuckDuckGoSearchClient } from './infrastructure/http/DuckDuckGoSearchClient.js';
import { HuggingFaceClient } from './infrastructure/http/HuggingFaceClient.js';
import { OllamaApiClient } from './infrastructure/http/OllamaApiClient.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { McpServer } from './presentation/McpServer.js';
import { createLogger } from './utils/logger.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from './utils/retry.js';

/**
 * The model backend is chosen once, here, and never per request
 */
function createBackend(config: Config): { backend: IModelBackend; ollamaClient?: OllamaApiClient } {
  const debug = { debug: config.server.debug };

  if (config.aiModel.backend === 'hosted') {
    return {
      backend: new HuggingFaceClient({
        repo: config.llm.repo,
        apiToken: config.llm.apiToken,
        apiEndpoint: config.llm.apiEndpoint,
        maxRetries: config.retry.maxAttempts - 1,
        logger: createLogger('HuggingFace', debug),
      }),
    };
  }

  const breakerLogger = createLogger('CircuitBreaker', debug);
  const ollamaClient = new OllamaApiClient(config.aiModel.ollamaUrl, config.aiModel.name, {
    circuitBreaker: new CircuitBreaker(5, 60000, (state, reason) => {
      breakerLogger.warn(`Circuit breaker ${state}`, { reason });
    }),
    retryConfig: {
      ...DEFAULT_RETRY_CONFIG,
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    },
    logger: createLogger('Ollama', debug),
  });
  return { backend: ollamaClient, ollamaClient };
}

async function main() {
  let webServer: WebServer | null = null;
  let mcpServer: McpServer | null = null;
  let dbConnection: DatabaseConnection | null = null;

  const config = getConfig();
  printConfigInfo(config);

  const debug = { debug: config.server.debug };
  const logger = createLogger('Main', debug);

  try {
    const { backend, ollamaClient } = createBackend(config);

    let archive: ConversationRepository | undefined;
    if (config.database.url) {
      dbConnection = new DatabaseConnection(config.database.url);
      archive = new ConversationRepository(dbConnection.getDatabase());
      logger.debug(`Transcript archive at: ${dbConnection.getDatabasePath()}`);
    }

    const agent = config.search.enabled
      ? new SearchAgent(backend, new DuckDuckGoSearchClient({ logger: createLogger('Search', debug) }), {
          maxIterations: config.search.maxIterations,
          logger: createLogger('SearchAgent', debug),
        })
      : undefined;

    const chatbot = new ChatbotService(backend, new SessionRegistry(), {
      chatbotName: config.chatbot.name,
      temperatures: config.aiModel.temperatures,
      cache: config.cache.enabled ? new ResponseCache(config.cache.maxEntries) : undefined,
      agent,
      logger: createLogger('Chatbot', debug),
    });

    const conversations = new ConversationManagerRegistry({
      archive,
      logger: createLogger('Conversation', debug),
    });
    const flow = new ConversationFlow(chatbot, conversations);

    const server = new WebServer({
      flow,
      conversations,
      chatbot,
      archive,
      ui: {
        pageTitle: config.ui.pageTitle,
        layout: config.ui.layout,
        appTitle: config.ui.appTitle,
        appMessage: config.ui.appMessage,
        chatbotName: config.chatbot.name,
      },
      logger: createLogger('WebServer', debug),
    });
    webServer = server;
    await server.start(config.ui.port);

    if (config.mcp.enabled) {
      mcpServer = new McpServer(
        { name: config.server.name, version: config.server.version },
        {
          flow,
          conversations,
          chatbot,
          ollamaClient,
          dbConnection: dbConnection ?? undefined,
          notifyConversationUpdate: (sessionId) => server.notifyConversationUpdate(sessionId),
          logger: createLogger('MCP', debug),
        }
      );
      await mcpServer.start();
    }

    if (dbConnection) {
      const stats = dbConnection.getStatistics();
      logger.info(
        `📊 Archive: ${stats.totalSessions} sessions, ${stats.totalMessages} messages, ${(stats.databaseSize / 1024).toFixed(2)} KB`
      );
    }
  } catch (error) {
    logger.error('Fatal error in main()', { error });
    await webServer?.stop();
    dbConnection?.close();
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`📛 Received ${signal}, shutting down gracefully...`);

    try {
      await mcpServer?.close();
      await webServer?.stop();
      dbConnection?.close();
    } catch (error) {
      logger.error('Error during shutdown', { error });
      process.exit(1);
    }

    logger.info('👋 Goodbye!');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('💥 Uncaught Exception', { error });
    void shutdown('UNCAUGHT_EXCEPTION');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('💥 Unhandled Rejection', { reason });
    void shutdown('UNHANDLED_REJECTION');
  });
}

main().catch((error: unknown) => {
  console.error('💥 Fatal error in main():', error);
  process.exit(1);
});
