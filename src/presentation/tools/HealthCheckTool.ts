import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ChatbotService } from '../../application/services/ChatbotService.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { OllamaApiClient } from '../../infrastructure/http/OllamaApiClient.js';

export interface HealthCheckDeps {
  chatbot: ChatbotService;
  ollamaClient?: OllamaApiClient;
  dbConnection?: DatabaseConnection;
}

interface ComponentHealth {
  status: 'healthy' | 'error' | 'disabled';
  message: string;
  [detail: string]: unknown;
}

export async function handleHealthCheck({
  chatbot,
  ollamaClient,
  dbConnection,
}: HealthCheckDeps): Promise<CallToolResult> {
  try {
    let status: 'healthy' | 'degraded' = 'healthy';
    const modelStatus = await chatbot.getStatus();

    const model: ComponentHealth = modelStatus.healthy
      ? { status: 'healthy', message: `${modelStatus.backend} backend reachable (${modelStatus.model})` }
      : { status: 'error', message: `${modelStatus.backend} backend unreachable (${modelStatus.model})` };
    if (!modelStatus.healthy) status = 'degraded';

    let database: ComponentHealth = { status: 'disabled', message: 'Transcript archive is off' };
    if (dbConnection) {
      try {
        const stats = dbConnection.getStatistics();
        database = {
          status: 'healthy',
          message: `Database connected - ${stats.totalMessages} messages in ${stats.totalSessions} sessions`,
          statistics: stats,
        };
      } catch (error) {
        database = { status: 'error', message: error instanceof Error ? error.message : String(error) };
        status = 'degraded';
      }
    }

    const health = {
      timestamp: new Date().toISOString(),
      status,
      components: {
        model,
        database,
        ...(ollamaClient
          ? {
              circuitBreaker: {
                state: ollamaClient.getCircuitBreakerState(),
                stats: ollamaClient.getCircuitBreakerStats(),
              },
            }
          : {}),
        sessions: {
          count: modelStatus.sessions,
          totalMessages: modelStatus.messages,
        },
        search: { enabled: modelStatus.search },
        cache: modelStatus.cache,
      },
    };

    return {
      content: [
        {
          type: 'text',
          text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
        },
      ],
    };
  } catch (error) {
    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `Health check error: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, deps: HealthCheckDeps) {
  server.tool(
    'health-check',
    'Check the health of the chatbot service (model backend reachability, archive status, circuit breaker state)',
    {},
    async () => handleHealthCheck(deps)
  );
}
