import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';

const TemperatureSchema = z.number().min(0, 'Temperature must be >= 0').max(1, 'Temperature must be <= 1');

// Zod validation schema
const ConfigSchema = z
  .object({
    server: z.object({
      name: z.string().min(1, 'Server name must not be empty'),
      version: z.string().min(1, 'Version must not be empty'),
      debug: z.boolean(),
    }),
    aiModel: z.object({
      name: z.string().min(1, 'AI model name is required'),
      backend: z.enum(['local', 'hosted']),
      ollamaUrl: z.string().url('Invalid Ollama URL format'),
      temperatures: z.object({
        standard: TemperatureSchema,
        factual: TemperatureSchema,
        creative: TemperatureSchema,
      }),
      defaultTemperature: TemperatureSchema,
    }),
    chatbot: z.object({
      name: z.string().min(1, 'Chatbot name is required'),
    }),
    llm: z.object({
      repo: z.string(),
      apiToken: z.string(),
      apiEndpoint: z.string().url('Invalid LLM API endpoint'),
    }),
    ui: z.object({
      pageTitle: z.string(),
      layout: z.enum(['centered', 'wide']),
      appTitle: z.string(),
      appMessage: z.string(),
      port: z.number().int().min(0).max(65535),
    }),
    cache: z.object({
      enabled: z.boolean(),
      maxEntries: z.number().int().min(1),
    }),
    database: z.object({
      url: z.string(),
    }),
    search: z.object({
      enabled: z.boolean(),
      maxIterations: z.number().int().min(1).max(10),
    }),
    mcp: z.object({
      enabled: z.boolean(),
    }),
    retry: z.object({
      maxAttempts: z.number().int().min(1).max(10),
      initialDelayMs: z.number().int().min(0).max(10000),
      maxDelayMs: z.number().int().min(0).max(60000),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.aiModel.backend !== 'hosted') return;
    if (!config.llm.repo) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['llm', 'repo'],
        message: 'LLM repo is required for the hosted backend',
      });
    }
    if (!config.llm.apiToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['llm', 'apiToken'],
        message: 'LLM API token is required for the hosted backend',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --ai-model-name llama3.2:1b --chatbot-name Nova --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        args[key] = next;
        i++;
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build and validate configuration from CLI arguments over environment variables over defaults.
 * Throws ConfigurationError listing every invalid setting.
 */
export function loadConfig(env: Env, argv: string[]): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] ?? defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const defaultTemperature = getNumber('default-temperature', 'DEFAULT_TEMPERATURE', 0.7);

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'persona-chat-service'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    aiModel: {
      name: getString('ai-model-name', 'AI_MODEL_NAME', ''),
      backend: getString('model-backend', 'MODEL_BACKEND', 'local'),
      ollamaUrl: getString('ollama-url', 'OLLAMA_API_URL', 'http://localhost:11434'),
      temperatures: {
        standard: getNumber('standard-temperature', 'STANDARD_TEMPERATURE', defaultTemperature),
        factual: getNumber('factual-temperature', 'FACTUAL_TEMPERATURE', 0.3),
        creative: getNumber('creative-temperature', 'CREATIVE_TEMPERATURE', 1.0),
      },
      defaultTemperature,
    },
    chatbot: {
      name: getString('chatbot-name', 'CHATBOT_NAME', ''),
    },
    llm: {
      repo: getString('llm-repo', 'LLM_REPO', ''),
      apiToken: getString('llm-api-token', 'LLM_API_TOKEN', ''),
      apiEndpoint: getString('llm-api-endpoint', 'LLM_API_ENDPOINT', 'https://router.huggingface.co/v1'),
    },
    ui: {
      pageTitle: getString('page-title', 'UI_PAGE_TITLE', 'Chatbot'),
      layout: getString('layout', 'UI_LAYOUT', 'centered'),
      appTitle: getString('app-title', 'UI_APP_TITLE', 'Chatbot'),
      appMessage: getString('app-message', 'UI_APP_MESSAGE', 'Ask me anything.'),
      port: getNumber('port', 'UI_PORT', 3001),
    },
    cache: {
      enabled: getBoolean('cache', 'CACHE_ENABLED', false),
      maxEntries: getNumber('cache-max-entries', 'CACHE_MAX_ENTRIES', 100),
    },
    database: {
      url: getString('database-url', 'DATABASE_URL', ''),
    },
    search: {
      enabled: getBoolean('search', 'SEARCH_ENABLED', false),
      maxIterations: getNumber('search-max-iterations', 'SEARCH_MAX_ITERATIONS', 3),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 1000),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Get configuration for the running process.
 * Loads .env, then prints the problems and exits if the configuration is invalid.
 */
export function getConfig(): Config {
  dotenv.config();

  try {
    return loadConfig(process.env, process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - AI_MODEL_NAME and CHATBOT_NAME are required');
      console.error('  - MODEL_BACKEND=hosted also needs LLM_REPO and LLM_API_TOKEN');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print the effective configuration to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('╔' + '═'.repeat(66) + '╗');
  console.error(`║ ${`${config.ui.appTitle} - Configuration`.padEnd(65)}║`);
  console.error('╚' + '═'.repeat(66) + '╝');

  console.error(
    `\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`
  );
  console.error(`🤖 Chatbot: ${config.chatbot.name}`);
  if (config.aiModel.backend === 'local') {
    console.error(`🔗 Backend: local (Ollama ${config.aiModel.ollamaUrl}) model ${config.aiModel.name}`);
  } else {
    console.error(`🔗 Backend: hosted (${config.llm.apiEndpoint}) repo ${config.llm.repo}`);
  }
  const { standard, factual, creative } = config.aiModel.temperatures;
  console.error(`🌡️  Temperatures: standard ${standard} | factual ${factual} | creative ${creative}`);
  console.error(
    `⚙️  Retry: ${config.retry.maxAttempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms)`
  );
  console.error(`🗄️  Cache: ${config.cache.enabled ? `on (${config.cache.maxEntries} entries)` : 'off'}`);
  console.error(`💾 Archive: ${config.database.url || 'off'}`);
  console.error(`🔍 Search: ${config.search.enabled ? `on (max ${config.search.maxIterations} iterations)` : 'off'}`);
  console.error(`\n🌐 Web API: http://localhost:${config.ui.port}`);
  console.error(`📡 MCP: ${config.mcp.enabled ? 'STDIO mode' : 'off'}`);

  console.error('\n' + '─'.repeat(68));
}
