/**
 * Stderr logging. Stdout is reserved for the stdio MCP transport.
 */

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  debug: boolean;
}

function describe(value: unknown): unknown {
  if (value instanceof Error) {
    return value.message;
  }
  return value;
}

function structured(scope: string, severity: string, message: string, fields?: LogFields): string {
  const entry: LogFields = {
    timestamp: new Date().toISOString(),
    scope,
    severity,
    message,
  };
  for (const [key, value] of Object.entries(fields ?? {})) {
    entry[key] = describe(value);
  }
  return JSON.stringify(entry);
}

/**
 * Create a logger for one component
 */
export function createLogger(scope: string, options: LoggerOptions): Logger {
  return {
    debug(message, fields) {
      if (options.debug) {
        const suffix = fields ? ` ${JSON.stringify(fields)}` : '';
        console.error(`[DEBUG] [${scope}] ${message}${suffix}`);
      }
    },
    info(message) {
      console.error(`[${scope}] ${message}`);
    },
    warn(message, fields) {
      console.error(structured(scope, 'MEDIUM', message, fields));
    },
    error(message, fields) {
      console.error(structured(scope, 'HIGH', message, fields));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
