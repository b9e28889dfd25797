/**
 * Retry and Circuit Breaker patterns for model and search calls
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
  /** Decides whether a failed attempt is worth repeating; every error is by default */
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 120000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Race a promise against a timer that is always cleared afterwards
 */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param onLog - Optional callback for retry logging
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void
): Promise<T> {
  let lastError: Error | null = null;
  let lastDelay = config.initialDelayMs;
  let attempts = 0;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    attempts = attempt;
    try {
      const result = await withTimeout(fn(), config.timeoutMs);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = toError(error);
      const retryable = config.shouldRetry ? config.shouldRetry(lastError) : true;
      const willRetry = retryable && attempt < config.maxAttempts;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: lastError.message,
        nextRetryInMs: willRetry ? lastDelay : undefined,
      });

      if (!willRetry) {
        break;
      }

      await sleep(lastDelay);
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }

  throw new Error(
    `Failed after ${attempts} attempt${attempts === 1 ? '' : 's'}. Last error: ${lastError?.message}`,
    { cause: lastError }
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit Breaker Pattern
 * Stops calling a model server that keeps failing until the reset timeout has passed
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: Array<{ timestamp: Date; state: string; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private onStateChange?: (state: CircuitState, reason: string) => void
  ) {}

  /**
   * Execute function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = Date.now();
      if (this.lastFailureTime && now - this.lastFailureTime > this.resetTimeout) {
        this.transition('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new Error(
          `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${this.resetTimeout - (now - (this.lastFailureTime || now))}ms`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          this.failureCount = 0;
          this.transition('closed', 'Recovered from temporary failure');
        }
      } else if (this.state === 'closed') {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open') {
      this.transition('open', 'Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.transition('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private transition(newState: CircuitState, reason: string) {
    this.state = newState;
    this.logs.push({
      timestamp: new Date(),
      state: newState,
      reason,
    });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }

    this.onStateChange?.(newState, reason);
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }

  /**
   * Reset circuit breaker manually
   */
  reset() {
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.transition('closed', 'Manual reset');
  }
}

/**
 * Check if an error is worth retrying: network failures, timeouts and 5xx/429 replies
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
    'status: 429',
    'status: 5',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
