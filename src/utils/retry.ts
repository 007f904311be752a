/**
 * Retry and Circuit Breaker patterns for calls to the model provider
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
  timeoutMs: 30000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  onLog?: (log: RetryLog) => void;
  /** Aborting stops further attempts and rejects with the signal's reason */
  signal?: AbortSignal;
  /** Errors for which this returns false are rethrown without retrying */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param options - Logging callback, abort signal and retry predicate
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { onLog, signal, shouldRetry = () => true } = options;
  let lastError: unknown = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    signal?.throwIfAborted();

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
      lastError = error;

      if (signal?.aborted) {
        throw signal.reason;
      }

      const retryable = shouldRetry(error);
      const isLast = attempt === config.maxAttempts || !retryable;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: isLast ? undefined : lastDelay,
      });

      if (!retryable) {
        throw error;
      }
      if (isLast) {
        break;
      }

      await sleep(lastDelay, signal);

      // Exponential backoff
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }

  throw new Error(
    `Failed after ${config.maxAttempts} attempts. Last error: ${
      lastError instanceof Error ? lastError.message : String(lastError)
    }`,
    { cause: lastError }
  );
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Sleep utility function; rejects early with the abort reason
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit Breaker Pattern
 * Stops calling a provider that keeps failing until the reset timeout passes
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: Array<{ timestamp: Date; state: CircuitState; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000
  ) {}

  /**
   * Execute function with circuit breaker protection.
   * Rejections for which `isFailure` returns false pass through uncounted.
   */
  async execute<T>(fn: () => Promise<T>, isFailure: (error: unknown) => boolean = () => true): Promise<T> {
    if (this.state === 'open') {
      const now = Date.now();
      if (this.lastFailureTime && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.logStateChange('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new Error(
          `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${
            this.resetTimeout - (now - (this.lastFailureTime ?? now))
          }ms`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        // Two successes in half-open close the circuit
        if (this.successCount >= 2) {
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else if (this.state === 'closed') {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (isFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: CircuitState, reason: string) {
    this.logs.push({ timestamp: new Date(), state: newState, reason });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
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
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.logStateChange('closed', 'Manual reset');
  }
}

/**
 * Check if an error is worth retrying (network-level failures and 429/5xx statuses)
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';

  if (/\bstatus:? (429|5\d\d)\b/.test(errorMessage)) {
    return true;
  }

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
