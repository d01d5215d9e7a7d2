import { Logger } from '@nestjs/common';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterFactor: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 5,
  baseDelayMs: 100,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterFactor: 0.3,
};

export const MESSAGE_RETRY_OPTIONS: Partial<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
};

export const TRANSACTION_RETRY_OPTIONS: Partial<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 25,
  maxDelayMs: 500,
};

const RETRYABLE_CODES = new Set([
  '40001', // PostgreSQL: serialization_failure
  '40P01', // PostgreSQL: deadlock_detected
  '08006', // PostgreSQL: connection_failure
  '08001', // PostgreSQL: sqlclient_unable_to_establish_sqlconnection
  '57P01', // PostgreSQL: admin_shutdown
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
]);

const RETRYABLE_PATTERNS = [
  'connection',
  'timeout',
  'temporarily unavailable',
  'too many connections',
  'deadlock',
];

export function calculateBackoffDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(options.backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitter = cappedDelay * options.jitterFactor * Math.random();
  return Math.floor(cappedDelay + jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryableError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }

  if ('code' in error && typeof error.code === 'string' && RETRYABLE_CODES.has(error.code)) {
    return true;
  }

  if ('message' in error && typeof error.message === 'string') {
    const lowerMessage = error.message.toLowerCase();
    return RETRYABLE_PATTERNS.some((pattern) => lowerMessage.includes(pattern));
  }

  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
  logger?: Logger,
  operationName = 'operation',
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= opts.maxRetries) {
        if (attempt > 0) {
          const message = error instanceof Error ? error.message : String(error);
          logger?.error(`${operationName} failed after ${attempt + 1} attempts: ${message}`);
        }
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, opts);
      logger?.warn(
        `${operationName} attempt ${attempt + 1}/${opts.maxRetries + 1} failed (retryable), retrying in ${delay}ms`,
      );

      await sleep(delay);
    }
  }
}
