import { Logger } from '@nestjs/common';
import { errorMessage, isTransient } from '../errors';
import type { RetryConfig } from '../../config/configuration';

export const RETRY_POLICY = 'RETRY_POLICY';

export interface RetryOptions {
  /** Decides whether a failed attempt is worth another try. */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Label used in retry log lines. */
  operation?: string;
}

export interface RetryPolicyConfig extends RetryConfig {
  backoffMultiplier: number;
  /** Upper bound of random jitter as a fraction of the delay. */
  jitter: number;
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded retry with exponential backoff, shared by every network
 * collaborator. Only transient failures are retried unless the caller
 * supplies its own predicate; the last error is rethrown unchanged.
 */
export class RetryPolicy {
  private readonly logger = new Logger(RetryPolicy.name);

  private static readonly DEFAULT_CONFIG: RetryPolicyConfig = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
  };

  readonly config: RetryPolicyConfig;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.config = { ...RetryPolicy.DEFAULT_CONFIG, ...config };
  }

  delayFor(attempt: number): number {
    const { baseDelayMs, backoffMultiplier, maxDelayMs, jitter } = this.config;
    const exponential = baseDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    const withJitter = exponential + Math.random() * jitter * exponential;
    return Math.min(Math.round(withJitter), maxDelayMs);
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
  ): Promise<T> {
    const isRetryable = options.isRetryable ?? isTransient;
    const { maxAttempts } = this.config;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error: unknown) {
        if (attempt >= maxAttempts || !isRetryable(error)) {
          throw error;
        }

        const delayMs = this.delayFor(attempt);
        this.logger.warn(
          `Retrying ${options.operation ?? 'operation'} (attempt ${attempt}/${maxAttempts}) in ${delayMs}ms: ${errorMessage(error)}`,
        );
        options.onRetry?.(error, attempt, delayMs);
        await sleep(delayMs);
      }
    }
  }
}
