import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import CircuitBreaker from 'opossum';
import { InvalidInputError } from '../errors';

export interface CircuitBreakerConfig {
  timeout: number;
  errorThreshold: number;
  resetTimeout: number;
  volumeThreshold: number;
}

export interface CircuitHealth {
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  stats: {
    failures: number;
    successes: number;
    rejects: number;
    fires: number;
  };
}

/** The part of a breaker the factory needs for health and shutdown. */
interface TrackedBreaker {
  readonly opened: boolean;
  readonly halfOpen: boolean;
  readonly stats: CircuitHealth['stats'];
  shutdown(): void;
}

/**
 * One opossum breaker per external collaborator (search, verifier, send).
 */
@Injectable()
export class CircuitBreakerFactory implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private readonly breakers = new Map<string, TrackedBreaker>();

  private readonly DEFAULT_CONFIG: CircuitBreakerConfig = {
    timeout: 20000,
    errorThreshold: 50,
    resetTimeout: 30000,
    volumeThreshold: 10,
  };

  createBreaker<TArgs extends unknown[], TResult>(
    name: string,
    action: (...args: TArgs) => Promise<TResult>,
    config?: Partial<CircuitBreakerConfig>,
  ): CircuitBreaker<TArgs, TResult> {
    const mergedConfig = { ...this.DEFAULT_CONFIG, ...config };

    const breaker = new CircuitBreaker<TArgs, TResult>(action, {
      name,
      timeout: mergedConfig.timeout,
      errorThresholdPercentage: mergedConfig.errorThreshold,
      resetTimeout: mergedConfig.resetTimeout,
      volumeThreshold: mergedConfig.volumeThreshold,
      // Bad input is the caller's fault, not the collaborator's
      errorFilter: (error: unknown) => error instanceof InvalidInputError,
    });

    breaker.on('open', () => {
      this.logger.error(`[OPEN] Circuit breaker OPEN for ${name}`);
    });
    breaker.on('halfOpen', () => {
      this.logger.warn(`[HALF-OPEN] Circuit breaker HALF-OPEN for ${name}`);
    });
    breaker.on('close', () => {
      this.logger.log(`[CLOSED] Circuit breaker CLOSED for ${name}`);
    });
    breaker.on('timeout', () => {
      this.logger.warn(`Circuit breaker timeout for ${name}`);
    });

    const previous = this.breakers.get(name);
    if (previous) {
      previous.shutdown();
      this.logger.warn(`Circuit breaker ${name} replaced`);
    }
    this.breakers.set(name, breaker);
    return breaker;
  }

  health(): Record<string, CircuitHealth> {
    const health: Record<string, CircuitHealth> = {};

    this.breakers.forEach((breaker, name) => {
      const stats = breaker.stats;
      health[name] = {
        state: breaker.opened
          ? 'OPEN'
          : breaker.halfOpen
            ? 'HALF_OPEN'
            : 'CLOSED',
        stats: {
          failures: stats.failures,
          successes: stats.successes,
          rejects: stats.rejects,
          fires: stats.fires,
        },
      };
    });

    return health;
  }

  hasOpenCircuits(): boolean {
    for (const [, breaker] of this.breakers) {
      if (breaker.opened) {
        return true;
      }
    }
    return false;
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}
