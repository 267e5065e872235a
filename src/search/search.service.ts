import { Inject, Injectable, Logger } from '@nestjs/common';
import type CircuitBreaker from 'opossum';
import { errorMessage } from '../common/errors';
import { CircuitBreakerFactory } from '../common/resilience/circuit-breaker.factory';
import { RETRY_POLICY, RetryPolicy } from '../common/resilience/retry-policy';
import { SEARCH_PROVIDER } from './interfaces/search-provider.interface';
import type { SearchHit, SearchProvider } from './interfaces/search-provider.interface';

export interface SearchResult {
  hits: SearchHit[];
  /** True when the provider failed and `hits` is an empty stand-in. */
  degraded: boolean;
}

/**
 * Gateway to the configured search provider. Transient failures are
 * retried with backoff; once retries are exhausted (or the circuit is
 * open) the query degrades to an empty, flagged result instead of failing.
 */
@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);
  private readonly breaker: CircuitBreaker<[string], SearchHit[]>;

  constructor(
    @Inject(SEARCH_PROVIDER) private readonly provider: SearchProvider,
    @Inject(RETRY_POLICY) private readonly retryPolicy: RetryPolicy,
    circuitBreakerFactory: CircuitBreakerFactory,
  ) {
    this.breaker = circuitBreakerFactory.createBreaker(
      `search:${provider.name}`,
      (query: string) =>
        this.retryPolicy.execute(() => this.provider.search(query), {
          operation: `search "${query}"`,
        }),
      { timeout: 60000 },
    );
  }

  async search(query: string): Promise<SearchResult> {
    try {
      return { hits: await this.breaker.fire(query), degraded: false };
    } catch (error: unknown) {
      this.logger.warn(
        `Search degraded to no results for "${query}": ${errorMessage(error)}`,
      );
      return { hits: [], degraded: true };
    }
  }
}
