import { Logger } from '@nestjs/common';
import type { SearchHit, SearchProvider } from '../interfaces/search-provider.interface';

/** Used when no search API is configured; every query comes back empty. */
export class NoopSearchProvider implements SearchProvider {
  readonly name = 'none';
  private readonly logger = new Logger(NoopSearchProvider.name);

  search(query: string): Promise<SearchHit[]> {
    this.logger.debug(`Search disabled, skipping query: ${query}`);
    return Promise.resolve([]);
  }
}
