import { Injectable, Logger } from '@nestjs/common';
import excludedDomains from './data/excluded-domains.json';
import {
  normalizeOrganizationName,
  registrableDomain,
} from '../common/domain.utils';
import { SearchService } from '../search/search.service';

export interface DomainResolution {
  domain: string;
  votes: number;
}

export interface DomainLookup {
  resolution: DomainResolution | null;
  /** Some query failed, so a missing resolution is not conclusive. */
  degraded: boolean;
}

const EXCLUDED = new Set<string>(excludedDomains);
const NAME_MATCH_BONUS = 5;
const LOW_CONFIDENCE_VOTES = 5;

/**
 * Finds an organization's website domain from web search when the input
 * row has none. Each result votes for its registrable domain, weighted by
 * rank, with a bonus when the domain carries a word of the name.
 */
@Injectable()
export class DomainResolver {
  private readonly logger = new Logger(DomainResolver.name);

  constructor(private readonly searchService: SearchService) {}

  queriesFor(name: string): string[] {
    return [
      `"${name}" official website`,
      `"${name}" careers`,
      `${name} company homepage`,
    ];
  }

  async resolve(name: string): Promise<DomainLookup> {
    const nameWords = normalizeOrganizationName(name)
      .split(' ')
      .filter((word) => word.length > 2);
    const votes = new Map<string, number>();
    let degraded = false;

    for (const query of this.queriesFor(name)) {
      const { hits, degraded: failed } = await this.searchService.search(query);
      if (failed) degraded = true;
      hits.forEach((hit, rank) => {
        const domain = registrableDomain(hit.url);
        if (!domain || EXCLUDED.has(domain)) return;

        const label = domain.split('.')[0];
        const bonus = nameWords.some((word) => label.includes(word))
          ? NAME_MATCH_BONUS
          : 0;
        votes.set(domain, (votes.get(domain) ?? 0) + Math.max(5 - rank, 1) + bonus);
      });
    }

    const ranked = [...votes.entries()].sort(
      ([a, av], [b, bv]) => bv - av || (a < b ? -1 : a > b ? 1 : 0),
    );
    if (ranked.length === 0) {
      this.logger.log(`No domain found for "${name}"${degraded ? ' (search degraded)' : ''}`);
      return { resolution: null, degraded };
    }

    const [domain, total] = ranked[0];
    if (total < LOW_CONFIDENCE_VOTES) {
      this.logger.warn(`Low-confidence domain ${domain} for "${name}" (${total} votes)`);
    }
    return { resolution: { domain, votes: total }, degraded };
  }
}
