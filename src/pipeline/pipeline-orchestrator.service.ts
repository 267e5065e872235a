import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import { InvalidInputError, errorMessage } from '../common/errors';
import {
  normalizeDomain,
  organizationKey,
  sameRegistrableDomain,
} from '../common/domain.utils';
import {
  ORGANIZATIONS_PROCESSED_TOTAL,
  ORGANIZATION_PROCESSING_DURATION,
} from '../common/metrics.providers';
import type { AppConfig, CrawlConfig, DiscoveryConfig } from '../config/configuration';
import { CrawlController } from '../crawl/crawl-controller';
import { DedupStore } from '../dedup/dedup-store.service';
import type { ProcessedOrganization } from '../dedup/entities/processed-organization.entity';
import { CandidateScorer } from '../discovery/candidate-scorer';
import { DomainResolver } from '../discovery/domain-resolver.service';
import type {
  Contact,
  EmailCandidate,
  ExtractionResult,
  Organization,
  RawEmailSignal,
  VerificationStatus,
} from '../discovery/interfaces/discovery.types';
import { PatternGenerator } from '../discovery/pattern-generator';
import type { GeneratedAddress } from '../discovery/pattern-generator';
import { SignalExtractor, isPersonalLocalPart } from '../discovery/signal-extractor';
import { SearchService } from '../search/search.service';
import { VerificationService } from '../verification/verification.service';
import { validateOrganizationRecord } from './dto/organization-record.dto';
import type { OrganizationInput } from './dto/organization-record.dto';
import type { OutreachResult, OutreachStatus } from './interfaces/outreach-result.interface';

export interface ProcessOptions {
  maxPages?: number;
  crawlEnabled?: boolean;
  skipProcessed?: boolean;
}

/** Contacts and observed addresses gathered for one organization. */
class SignalPool {
  readonly contacts = new Map<string, Contact>();
  readonly emails = new Map<string, RawEmailSignal>();
  /** Set when any search behind this pool failed and returned nothing. */
  degraded = false;

  /** Returns how many previously unseen high-confidence addresses were added. */
  add(extracted: ExtractionResult): number {
    for (const contact of extracted.contacts) {
      const key = contact.fullName.toLowerCase();
      const existing = this.contacts.get(key);
      if (!existing || (!existing.title && contact.title)) {
        this.contacts.set(key, contact);
      }
    }

    let added = 0;
    for (const email of extracted.emails) {
      if (this.emails.has(email.address)) continue;
      this.emails.set(email.address, email);
      if (email.confidence === 'high') added++;
    }
    return added;
  }
}

/**
 * Drives one organization from input row to ranked best contact/address.
 * Never throws: every failure becomes an `error` result with a reason.
 */
@Injectable()
export class PipelineOrchestrator {
  private readonly logger = new Logger(PipelineOrchestrator.name);
  private readonly crawlConfig: CrawlConfig;
  private readonly discoveryConfig: DiscoveryConfig;
  private readonly searchQueries: string[];
  private readonly skipProcessed: boolean;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private readonly domainResolver: DomainResolver,
    private readonly searchService: SearchService,
    private readonly crawlController: CrawlController,
    private readonly patternGenerator: PatternGenerator,
    private readonly extractor: SignalExtractor,
    private readonly scorer: CandidateScorer,
    private readonly verificationService: VerificationService,
    private readonly dedupStore: DedupStore,
    @InjectMetric(ORGANIZATIONS_PROCESSED_TOTAL)
    private readonly processedCounter: Counter<string>,
    @InjectMetric(ORGANIZATION_PROCESSING_DURATION)
    private readonly durationHistogram: Histogram<string>,
  ) {
    this.crawlConfig = configService.get('crawl', { infer: true });
    this.discoveryConfig = configService.get('discovery', { infer: true });
    this.searchQueries = configService.get('search', { infer: true }).queries;
    this.skipProcessed = configService.get('app', { infer: true }).skipProcessed;
  }

  async process(input: OrganizationInput, options: ProcessOptions = {}): Promise<OutreachResult> {
    const stopTimer = this.durationHistogram.startTimer();
    const name = input.name?.trim() ?? '';
    let result: OutreachResult;

    try {
      result = await this.discover(input, options);
    } catch (error: unknown) {
      const reason = errorMessage(error);
      if (error instanceof InvalidInputError) {
        this.logger.warn(`Skipping row "${name}": ${reason}`);
      } else {
        this.logger.error(
          `Processing failed for "${name}": ${reason}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
      const domain = input.domain ? normalizeDomain(input.domain) : null;
      result = this.emptyResult({ name, domain }, organizationKey(name, domain), 'error', reason);
    } finally {
      stopTimer();
    }

    this.processedCounter.inc({ status: result.status });
    this.logger.log(
      `${result.organizationKey}: ${result.status}${result.bestEmail ? ` -> ${result.bestEmail}` : ''}`,
    );
    return result;
  }

  private async discover(input: OrganizationInput, options: ProcessOptions): Promise<OutreachResult> {
    const record = validateOrganizationRecord(input);
    const skipProcessed = options.skipProcessed ?? this.skipProcessed;

    let domain: string | null = null;
    if (record.domain) {
      domain = normalizeDomain(record.domain);
      if (!domain) {
        throw new InvalidInputError(`Domain "${record.domain}" is not a valid host`, 'domain');
      }
    }
    const organization: Organization = { name: record.name, domain };

    if (skipProcessed) {
      const cached = await this.fromStore(organization, organizationKey(record.name, domain));
      if (cached) return cached;
    }

    if (!domain) {
      const { resolution, degraded } = await this.domainResolver.resolve(record.name);
      if (!resolution) {
        const unresolved = this.emptyResult(
          organization,
          organizationKey(record.name, null),
          'no_domain_resolved',
          'no domain found in search results',
        );
        await this.persist(unresolved, degraded);
        return unresolved;
      }
      domain = resolution.domain;
      organization.domain = domain;

      if (skipProcessed) {
        const cached = await this.fromStore(organization, organizationKey(record.name, domain));
        if (cached) return cached;
      }
    }

    const key = organizationKey(record.name, domain);
    const pool = new SignalPool();
    const seedUrls = await this.searchContacts(organization, domain, pool);

    if (options.crawlEnabled ?? this.crawlConfig.enabled) {
      await this.crawlSite(organization, domain, seedUrls, pool, options.maxPages);
    }

    const candidates = this.buildCandidates(pool, domain);
    const verified = await this.verifyTop(candidates);
    const { best, backups } = this.scorer.select(verified);

    if (!best) {
      const empty = this.emptyResult(organization, key, 'no_contact_found', 'no contacts or addresses found');
      await this.persist(empty, pool.degraded);
      return empty;
    }

    const result: OutreachResult = {
      organization,
      organizationKey: key,
      domain,
      status: 'found',
      bestContact: best.contact ?? null,
      bestEmail: best.address,
      score: best.score,
      confidence: best.confidence,
      backups: backups.map((candidate) => candidate.address),
      fromCache: false,
    };
    await this.persist(result, pool.degraded);
    return this.applySendGate(result);
  }

  /** Outcomes reached while search was failing are left for the next run to retry. */
  private async persist(result: OutreachResult, degraded: boolean): Promise<void> {
    if (degraded) {
      this.logger.warn(
        `${result.organizationKey}: not recording ${result.status} because search was degraded`,
      );
      return;
    }
    await this.dedupStore.markProcessed(result);
  }

  private async searchContacts(
    organization: Organization,
    domain: string,
    pool: SignalPool,
  ): Promise<string[]> {
    const seedUrls: string[] = [];
    for (const template of this.searchQueries) {
      const query = template
        .replace(/\{organization\}/g, organization.name)
        .replace(/\{domain\}/g, domain);
      const { hits, degraded } = await this.searchService.search(query);
      if (degraded) pool.degraded = true;

      for (const hit of hits) {
        pool.add(
          this.extractor.extract(`${hit.title}\n${hit.snippet}`, organization, 'search_result', hit.url),
        );
        if (sameRegistrableDomain(hit.url, domain)) {
          seedUrls.push(hit.url);
        }
      }
    }
    return seedUrls;
  }

  private async crawlSite(
    organization: Organization,
    domain: string,
    seedUrls: string[],
    pool: SignalPool,
    maxPages?: number,
  ): Promise<void> {
    const outcome = await this.crawlController.crawl(domain, maxPages ?? this.crawlConfig.maxPages, {
      seedUrls,
      earlyStop: {
        threshold: this.crawlConfig.earlyStopEmails,
        inspect: (page) =>
          pool.add(this.extractor.extract(page.text, organization, 'crawled_page', page.url)),
      },
    });

    if (outcome.status === 'aborted') {
      this.logger.warn(
        `Crawl of ${domain} aborted (${outcome.reason}) after ${outcome.pagesFetched} pages, ${outcome.failures} failures`,
      );
    }
  }

  private buildCandidates(pool: SignalPool, domain: string): EmailCandidate[] {
    const contacts = [...pool.contacts.values()]
      .sort((a, b) => this.extractor.roleRelevance(b.title) - this.extractor.roleRelevance(a.title))
      .slice(0, this.discoveryConfig.maxContacts);

    const candidates: EmailCandidate[] = [];
    const owners = new Map<string, Contact>();

    for (const contact of contacts) {
      let generated: GeneratedAddress[];
      try {
        generated = this.patternGenerator.generateCandidates(contact.fullName, domain);
      } catch (error: unknown) {
        if (!(error instanceof InvalidInputError)) throw error;
        this.logger.debug(`No patterns for "${contact.fullName}": ${error.message}`);
        continue;
      }

      for (const { address, pattern, patternIndex } of generated) {
        candidates.push({
          address,
          origin: 'generated',
          pattern,
          patternIndex,
          contact,
          personal: isPersonalLocalPart(address.slice(0, address.indexOf('@'))),
          functional: false,
        });
        if (!owners.has(address)) owners.set(address, contact);
      }
    }

    for (const email of pool.emails.values()) {
      candidates.push({
        address: email.address,
        origin: 'observed',
        pattern: 'observed',
        contact: owners.get(email.address),
        personal: email.personal,
        functional: email.functional,
        context: email.context,
        sourceUrl: email.sourceUrl,
      });
    }

    return candidates;
  }

  private async verifyTop(candidates: EmailCandidate[]): Promise<EmailCandidate[]> {
    if (!this.verificationService.enabled || candidates.length === 0) return candidates;

    const verdicts = new Map<string, VerificationStatus>();
    for (const candidate of this.scorer.score(candidates).slice(0, this.discoveryConfig.verifyTopN)) {
      verdicts.set(candidate.address, await this.verificationService.verify(candidate.address));
    }
    return candidates.map((candidate) => ({
      ...candidate,
      verification: verdicts.get(candidate.address) ?? candidate.verification,
    }));
  }

  private async applySendGate(result: OutreachResult): Promise<OutreachResult> {
    if (
      result.status === 'found' &&
      result.bestEmail &&
      (await this.dedupStore.hasSent(result.organizationKey, result.bestEmail))
    ) {
      return { ...result, status: 'skipped_duplicate', reason: 'already sent in an earlier run' };
    }
    return result;
  }

  private async fromStore(organization: Organization, key: string): Promise<OutreachResult | null> {
    const stored = await this.dedupStore.findProcessed(key);
    if (!stored || stored.status === 'error') return null;

    this.logger.log(`Skipping search for ${key}: processed in an earlier run`);
    return this.applySendGate({
      organization: { name: organization.name, domain: stored.domain },
      organizationKey: key,
      domain: stored.domain,
      status: stored.status === 'skipped_duplicate' ? 'found' : stored.status,
      bestContact: this.contactFromStore(stored),
      bestEmail: stored.bestEmail,
      score: stored.score,
      confidence: stored.confidence,
      backups: stored.backupEmails,
      fromCache: true,
    });
  }

  private contactFromStore(stored: ProcessedOrganization): Contact | null {
    if (!stored.contactName) return null;
    const [firstName, ...rest] = stored.contactName.split(' ');
    return {
      fullName: stored.contactName,
      firstName,
      lastName: rest.join(' '),
      title: stored.contactTitle ?? undefined,
      organizationKey: stored.organizationKey,
      source: stored.contactSource ?? 'search_result',
    };
  }

  private emptyResult(
    organization: Organization,
    key: string,
    status: OutreachStatus,
    reason: string,
  ): OutreachResult {
    return {
      organization,
      organizationKey: key,
      domain: organization.domain ?? null,
      status,
      bestContact: null,
      bestEmail: null,
      score: 0,
      confidence: 0,
      backups: [],
      reason,
      fromCache: false,
    };
  }
}
