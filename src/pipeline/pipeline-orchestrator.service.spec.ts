import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getToken } from '@willsoto/nestjs-prometheus';
import {
  ORGANIZATIONS_PROCESSED_TOTAL,
  ORGANIZATION_PROCESSING_DURATION,
} from '../common/metrics.providers';
import { configuration } from '../config/configuration';
import type { AppConfig } from '../config/configuration';
import { CrawlController } from '../crawl/crawl-controller';
import type { CrawlOptions, CrawlOutcome } from '../crawl/crawl-controller';
import { DedupStore } from '../dedup/dedup-store.service';
import { CandidateScorer } from '../discovery/candidate-scorer';
import { DomainResolver } from '../discovery/domain-resolver.service';
import { PatternGenerator } from '../discovery/pattern-generator';
import { SignalExtractor } from '../discovery/signal-extractor';
import { SearchService } from '../search/search.service';
import { VerificationService } from '../verification/verification.service';
import type { OutreachResult } from './interfaces/outreach-result.interface';
import { PipelineOrchestrator } from './pipeline-orchestrator.service';

const emptyCrawl: CrawlOutcome = {
  status: 'completed',
  reason: 'frontier_exhausted',
  pages: [],
  pagesFetched: 0,
  failures: 0,
};

const found = (...hits: { title: string; snippet: string; url: string }[]) => ({
  hits,
  degraded: false,
});

const amyHit = {
  title: 'Amy Salazar - Stripe',
  snippet: 'Amy Salazar, Technical Recruiter at Stripe',
  url: 'https://www.linkedin.com/in/amysalazar',
};

describe('PipelineOrchestrator', () => {
  let orchestrator: PipelineOrchestrator;
  let mockSearchService: { search: jest.Mock };
  let mockDomainResolver: { resolve: jest.Mock };
  let mockCrawlController: { crawl: jest.Mock };
  let mockVerificationService: { enabled: boolean; verify: jest.Mock };
  let mockDedupStore: {
    findProcessed: jest.Mock;
    markProcessed: jest.Mock;
    hasSent: jest.Mock;
  };
  let mockCounter: { inc: jest.Mock };

  beforeEach(async () => {
    mockSearchService = { search: jest.fn().mockResolvedValue(found()) };
    mockDomainResolver = {
      resolve: jest.fn().mockResolvedValue({ resolution: null, degraded: false }),
    };
    mockCrawlController = { crawl: jest.fn().mockResolvedValue(emptyCrawl) };
    mockVerificationService = { enabled: false, verify: jest.fn() };
    mockDedupStore = {
      findProcessed: jest.fn().mockResolvedValue(null),
      markProcessed: jest.fn().mockResolvedValue(undefined),
      hasSent: jest.fn().mockResolvedValue(false),
    };
    mockCounter = { inc: jest.fn() };

    const extractor = new SignalExtractor();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PipelineOrchestrator,
        {
          provide: ConfigService,
          useValue: new ConfigService<AppConfig, true>(configuration({})),
        },
        PatternGenerator,
        { provide: SignalExtractor, useValue: extractor },
        {
          provide: CandidateScorer,
          useValue: new CandidateScorer({
            roleRelevance: (text) => extractor.roleRelevance(text),
          }),
        },
        { provide: SearchService, useValue: mockSearchService },
        { provide: DomainResolver, useValue: mockDomainResolver },
        { provide: CrawlController, useValue: mockCrawlController },
        { provide: VerificationService, useValue: mockVerificationService },
        { provide: DedupStore, useValue: mockDedupStore },
        { provide: getToken(ORGANIZATIONS_PROCESSED_TOTAL), useValue: mockCounter },
        {
          provide: getToken(ORGANIZATION_PROCESSING_DURATION),
          useValue: { startTimer: jest.fn().mockReturnValue(jest.fn()) },
        },
      ],
    }).compile();

    orchestrator = module.get<PipelineOrchestrator>(PipelineOrchestrator);
  });

  describe('found', () => {
    it('should pick the most conventional address for a named recruiter', async () => {
      mockSearchService.search.mockResolvedValue(found(amyHit));

      const result = await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' });

      expect(result).toMatchObject({
        organizationKey: 'stripe.com',
        domain: 'stripe.com',
        status: 'found',
        bestEmail: 'amy.salazar@stripe.com',
        score: 8,
        confidence: 0.444,
        backups: ['asalazar@stripe.com', 'amysalazar@stripe.com', 'amy_salazar@stripe.com'],
        fromCache: false,
      });
      expect(result.bestContact).toMatchObject({
        fullName: 'Amy Salazar',
        title: 'Technical Recruiter',
        source: 'search_result',
        sourceUrl: 'https://www.linkedin.com/in/amysalazar',
      });
      expect(mockDedupStore.markProcessed).toHaveBeenCalledWith(result);
      expect(mockCounter.inc).toHaveBeenCalledWith({ status: 'found' });
    });

    it('should fill search templates with the organization and domain', async () => {
      await orchestrator.process({ name: 'Stripe', domain: 'https://www.stripe.com/' });

      expect(mockSearchService.search.mock.calls.map((call) => call[0])).toEqual([
        '"Stripe" recruiter',
        '"Stripe" talent acquisition',
        '"Stripe" founder OR CEO',
        'site:stripe.com careers team',
      ]);
    });

    it('should prefer an address observed while crawling', async () => {
      mockCrawlController.crawl.mockImplementation(
        (_domain: string, _maxPages: number, options: CrawlOptions) => {
          options.earlyStop?.inspect({
            url: 'https://stripe.com/team',
            html: '',
            text: 'Amy Salazar, Technical Recruiter\namy.salazar@stripe.com',
          });
          return Promise.resolve({ ...emptyCrawl, pagesFetched: 1 });
        },
      );

      const result = await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' });

      // observed 10 + conventionality 5 + role 3 + recruiting context 3
      expect(result).toMatchObject({
        status: 'found',
        bestEmail: 'amy.salazar@stripe.com',
        score: 21,
        confidence: 1,
        backups: [],
      });
      expect(result.bestContact?.source).toBe('crawled_page');
      expect(mockCrawlController.crawl).toHaveBeenCalledWith(
        'stripe.com',
        25,
        expect.objectContaining({ seedUrls: [] }),
      );
    });

    it('should seed the crawl with same-site search results', async () => {
      mockSearchService.search.mockResolvedValue(
        found({ title: 'Careers', snippet: '', url: 'https://stripe.com/jobs/listing' }, amyHit),
      );

      await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' }, { maxPages: 3 });

      const [domain, maxPages, options] = mockCrawlController.crawl.mock.calls[0];
      expect([domain, maxPages]).toEqual(['stripe.com', 3]);
      expect(options.seedUrls).toContain('https://stripe.com/jobs/listing');
      expect(options.seedUrls).not.toContain(amyHit.url);
    });

    it('should skip the crawl when disabled', async () => {
      await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' }, { crawlEnabled: false });

      expect(mockCrawlController.crawl).not.toHaveBeenCalled();
    });

    it('should rank verified addresses first and drop invalid ones', async () => {
      mockSearchService.search.mockResolvedValue(found(amyHit));
      mockVerificationService.enabled = true;
      mockVerificationService.verify.mockImplementation((address: string) =>
        Promise.resolve(
          address === 'amy.salazar@stripe.com'
            ? 'invalid'
            : address === 'asalazar@stripe.com'
              ? 'valid'
              : 'unknown',
        ),
      );

      const result = await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' });

      expect(mockVerificationService.verify).toHaveBeenCalledTimes(3);
      expect(result).toMatchObject({ bestEmail: 'asalazar@stripe.com', confidence: 1 });
      expect(result.backups).not.toContain('amy.salazar@stripe.com');
    });
  });

  describe('no result', () => {
    it('should report an unresolved domain without searching for contacts', async () => {
      const result = await orchestrator.process({ name: 'Nobody Knows Inc' });

      expect(result).toMatchObject({
        organizationKey: 'name:nobody knows inc',
        domain: null,
        status: 'no_domain_resolved',
        bestEmail: null,
      });
      expect(mockSearchService.search).not.toHaveBeenCalled();
      expect(mockDedupStore.markProcessed).toHaveBeenCalledWith(result);
    });

    it('should report no contact for a resolved domain with nothing on it', async () => {
      mockDomainResolver.resolve.mockResolvedValue({
        resolution: { domain: 'acme.io', votes: 12 },
        degraded: false,
      });

      const result = await orchestrator.process({ name: 'Acme' });

      expect(result).toMatchObject({
        organizationKey: 'acme.io',
        domain: 'acme.io',
        status: 'no_contact_found',
        bestEmail: null,
        backups: [],
      });
      expect(mockDedupStore.markProcessed).toHaveBeenCalledWith(result);
    });

    it('should not record an unresolved domain while search is failing', async () => {
      mockDomainResolver.resolve.mockResolvedValue({ resolution: null, degraded: true });

      const result = await orchestrator.process({ name: 'Acme' });

      expect(result.status).toBe('no_domain_resolved');
      expect(mockDedupStore.markProcessed).not.toHaveBeenCalled();
    });

    it('should not record a missing contact while search is failing', async () => {
      mockSearchService.search
        .mockResolvedValueOnce({ hits: [], degraded: true })
        .mockResolvedValue(found());

      const result = await orchestrator.process({ name: 'Acme', domain: 'acme.io' });

      expect(result.status).toBe('no_contact_found');
      expect(mockDedupStore.markProcessed).not.toHaveBeenCalled();
    });

    it('should search again on the next run after a degraded one', async () => {
      const stored = new Map<string, OutreachResult>();
      mockDedupStore.markProcessed.mockImplementation((result: OutreachResult) => {
        stored.set(result.organizationKey, result);
        return Promise.resolve();
      });
      mockDedupStore.findProcessed.mockImplementation((key: string) =>
        Promise.resolve(stored.get(key) ?? null),
      );
      mockSearchService.search.mockResolvedValue({ hits: [], degraded: true });

      await orchestrator.process({ name: 'Acme', domain: 'acme.io' });
      mockSearchService.search.mockClear();
      mockSearchService.search.mockResolvedValue(found());
      const second = await orchestrator.process({ name: 'Acme', domain: 'acme.io' });

      expect(second).toMatchObject({ status: 'no_contact_found', fromCache: false });
      expect(mockSearchService.search).toHaveBeenCalledTimes(4);
      expect(stored.get('acme.io')?.status).toBe('no_contact_found');
    });
  });

  describe('errors', () => {
    it('should turn a malformed row into an error result', async () => {
      const result = await orchestrator.process({ name: '   ', domain: 'stripe.com' });

      expect(result.status).toBe('error');
      expect(result.reason).toMatch(/^Malformed organization record/);
      expect(mockDedupStore.markProcessed).not.toHaveBeenCalled();
    });

    it('should reject a domain that is not a host', async () => {
      const result = await orchestrator.process({ name: 'Stripe', domain: 'not a domain' });

      expect(result).toMatchObject({
        status: 'error',
        reason: 'Domain "not a domain" is not a valid host',
      });
    });

    it('should never throw on unexpected failures', async () => {
      mockDedupStore.markProcessed.mockRejectedValue(new Error('disk full'));

      const result = await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' });

      expect(result).toMatchObject({
        organizationKey: 'stripe.com',
        status: 'error',
        reason: 'disk full',
      });
      expect(mockCounter.inc).toHaveBeenCalledWith({ status: 'error' });
    });
  });

  describe('dedup', () => {
    it('should mark an already contacted address as a duplicate', async () => {
      mockSearchService.search.mockResolvedValue(found(amyHit));
      mockDedupStore.hasSent.mockResolvedValue(true);

      const result = await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' });

      expect(result).toMatchObject({
        status: 'skipped_duplicate',
        bestEmail: 'amy.salazar@stripe.com',
      });
      expect(mockDedupStore.hasSent).toHaveBeenCalledWith('stripe.com', 'amy.salazar@stripe.com');
    });

    it('should reuse the stored outcome of an organization processed before', async () => {
      mockDedupStore.findProcessed.mockResolvedValue({
        organizationKey: 'stripe.com',
        name: 'Stripe',
        domain: 'stripe.com',
        status: 'found',
        contactName: 'Amy Salazar',
        contactTitle: 'Technical Recruiter',
        contactSource: 'search_result',
        bestEmail: 'amy.salazar@stripe.com',
        score: 8,
        confidence: 0.444,
        backupEmails: ['asalazar@stripe.com'],
        processedAt: new Date(),
      });

      const result = await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' });

      expect(result).toMatchObject({
        status: 'found',
        fromCache: true,
        bestEmail: 'amy.salazar@stripe.com',
        backups: ['asalazar@stripe.com'],
        bestContact: { fullName: 'Amy Salazar', firstName: 'Amy', lastName: 'Salazar' },
      });
      expect(mockSearchService.search).not.toHaveBeenCalled();
    });

    it('should process again when the stored outcome was an error', async () => {
      mockDedupStore.findProcessed.mockResolvedValue({
        organizationKey: 'stripe.com',
        status: 'error',
      });

      const result = await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' });

      expect(result.fromCache).toBe(false);
      expect(mockSearchService.search).toHaveBeenCalled();
    });

    it('should ignore stored outcomes when asked to', async () => {
      await orchestrator.process({ name: 'Stripe', domain: 'stripe.com' }, { skipProcessed: false });

      expect(mockDedupStore.findProcessed).not.toHaveBeenCalled();
    });
  });
});
