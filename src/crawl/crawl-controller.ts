import { Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import robotsParser from 'robots-parser';
import crawlKeywords from '../discovery/data/crawl-keywords.json';
import { BudgetExceededError, errorMessage } from '../common/errors';
import { normalizeUrl, sameRegistrableDomain } from '../common/domain.utils';
import { RetryPolicy, sleep } from '../common/resilience/retry-policy';
import { CRAWLER_USER_AGENT } from './interfaces/page-fetcher.interface';
import type { FetchedPage, PageFetcher } from './interfaces/page-fetcher.interface';

type RobotsRules = ReturnType<typeof robotsParser>;

export interface CrawledPage {
  url: string;
  html: string;
  /** Visible text, one block per line, followed by any mailto: addresses. */
  text: string;
}

export type CrawlStopReason =
  | 'frontier_exhausted'
  | 'page_budget_reached'
  | 'early_stop'
  | 'failure_budget_exceeded';

export interface CrawlOutcome {
  status: 'completed' | 'aborted';
  reason: CrawlStopReason;
  pages: CrawledPage[];
  pagesFetched: number;
  failures: number;
}

export interface EarlyStop {
  threshold: number;
  /** Number of high-confidence emails found on the page. */
  inspect: (page: CrawledPage) => number;
}

export interface CrawlOptions {
  seedUrls?: string[];
  earlyStop?: EarlyStop;
}

export interface CrawlControllerOptions {
  failureBudget: number;
  requestDelayMs: number;
}

const BLOCK_ELEMENTS =
  'p, div, li, ul, ol, h1, h2, h3, h4, h5, h6, tr, section, article, header, footer, br, dd, dt, figcaption, blockquote';
const INLINE_ELEMENTS = 'td, th, span, a, strong, em, b, i, small, label';

const PRIORITY_KEYWORDS: readonly string[] = crawlKeywords.priorityKeywords;
const SKIPPED_EXTENSIONS: readonly string[] = crawlKeywords.skippedExtensions;

/**
 * Budget bookkeeping for one crawl call. Exceeding a budget throws
 * BudgetExceededError, which the controller turns into a terminal outcome.
 */
export class CrawlState {
  readonly visited = new Set<string>();
  pagesFetched = 0;
  failures = 0;
  highConfidenceEmails = 0;

  constructor(
    readonly maxPages: number,
    readonly failureBudget: number,
  ) {}

  claimVisit(url: string): void {
    if (this.pagesFetched >= this.maxPages) {
      throw new BudgetExceededError('pages', this.maxPages);
    }
    this.visited.add(url);
    this.pagesFetched++;
  }

  recordFailure(): void {
    this.failures++;
    if (this.failures > this.failureBudget) {
      throw new BudgetExceededError('failures', this.failureBudget);
    }
  }
}

export function defaultSeeds(domain: string): string[] {
  return [
    `https://${domain}`,
    ...crawlKeywords.seedPaths.map((path) => `https://${domain}${path}`),
  ];
}

export function isHtmlContent(contentType: string): boolean {
  return contentType === '' || /html|xml/i.test(contentType);
}

function hasPriority(url: string): boolean {
  const path = new URL(url).pathname.toLowerCase();
  return PRIORITY_KEYWORDS.some((keyword) => path.includes(keyword));
}

function isSkippedResource(url: string): boolean {
  const path = new URL(url).pathname.toLowerCase();
  return SKIPPED_EXTENSIONS.some((extension) => path.endsWith(extension));
}

export function parsePage(
  url: string,
  html: string,
  domain: string,
): { page: CrawledPage; links: string[] } {
  const $ = cheerio.load(html);

  const links: string[] = [];
  const mailto: string[] = [];
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')?.trim();
    if (!href) return;
    if (href.toLowerCase().startsWith('mailto:')) {
      mailto.push(href.slice('mailto:'.length).split('?')[0]);
      return;
    }
    const link = normalizeUrl(href, url);
    if (link && sameRegistrableDomain(link, domain) && !isSkippedResource(link)) {
      links.push(link);
    }
  });

  $('script, style, noscript, svg, template').remove();
  $(BLOCK_ELEMENTS).append('\n');
  $(INLINE_ELEMENTS).append(' ');
  const lines = $('body')
    .text()
    .split('\n')
    .map((line) => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .filter(Boolean);

  return {
    page: { url, html, text: [...lines, ...mailto].join('\n') },
    links,
  };
}

/**
 * Bounded breadth-first crawl of a single registrable domain. Never fetches
 * more than `maxPages` URLs and never the same normalised URL twice.
 * URLs the site's robots.txt disallows are skipped without spending budget.
 */
export class CrawlController {
  private readonly logger = new Logger(CrawlController.name);

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly retryPolicy: RetryPolicy,
    private readonly options: CrawlControllerOptions = {
      failureBudget: 5,
      requestDelayMs: 0,
    },
  ) {}

  async crawl(
    domain: string,
    maxPages: number,
    options: CrawlOptions = {},
  ): Promise<CrawlOutcome> {
    const state = new CrawlState(maxPages, this.options.failureBudget);
    const robots = await this.loadRobots(domain);
    const pages: CrawledPage[] = [];
    const priority: string[] = [];
    const regular: string[] = [];
    const queued = new Set<string>();

    const enqueue = (url: string, first: boolean) => {
      if (queued.has(url)) return;
      queued.add(url);
      (first || hasPriority(url) ? priority : regular).push(url);
    };

    for (const seed of [...(options.seedUrls ?? []), ...defaultSeeds(domain)]) {
      const url = normalizeUrl(seed);
      if (url && sameRegistrableDomain(url, domain) && !isSkippedResource(url)) {
        enqueue(url, true);
      }
    }

    const finish = (
      status: CrawlOutcome['status'],
      reason: CrawlStopReason,
    ): CrawlOutcome => {
      this.logger.debug(
        `Crawl of ${domain} ${status} (${reason}): ${state.pagesFetched} fetched, ${state.failures} failed`,
      );
      return {
        status,
        reason,
        pages,
        pagesFetched: state.pagesFetched,
        failures: state.failures,
      };
    };

    try {
      for (;;) {
        const url = priority.shift() ?? regular.shift();
        if (url === undefined) break;
        if (state.visited.has(url)) continue;
        // undefined means another host than robots.txt covers
        if (robots?.isAllowed(url, CRAWLER_USER_AGENT) === false) {
          this.logger.debug(`Skipping ${url}: disallowed by robots.txt`);
          continue;
        }

        state.claimVisit(url);
        if (state.pagesFetched > 1) {
          await sleep(this.options.requestDelayMs);
        }

        let fetched: FetchedPage;
        try {
          fetched = await this.retryPolicy.execute(() => this.fetcher.fetch(url), {
            operation: `fetch ${url}`,
          });
        } catch (error: unknown) {
          this.logger.debug(`Fetch failed for ${url}: ${errorMessage(error)}`);
          state.recordFailure();
          continue;
        }

        if (fetched.status < 200 || fetched.status >= 300) {
          this.logger.debug(`Fetch of ${url} returned HTTP ${fetched.status}`);
          state.recordFailure();
          continue;
        }
        if (!isHtmlContent(fetched.contentType)) continue;

        const { page, links } = parsePage(url, fetched.body, domain);
        pages.push(page);
        links.forEach((link) => enqueue(link, false));

        if (options.earlyStop) {
          state.highConfidenceEmails += options.earlyStop.inspect(page);
          if (state.highConfidenceEmails >= options.earlyStop.threshold) {
            return finish('completed', 'early_stop');
          }
        }
      }
      return finish('completed', 'frontier_exhausted');
    } catch (error: unknown) {
      if (error instanceof BudgetExceededError) {
        return error.kind === 'pages'
          ? finish('completed', 'page_budget_reached')
          : finish('aborted', 'failure_budget_exceeded');
      }
      throw error;
    }
  }

  /** Missing or unreadable robots.txt allows everything. */
  private async loadRobots(domain: string): Promise<RobotsRules | null> {
    const url = `https://${domain}/robots.txt`;
    try {
      const fetched = await this.fetcher.fetch(url);
      if (fetched.status < 200 || fetched.status >= 300) return null;
      return robotsParser(url, fetched.body);
    } catch (error: unknown) {
      this.logger.debug(`robots.txt unavailable for ${domain}: ${errorMessage(error)}`);
      return null;
    }
  }
}
