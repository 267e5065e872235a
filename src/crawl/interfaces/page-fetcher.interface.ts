export interface FetchedPage {
  status: number;
  contentType: string;
  body: string;
}

export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

export const PAGE_FETCHER = 'PAGE_FETCHER';

export const CRAWLER_USER_AGENT = 'ContactDiscovery/1.0 (+bounded crawler)';
