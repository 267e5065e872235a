import axios from 'axios';
import { TransientProviderError } from '../../common/errors';
import { isRetryableStatus, toProviderError } from '../../common/http-errors';
import { CRAWLER_USER_AGENT } from '../interfaces/page-fetcher.interface';
import type { FetchedPage, PageFetcher } from '../interfaces/page-fetcher.interface';

const MAX_CONTENT_LENGTH = 2 * 1024 * 1024;

export class HttpPageFetcher implements PageFetcher {
  constructor(
    private readonly timeoutMs = 15000,
    private readonly userAgent = CRAWLER_USER_AGENT,
  ) {}

  async fetch(url: string): Promise<FetchedPage> {
    try {
      const response = await axios.get<string>(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5',
          'Accept-Language': 'en-US,en;q=0.5',
        },
        responseType: 'text',
        timeout: this.timeoutMs,
        maxRedirects: 5,
        maxContentLength: MAX_CONTENT_LENGTH,
        validateStatus: () => true,
      });

      if (isRetryableStatus(response.status)) {
        throw new TransientProviderError('page-fetcher', `HTTP ${response.status} for ${url}`, response.status);
      }

      const contentType = response.headers['content-type'];
      return {
        status: response.status,
        contentType: typeof contentType === 'string' ? contentType : '',
        body: typeof response.data === 'string' ? response.data : '',
      };
    } catch (error: unknown) {
      if (error instanceof TransientProviderError) throw error;
      throw toProviderError('page-fetcher', error);
    }
  }
}
