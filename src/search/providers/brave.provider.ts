import axios from 'axios';
import { z } from 'zod';
import { toProviderError } from '../../common/http-errors';
import type { SearchHit, SearchProvider } from '../interfaces/search-provider.interface';

const BRAVE_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            url: z.string(),
            title: z.string().default(''),
            description: z.string().default(''),
          }),
        )
        .default([]),
    })
    .optional(),
});

const stripTags = (value: string) => value.replace(/<[^>]+>/g, '');

export class BraveSearchProvider implements SearchProvider {
  readonly name = 'brave';

  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs = 12000,
    private readonly resultCount = 10,
  ) {}

  async search(query: string): Promise<SearchHit[]> {
    let data: unknown;
    try {
      const response = await axios.get<unknown>(BRAVE_ENDPOINT, {
        params: { q: query, count: this.resultCount },
        headers: {
          Accept: 'application/json',
          'X-Subscription-Token': this.apiKey,
        },
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error: unknown) {
      throw toProviderError(this.name, error);
    }

    const parsed = BraveResponseSchema.parse(data);
    return (parsed.web?.results ?? []).map((result) => ({
      url: result.url,
      title: stripTags(result.title),
      snippet: stripTags(result.description),
    }));
  }
}
