export interface SearchHit {
  title: string;
  snippet: string;
  url: string;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string): Promise<SearchHit[]>;
}

export const SEARCH_PROVIDER = 'SEARCH_PROVIDER';
