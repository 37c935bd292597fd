import type { RuntimeResource } from '../lifecycle';
import type { SearchResult } from '../entities/sources';
import type { SourceCallOptions } from './source-call';

export interface SearchSource extends RuntimeResource {
  search(query: string, maxResults: number, options?: SourceCallOptions): Promise<SearchResult[]>;
}
