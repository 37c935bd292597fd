import type { RuntimeResource } from '../lifecycle';
import type { NewsArticle } from '../entities/sources';
import type { NewsCategory } from '../entities/routing';
import type { SourceCallOptions } from './source-call';

export interface NewsSource extends RuntimeResource {
  /**
   * Top headlines for a category. Implementations throw `SourceError` on
   * network, auth or upstream failures; the handler layer owns fallbacks.
   */
  fetchHeadlines(category: NewsCategory, pageSize: number, options?: SourceCallOptions): Promise<NewsArticle[]>;
}
