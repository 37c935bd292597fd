import type { Logger } from '../ports/logger';
import type { NewsSource } from '../ports/news';
import type { SearchSource } from '../ports/search';
import type { CompletionSource } from '../ports/completion';
import type { SessionStore } from '../ports/session-store';

/**
 * External sources available to the handlers. `null` means the source is
 * not configured and its handler answers from fallback content.
 */
export interface QuerySources {
  news      : NewsSource | null;
  search    : SearchSource | null;
  completion: CompletionSource | null;
}

export interface RuntimeResources extends QuerySources {
  sessions: SessionStore;
  logger  : Logger;
}
