import { resolveWithFallback } from '@newsroute/core';
import { mockSearchResults } from './fallbacks';
import { formatSearchResults } from './format';
import { retryPolicy, toOutcome } from './outcome';
import type { HandlerDeps, HandlerOutcome } from './types';

export async function handleSearch(
  query: string,
  deps: HandlerDeps,
  maxResults: number = deps.config.searchMaxResults
): Promise<HandlerOutcome> {
  const { sources, config, logger } = deps;
  const search = sources.search;

  const result = await resolveWithFallback({
    label: 'search',
    run: search ? (signal) => search.search(query, maxResults, { signal }) : null,
    fallback: () => mockSearchResults(query, maxResults),
    timeoutMs: config.sourceTimeoutMs,
    retry: retryPolicy(config),
    logger
  });

  return toOutcome(result, formatSearchResults(query, result.data.slice(0, maxResults), config.snippetLength));
}
