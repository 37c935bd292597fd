import { resolveWithFallback, type NewsCategory } from '@newsroute/core';
import { mockHeadlines } from './fallbacks';
import { formatHeadlines } from './format';
import { retryPolicy, toOutcome } from './outcome';
import type { HandlerDeps, HandlerOutcome } from './types';

/**
 * Top headlines for one category. Missing credentials or a failing news
 * source yield sample headlines instead of an error.
 */
export async function handleNews(category: NewsCategory, deps: HandlerDeps): Promise<HandlerOutcome> {
  const { sources, config, logger } = deps;
  const news = sources.news;

  const result = await resolveWithFallback({
    label: 'news',
    run: news ? (signal) => news.fetchHeadlines(category, config.newsPageSize, { signal }) : null,
    fallback: () => mockHeadlines(category, config.newsPageSize),
    timeoutMs: config.sourceTimeoutMs,
    retry: retryPolicy(config),
    logger
  });

  return toOutcome(result, formatHeadlines(category, result.data.slice(0, config.newsPageSize)));
}
