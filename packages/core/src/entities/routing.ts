export const NEWS_CATEGORIES = [
  'business',
  'entertainment',
  'general',
  'health',
  'science',
  'sports',
  'technology'
] as const;

export type NewsCategory = typeof NEWS_CATEGORIES[number];

export type Route = 'news' | 'search' | 'qa';

export type RoutingRuleName =
  | 'search-keyword'
  | 'question'
  | 'explicit-category'
  | 'category-mention'
  | 'default';

export interface RoutingDecision {
  route: Route;
  resolvedCategory?: NewsCategory | undefined;
  /** Name of the rule that produced this decision. */
  rule: RoutingRuleName;
}

export function isNewsCategory(value: string): value is NewsCategory {
  return (NEWS_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Lower-cases and trims a caller-supplied category. Returns null for
 * anything outside the fixed set, including the empty string.
 */
export function normalizeCategory(value: string | null | undefined): NewsCategory | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  return isNewsCategory(normalized) ? normalized : null;
}
