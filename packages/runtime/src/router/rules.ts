import {
  NEWS_CATEGORIES,
  normalizeCategory,
  type NewsCategory,
  type Route,
  type RoutingDecision,
  type RoutingRuleName
} from '@newsroute/core';

export const SEARCH_KEYWORDS = ['search', 'find', 'lookup', 'browse'] as const;
export const QUESTION_WORDS = ['who', 'what', 'when', 'where', 'why', 'how'] as const;
export const AUXILIARY_VERBS = ['is', 'are', 'can', 'could', 'will', 'would', 'should', 'do', 'does', 'did'] as const;
export const INSTRUCTION_VERBS = ['tell', 'explain', 'describe', 'define'] as const;

export interface RoutingInput {
  /** Lower-cased query text. */
  text: string;
  /** Whole words of the query, lower-cased. */
  words: ReadonlySet<string>;
  /** Request category when it names a known news category. */
  category: NewsCategory | null;
}

export interface RuleMatch {
  resolvedCategory?: NewsCategory;
}

export interface RoutingRule {
  name: RoutingRuleName;
  route: Route;
  match: (input: RoutingInput) => RuleMatch | null;
}

function hasAnyWord(words: ReadonlySet<string>, candidates: readonly string[]): boolean {
  return candidates.some((candidate) => words.has(candidate));
}

/**
 * Decision table, evaluated top to bottom. The first rule that matches
 * decides the route; `default` always matches.
 */
export const ROUTING_RULES: readonly RoutingRule[] = [
  {
    name: 'search-keyword',
    route: 'search',
    match: ({ text }) => (SEARCH_KEYWORDS.some((keyword) => text.includes(keyword)) ? {} : null)
  },
  {
    name: 'question',
    route: 'qa',
    match: ({ words }) => {
      const question = hasAnyWord(words, QUESTION_WORDS) && hasAnyWord(words, AUXILIARY_VERBS);
      return question || hasAnyWord(words, INSTRUCTION_VERBS) ? {} : null;
    }
  },
  {
    name: 'explicit-category',
    route: 'news',
    match: ({ category }) => (category ? { resolvedCategory: category } : null)
  },
  {
    name: 'category-mention',
    route: 'news',
    // plain substring: "transports" resolves to sports
    match: ({ text }) => {
      const mentioned = NEWS_CATEGORIES.find((candidate) => text.includes(candidate));
      return mentioned ? { resolvedCategory: mentioned } : null;
    }
  },
  {
    name: 'default',
    route: 'search',
    match: () => ({})
  }
];

export function toRoutingInput(query: string, category?: string | null): RoutingInput {
  const text = query.toLowerCase();
  return {
    text,
    words: new Set(text.match(/[a-z0-9]+/g) ?? []),
    category: normalizeCategory(category)
  };
}

/**
 * Classifies a query into a route. Pure and total: every input resolves.
 */
export function route(query: string, category?: string | null, rules: readonly RoutingRule[] = ROUTING_RULES): RoutingDecision {
  const input = toRoutingInput(query, category);

  for (const rule of rules) {
    const matched = rule.match(input);
    if (matched) {
      return { route: rule.route, rule: rule.name, ...matched };
    }
  }

  return { route: 'search', rule: 'default' };
}
