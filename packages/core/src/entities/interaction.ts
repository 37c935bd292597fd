import type { NewsCategory, Route, RoutingRuleName } from './routing';

export type SourceMode = 'live' | 'fallback';

export interface ContainedError {
  type   : string;
  message: string;
}

/**
 * Diagnostic record stored next to every interaction. Written once, never
 * updated.
 */
export interface InteractionMetadata {
  route?           : Route | undefined;
  rule?            : RoutingRuleName | undefined;
  resolvedCategory?: NewsCategory | undefined;
  /** Whether the handler used live API data or a fallback. */
  source?          : SourceMode | undefined;
  fallbackReason?  : string | undefined;
  /** Set when the orchestrator contained an exception from routing or a handler. */
  error?           : ContainedError | undefined;
  latencyMs?       : number | undefined;
  requestId?       : string | undefined;
}

export interface Interaction {
  id        : string;
  timestamp : Date;
  sessionId : string;
  query     : string;
  category  : string;
  response  : string;
  metadata  : InteractionMetadata;
}

export type NewInteraction = Omit<Interaction, 'id' | 'timestamp'> & { timestamp?: Date };

export interface SessionStats {
  sessionId: string;
  total    : number;
  byRoute  : Record<Route, number>;
  fallbacks: number;
  errors   : number;
}

export function emptySessionStats(sessionId: string): SessionStats {
  return {
    sessionId,
    total: 0,
    byRoute: { news: 0, search: 0, qa: 0 },
    fallbacks: 0,
    errors: 0
  };
}

/**
 * Folds a single interaction into running stats. Stores that cannot
 * aggregate natively use this to build `SessionStats`.
 */
export function accumulateStats(stats: SessionStats, interaction: Pick<Interaction, 'metadata'>): SessionStats {
  const { route, source, error } = interaction.metadata;
  return {
    ...stats,
    total: stats.total + 1,
    byRoute: route ? { ...stats.byRoute, [route]: stats.byRoute[route] + 1 } : stats.byRoute,
    fallbacks: stats.fallbacks + (source === 'fallback' ? 1 : 0),
    errors: stats.errors + (error ? 1 : 0)
  };
}
