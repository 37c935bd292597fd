import type { HandlerConfig, Logger, QuerySources, SourceCallConfig, SourceMode } from '@newsroute/core';

export interface HandlerDeps {
  sources: QuerySources;
  config: HandlerConfig & SourceCallConfig;
  logger?: Logger | undefined;
}

/** Text returned to the caller plus where its content came from. */
export interface HandlerOutcome {
  response: string;
  source: SourceMode;
  fallbackReason?: string | undefined;
}
