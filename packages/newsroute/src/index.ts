export type {
  Interaction,
  InteractionMetadata,
  NewsCategory,
  Route,
  RoutingDecision,
  SessionStats,
  NewsSource,
  SearchSource,
  CompletionSource,
  SessionStore,
  Logger,
} from '@newsroute/core';
export { NEWS_CATEGORIES, ConfigError, SourceError, PersistenceError } from '@newsroute/core';
export type { ProcessResult, QueryRequest, SourceStatuses } from '@newsroute/runtime';
export { route } from '@newsroute/runtime';

export * from './api/createAssistant';
export * from './config/env';
export * from './integrations';
export * from './server';
