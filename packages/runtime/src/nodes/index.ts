import type {
  ContainedError,
  Interaction,
  InteractionMetadata,
  Logger,
  NodeResult,
  RoutingDecision,
  RuntimeConfig,
  RuntimeResources,
  SourceMode
} from '@newsroute/core';
import { routeQueryNode } from './routeQuery';
import { newsHandlerNode, qaHandlerNode, searchHandlerNode } from './handlers';
import { persistInteractionNode } from './persistInteraction';

/**
 * Channels of the per-request query graph.
 */
export interface QueryState {
  query: string;
  category: string;
  sessionId: string;
  decision?: RoutingDecision | undefined;
  response?: string | undefined;
  source?: SourceMode | undefined;
  fallbackReason?: string | undefined;
  /** Exception contained by the orchestrator, if any. */
  error?: ContainedError | undefined;
  metadata?: InteractionMetadata | undefined;
  interaction?: Interaction | undefined;
  persisted?: boolean | undefined;
}

export interface QueryEngineContext {
  requestId: string;
  startedAt: Date;
  config: RuntimeConfig;
  resources: RuntimeResources;
  /** Bound to `{ requestId, sessionId }`. */
  logger: Logger;
}

export type QueryNodeName =
  | 'route_query'
  | 'news_handler'
  | 'search_handler'
  | 'qa_handler'
  | 'persist_interaction';

export type QueryNodeHandler = (
  context: QueryEngineContext & { state: Readonly<QueryState> }
) => Promise<NodeResult<Partial<QueryState>>>;

export type QueryNodeHandlerMap = Record<QueryNodeName, QueryNodeHandler>;

export function buildDefaultNodeHandlers(): QueryNodeHandlerMap {
  return {
    route_query: routeQueryNode,
    news_handler: newsHandlerNode,
    search_handler: searchHandlerNode,
    qa_handler: qaHandlerNode,
    persist_interaction: persistInteractionNode
  };
}

export { routeQueryNode, newsHandlerNode, searchHandlerNode, qaHandlerNode, persistInteractionNode };
export { containFailure, withErrorContainment } from './containment';
export { buildMetadata, persistInteraction } from './persistInteraction';
