import { lastWriteWinsReducer, type ChannelMap, type EngineGraphSpec } from '@newsroute/engine';
import { withErrorContainment, type QueryEngineContext, type QueryNodeHandlerMap, type QueryState } from '../nodes';

/**
 * Builds the per-request query graph from the node handlers.
 *
 * Routing and handler nodes are wrapped so an exception becomes an
 * `[error]` response; `persist_interaction` always runs last.
 */
export function buildQueryGraphSpec(handlers: QueryNodeHandlerMap): EngineGraphSpec<QueryState, QueryEngineContext> {
    const channels: ChannelMap<QueryState> = {
        query: lastWriteWinsReducer(),
        category: lastWriteWinsReducer(),
        sessionId: lastWriteWinsReducer(),
        decision: lastWriteWinsReducer(),
        response: lastWriteWinsReducer(),
        source: lastWriteWinsReducer(),
        fallbackReason: lastWriteWinsReducer(),
        error: lastWriteWinsReducer(),
        metadata: lastWriteWinsReducer(),
        interaction: lastWriteWinsReducer(),
        persisted: lastWriteWinsReducer()
    };

    return {
        channels,
        nodes: {
            route_query: withErrorContainment(handlers.route_query),
            news_handler: withErrorContainment(handlers.news_handler),
            search_handler: withErrorContainment(handlers.search_handler),
            qa_handler: withErrorContainment(handlers.qa_handler),
            persist_interaction: handlers.persist_interaction
        }
    };
}
