import { defineNode } from '@newsroute/engine';
import type { NodeResult } from '@newsroute/core';
import { handleNews, handleQuestion, handleSearch, type HandlerDeps, type HandlerOutcome } from '../handlers';
import type { QueryEngineContext, QueryState } from './index';

function handlerDeps(context: QueryEngineContext): HandlerDeps {
  return { sources: context.resources, config: context.config, logger: context.logger };
}

function toResult(outcome: HandlerOutcome): NodeResult<Partial<QueryState>> {
  return {
    stateDiff: {
      response: outcome.response,
      source: outcome.source,
      fallbackReason: outcome.fallbackReason
    },
    nextTasks: ['persist_interaction']
  };
}

/**
 * news_handler
 *
 * Rule 3 and 4 always resolve a category; `general` covers handlers
 * scheduled directly.
 */
export const newsHandlerNode = defineNode<QueryState, QueryEngineContext>(async (context) => {
  const category = context.state.decision?.resolvedCategory ?? 'general';
  return toResult(await handleNews(category, handlerDeps(context)));
});

/**
 * search_handler
 */
export const searchHandlerNode = defineNode<QueryState, QueryEngineContext>(async (context) => {
  return toResult(await handleSearch(context.state.query, handlerDeps(context)));
});

/**
 * qa_handler
 */
export const qaHandlerNode = defineNode<QueryState, QueryEngineContext>(async (context) => {
  const { query, category } = context.state;
  return toResult(await handleQuestion(query, category, handlerDeps(context)));
});
