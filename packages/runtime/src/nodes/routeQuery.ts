import { defineNode } from '@newsroute/engine';
import { route } from '../router';
import type { QueryEngineContext, QueryState } from './index';

/**
 * route_query
 */
export const routeQueryNode = defineNode<QueryState, QueryEngineContext>(async (context) => {
  const { state, logger } = context;
  const decision = route(state.query, state.category);

  logger.debug({ route: decision.route, rule: decision.rule, resolvedCategory: decision.resolvedCategory }, 'Routing decision');

  return {
    stateDiff: { decision },
    nextTasks: [`${decision.route}_handler`]
  };
});
