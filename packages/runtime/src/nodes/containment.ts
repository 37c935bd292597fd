import { errorMessage, errorType, type ContainedError, type Logger } from '@newsroute/core';
import { errorResponse } from '../handlers';
import type { QueryNodeHandler, QueryState } from './index';

/**
 * State written in place of a handler result when routing or a handler
 * throws.
 */
export function containFailure(error: unknown, detailLength: number, logger: Logger): Partial<QueryState> {
  const contained: ContainedError = { type: errorType(error), message: errorMessage(error) };
  logger.error({ err: error, errorType: contained.type }, 'Request failed, responding with error text');

  return {
    response: errorResponse(error, detailLength),
    error: contained
  };
}

/**
 * Wraps a routing or handler node so an exception ends in an `[error]`
 * response that is still persisted.
 */
export function withErrorContainment(node: QueryNodeHandler): QueryNodeHandler {
  return async (context) => {
    try {
      return await node(context);
    } catch (error) {
      return {
        stateDiff: containFailure(error, context.config.errorDetailLength, context.logger),
        nextTasks: ['persist_interaction']
      };
    }
  };
}
