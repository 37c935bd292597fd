import type { NodeResult } from '@newsroute/core';

export interface GraphNode<TState, TContext, TStateDiff = Partial<TState>> {
  (context: TContext & { state: Readonly<TState> }): Promise<NodeResult<TStateDiff>>;
}

/**
 * Helper to define a graph node with type safety.
 */
export function defineNode<TState, TContext, TStateDiff = Partial<TState>>(
  handler: (context: TContext & { state: Readonly<TState> }) => Promise<NodeResult<TStateDiff>>
): GraphNode<TState, TContext, TStateDiff> {
  return handler;
}
