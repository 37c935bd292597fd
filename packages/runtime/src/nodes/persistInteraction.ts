import { defineNode } from '@newsroute/engine';
import { errorMessage, type Interaction, type InteractionMetadata } from '@newsroute/core';
import type { QueryEngineContext, QueryState } from './index';

export function buildMetadata(context: QueryEngineContext, state: Readonly<QueryState>): InteractionMetadata {
  const metadata: InteractionMetadata = {
    requestId: context.requestId,
    latencyMs: Date.now() - context.startedAt.getTime()
  };
  if (state.decision) {
    metadata.route = state.decision.route;
    metadata.rule = state.decision.rule;
    if (state.decision.resolvedCategory) metadata.resolvedCategory = state.decision.resolvedCategory;
  }
  if (state.source) metadata.source = state.source;
  if (state.fallbackReason) metadata.fallbackReason = state.fallbackReason;
  if (state.error) metadata.error = state.error;
  return metadata;
}

/**
 * Appends the interaction to the session log. A failed write is logged and
 * reported through `persisted`, never thrown.
 */
export async function persistInteraction(
  context: QueryEngineContext,
  state: Readonly<QueryState>
): Promise<Pick<QueryState, 'metadata' | 'interaction' | 'persisted'>> {
  const metadata = buildMetadata(context, state);

  let interaction: Interaction;
  try {
    interaction = await context.resources.sessions.saveInteraction({
      sessionId: state.sessionId,
      query: state.query,
      category: state.category,
      response: state.response ?? '',
      metadata
    });
  } catch (error) {
    context.logger.error({ err: error, reason: errorMessage(error) }, 'Failed to persist interaction');
    return { metadata, persisted: false };
  }

  return { metadata, interaction, persisted: true };
}

/**
 * persist_interaction
 */
export const persistInteractionNode = defineNode<QueryState, QueryEngineContext>(async (context) => {
  return {
    stateDiff: await persistInteraction(context, context.state),
    nextTasks: []
  };
});
