import { randomUUID } from 'node:crypto';

import type {
  Interaction,
  InteractionMetadata,
  RoutingDecision,
  RuntimeConfig,
  RuntimeResource,
  RuntimeResources,
  SessionStats
} from '@newsroute/core';
import { EngineExecutor, TransientCheckpointSaver } from '@newsroute/engine';

import { buildQueryGraphSpec } from './engine/graph';
import {
  buildDefaultNodeHandlers,
  containFailure,
  persistInteraction,
  type QueryEngineContext,
  type QueryNodeHandlerMap,
  type QueryState
} from './nodes';
import { closeResources, collectLifecycleResources, startResources } from './resources/lifecycle';

export interface QueryRequest {
  query?: string | null | undefined;
  sessionId: string;
  category?: string | null | undefined;
}

export interface ProcessResult {
  requestId: string;
  response: string;
  /** `null` when routing itself failed. */
  decision: RoutingDecision | null;
  /** `null` when the session store rejected the write. */
  interaction: Interaction | null;
  metadata: InteractionMetadata;
  persisted: boolean;
}

export type SourceStatus = 'live' | 'mock';

export interface SourceStatuses {
  news: SourceStatus;
  search: SourceStatus;
  completion: SourceStatus;
}

interface QueryRuntimeInput {
  config: RuntimeConfig;
  resources: RuntimeResources;
  /** Replaces individual graph nodes. */
  handlers?: Partial<QueryNodeHandlerMap>;
}

/**
 * Runs one request through route -> handler -> persist and always returns
 * a response. Failures from routing or handlers become `[error]` text; a
 * failed write is logged and reported as `persisted: false`.
 */
export class QueryRuntime {
  private readonly config: RuntimeConfig;
  private readonly resources: RuntimeResources;
  private readonly executor: EngineExecutor<QueryState, QueryEngineContext>;
  private lifecycleResources: RuntimeResource[] = [];

  public constructor(input: QueryRuntimeInput) {
    this.config = input.config;
    this.resources = input.resources;

    const handlers = { ...buildDefaultNodeHandlers(), ...input.handlers };
    this.executor = new EngineExecutor(buildQueryGraphSpec(handlers));
  }

  public async start(): Promise<void> {
    this.lifecycleResources = collectLifecycleResources(this.resources);
    try {
      await startResources(this.lifecycleResources);
    } catch (error) {
      await closeResources(this.lifecycleResources);
      this.lifecycleResources = [];
      throw error;
    }
  }

  public async close(): Promise<void> {
    await closeResources(this.lifecycleResources);
    this.lifecycleResources = [];
  }

  public async processRequest(request: QueryRequest): Promise<ProcessResult> {
    const requestId = randomUUID();
    const logger = this.resources.logger.child({ requestId, sessionId: request.sessionId });
    const context: QueryEngineContext = {
      requestId,
      startedAt: new Date(),
      config: this.config,
      resources: this.resources,
      logger
    };
    const input: QueryState = {
      query: request.query?.trim() ?? '',
      category: request.category?.trim() ?? '',
      sessionId: request.sessionId
    };

    logger.debug({ queryLength: input.query.length, category: input.category || null }, 'Processing query');

    let state: QueryState;
    try {
      const snapshot = await this.executor.invoke(input, context, {
        threadId: requestId,
        saver: new TransientCheckpointSaver<QueryState>(),
        entrypoint: 'route_query',
        logger
      });
      state = snapshot.values;
    } catch (error) {
      const failed = { ...input, ...containFailure(error, this.config.errorDetailLength, logger) };
      state = { ...failed, ...(await persistInteraction(context, failed)) };
    }

    const response = state.response ?? '';
    logger.info({
      route: state.decision?.route,
      source: state.source,
      persisted: state.persisted ?? false,
      latencyMs: Date.now() - context.startedAt.getTime()
    }, 'Query processed');

    return {
      requestId,
      response,
      decision: state.decision ?? null,
      interaction: state.interaction ?? null,
      metadata: state.metadata ?? {},
      persisted: state.persisted ?? false
    };
  }

  public async respond(query: string, sessionId: string, category?: string | null): Promise<string> {
    const result = await this.processRequest({ query, sessionId, category });
    return result.response;
  }

  public async getHistory(sessionId: string, limit: number = this.config.historyLimit): Promise<Interaction[]> {
    return this.resources.sessions.getHistory(sessionId, limit);
  }

  public async clearHistory(sessionId: string): Promise<number> {
    const removed = await this.resources.sessions.clear(sessionId);
    this.resources.logger.info({ sessionId, removed }, 'Session history cleared');
    return removed;
  }

  public async getSessionStats(sessionId: string): Promise<SessionStats> {
    return this.resources.sessions.stats(sessionId);
  }

  public sourceStatuses(): SourceStatuses {
    return {
      news: this.resources.news ? 'live' : 'mock',
      search: this.resources.search ? 'live' : 'mock',
      completion: this.resources.completion ? 'live' : 'mock'
    };
  }
}
