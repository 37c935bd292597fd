import {
  ConfigError,
  HANDLER_DEFAULTS,
  HISTORY_DEFAULTS,
  SOURCE_DEFAULTS,
  type Interaction,
  type RuntimeConfig,
  type RuntimeResources,
  type SessionStats
} from '@newsroute/core';
import {
  QueryRuntime,
  buildDefaultNodeHandlers,
  type ProcessResult,
  type QueryRequest,
  type SourceStatuses
} from '@newsroute/runtime';
import { createLocalIntegrations } from '../integrations';

export type AssistantProvidersConfig = Partial<RuntimeResources>;

export interface AssistantConfig {
  newsPageSize?          : number;
  searchMaxResults?      : number;
  completionMaxTokens?   : number;
  completionTemperature? : number;
  completionSystemPrompt?: string;
  snippetLength?         : number;
  errorDetailLength?     : number;
  sourceTimeoutMs?       : number;
  maxSourceRetries?      : number;
  retryBaseDelayMs?      : number;
  retryJitterMs?         : number;
  historyLimit?          : number;
  /** `null` for a source means "run it from fallbacks"; omitted means "build from the environment". */
  providers?             : AssistantProvidersConfig;
}

export interface Assistant {
  start(): Promise<void>;
  close(): Promise<void>;
  processRequest(request: QueryRequest): Promise<ProcessResult>;
  respond(query: string, sessionId: string, category?: string | null): Promise<string>;
  getHistory(sessionId: string, limit?: number): Promise<Interaction[]>;
  clearHistory(sessionId: string): Promise<number>;
  getSessionStats(sessionId: string): Promise<SessionStats>;
  sourceStatuses(): SourceStatuses;
}

export function createAssistant(config: AssistantConfig = {}): Assistant {
  let runtime: QueryRuntime | null = null;
  let resources: RuntimeResources | null = null;

  const ensureRuntime = (): QueryRuntime => {
    if (runtime) return runtime;

    const runtimeConfig = resolveAssistantConfig(config);
    validateAssistantConfig(runtimeConfig);
    resources = applyDefaultProviders(config.providers ?? {});

    runtime = new QueryRuntime({
      config: runtimeConfig,
      resources,
      handlers: buildDefaultNodeHandlers()
    });
    return runtime;
  };

  return {
    async start(): Promise<void> {
      const started = ensureRuntime();
      await started.start();

      const statuses = started.sourceStatuses();
      for (const [source, status] of Object.entries(statuses)) {
        if (status === 'mock') {
          resources?.logger.warn({ source }, 'Source not configured, answering from fallback content');
        }
      }
    },

    async close(): Promise<void> {
      if (!runtime) return;
      await runtime.close();
    },

    async processRequest(request) {
      return ensureRuntime().processRequest(request);
    },

    async respond(query, sessionId, category) {
      return ensureRuntime().respond(query, sessionId, category);
    },

    async getHistory(sessionId, limit) {
      return ensureRuntime().getHistory(sessionId, limit);
    },

    async clearHistory(sessionId) {
      return ensureRuntime().clearHistory(sessionId);
    },

    async getSessionStats(sessionId) {
      return ensureRuntime().getSessionStats(sessionId);
    },

    sourceStatuses() {
      return ensureRuntime().sourceStatuses();
    }
  };
}

function resolveAssistantConfig(config: AssistantConfig): RuntimeConfig {
  const resolved: RuntimeConfig = {
    newsPageSize          : config.newsPageSize          ?? HANDLER_DEFAULTS.NEWS_PAGE_SIZE,
    searchMaxResults      : config.searchMaxResults      ?? HANDLER_DEFAULTS.SEARCH_MAX_RESULTS,
    completionMaxTokens   : config.completionMaxTokens   ?? HANDLER_DEFAULTS.COMPLETION_MAX_TOKENS,
    completionTemperature : config.completionTemperature ?? HANDLER_DEFAULTS.COMPLETION_TEMPERATURE,
    snippetLength         : config.snippetLength         ?? HANDLER_DEFAULTS.SNIPPET_LENGTH,
    errorDetailLength     : config.errorDetailLength     ?? HANDLER_DEFAULTS.ERROR_DETAIL_LENGTH,
    sourceTimeoutMs       : config.sourceTimeoutMs       ?? SOURCE_DEFAULTS.TIMEOUT_MS,
    maxSourceRetries      : config.maxSourceRetries      ?? SOURCE_DEFAULTS.MAX_RETRIES,
    retryBaseDelayMs      : config.retryBaseDelayMs      ?? SOURCE_DEFAULTS.RETRY_BASE_DELAY_MS,
    retryJitterMs         : config.retryJitterMs         ?? SOURCE_DEFAULTS.RETRY_JITTER_MS,
    historyLimit          : config.historyLimit          ?? HISTORY_DEFAULTS.LIMIT
  };
  if (config.completionSystemPrompt !== undefined) {
    resolved.completionSystemPrompt = config.completionSystemPrompt;
  }

  return resolved;
}

function validateAssistantConfig(config: RuntimeConfig): void {
  const invalid: string[] = [];

  const mustBePositiveInteger: Array<{ key: string; value: number }> = [
    { key: 'newsPageSize',        value: config.newsPageSize        },
    { key: 'searchMaxResults',    value: config.searchMaxResults    },
    { key: 'completionMaxTokens', value: config.completionMaxTokens },
    { key: 'snippetLength',       value: config.snippetLength       },
    { key: 'errorDetailLength',   value: config.errorDetailLength   },
    { key: 'sourceTimeoutMs',     value: config.sourceTimeoutMs     },
    { key: 'historyLimit',        value: config.historyLimit        }
  ];
  for (const item of mustBePositiveInteger) {
    if (!Number.isInteger(item.value) || item.value <= 0) {
      invalid.push(item.key);
    }
  }

  const mustBeNonNegativeInteger: Array<{ key: string; value: number }> = [
    { key: 'maxSourceRetries', value: config.maxSourceRetries },
    { key: 'retryBaseDelayMs', value: config.retryBaseDelayMs },
    { key: 'retryJitterMs',    value: config.retryJitterMs    }
  ];
  for (const item of mustBeNonNegativeInteger) {
    if (!Number.isInteger(item.value) || item.value < 0) {
      invalid.push(item.key);
    }
  }

  // NewsAPI caps pageSize at 100
  if (config.newsPageSize > 100) {
    invalid.push('newsPageSize');
  }
  if (!Number.isFinite(config.completionTemperature) || config.completionTemperature < 0 || config.completionTemperature > 2) {
    invalid.push('completionTemperature');
  }
  if (config.historyLimit > HISTORY_DEFAULTS.MAX_LIMIT) {
    invalid.push('historyLimit');
  }

  if (invalid.length > 0) {
    throw new ConfigError({ invalid: [...new Set(invalid)] });
  }
}

function validateAssistantResources(resources: AssistantProvidersConfig): RuntimeResources {
  const missing: string[] = [];
  const { news, search, completion, sessions, logger } = resources;

  if (news === undefined) missing.push('providers.news');
  if (search === undefined) missing.push('providers.search');
  if (completion === undefined) missing.push('providers.completion');
  if (!sessions) missing.push('providers.sessions');
  if (!logger) missing.push('providers.logger');

  if (news === undefined || search === undefined || completion === undefined || !sessions || !logger) {
    throw new ConfigError({ missing });
  }

  return { news, search, completion, sessions, logger };
}

function applyDefaultProviders(resources: AssistantProvidersConfig): RuntimeResources {
  const hasAllRequired =
    resources.news       !== undefined &&
    resources.search     !== undefined &&
    resources.completion !== undefined &&
    resources.sessions   !== undefined &&
    resources.logger     !== undefined;

  if (hasAllRequired) {
    return validateAssistantResources(resources);
  }

  const defaults = createLocalIntegrations();
  return validateAssistantResources({
    news       : resources.news       !== undefined ? resources.news       : defaults.news,
    search     : resources.search     !== undefined ? resources.search     : defaults.search,
    completion : resources.completion !== undefined ? resources.completion : defaults.completion,
    sessions   : resources.sessions   ?? defaults.sessions,
    logger     : resources.logger     ?? defaults.logger
  });
}

export const __private = {
  resolveAssistantConfig,
  validateAssistantConfig,
  validateAssistantResources
};
