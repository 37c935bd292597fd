import {
  FakeCompletionSource,
  FakeLogger,
  FakeNewsSource,
  FakeSearchSource,
  InMemorySessionStore,
  NewsApiSource,
  OpenAICompletionSource,
  PinoLogger,
  SqliteSessionStore,
  TavilySearchSource,
  type LogLevel
} from '@newsroute/adapters';
import { ConfigError, LOGGING_DEFAULTS, SOURCE_DEFAULTS, type RuntimeResources } from '@newsroute/core';
import { loadEnvConfig, type EnvConfig } from '../config/env';

interface ApiKeyOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

interface OpenAICompletionFactoryOptions extends ApiKeyOptions {
  model?: string;
}

interface PinoFactoryOptions {
  level?: LogLevel;
  prettyPrint?: boolean;
}

function resolveApiKey(input: string | undefined, envName: string): string {
  const apiKey = input ?? process.env[envName];
  if (!apiKey) {
    throw new ConfigError({ missing: [envName] });
  }

  return apiKey;
}

export const integrations = {
  news: {
    newsapi(options: ApiKeyOptions = {}) {
      const apiKey    = resolveApiKey(options.apiKey, 'NEWS_API_KEY');
      const timeoutMs = options.timeoutMs ?? SOURCE_DEFAULTS.TIMEOUT_MS;

      return new NewsApiSource({ apiKey, timeoutMs, ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}) });
    },
    fake() {
      return new FakeNewsSource();
    }
  },
  search: {
    tavily(options: ApiKeyOptions = {}) {
      const apiKey    = resolveApiKey(options.apiKey, 'TAVILY_API_KEY');
      const timeoutMs = options.timeoutMs ?? SOURCE_DEFAULTS.TIMEOUT_MS;

      return new TavilySearchSource({ apiKey, timeoutMs, ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}) });
    },
    fake() {
      return new FakeSearchSource();
    }
  },
  completion: {
    openai(options: OpenAICompletionFactoryOptions = {}) {
      const apiKey    = resolveApiKey(options.apiKey, 'OPENAI_API_KEY');
      const model     = options.model ?? process.env.OPENAI_MODEL ?? 'gpt-4o-mini';
      const baseUrl   = options.baseUrl ?? process.env.OPENAI_BASE_URL ?? 'https://api.openai.com/v1';
      const timeoutMs = options.timeoutMs ?? SOURCE_DEFAULTS.TIMEOUT_MS;

      return new OpenAICompletionSource({ apiKey, model, baseUrl, timeoutMs });
    },
    fake() {
      return new FakeCompletionSource();
    }
  },
  sessions: {
    sqlite(options: { filename: string }) {
      return new SqliteSessionStore(options);
    },
    memory() {
      return new InMemorySessionStore();
    }
  },
  logger: {
    pino(options: PinoFactoryOptions = {}) {
      return new PinoLogger({
        name: 'newsroute',
        level: options.level ?? LOGGING_DEFAULTS.LEVEL,
        prettyPrint: options.prettyPrint ?? LOGGING_DEFAULTS.PRETTY_PRINT
      });
    },
    fake() {
      return new FakeLogger();
    }
  }
};

/**
 * Live sources for every API key present in `env`; the others stay `null`
 * and answer from fallback content.
 */
export function createLocalIntegrations(env: EnvConfig = loadEnvConfig()): RuntimeResources {
  const timeoutMs = env.sourceTimeoutMs ?? SOURCE_DEFAULTS.TIMEOUT_MS;

  return {
    news       : env.newsApiKey ? integrations.news.newsapi({ apiKey: env.newsApiKey, timeoutMs }) : null,
    search     : env.tavilyApiKey ? integrations.search.tavily({ apiKey: env.tavilyApiKey, timeoutMs }) : null,
    completion : env.openaiApiKey
      ? integrations.completion.openai({
        apiKey: env.openaiApiKey,
        model: env.openaiModel,
        timeoutMs,
        ...(env.openaiBaseUrl ? { baseUrl: env.openaiBaseUrl } : {})
      })
      : null,
    sessions   : integrations.sessions.sqlite({ filename: env.dbPath }),
    logger     : integrations.logger.pino({ level: env.logLevel, prettyPrint: env.nodeEnv !== 'production' })
  };
}
