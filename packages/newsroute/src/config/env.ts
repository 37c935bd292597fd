import { z } from 'zod';
import { ConfigError, LOGGING_DEFAULTS, SERVER_DEFAULTS } from '@newsroute/core';
import type { LogLevel } from '@newsroute/adapters';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const EnvSchema = z.object({
  NEWS_API_KEY                : optionalString,
  TAVILY_API_KEY              : optionalString,
  OPENAI_API_KEY              : optionalString,
  OPENAI_BASE_URL             : optionalString.pipe(z.string().url().optional()),
  OPENAI_MODEL                : optionalString.transform((value) => value ?? 'gpt-4o-mini'),
  NEWSROUTE_DB_PATH           : optionalString.transform((value) => value ?? SERVER_DEFAULTS.DB_PATH),
  NEWSROUTE_SOURCE_TIMEOUT_MS : optionalString.pipe(z.coerce.number().int().positive().optional()),
  NEWSROUTE_API_TOKEN         : optionalString,
  PORT                        : optionalString.pipe(z.coerce.number().int().min(1).max(65_535).default(SERVER_DEFAULTS.PORT)),
  HOST                        : optionalString.transform((value) => value ?? SERVER_DEFAULTS.HOST),
  LOG_LEVEL                   : optionalString.pipe(
    z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default(LOGGING_DEFAULTS.LEVEL)
  ),
  NODE_ENV                    : optionalString.transform((value) => value ?? 'development')
});

export interface EnvConfig {
  newsApiKey?     : string | undefined;
  tavilyApiKey?   : string | undefined;
  openaiApiKey?   : string | undefined;
  openaiBaseUrl?  : string | undefined;
  openaiModel     : string;
  dbPath          : string;
  sourceTimeoutMs?: number | undefined;
  apiToken?       : string | undefined;
  port            : number;
  host            : string;
  logLevel        : LogLevel;
  nodeEnv         : string;
}

/**
 * Reads assistant settings from environment variables. Missing API keys are
 * not errors: the matching source runs from fallback content.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const invalid = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError({ invalid });
  }

  const values = parsed.data;
  return {
    newsApiKey      : values.NEWS_API_KEY,
    tavilyApiKey    : values.TAVILY_API_KEY,
    openaiApiKey    : values.OPENAI_API_KEY,
    openaiBaseUrl   : values.OPENAI_BASE_URL,
    openaiModel     : values.OPENAI_MODEL,
    dbPath          : values.NEWSROUTE_DB_PATH,
    sourceTimeoutMs : values.NEWSROUTE_SOURCE_TIMEOUT_MS,
    apiToken        : values.NEWSROUTE_API_TOKEN,
    port            : values.PORT,
    host            : values.HOST,
    logLevel        : values.LOG_LEVEL,
    nodeEnv         : values.NODE_ENV
  };
}
