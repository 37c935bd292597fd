export interface HandlerConfig {
  newsPageSize          : number;
  searchMaxResults      : number;
  completionMaxTokens   : number;
  completionTemperature : number;
  completionSystemPrompt?: string | undefined;
  snippetLength         : number;
  errorDetailLength     : number;
}

export interface SourceCallConfig {
  sourceTimeoutMs  : number;
  maxSourceRetries : number;
  retryBaseDelayMs : number;
  retryJitterMs    : number;
}

export interface RuntimeConfig extends HandlerConfig, SourceCallConfig {
  historyLimit: number;
}
