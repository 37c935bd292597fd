import type { RetryPolicy, SourceCallConfig, SourceResult } from '@newsroute/core';
import type { HandlerOutcome } from './types';

export function retryPolicy(config: SourceCallConfig): RetryPolicy {
  return {
    maxRetries: config.maxSourceRetries,
    baseDelayMs: config.retryBaseDelayMs,
    jitterMs: config.retryJitterMs
  };
}

export function toOutcome<T>(result: SourceResult<T>, response: string): HandlerOutcome {
  if (result.status === 'live') {
    return { response, source: 'live' };
  }
  return { response, source: 'fallback', fallbackReason: result.reason };
}
