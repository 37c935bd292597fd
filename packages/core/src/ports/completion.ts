import type { RuntimeResource } from '../lifecycle';
import type { CompletionResponse } from '../entities/sources';
import type { SourceCallOptions } from './source-call';

export interface CompletionRequest {
  prompt       : string;
  maxTokens    : number;
  temperature  : number;
  systemPrompt?: string | undefined;
}

export interface CompletionSource extends RuntimeResource {
  complete(request: CompletionRequest, options?: SourceCallOptions): Promise<CompletionResponse>;
}
