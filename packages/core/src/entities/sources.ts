export interface NewsArticle {
  title     : string;
  sourceName: string;
  url       : string;
}

export interface SearchResult {
  title  : string;
  content: string;
  url    : string;
}

export interface TokensUsed {
  promptTokens     : number;
  completionTokens : number;
}

export interface CompletionResponse {
  content   : string;
  model     : string;
  tokensUsed: TokensUsed;
  latencyMs : number;
}
