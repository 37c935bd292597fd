export * from './http/requestJson';
export * from './newsapi/news';
export * from './tavily/search';
export * from './openai/completion';
export * from './news/fake';
export * from './search/fake';
export * from './completion/fake';
export * from './session/memory';
export * from './session/sqlite';
export * from './session/schema';
export * from './logger/pino';
export * from './logger/fake';
