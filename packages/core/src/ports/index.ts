export * from './logger';
export * from './source-call';
export * from './news';
export * from './search';
export * from './completion';
export * from './session-store';
