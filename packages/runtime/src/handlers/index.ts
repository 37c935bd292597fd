export * from './types';
export * from './news';
export * from './search';
export * from './qa';
export * from './format';
export * from './fallbacks';
