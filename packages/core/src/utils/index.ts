export * from './async';
export * from './fallback';
export * from './text';
