export * from './queryRuntime';
export * from './router';
export * from './handlers';
export * from './nodes';
export * from './engine/graph';
export * from './resources/lifecycle';
