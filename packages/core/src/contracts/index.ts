export * from './node';
export * from './checkpoint';
export * from './resources';
