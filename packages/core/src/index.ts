export * from './lifecycle';
export * from './errors';
export * from './contracts';
export * from './entities/routing';
export * from './entities/sources';
export * from './entities/interaction';
export * from './ports';
export * from './config';
export * from './utils';
