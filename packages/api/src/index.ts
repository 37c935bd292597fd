export * from './middleware';
export * from './schemas';
