// packages/core/src/index.ts
export * from './types';
export * from './errors';
export * from './identifiers';
export * from './create-mode';
export * from './schemas';
export * from './config';
export * from './logger';
