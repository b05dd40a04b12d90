// packages/sql-api/src/index.ts
export * from './native-error';
export * from './error-map';
export * from './session';
export * from './pool';
export * from './client';
export * from './executor';
