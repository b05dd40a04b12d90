// packages/reconciler/src/index.ts
export * from './values';
export * from './property-diff';
export * from './strategies';
export * from './plan';
