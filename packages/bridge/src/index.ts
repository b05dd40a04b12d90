// packages/bridge/src/index.ts
export * from './request';
export * from './router';
export * from './descriptor';
export * from './normalize';
export * from './context';
export * from './bridge';
export { WAREHOUSE, WarehouseTranslator } from './resources/warehouse';
export { DATABASE, DatabaseTranslator } from './resources/database';
export { SCHEMA, SchemaTranslator } from './resources/schema';
export { TASK, TaskTranslator, parseSchedule, scheduleText } from './resources/task';
export { TABLE, TableTranslator, parseClusterBy } from './resources/table';
export { normalizeDatatype, isSystemConstraintName } from './resources/table-ddl';
export { COMPUTE_POOL, ComputePoolTranslator } from './resources/compute-pool';
export { SERVICE, ServiceTranslator, specClause } from './resources/service';
export { IMAGE_REPOSITORY, ImageRepositoryTranslator } from './resources/image-repository';
