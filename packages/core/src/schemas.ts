// packages/core/src/schemas.ts
import { z } from 'zod';
import type { JsonObject, JsonValue } from './types';

// recursive JSON value
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export const HttpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'DELETE']);

// inbound request before path parsing
export const InboundRequestSchema = z.object({
  method: z.string().transform((m) => m.toUpperCase()).pipe(HttpMethodSchema),
  url: z.string().min(1),
  query: z.record(z.union([z.string(), z.array(z.string())])).optional(),
  body: JsonObjectSchema.nullable().optional(),
});
export type InboundRequest = z.input<typeof InboundRequestSchema>;

const Name = z.string().min(1);
const Int = z.number().int();
const Text = z.string().nullable();

// ---- warehouse ----
export const WarehouseBody = z.object({
  name: Name,
  warehouse_type: z.string().optional(),
  warehouse_size: z.string().optional(),
  wait_for_completion: z.boolean().optional(),
  max_cluster_count: Int.nullable().optional(),
  min_cluster_count: Int.nullable().optional(),
  scaling_policy: z.string().nullable().optional(),
  auto_suspend: Int.nullable().optional(),
  auto_resume: z.boolean().nullable().optional(),
  initially_suspended: z.boolean().optional(),
  resource_monitor: z.string().nullable().optional(),
  comment: Text.optional(),
  enable_query_acceleration: z.boolean().nullable().optional(),
  query_acceleration_max_scale_factor: Int.nullable().optional(),
  max_concurrency_level: Int.nullable().optional(),
  statement_queued_timeout_in_seconds: Int.nullable().optional(),
  statement_timeout_in_seconds: Int.nullable().optional(),
}).passthrough();
export type WarehouseBody = z.infer<typeof WarehouseBody>;

// ---- database / schema ----
const ContainerProps = {
  name: Name,
  kind: z.string().optional(),
  comment: Text.optional(),
  data_retention_time_in_days: Int.nullable().optional(),
  default_ddl_collation: Text.optional(),
  log_level: Text.optional(),
  max_data_extension_time_in_days: Int.nullable().optional(),
  suspend_task_after_num_failures: Int.nullable().optional(),
  trace_level: Text.optional(),
  user_task_managed_initial_warehouse_size: Text.optional(),
  user_task_timeout_ms: Int.nullable().optional(),
};

export const DatabaseBody = z.object(ContainerProps).passthrough();
export type DatabaseBody = z.infer<typeof DatabaseBody>;

export const SchemaBody = z.object({
  ...ContainerProps,
  pipe_execution_paused: z.boolean().nullable().optional(),
}).passthrough();
export type SchemaBody = z.infer<typeof SchemaBody>;

export const CloneBody = z.object({
  name: Name,
  point_of_time: z.object({
    point_of_time_type: z.enum(['timestamp', 'offset', 'statement']),
    reference: z.enum(['at', 'before']).default('at'),
    when: z.union([z.string(), z.number()]),
  }).optional(),
}).passthrough();
export type CloneBody = z.infer<typeof CloneBody>;

export const AccountsBody = z.object({
  accounts: z.array(z.string().min(1)).default([]),
}).passthrough();

// ---- task ----
export const TaskSchedule = z.discriminatedUnion('schedule_type', [
  z.object({ schedule_type: z.literal('MINUTES_TYPE'), minutes: Int.positive() }),
  z.object({
    schedule_type: z.literal('CRON_TYPE'),
    cron_expr: z.string().min(1),
    timezone: z.string().min(1),
  }),
]);
export type TaskSchedule = z.infer<typeof TaskSchedule>;

export const TaskBody = z.object({
  name: Name,
  definition: z.string().min(1),
  warehouse: z.string().nullable().optional(),
  schedule: TaskSchedule.nullable().optional(),
  comment: Text.optional(),
  config: z.record(JsonValueSchema).nullable().optional(),
  session_parameters: z.record(z.union([z.string(), z.number(), z.boolean()])).nullable().optional(),
  predecessors: z.array(z.string().min(1)).nullable().optional(),
  user_task_managed_initial_warehouse_size: Text.optional(),
  user_task_timeout_ms: Int.nullable().optional(),
  condition: Text.optional(),
  allow_overlapping_execution: z.boolean().nullable().optional(),
  error_integration: Text.optional(),
  suspend_task_after_num_failures: Int.nullable().optional(),
}).passthrough();
export type TaskBody = z.infer<typeof TaskBody>;

// ---- table ----
export const ConstraintBody = z.object({
  name: z.string().min(1).nullable().optional(),
  constraint_type: z.enum(['PRIMARY KEY', 'UNIQUE', 'FOREIGN KEY']),
  column_names: z.array(z.string().min(1)).min(1),
  referenced_table_name: z.string().optional(),
  referenced_column_names: z.array(z.string().min(1)).optional(),
});
export type ConstraintBody = z.infer<typeof ConstraintBody>;

export const ColumnBody = z.object({
  name: Name,
  datatype: z.string().min(1),
  nullable: z.boolean().default(true),
  collate: Text.optional(),
  default: Text.optional(),
  autoincrement: z.boolean().nullable().optional(),
  autoincrement_start: Int.nullable().optional(),
  autoincrement_increment: Int.nullable().optional(),
  constraints: z.array(ConstraintBody).optional(),
  comment: Text.optional(),
});
export type ColumnBody = z.infer<typeof ColumnBody>;

export const TableBody = z.object({
  name: Name,
  kind: z.string().optional(),
  cluster_by: z.array(z.string().min(1)).nullable().optional(),
  enable_schema_evolution: z.boolean().nullable().optional(),
  change_tracking: z.boolean().nullable().optional(),
  data_retention_time_in_days: Int.nullable().optional(),
  max_data_extension_time_in_days: Int.nullable().optional(),
  default_ddl_collation: Text.optional(),
  comment: Text.optional(),
  columns: z.array(ColumnBody).optional(),
  constraints: z.array(ConstraintBody).optional(),
}).passthrough();
export type TableBody = z.infer<typeof TableBody>;

export const AsSelectBody = TableBody.partial({ name: true });

// ---- compute pool ----
export const ComputePoolBody = z.object({
  name: Name,
  min_nodes: Int.positive(),
  max_nodes: Int.positive(),
  instance_family: z.string().min(1),
  auto_resume: z.boolean().nullable().optional(),
  auto_suspend_secs: Int.nullable().optional(),
  initially_suspended: z.boolean().optional(),
  comment: Text.optional(),
}).passthrough();
export type ComputePoolBody = z.infer<typeof ComputePoolBody>;

// ---- service ----
export const ServiceSpec = z.discriminatedUnion('spec_type', [
  z.object({ spec_type: z.literal('from_inline'), spec_text: z.string().min(1) }),
  z.object({
    spec_type: z.literal('from_file'),
    stage: z.string().min(1),
    spec_file: z.string().min(1),
  }),
]);
export type ServiceSpec = z.infer<typeof ServiceSpec>;

export const ServiceBody = z.object({
  name: Name,
  compute_pool: z.string().min(1),
  spec: ServiceSpec,
  min_instances: Int.nullable().optional(),
  max_instances: Int.nullable().optional(),
  auto_resume: z.boolean().nullable().optional(),
  query_warehouse: z.string().nullable().optional(),
  comment: Text.optional(),
}).passthrough();
export type ServiceBody = z.infer<typeof ServiceBody>;

// ---- image repository ----
export const ImageRepositoryBody = z.object({ name: Name }).passthrough();
export type ImageRepositoryBody = z.infer<typeof ImageRepositoryBody>;
