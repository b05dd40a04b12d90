// packages/bridge/src/router.ts
import { BadRequest, type ResourceKind } from '@ddlbridge/core';

const SCHEMA_SCOPED = (collection: string) =>
  new RegExp(`^/api/v2/databases/[^/]+/schemas/[^/]+/${collection}(/[^/]+)*$`);

// Order matters: schema-scoped kinds before the schema and database templates
// whose prefixes also match them.
export const ROUTES: ReadonlyArray<{ kind: ResourceKind; template: RegExp }> = [
  { kind: 'task', template: SCHEMA_SCOPED('tasks') },
  { kind: 'service', template: SCHEMA_SCOPED('services') },
  { kind: 'image-repository', template: SCHEMA_SCOPED('image-repositories') },
  { kind: 'table', template: SCHEMA_SCOPED('tables') },
  { kind: 'compute-pool', template: /^\/api\/v2\/compute-pools(\/[^/]+)*$/ },
  { kind: 'warehouse', template: /^\/api\/v2\/warehouses(\/[^/]+)*$/ },
  { kind: 'schema', template: /^\/api\/v2\/databases\/[^/]+\/schemas(\/[^/]+)*$/ },
  { kind: 'database', template: /^\/api\/v2\/databases(\/[^/]+)*$/ },
];

export function route(path: readonly string[]): ResourceKind {
  const joined = '/' + path.map(encodeURIComponent).join('/');
  const hit = ROUTES.find((r) => r.template.test(joined));
  if (!hit) throw new BadRequest('Invalid URL', { path: joined });
  return hit.kind;
}
