// packages/bridge/src/resources/schema.ts
import { SchemaBody } from '@ddlbridge/core';
import type { ResourceDescriptor } from '../descriptor';
import type { TranslatorContext } from '../context';
import { CONTAINER_SHAPE, ContainerTranslator, containerProperties } from './container';

export const SCHEMA: ResourceDescriptor = {
  kind: 'schema',
  label: 'schema',
  segments: ['api', 'v2', 'databases', ':database', 'schemas', ':name'],
  required: ['name'],
  properties: containerProperties([{ name: 'pipe_execution_paused', render: 'boolean' }]),
};

const KEEP = [
  'created_on', 'name', 'is_default', 'is_current', 'database_name', 'owner',
  'comment', 'options', 'dropped_on', 'owner_role_type',
];

export class SchemaTranslator extends ContainerTranslator {
  constructor(ctx: TranslatorContext) {
    super(ctx, {
      descriptor: SCHEMA,
      objectType: 'SCHEMA',
      keep: KEEP,
      parameters: ['pipe_execution_paused'],
      shape: {
        ...CONTAINER_SHAPE,
        trueFalse: ['pipe_execution_paused'],
        names: ['name', 'database_name'],
      },
      body: SchemaBody,
      show: (c) =>
        `SHOW SCHEMAS ${c.flag('history') ? 'HISTORY ' : ''}${c.like()}IN DATABASE ${c.database} ${c.showSuffix()}`,
      showOne: (c) => `SHOW SCHEMAS LIKE ${c.likeName()} IN DATABASE ${c.database}`,
      createSuffix: (c) => (c.flag('withManagedAccess') ? 'WITH MANAGED ACCESS ' : ''),
    });
  }
}
