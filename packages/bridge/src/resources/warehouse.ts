// packages/bridge/src/resources/warehouse.ts
import { z } from 'zod';
import {
  WarehouseBody,
  normalizeName,
  resolvedToIdentifier,
  type RawRow,
  type Row,
} from '@ddlbridge/core';
import {
  PlanBuilder,
  diffProperties,
  identifierForm,
  keywordForm,
  renderAssignments,
  type PropertySpec,
} from '@ddlbridge/reconciler';
import type { ResourceDescriptor } from '../descriptor';
import type { Handler, ResourceTranslator, TranslatorContext } from '../context';
import { normalizeRow, parametersAtLevel, type RowShape } from '../normalize';
import { createPrefix, ifExistsClause, lookup, pick, unlessGone } from './shared';

const PROPERTIES: readonly PropertySpec[] = [
  { name: 'warehouse_type', render: 'keyword', unsettable: false, compare: keywordForm },
  { name: 'warehouse_size', render: 'keyword', unsettable: false, compare: keywordForm },
  { name: 'wait_for_completion', render: 'boolean', createOnly: true },
  { name: 'max_cluster_count', render: 'number' },
  { name: 'min_cluster_count', render: 'number' },
  { name: 'scaling_policy', render: 'keyword', unsettable: false, compare: keywordForm },
  { name: 'auto_suspend', render: 'number' },
  { name: 'auto_resume', render: 'boolean' },
  { name: 'initially_suspended', render: 'boolean', createOnly: true },
  { name: 'resource_monitor', render: 'identifier', unsettable: false, compare: identifierForm },
  { name: 'comment', render: 'string' },
  { name: 'enable_query_acceleration', render: 'boolean' },
  { name: 'query_acceleration_max_scale_factor', render: 'number', unsettable: false },
  { name: 'max_concurrency_level', render: 'number' },
  { name: 'statement_queued_timeout_in_seconds', render: 'number' },
  { name: 'statement_timeout_in_seconds', render: 'number' },
];

// object parameters read back through SHOW PARAMETERS
const PARAMETERS = ['max_concurrency_level', 'statement_queued_timeout_in_seconds', 'statement_timeout_in_seconds'];

export const WAREHOUSE: ResourceDescriptor = {
  kind: 'warehouse',
  label: 'warehouse',
  segments: ['api', 'v2', 'warehouses', ':name'],
  required: ['name'],
  properties: PROPERTIES,
};

const SHAPE: RowShape = {
  rename: { size: 'warehouse_size', type: 'warehouse_type' },
  yesNo: ['is_default', 'is_current'],
  trueFalse: ['auto_resume', 'enable_query_acceleration'],
  integers: [
    'min_cluster_count', 'max_cluster_count', 'started_clusters', 'running', 'queued',
    'auto_suspend', 'query_acceleration_max_scale_factor',
  ],
  emptyAsNull: ['comment'],
  nullText: ['resource_monitor', 'scaling_policy'],
  names: ['name'],
};

export class WarehouseTranslator implements ResourceTranslator {
  readonly descriptor = WAREHOUSE;
  readonly actions: Readonly<Record<string, Handler>>;

  constructor(private readonly ctx: TranslatorContext) {
    const alter = (clause: string) => () =>
      ctx.mutate(`ALTER WAREHOUSE ${ifExistsClause(ctx.ifExists())}${ctx.name} ${clause}`);
    this.actions = {
      resume: alter('RESUME'),
      suspend: alter('SUSPEND'),
      abort: alter('ABORT ALL QUERIES'),
      rename: () => {
        const target = ctx.parse(z.object({ name: z.string().min(1) }).passthrough());
        return ctx.mutate(`ALTER WAREHOUSE ${ctx.name} RENAME TO ${normalizeName(target.name)}`);
      },
    };
  }

  private async withParameters(row: RawRow): Promise<Row | undefined> {
    const name = resolvedToIdentifier(row.name ?? '');
    const params = await unlessGone(() => this.ctx.run(`SHOW PARAMETERS IN WAREHOUSE ${name}`));
    if (!params) return undefined;
    return normalizeRow({ ...row, ...pick(parametersAtLevel(params, 'WAREHOUSE'), PARAMETERS) }, SHAPE);
  }

  async list(): Promise<Row[]> {
    const rows = await this.ctx.run(`SHOW WAREHOUSES ${this.ctx.like()}`);
    const out: Row[] = [];
    for (const row of rows) {
      const shaped = await this.withParameters(row);
      if (shaped) out.push(shaped);
    }
    return out;
  }

  describe() {
    const { ctx } = this;
    return lookup(async () => {
      const rows = await ctx.run(`SHOW WAREHOUSES LIKE ${ctx.likeName()}`);
      const row = rows.find((r) => r.name !== null && resolvedToIdentifier(r.name) === ctx.name);
      return row ? this.withParameters(row) : undefined;
    });
  }

  private createStatement(body: WarehouseBody): string {
    const { ctx } = this;
    const assignments = renderAssignments(PROPERTIES, ctx.body);
    return `CREATE ${createPrefix(ctx.createMode(), 'WAREHOUSE')}${normalizeName(body.name)} `
      + assignments.map((a) => `${a} `).join('');
  }

  async create() {
    return this.ctx.mutate(this.createStatement(this.ctx.desired(WarehouseBody)));
  }

  async createOrAlter() {
    const { ctx } = this;
    const body = ctx.desired(WarehouseBody);
    return ctx.reconcile({
      describe: () => this.describe(),
      create: async () => {
        const sql = this.createStatement(body);
        await ctx.run(sql);
        return [sql];
      },
      plan: (current) => {
        const changes = diffProperties(PROPERTIES, current, ctx.body, `warehouse ${ctx.name}`);
        return new PlanBuilder(`WAREHOUSE ${ctx.name}`).unset(...changes.unset).set(...changes.set).build();
      },
    });
  }

  drop() {
    return this.ctx.mutate(`DROP WAREHOUSE ${ifExistsClause(this.ctx.ifExists())}${this.ctx.name}`);
  }
}
