// packages/bridge/src/resources/compute-pool.ts
import { BadRequest, ComputePoolBody, normalizeName, type Row } from '@ddlbridge/core';
import {
  PlanBuilder,
  diffProperties,
  keywordForm,
  renderAssignments,
  type PropertySpec,
} from '@ddlbridge/reconciler';
import type { ResourceDescriptor } from '../descriptor';
import type { Handler, ResourceTranslator, TranslatorContext } from '../context';
import { normalizeRow, type RowShape } from '../normalize';
import { createPrefix, ifExistsClause, lookup } from './shared';

const PROPERTIES: readonly PropertySpec[] = [
  { name: 'min_nodes', render: 'number', unsettable: false },
  { name: 'max_nodes', render: 'number', unsettable: false },
  { name: 'instance_family', render: 'keyword', immutable: true, compare: keywordForm },
  { name: 'auto_resume', render: 'boolean' },
  { name: 'initially_suspended', render: 'boolean', createOnly: true },
  { name: 'auto_suspend_secs', render: 'number' },
  { name: 'comment', render: 'string' },
];

export const COMPUTE_POOL: ResourceDescriptor = {
  kind: 'compute-pool',
  label: 'compute pool',
  segments: ['api', 'v2', 'compute-pools', ':name'],
  required: ['name', 'min_nodes', 'max_nodes', 'instance_family'],
  properties: PROPERTIES,
};

const SHAPE: RowShape = {
  trueFalse: ['auto_resume', 'is_exclusive'],
  integers: ['min_nodes', 'max_nodes', 'auto_suspend_secs', 'num_services', 'num_jobs', 'active_nodes', 'idle_nodes'],
  emptyAsNull: ['comment', 'application'],
  names: ['name'],
};

export class ComputePoolTranslator implements ResourceTranslator {
  readonly descriptor = COMPUTE_POOL;
  readonly actions: Readonly<Record<string, Handler>>;

  constructor(private readonly ctx: TranslatorContext) {
    const alter = (clause: string) => () =>
      ctx.mutate(`ALTER COMPUTE POOL ${ifExistsClause(ctx.ifExists())}${ctx.name} ${clause}`);
    this.actions = {
      resume: alter('RESUME'),
      suspend: alter('SUSPEND'),
      stopallservices: alter('STOP ALL'),
    };
  }

  async list(): Promise<Row[]> {
    const rows = await this.ctx.run(`SHOW COMPUTE POOLS ${this.ctx.like()}${this.ctx.showSuffix()}`);
    return rows.map((r) => normalizeRow(r, SHAPE));
  }

  describe() {
    return lookup(async () => {
      const rows = await this.ctx.run(`DESC COMPUTE POOL ${this.ctx.name}`);
      return rows.length ? normalizeRow(rows[0], SHAPE) : undefined;
    });
  }

  private createStatement(body: ComputePoolBody): string {
    const mode = this.ctx.createMode();
    if (mode === 'orReplace') throw new BadRequest('createMode orReplace is not supported for compute pools');
    return `CREATE ${createPrefix(mode, 'COMPUTE POOL')}${normalizeName(body.name)} `
      + renderAssignments(PROPERTIES, this.ctx.body).map((a) => `${a} `).join('');
  }

  async create() {
    return this.ctx.mutate(this.createStatement(this.ctx.desired(ComputePoolBody)));
  }

  async createOrAlter() {
    const { ctx } = this;
    const body = ctx.desired(ComputePoolBody);
    return ctx.reconcile({
      describe: () => this.describe(),
      create: async () => {
        const sql = this.createStatement(body);
        await ctx.run(sql);
        return [sql];
      },
      plan: (current) => {
        const changes = diffProperties(PROPERTIES, current, ctx.body, `compute pool ${ctx.name}`);
        return new PlanBuilder(`COMPUTE POOL ${ctx.name}`).unset(...changes.unset).set(...changes.set).build();
      },
    });
  }

  drop() {
    return this.ctx.mutate(`DROP COMPUTE POOL ${ifExistsClause(this.ctx.ifExists())}${this.ctx.name}`);
  }
}
