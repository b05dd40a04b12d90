// packages/bridge/src/resources/container.ts
// Databases and schemas: same property model, different scope and SHOW syntax.
import type { ZodType } from 'zod';
import {
  BadRequest,
  CloneBody,
  normalizeName,
  quoteValue,
  resolvedToIdentifier,
  type RawRow,
  type Row,
} from '@ddlbridge/core';
import {
  PlanBuilder,
  diffProperties,
  keywordForm,
  renderAssignments,
  type PropertySpec,
} from '@ddlbridge/reconciler';
import type { ResourceDescriptor } from '../descriptor';
import type { Handler, ResourceTranslator, TranslatorContext } from '../context';
import { normalizeRow, parametersAtLevel, type RowShape } from '../normalize';
import { createPrefix, ifExistsClause, lookup, pick, unlessGone } from './shared';

// reported by SHOW; accepted back in a body but never rendered
const READ_ONLY = ['created_on', 'is_default', 'is_current', 'origin', 'owner', 'options', 'dropped_on', 'owner_role_type'];
const readOnly = (name: string): PropertySpec => ({ name, render: 'string', immutable: true });

export const CONTAINER_PARAMETERS = [
  'data_retention_time_in_days',
  'max_data_extension_time_in_days',
  'default_ddl_collation',
  'log_level',
  'suspend_task_after_num_failures',
  'trace_level',
  'user_task_managed_initial_warehouse_size',
  'user_task_timeout_ms',
] as const;

export function containerProperties(extra: readonly PropertySpec[] = []): PropertySpec[] {
  return [
    { name: 'data_retention_time_in_days', render: 'number' },
    { name: 'max_data_extension_time_in_days', render: 'number' },
    { name: 'default_ddl_collation', render: 'string' },
    { name: 'comment', render: 'string' },
    { name: 'log_level', render: 'keyword', compare: keywordForm },
    ...extra,
    { name: 'suspend_task_after_num_failures', render: 'number' },
    { name: 'trace_level', render: 'keyword', compare: keywordForm },
    { name: 'user_task_managed_initial_warehouse_size', render: 'string', compare: keywordForm },
    { name: 'user_task_timeout_ms', render: 'number' },
    ...READ_ONLY.map(readOnly),
  ];
}

export const CONTAINER_SHAPE: RowShape = {
  yesNo: ['is_default', 'is_current'],
  integers: [
    'data_retention_time_in_days',
    'max_data_extension_time_in_days',
    'suspend_task_after_num_failures',
    'user_task_timeout_ms',
  ],
  emptyAsNull: ['comment', 'origin', 'options', 'dropped_on'],
  names: ['name'],
};

export interface ContainerConfig {
  descriptor: ResourceDescriptor;
  objectType: 'DATABASE' | 'SCHEMA';
  keep: readonly string[];
  shape: RowShape;
  /** kind-specific parameters on top of the shared ones */
  parameters?: readonly string[];
  body: ZodType<{ name: string }>;
  /** SHOW statement for the list, scoped as the kind needs */
  show(ctx: TranslatorContext): string;
  /** SHOW statement matching one name exactly (case-insensitive LIKE) */
  showOne(ctx: TranslatorContext): string;
  /** clause placed right after the object name in CREATE */
  createSuffix?(ctx: TranslatorContext): string;
  extraActions?(ctx: TranslatorContext): Record<string, Handler>;
}

export class ContainerTranslator implements ResourceTranslator {
  readonly descriptor: ResourceDescriptor;
  readonly actions: Readonly<Record<string, Handler>>;

  constructor(private readonly ctx: TranslatorContext, private readonly cfg: ContainerConfig) {
    this.descriptor = cfg.descriptor;
    this.actions = {
      clone: () => this.clone(),
      undrop: () => ctx.mutate(`UNDROP ${cfg.objectType} ${ctx.qualified()}`),
      ...(cfg.extraActions?.(ctx) ?? {}),
    };
  }

  private get objectType() {
    return this.cfg.objectType;
  }

  // qualified identity of a SHOW row
  private identity(row: RawRow): string {
    const name = resolvedToIdentifier(row.name ?? '');
    return this.ctx.qualified(name);
  }

  private async shaped(row: RawRow): Promise<Row | undefined> {
    const params = await unlessGone(() =>
      this.ctx.run(`SHOW PARAMETERS IN ${this.objectType} ${this.identity(row)}`)
    );
    if (!params) return undefined;
    const keys = [...CONTAINER_PARAMETERS, ...(this.cfg.parameters ?? [])];
    const merged = { ...row, ...pick(parametersAtLevel(params, this.objectType), keys) };
    return normalizeRow(merged, { ...this.cfg.shape, keep: [...this.cfg.keep, ...keys] });
  }

  async list(): Promise<Row[]> {
    const rows = await this.ctx.run(this.cfg.show(this.ctx));
    const out: Row[] = [];
    for (const row of rows) {
      const shaped = await this.shaped(row);
      if (shaped) out.push(shaped);
    }
    return out;
  }

  describe() {
    return lookup(async () => {
      const rows = await this.ctx.run(this.cfg.showOne(this.ctx));
      const row = rows.find((r) => r.name !== null && resolvedToIdentifier(r.name) === this.ctx.name);
      return row ? this.shaped(row) : undefined;
    });
  }

  // CREATE [OR REPLACE ][TRANSIENT ]<TYPE> [IF NOT EXISTS ]<name>
  private createHead(name: string): string {
    const kind = (this.ctx.query.kind ?? '').toUpperCase();
    if (kind !== '' && kind !== 'PERMANENT' && kind !== 'TRANSIENT') {
      throw new BadRequest(`Unsupported ${this.descriptor.label} kind '${this.ctx.query.kind}'`);
    }
    const type = kind === 'TRANSIENT' ? `TRANSIENT ${this.objectType}` : this.objectType;
    return `CREATE ${createPrefix(this.ctx.createMode(), type)}${this.ctx.qualified(name)} `;
  }

  private createStatement(name: string): string {
    const suffix = this.cfg.createSuffix?.(this.ctx) ?? '';
    return this.createHead(name) + suffix
      + renderAssignments(this.descriptor.properties.filter((p) => !READ_ONLY.includes(p.name)), this.ctx.body)
        .map((a) => `${a} `)
        .join('');
  }

  async create() {
    const body = this.ctx.desired(this.cfg.body);
    return this.ctx.mutate(this.createStatement(normalizeName(body.name)));
  }

  async createOrAlter() {
    const { ctx } = this;
    ctx.desired(this.cfg.body);
    const target = `${this.objectType} ${ctx.qualified()}`;
    return ctx.reconcile({
      describe: () => this.describe(),
      create: async () => {
        const sql = this.createStatement(ctx.name);
        await ctx.run(sql);
        return [sql];
      },
      plan: (current) => {
        const changes = diffProperties(this.descriptor.properties, current, ctx.body, `${this.descriptor.label} ${ctx.qualified()}`);
        return new PlanBuilder(target).unset(...changes.unset).set(...changes.set).build();
      },
    });
  }

  private async clone() {
    const body = this.ctx.parse(CloneBody);
    let sql = this.createHead(normalizeName(body.name)) + `CLONE ${this.ctx.qualified()} `;
    const pot = body.point_of_time;
    if (pot) {
      const when = typeof pot.when === 'number' ? String(pot.when) : quoteValue(pot.when);
      sql += `${pot.reference.toUpperCase()} (${pot.point_of_time_type.toUpperCase()} => ${when}) `;
    }
    return this.ctx.mutate(sql);
  }

  drop() {
    return this.ctx.mutate(`DROP ${this.objectType} ${ifExistsClause(this.ctx.ifExists())}${this.ctx.qualified()}`);
  }
}
