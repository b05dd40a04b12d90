// packages/bridge/src/resources/service.ts
import {
  BadRequest,
  ServiceBody,
  ServiceSpec,
  normalizeName,
  quoteValue,
  resolvedToIdentifier,
  type RawRow,
  type Row,
} from '@ddlbridge/core';
import {
  PlanBuilder,
  diffProperties,
  identifierForm,
  renderAssignments,
  type PropertySpec,
} from '@ddlbridge/reconciler';
import { SCHEMA_SCOPED, type ResourceDescriptor } from '../descriptor';
import type { Handler, ResourceTranslator, TranslatorContext } from '../context';
import { normalizeRow, type RowShape } from '../normalize';
import { createPrefix, ifExistsClause, lookup, unlessGone } from './shared';

const PROPERTIES: readonly PropertySpec[] = [
  { name: 'compute_pool', render: 'identifier', immutable: true, compare: identifierForm },
  { name: 'min_instances', render: 'number', unsettable: false },
  { name: 'max_instances', render: 'number', unsettable: false },
  { name: 'auto_resume', render: 'boolean' },
  { name: 'query_warehouse', render: 'identifier', compare: identifierForm },
  { name: 'comment', render: 'string' },
];

// compute_pool goes in its own IN COMPUTE POOL clause
const ASSIGNABLE = PROPERTIES.filter((p) => p.name !== 'compute_pool');

export const SERVICE: ResourceDescriptor = {
  kind: 'service',
  label: 'service',
  segments: [...SCHEMA_SCOPED('services'), ':sub'],
  subResources: ['logs', 'status'],
  required: ['name', 'compute_pool', 'spec'],
  properties: PROPERTIES,
};

const SHAPE: RowShape = {
  trueFalse: ['auto_resume'],
  integers: ['min_instances', 'max_instances'],
  emptyAsNull: ['comment'],
  nullText: ['query_warehouse'],
  names: ['name', 'database_name', 'schema_name', 'compute_pool'],
};

function shapeService(raw: RawRow): Row {
  const { spec, ...rest } = raw;
  const row = normalizeRow(rest, SHAPE);
  row.spec = { spec_type: 'from_inline', spec_text: spec ?? '' };
  return row;
}

export function specClause(spec: ServiceSpec): string {
  if (spec.spec_type === 'from_inline') return `FROM SPECIFICATION ${quoteValue(spec.spec_text)}`;
  return `FROM @${spec.stage.replace(/^@/, '')} SPECIFICATION_FILE = ${quoteValue(spec.spec_file)}`;
}

export class ServiceTranslator implements ResourceTranslator {
  readonly descriptor = SERVICE;
  readonly actions: Readonly<Record<string, Handler>>;
  readonly subResources: Readonly<Record<string, Handler>>;

  constructor(private readonly ctx: TranslatorContext) {
    const alter = (clause: string) => () =>
      ctx.mutate(`ALTER SERVICE ${ifExistsClause(ctx.ifExists())}${ctx.qualified()} ${clause}`);
    this.actions = { resume: alter('RESUME'), suspend: alter('SUSPEND') };
    this.subResources = {
      status: () => this.status(),
      logs: () => this.logs(),
    };
  }

  private async desc(full: string): Promise<Row | undefined> {
    const rows = await this.ctx.run(`DESC SERVICE ${full}`);
    return rows.length ? shapeService(rows[0]) : undefined;
  }

  async list(): Promise<Row[]> {
    const { ctx } = this;
    const rows = await ctx.run(`SHOW SERVICES ${ctx.like()}IN SCHEMA ${ctx.inSchema} ${ctx.showSuffix()}`);
    const out: Row[] = [];
    for (const r of rows) {
      const service = await unlessGone(() => this.desc(ctx.qualified(resolvedToIdentifier(r.name ?? ''))));
      if (service) out.push(service);
    }
    return out;
  }

  describe() {
    return lookup(() => this.desc(this.ctx.qualified()));
  }

  // ---- sub-resources ----
  private async status(): Promise<Row> {
    const raw = this.ctx.query.timeout ?? '0';
    if (!/^\d+$/.test(raw)) throw new BadRequest(`Invalid timeout '${raw}'`);
    const rows = await this.ctx.run(`CALL SYSTEM$GET_SERVICE_STATUS(${quoteValue(this.ctx.qualified())}, ${raw})`);
    return normalizeRow(rows[0] ?? {}, { lowerKeys: true });
  }

  private async logs(): Promise<Row> {
    const { instanceId, containerName, numLines } = this.ctx.query;
    if (!instanceId || !containerName) {
      throw new BadRequest("Query parameters 'instanceId' and 'containerName' are required");
    }
    const lines = numLines && /^\d+$/.test(numLines) ? `, ${numLines}` : '';
    const rows = await this.ctx.run(
      `CALL SYSTEM$GET_SERVICE_LOGS(${quoteValue(this.ctx.qualified())}, ${quoteValue(instanceId)}, ${quoteValue(containerName)}${lines})`
    );
    return normalizeRow(rows[0] ?? {}, { lowerKeys: true });
  }

  // ---- writes ----
  private createStatement(body: ServiceBody): string {
    const { ctx } = this;
    return `CREATE ${createPrefix(ctx.createMode(), 'SERVICE')}${ctx.qualified(normalizeName(body.name))} `
      + `IN COMPUTE POOL ${normalizeName(body.compute_pool)} ${specClause(body.spec)} `
      + renderAssignments(ASSIGNABLE, ctx.body).map((a) => `${a} `).join('');
  }

  async create() {
    return this.ctx.mutate(this.createStatement(this.ctx.desired(ServiceBody)));
  }

  async createOrAlter() {
    const { ctx } = this;
    const body = ctx.desired(ServiceBody);
    const full = ctx.qualified();
    return ctx.reconcile({
      describe: () => this.describe(),
      create: async () => {
        const sql = this.createStatement(body);
        await ctx.run(sql);
        return [sql];
      },
      plan: (current) => {
        const changes = diffProperties(PROPERTIES, current, ctx.body, `service ${full}`);
        const plan = new PlanBuilder(`SERVICE ${full}`).unset(...changes.unset).set(...changes.set);
        // a stage file cannot be compared with the reported text, so it is always re-applied
        const reported = ServiceSpec.safeParse(current.spec);
        const unchanged = body.spec.spec_type === 'from_inline'
          && reported.success
          && reported.data.spec_type === 'from_inline'
          && reported.data.spec_text.trim() === body.spec.spec_text.trim();
        if (!unchanged) plan.append(`ALTER SERVICE ${full} ${specClause(body.spec)}`);
        return plan.build();
      },
    });
  }

  drop() {
    return this.ctx.mutate(`DROP SERVICE ${ifExistsClause(this.ctx.ifExists())}${this.ctx.qualified()}`);
  }
}
