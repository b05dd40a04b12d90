// packages/bridge/src/resources/table.ts
import {
  AsSelectBody,
  BadRequest,
  CloneBody,
  TableBody,
  normalizeName,
  qualifiedKey,
  quoteValue,
  resolvedToIdentifier,
  unquoteName,
  type ConstraintBody,
  type JsonValue,
  type RawRow,
  type Row,
} from '@ddlbridge/core';
import {
  PlanBuilder,
  diffKeyedSet,
  diffOrderedList,
  diffProperties,
  renderAssignments,
  sameValue,
  type PropertySpec,
} from '@ddlbridge/reconciler';
import { SCHEMA_SCOPED, bodyName, type ResourceDescriptor } from '../descriptor';
import type { Handler, ResourceTranslator, TranslatorContext } from '../context';
import { normalizeRow, parametersAtLevel, toInteger, type RowShape } from '../normalize';
import { createPrefix, ifExistsClause, lookup, pick, unlessGone } from './shared';
import {
  allConstraints,
  columnChanges,
  columnSql,
  constraintKey,
  constraintSql,
  isSystemConstraintName,
  type ReportedColumn,
} from './table-ddl';

const upper = (v: JsonValue): JsonValue => (typeof v === 'string' ? v.toUpperCase() : v);

const PROPERTIES: readonly PropertySpec[] = [
  { name: 'enable_schema_evolution', render: 'boolean' },
  { name: 'data_retention_time_in_days', render: 'number' },
  { name: 'max_data_extension_time_in_days', render: 'number' },
  { name: 'change_tracking', render: 'boolean' },
  { name: 'default_ddl_collation', render: 'string', compare: upper },
  { name: 'comment', render: 'string' },
];

// properties a clone may override
const CLONE_PROPERTIES = PROPERTIES.filter((p) =>
  ['data_retention_time_in_days', 'max_data_extension_time_in_days', 'default_ddl_collation', 'comment'].includes(p.name)
);

const PARAMETERS = ['data_retention_time_in_days', 'max_data_extension_time_in_days', 'default_ddl_collation'];

export const TABLE: ResourceDescriptor = {
  kind: 'table',
  label: 'table',
  segments: SCHEMA_SCOPED('tables'),
  required: ['name'],
  properties: PROPERTIES,
  unqualifiedBodyName: true,
};

const SHAPE: RowShape = {
  drop: ['retention_time', 'is_external', 'is_event', 'is_hybrid'],
  onOff: ['search_optimization', 'change_tracking', 'automatic_clustering'],
  yesNo: ['enable_schema_evolution'],
  integers: ['rows', 'bytes'],
  emptyAsNull: ['comment', 'cluster_by'],
  names: ['name', 'database_name', 'schema_name'],
};

const KINDS: ReadonlyMap<string, string> = new Map([
  ['', ''],
  ['TABLE', ''],
  ['PERMANENT', ''],
  ['TRANSIENT', 'TRANSIENT '],
  ['TEMPORARY', 'TEMPORARY '],
  ['TEMP', 'TEMPORARY '],
]);

function kindPrefix(kind: string | undefined): string {
  const prefix = KINDS.get((kind ?? '').trim().toUpperCase());
  if (prefix === undefined) throw new BadRequest(`Unsupported table kind '${kind}'`);
  return prefix;
}

const sameKind = (a: string, b: string) => kindPrefix(a) === kindPrefix(b);

/** `LINEAR(A, B)` -> ['A', 'B'] */
export function parseClusterBy(v: JsonValue): string[] | null {
  if (typeof v !== 'string' || v.trim() === '') return null;
  const inner = /^LINEAR\((.*)\)$/is.exec(v.trim());
  return (inner ? inner[1] : v).split(',').map((s) => s.trim()).filter(Boolean);
}

// SHOW TABLES also lists external, event and hybrid tables
const isStandard = (r: RawRow) =>
  !r.dropped_on && ['is_event', 'is_external', 'is_hybrid'].every((k) => !r[k] || r[k] === 'N');

export class TableTranslator implements ResourceTranslator {
  readonly descriptor = TABLE;
  readonly actions: Readonly<Record<string, Handler>>;

  constructor(private readonly ctx: TranslatorContext) {
    const alter = (clause: string) => () => ctx.mutate(`ALTER TABLE ${ctx.qualified()} ${clause}`);
    this.actions = {
      clone: () => this.clone(),
      create_like: () => {
        const target = ctx.query.newTableName;
        if (!target) throw new BadRequest("Query parameter 'newTableName' is required");
        return ctx.mutate(`${this.createHead(this.newTable(target))}LIKE ${ctx.qualified()}${this.copyGrants()}`);
      },
      as_select: () => this.fromQuery((q) => `AS ${q}`),
      using_template: () => this.fromQuery((q) => `USING TEMPLATE (${q})`),
      undelete: () => ctx.mutate(`UNDROP TABLE ${ctx.qualified()}`),
      suspend_recluster: alter('SUSPEND RECLUSTER'),
      resume_recluster: alter('RESUME RECLUSTER'),
      swapwith: () => {
        const target = ctx.query.targetName;
        if (!target) throw new BadRequest("Query parameter 'targetName' is required");
        return ctx.mutate(`ALTER TABLE ${ctx.qualified()} SWAP WITH ${this.within(target)}`);
      },
    };
  }

  // new tables always land in the URL's schema
  private newTable(name: string): string {
    return this.ctx.qualified(bodyName(TABLE, name));
  }

  // a possibly partial name resolved against the URL's database and schema
  private within(name: string): string {
    return qualifiedKey(name, this.ctx.database, this.ctx.schema);
  }

  // ---- reads ----
  private async shaped(raw: RawRow, deep: boolean): Promise<Row | undefined> {
    const { ctx } = this;
    const name = resolvedToIdentifier(raw.name ?? '');
    const params = await unlessGone(() => ctx.run(`SHOW PARAMETERS IN TABLE ${ctx.qualified(name)}`));
    if (!params) return undefined;
    const row = normalizeRow({ ...raw, ...pick(parametersAtLevel(params, 'TABLE'), PARAMETERS) }, SHAPE);
    row.cluster_by = parseClusterBy(row.cluster_by ?? null);
    if (deep) {
      row.columns = await this.columns(raw.name ?? '');
      row.constraints = await this.constraints(name);
    }
    return row;
  }

  private async columns(resolvedName: string): Promise<Row[]> {
    const { ctx } = this;
    const db = unquoteName(ctx.database);
    const rows = await ctx.run(
      'SELECT COLUMN_NAME, DATA_TYPE, IS_NULLABLE, COLLATION_NAME, COLUMN_DEFAULT, IS_IDENTITY, IDENTITY_START, IDENTITY_INCREMENT, COMMENT'
        + ` FROM ${ctx.database}.INFORMATION_SCHEMA.COLUMNS`
        + ` WHERE TABLE_CATALOG = ${quoteValue(db)} AND TABLE_SCHEMA = ${quoteValue(unquoteName(ctx.schema))}`
        + ` AND TABLE_NAME = ${quoteValue(resolvedName)} ORDER BY ORDINAL_POSITION`
    );
    return rows.map((r) => {
      const column: ReportedColumn = {
        name: resolvedToIdentifier(r.COLUMN_NAME ?? ''),
        datatype: r.DATA_TYPE ?? '',
        nullable: r.IS_NULLABLE === 'YES',
        collate: r.COLLATION_NAME || null,
        default: r.COLUMN_DEFAULT ?? null,
        autoincrement: r.IS_IDENTITY === 'YES',
        autoincrement_start: toInteger(r.IDENTITY_START),
        autoincrement_increment: toInteger(r.IDENTITY_INCREMENT),
        comment: r.COMMENT || null,
      };
      return column;
    });
  }

  // primary and unique keys; columns ordered by key_sequence
  private async constraints(name: string): Promise<Row[]> {
    const out: Row[] = [];
    for (const type of ['PRIMARY KEY', 'UNIQUE'] as const) {
      const keyword = type === 'PRIMARY KEY' ? 'PRIMARY KEYS' : 'UNIQUE KEYS';
      const rows = await this.ctx.run(`SHOW ${keyword} IN TABLE ${this.ctx.qualified(name)}`);
      const byName = new Map<string, RawRow[]>();
      for (const r of rows) {
        const key = r.constraint_name ?? '';
        byName.set(key, [...(byName.get(key) ?? []), r]);
      }
      for (const [constraint, cols] of byName) {
        const ordered = [...cols].sort((a, b) => (toInteger(a.key_sequence) ?? 0) - (toInteger(b.key_sequence) ?? 0));
        out.push({
          name: resolvedToIdentifier(constraint),
          constraint_type: type,
          column_names: ordered.map((c) => resolvedToIdentifier(c.column_name ?? '')),
        });
      }
    }
    return out;
  }

  async list(): Promise<Row[]> {
    const { ctx } = this;
    const deep = ctx.flag('deep');
    const sql = `SHOW ${deep ? '' : 'TERSE '}TABLES ${ctx.flag('history') ? 'HISTORY ' : ''}`
      + `${ctx.like()}IN SCHEMA ${ctx.inSchema} ${ctx.showSuffix()}`;
    const out: Row[] = [];
    for (const raw of (await ctx.run(sql)).filter(isStandard)) {
      const row = await this.shaped(raw, deep);
      if (row) out.push(row);
    }
    return out;
  }

  describe() {
    const { ctx } = this;
    return lookup(async () => {
      const rows = await ctx.run(`SHOW TABLES LIKE ${ctx.likeName()} IN SCHEMA ${ctx.inSchema}`);
      const row = rows.find((r) => r.name !== null && resolvedToIdentifier(r.name) === ctx.name);
      return row ? this.shaped(row, true) : undefined;
    });
  }

  // ---- creates ----
  private createHead(target: string, kind?: string): string {
    return `CREATE ${createPrefix(this.ctx.createMode(), `${kindPrefix(kind)}TABLE`)}${target} `;
  }

  private copyGrants(): string {
    return this.ctx.flag('copyGrants') ? ' COPY GRANTS' : '';
  }

  /** `(columns, constraints) CLUSTER BY (..) KEY = value ...` */
  private definition(body: Pick<TableBody, 'columns' | 'constraints' | 'cluster_by'>): string {
    let sql = '';
    const columns = body.columns ?? [];
    if (columns.length || body.constraints?.length) {
      const parts = [...columns.map(columnSql), ...allConstraints(columns, body.constraints).map(constraintSql)];
      sql += `(${parts.join(', ')}) `;
    }
    if (body.cluster_by?.length) sql += `CLUSTER BY (${body.cluster_by.join(', ')}) `;
    return sql + renderAssignments(PROPERTIES, this.ctx.body).map((a) => `${a} `).join('');
  }

  private createStatement(body: TableBody): string {
    return this.createHead(this.ctx.qualified(), body.kind) + this.definition(body) + this.copyGrants().trimStart();
  }

  async create() {
    const body = this.ctx.desired(TableBody);
    const sql = this.createHead(this.newTable(body.name), body.kind) + this.definition(body) + this.copyGrants().trimStart();
    return this.ctx.mutate(sql);
  }

  private async clone() {
    const { ctx } = this;
    const body = ctx.parse(CloneBody);
    const kind = typeof ctx.body.kind === 'string' ? ctx.body.kind : undefined;
    let sql = `${this.createHead(this.newTable(body.name), kind)}CLONE ${ctx.qualified()} `;
    const pot = body.point_of_time;
    if (pot) {
      const when = typeof pot.when === 'number' ? String(pot.when) : quoteValue(pot.when);
      sql += `${pot.reference.toUpperCase()} (${pot.point_of_time_type.toUpperCase()} => ${when}) `;
    }
    sql += renderAssignments(CLONE_PROPERTIES, ctx.body).map((a) => `${a} `).join('');
    return ctx.mutate(sql + this.copyGrants().trimStart());
  }

  private async fromQuery(clause: (query: string) => string) {
    const { ctx } = this;
    const query = ctx.query.query;
    if (!query) throw new BadRequest("Query parameter 'query' is required");
    const body = ctx.parse(AsSelectBody);
    return ctx.mutate(`${this.createHead(ctx.qualified(), body.kind)}${this.definition(body)}${clause(query)}`);
  }

  // ---- reconcile ----
  async createOrAlter() {
    const { ctx } = this;
    const body = ctx.desired(TableBody);
    return ctx.reconcile({
      describe: () => this.describe(),
      create: async () => {
        const sql = this.createStatement(body);
        await ctx.run(sql);
        return [sql];
      },
      plan: (current) => this.plan(body, current),
    });
  }

  private plan(body: TableBody, current: Row): string[] {
    const full = this.ctx.qualified();
    const currentKind = typeof current.kind === 'string' ? current.kind : 'TABLE';
    if (!sameKind(body.kind ?? 'TABLE', currentKind)) {
      throw new BadRequest(`Table kind must match: ${full} is ${currentKind}, requested ${body.kind}`);
    }
    const columns = body.columns ?? [];
    if (!columns.length) throw new BadRequest('Columns must be provided to create or alter a table');

    const changes = diffProperties(PROPERTIES, current, this.ctx.body, `table ${full}`);
    const plan = new PlanBuilder(`TABLE ${full}`).unset(...changes.unset).set(...changes.set);

    // columns: modify in place, append new ones
    const reported = reportedColumns(current.columns);
    const columnDiff = diffOrderedList(reported, columns, {
      what: `Columns of ${full}`,
      differs: (cur, des) => columnChanges(cur, des).length > 0,
    });
    for (const change of columnDiff) {
      if (change.kind === 'modify') {
        plan.append(`ALTER TABLE ${full} MODIFY ${columnChanges(change.current, change.desired).join(', ')}`);
      } else {
        plan.append(`ALTER TABLE ${full} ADD COLUMN ${columnSql(change.desired)}`);
      }
    }

    // primary / unique keys
    const desired = allConstraints(columns, body.constraints);
    if (desired.some((c) => c.constraint_type === 'FOREIGN KEY')) {
      throw new BadRequest('Foreign keys are not supported when altering an existing table');
    }
    if (desired.filter((c) => c.constraint_type === 'PRIMARY KEY').length > 1) {
      throw new BadRequest('There should be only one primary key defined');
    }
    const keyed = diffKeyedSet(reportedConstraints(current.constraints), desired, {
      key: constraintKey,
      name: (c) => (c.name ? normalizeName(c.name) : null),
      isSystemName: isSystemConstraintName,
    });
    for (const change of keyed) {
      if (change.kind === 'drop') {
        plan.append(`ALTER TABLE ${full} DROP CONSTRAINT ${normalizeName(change.current.name ?? '')}`);
      } else if (change.kind === 'rename') {
        plan.append(
          `ALTER TABLE ${full} RENAME CONSTRAINT ${normalizeName(change.current.name ?? '')} TO ${normalizeName(change.desired.name ?? '')}`
        );
      } else {
        plan.append(`ALTER TABLE ${full} ADD ${constraintSql(change.desired)}`);
      }
    }

    // clustering
    const wanted = (body.cluster_by ?? []).map((c) => c.trim().toUpperCase());
    const have = (Array.isArray(current.cluster_by) ? current.cluster_by : []).map((c) => String(c).toUpperCase());
    if (!sameValue(wanted, have)) {
      plan.append(wanted.length
        ? `ALTER TABLE ${full} CLUSTER BY (${(body.cluster_by ?? []).join(', ')})`
        : `ALTER TABLE ${full} DROP CLUSTERING KEY`);
    }
    return plan.build();
  }

  drop() {
    return this.ctx.mutate(`DROP TABLE ${ifExistsClause(this.ctx.ifExists())}${this.ctx.qualified()}`);
  }
}

// ---- rows reported by describe, read back into typed shapes ----
const str = (v: JsonValue | undefined): string | null => (typeof v === 'string' ? v : null);
const int = (v: JsonValue | undefined): number | null => (typeof v === 'number' ? v : null);

function reportedColumns(v: JsonValue | undefined): ReportedColumn[] {
  if (!Array.isArray(v)) return [];
  return v.flatMap((c) => {
    if (c === null || typeof c !== 'object' || Array.isArray(c)) return [];
    return [{
      name: str(c.name) ?? '',
      datatype: str(c.datatype) ?? '',
      nullable: c.nullable === true,
      collate: str(c.collate),
      default: str(c.default),
      autoincrement: c.autoincrement === true,
      autoincrement_start: int(c.autoincrement_start),
      autoincrement_increment: int(c.autoincrement_increment),
      comment: str(c.comment),
    }];
  });
}

function reportedConstraints(v: JsonValue | undefined): ConstraintBody[] {
  if (!Array.isArray(v)) return [];
  return v.flatMap((c) => {
    if (c === null || typeof c !== 'object' || Array.isArray(c)) return [];
    const type = c.constraint_type;
    const columns = Array.isArray(c.column_names) ? c.column_names.filter((n): n is string => typeof n === 'string') : [];
    if ((type !== 'PRIMARY KEY' && type !== 'UNIQUE') || !columns.length) return [];
    return [{ name: str(c.name), constraint_type: type, column_names: columns }];
  });
}
