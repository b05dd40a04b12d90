// packages/bridge/src/resources/task.ts
import {
  InternalServerError,
  TaskBody,
  TaskSchedule,
  normalizeName,
  qualifiedKey,
  quoteValue,
  splitQualifiedName,
  unquoteName,
  type JsonObject,
  type JsonValue,
  type RawRow,
  type Row,
} from '@ddlbridge/core';
import {
  PlanBuilder,
  diffDependencies,
  diffProperties,
  emptyAsNull,
  identifierForm,
  keywordForm,
  renderAssignments,
  sameValue,
  type PropertySpec,
} from '@ddlbridge/reconciler';
import { SCHEMA_SCOPED, type ResourceDescriptor } from '../descriptor';
import type { Handler, ResourceTranslator, TranslatorContext } from '../context';
import { normalizeRow, parameterValue, toInteger, type RowShape } from '../normalize';
import { createPrefix, ifExistsClause, lookup } from './shared';

// schedule is compared and rendered in its SQL text form
const PROPERTIES: readonly PropertySpec[] = [
  { name: 'warehouse', render: 'identifier', compare: identifierForm },
  { name: 'user_task_managed_initial_warehouse_size', render: 'string', immutable: true, compare: keywordForm },
  { name: 'schedule', render: 'string' },
  { name: 'config', render: 'json', compare: emptyAsNull },
  { name: 'allow_overlapping_execution', render: 'boolean' },
  { name: 'user_task_timeout_ms', render: 'number' },
  { name: 'suspend_task_after_num_failures', render: 'number' },
  { name: 'error_integration', render: 'identifier', compare: identifierForm },
  { name: 'comment', render: 'string' },
];

export const TASK: ResourceDescriptor = {
  kind: 'task',
  label: 'task',
  segments: [...SCHEMA_SCOPED('tasks'), ':sub'],
  subResources: ['dependents', 'current_graphs', 'complete_graphs'],
  required: ['name', 'definition'],
  properties: PROPERTIES,
};

// parameters reported as task fields rather than session parameters
const FOLDED_PARAMETERS: Readonly<Record<string, (v: string | null) => JsonValue>> = {
  user_task_managed_initial_warehouse_size: (v) => (v ? v.toUpperCase() : null),
  user_task_timeout_ms: (v) => toInteger(v),
  suspend_task_after_num_failures: (v) => toInteger(v),
};

const SHAPE: RowShape = {
  trueFalse: ['allow_overlapping_execution'],
  emptyAsNull: ['comment', 'warehouse', 'condition', 'error_integration', 'schedule', 'config', 'budget'],
  json: ['config'],
  lists: ['predecessors'],
  names: ['name', 'database_name', 'schema_name'],
};

// ---- schedules ----
export function scheduleText(s: TaskSchedule): string {
  return s.schedule_type === 'MINUTES_TYPE'
    ? `${s.minutes} MINUTE`
    : `USING CRON ${s.cron_expr} ${s.timezone}`;
}

/** `5 MINUTE` / `USING CRON 0 9 * * * UTC` -> structured schedule */
export function parseSchedule(text: string): TaskSchedule {
  const t = text.trim();
  if (/^USING CRON /i.test(t)) {
    const rest = t.slice('USING CRON '.length).trim();
    const cut = rest.lastIndexOf(' ');
    if (cut < 0) throw new InternalServerError(`Invalid value generated for schedule - ${text}`);
    return { schedule_type: 'CRON_TYPE', cron_expr: rest.slice(0, cut), timezone: rest.slice(cut + 1) };
  }
  const minutes = /^(\d+)\s+MINUTES?$/i.exec(t);
  if (!minutes) throw new InternalServerError(`Invalid value generated for schedule - ${text}`);
  return { schedule_type: 'MINUTES_TYPE', minutes: Number.parseInt(minutes[1], 10) };
}

// DESC / SHOW TASKS report absent values as the text 'null'
function shapeTask(raw: RawRow | Row, shape: RowShape = SHAPE): Row {
  const cleaned: Row = {};
  for (const [k, v] of Object.entries(raw)) cleaned[k] = v === 'null' ? null : v;
  const row = normalizeRow(cleaned, shape);
  if (typeof row.schedule === 'string') row.schedule = parseSchedule(row.schedule);
  if ('config' in row && row.config === null) row.config = {};
  if (Array.isArray(row.predecessors)) {
    row.predecessors = row.predecessors.map((p) =>
      typeof p === 'string' ? splitQualifiedName(p).map(unquoteName).join('.') : p
    );
  }
  return row;
}

const sessionValue = (v: JsonValue): string =>
  typeof v === 'string' ? quoteValue(v) : typeof v === 'object' ? quoteValue(JSON.stringify(v)) : String(v);

export class TaskTranslator implements ResourceTranslator {
  readonly descriptor = TASK;
  readonly actions: Readonly<Record<string, Handler>>;
  readonly subResources: Readonly<Record<string, Handler>>;

  constructor(private readonly ctx: TranslatorContext) {
    this.actions = {
      resume: () => ctx.mutate(`ALTER TASK ${ctx.qualified()} RESUME `),
      suspend: () => ctx.mutate(`ALTER TASK ${ctx.qualified()} SUSPEND `),
      execute: () =>
        ctx.mutate(`EXECUTE TASK ${ctx.qualified()}${ctx.flag('retryLast') ? ' RETRY LAST' : ''}`),
    };
    this.subResources = {
      dependents: () => this.dependents(),
      current_graphs: () => this.graphs('current_task_graphs()'),
      complete_graphs: () => this.graphs(`complete_task_graphs(error_only=>${ctx.flag('errorOnly')})`),
    };
  }

  // ---- reads ----
  async list(): Promise<Row[]> {
    const { ctx } = this;
    const rootOnly = ctx.flag('rootOnly') ? 'ROOT ONLY ' : '';
    const rows = await ctx.run(`SHOW TASKS ${ctx.like()}IN SCHEMA ${ctx.inSchema} ${ctx.showSuffix(rootOnly)}`);
    return rows.map((r) => shapeTask(r));
  }

  describe() {
    const { ctx } = this;
    return lookup(async () => {
      const rows = await ctx.run(`DESC TASK ${ctx.qualified()}`);
      if (!rows.length) return undefined;
      const task = shapeTask(rows[0]);
      Object.assign(task, await this.parameters());
      return task;
    });
  }

  // TASK-level parameters: a few fold into task fields, the rest are session parameters
  private async parameters(): Promise<Row> {
    const params = await this.ctx.run(`SHOW PARAMETERS IN TASK ${this.ctx.qualified()}`);
    const out: Row = {
      user_task_managed_initial_warehouse_size: null,
      user_task_timeout_ms: null,
      suspend_task_after_num_failures: null,
    };
    const session: JsonObject = {};
    for (const p of params) {
      if (!p.key || (p.level ?? '').toUpperCase() !== 'TASK') continue;
      const key = p.key.toLowerCase();
      const fold = FOLDED_PARAMETERS[key];
      if (fold) out[key] = fold(p.value);
      else session[p.key.toUpperCase()] = parameterValue(p.type, p.value);
    }
    out.session_parameters = session;
    return out;
  }

  private async dependents(): Promise<Row[]> {
    const recursive = this.ctx.query.recursive === undefined ? true : this.ctx.flag('recursive');
    const rows = await this.ctx.run(
      `SELECT * FROM TABLE(information_schema.task_dependents(task_name=>${quoteValue(this.ctx.qualified())}, recursive=>${recursive}))`
    );
    return rows.map((r) => shapeTask(r, { ...SHAPE, lowerKeys: true }));
  }

  private async graphs(fn: string): Promise<Row[]> {
    const { ctx } = this;
    const where = `WHERE database_name = ${quoteValue(unquoteName(ctx.database))}`
      + ` AND schema_name = ${quoteValue(unquoteName(ctx.schema))}`
      + ` AND root_task_name = ${quoteValue(unquoteName(ctx.name))}`;
    const rows = await ctx.run(`SELECT * FROM TABLE(information_schema.${fn}) ${where}`);
    return rows.map((r) => normalizeRow(r, { lowerKeys: true, integers: ['first_error_code'] }));
  }

  // ---- writes ----
  private predecessor(name: string): string {
    return qualifiedKey(name, this.ctx.database, this.ctx.schema);
  }

  /** body with the schedule in its SQL text form */
  private comparable(body: TaskBody): JsonObject {
    const out: JsonObject = { ...this.ctx.body };
    if (body.schedule) out.schedule = scheduleText(body.schedule);
    return out;
  }

  private createStatement(body: TaskBody): string {
    const { ctx } = this;
    let sql = `CREATE ${createPrefix(ctx.createMode(), 'TASK')}${ctx.qualified(normalizeName(body.name))} `;
    sql += renderAssignments(PROPERTIES, this.comparable(body)).map((a) => `${a} `).join('');
    for (const [k, v] of Object.entries(body.session_parameters ?? {})) sql += `${k.toUpperCase()} = ${sessionValue(v)} `;
    if (body.predecessors?.length) sql += `AFTER ${body.predecessors.map((p) => this.predecessor(p)).join(', ')} `;
    if (body.condition) sql += `WHEN ${body.condition} `;
    return `${sql}AS ${body.definition}`;
  }

  async create() {
    return this.ctx.mutate(this.createStatement(this.ctx.desired(TaskBody)));
  }

  async createOrAlter() {
    const { ctx } = this;
    const body = ctx.desired(TaskBody);
    const full = ctx.qualified();
    return ctx.reconcile({
      describe: () => this.describe(),
      create: async () => {
        const sql = this.createStatement(body);
        await ctx.run(sql);
        return [sql];
      },
      plan: (current) => this.plan(body, current, full),
    });
  }

  private plan(body: TaskBody, current: Row, full: string): string[] {
    const cur: Row = { ...current };
    const schedule = TaskSchedule.safeParse(current.schedule);
    cur.schedule = schedule.success ? scheduleText(schedule.data) : null;
    const changes = diffProperties(PROPERTIES, cur, this.comparable(body), `task ${full}`);
    const plan = new PlanBuilder(`TASK ${full}`).unset(...changes.unset).set(...changes.set);

    // session parameters
    const have = isObject(current.session_parameters) ? current.session_parameters : {};
    const want: JsonObject = {};
    for (const [k, v] of Object.entries(body.session_parameters ?? {})) want[k.toUpperCase()] = v;
    plan.unset(...Object.keys(have).filter((k) => !(k in want)));
    plan.set(
      ...Object.entries(want)
        .filter(([k, v]) => !sameValue(have[k], v))
        .map(([k, v]) => `${k} = ${sessionValue(v)}`)
    );

    // predecessors
    const existing = Array.isArray(current.predecessors)
      ? current.predecessors.filter((p): p is string => typeof p === 'string')
      : [];
    const deps = diffDependencies(existing, body.predecessors, (n) => this.predecessor(n));
    if (deps.remove.length) plan.append(`ALTER TASK ${full} REMOVE AFTER ${deps.remove.map((p) => this.predecessor(p)).join(', ')}`);
    if (deps.add.length) plan.append(`ALTER TASK ${full} ADD AFTER ${deps.add.map((p) => this.predecessor(p)).join(', ')}`);

    // condition and definition
    const condition = typeof current.condition === 'string' ? current.condition.trim() : null;
    const wanted = body.condition?.trim() || null;
    if (wanted && wanted !== condition) plan.append(`ALTER TASK ${full} MODIFY WHEN ${wanted}`);
    else if (!wanted && condition) plan.append(`ALTER TASK ${full} REMOVE WHEN`);

    const definition = typeof current.definition === 'string' ? current.definition.trim() : null;
    if (body.definition.trim() !== definition) plan.append(`ALTER TASK ${full} MODIFY AS ${body.definition}`);

    return plan.build();
  }

  drop() {
    return this.ctx.mutate(`DROP TASK ${ifExistsClause(this.ctx.ifExists())}${this.ctx.qualified()}`);
  }
}

const isObject = (v: JsonValue | undefined): v is JsonObject =>
  typeof v === 'object' && v !== null && !Array.isArray(v);
