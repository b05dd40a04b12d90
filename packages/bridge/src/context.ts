// packages/bridge/src/context.ts
import type { ZodType, ZodTypeDef } from 'zod';
import {
  BadRequest,
  NotFound,
  fromZodError,
  parseCreateMode,
  parseFlag,
  parseIfExists,
  qualify,
  quoteValue,
  unquoteName,
  silentLogger,
  type BridgeResult,
  type CreateMode,
  type JsonObject,
  type Logger,
  type Lookup,
  type RawRow,
  type Row,
} from '@ddlbridge/core';
import { SUCCESS_ROW, type Executor } from '@ddlbridge/sql-api';
import { createOrAlter, type Reconcilable as PlanTarget } from '@ddlbridge/reconciler';
import { bodyName, type ResourceDescriptor, type Scope } from './descriptor';

// --------------------
// Capabilities
// --------------------
export type Handler = () => Promise<BridgeResult>;

export interface Describable { describe(): Promise<Lookup<Row>> }
export interface Listable { list(): Promise<Row[]> }
export interface Creatable { create(): Promise<BridgeResult> }
export interface Reconcilable { createOrAlter(): Promise<BridgeResult> }
export interface Droppable { drop(): Promise<BridgeResult> }

export interface ResourceTranslator extends Describable, Listable, Droppable, Partial<Creatable>, Partial<Reconcilable> {
  readonly descriptor: ResourceDescriptor;
  readonly actions?: Readonly<Record<string, Handler>>;
  readonly subResources?: Readonly<Record<string, Handler>>;
}

export interface Handled {
  statements: string[];
  result: BridgeResult;
}

// --------------------
// Per-request context shared by a translator's handlers
// --------------------
export class TranslatorContext {
  readonly issued: string[] = [];

  constructor(
    readonly descriptor: ResourceDescriptor,
    readonly scope: Scope,
    private readonly exec: Executor,
    readonly log: Logger = silentLogger
  ) {}

  get query() { return this.scope.request.queryParams; }
  get body(): Readonly<JsonObject> { return this.scope.request.body; }

  async run(sql: string, desiredProperties?: readonly string[]): Promise<RawRow[]> {
    this.issued.push(sql);
    return this.exec.execute(sql, desiredProperties);
  }

  /** mutation: single canonical success row */
  async mutate(sql: string): Promise<Row> {
    const rows = await this.run(sql);
    return rows[0] ?? { ...SUCCESS_ROW };
  }

  // ---- names ----
  get database(): string {
    if (!this.scope.parent.database) throw new BadRequest('Database name is missing from the URL');
    return this.scope.parent.database;
  }

  get schema(): string {
    if (!this.scope.parent.schema) throw new BadRequest('Schema name is missing from the URL');
    return this.scope.parent.schema;
  }

  get name(): string {
    if (!this.scope.name) throw new BadRequest(`A ${this.descriptor.label} name is required`);
    return this.scope.name;
  }

  /** DB.SCH.NAME for schema-scoped kinds, DB.NAME for schemas, NAME otherwise */
  qualified(name = this.name): string {
    return qualify(this.scope.parent.database, this.scope.parent.schema, name);
  }

  get inSchema(): string {
    return `${this.database}.${this.schema}`;
  }

  // ---- bodies ----
  requireProperties(body: Readonly<JsonObject> = this.body): void {
    const missing = this.descriptor.required.filter((p) => body[p] === undefined || body[p] === null);
    if (missing.length) {
      throw new BadRequest(`Missing required properties for ${this.descriptor.label}: ${missing.join(', ')}`);
    }
  }

  parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown = this.body): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) throw fromZodError(parsed.error, `${this.descriptor.label} body`);
    return parsed.data;
  }

  /** Desired state for create/alter: required props present, body name consistent with the path. */
  desired<T extends { name: string }>(schema: ZodType<T, ZodTypeDef, unknown>): T {
    this.requireProperties();
    const desired = this.parse(schema);
    const named = bodyName(this.descriptor, desired.name);
    if (this.scope.name !== undefined && named !== this.scope.name) {
      throw new BadRequest(
        `Inconsistent ${this.descriptor.label} names: URL has ${this.scope.name}, body has ${named}`
      );
    }
    return desired;
  }

  // ---- query parameters ----
  createMode(): CreateMode { return parseCreateMode(this.query.createMode); }
  ifExists(): boolean { return parseIfExists(this.query); }
  flag(name: string): boolean { return parseFlag(this.query[name]); }

  /** `LIKE '<pattern>' ` when the query carries one */
  like(param = 'like'): string {
    const v = this.query[param];
    return v ? `LIKE ${quoteValue(v)} ` : '';
  }

  /** exact-name pattern for SHOW ... LIKE lookups */
  likeName(name = this.name): string {
    return quoteValue(unquoteName(name));
  }

  /** STARTS WITH, then `between` (e.g. ROOT ONLY), then LIMIT .. FROM */
  showSuffix(between = ''): string {
    let sql = '';
    if (this.query.startsWith) sql += `STARTS WITH ${quoteValue(this.query.startsWith)} `;
    sql += between;
    if (this.query.showLimit) sql += `LIMIT ${this.limit()} `;
    if (this.query.showLimit && this.query.fromName) sql += `FROM ${quoteValue(this.query.fromName)} `;
    return sql;
  }

  private limit(): number {
    const n = Number(this.query.showLimit);
    if (!Number.isInteger(n) || n <= 0) throw new BadRequest(`Invalid showLimit '${this.query.showLimit}'`);
    return n;
  }

  // ---- reconcile ----
  async reconcile(target: PlanTarget): Promise<Row> {
    const outcome = await createOrAlter(target, (sql) => this.run(sql), {
      kind: this.descriptor.label,
      name: this.qualified(),
      log: this.log,
    });
    this.log.info({ kind: this.descriptor.kind, name: this.qualified(), created: outcome.created, statements: outcome.statements }, 'create-or-alter');
    return { ...SUCCESS_ROW };
  }

  notFound(): NotFound {
    return new NotFound(`${capitalize(this.descriptor.label)} ${this.qualified()} does not exist.`);
  }
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1);

// --------------------
// Dispatch by verb + scope
// --------------------
export async function dispatch(t: ResourceTranslator, ctx: TranslatorContext): Promise<Handled> {
  const result = await select(t, ctx);
  return { statements: [...ctx.issued], result };
}

async function select(t: ResourceTranslator, ctx: TranslatorContext): Promise<BridgeResult> {
  const { scope } = ctx;
  const label = t.descriptor.label;
  const unsupported = () =>
    new BadRequest(`Unsupported ${scope.request.method} on ${label}${scope.action ? ` with action '${scope.action}'` : ''}`);

  switch (scope.request.method) {
    case 'PUT':
      if (scope.isCollection || scope.action || scope.subResource || !t.createOrAlter) throw unsupported();
      return t.createOrAlter();

    case 'GET':
      if (scope.action) throw unsupported();
      if (scope.isCollection) return t.list();
      if (scope.subResource) {
        const sub = t.subResources?.[scope.subResource];
        if (!sub) throw unsupported();
        return sub();
      }
      {
        const hit = await t.describe();
        if (!hit.found) throw ctx.notFound();
        return hit.value;
      }

    case 'POST':
      if (scope.isCollection && !scope.action) {
        if (!t.create) throw unsupported();
        return t.create();
      }
      if (scope.action) {
        const handler = t.actions?.[scope.action];
        if (!handler) throw new BadRequest(`Unsupported action '${scope.action}' while POSTing`);
        return handler();
      }
      throw unsupported();

    case 'DELETE':
      if (scope.isCollection || scope.action || scope.subResource) throw unsupported();
      return t.drop();
  }
}
