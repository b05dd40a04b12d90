// packages/reconciler/src/plan.ts
import {
  InternalServerError,
  asRestError,
  silentLogger,
  type Logger,
  type Lookup,
  type Row,
} from '@ddlbridge/core';

/**
 * Ordered statements for one create-or-alter call:
 * UNSET, then SET, then structural changes in the order added.
 */
export class PlanBuilder {
  private readonly unsets: string[] = [];
  private readonly sets: string[] = [];
  private readonly structural: string[] = [];

  constructor(private readonly target: string) {}

  unset(...keys: string[]): this {
    this.unsets.push(...keys);
    return this;
  }

  set(...assignments: string[]): this {
    this.sets.push(...assignments);
    return this;
  }

  append(...statements: string[]): this {
    this.structural.push(...statements);
    return this;
  }

  build(): string[] {
    const out: string[] = [];
    if (this.unsets.length) out.push(`ALTER ${this.target} UNSET ${this.unsets.join(', ')}`);
    if (this.sets.length) out.push(`ALTER ${this.target} SET ${this.sets.join(' ')}`);
    return [...out, ...this.structural];
  }
}

export type RunStatement = (sql: string) => Promise<unknown>;

export interface PlanContext {
  kind: string;
  name: string;
  log?: Logger;
}

/**
 * Execute sequentially; the first failure stops the run. Earlier statements
 * stay applied and the error says how many did.
 */
export async function runPlan(statements: readonly string[], run: RunStatement, ctx: PlanContext): Promise<void> {
  const log = ctx.log ?? silentLogger;
  log.info({ kind: ctx.kind, name: ctx.name, statements: statements.length }, 'reconcile-plan');
  for (let i = 0; i < statements.length; i++) {
    try {
      await run(statements[i]);
    } catch (e) {
      const cause = asRestError(e);
      throw new InternalServerError(
        `Could not successfully apply ${ctx.kind} ${ctx.name}. ${cause.message}`,
        {
          ...(cause.details ?? {}),
          status: cause.status,
          failedStatement: statements[i],
          appliedStatements: i,
        }
      );
    }
  }
}

export interface Reconcilable {
  describe(): Promise<Lookup<Row>>;
  /** runs the create path and returns the statements issued */
  create(): Promise<string[]>;
  /** pure: throws on disallowed changes, returns [] when converged */
  plan(current: Row): string[];
}

export interface ReconcileOutcome {
  created: boolean;
  statements: string[];
}

// describe -> create | (diff -> plan -> run)
export async function createOrAlter(
  target: Reconcilable,
  run: RunStatement,
  ctx: PlanContext
): Promise<ReconcileOutcome> {
  const existing = await target.describe();
  if (!existing.found) return { created: true, statements: await target.create() };
  const statements = target.plan(existing.value);
  if (statements.length) await runPlan(statements, run, ctx);
  return { created: false, statements };
}
