/* tests/helpers.ts */
import type { EngineHealth, RawRow, StatementEngine, TabularResult } from '@ddlbridge/core';
import { NativeError, type NativeErrorClass } from '@ddlbridge/sql-api';

export type Reply = TabularResult | Error;

interface Rule {
  match: RegExp | string;
  reply: Reply;
  once: boolean;
  used: boolean;
}

/**
 * In-process stand-in for the SQL backend. Records every statement and
 * answers from rules (first match wins); unmatched statements get a DDL ack.
 */
export class ScriptedEngine implements StatementEngine {
  readonly name = 'scripted';
  readonly statements: string[] = [];
  private readonly rules: Rule[] = [];

  when(match: RegExp | string, reply: Reply): this {
    this.rules.push({ match, reply, once: false, used: false });
    return this;
  }

  whenOnce(match: RegExp | string, reply: Reply): this {
    this.rules.push({ match, reply, once: true, used: false });
    return this;
  }

  async run(sql: string): Promise<TabularResult> {
    this.statements.push(sql);
    const rule = this.rules.find((r) =>
      !(r.once && r.used) && (typeof r.match === 'string' ? sql === r.match : r.match.test(sql))
    );
    const reply = rule ? rule.reply : ack();
    if (rule) rule.used = true;
    if (reply instanceof Error) throw reply;
    return reply;
  }

  async health(): Promise<EngineHealth> {
    return { ok: true, engine: this.name };
  }
}

export function rows(objects: RawRow[]): TabularResult {
  const names: string[] = [];
  for (const o of objects) for (const k of Object.keys(o)) if (!names.includes(k)) names.push(k);
  return {
    columns: names.map((name) => ({ name })),
    rows: objects.map((o) => names.map((n) => o[n] ?? null)),
  };
}

export function ack(text = 'Statement executed successfully.'): TabularResult {
  return { columns: [{ name: 'status' }], rows: [[text]] };
}

export const empty = (): TabularResult => ({ columns: [{ name: 'name' }], rows: [] });

export function nativeError(errno: number, message = 'failed', errorClass: NativeErrorClass = 'programming'): NativeError {
  return new NativeError(errorClass, message, { errno, sqlState: '42000', queryId: 'q-1' });
}

export const doesNotExist = () => nativeError(2003, 'Object does not exist or not authorized.');
