// packages/sql-api/src/executor.ts
import {
  InternalServerError,
  isRestError,
  silentLogger,
  type Logger,
  type RawRow,
  type RestError,
  type StatementEngine,
  type TabularResult,
} from '@ddlbridge/core';
import { NativeError } from './native-error';
import { mapNativeError } from './error-map';

export const SUCCESS_ROW: Readonly<RawRow> = Object.freeze({ description: 'successful' });

// single "status" column, single row => DDL acknowledgment
function isAcknowledgment(result: TabularResult): boolean {
  return result.rows.length === 1
    && result.columns.length === 1
    && result.columns[0].name.toLowerCase() === 'status';
}

export function shapeRows(result: TabularResult, desiredProperties?: readonly string[]): RawRow[] {
  if (result.rows.length === 0) return [];
  if (isAcknowledgment(result)) return [{ ...SUCCESS_ROW }];
  const rows = result.rows.map((values) => {
    const row: RawRow = {};
    result.columns.forEach((c, i) => { row[c.name] = values[i] ?? null; });
    return row;
  });
  if (!desiredProperties) return rows;
  return rows.map((row) => {
    const picked: RawRow = {};
    for (const key of desiredProperties) picked[key] = row[key] ?? null;
    return picked;
  });
}

/**
 * Runs statements one at a time and classifies every failure once,
 * so callers only ever see RestError subclasses.
 */
export class Executor {
  constructor(
    private readonly engine: StatementEngine,
    private readonly log: Logger = silentLogger
  ) {}

  get engineName() {
    return this.engine.name;
  }

  async execute(sql: string, desiredProperties?: readonly string[]): Promise<RawRow[]> {
    let result: TabularResult;
    try {
      result = await this.engine.run(sql);
    } catch (e) {
      const err = this.classify(e, sql);
      this.log.warn(
        { status: err.status, errno: err.details?.errno ?? null, sqlState: err.details?.sqlstate ?? null, queryId: err.details?.sfqid ?? null },
        'statement-failed'
      );
      throw err;
    }
    const rows = shapeRows(result, desiredProperties);
    this.log.debug({ sql, rows: rows.length }, 'statement');
    return rows;
  }

  async executeMany(statements: readonly string[]): Promise<RawRow[][]> {
    const out: RawRow[][] = [];
    for (const sql of statements) out.push(await this.execute(sql));
    return out;
  }

  health() {
    return this.engine.health();
  }

  private classify(e: unknown, sql: string): RestError {
    if (e instanceof NativeError) return mapNativeError(e, sql);
    if (isRestError(e)) return e;
    return new InternalServerError(e instanceof Error ? e.message : String(e), { query: sql });
  }
}
