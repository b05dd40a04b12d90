// packages/bridge/src/resources/shared.ts
import {
  BadRequest,
  NotFound,
  found,
  notFound,
  type CreateMode,
  type Lookup,
  type Row,
} from '@ddlbridge/core';

// text following "CREATE "
export function createPrefix(mode: CreateMode, objectType: string): string {
  switch (mode) {
    case 'orReplace': return `OR REPLACE ${objectType} `;
    case 'ifNotExists': return `${objectType} IF NOT EXISTS `;
    default: return `${objectType} `;
  }
}

export const ifExistsClause = (on: boolean) => (on ? 'IF EXISTS ' : '');

/** Absence reported by the backend becomes the not-found variant. */
export async function lookup(fn: () => Promise<Row | undefined>): Promise<Lookup<Row>> {
  try {
    const row = await fn();
    return row ? found(row) : notFound();
  } catch (e) {
    if (e instanceof NotFound) return notFound();
    throw e;
  }
}

// per-row enrichment that may race with a concurrent drop
export async function unlessGone<T>(fn: () => Promise<T>): Promise<T | undefined> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof NotFound || e instanceof BadRequest) return undefined;
    throw e;
  }
}

export function pick(row: Row, keys: readonly string[]): Row {
  const out: Row = {};
  for (const k of keys) out[k] = row[k] ?? null;
  return out;
}
