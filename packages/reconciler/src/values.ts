// packages/reconciler/src/values.ts
import { normalizeName, quoteValue, type JsonValue } from '@ddlbridge/core';

export function sameValue(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((v, i) => sameValue(v, b[i]));
  }
  if (typeof a === 'object' && typeof b === 'object') {
    const ka = Object.keys(a).filter((k) => a[k] !== undefined);
    const kb = Object.keys(b).filter((k) => b[k] !== undefined);
    if (ka.length !== kb.length) return false;
    return ka.every((k) => sameValue(a[k], b[k]));
  }
  return false;
}

export const isAbsent = (v: JsonValue | undefined): v is null | undefined => v === undefined || v === null;

// ---- comparators ----
// "X-Small", "XSMALL", "x_small" compare equal
export const keywordForm = (v: JsonValue): JsonValue =>
  typeof v === 'string' ? v.toUpperCase().replace(/[-_\s]/g, '') : v;

export const identifierForm = (v: JsonValue): JsonValue =>
  typeof v === 'string' && v.length > 0 ? normalizeName(v) : v;

export const emptyAsNull = (v: JsonValue): JsonValue => {
  if (v === '') return null;
  if (Array.isArray(v) && v.length === 0) return null;
  if (v !== null && typeof v === 'object' && !Array.isArray(v) && Object.keys(v).length === 0) return null;
  return v;
};

// ---- rendering ----
export type RenderKind = 'number' | 'boolean' | 'keyword' | 'identifier' | 'string' | 'json';

const BARE_KEYWORD = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function renderValue(kind: RenderKind, value: JsonValue): string {
  switch (kind) {
    case 'string':
      return quoteValue(value);
    case 'json':
      return quoteValue(JSON.stringify(value));
    case 'identifier':
      return typeof value === 'string' ? normalizeName(value) : String(value);
    case 'keyword':
      if (typeof value === 'string') return BARE_KEYWORD.test(value) ? value : quoteValue(value);
      return String(value);
    default:
      return typeof value === 'object' ? JSON.stringify(value) : String(value);
  }
}
