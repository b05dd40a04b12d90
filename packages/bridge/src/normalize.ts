// packages/bridge/src/normalize.ts
import { resolvedToIdentifier, type JsonValue, type RawRow, type Row } from '@ddlbridge/core';

export interface RowShape {
  rename?: Readonly<Record<string, string>>;
  keep?: readonly string[];               // whitelist, applied after renames
  drop?: readonly string[];
  trueFalse?: readonly string[];          // "true" / "false"
  yesNo?: readonly string[];              // "Y" / "N"
  onOff?: readonly string[];              // "ON" / "OFF"
  integers?: readonly string[];
  json?: readonly string[];
  lists?: readonly string[];              // "[a, b]" or JSON array text
  emptyAsNull?: readonly string[];
  nullText?: readonly string[];           // '' or 'null' -> null
  names?: readonly string[];              // resolved names -> identifiers
  lowerKeys?: boolean;
}

const text = (v: JsonValue | undefined): string | null =>
  v === undefined || v === null ? null : typeof v === 'string' ? v : String(v);

export function toBoolean(v: JsonValue | undefined, truthy: string): boolean | null {
  if (typeof v === 'boolean') return v;
  const t = text(v);
  if (t === null || t === '') return null;
  return t.toUpperCase() === truthy;
}

export function toInteger(v: JsonValue | undefined): number | null {
  if (typeof v === 'number') return Math.trunc(v);
  const t = text(v);
  if (t === null || !/^-?\d+$/.test(t.trim())) return null;
  return Number.parseInt(t, 10);
}

export function parseJsonText(v: JsonValue | undefined): JsonValue {
  if (typeof v !== 'string') return v ?? null;
  if (v.trim() === '') return null;
  try {
    const parsed: JsonValue = JSON.parse(v);
    return parsed;
  } catch {
    return v;
  }
}

/** `[\n  "DB.S.A",\n  "DB.S.B"\n]` or `[a, b]` -> ['DB.S.A', 'DB.S.B'] */
export function parseList(v: JsonValue | undefined): string[] {
  if (Array.isArray(v)) return v.map((x) => text(x) ?? '').filter(Boolean);
  const t = text(v);
  if (t === null || t.trim() === '' || t.trim() === 'null') return [];
  const parsed = parseJsonText(t);
  if (Array.isArray(parsed)) return parsed.map((x) => (text(x) ?? '').trim()).filter(Boolean);
  return t
    .trim()
    .replace(/^\[/, '')
    .replace(/\]$/, '')
    .split(',')
    .map((s) => s.replace(/\n/g, '').replace(/\\"/g, '"').trim())
    .filter(Boolean);
}

export function normalizeRow(raw: RawRow | Row, shape: RowShape): Row {
  let row: Row = {};
  for (const [k, v] of Object.entries(raw)) {
    const key = shape.lowerKeys ? k.toLowerCase() : k;
    row[shape.rename?.[key] ?? key] = v;
  }
  if (shape.keep) {
    const kept: Row = {};
    for (const k of shape.keep) if (k in row) kept[k] = row[k];
    row = kept;
  }
  for (const k of shape.drop ?? []) delete row[k];

  const apply = (fields: readonly string[] | undefined, fn: (v: JsonValue) => JsonValue) => {
    for (const f of fields ?? []) if (f in row) row[f] = fn(row[f]);
  };
  apply(shape.trueFalse, (v) => toBoolean(v, 'TRUE'));
  apply(shape.yesNo, (v) => toBoolean(v, 'Y'));
  apply(shape.onOff, (v) => toBoolean(v, 'ON'));
  apply(shape.integers, toInteger);
  apply(shape.json, parseJsonText);
  apply(shape.lists, parseList);
  apply(shape.emptyAsNull, (v) => (v === '' ? null : v));
  apply(shape.nullText, (v) => (v === '' || v === 'null' ? null : v));
  apply(shape.names, (v) => (typeof v === 'string' && v !== '' ? resolvedToIdentifier(v) : v));
  return row;
}

// ---- SHOW PARAMETERS ----
export function parameterValue(type: string | null, value: string | null): JsonValue {
  const t = (type ?? '').toUpperCase();
  if (t === 'NUMBER') return value === null || value === '' ? null : toInteger(value);
  if (t.startsWith('NUMBER')) return value === null || value === '' ? null : Number.parseFloat(value);
  if (t === 'BOOLEAN') return value === null || value === '' ? null : value.toLowerCase() === 'true';
  if (value === null || value === '') return null;
  return value;
}

/**
 * key (lower-cased) -> typed value, for parameters set on the object's own
 * level; inherited values read as null.
 */
export function parametersAtLevel(rows: RawRow[], level: string): Row {
  const out: Row = {};
  for (const r of rows) {
    if (!r.key) continue;
    out[r.key.toLowerCase()] = (r.level ?? '').toUpperCase() === level ? parameterValue(r.type, r.value) : null;
  }
  return out;
}
