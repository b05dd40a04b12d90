// packages/core/src/identifiers.ts
import { BadRequest } from './errors';
import type { JsonValue } from './types';

const ALREADY_QUOTED = /^(".+")$/s;
const UNQUOTED_CASE_INSENSITIVE = /^([_A-Za-z]+[_A-Za-z0-9$]*)$/;
const OBJECT_NAME = /^(?:[_A-Za-z][_A-Za-z0-9$]*|".+")$/s;

/**
 * Case-fold and quote an identifier the way the backend resolves it.
 *
 * - `"Mixed"` passes through (interior quotes must already be doubled)
 * - `my_wh` becomes `MY_WH`
 * - anything else is wrapped in double quotes with `"` doubled
 *
 * Idempotent: `normalizeName(normalizeName(x)) === normalizeName(x)`.
 */
export function normalizeName(name: string): string {
  if (name.length === 0) throw new BadRequest('Identifier must not be empty');
  if (ALREADY_QUOTED.test(name)) {
    const interior = name.slice(1, -1).replace(/""/g, '');
    if (interior.includes('"')) {
      throw new BadRequest(`Invalid quoted identifier ${name}: interior double quotes must be doubled`);
    }
    return name;
  }
  if (UNQUOTED_CASE_INSENSITIVE.test(name)) return name.toUpperCase();
  return doubleQuoteName(name);
}

export function doubleQuoteName(name: string): string {
  if (!name) return name;
  return `"${name.replace(/"/g, '""')}"`;
}

// `"My ""x"""` -> `My "x"`; unquoted names are returned as-is
export function unquoteName(name: string): string {
  if (name.length >= 2 && name.startsWith('"') && name.endsWith('"')) {
    return name.slice(1, -1).replace(/""/g, '"');
  }
  return name;
}

export function isValidObjectName(name: string): boolean {
  return OBJECT_NAME.test(name);
}

// String literal: single quotes doubled, backslashes escaped
export function quoteValue(value: JsonValue | undefined): string {
  if (value === null || value === undefined) return "''";
  const text = typeof value === 'string'
    ? value
    : typeof value === 'object' ? JSON.stringify(value) : String(value);
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

/** Split `a."b.c".d` into `['a', '"b.c"', 'd']`, respecting quoted parts. */
export function splitQualifiedName(text: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;
  for (const ch of text) {
    if (ch === '"') quoted = !quoted;
    if (ch === '.' && !quoted) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts.map((p) => p.trim());
}

// last dotted part of a possibly qualified name
export function unqualifiedName(text: string): string {
  const parts = splitQualifiedName(text);
  return parts[parts.length - 1] ?? text;
}

export function qualify(...parts: (string | undefined)[]): string {
  return parts.filter((p): p is string => !!p).join('.');
}

// Comparable key for a possibly partial name, filled from the owning scope.
export function qualifiedKey(text: string, database: string, schema: string): string {
  const parts = splitQualifiedName(text).map(normalizeName);
  if (parts.length === 1) return qualify(database, schema, parts[0]);
  if (parts.length === 2) return qualify(database, parts[0], parts[1]);
  return parts.join('.');
}

// Name as SHOW/DESC report it (already resolved) -> identifier text
export function resolvedToIdentifier(resolved: string): string {
  return /^[A-Z_][A-Z0-9_$]*$/.test(resolved) ? resolved : doubleQuoteName(resolved);
}
