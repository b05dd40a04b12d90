// packages/bridge/src/resources/table-ddl.ts
// Column and constraint rendering shared by CREATE TABLE and the table reconcile plan.
import {
  BadRequest,
  normalizeName,
  quoteValue,
  type ColumnBody,
  type ConstraintBody,
} from '@ddlbridge/core';

// ---- datatypes ----
const SAME_AS: ReadonlyMap<string, string> = new Map([
  ['INT', 'NUMBER(38,0)'],
  ['INTEGER', 'NUMBER(38,0)'],
  ['BIGINT', 'NUMBER(38,0)'],
  ['SMALLINT', 'NUMBER(38,0)'],
  ['TINYINT', 'NUMBER(38,0)'],
  ['BYTEINT', 'NUMBER(38,0)'],
  ['NUMBER', 'NUMBER(38,0)'],
  ['DOUBLE', 'FLOAT'],
  ['DOUBLEPRECISION', 'FLOAT'],
  ['REAL', 'FLOAT'],
  ['STRING', 'VARCHAR(16777216)'],
  ['TEXT', 'VARCHAR(16777216)'],
  ['VARCHAR', 'VARCHAR(16777216)'],
  ['CHAR', 'VARCHAR(1)'],
  ['CHARACTER', 'VARCHAR(1)'],
  ['VARBINARY', 'BINARY'],
]);

/** Collapse equivalent type spellings so `INT` and `NUMBER(38,0)` compare equal. */
export function normalizeDatatype(datatype: string): string {
  const t = datatype.toUpperCase().replace(/\s+/g, '');
  return SAME_AS.get(t) ?? t
    .replace('DECIMAL', 'NUMBER')
    .replace('NUMERIC', 'NUMBER')
    .replace('STRING', 'VARCHAR')
    .replace('TEXT', 'VARCHAR');
}

// ---- constraints ----
const SYSTEM_CONSTRAINT = /^"SYS_CONSTRAINT_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}"$/;

export const isSystemConstraintName = (name: string) => SYSTEM_CONSTRAINT.test(name);

const columnList = (names: readonly string[]) => `(${names.map(normalizeName).join(', ')})`;

export function constraintKey(c: ConstraintBody): string {
  return `${c.constraint_type}${columnList(c.column_names)}`;
}

export function constraintSql(c: ConstraintBody): string {
  const named = c.name ? `CONSTRAINT ${normalizeName(c.name)} ` : '';
  switch (c.constraint_type) {
    case 'PRIMARY KEY':
    case 'UNIQUE':
      return `${named}${c.constraint_type} ${columnList(c.column_names)}`;
    case 'FOREIGN KEY': {
      if (!c.referenced_table_name) throw new BadRequest('A foreign key needs referenced_table_name');
      const refs = c.referenced_column_names?.length ? ` ${columnList(c.referenced_column_names)}` : '';
      return `${named}FOREIGN KEY ${columnList(c.column_names)} REFERENCES ${normalizeName(c.referenced_table_name)}${refs}`;
    }
  }
}

/** Inline column constraints lifted out, followed by the table-level ones. */
export function allConstraints(columns: readonly ColumnBody[], constraints: readonly ConstraintBody[] = []): ConstraintBody[] {
  const inline = columns.flatMap((col) =>
    (col.constraints ?? []).map((c) => ({ ...c, column_names: [col.name] }))
  );
  return [...inline, ...constraints];
}

// ---- columns ----
export function columnSql(c: ColumnBody): string {
  let sql = `${normalizeName(c.name)} ${c.datatype}`;
  if (!c.nullable) sql += ' NOT NULL';
  if (c.collate) sql += ` COLLATE ${quoteValue(c.collate)}`;
  if (c.default !== undefined && c.default !== null) sql += ` DEFAULT ${c.default}`;
  if (c.autoincrement) {
    sql += ' AUTOINCREMENT';
    if (c.autoincrement_start !== undefined && c.autoincrement_start !== null) sql += ` START ${c.autoincrement_start}`;
    if (c.autoincrement_increment !== undefined && c.autoincrement_increment !== null) sql += ` INCREMENT ${c.autoincrement_increment}`;
  }
  if (c.comment) sql += ` COMMENT ${quoteValue(c.comment)}`;
  return sql;
}

export type ReportedColumn = {
  name: string;
  datatype: string;
  nullable: boolean;
  collate: string | null;
  default: string | null;
  autoincrement: boolean;
  autoincrement_start: number | null;
  autoincrement_increment: number | null;
  comment: string | null;
};

const orNull = <T>(v: T | null | undefined): T | null => (v === undefined ? null : v);

/**
 * MODIFY clauses turning `current` into `desired`; empty when they match.
 * Renames, collation and identity changes cannot be expressed and are rejected.
 */
export function columnChanges(current: ReportedColumn, desired: ColumnBody): string[] {
  const name = normalizeName(desired.name);
  if (name !== current.name) {
    throw new BadRequest(`Columns cannot be renamed or removed: ${current.name} is now ${name}`);
  }
  if (desired.collate && (current.collate ?? '').toLowerCase() !== desired.collate.toLowerCase()) {
    throw new BadRequest(`Collation of column ${name} cannot be changed`);
  }
  if (Boolean(desired.autoincrement) !== current.autoincrement) {
    throw new BadRequest(`'autoincrement' of column ${name} cannot be changed`);
  }
  if (desired.autoincrement) {
    for (const prop of ['autoincrement_start', 'autoincrement_increment'] as const) {
      if (orNull(desired[prop]) !== current[prop]) throw new BadRequest(`'${prop}' of column ${name} cannot be changed`);
    }
  }

  const clauses: string[] = [];
  const datatype = normalizeDatatype(desired.datatype);
  if (datatype !== normalizeDatatype(current.datatype)) clauses.push(`SET DATA TYPE ${datatype}`);

  const dflt = orNull(desired.default);
  if (dflt !== current.default) clauses.push(dflt === null ? 'DROP DEFAULT' : `SET DEFAULT ${dflt}`);

  if (desired.nullable !== current.nullable) clauses.push(desired.nullable ? 'DROP NOT NULL' : 'SET NOT NULL');

  const comment = desired.comment || null;
  if (comment !== current.comment) clauses.push(comment === null ? 'UNSET COMMENT' : `COMMENT ${quoteValue(comment)}`);

  return clauses.map((c) => `COLUMN ${name} ${c}`);
}
