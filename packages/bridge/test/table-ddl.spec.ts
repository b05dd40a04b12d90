/* packages/bridge/test/table-ddl.spec.ts */
import { describe, it, expect } from 'vitest';
import type { ColumnBody } from '@ddlbridge/core';
import {
  allConstraints,
  columnChanges,
  columnSql,
  constraintKey,
  constraintSql,
  isSystemConstraintName,
  normalizeDatatype,
  type ReportedColumn,
} from '../src/resources/table-ddl';

const reported = (overrides: Partial<ReportedColumn> = {}): ReportedColumn => ({
  name: 'NOTE',
  datatype: 'TEXT',
  nullable: true,
  collate: null,
  default: null,
  autoincrement: false,
  autoincrement_start: null,
  autoincrement_increment: null,
  comment: null,
  ...overrides,
});

const column = (overrides: Partial<ColumnBody> = {}): ColumnBody => ({
  name: 'note',
  datatype: 'VARCHAR',
  nullable: true,
  ...overrides,
});

describe('normalizeDatatype', () => {
  it('collapses equivalent spellings', () => {
    expect(normalizeDatatype('int')).toBe('NUMBER(38,0)');
    expect(normalizeDatatype('NUMBER')).toBe('NUMBER(38,0)');
    expect(normalizeDatatype('decimal(10, 2)')).toBe('NUMBER(10,2)');
    expect(normalizeDatatype('string')).toBe('VARCHAR(16777216)');
    expect(normalizeDatatype('varchar(20)')).toBe('VARCHAR(20)');
  });
});

describe('constraints', () => {
  it('recognizes system-assigned names', () => {
    expect(isSystemConstraintName('"SYS_CONSTRAINT_0f1e2d3c-1111-2222-3333-444455556666"')).toBe(true);
    expect(isSystemConstraintName('PK_T1')).toBe(false);
  });

  it('renders keys with and without names', () => {
    expect(constraintSql({ constraint_type: 'PRIMARY KEY', column_names: ['a', 'b'] })).toBe('PRIMARY KEY (A, B)');
    expect(constraintSql({ name: 'uq_a', constraint_type: 'UNIQUE', column_names: ['a'] })).toBe('CONSTRAINT UQ_A UNIQUE (A)');
    expect(constraintSql({
      constraint_type: 'FOREIGN KEY',
      column_names: ['a'],
      referenced_table_name: 'parent',
      referenced_column_names: ['id'],
    })).toBe('FOREIGN KEY (A) REFERENCES PARENT (ID)');
    expect(constraintKey({ constraint_type: 'UNIQUE', column_names: ['a', 'b'] })).toBe('UNIQUE(A, B)');
  });

  it('lifts inline column constraints ahead of table ones', () => {
    const out = allConstraints(
      [column({ name: 'id', constraints: [{ constraint_type: 'PRIMARY KEY', column_names: ['ignored'] }] })],
      [{ constraint_type: 'UNIQUE', column_names: ['note'] }]
    );
    expect(out).toEqual([
      { constraint_type: 'PRIMARY KEY', column_names: ['id'] },
      { constraint_type: 'UNIQUE', column_names: ['note'] },
    ]);
  });
});

describe('columnSql', () => {
  it('renders every clause in order', () => {
    expect(columnSql({
      name: 'id',
      datatype: 'NUMBER',
      nullable: false,
      autoincrement: true,
      autoincrement_start: 1,
      autoincrement_increment: 5,
      comment: 'key',
    })).toBe("ID NUMBER NOT NULL AUTOINCREMENT START 1 INCREMENT 5 COMMENT 'key'");
    expect(columnSql(column({ collate: 'en-ci', default: "'x'" }))).toBe("NOTE VARCHAR COLLATE 'en-ci' DEFAULT 'x'");
  });
});

describe('columnChanges', () => {
  it('is empty for equivalent columns', () => {
    expect(columnChanges(reported(), column())).toEqual([]);
  });

  it('emits one clause per difference', () => {
    expect(columnChanges(reported({ default: "'a'", comment: 'old' }), column({ datatype: 'VARCHAR(10)', nullable: false })))
      .toEqual([
        'COLUMN NOTE SET DATA TYPE VARCHAR(10)',
        'COLUMN NOTE DROP DEFAULT',
        'COLUMN NOTE SET NOT NULL',
        'COLUMN NOTE UNSET COMMENT',
      ]);
  });

  it('rejects renames, collation and identity changes', () => {
    expect(() => columnChanges(reported(), column({ name: 'body' }))).toThrow('Columns cannot be renamed or removed');
    expect(() => columnChanges(reported({ collate: 'en' }), column({ collate: 'fr' }))).toThrow('Collation of column NOTE');
    expect(() => columnChanges(reported(), column({ autoincrement: true }))).toThrow("'autoincrement' of column NOTE");
  });
});
