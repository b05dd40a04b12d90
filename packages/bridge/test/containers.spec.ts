/* packages/bridge/test/containers.spec.ts */
import { describe, it, expect } from 'vitest';
import type { JsonObject } from '@ddlbridge/core';
import { SqlBridge } from '../src';
import { ScriptedEngine, empty, rows } from '../../../tests/helpers';

const send = (engine: ScriptedEngine, method: string, url: string, body?: JsonObject) =>
  new SqlBridge({ engine }).request({ method, url, body });

describe('warehouses', () => {
  it('runs state actions with IF EXISTS', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'POST', '/api/v2/warehouses/W1:suspend?ifExists=true');
    await send(engine, 'POST', '/api/v2/warehouses/W1:abort');
    await send(engine, 'POST', '/api/v2/warehouses/W1:rename', { name: 'w2' });
    expect(engine.statements).toEqual([
      'ALTER WAREHOUSE IF EXISTS W1 SUSPEND',
      'ALTER WAREHOUSE W1 ABORT ALL QUERIES',
      'ALTER WAREHOUSE W1 RENAME TO W2',
    ]);
  });

  it('lists warehouses with their own-level parameters', async () => {
    const engine = new ScriptedEngine()
      .when('SHOW WAREHOUSES ', rows([{ name: 'W1', size: 'X-Small', type: 'STANDARD', auto_resume: 'true', running: '0' }]))
      .when('SHOW PARAMETERS IN WAREHOUSE W1', rows([
        { key: 'MAX_CONCURRENCY_LEVEL', value: '4', level: 'WAREHOUSE', type: 'NUMBER' },
        { key: 'STATEMENT_TIMEOUT_IN_SECONDS', value: '172800', level: '', type: 'NUMBER' },
      ]));
    const res = await send(engine, 'GET', '/api/v2/warehouses');
    expect(res.body).toEqual([{
      name: 'W1',
      warehouse_size: 'X-Small',
      warehouse_type: 'STANDARD',
      auto_resume: true,
      running: 0,
      max_concurrency_level: 4,
      statement_queued_timeout_in_seconds: null,
      statement_timeout_in_seconds: null,
    }]);
  });

  it('creates with OR REPLACE on POST', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'POST', '/api/v2/warehouses?createMode=orReplace', {
      name: 'w3',
      warehouse_size: 'X-Small',
      auto_resume: false,
      comment: "team's",
    });
    expect(engine.statements).toEqual([
      "CREATE OR REPLACE WAREHOUSE W3 WAREHOUSE_SIZE = 'X-Small' AUTO_RESUME = false COMMENT = 'team''s' ",
    ]);
  });

  it('rejects an unknown createMode', async () => {
    const res = await send(new ScriptedEngine(), 'POST', '/api/v2/warehouses?createMode=sometimes', { name: 'w3' });
    expect(res.statusCode).toBe(400);
  });
});

describe('databases', () => {
  it('creates a transient database if missing', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'POST', '/api/v2/databases?kind=transient&createMode=ifNotExists', {
      name: 'db2',
      comment: 'x',
      data_retention_time_in_days: 1,
    });
    expect(engine.statements).toEqual([
      "CREATE TRANSIENT DATABASE IF NOT EXISTS DB2 DATA_RETENTION_TIME_IN_DAYS = 1 COMMENT = 'x' ",
    ]);
  });

  it('rejects an unknown kind', async () => {
    const res = await send(new ScriptedEngine(), 'POST', '/api/v2/databases?kind=temporary', { name: 'db2' });
    expect(res.statusCode).toBe(400);
  });

  it('clones at a point in time', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'POST', '/api/v2/databases/DB1:clone', {
      name: 'db1_copy',
      point_of_time: { point_of_time_type: 'offset', reference: 'before', when: -60 },
    });
    await send(engine, 'POST', '/api/v2/databases/DB1:clone', {
      name: 'db1_ts',
      point_of_time: { point_of_time_type: 'timestamp', when: '2024-01-01 00:00:00' },
    });
    expect(engine.statements).toEqual([
      'CREATE DATABASE DB1_COPY CLONE DB1 BEFORE (OFFSET => -60) ',
      "CREATE DATABASE DB1_TS CLONE DB1 AT (TIMESTAMP => '2024-01-01 00:00:00') ",
    ]);
  });

  it('manages replication and failover', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'POST', '/api/v2/databases/DB1/replication:enable?ignore_edition_check=true', {
      accounts: ['myorg.acct1', 'myorg.acct2'],
    });
    await send(engine, 'POST', '/api/v2/databases/DB1/failover:disable', {});
    await send(engine, 'POST', '/api/v2/databases/DB1/replication:refresh');
    await send(engine, 'POST', '/api/v2/databases/DB1/failover:primary');
    expect(engine.statements).toEqual([
      'ALTER DATABASE DB1 ENABLE REPLICATION TO ACCOUNTS MYORG.ACCT1, MYORG.ACCT2 IGNORE EDITION CHECK',
      'ALTER DATABASE DB1 DISABLE FAILOVER',
      'ALTER DATABASE DB1 REFRESH',
      'ALTER DATABASE DB1 PRIMARY',
    ]);
  });

  it('needs accounts to enable replication', async () => {
    const engine = new ScriptedEngine();
    const res = await send(engine, 'POST', '/api/v2/databases/DB1/replication:enable', { accounts: [] });
    expect(res.statusCode).toBe(400);
    expect(engine.statements).toEqual([]);
  });

  it('creates from a share and undrops', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'POST', '/api/v2/databases/DB3:from_share?share=org.acct.s1');
    await send(engine, 'POST', '/api/v2/databases/DB3:undrop');
    expect(engine.statements).toEqual(['CREATE DATABASE DB3 FROM SHARE ORG.ACCT.S1', 'UNDROP DATABASE DB3']);
  });

  it('unsets what the body leaves out and sets what changed', async () => {
    const engine = new ScriptedEngine()
      .when("SHOW DATABASES LIKE 'DB1'", rows([{
        created_on: '2024-01-01', name: 'DB1', is_default: 'N', is_current: 'N', origin: '', owner: 'SYSADMIN',
        comment: 'old', options: '', dropped_on: null, owner_role_type: 'ROLE',
      }]))
      .when('SHOW PARAMETERS IN DATABASE DB1', rows([
        { key: 'DATA_RETENTION_TIME_IN_DAYS', value: '1', level: 'DATABASE', type: 'NUMBER' },
        { key: 'LOG_LEVEL', value: 'INFO', level: 'DATABASE', type: 'STRING' },
      ]));
    const res = await send(engine, 'PUT', '/api/v2/databases/DB1', {
      name: 'DB1',
      comment: 'new',
      data_retention_time_in_days: 1,
      owner: 'SYSADMIN',
    });
    expect(res.statusCode).toBe(200);
    expect(engine.statements.slice(2)).toEqual([
      'ALTER DATABASE DB1 UNSET LOG_LEVEL',
      "ALTER DATABASE DB1 SET COMMENT = 'new'",
    ]);
  });

  it('refuses to change what SHOW reports as read-only', async () => {
    const engine = new ScriptedEngine()
      .when("SHOW DATABASES LIKE 'DB1'", rows([{ name: 'DB1', owner: 'SYSADMIN', is_default: 'N', is_current: 'N' }]))
      .when('SHOW PARAMETERS IN DATABASE DB1', empty());
    const res = await send(engine, 'PUT', '/api/v2/databases/DB1', { name: 'DB1', owner: 'PUBLIC' });
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({
      message: '{error: "Cannot change immutable properties of database DB1: owner", details: "{"properties":["owner"]}"}',
    });
    expect(engine.statements).toHaveLength(2);
  });
});

describe('schemas', () => {
  it('lists schemas in the URL database', async () => {
    const engine = new ScriptedEngine().when(/^SHOW SCHEMAS/, empty());
    const res = await send(engine, 'GET', '/api/v2/databases/DB1/schemas?like=S%25&startsWith=S&showLimit=5');
    expect(res.body).toEqual([]);
    expect(engine.statements).toEqual(["SHOW SCHEMAS LIKE 'S%' IN DATABASE DB1 STARTS WITH 'S' LIMIT 5 "]);
  });

  it('creates a managed-access schema', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'POST', '/api/v2/databases/DB1/schemas?withManagedAccess=true', {
      name: 's1',
      pipe_execution_paused: true,
    });
    expect(engine.statements).toEqual(['CREATE SCHEMA DB1.S1 WITH MANAGED ACCESS PIPE_EXECUTION_PAUSED = true ']);
  });

  it('describes a schema with its parameters', async () => {
    const engine = new ScriptedEngine()
      .when("SHOW SCHEMAS LIKE 'S1' IN DATABASE DB1", rows([{
        created_on: '2024-01-01', name: 'S1', database_name: 'DB1', is_default: 'N', is_current: 'Y',
        owner: 'SYSADMIN', comment: '', options: 'MANAGED ACCESS', retention_time: '1', dropped_on: null,
        owner_role_type: 'ROLE',
      }]))
      .when('SHOW PARAMETERS IN SCHEMA DB1.S1', rows([
        { key: 'PIPE_EXECUTION_PAUSED', value: 'true', level: 'SCHEMA', type: 'BOOLEAN' },
      ]));
    const res = await send(engine, 'GET', '/api/v2/databases/DB1/schemas/S1');
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      name: 'S1',
      database_name: 'DB1',
      is_current: true,
      comment: null,
      options: 'MANAGED ACCESS',
      pipe_execution_paused: true,
    });
    expect(res.body).not.toHaveProperty('retention_time');
  });

  it('drops within the database', async () => {
    const engine = new ScriptedEngine();
    await send(engine, 'DELETE', '/api/v2/databases/DB1/schemas/S1?ifExists=true');
    expect(engine.statements).toEqual(['DROP SCHEMA IF EXISTS DB1.S1']);
  });
});
