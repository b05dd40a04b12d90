/* packages/bridge/test/bridge.spec.ts */
import { describe, it, expect } from 'vitest';
import { SqlBridge } from '../src';
import { ScriptedEngine, empty, nativeError, rows } from '../../../tests/helpers';

const SUCCESS = { description: 'successful' };

describe('SqlBridge scenarios', () => {
  it('creates a missing warehouse on PUT to the collection', async () => {
    const engine = new ScriptedEngine().when(/^SHOW WAREHOUSES/, empty());
    const res = await new SqlBridge({ engine }).request({
      method: 'PUT',
      url: '/api/v2/warehouses',
      body: { name: 'W1', warehouse_size: 'SMALL', auto_suspend: 60 },
    });
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual(SUCCESS);
    expect(engine.statements).toEqual([
      "SHOW WAREHOUSES LIKE 'W1'",
      'CREATE WAREHOUSE W1 WAREHOUSE_SIZE = SMALL AUTO_SUSPEND = 60 ',
    ]);
    expect(res.statements).toEqual(engine.statements);
  });

  it('resumes a task through a custom action', async () => {
    const engine = new ScriptedEngine();
    const res = await new SqlBridge({ engine }).request({
      method: 'POST',
      url: '/api/v2/databases/DB1/schemas/SCH1/tasks/T1:resume',
    });
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual(SUCCESS);
    expect(engine.statements).toEqual(['ALTER TASK DB1.SCH1.T1 RESUME ']);
  });

  it('lists databases with per-row parameters and boolean flags', async () => {
    const engine = new ScriptedEngine()
      .when("SHOW DATABASES LIKE 'FOO%' ", rows([{
        created_on: '2024-01-01', name: 'FOOBAR', is_default: 'N', is_current: 'Y', origin: '',
        owner: 'ACCOUNTADMIN', comment: '', options: '', retention_time: '1', kind: 'STANDARD',
        dropped_on: null, owner_role_type: 'ROLE',
      }]))
      .when('SHOW PARAMETERS IN DATABASE FOOBAR', rows([
        { key: 'DATA_RETENTION_TIME_IN_DAYS', value: '1', level: '', type: 'NUMBER' },
        { key: 'LOG_LEVEL', value: 'WARN', level: 'DATABASE', type: 'STRING' },
      ]));
    const res = await new SqlBridge({ engine }).request({ method: 'GET', url: '/api/v2/databases?like=FOO%' });

    expect(res.statusCode).toBe(200);
    expect(engine.statements).toEqual(["SHOW DATABASES LIKE 'FOO%' ", 'SHOW PARAMETERS IN DATABASE FOOBAR']);
    expect(res.body).toEqual([{
      created_on: '2024-01-01',
      name: 'FOOBAR',
      is_default: false,
      is_current: true,
      origin: null,
      owner: 'ACCOUNTADMIN',
      comment: null,
      options: null,
      dropped_on: null,
      owner_role_type: 'ROLE',
      data_retention_time_in_days: null,
      max_data_extension_time_in_days: null,
      default_ddl_collation: null,
      log_level: 'WARN',
      suspend_task_after_num_failures: null,
      trace_level: null,
      user_task_managed_initial_warehouse_size: null,
      user_task_timeout_ms: null,
    }]);
  });

  it('drops with IF EXISTS when createMode=ifExists', async () => {
    const engine = new ScriptedEngine();
    const res = await new SqlBridge({ engine }).request({
      method: 'DELETE',
      url: '/api/v2/databases/DB1?createMode=ifExists',
    });
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual(SUCCESS);
    expect(engine.statements).toEqual(['DROP DATABASE IF EXISTS DB1']);
  });
});

describe('SqlBridge reconcile', () => {
  const existing = () => new ScriptedEngine()
    .when("SHOW WAREHOUSES LIKE 'W1'", rows([{ name: 'W1', size: 'Small', auto_suspend: '600', comment: 'old' }]))
    .when('SHOW PARAMETERS IN WAREHOUSE W1', empty());

  it('alters only what differs', async () => {
    const engine = existing();
    const res = await new SqlBridge({ engine }).request({
      method: 'PUT',
      url: '/api/v2/warehouses/W1',
      body: { name: 'w1', warehouse_size: 'small', auto_suspend: 60, comment: 'old' },
    });
    expect(res.statusCode).toBe(200);
    expect(engine.statements.slice(2)).toEqual(['ALTER WAREHOUSE W1 SET AUTO_SUSPEND = 60']);
  });

  it('issues nothing beyond the describe when already converged', async () => {
    const engine = existing();
    const res = await new SqlBridge({ engine }).request({
      method: 'PUT',
      url: '/api/v2/warehouses/W1',
      body: { name: 'W1', warehouse_size: 'SMALL', auto_suspend: 600, comment: 'old' },
    });
    expect(res.body).toEqual(SUCCESS);
    expect(engine.statements).toEqual(["SHOW WAREHOUSES LIKE 'W1'", 'SHOW PARAMETERS IN WAREHOUSE W1']);
  });

  it('reports how far a failed plan got', async () => {
    const engine = existing().when(/^ALTER WAREHOUSE W1 SET/, nativeError(3001, 'Insufficient privileges'));
    const res = await new SqlBridge({ engine }).request({
      method: 'PUT',
      url: '/api/v2/warehouses/W1',
      body: { name: 'W1', warehouse_size: 'SMALL', auto_suspend: 60 },
    });
    const details = {
      errno: 3001,
      query: 'ALTER WAREHOUSE W1 SET AUTO_SUSPEND = 60',
      sqlstate: '42000',
      sfqid: 'q-1',
      status: 403,
      failedStatement: 'ALTER WAREHOUSE W1 SET AUTO_SUSPEND = 60',
      appliedStatements: 1,
    };
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({
      error_code: '500',
      request_id: null,
      message: `{error: "Could not successfully apply warehouse W1. Insufficient privileges", details: "${JSON.stringify(details)}"}`,
    });
    expect(res.statements).toEqual([
      "SHOW WAREHOUSES LIKE 'W1'",
      'SHOW PARAMETERS IN WAREHOUSE W1',
      'ALTER WAREHOUSE W1 UNSET COMMENT',
      'ALTER WAREHOUSE W1 SET AUTO_SUSPEND = 60',
    ]);
  });

  it('rejects a body whose name disagrees with the URL', async () => {
    const engine = new ScriptedEngine();
    const res = await new SqlBridge({ engine }).request({
      method: 'PUT',
      url: '/api/v2/warehouses/W1',
      body: { name: 'W2' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({
      message: '{error: "Inconsistent warehouse names: URL has W1, body has W2", details: "null"}',
    });
    expect(engine.statements).toEqual([]);
  });
});

describe('SqlBridge errors', () => {
  it('rejects an unknown resource path', async () => {
    const res = await new SqlBridge({ engine: new ScriptedEngine() }).request({ method: 'GET', url: '/api/v2/nothing' });
    expect(res).toEqual({
      statusCode: 400,
      body: {
        error_code: '400',
        request_id: null,
        message: '{error: "Invalid URL", details: "{"path":"/api/v2/nothing"}"}',
      },
      statements: [],
    });
  });

  it('rejects an unknown custom action', async () => {
    const engine = new ScriptedEngine();
    const res = await new SqlBridge({ engine }).request({ method: 'POST', url: '/api/v2/warehouses/W1:explode' });
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({
      message: `{error: "Unsupported action 'explode' while POSTing", details: "null"}`,
    });
    expect(engine.statements).toEqual([]);
  });

  it('answers 404 when describing a missing object', async () => {
    const engine = new ScriptedEngine().when(/^SHOW WAREHOUSES/, empty());
    const res = await new SqlBridge({ engine }).request({ method: 'GET', url: '/api/v2/warehouses/W9' });
    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({
      error_code: '404',
      request_id: null,
      message: '{error: "Warehouse W9 does not exist.", details: "null"}',
    });
  });

  it('passes backend failures through with the statements issued', async () => {
    const engine = new ScriptedEngine().when('DROP WAREHOUSE W1', nativeError(2003, 'does not exist'));
    const res = await new SqlBridge({ engine }).request({ method: 'DELETE', url: '/api/v2/warehouses/W1' });
    expect(res.statusCode).toBe(404);
    expect(res.statements).toEqual(['DROP WAREHOUSE W1']);
  });

  it('rejects an unsupported method', async () => {
    const res = await new SqlBridge({ engine: new ScriptedEngine() }).request({ method: 'PATCH', url: '/api/v2/warehouses' });
    expect(res.statusCode).toBe(400);
  });

  it('reports engine health', async () => {
    await expect(new SqlBridge({ engine: new ScriptedEngine() }).health())
      .resolves.toEqual({ ok: true, engine: 'scripted' });
  });
});
