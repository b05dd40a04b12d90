/* packages/sql-api/test/client.spec.ts */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { SqlApiEngine, StaticTokenSource, NativeError, type CredentialSource } from '../src';

const ORIGIN = 'https://acct.example.test';

describe('SqlApiEngine', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const engine = (credentials: CredentialSource = new StaticTokenSource('test-token')) =>
    new SqlApiEngine({
      accountUrl: `${ORIGIN}/`,
      credentials,
      dispatcher: agent,
      pollIntervalMs: 1,
      statementTimeoutSeconds: 5,
    });

  it('submits the statement with bearer auth and returns columns + rows', async () => {
    agent.get(ORIGIN)
      .intercept({
        path: '/api/v2/statements',
        method: 'POST',
        headers: { authorization: 'Bearer test-token', 'x-snowflake-authorization-token-type': 'OAUTH' },
      })
      .reply(200, {
        statementHandle: 'h1',
        resultSetMetaData: { rowType: [{ name: 'name', type: 'text' }, { name: 'is_default', type: 'text' }] },
        data: [['DB1', 'N']],
      });

    const result = await engine().run('SHOW DATABASES');
    expect(result.columns.map((c) => c.name)).toEqual(['name', 'is_default']);
    expect(result.rows).toEqual([['DB1', 'N']]);
    expect(result.queryId).toBe('h1');
  });

  it('polls an accepted statement until it completes', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/api/v2/statements', method: 'POST' })
      .reply(202, { statementHandle: 'h2', statementStatusUrl: '/api/v2/statements/h2' });
    pool.intercept({ path: '/api/v2/statements/h2', method: 'GET' })
      .reply(202, { statementHandle: 'h2' });
    pool.intercept({ path: '/api/v2/statements/h2', method: 'GET' })
      .reply(200, { statementHandle: 'h2', resultSetMetaData: { rowType: [{ name: 'status' }] }, data: [['ok']] });

    const result = await engine().run('ALTER WAREHOUSE W1 SUSPEND');
    expect(result.rows).toEqual([['ok']]);
  });

  it('fetches every partition after the first', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/api/v2/statements', method: 'POST' }).reply(200, {
      statementHandle: 'h3',
      resultSetMetaData: { rowType: [{ name: 'name' }], partitionInfo: [{ rowCount: 1 }, { rowCount: 1 }] },
      data: [['A']],
    });
    pool.intercept({ path: '/api/v2/statements/h3?partition=1', method: 'GET' }).reply(200, { data: [['B']] });

    const result = await engine().run('SHOW TABLES');
    expect(result.rows).toEqual([['A'], ['B']]);
  });

  it('raises a native error carrying code, state and handle', async () => {
    agent.get(ORIGIN).intercept({ path: '/api/v2/statements', method: 'POST' }).reply(422, {
      code: '002003',
      message: "Warehouse 'NOPE' does not exist or not authorized.",
      sqlState: '02000',
      statementHandle: 'h4',
    });

    await expect(engine().run('DESC WAREHOUSE NOPE')).rejects.toMatchObject({
      errorClass: 'programming',
      errno: 2003,
      sqlState: '02000',
      queryId: 'h4',
      httpStatus: 422,
    });
  });

  it('renews an expired session once and retries', async () => {
    let renewals = 0;
    const credentials: CredentialSource = {
      tokenType: 'OAUTH',
      token: async () => 'old-token',
      renew: async () => { renewals++; return 'new-token'; },
    };
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/api/v2/statements', method: 'POST', headers: { authorization: 'Bearer old-token' } })
      .reply(401, { code: '390112', message: 'Your session has expired. Please login again.' });
    pool.intercept({ path: '/api/v2/statements', method: 'POST', headers: { authorization: 'Bearer new-token' } })
      .reply(200, { resultSetMetaData: { rowType: [{ name: 'status' }] }, data: [['done']] });

    const result = await engine(credentials).run('ALTER TASK DB1.SCH1.T1 RESUME');
    expect(result.rows).toEqual([['done']]);
    expect(renewals).toBe(1);
  });

  it('maps connection failures to an operational native error', async () => {
    const err = await engine().run('SELECT 1').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NativeError);
    expect(err).toMatchObject({ errorClass: 'operational', errno: 250001 });
  });

  it('reports health from a trivial statement', async () => {
    agent.get(ORIGIN).intercept({ path: '/api/v2/statements', method: 'POST' })
      .reply(200, { resultSetMetaData: { rowType: [{ name: '1' }] }, data: [['1']] });
    expect(await engine().health()).toEqual({ ok: true, engine: 'sql-api' });
  });
});
