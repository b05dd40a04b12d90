// packages/sql-api/src/client.ts
import { setTimeout as sleep } from 'node:timers/promises';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { silentLogger, type Logger, type StatementEngine, type TabularResult } from '@ddlbridge/core';
import {
  ER_FAILED_TO_CONNECT,
  ER_STATEMENT_TIMEOUT,
  NativeError,
  classForHttpStatus,
  parseErrno,
} from './native-error';
import { withSessionRenewal, type CredentialSource, type HttpReply } from './session';
import { getSharedAgent, type PoolOptions } from './pool';

// ---- wire shapes ----
const RowType = z.object({ name: z.string(), type: z.string().optional() }).passthrough();

const ResultSet = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  statementHandle: z.string().optional(),
  resultSetMetaData: z.object({
    numRows: z.number().optional(),
    rowType: z.array(RowType).default([]),
    partitionInfo: z.array(z.object({ rowCount: z.number() }).passthrough()).optional(),
  }).passthrough().optional(),
  data: z.array(z.array(z.string().nullable())).default([]),
}).passthrough();

const Partition = z.object({
  data: z.array(z.array(z.string().nullable())).default([]),
}).passthrough();

const Pending = z.object({
  statementHandle: z.string(),
  statementStatusUrl: z.string().optional(),
}).passthrough();

const Failure = z.object({
  code: z.union([z.string(), z.number()]).optional(),
  message: z.string().optional(),
  sqlState: z.string().optional(),
  statementHandle: z.string().optional(),
}).passthrough();

export interface SqlApiOptions {
  accountUrl: string;                 // e.g. https://<account>.snowflakecomputing.com
  credentials: CredentialSource;
  role?: string;
  warehouse?: string;
  database?: string;
  schema?: string;
  statementTimeoutSeconds?: number;
  pollIntervalMs?: number;
  pool?: PoolOptions;
  dispatcher?: Dispatcher;            // tests hand in a MockAgent
  log?: Logger;
}

const STATEMENTS_PATH = '/api/v2/statements';

export class SqlApiEngine implements StatementEngine {
  readonly name = 'sql-api';
  private readonly base: string;
  private readonly timeoutSeconds: number;
  private readonly pollIntervalMs: number;
  private readonly log: Logger;

  constructor(private readonly opts: SqlApiOptions) {
    this.base = opts.accountUrl.replace(/\/+$/, '');
    this.timeoutSeconds = opts.statementTimeoutSeconds ?? 60;
    this.pollIntervalMs = opts.pollIntervalMs ?? 500;
    this.log = opts.log ?? silentLogger;
  }

  async run(sql: string): Promise<TabularResult> {
    const submitted = await this.send('POST', STATEMENTS_PATH, {
      statement: sql,
      timeout: this.timeoutSeconds,
      database: this.opts.database,
      schema: this.opts.schema,
      warehouse: this.opts.warehouse,
      role: this.opts.role,
    });

    let reply = submitted;
    if (reply.status === 202) reply = await this.poll(Pending.parse(reply.payload).statementHandle);
    if (reply.status !== 200) throw this.failure(reply);

    const result = ResultSet.parse(reply.payload);
    const rows = [...result.data];
    const partitions = result.resultSetMetaData?.partitionInfo ?? [];
    if (partitions.length > 1 && result.statementHandle) {
      // later partitions are fetched in order
      for (let i = 1; i < partitions.length; i++) {
        const part = await this.send('GET', `${STATEMENTS_PATH}/${result.statementHandle}?partition=${i}`);
        if (part.status !== 200) throw this.failure(part);
        rows.push(...Partition.parse(part.payload).data);
      }
    }

    return {
      columns: (result.resultSetMetaData?.rowType ?? []).map((c) => ({ name: c.name, type: c.type })),
      rows,
      queryId: result.statementHandle,
    };
  }

  async health() {
    try {
      await this.run('SELECT 1');
      return { ok: true, engine: this.name };
    } catch (e) {
      return { ok: false, engine: this.name, error: e instanceof Error ? e.message : String(e) };
    }
  }

  // ---- internals ----
  private async poll(handle: string): Promise<HttpReply> {
    const deadline = Date.now() + this.timeoutSeconds * 1000;
    while (Date.now() < deadline) {
      await sleep(this.pollIntervalMs);
      const reply = await this.send('GET', `${STATEMENTS_PATH}/${handle}`);
      if (reply.status !== 202) return reply;
      this.log.debug({ handle }, 'statement-pending');
    }
    throw new NativeError('timeout', `Statement ${handle} did not finish within ${this.timeoutSeconds}s`, {
      errno: ER_STATEMENT_TIMEOUT,
      queryId: handle,
    });
  }

  private async send(method: 'GET' | 'POST', path: string, body?: object): Promise<HttpReply> {
    const dispatcher = this.opts.dispatcher ?? await getSharedAgent(this.opts.pool);
    return withSessionRenewal(
      this.opts.credentials,
      async (auth) => {
        try {
          const res = await request(`${this.base}${path}`, {
            method,
            dispatcher,
            headers: {
              'content-type': 'application/json',
              accept: 'application/json',
              'user-agent': 'ddlbridge/0.1',
              ...auth,
            },
            body: body ? JSON.stringify(body) : undefined,
          });
          return { status: res.statusCode, payload: parsePayload(await res.body.text()) };
        } catch (e) {
          throw new NativeError('operational', `Failed to reach ${this.base}: ${e instanceof Error ? e.message : String(e)}`, {
            errno: ER_FAILED_TO_CONNECT,
          });
        }
      },
      () => this.log.info({ path }, 'session-renewed')
    );
  }

  private failure(reply: HttpReply): NativeError {
    const parsed = Failure.safeParse(reply.payload);
    const f = parsed.success ? parsed.data : undefined;
    return new NativeError(classForHttpStatus(reply.status), f?.message ?? `HTTP ${reply.status}`, {
      errno: parseErrno(f?.code),
      sqlState: f?.sqlState,
      queryId: f?.statementHandle,
      httpStatus: reply.status,
    });
  }
}

function parsePayload(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return { message: text };
  }
}
