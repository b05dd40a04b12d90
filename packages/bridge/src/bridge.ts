// packages/bridge/src/bridge.ts
import {
  silentLogger,
  toErrorEnvelope,
  type BridgeResult,
  type ErrorEnvelopeBody,
  type InboundRequest,
  type Logger,
  type ResourceKind,
  type StatementEngine,
} from '@ddlbridge/core';
import { Executor } from '@ddlbridge/sql-api';
import { normalizeRequest } from './request';
import { route } from './router';
import { parseScope, type ResourceDescriptor } from './descriptor';
import { TranslatorContext, dispatch, type ResourceTranslator } from './context';
import { WAREHOUSE, WarehouseTranslator } from './resources/warehouse';
import { DATABASE, DatabaseTranslator } from './resources/database';
import { SCHEMA, SchemaTranslator } from './resources/schema';
import { TASK, TaskTranslator } from './resources/task';
import { TABLE, TableTranslator } from './resources/table';
import { COMPUTE_POOL, ComputePoolTranslator } from './resources/compute-pool';
import { SERVICE, ServiceTranslator } from './resources/service';
import { IMAGE_REPOSITORY, ImageRepositoryTranslator } from './resources/image-repository';

interface Registration {
  descriptor: ResourceDescriptor;
  make(ctx: TranslatorContext): ResourceTranslator;
}

export const TRANSLATORS: Readonly<Record<ResourceKind, Registration>> = {
  warehouse: { descriptor: WAREHOUSE, make: (ctx) => new WarehouseTranslator(ctx) },
  database: { descriptor: DATABASE, make: (ctx) => new DatabaseTranslator(ctx) },
  schema: { descriptor: SCHEMA, make: (ctx) => new SchemaTranslator(ctx) },
  task: { descriptor: TASK, make: (ctx) => new TaskTranslator(ctx) },
  table: { descriptor: TABLE, make: (ctx) => new TableTranslator(ctx) },
  'compute-pool': { descriptor: COMPUTE_POOL, make: (ctx) => new ComputePoolTranslator(ctx) },
  service: { descriptor: SERVICE, make: (ctx) => new ServiceTranslator(ctx) },
  'image-repository': { descriptor: IMAGE_REPOSITORY, make: (ctx) => new ImageRepositoryTranslator(ctx) },
};

export interface BridgeResponse {
  statusCode: number;
  body: BridgeResult | ErrorEnvelopeBody;
  /** statements issued for this request, in order */
  statements: string[];
}

export interface SqlBridgeOptions {
  engine: StatementEngine;
  log?: Logger;
}

/**
 * Entry point: one REST request in, one status + body out. Never throws;
 * every failure comes back as the error envelope.
 */
export class SqlBridge {
  readonly executor: Executor;
  private readonly log: Logger;

  constructor(opts: SqlBridgeOptions) {
    this.log = opts.log ?? silentLogger;
    this.executor = new Executor(opts.engine, this.log);
  }

  async request(input: InboundRequest): Promise<BridgeResponse> {
    let ctx: TranslatorContext | undefined;
    try {
      const req = normalizeRequest(input);
      const { descriptor, make } = TRANSLATORS[route(req.path)];
      ctx = new TranslatorContext(descriptor, parseScope(descriptor, req), this.executor, this.log);
      const { statements, result } = await dispatch(make(ctx), ctx);
      return { statusCode: 200, body: result, statements };
    } catch (e) {
      const envelope = toErrorEnvelope(e);
      this.log.debug({ status: envelope.statusCode, method: input.method, url: input.url }, 'bridge-error');
      return { ...envelope, statements: ctx ? [...ctx.issued] : [] };
    }
  }

  health() {
    return this.executor.health();
  }
}
