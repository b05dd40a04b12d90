// apps/http/src/app.ts
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import {
  BadRequest,
  JsonObjectSchema,
  isRestError,
  toErrorEnvelope,
  type ErrorEnvelopeBody,
  type JsonObject,
  type StatementEngine,
} from '@ddlbridge/core';
import { SqlBridge } from '@ddlbridge/bridge';

export interface AppOptions {
  engine: StatementEngine;
  corsOrigins?: string[];
  rateLimitMax?: number;
  logger?: FastifyServerOptions['logger'];
}

// failures raised by Fastify itself (body parsing, rate limit) keep their status
function transportEnvelope(status: number, message: string): ErrorEnvelopeBody {
  return {
    error_code: String(status),
    request_id: null,
    message: `{error: "${message}", details: "null"}`,
  };
}

function shouldDebug(query: unknown, header: string | string[] | undefined): boolean {
  const q = typeof query === 'object' && query !== null && 'debug' in query ? String(query.debug) : '';
  return q === '1' || header === '1' || process.env.DEBUG_STATEMENTS === '1';
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? false,
    bodyLimit: 1_000_000,
  });

  const allow = opts.corsOrigins ?? [];
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true,
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 600,
    timeWindow: '1 minute',
  });

  const bridge = new SqlBridge({ engine: opts.engine, log: app.log });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    if (isRestError(err)) {
      const envelope = toErrorEnvelope(err);
      return reply.status(envelope.statusCode).send(envelope.body);
    }
    const status = err.statusCode ?? 500;
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    if (status < 500) return reply.status(status).send(transportEnvelope(status, err.message));
    const envelope = toErrorEnvelope(err);
    return reply.status(envelope.statusCode).send(envelope.body);
  });

  app.route({
    method: ['GET', 'POST', 'PUT', 'DELETE'],
    url: '/api/v2/*',
    handler: async (req, reply) => {
      let body: JsonObject | undefined;
      if (req.body !== undefined && req.body !== null) {
        const parsed = JsonObjectSchema.safeParse(req.body);
        if (!parsed.success) throw new BadRequest('Request body must be a JSON object');
        body = parsed.data;
      }

      const res = await bridge.request({ method: req.method, url: req.url, body });
      req.log.info({ status: res.statusCode, statements: res.statements.length }, 'bridge-request');
      if (shouldDebug(req.query, req.headers['x-debug'])) {
        reply.header('x-statement-count', String(res.statements.length));
      }
      return reply.status(res.statusCode).send(res.body);
    },
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (_req, reply) => {
    const [health] = await Promise.allSettled([bridge.health()]);
    const engine = health.status === 'fulfilled' ? health.value : { ok: false, engine: 'unknown' };
    return reply.status(engine.ok ? 200 : 503).send({ ok: engine.ok, engine });
  });

  return app;
}
