// apps/http/src/index.ts
import { createLogger, loadConfig } from '@ddlbridge/core';
import {
  FileTokenSource,
  SqlApiEngine,
  StaticTokenSource,
  closeSharedAgent,
  type CredentialSource,
} from '@ddlbridge/sql-api';
import { buildApp } from './app';

async function main() {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL, 'ddlbridge-engine');

  if (!config.BRIDGE_ACCOUNT_URL) throw new Error('BRIDGE_ACCOUNT_URL is required');
  let credentials: CredentialSource;
  if (config.BRIDGE_TOKEN_FILE) credentials = new FileTokenSource(config.BRIDGE_TOKEN_FILE, config.BRIDGE_TOKEN_TYPE);
  else if (config.BRIDGE_TOKEN) credentials = new StaticTokenSource(config.BRIDGE_TOKEN, config.BRIDGE_TOKEN_TYPE);
  else throw new Error('One of BRIDGE_TOKEN_FILE or BRIDGE_TOKEN is required');

  const engine = new SqlApiEngine({
    accountUrl: config.BRIDGE_ACCOUNT_URL,
    credentials,
    role: config.BRIDGE_ROLE,
    warehouse: config.BRIDGE_WAREHOUSE,
    database: config.BRIDGE_DATABASE,
    schema: config.BRIDGE_SCHEMA,
    statementTimeoutSeconds: config.STATEMENT_TIMEOUT_SECONDS,
    pollIntervalMs: config.POLL_INTERVAL_MS,
    pool: { connections: config.POOL_CONNECTIONS },
    log,
  });

  const app = await buildApp({
    engine,
    corsOrigins: config.CORS_ORIGIN,
    rateLimitMax: config.RATE_LIMIT_MAX,
    logger: { level: config.LOG_LEVEL, redact: ['req.headers.authorization'] },
  });

  app.log.info(
    {
      account_url: config.BRIDGE_ACCOUNT_URL,
      token: config.BRIDGE_TOKEN_FILE ? 'file' : 'env:BRIDGE_TOKEN',
      role: config.BRIDGE_ROLE ?? 'default',
      warehouse: config.BRIDGE_WAREHOUSE ?? 'default',
    },
    'engine-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([closeSharedAgent(), app.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.PORT, host: config.HOST });
  app.log.info(`HTTP on :${config.PORT}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
