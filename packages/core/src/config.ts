// packages/core/src/config.ts
import { z } from 'zod';

const csv = z
  .string()
  .optional()
  .transform((s) => (s ?? '').split(',').map((x) => x.trim()).filter(Boolean));

const optionalText = z.string().trim().min(1).optional();

export const ConfigSchema = z.object({
  BRIDGE_ACCOUNT_URL: z.string().url().optional(),
  BRIDGE_TOKEN: optionalText,
  BRIDGE_TOKEN_FILE: optionalText,
  BRIDGE_TOKEN_TYPE: z.enum(['OAUTH', 'KEYPAIR_JWT', 'PROGRAMMATIC_ACCESS_TOKEN']).default('OAUTH'),
  BRIDGE_ROLE: optionalText,
  BRIDGE_WAREHOUSE: optionalText,
  BRIDGE_DATABASE: optionalText,
  BRIDGE_SCHEMA: optionalText,
  STATEMENT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(60),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(500),
  POOL_CONNECTIONS: z.coerce.number().int().positive().default(10),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: csv,
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
});

export type BridgeConfig = z.infer<typeof ConfigSchema>;

// throws ZodError on invalid values
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  return ConfigSchema.parse(env);
}
