// packages/core/src/logger.ts
import pino from 'pino';
import type { BaseLogger, Level, LevelWithSilent } from 'pino';

// Fastify's request logger satisfies this too, so it can be handed down.
export type Logger = BaseLogger;
export type LogLevel = Level | LevelWithSilent;

export function createLogger(level: LogLevel = 'info', name = 'ddlbridge'): Logger {
  return pino({
    name,
    level,
    redact: ['token', 'headers.authorization'],
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
