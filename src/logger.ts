// Logger for DriftGuard Assistant
// pino with pretty output in development; silent under test tooling

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

// Reads process.env directly so env.ts can log while it is still being evaluated
const nodeEnv = process.env.NODE_ENV || 'development';
const isTestTooling = process.env.VITEST === 'true' || nodeEnv === 'test';

const REDACT_PATHS = [
  'apiKey',
  '*.apiKey',
  'webhookUrl',
  '*.webhookUrl',
  'req.headers.authorization',
];

function buildOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    enabled: !isTestTooling,
    base: { service: 'driftguard-assistant' },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (nodeEnv !== 'production' && !isTestTooling) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

export const logger: Logger = pino(buildOptions());

export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
