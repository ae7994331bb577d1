// Environment configuration for DriftGuard Assistant
// Model, drift service and notifier settings are all read from environment variables

import { createLogger } from './logger.js';

const log = createLogger({ module: 'env' });

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    log.warn(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

// `min` is 0 for settings where 0 means "off"
export function parsePositiveInt(value: string | undefined, defaultValue: number, name: string, min = 0): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < min) {
    log.warn(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseNumber(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    log.warn(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Model gateway (OpenAI or any OpenAI-compatible endpoint)
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_MODEL: strEnv(process.env.OPENAI_MODEL, 'gpt-4o-mini'),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),
  MODEL_TIMEOUT_MS: parsePositiveInt(process.env.MODEL_TIMEOUT_MS, 60000, 'MODEL_TIMEOUT_MS'),
  MODEL_TEMPERATURE: parseNumber(process.env.MODEL_TEMPERATURE, 0.2, 'MODEL_TEMPERATURE'),

  // DriftGuard service
  DRIFTGUARD_BASE_URL: strEnv(process.env.DRIFTGUARD_BASE_URL, 'http://localhost:8080'),
  DRIFTGUARD_TIMEOUT_MS: parsePositiveInt(process.env.DRIFTGUARD_TIMEOUT_MS, 10000, 'DRIFTGUARD_TIMEOUT_MS', 1),

  // Slack notifier
  SLACK_WEBHOOK_URL: strEnv(process.env.SLACK_WEBHOOK_URL),
  SLACK_TIMEOUT_MS: parsePositiveInt(process.env.SLACK_TIMEOUT_MS, 10000, 'SLACK_TIMEOUT_MS', 1),
  SLACK_MAX_MESSAGE_LENGTH: parsePositiveInt(process.env.SLACK_MAX_MESSAGE_LENGTH, 2800, 'SLACK_MAX_MESSAGE_LENGTH', 1),

  // Tools
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),

  // Sessions
  PERSIST_USER_TURNS: process.env.PERSIST_USER_TURNS === 'true',
  PERSIST_TOOL_NARRATION: process.env.PERSIST_TOOL_NARRATION === 'true',
  SESSION_TTL_MS: parsePositiveInt(process.env.SESSION_TTL_MS, 0, 'SESSION_TTL_MS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export type Env = typeof env;

export function isModelGatewayConfigured(): boolean {
  return !!env.OPENAI_API_KEY;
}

export function isSlackConfigured(): boolean {
  return !!env.SLACK_WEBHOOK_URL;
}

// Log configuration on startup (redact secrets)
export function logConfiguration(): void {
  log.info(
    {
      environment: env.NODE_ENV,
      server: `${env.HOST}:${env.PORT}`,
      model: isModelGatewayConfigured() ? env.OPENAI_MODEL : 'not configured',
      modelBaseUrl: env.OPENAI_BASE_URL || 'default',
      driftguard: env.DRIFTGUARD_BASE_URL,
      slack: isSlackConfigured() ? 'configured' : 'not configured',
      toolsEnabled: env.TOOLS_ENABLED,
      retention: {
        userTurns: env.PERSIST_USER_TURNS,
        toolNarration: env.PERSIST_TOOL_NARRATION,
      },
      sessionTtlMs: env.SESSION_TTL_MS,
    },
    'DriftGuard Assistant configuration',
  );
}
