// HTTP server assembly
// Wires the orchestrator, registry and direct DriftGuard/Slack routes into one Fastify instance

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { chatRoutes } from './routes/chat.js';
import { driftRoutes } from './routes/drift.js';
import { slackRoutes } from './routes/slack.js';
import type { ConversationOrchestrator } from './services/orchestrator/orchestrator.js';
import type { CapabilityRegistry } from './services/tools/registry.js';
import type { DriftGuardClient } from './services/driftguard.js';
import type { SlackNotifier } from './services/slack.js';
import { formatErrorResponse, toAppError } from './utils/errors.js';

export interface ServerDependencies {
  orchestrator: ConversationOrchestrator;
  registry: CapabilityRegistry;
  driftGuard: DriftGuardClient;
  slack: SlackNotifier;
}

export interface BuildServerOptions {
  logger?: boolean;
}

export async function buildServer(deps: ServerDependencies, opts: BuildServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: opts.logger === false
      ? false
      : {
          level: env.LOG_LEVEL,
          redact: ['req.headers.authorization'],
          transport: env.NODE_ENV === 'production'
            ? undefined
            : {
                target: 'pino-pretty',
                options: {
                  translateTime: 'HH:MM:ss Z',
                  ignore: 'pid,hostname',
                },
              },
        },
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS.length > 0 ? env.CORS_ORIGINS : ['http://localhost:3000', 'http://127.0.0.1:3000'],
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    const appError = toAppError(error);
    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, appError.message);
    } else {
      request.log.info({ err: error }, appError.message);
    }
    return reply.code(appError.statusCode).send(formatErrorResponse(appError, true));
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.redirect('/v1/health', 301);
  });

  await server.register(chatRoutes, { prefix: '/v1', orchestrator: deps.orchestrator, registry: deps.registry });
  await server.register(driftRoutes, { prefix: '/v1', driftGuard: deps.driftGuard });
  await server.register(slackRoutes, { prefix: '/v1', slack: deps.slack });

  return server;
}
