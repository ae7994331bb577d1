// Drift status route
// Quick status straight from DriftGuard, no model involved

import type { FastifyPluginAsync } from 'fastify';
import type { DriftGuardClient } from '../services/driftguard.js';
import { errorMessage } from '../utils/errors.js';

export interface DriftRouteOptions {
  driftGuard: DriftGuardClient;
}

export const driftRoutes: FastifyPluginAsync<DriftRouteOptions> = async (server, opts) => {
  const { driftGuard } = opts;

  // GET /v1/drift-status
  server.get('/drift-status', async (request, reply) => {
    try {
      const [health, statistics] = await Promise.all([driftGuard.getHealth(), driftGuard.getStatistics()]);
      return {
        status: 'success',
        health,
        statistics,
        timestamp: health.time,
      };
    } catch (error) {
      request.log.warn({ err: error }, 'DriftGuard status check failed');
      return reply.code(503).send({ status: 'error', message: errorMessage(error) });
    }
  });
};
