import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../app.js';
import { ConversationOrchestrator } from '../../services/orchestrator/orchestrator.js';
import { CapabilityRegistry } from '../../services/tools/registry.js';
import { MemorySessionStore } from '../../services/sessions/memory-store.js';
import { DriftGuardClient } from '../../services/driftguard.js';
import { SlackNotifier } from '../../services/slack.js';
import type { ModelGateway } from '../../providers/types.js';
import { ModelGatewayError } from '../../utils/errors.js';

const unusedGateway: ModelGateway = {
  name: 'unused',
  converse: async () => {
    throw new ModelGatewayError('not expected in these tests');
  },
};

async function serverWith(webhookUrl: string): Promise<FastifyInstance> {
  const registry = new CapabilityRegistry();
  const app = await buildServer(
    {
      orchestrator: new ConversationOrchestrator({ gateway: unusedGateway, registry, store: new MemorySessionStore() }),
      registry,
      driftGuard: new DriftGuardClient({ baseUrl: 'http://drift.test', timeoutMs: 1000 }),
      slack: new SlackNotifier({ webhookUrl, timeoutMs: 1000, now: () => new Date(2026, 0, 2, 3, 4, 5) }),
    },
    { logger: false }
  );
  await app.ready();
  return app;
}

describe('Status and Slack Routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await serverWith('http://slack.test/hook');
  });

  afterEach(async () => {
    await app.close();
    vi.unstubAllGlobals();
  });

  describe('GET /v1/drift-status', () => {
    it('should return health and statistics', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async (url: string) =>
          url.endsWith('/health')
            ? new Response(JSON.stringify({ status: 'healthy', message: 'ok', time: '10:00' }), { status: 200 })
            : new Response(JSON.stringify({ statistics: { total_records: 3 } }), { status: 200 })
        )
      );

      const response = await app.inject({ method: 'GET', url: '/v1/drift-status' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('success');
      expect(body.health).toEqual({ status: 'healthy', message: 'ok', time: '10:00' });
      expect(body.statistics.total_records).toBe(3);
      expect(body.timestamp).toBe('10:00');
    });

    it('should return 503 when DriftGuard is down', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));

      const response = await app.inject({ method: 'GET', url: '/v1/drift-status' });

      expect(response.statusCode).toBe(503);
      expect(JSON.parse(response.body)).toEqual({
        status: 'error',
        message: 'DriftGuard service unavailable at http://drift.test',
      });
    });
  });

  describe('POST /v1/slack/test', () => {
    it('should send the default test message', async () => {
      const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);

      const response = await app.inject({ method: 'POST', url: '/v1/slack/test' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        status: 'success',
        message: '✅ DriftGuard report successfully sent to Slack!',
        test_message: '🧪 Test message from DriftGuard Assistant',
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should return 502 when Slack rejects the message', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('no', { status: 404 })));

      const response = await app.inject({ method: 'POST', url: '/v1/slack/test', payload: { message: 'hi' } });

      expect(response.statusCode).toBe(502);
      expect(JSON.parse(response.body)).toEqual({
        status: 'error',
        message: '❌ Failed to send to Slack. Status: 404',
      });
    });

    it('should return 503 without a webhook', async () => {
      await app.close();
      app = await serverWith('');

      const response = await app.inject({ method: 'POST', url: '/v1/slack/test' });

      expect(response.statusCode).toBe(503);
      expect(JSON.parse(response.body).message).toBe(
        '❌ Slack webhook URL not configured. Set SLACK_WEBHOOK_URL environment variable.'
      );
    });
  });

  describe('POST /v1/slack/alert', () => {
    it('should fill in defaults for missing fields', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('ok', { status: 200 })));

      const response = await app.inject({
        method: 'POST',
        url: '/v1/slack/alert',
        payload: { resource_name: 'web' },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        status: 'success',
        message: '✅ Drift alert for web sent to Slack successfully!',
        alert_data: {
          alert_type: 'Configuration Drift',
          resource_name: 'web',
          namespace: 'default',
          details: 'No details provided',
        },
      });
    });
  });
});
