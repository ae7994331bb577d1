import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../app.js';
import { ConversationOrchestrator } from '../../services/orchestrator/orchestrator.js';
import { CapabilityRegistry } from '../../services/tools/registry.js';
import { MemorySessionStore } from '../../services/sessions/memory-store.js';
import { DriftGuardClient } from '../../services/driftguard.js';
import { SlackNotifier } from '../../services/slack.js';
import type { ModelGateway, ModelReply } from '../../providers/types.js';
import { ModelGatewayError } from '../../utils/errors.js';
import type { Turn } from '../../services/sessions/types.js';
import type { CapabilityDescriptor } from '../../services/tools/types.js';

class QueueGateway implements ModelGateway {
  name = 'queue';
  replies: Array<ModelReply | Error> = [];
  offered: number[] = [];

  async converse(_turns: readonly Turn[], capabilities: readonly CapabilityDescriptor[]): Promise<ModelReply> {
    this.offered.push(capabilities.length);
    const next = this.replies.shift();
    if (!next) throw new ModelGatewayError('No reply queued');
    if (next instanceof Error) throw next;
    return next;
  }
}

describe('Chat Routes', () => {
  let app: FastifyInstance;
  let gateway: QueueGateway;
  let store: MemorySessionStore;

  beforeEach(async () => {
    gateway = new QueueGateway();
    store = new MemorySessionStore();
    const registry = new CapabilityRegistry();
    registry.register({
      name: 'get_drift_statistics',
      description: 'Drift statistics',
      parameters: [],
      execute: async () => 'active=2',
    });
    const orchestrator = new ConversationOrchestrator({ gateway, registry, store }, { retention: { userTurns: true } });

    app = await buildServer(
      {
        orchestrator,
        registry,
        driftGuard: new DriftGuardClient({ baseUrl: 'http://drift.test' }),
        slack: new SlackNotifier({ webhookUrl: '' }),
      },
      { logger: false }
    );
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /v1/health', () => {
    it('should report ok', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/health' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toMatchObject({ status: 'ok', version: '1.0.0' });
    });
  });

  describe('POST /v1/chat', () => {
    it('should answer a plain message', async () => {
      gateway.replies.push({ type: 'text', text: 'pong' });

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        payload: { sessionId: 's1', message: 'ping' },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ sessionId: 's1', reply: 'pong', toolInvocations: [] });
    });

    it('should summarize tool invocations', async () => {
      gateway.replies.push(
        {
          type: 'tool_requests',
          requests: [
            { name: 'get_drift_statistics', arguments: {} },
            { name: 'get_nonexistent', arguments: {} },
          ],
        },
        { type: 'text', text: 'You have 2 active drifts.' }
      );

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        payload: { sessionId: 's1', message: 'status?' },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        sessionId: 's1',
        reply: 'You have 2 active drifts.',
        toolInvocations: [
          { tool: 'get_drift_statistics', ok: true },
          { tool: 'get_nonexistent', ok: false, kind: 'UnknownCapability' },
        ],
      });
    });

    it('should answer without tools when asked to', async () => {
      gateway.replies.push({ type: 'text', text: 'Drift is divergence from Git.' });

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        payload: { sessionId: 's1', message: 'what is drift?', tools: false },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).reply).toBe('Drift is divergence from Git.');
      expect(gateway.offered).toEqual([0]);
    });

    it('should offer tools by default', async () => {
      gateway.replies.push({ type: 'text', text: 'pong' });

      await app.inject({ method: 'POST', url: '/v1/chat', payload: { sessionId: 's1', message: 'ping' } });

      expect(gateway.offered).toEqual([1]);
    });

    it('should reject an empty message', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        payload: { sessionId: 's1', message: '' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('validation_error');
    });

    it('should reject malformed JSON', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        headers: { 'content-type': 'application/json' },
        payload: '{"sessionId":',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('bad_request');
    });

    it('should return 502 and keep history when the model fails', async () => {
      gateway.replies.push(new ModelGatewayError('upstream unavailable'));

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        payload: { sessionId: 's1', message: 'ping' },
      });

      expect(response.statusCode).toBe(502);
      const body = JSON.parse(response.body);
      expect(body.error).toBe('model_gateway_error');
      expect(body.details).toMatchObject({ phase: 'INTENT', cause: 'upstream unavailable' });
      expect((await store.load('s1')).turns).toEqual([]);
    });
  });

  describe('/v1/sessions/:sessionId', () => {
    it('should return and clear stored turns', async () => {
      gateway.replies.push({ type: 'text', text: 'pong' });
      await app.inject({ method: 'POST', url: '/v1/chat', payload: { sessionId: 's1', message: 'ping' } });

      const history = await app.inject({ method: 'GET', url: '/v1/sessions/s1' });
      expect(JSON.parse(history.body)).toEqual({
        sessionId: 's1',
        turns: [
          { role: 'user', content: 'ping' },
          { role: 'assistant', content: 'pong' },
        ],
      });

      const cleared = await app.inject({ method: 'DELETE', url: '/v1/sessions/s1' });
      expect(JSON.parse(cleared.body)).toEqual({ ok: true });
      expect((await store.load('s1')).turns).toEqual([]);
    });
  });

  describe('GET /v1/capabilities', () => {
    it('should list registered capabilities', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/capabilities' });

      expect(JSON.parse(response.body)).toEqual({
        capabilities: [{ name: 'get_drift_statistics', description: 'Drift statistics', parameters: [] }],
      });
    });
  });
});
