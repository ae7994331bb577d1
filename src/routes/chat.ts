// Chat routes
// One orchestration cycle per POST; session history inspection and reset

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ConversationOrchestrator } from '../services/orchestrator/orchestrator.js';
import type { CapabilityRegistry } from '../services/tools/registry.js';
import { AppError } from '../utils/errors.js';

const ChatRequestSchema = z.object({
  sessionId: z.string().trim().min(1).max(200),
  message: z.string().trim().min(1),
  // false: answer from background knowledge only, no DriftGuard or Slack calls
  tools: z.boolean().default(true),
});

const SessionParamsSchema = z.object({
  sessionId: z.string().trim().min(1).max(200),
});

export interface ChatRouteOptions {
  orchestrator: ConversationOrchestrator;
  registry: CapabilityRegistry;
}

export const chatRoutes: FastifyPluginAsync<ChatRouteOptions> = async (server, opts) => {
  const { orchestrator, registry } = opts;

  // POST /v1/chat - Ask the assistant
  server.post('/chat', async (request, reply) => {
    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.errors);
    }

    // Client gone before the answer is written: abort so nothing is committed
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    });

    const result = await orchestrator.converse({
      sessionId: parsed.data.sessionId,
      message: parsed.data.message,
      tools: parsed.data.tools,
      signal: controller.signal,
    });

    return {
      sessionId: result.sessionId,
      reply: result.reply,
      toolInvocations: result.toolResults.map(r =>
        r.status === 'success' ? { tool: r.tool, ok: true } : { tool: r.tool, ok: false, kind: r.kind }
      ),
    };
  });

  // GET /v1/sessions/:sessionId - Stored history
  server.get('/sessions/:sessionId', async request => {
    const { sessionId } = SessionParamsSchema.parse(request.params);
    const session = await orchestrator.history(sessionId);
    return { sessionId: session.id, turns: session.turns };
  });

  // DELETE /v1/sessions/:sessionId - Clear history
  server.delete('/sessions/:sessionId', async request => {
    const { sessionId } = SessionParamsSchema.parse(request.params);
    await orchestrator.reset(sessionId);
    return { ok: true };
  });

  // GET /v1/capabilities - What the model can call
  server.get('/capabilities', async () => {
    return { capabilities: registry.describeAll() };
  });
};
