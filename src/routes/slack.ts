// Slack routes
// Direct webhook checks that bypass the model

import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import { SlackNotConfiguredError, type SlackNotifier } from '../services/slack.js';
import { formatDriftAlert } from '../services/tools/slack-alert-tool.js';
import { AppError, errorMessage } from '../utils/errors.js';

const TestMessageSchema = z.object({
  message: z.string().min(1).default('🧪 Test message from DriftGuard Assistant'),
});

const AlertSchema = z.object({
  alert_type: z.string().min(1).default('Configuration Drift'),
  resource_name: z.string().min(1).default('Unknown Resource'),
  namespace: z.string().min(1).default('default'),
  details: z.string().min(1).default('No details provided'),
});

export interface SlackRouteOptions {
  slack: SlackNotifier;
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', parsed.error.errors);
  }
  return parsed.data;
}

function sendFailure(reply: FastifyReply, error: unknown) {
  const statusCode = error instanceof SlackNotConfiguredError ? 503 : 502;
  return reply.code(statusCode).send({ status: 'error', message: `❌ ${errorMessage(error)}` });
}

export const slackRoutes: FastifyPluginAsync<SlackRouteOptions> = async (server, opts) => {
  const { slack } = opts;

  // POST /v1/slack/test - Verify webhook configuration
  server.post('/slack/test', async (request, reply) => {
    const body = parseBody(TestMessageSchema, request.body);

    try {
      await slack.send(body.message);
    } catch (error) {
      return sendFailure(reply, error);
    }

    return {
      status: 'success',
      message: '✅ DriftGuard report successfully sent to Slack!',
      test_message: body.message,
    };
  });

  // POST /v1/slack/alert - Send a structured drift alert
  server.post('/slack/alert', async (request, reply) => {
    const body = parseBody(AlertSchema, request.body);
    const alert = {
      alertType: body.alert_type,
      resourceName: body.resource_name,
      namespace: body.namespace,
      details: body.details,
    };

    try {
      await slack.send(formatDriftAlert(alert, slack.timestamp()));
    } catch (error) {
      return sendFailure(reply, error);
    }

    return {
      status: 'success',
      message: `✅ Drift alert for ${alert.resourceName} sent to Slack successfully!`,
      alert_data: body,
    };
  });
};
