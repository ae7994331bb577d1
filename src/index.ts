// DriftGuard Assistant
// Conversational front end for the DriftGuard drift detection service

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { logger } from './logger.js';
import { buildServer } from './app.js';
import { DriftGuardClient } from './services/driftguard.js';
import { SlackNotifier } from './services/slack.js';
import { createCapabilityRegistry } from './services/tools/index.js';
import { MemorySessionStore } from './services/sessions/index.js';
import { ConversationOrchestrator, ToolExecutor } from './services/orchestrator/index.js';
import { getModelGateway } from './providers/index.js';

const driftGuard = new DriftGuardClient();
const slack = new SlackNotifier();
const registry = createCapabilityRegistry({ driftGuard, slack });
const store = new MemorySessionStore({ ttlMs: env.SESSION_TTL_MS });

const orchestrator = new ConversationOrchestrator(
  {
    gateway: getModelGateway(),
    registry,
    store,
    executor: new ToolExecutor(registry, { timeoutMs: env.TOOL_TIMEOUT_MS }),
  },
  {
    retention: {
      userTurns: env.PERSIST_USER_TURNS,
      toolNarration: env.PERSIST_TOOL_NARRATION,
    },
  }
);

const server = await buildServer({ orchestrator, registry, driftGuard, slack });

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  try {
    await server.close();
    store.destroy();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  logger.info(`🔒 DriftGuard Assistant listening on http://${env.HOST}:${env.PORT}`);
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
