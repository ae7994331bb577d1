// Capability Initialization
// Builds the registry of DriftGuard and Slack tools at startup

import { env } from '../../env.js';
import { createLogger } from '../../logger.js';
import { DriftGuardClient } from '../driftguard.js';
import { SlackNotifier } from '../slack.js';
import { CapabilityRegistry } from './registry.js';
import { createDriftStatisticsTool } from './drift-statistics-tool.js';
import { createActiveDriftTool } from './active-drift-tool.js';
import { createDriftHealthTool } from './drift-health-tool.js';
import { createTriggerAnalysisTool } from './trigger-analysis-tool.js';
import { createDriftReportTool } from './drift-report-tool.js';
import { createSlackReportTool } from './slack-report-tool.js';
import { createSlackAlertTool } from './slack-alert-tool.js';
import { createSlackSummaryTool } from './slack-summary-tool.js';

export { CapabilityRegistry, toOpenAIFunction } from './registry.js';
export type { OpenAIFunctionDef } from './registry.js';
export type {
  Capability,
  CapabilityDescriptor,
  CapabilityParameter,
  JsonValue,
  ToolArguments,
  ToolInvocationRequest,
  ToolInvocationResult,
} from './types.js';

const log = createLogger({ module: 'tools' });

export interface CapabilityDependencies {
  driftGuard: DriftGuardClient;
  slack: SlackNotifier;
  enabled?: boolean;
}

export function createCapabilityRegistry(deps: CapabilityDependencies): CapabilityRegistry {
  const registry = new CapabilityRegistry();

  if (!(deps.enabled ?? env.TOOLS_ENABLED)) {
    log.info('Tools disabled, the assistant will answer without live DriftGuard data');
    return registry;
  }

  registry.register(createDriftStatisticsTool(deps.driftGuard));
  registry.register(createActiveDriftTool(deps.driftGuard));
  registry.register(createDriftHealthTool(deps.driftGuard));
  registry.register(createTriggerAnalysisTool(deps.driftGuard));
  registry.register(createDriftReportTool(deps.driftGuard));

  // Slack tools are always registered so the model can explain a missing webhook
  registry.register(createSlackReportTool(deps.slack));
  registry.register(createSlackAlertTool(deps.slack));
  registry.register(createSlackSummaryTool(deps.slack));

  if (!deps.slack.configured) {
    log.warn('SLACK_WEBHOOK_URL not set, Slack tools will report NotConfigured');
  }

  log.info({ tools: registry.describeAll().map(t => t.name) }, `Tool system initialized with ${registry.size} tool(s)`);
  return registry;
}

export function createDefaultCapabilityRegistry(): CapabilityRegistry {
  return createCapabilityRegistry({
    driftGuard: new DriftGuardClient(),
    slack: new SlackNotifier(),
  });
}
