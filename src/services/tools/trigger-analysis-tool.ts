// Trigger Analysis Tool
// Asks DriftGuard to compare cluster state against Git right now

import type { Capability } from './types.js';
import { formatAnalysisTrigger, type DriftGuardClient } from '../driftguard.js';
import { callDriftGuard } from './helpers.js';

export const TRIGGER_ANALYSIS_TOOL = 'trigger_drift_analysis';

export function createTriggerAnalysisTool(client: DriftGuardClient): Capability {
  return {
    name: TRIGGER_ANALYSIS_TOOL,
    description:
      'Trigger a manual drift analysis to detect configuration changes. This will compare current Kubernetes state with Git repository state.',
    parameters: [],
    execute: async (_args, signal) => {
      const result = await callDriftGuard(TRIGGER_ANALYSIS_TOOL, 'trigger drift analysis', () =>
        client.triggerAnalysis(signal)
      );
      return formatAnalysisTrigger(result);
    },
  };
}
