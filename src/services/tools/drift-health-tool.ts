// Drift Health Tool

import type { Capability } from './types.js';
import { formatHealth, type DriftGuardClient } from '../driftguard.js';
import { ToolInvocationError } from '../../utils/errors.js';

export const DRIFT_HEALTH_TOOL = 'get_drift_health_check';

export function createDriftHealthTool(client: DriftGuardClient): Capability {
  return {
    name: DRIFT_HEALTH_TOOL,
    description: 'Check if DriftGuard service is healthy and responsive.',
    parameters: [],
    execute: async (_args, signal) => {
      try {
        return formatHealth(await client.getHealth(signal));
      } catch (error) {
        throw new ToolInvocationError(
          DRIFT_HEALTH_TOOL,
          `❌ DriftGuard Service is DOWN. The service is not responding at ${client.url}`,
          'ToolInvocationFailure',
          { cause: error }
        );
      }
    },
  };
}
