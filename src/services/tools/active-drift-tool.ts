// Active Drift Tool
// Lists resources whose live state currently diverges from Git

import type { Capability } from './types.js';
import { formatActiveDrift, type DriftGuardClient } from '../driftguard.js';
import { callDriftGuard } from './helpers.js';

export const ACTIVE_DRIFT_TOOL = 'get_active_drift_details';

export function createActiveDriftTool(client: DriftGuardClient): Capability {
  return {
    name: ACTIVE_DRIFT_TOOL,
    description:
      'Get detailed information about currently active configuration drift. Shows which resources have configuration drift and what changes were detected.',
    parameters: [],
    execute: async (_args, signal) => {
      const list = await callDriftGuard(ACTIVE_DRIFT_TOOL, 'fetch active drift records', () =>
        client.getActiveDrift(signal)
      );
      return formatActiveDrift(list);
    },
  };
}
