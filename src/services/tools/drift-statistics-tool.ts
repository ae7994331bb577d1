// Drift Statistics Tool
// Totals, active/resolved counts and an alert level from the DriftGuard statistics endpoint

import type { Capability } from './types.js';
import { formatStatistics, type DriftGuardClient } from '../driftguard.js';
import { callDriftGuard } from './helpers.js';

export const DRIFT_STATISTICS_TOOL = 'get_drift_statistics';

export function createDriftStatisticsTool(client: DriftGuardClient): Capability {
  return {
    name: DRIFT_STATISTICS_TOOL,
    description:
      'Get comprehensive drift statistics from DriftGuard. Returns information about total records, active drift, resolved drift, and percentages.',
    parameters: [],
    execute: async (_args, signal) => {
      const stats = await callDriftGuard(DRIFT_STATISTICS_TOOL, 'fetch drift statistics', () =>
        client.getStatistics(signal)
      );
      return formatStatistics(stats);
    },
  };
}
