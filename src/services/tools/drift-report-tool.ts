// Comprehensive Drift Report Tool
// Health, statistics and active drift in one overview. Sections fail independently.

import type { Capability } from './types.js';
import {
  formatActiveDrift,
  formatHealth,
  formatStatistics,
  type DriftGuardClient,
} from '../driftguard.js';
import { errorMessage, ToolInvocationError } from '../../utils/errors.js';

export const DRIFT_REPORT_TOOL = 'get_comprehensive_drift_report';

const RECOMMENDATIONS = [
  '💡 **Recommendations:**',
  '- Monitor active drift regularly',
  '- Investigate high-severity drifts immediately',
  '- Consider triggering manual analysis if needed',
  '- Review resolved drifts to prevent recurrence',
].join('\n');

function section(title: string, outcome: PromiseSettledResult<string>): string {
  if (outcome.status === 'fulfilled') {
    return outcome.value;
  }
  return `❌ **${title} unavailable:** ${errorMessage(outcome.reason)}`;
}

export function createDriftReportTool(client: DriftGuardClient): Capability {
  return {
    name: DRIFT_REPORT_TOOL,
    description:
      'Get a comprehensive drift report including health, statistics, and active drift details. This provides a complete overview of the DriftGuard system status.',
    parameters: [],
    execute: async (_args, signal) => {
      const [health, stats, active] = await Promise.allSettled([
        client.getHealth(signal).then(formatHealth),
        client.getStatistics(signal).then(formatStatistics),
        client.getActiveDrift(signal).then(formatActiveDrift),
      ]);

      if (health.status === 'rejected' && stats.status === 'rejected' && active.status === 'rejected') {
        throw new ToolInvocationError(
          DRIFT_REPORT_TOOL,
          `❌ Failed to build drift report. DriftGuard service may be unavailable. (${errorMessage(health.reason)})`,
          'ToolInvocationFailure',
          { cause: health.reason }
        );
      }

      return [
        '🎯 **COMPREHENSIVE DRIFTGUARD REPORT**',
        section('Health', health),
        section('Statistics', stats),
        section('Active drift', active),
        RECOMMENDATIONS,
      ].join('\n\n');
    },
  };
}
