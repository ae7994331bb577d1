// Slack Summary Tool

import type { Capability } from './types.js';
import type { SlackNotifier } from '../slack.js';
import { notifySlack } from './helpers.js';

export const SLACK_SUMMARY_TOOL = 'send_drift_summary_to_slack';

export function createSlackSummaryTool(notifier: SlackNotifier): Capability {
  return {
    name: SLACK_SUMMARY_TOOL,
    description: 'Send a comprehensive drift summary report to Slack.',
    parameters: [
      {
        name: 'summary_data',
        type: 'string',
        description: 'Formatted summary of drift statistics and status',
        required: true,
      },
    ],
    execute: async (args, signal) => {
      const message = [
        '📊 **DriftGuard Summary Report**',
        '',
        String(args.summary_data),
        '',
        `**Report Generated:** ${notifier.timestamp()}`,
      ].join('\n');
      await notifySlack(notifier, SLACK_SUMMARY_TOOL, message, signal);
      return '✅ DriftGuard summary report sent to Slack successfully!';
    },
  };
}
