// Slack Report Tool
// Sends free-form report text to the configured Slack webhook

import type { Capability } from './types.js';
import type { SlackNotifier } from '../slack.js';
import { notifySlack } from './helpers.js';

export const SLACK_REPORT_TOOL = 'send_drift_report_to_slack';

export function createSlackReportTool(notifier: SlackNotifier): Capability {
  return {
    name: SLACK_REPORT_TOOL,
    description:
      'Send a DriftGuard analysis report to Slack. Requires SLACK_WEBHOOK_URL environment variable to be set.',
    parameters: [
      {
        name: 'message',
        type: 'string',
        description: 'The report text to post',
        required: true,
      },
    ],
    execute: async (args, signal) => {
      await notifySlack(notifier, SLACK_REPORT_TOOL, String(args.message), signal);
      return '✅ DriftGuard report successfully sent to Slack!';
    },
  };
}
