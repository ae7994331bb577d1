// Slack Alert Tool
// Structured alert for a single drifted resource

import type { Capability } from './types.js';
import type { SlackNotifier } from '../slack.js';
import { notifySlack } from './helpers.js';

export const SLACK_ALERT_TOOL = 'send_drift_alert_to_slack';

export interface DriftAlert {
  alertType: string;
  resourceName: string;
  namespace: string;
  details: string;
}

export function formatDriftAlert(alert: DriftAlert, timestamp: string): string {
  return [
    `🚨 **DriftGuard Alert: ${alert.alertType}**`,
    '',
    `**Resource:** ${alert.resourceName}`,
    `**Namespace:** ${alert.namespace}`,
    `**Timestamp:** ${timestamp}`,
    '',
    '**Details:**',
    alert.details,
    '',
    '**Action Required:** Please investigate and resolve this configuration drift.',
  ].join('\n');
}

export function createSlackAlertTool(notifier: SlackNotifier): Capability {
  return {
    name: SLACK_ALERT_TOOL,
    description: 'Send a specific drift alert to Slack with structured information.',
    parameters: [
      {
        name: 'alert_type',
        type: 'string',
        description: 'Type of drift detected (e.g., "Configuration Drift", "Resource Change")',
        required: true,
      },
      {
        name: 'resource_name',
        type: 'string',
        description: 'Name of the affected resource',
        required: true,
      },
      {
        name: 'namespace',
        type: 'string',
        description: 'Kubernetes namespace',
        required: true,
      },
      {
        name: 'details',
        type: 'string',
        description: 'Detailed information about the drift',
        required: true,
      },
    ],
    execute: async (args, signal) => {
      const alert: DriftAlert = {
        alertType: String(args.alert_type),
        resourceName: String(args.resource_name),
        namespace: String(args.namespace),
        details: String(args.details),
      };
      await notifySlack(notifier, SLACK_ALERT_TOOL, formatDriftAlert(alert, notifier.timestamp()), signal);
      return `✅ Drift alert for ${alert.resourceName} sent to Slack successfully!`;
    },
  };
}
