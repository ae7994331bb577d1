// Shared failure mapping for the DriftGuard and Slack tools

import { errorMessage, ToolInvocationError } from '../../utils/errors.js';
import { SlackNotConfiguredError, type SlackNotifier } from '../slack.js';

export async function callDriftGuard<T>(toolName: string, action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new ToolInvocationError(
      toolName,
      `❌ Failed to ${action}. DriftGuard service may be unavailable. (${errorMessage(error)})`,
      'ToolInvocationFailure',
      { cause: error }
    );
  }
}

export async function notifySlack(
  notifier: SlackNotifier,
  toolName: string,
  message: string,
  signal?: AbortSignal
): Promise<void> {
  try {
    await notifier.send(message, signal);
  } catch (error) {
    if (error instanceof SlackNotConfiguredError) {
      throw ToolInvocationError.notConfigured(toolName, `❌ ${error.message}`);
    }
    throw new ToolInvocationError(toolName, `❌ ${errorMessage(error)}`, 'ToolInvocationFailure', { cause: error });
  }
}
