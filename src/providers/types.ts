// Model Gateway interface
// The language-model call boundary: a turn list in, either text or tool requests out

import type { Turn } from '../services/sessions/types.js';
import type { CapabilityDescriptor, ToolInvocationRequest } from '../services/tools/types.js';

export type ModelReply =
  | { type: 'text'; text: string }
  | { type: 'tool_requests'; requests: ToolInvocationRequest[] };

export interface ConverseOptions {
  signal?: AbortSignal;
}

/**
 * Implementations throw ModelGatewayError on transport, auth or
 * malformed-response failures.
 */
export interface ModelGateway {
  name: string;
  converse(turns: readonly Turn[], capabilities: readonly CapabilityDescriptor[], options?: ConverseOptions): Promise<ModelReply>;
}
