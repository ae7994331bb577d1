// Orchestrator types

import type { ToolInvocationRequest, ToolInvocationResult } from '../tools/types.js';
import type { Turn } from '../sessions/types.js';

export type OrchestrationPhase = 'INTENT' | 'TOOLING' | 'COMMIT';

export interface RetentionPolicy {
  // Persist the user's turn alongside the reply
  userTurns: boolean;
  // Persist the intermediate tool-narration turn so later cycles see tool context
  toolNarration: boolean;
}

export interface OrchestratorOptions {
  systemPrompt?: string;
  // Used instead of systemPrompt when a cycle runs without tools
  basicSystemPrompt?: string;
  retention?: Partial<RetentionPolicy>;
}

export interface ConverseInput {
  sessionId: string;
  message: string;
  // false runs the cycle without offering any capability to the model
  tools?: boolean;
  signal?: AbortSignal;
}

export interface CycleResult {
  sessionId: string;
  cycleId: string;
  reply: string;
  toolRequests: ToolInvocationRequest[];
  toolResults: ToolInvocationResult[];
  committed: Turn[];
}
