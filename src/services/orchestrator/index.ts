// Orchestrator Module - Main exports

export { ConversationOrchestrator, createOrchestrator, DEFAULT_RETENTION } from './orchestrator.js';
export type { OrchestratorDependencies } from './orchestrator.js';
export { ToolExecutor, renderToolResult, renderToolResults, validateArguments } from './executor.js';
export type { ToolExecutorOptions } from './executor.js';
export { BASIC_DRIFTGUARD_PROMPT, DRIFTGUARD_SYSTEM_PROMPT, TOOL_NARRATION_PREFIX } from './prompts.js';
export type {
  ConverseInput,
  CycleResult,
  OrchestrationPhase,
  OrchestratorOptions,
  RetentionPolicy,
} from './types.js';
