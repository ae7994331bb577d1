// Conversation Orchestrator
// One cycle per user message: INTENT (ask the model) -> TOOLING (run requested tools,
// ask again) -> COMMIT (persist). Cycles for the same session never interleave.

import { randomUUID } from 'crypto';
import type { ModelGateway, ModelReply } from '../../providers/types.js';
import type { CapabilityRegistry } from '../tools/registry.js';
import type { ToolInvocationRequest, ToolInvocationResult } from '../tools/types.js';
import { KeyedLock } from '../sessions/keyed-lock.js';
import { createTurn, type Session, type SessionStore, type Turn } from '../sessions/types.js';
import { ToolExecutor, renderToolResults } from './executor.js';
import { BASIC_DRIFTGUARD_PROMPT, DRIFTGUARD_SYSTEM_PROMPT, TOOL_NARRATION_PREFIX } from './prompts.js';
import {
  errorMessage,
  ModelGatewayError,
  OrchestrationCancelledError,
  OrchestrationError,
  SessionStoreError,
} from '../../utils/errors.js';
import { createLogger, type Logger } from '../../logger.js';
import type {
  ConverseInput,
  CycleResult,
  OrchestrationPhase,
  OrchestratorOptions,
  RetentionPolicy,
} from './types.js';

export interface OrchestratorDependencies {
  gateway: ModelGateway;
  registry: CapabilityRegistry;
  store: SessionStore;
  executor?: ToolExecutor;
  logger?: Logger;
}

export const DEFAULT_RETENTION: RetentionPolicy = {
  userTurns: false,
  toolNarration: false,
};

interface CycleState {
  cycleId: string;
  sessionId: string;
  phase: OrchestrationPhase;
  signal?: AbortSignal;
  log: Logger;
}

export class ConversationOrchestrator {
  private gateway: ModelGateway;
  private registry: CapabilityRegistry;
  private store: SessionStore;
  private executor: ToolExecutor;
  private lock = new KeyedLock();
  private systemPrompt: string;
  private basicSystemPrompt: string;
  private retention: RetentionPolicy;
  private log: Logger;

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions = {}) {
    this.gateway = deps.gateway;
    this.registry = deps.registry;
    this.store = deps.store;
    this.log = deps.logger ?? createLogger({ module: 'orchestrator' });
    this.executor = deps.executor ?? new ToolExecutor(deps.registry, { logger: this.log });
    this.systemPrompt = options.systemPrompt ?? DRIFTGUARD_SYSTEM_PROMPT;
    this.basicSystemPrompt = options.basicSystemPrompt ?? BASIC_DRIFTGUARD_PROMPT;
    this.retention = { ...DEFAULT_RETENTION, ...options.retention };
  }

  /**
   * Runs one orchestration cycle and returns the final reply.
   *
   * Throws OrchestrationError when the model gateway fails, the store fails or
   * the caller aborts before commit; the session is then left untouched.
   */
  async converse(input: ConverseInput): Promise<CycleResult> {
    return this.lock.run(input.sessionId, () => this.runCycle(input));
  }

  async history(sessionId: string): Promise<Session> {
    return this.store.load(sessionId);
  }

  async reset(sessionId: string): Promise<void> {
    await this.lock.run(sessionId, () => this.store.reset(sessionId));
  }

  private async runCycle(input: ConverseInput): Promise<CycleResult> {
    const cycleId = randomUUID();
    const state: CycleState = {
      cycleId,
      sessionId: input.sessionId,
      phase: 'INTENT',
      signal: input.signal,
      log: this.log.child({ sessionId: input.sessionId, cycleId }),
    };

    try {
      this.throwIfCancelled(state);
      const session = await this.storeCall(input.sessionId, 'load', () => this.store.load(input.sessionId));
      const useTools = input.tools ?? true;
      const userTurn = createTurn('user', input.message);
      const preamble = createTurn('system', useTools ? this.systemPrompt : this.basicSystemPrompt);
      const working: Turn[] = [preamble, ...session.turns, userTurn];

      // INTENT
      state.log.debug({ phase: state.phase, historyTurns: session.turns.length, useTools }, 'Calling model');
      const capabilities = useTools ? this.registry.describeAll() : [];
      const first = await this.gateway.converse(working, capabilities, { signal: input.signal });
      this.throwIfCancelled(state);

      let reply: string;
      let narration: Turn | null = null;
      let toolRequests: ToolInvocationRequest[] = [];
      let toolResults: ToolInvocationResult[] = [];

      if (first.type === 'tool_requests') {
        if (first.requests.length === 0) {
          throw new ModelGatewayError('Model returned an empty tool request list');
        }
        if (!useTools) {
          throw new ModelGatewayError('Model requested tools in a cycle that offered none');
        }

        // TOOLING
        state.phase = 'TOOLING';
        toolRequests = first.requests;
        state.log.debug({ phase: state.phase, tools: toolRequests.map(r => r.name) }, 'Executing tool requests');

        toolResults = await this.executor.execute(toolRequests, input.signal);
        this.throwIfCancelled(state);

        narration = createTurn('assistant', `${TOOL_NARRATION_PREFIX}\n\n${renderToolResults(toolResults)}`, toolRequests);

        // No capabilities on the follow-up call: the model must answer now
        const second = await this.gateway.converse([...working, narration], [], { signal: input.signal });
        this.throwIfCancelled(state);
        reply = this.finalText(second);
      } else {
        reply = first.text;
      }

      // COMMIT
      state.phase = 'COMMIT';
      this.throwIfCancelled(state);

      const committed: Turn[] = [];
      if (this.retention.userTurns) committed.push(userTurn);
      if (narration && this.retention.toolNarration) committed.push(narration);
      committed.push(createTurn('assistant', reply));

      const updated = await this.storeCall(input.sessionId, 'append', () =>
        this.store.append(input.sessionId, ...committed)
      );
      state.log.info(
        { committedTurns: committed.length, totalTurns: updated.turns.length, toolCalls: toolRequests.length },
        'Cycle committed'
      );

      return {
        sessionId: input.sessionId,
        cycleId,
        reply,
        toolRequests,
        toolResults,
        committed,
      };
    } catch (error) {
      throw this.wrapFailure(state, error);
    }
  }

  private async storeCall<T>(sessionId: string, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof SessionStoreError) throw error;
      throw new SessionStoreError(sessionId, `Session store ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private finalText(reply: ModelReply): string {
    if (reply.type !== 'text') {
      throw new ModelGatewayError('Model requested tools again instead of answering with the tool results');
    }
    return reply.text;
  }

  private throwIfCancelled(state: CycleState): void {
    if (state.signal?.aborted) {
      throw new OrchestrationCancelledError(state.sessionId);
    }
  }

  private wrapFailure(state: CycleState, error: unknown): OrchestrationError {
    // An abort surfacing as a gateway/transport error is still a cancellation
    const cause = state.signal?.aborted && !(error instanceof OrchestrationCancelledError)
      ? new OrchestrationCancelledError(state.sessionId)
      : error;

    if (cause instanceof OrchestrationCancelledError) {
      state.log.info({ phase: state.phase }, 'Cycle cancelled before commit');
    } else {
      state.log.error({ phase: state.phase, err: cause }, 'Cycle failed, session left unchanged');
    }

    return new OrchestrationError(state.sessionId, state.cycleId, state.phase, cause);
  }
}

export function createOrchestrator(deps: OrchestratorDependencies, options?: OrchestratorOptions): ConversationOrchestrator {
  return new ConversationOrchestrator(deps, options);
}
