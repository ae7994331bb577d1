// Session and Turn types
// A session is the ordered turn history for one opaque session id

import type { ToolInvocationRequest } from '../tools/types.js';

export type TurnRole = 'system' | 'user' | 'assistant' | 'tool-result';

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  // Only on assistant turns that requested tools
  readonly toolRequests?: readonly ToolInvocationRequest[];
}

export interface Session {
  readonly id: string;
  readonly turns: readonly Turn[];
}

/**
 * Backing storage for session history.
 *
 * Implementations must make `append` atomic per session id: all turns of one
 * call land together, in order, or none do. `load` never fails on an unknown
 * id; it returns an empty session.
 */
export interface SessionStore {
  load(sessionId: string): Promise<Session>;
  append(sessionId: string, ...turns: Turn[]): Promise<Session>;
  replace(sessionId: string, turns: readonly Turn[]): Promise<Session>;
  reset(sessionId: string): Promise<void>;
  list(): Promise<string[]>;
}

export function createTurn(role: TurnRole, content: string, toolRequests?: readonly ToolInvocationRequest[]): Turn {
  const turn: Turn = toolRequests && toolRequests.length > 0
    ? { role, content, toolRequests: Object.freeze(toolRequests.map(r => ({ ...r }))) }
    : { role, content };
  return Object.freeze(turn);
}
