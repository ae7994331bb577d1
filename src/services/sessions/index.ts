export { MemorySessionStore } from './memory-store.js';
export type { MemorySessionStoreOptions } from './memory-store.js';
export { KeyedLock } from './keyed-lock.js';
export { createTurn } from './types.js';
export type { Session, SessionStore, Turn, TurnRole } from './types.js';
