// src/session/index.ts

export {
  createSessionState,
  applyStatePatch,
  mergePatches,
  readNumber,
  readStringList
} from './state.js';
export type { SessionState, StatePatch } from './state.js';
export { SessionStore } from './store.js';
export type { SessionRecord, SessionCheckpoint } from './store.js';
