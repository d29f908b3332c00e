// src/session/state.ts

/**
 * Versioned session context threaded through classifier, dispatcher and
 * coordinator calls. Every applied patch produces a new state object.
 */

export type StatePatch = Readonly<Record<string, unknown>>;

export interface SessionState {
  readonly version: number;
  readonly values: Readonly<Record<string, unknown>>;
}

export function createSessionState(values: Record<string, unknown> = {}): SessionState {
  return { version: 0, values: { ...values } };
}

export function applyStatePatch(state: SessionState, patch: StatePatch): SessionState {
  if (Object.keys(patch).length === 0) return state;
  return {
    version: state.version + 1,
    values: { ...state.values, ...patch }
  };
}

/**
 * Merges patches in order; later patches overwrite identical keys.
 */
export function mergePatches(patches: readonly StatePatch[]): StatePatch {
  return patches.reduce<Record<string, unknown>>((merged, patch) => ({ ...merged, ...patch }), {});
}

export function readNumber(state: SessionState, key: string, fallback = 0): number {
  const value = state.values[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function readStringList(state: SessionState, key: string): string[] {
  const value = state.values[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
