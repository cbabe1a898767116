import type { ModelLoadState } from "./types.js";

/**
 * Valid load-state transitions for a model handle.
 *
 * - UNLOADED → LOADING (first request or preload)
 * - LOADING → LOADED | FAILED (retries exhausted)
 * - FAILED → LOADING (next request starts a fresh load)
 * - LOADED is terminal for the process lifetime; there is no eviction.
 */
export const VALID_TRANSITIONS: Readonly<
  Record<ModelLoadState, ReadonlyArray<ModelLoadState>>
> = {
  UNLOADED: ["LOADING"],
  LOADING: ["LOADED", "FAILED"],
  LOADED: [],
  FAILED: ["LOADING"],
};

/**
 * Returns true if transitioning from `from` to `to` is a valid state change.
 */
export function canTransition(from: ModelLoadState, to: ModelLoadState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Returns true when a get-or-load call must start a new load attempt.
 */
export function needsLoad(state: ModelLoadState): boolean {
  return canTransition(state, "LOADING");
}
