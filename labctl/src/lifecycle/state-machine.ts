import type { LifecycleState } from "../types/branch.js";
import type { RunState } from "../types/run.js";
import { InvalidTransitionError, type ErrorContext } from "../core/errors.js";

/**
 * Allowed lifecycle transitions. Anything not listed fails loudly with
 * InvalidTransitionError; states are never coerced.
 */
export const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  proposed: ["implementing"],
  implementing: ["launched"],
  launched: ["running", "cancelled"],
  running: ["finished", "failed", "crashed", "cancelled"],
  finished: ["evaluated"],
  failed: ["implementing", "loser"],
  crashed: ["implementing", "loser"],
  cancelled: ["loser"],
  evaluated: ["winner-pending-review", "loser"],
  "winner-pending-review": ["merged", "loser", "implementing"],
  loser: ["closed"],
  merged: ["archived"],
  closed: ["archived"],
  archived: [],
};

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: LifecycleState, to: LifecycleState, context?: ErrorContext): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to, context);
}

/**
 * States that count as done for the batch gate. failed/crashed are excluded:
 * those branches sit on the fix path until retried or abandoned.
 */
export const BATCH_READY_STATES: ReadonlySet<LifecycleState> = new Set([
  "finished",
  "cancelled",
  "evaluated",
  "winner-pending-review",
  "loser",
  "merged",
  "closed",
  "archived",
]);

export function isBatchReady(state: LifecycleState): boolean {
  return BATCH_READY_STATES.has(state);
}

/** Branches whose run is still being polled. */
export function isRunActive(state: LifecycleState): boolean {
  return state === "launched" || state === "running";
}

/** Lifecycle state a branch lands in when its run is observed in `runState`. */
export function stateForRun(runState: RunState): LifecycleState {
  switch (runState) {
    case "queued":
      return "launched";
    case "running":
    case "finished":
    case "failed":
    case "crashed":
    case "cancelled":
      return runState;
  }
}
