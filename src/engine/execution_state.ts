import type { ExecutionMode } from "../schemas/common.js";

export const ExecutionStates = ["initialized", "planning", "applying", "succeeded", "failed"] as const;

export type ExecutionState = (typeof ExecutionStates)[number];

const ALLOWED_TRANSITIONS: Record<ExecutionState, ReadonlySet<ExecutionState>> = {
  initialized: new Set<ExecutionState>(["planning", "applying", "failed"]),
  planning: new Set<ExecutionState>(["succeeded", "failed"]),
  applying: new Set<ExecutionState>(["succeeded", "failed"]),
  succeeded: new Set<ExecutionState>(),
  failed: new Set<ExecutionState>()
};

export function transitionExecutionState(current: ExecutionState, next: ExecutionState): ExecutionState {
  if (ALLOWED_TRANSITIONS[current].has(next)) return next;
  throw new Error(`Invalid execution state transition: ${current} -> ${next}`);
}

export function activeStateForMode(mode: ExecutionMode): ExecutionState {
  return mode === "plan" ? "planning" : "applying";
}
