import { InvalidStatusTransitionError } from "../core/errors.js";
import type { RunStatus } from "../schemas/run.js";

// Reopening (closed|failed -> open) only happens through an explicit append.
const ALLOWED_TRANSITIONS: Record<RunStatus, ReadonlySet<RunStatus>> = {
  open: new Set<RunStatus>(["closed", "failed"]),
  closed: new Set<RunStatus>(["open"]),
  failed: new Set<RunStatus>(["open"])
};

export function transitionRunStatus(current: RunStatus, next: RunStatus): RunStatus {
  if (ALLOWED_TRANSITIONS[current].has(next)) return next;
  throw new InvalidStatusTransitionError(current, next);
}
