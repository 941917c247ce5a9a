import debug from "debug";
import { InterruptedError, ValidationError, errorMessage } from "../core/errors.js";
import { llmSnapshot } from "../config/settings.js";
import {
  appendEvent,
  closeRun,
  isReleased,
  markFailedBestEffort,
  openForAppend,
  releaseRun,
  startRunWithRetry,
  type RunHandle
} from "../ledger/run_ledger.js";
import { canonicalRoot } from "../sandbox/paths.js";
import type { RunMode } from "../schemas/run.js";
import type { LlmSettings } from "../schemas/settings.js";

const log = debug("puk:engine");

export type OpenSessionArgs = {
  // Canonical workspace root.
  root: string;
  mode: RunMode;
  llm: LlmSettings;
  argv: string[];
  title?: string;
  append_to_run?: string;
};

export async function resolveWorkspaceRoot(workspaceDir: string): Promise<string> {
  const root = await canonicalRoot(workspaceDir);
  if (!root) {
    throw new ValidationError("invalid_settings", `Workspace directory does not exist: ${workspaceDir}`);
  }
  return root;
}

export type OpenedSession = {
  handle: RunHandle;
  // seq and timestamp of the session.start event this invocation wrote.
  session_seq: number;
  started_at: string;
};

/** Starts a new run, or reopens `append_to_run`, and records session.start. */
export async function openSession(args: OpenSessionArgs): Promise<OpenedSession> {
  const handle = args.append_to_run
    ? await openForAppend({ workspace_dir: args.root, run_ref: args.append_to_run })
    : await startRunWithRetry({
        workspace_dir: args.root,
        mode: args.mode,
        llm: llmSnapshot(args.llm),
        title: args.title
      });
  try {
    const start = await appendEvent(handle, {
      type: "session.start",
      data: {
        mode: args.mode,
        argv: args.argv,
        workspace: args.root,
        append: handle.appended,
        prior_status: handle.prior_status
      }
    });
    return { handle, session_seq: start.seq, started_at: start.timestamp };
  } catch (e) {
    await abortSession(handle, e);
    throw e;
  }
}

export async function endSession(
  handle: RunHandle,
  status: "closed" | "failed",
  reason: string,
  error?: string
): Promise<void> {
  try {
    await appendEvent(handle, { type: "session.end", data: { status, reason, error } });
    await closeRun(handle, { status, reason });
  } catch (e) {
    await abortSession(handle, e);
    throw e;
  }
}

/**
 * Best effort after an interrupt or a ledger failure: one attempt to record
 * the end and the failed status, then the lock is released regardless.
 */
export async function abortSession(handle: RunHandle, error: unknown): Promise<void> {
  if (isReleased(handle)) return;
  const reason = error instanceof InterruptedError ? "interrupted" : errorMessage(error);
  try {
    await appendEvent(handle, {
      type: "session.end",
      data: { status: "failed", reason, error: errorMessage(error) }
    });
  } catch (e) {
    log("could not record session end for %s: %s", handle.run_id, errorMessage(e));
  }
  const landed = await markFailedBestEffort(handle, reason);
  if (!landed) log("run %s left open; the inspector will report it stale", handle.run_id);
  await releaseRun(handle);
}
