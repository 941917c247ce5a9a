import fs from "node:fs/promises";
import path from "node:path";
import debug from "debug";
import { newId } from "../core/ids.js";
import { laterIso, nowIso } from "../core/time.js";
import {
  LedgerCorruptError,
  LedgerIoError,
  PukError,
  RunCreateError,
  ValidationError,
  errorMessage
} from "../core/errors.js";
import { canonicalRoot, canonicalize } from "../sandbox/paths.js";
import { RunEvent, type RunEventInput } from "../schemas/events.js";
import { RunManifest, type RunLlmSnapshot, type RunMode, type RunStatus } from "../schemas/run.js";
import { appendFileDurable, ensureDir, errnoCode, writeFileAtomic } from "../store/fs.js";
import { readJsonFile, writeJsonFile } from "../store/json.js";
import { readEventLog } from "./event_log.js";
import { ARTIFACTS_DIRNAME, runDirName, runPaths, runsRoot, type RunPaths } from "./layout.js";
import { acquireRunLock, type RunLock } from "./run_lock.js";
import { resolveRunRef } from "./run_ref.js";
import { transitionRunStatus } from "./run_status.js";

const log = debug("puk:ledger");

type HandleState = {
  next_seq: number;
  next_turn: number;
  manifest: RunManifest;
  lock: RunLock;
  chain: Promise<void>;
  released: boolean;
  // After a failed append the tail of the log is unknown; no further appends.
  poisoned: boolean;
};

export type RunHandle = {
  readonly run_id: string;
  readonly run_dir: string;
  readonly paths: RunPaths;
  readonly appended: boolean;
  readonly prior_status: RunStatus | null;
  readonly state: HandleState;
};

export type StartRunArgs = {
  workspace_dir: string;
  mode: RunMode;
  llm: RunLlmSnapshot;
  title?: string;
  suffix?: number;
  now?: Date;
};

export type OpenForAppendArgs = {
  workspace_dir: string;
  run_ref: string;
};

function ioError(action: string, target: string, e: unknown): LedgerIoError {
  return new LedgerIoError(`Failed to ${action} ${target}: ${errorMessage(e)}`, { cause: e });
}

async function writeManifest(paths: RunPaths, manifest: RunManifest): Promise<void> {
  try {
    await writeJsonFile(paths.manifest, RunManifest.parse(manifest));
  } catch (e) {
    if (e instanceof PukError) throw e;
    throw ioError("write manifest", paths.manifest, e);
  }
}

export async function readManifest(runDir: string): Promise<RunManifest> {
  const p = runPaths(runDir).manifest;
  let raw: unknown;
  try {
    raw = await readJsonFile(p);
  } catch (e) {
    throw new LedgerCorruptError(`Run manifest at ${p} is missing or invalid JSON: ${errorMessage(e)}`);
  }
  const parsed = RunManifest.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerCorruptError(`Run manifest at ${p} does not match the manifest schema`);
  }
  return parsed.data;
}

/**
 * Creates a fresh run directory with status=open and an empty event log, and
 * takes its lock. A name collision is reported, not resolved: see
 * startRunWithRetry.
 */
export async function startRun(args: StartRunArgs): Promise<RunHandle> {
  const workspace = (await canonicalRoot(args.workspace_dir)) ?? path.resolve(args.workspace_dir);
  const root = runsRoot(workspace);
  const at = args.now ?? new Date();
  const runDir = path.join(root, runDirName(at, args.title, args.suffix));
  const paths = runPaths(runDir);

  try {
    await ensureDir(root);
    await fs.mkdir(runDir);
  } catch (e) {
    if (errnoCode(e) === "EEXIST") throw new RunCreateError(runDir, { cause: e });
    throw ioError("create run directory", runDir, e);
  }

  const lock = await acquireRunLock(runDir);
  try {
    await ensureDir(paths.artifacts_dir);
    const createdAt = nowIso();
    const manifest: RunManifest = {
      run_id: newId("run"),
      created_at: createdAt,
      updated_at: createdAt,
      status: "open",
      title: args.title ?? "",
      mode: args.mode,
      workspace,
      llm: args.llm
    };
    await writeManifest(paths, manifest);
    await writeFileAtomic(paths.events, "").catch((e: unknown) => {
      throw ioError("create event log", paths.events, e);
    });
    log("started run %s at %s", manifest.run_id, runDir);
    return {
      run_id: manifest.run_id,
      run_dir: runDir,
      paths,
      appended: false,
      prior_status: null,
      state: { next_seq: 0, next_turn: 0, manifest, lock, chain: Promise.resolve(), released: false, poisoned: false }
    };
  } catch (e) {
    await lock.release().catch(() => {});
    throw e;
  }
}

export async function startRunWithRetry(
  args: Omit<StartRunArgs, "suffix">,
  maxAttempts = 20
): Promise<RunHandle> {
  const now = args.now ?? new Date();
  for (let suffix = 0; suffix < maxAttempts; suffix += 1) {
    try {
      return await startRun({ ...args, now, suffix: suffix === 0 ? undefined : suffix });
    } catch (e) {
      if (!(e instanceof RunCreateError)) throw e;
      log("run directory collision, retrying with suffix %d", suffix + 1);
    }
  }
  throw new RunCreateError(path.join(runsRoot(args.workspace_dir), runDirName(now, args.title)));
}

async function scanForAppend(paths: RunPaths): Promise<{ next_seq: number; next_turn: number }> {
  const scan = await readEventLog(paths.events);
  if (scan.issues.length > 0) {
    const first = scan.issues[0];
    throw new LedgerCorruptError(
      `Existing event log ${paths.events} is corrupted at line ${first.line_no} (${first.error}); cannot append`
    );
  }
  scan.events.forEach((ev, idx) => {
    if (ev.seq !== idx) {
      throw new LedgerCorruptError(
        `Existing event log ${paths.events} has a sequence gap (expected ${idx}, found ${ev.seq}); cannot append`
      );
    }
  });
  if (scan.torn_tail) {
    // The fragment never became an event; appending after it would fuse two lines.
    await fs.truncate(paths.events, scan.complete_bytes).catch((e: unknown) => {
      throw ioError("repair torn tail of", paths.events, e);
    });
    log("truncated torn trailing line of %s", paths.events);
  }
  const lastTurn = scan.events.reduce((max, ev) => Math.max(max, ev.turn_id ?? -1), -1);
  return { next_seq: scan.events.length, next_turn: lastTurn + 1 };
}

/**
 * Reopens an existing run for another invocation. Never creates a run: an
 * unknown ref is RunNotFoundError, a live lock holder is RunBusyError.
 */
export async function openForAppend(args: OpenForAppendArgs): Promise<RunHandle> {
  const runDir = await resolveRunRef(args.workspace_dir, args.run_ref);
  const paths = runPaths(runDir);
  const lock = await acquireRunLock(runDir);
  try {
    const manifest = await readManifest(runDir);
    const { next_seq, next_turn } = await scanForAppend(paths);
    const handle: RunHandle = {
      run_id: manifest.run_id,
      run_dir: runDir,
      paths,
      appended: true,
      prior_status: manifest.status,
      state: { next_seq, next_turn, manifest, lock, chain: Promise.resolve(), released: false, poisoned: false }
    };
    if (manifest.status === "open") {
      // Previous writer died without closing (its lock was reclaimed).
      await setStatus(handle, "failed", "previous writer exited without closing the run");
    }
    await setStatus(handle, "open", "append");
    await ensureDir(paths.artifacts_dir);
    log("reopened run %s (prior status %s, next seq %d)", handle.run_id, manifest.status, next_seq);
    return handle;
  } catch (e) {
    await lock.release().catch(() => {});
    throw e;
  }
}

function assertWritable(handle: RunHandle): void {
  if (handle.state.released) {
    throw new PukError(`Run handle for ${handle.run_id} is already closed`);
  }
  if (handle.state.poisoned) {
    throw new LedgerIoError(`Run ${handle.run_id} had a failed append; no further events can be written`);
  }
}

/**
 * The sole write path for events. Appends are serialized per handle; the
 * sequence number is assigned only once the line is durably on disk.
 */
export function appendEvent(handle: RunHandle, input: RunEventInput): Promise<RunEvent> {
  const run = async (): Promise<RunEvent> => {
    assertWritable(handle);
    const event = RunEvent.parse({
      seq: handle.state.next_seq,
      timestamp: nowIso(),
      type: input.type,
      run_id: handle.run_id,
      turn_id: input.turn_id ?? null,
      data: input.data
    });
    try {
      await appendFileDurable(handle.paths.events, `${JSON.stringify(event)}\n`);
    } catch (e) {
      handle.state.poisoned = true;
      throw ioError("append event to", handle.paths.events, e);
    }
    handle.state.next_seq += 1;
    return event;
  };
  const result = handle.state.chain.then(run);
  handle.state.chain = result.then(
    () => undefined,
    () => undefined
  );
  return result;
}

/**
 * Stores bytes under the run's artifact area and returns the run-relative
 * path to reference from an artifact.write event.
 */
export async function writeArtifact(
  handle: RunHandle,
  relativePath: string,
  bytes: string | Uint8Array
): Promise<string> {
  assertWritable(handle);
  if (path.isAbsolute(relativePath)) {
    throw new ValidationError("path_escape", `Artifact path must be relative: ${relativePath}`);
  }
  const res = await canonicalize(relativePath, handle.paths.artifacts_dir);
  if (!res.ok || res.relative === ".") {
    throw new ValidationError(
      "path_escape",
      `Artifact path escapes the run artifact directory: ${relativePath} (${res.ok ? "is the directory itself" : res.reason})`
    );
  }
  try {
    await writeFileAtomic(res.absolute, bytes);
  } catch (e) {
    throw ioError("write artifact", res.absolute, e);
  }
  return `${ARTIFACTS_DIRNAME}/${res.relative}`;
}

/**
 * Records a status.change event, then updates the manifest snapshot.
 * Invalid transitions (e.g. closed -> closed) throw before anything is written.
 */
export async function setStatus(handle: RunHandle, status: RunStatus, reason = ""): Promise<void> {
  const current = handle.state.manifest.status;
  transitionRunStatus(current, status);
  await appendEvent(handle, {
    type: "status.change",
    data: { from: current, to: status, reason }
  });
  const manifest: RunManifest = {
    ...handle.state.manifest,
    status,
    updated_at: laterIso(handle.state.manifest.updated_at, nowIso())
  };
  await writeManifest(handle.paths, manifest);
  handle.state.manifest = manifest;
}

/**
 * Last resort once the event log can no longer be trusted: only the manifest
 * is rewritten, because another append could leave a gap or fuse a line.
 * Returns whether the write landed.
 */
export async function markFailedBestEffort(handle: RunHandle, reason: string): Promise<boolean> {
  if (handle.state.manifest.status !== "open") return false;
  if (!handle.state.poisoned) {
    try {
      await setStatus(handle, "failed", reason);
      return true;
    } catch (e) {
      log("status write failed for %s: %s", handle.run_id, errorMessage(e));
    }
  }
  const manifest: RunManifest = {
    ...handle.state.manifest,
    status: "failed",
    updated_at: laterIso(handle.state.manifest.updated_at, nowIso())
  };
  try {
    await writeManifest(handle.paths, manifest);
    handle.state.manifest = manifest;
    return true;
  } catch (e) {
    log("manifest-only failure write for %s did not land: %s", handle.run_id, errorMessage(e));
    return false;
  }
}

/** Turn ids continue across appended invocations of the same run. */
export function nextTurnId(handle: RunHandle): number {
  const id = handle.state.next_turn;
  handle.state.next_turn += 1;
  return id;
}

export function isReleased(handle: RunHandle): boolean {
  return handle.state.released;
}

/** Waits for pending appends and gives up the lock without touching status. */
export async function releaseRun(handle: RunHandle): Promise<void> {
  if (handle.state.released) return;
  handle.state.released = true;
  await handle.state.chain;
  await handle.state.lock.release();
  log("released run %s (%s)", handle.run_id, handle.state.manifest.status);
}

/**
 * Moves a still-open run to a terminal status (closed unless told otherwise)
 * and releases the lock. Idempotent.
 */
export async function closeRun(
  handle: RunHandle,
  opts: { status?: "closed" | "failed"; reason?: string } = {}
): Promise<void> {
  if (handle.state.released) return;
  try {
    await handle.state.chain;
    if (handle.state.manifest.status === "open" && !handle.state.poisoned) {
      await setStatus(handle, opts.status ?? "closed", opts.reason ?? "");
    }
  } finally {
    await releaseRun(handle);
  }
}
