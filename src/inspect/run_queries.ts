import fs from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { type EventLogIssue, parseEventLine, readEventLog } from "../ledger/event_log.js";
import { runPaths } from "../ledger/layout.js";
import { readManifest } from "../ledger/run_ledger.js";
import { listRunDirs, readManifestLoose, resolveRunRef } from "../ledger/run_ref.js";
import type { RunEvent } from "../schemas/events.js";
import type { RunManifest } from "../schemas/run.js";
import { errnoCode } from "../store/fs.js";

export const DEFAULT_STALE_AFTER_SECONDS = 900;

export type ListedRun = {
  run_id: string;
  dir: string;
  created_at: string;
  updated_at: string;
  status: RunManifest["status"];
  mode: RunManifest["mode"];
  title: string;
  workspace: string;
  last_activity_at: string;
  // Still open, but nothing has been written for longer than the threshold.
  stale: boolean;
};

export type StalenessOptions = {
  stale_after_seconds?: number;
  now?: Date;
};

async function lastActivity(runDir: string, manifest: RunManifest): Promise<number> {
  const updated = Date.parse(manifest.updated_at);
  const stat = await fs.stat(runPaths(runDir).events).catch(() => null);
  return stat ? Math.max(updated, stat.mtimeMs) : updated;
}

function isStale(manifest: RunManifest, lastActivityMs: number, opts: StalenessOptions): boolean {
  if (manifest.status !== "open") return false;
  const now = (opts.now ?? new Date()).getTime();
  const threshold = (opts.stale_after_seconds ?? DEFAULT_STALE_AFTER_SECONDS) * 1000;
  return now - lastActivityMs > threshold;
}

async function describeRun(dir: string, manifest: RunManifest, opts: StalenessOptions): Promise<ListedRun> {
  const activity = await lastActivity(dir, manifest);
  return {
    run_id: manifest.run_id,
    dir,
    created_at: manifest.created_at,
    updated_at: manifest.updated_at,
    status: manifest.status,
    mode: manifest.mode,
    title: manifest.title,
    workspace: manifest.workspace,
    last_activity_at: new Date(activity).toISOString(),
    stale: isStale(manifest, activity, opts)
  };
}

/** Best-effort: directories without a readable manifest are skipped. Never locks. */
export async function listRuns(args: { workspace_dir: string } & StalenessOptions): Promise<ListedRun[]> {
  const runs: ListedRun[] = [];
  for (const dir of await listRunDirs(args.workspace_dir)) {
    const manifest = await readManifestLoose(dir);
    if (!manifest) continue;
    runs.push(await describeRun(dir, manifest, args));
  }
  runs.sort((a, b) => (a.updated_at < b.updated_at ? 1 : a.updated_at > b.updated_at ? -1 : 0));
  return runs;
}

export type RunDetails = {
  run: ListedRun;
  manifest: RunManifest;
  events: RunEvent[];
  total_events: number;
  issues: EventLogIssue[];
  torn_tail: boolean;
};

export async function showRun(
  args: { workspace_dir: string; run_ref: string; tail?: number } & StalenessOptions
): Promise<RunDetails> {
  const dir = await resolveRunRef(args.workspace_dir, args.run_ref);
  const manifest = await readManifest(dir);
  const scan = await readEventLog(runPaths(dir).events);
  const events = args.tail === undefined ? scan.events : scan.events.slice(Math.max(0, scan.events.length - args.tail));
  return {
    run: await describeRun(dir, manifest, args),
    manifest,
    events,
    total_events: scan.events.length,
    issues: scan.issues,
    torn_tail: scan.torn_tail
  };
}

export type TailOptions = {
  follow?: boolean;
  poll_interval_ms?: number;
  // Stop after this many events.
  limit?: number;
  signal?: AbortSignal;
};

async function readFrom(filePath: string, offset: number): Promise<Buffer> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(filePath, "r");
    const { size } = await handle.stat();
    if (size <= offset) return Buffer.alloc(0);
    const buf = Buffer.alloc(size - offset);
    const { bytesRead } = await handle.read(buf, 0, buf.length, offset);
    return buf.subarray(0, bytesRead);
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return Buffer.alloc(0);
    throw e;
  } finally {
    await handle?.close();
  }
}

async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (e) {
    if (signal?.aborted) return false;
    throw e;
  }
}

/**
 * Yields events from complete lines only, so a concurrent writer's partial
 * line is never observed. Malformed lines are skipped. With `follow`, keeps
 * polling until aborted or the limit is reached.
 */
export async function* tailEvents(runDir: string, opts: TailOptions = {}): AsyncGenerator<RunEvent> {
  const eventsPath = runPaths(runDir).events;
  const pollMs = opts.poll_interval_ms ?? 500;
  let offset = 0;
  let yielded = 0;

  if (opts.limit !== undefined && opts.limit <= 0) return;

  while (!opts.signal?.aborted) {
    const chunk = await readFrom(eventsPath, offset);
    const end = chunk.lastIndexOf(0x0a);
    if (end !== -1) {
      offset += end + 1;
      for (const line of chunk.subarray(0, end).toString("utf8").split("\n")) {
        if (!line.trim()) continue;
        const res = parseEventLine(line);
        if (!res.ok) continue;
        yield res.event;
        yielded += 1;
        if (opts.limit !== undefined && yielded >= opts.limit) return;
      }
    }
    if (!opts.follow) return;
    if (!(await pause(pollMs, opts.signal))) return;
  }
}
