import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import debug from "debug";
import { z } from "zod";
import { RunBusyError } from "../core/errors.js";
import { nowIso } from "../core/time.js";
import { errnoCode, isPidAlive, readProcessStartTime } from "../store/fs.js";
import { LOCK_FILENAME } from "./layout.js";

const log = debug("puk:lock");

// A lock file we cannot parse is normally a writer caught between create and
// write; only after this long is it treated as abandoned.
const UNREADABLE_LOCK_STALE_MS = 60 * 1000;

// Recorded and OS-reported start times of the same process differ by startup
// latency and clock granularity; anything further apart is a reused pid.
const START_TIME_TOLERANCE_MS = 5 * 1000;

export const LockInfo = z.object({
  pid: z.number().int().positive(),
  hostname: z.string(),
  process_started_at: z.string(),
  acquired_at: z.string()
});
export type LockInfo = z.infer<typeof LockInfo>;

export type RunLock = {
  path: string;
  info: LockInfo;
  release: () => Promise<void>;
};

function processStartedAt(): string {
  return new Date(Date.now() - process.uptime() * 1000).toISOString();
}

export async function readLockInfo(lockPath: string): Promise<LockInfo | null> {
  try {
    const raw = await fs.readFile(lockPath, { encoding: "utf8" });
    const parsed = LockInfo.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function sameHolder(a: LockInfo | null, b: LockInfo | null): boolean {
  return a !== null && b !== null && a.pid === b.pid && a.acquired_at === b.acquired_at;
}

// The OS view of our own start must agree with the one we record before it is
// trusted to judge someone else's.
async function startTimesComparable(): Promise<boolean> {
  const own = await readProcessStartTime(process.pid);
  if (own === null) return false;
  return Math.abs(own.getTime() - Date.parse(processStartedAt())) <= START_TIME_TOLERANCE_MS;
}

async function isStale(lockPath: string, info: LockInfo | null): Promise<boolean> {
  if (info) {
    // A pid on another machine (shared filesystem) cannot be checked.
    if (info.hostname !== os.hostname()) return false;
    if (!isPidAlive(info.pid)) return true;
    const recorded = Date.parse(info.process_started_at);
    if (!Number.isFinite(recorded) || !(await startTimesComparable())) return false;
    const started = await readProcessStartTime(info.pid);
    if (started === null) return false;
    const reused = Math.abs(started.getTime() - recorded) > START_TIME_TOLERANCE_MS;
    if (reused) log("pid %d now belongs to a process started at %s", info.pid, started.toISOString());
    return reused;
  }
  const stat = await fs.stat(lockPath).catch(() => null);
  if (!stat) return true;
  return Date.now() - stat.mtimeMs >= UNREADABLE_LOCK_STALE_MS;
}

/**
 * Moves a stale lock aside and confirms it is the one we judged stale; a
 * fresh lock slipped in by a concurrent reclaimer is put back untouched.
 */
async function reclaimStaleLock(lockPath: string, seen: LockInfo | null): Promise<boolean> {
  const aside = path.join(
    path.dirname(lockPath),
    `.${LOCK_FILENAME}.stale-${process.pid}-${Date.now()}`
  );
  try {
    await fs.rename(lockPath, aside);
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return true;
    throw e;
  }
  const moved = await readLockInfo(aside);
  if (seen !== null && !sameHolder(moved, seen)) {
    await fs.link(aside, lockPath).catch(() => {});
    await fs.unlink(aside).catch(() => {});
    return false;
  }
  await fs.unlink(aside).catch(() => {});
  log("reclaimed stale lock %s (holder pid %s)", lockPath, seen?.pid ?? "unknown");
  return true;
}

async function tryCreate(lockPath: string): Promise<LockInfo | null> {
  const info: LockInfo = {
    pid: process.pid,
    hostname: os.hostname(),
    process_started_at: processStartedAt(),
    acquired_at: nowIso()
  };
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(lockPath, "wx");
    await handle.writeFile(`${JSON.stringify(info)}\n`, { encoding: "utf8" });
    await handle.sync();
    return info;
  } catch (e) {
    if (errnoCode(e) === "EEXIST") return null;
    throw e;
  } finally {
    await handle?.close().catch(() => {});
  }
}

/** Non-blocking: a live holder means RunBusyError, never a wait. */
export async function acquireRunLock(runDir: string): Promise<RunLock> {
  const lockPath = path.join(runDir, LOCK_FILENAME);
  for (let attempt = 0; attempt < 2; attempt += 1) {
    const info = await tryCreate(lockPath);
    if (info) {
      log("acquired %s", lockPath);
      return {
        path: lockPath,
        info,
        release: async () => {
          const current = await readLockInfo(lockPath);
          if (!sameHolder(current, info)) {
            log("lock %s no longer ours; leaving it", lockPath);
            return;
          }
          await fs.unlink(lockPath).catch((e: unknown) => {
            if (errnoCode(e) !== "ENOENT") throw e;
          });
          log("released %s", lockPath);
        }
      };
    }
    const holder = await readLockInfo(lockPath);
    if (attempt === 0 && (await isStale(lockPath, holder)) && (await reclaimStaleLock(lockPath, holder))) {
      continue;
    }
    throw new RunBusyError(runDir, holder?.pid ?? null);
  }
  throw new RunBusyError(runDir, null);
}
