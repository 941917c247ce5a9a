import fs from "node:fs/promises";
import path from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

const writeQueues = new Map<string, Promise<void>>();

export function errnoCode(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null || !("code" in e)) return undefined;
  return typeof e.code === "string" ? e.code : undefined;
}

export async function syncDirectory(dirPath: string): Promise<void> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(dirPath, "r");
    await handle.sync();
  } catch (e) {
    const code = errnoCode(e);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EPERM" && code !== "EISDIR") throw e;
  } finally {
    await handle?.close().catch(() => {});
  }
}

export function isPidAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM means the process exists but belongs to someone else.
    return errnoCode(e) !== "ESRCH";
  }
}

const LINUX_USER_HZ = 100;

/**
 * Start time of `pid` where the OS exposes it (Linux /proc); null elsewhere or
 * when the process is gone.
 */
export async function readProcessStartTime(pid: number): Promise<Date | null> {
  if (process.platform !== "linux" || !Number.isInteger(pid) || pid <= 0) return null;
  let stat: string;
  let system: string;
  try {
    [stat, system] = await Promise.all([
      fs.readFile(`/proc/${pid}/stat`, { encoding: "utf8" }),
      fs.readFile("/proc/stat", { encoding: "utf8" })
    ]);
  } catch (e) {
    if (errnoCode(e) === "ENOENT" || errnoCode(e) === "EACCES") return null;
    throw e;
  }
  // The command name may hold spaces and parens; fields resume after the last ")"
  // with field 3, so starttime (field 22) is index 19.
  const fields = stat.slice(stat.lastIndexOf(")") + 2).split(" ");
  const startTicks = Number(fields[19]);
  const btime = Number(/^btime (\d+)$/m.exec(system)?.[1]);
  if (!Number.isFinite(startTicks) || !Number.isFinite(btime)) return null;
  return new Date(btime * 1000 + (startTicks / LINUX_USER_HZ) * 1000);
}

async function withWriteQueue<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = writeQueues.get(key) ?? Promise.resolve();
  let resolveNext!: () => void;
  const next = new Promise<void>((resolve) => {
    resolveNext = resolve;
  });
  writeQueues.set(key, prev.then(() => next));
  await prev;
  try {
    return await fn();
  } finally {
    resolveNext();
    if (writeQueues.get(key) === next) writeQueues.delete(key);
  }
}

export async function writeFileAtomic(filePath: string, contents: string | Uint8Array): Promise<void> {
  const absolutePath = path.resolve(filePath);
  await withWriteQueue(`file:${absolutePath}`, async () => {
    const dir = path.dirname(absolutePath);
    await ensureDir(dir);
    const tmpPath = path.join(
      dir,
      `.${path.basename(absolutePath)}.tmp-${process.pid}-${Date.now()}-${Math.random()
        .toString(16)
        .slice(2)}`
    );
    let tmpHandle: fs.FileHandle | undefined;
    try {
      tmpHandle = await fs.open(tmpPath, "w");
      await tmpHandle.writeFile(contents);
      await tmpHandle.sync();
      await tmpHandle.close();
      tmpHandle = undefined;
      await fs.rename(tmpPath, absolutePath);
      await syncDirectory(dir);
    } finally {
      await tmpHandle?.close().catch(() => {});
      await fs.unlink(tmpPath).catch(() => {});
    }
  });
}

/** Appends and fsyncs before resolving, so a reader never sees an unflushed line as complete. */
export async function appendFileDurable(filePath: string, contents: string): Promise<void> {
  const absolutePath = path.resolve(filePath);
  await withWriteQueue(`file:${absolutePath}`, async () => {
    const fileHandle = await fs.open(absolutePath, "a");
    try {
      await fileHandle.writeFile(contents, { encoding: "utf8" });
      await fileHandle.sync();
    } finally {
      await fileHandle.close().catch(() => {});
    }
  });
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}
