import path from "node:path";
import { runDirTimestamp } from "../core/time.js";

export type RunPaths = {
  root: string;
  manifest: string;
  events: string;
  artifacts_dir: string;
  lock: string;
};

export const MANIFEST_FILENAME = "run.json";
export const EVENTS_FILENAME = "events.ndjson";
export const ARTIFACTS_DIRNAME = "artifacts";
export const LOCK_FILENAME = "run.lock";

export function runsRoot(workspaceDir: string): string {
  return path.join(workspaceDir, ".puk", "runs");
}

export function runPaths(runDir: string): RunPaths {
  return {
    root: runDir,
    manifest: path.join(runDir, MANIFEST_FILENAME),
    events: path.join(runDir, EVENTS_FILENAME),
    artifacts_dir: path.join(runDir, ARTIFACTS_DIRNAME),
    lock: path.join(runDir, LOCK_FILENAME)
  };
}

export function safeSlug(text: string | undefined, maxLen = 32): string {
  if (!text) return "";
  const cleaned = Array.from(text.toLowerCase(), (ch) => (/[\p{L}\p{N}_-]/u.test(ch) ? ch : "-")).join("");
  return cleaned
    .split("-")
    .filter(Boolean)
    .join("-")
    .slice(0, maxLen);
}

export function runDirName(at: Date, title?: string, suffix?: number): string {
  const slug = safeSlug(title);
  const base = slug ? `${runDirTimestamp(at)}-${slug}` : runDirTimestamp(at);
  return suffix ? `${base}-${suffix}` : base;
}
