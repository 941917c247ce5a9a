import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { RunNotFoundError } from "../core/errors.js";
import { isWithinRoot } from "../sandbox/paths.js";
import { RunManifest } from "../schemas/run.js";
import { errnoCode, pathExists } from "../store/fs.js";
import { readJsonFile } from "../store/json.js";
import { MANIFEST_FILENAME, runsRoot } from "./layout.js";

export async function listRunDirs(workspaceDir: string): Promise<string[]> {
  const root = runsRoot(workspaceDir);
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return [];
    throw e;
  }
  return entries.filter((e) => e.isDirectory()).map((e) => path.join(root, e.name));
}

export async function readManifestLoose(runDir: string): Promise<RunManifest | null> {
  try {
    const parsed = RunManifest.safeParse(await readJsonFile(path.join(runDir, MANIFEST_FILENAME)));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

async function findRunById(workspaceDir: string, runId: string): Promise<string | null> {
  for (const dir of await listRunDirs(workspaceDir)) {
    const manifest = await readManifestLoose(dir);
    if (manifest?.run_id === runId) return dir;
  }
  return null;
}

/**
 * Resolves a run id, a directory name under the runs root, or a path to a run
 * directory inside the runs root. Read-only: never creates anything.
 */
export async function resolveRunRef(workspaceDir: string, ref: string): Promise<string> {
  const root = runsRoot(workspaceDir);
  const trimmed = ref.trim();
  if (!trimmed) throw new RunNotFoundError(ref, root);

  const candidate = path.isAbsolute(trimmed) ? path.resolve(trimmed) : path.resolve(root, trimmed);
  if (
    (await pathExists(path.join(candidate, MANIFEST_FILENAME))) &&
    candidate !== path.resolve(root) &&
    (await isWithinRoot(candidate, root))
  ) {
    return candidate;
  }

  const byId = await findRunById(workspaceDir, trimmed);
  if (byId) return byId;
  throw new RunNotFoundError(ref, root);
}
