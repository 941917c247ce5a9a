import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { errnoCode } from "../store/fs.js";
import { matchesGlob } from "./glob.js";

export type PathRejectReason =
  | "malformed_path"
  | "root_unavailable"
  | "unresolvable_path"
  | "outside_root"
  | "outside_write_scope";

export type CanonicalPath =
  | { ok: true; absolute: string; relative: string }
  | { ok: false; reason: PathRejectReason };

export type ScopeCheck =
  | { allowed: true; absolute: string; relative: string }
  | { allowed: false; reason: PathRejectReason; relative?: string };

const MAX_SYMLINK_HOPS = 40;

function isMalformed(p: unknown): boolean {
  return typeof p !== "string" || p.trim().length === 0 || p.includes("\0");
}

function splitSegments(p: string): string[] {
  return p.split(/[\\/]+/).filter((seg) => seg !== "" && seg !== ".");
}

function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel));
}

type Walk = { hops: number };
type WalkResult = { ok: true; real: string } | { ok: false; reason: PathRejectReason };

/**
 * Resolves `segments` from the already-real `start` one component at a time,
 * the way the OS does: a symlink is replaced by its target before the next
 * `..` applies. Components that do not exist yet are appended as written, and
 * dangling links are followed so a write through them is judged by where it
 * would land. With `rootReal`, leaving the root after having been inside it is
 * an escape even when a later component comes back.
 */
async function walkSegments(
  start: string,
  segments: readonly string[],
  walk: Walk,
  rootReal: string | null
): Promise<WalkResult> {
  let current = start;
  let entered = rootReal !== null && isInside(rootReal, current);
  for (const seg of segments) {
    if (seg === "..") {
      current = path.dirname(current);
    } else {
      const next = path.join(current, seg);
      let stat: Stats | null;
      try {
        stat = await fs.lstat(next);
      } catch (e) {
        if (errnoCode(e) !== "ENOENT") return { ok: false, reason: "unresolvable_path" };
        stat = null;
      }
      if (stat?.isSymbolicLink()) {
        walk.hops += 1;
        if (walk.hops > MAX_SYMLINK_HOPS) return { ok: false, reason: "unresolvable_path" };
        const dest = await fs.readlink(next);
        const destRoot = path.isAbsolute(dest) ? path.parse(dest).root : "";
        const target = await walkSegments(destRoot || current, splitSegments(dest.slice(destRoot.length)), walk, null);
        if (!target.ok) return target;
        current = target.real;
      } else {
        current = next;
      }
    }
    if (rootReal !== null) {
      const inside = isInside(rootReal, current);
      if (entered && !inside) return { ok: false, reason: "outside_root" };
      entered = entered || inside;
    }
  }
  return { ok: true, real: current };
}

function toPosix(rel: string): string {
  return rel.split(path.sep).join("/");
}

function relativeInside(root: string, candidate: string): string | null {
  const rel = path.relative(root, candidate);
  if (rel === "") return ".";
  if (rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;
  return toPosix(rel);
}

export async function canonicalRoot(root: string): Promise<string | null> {
  if (isMalformed(root)) return null;
  try {
    return await fs.realpath(path.resolve(root));
  } catch {
    return null;
  }
}

/**
 * Canonicalizes `p` (relative paths resolve against `root`) and reports its
 * position relative to the canonical root. Never throws.
 */
export async function canonicalize(p: string, root: string): Promise<CanonicalPath> {
  if (isMalformed(p)) return { ok: false, reason: "malformed_path" };
  const rootReal = await canonicalRoot(root);
  if (!rootReal) return { ok: false, reason: "root_unavailable" };

  // Absolute input is walked from the filesystem root, never pre-normalized.
  const inputRoot = path.isAbsolute(p) ? path.parse(p).root : "";
  let walked: WalkResult;
  try {
    walked = await walkSegments(inputRoot || rootReal, splitSegments(p.slice(inputRoot.length)), { hops: 0 }, rootReal);
  } catch {
    walked = { ok: false, reason: "unresolvable_path" };
  }
  if (!walked.ok) return walked;
  const real = walked.real;

  const relative = relativeInside(rootReal, real);
  if (relative === null) return { ok: false, reason: "outside_root" };
  return { ok: true, absolute: real, relative };
}

export async function isWithinRoot(p: string, root: string): Promise<boolean> {
  const res = await canonicalize(p, root);
  return res.ok;
}

/** Deny-by-default: an empty scope list matches nothing. */
export function matchesScope(relativePath: string, scopePatterns: readonly string[]): boolean {
  if (isMalformed(relativePath) || scopePatterns.length === 0) return false;
  const rel = toPosix(path.normalize(relativePath)).replace(/^\.\//, "");
  if (rel === ".." || rel.startsWith("../") || path.isAbsolute(rel)) return false;
  return scopePatterns.some((pattern) => matchesGlob(rel, pattern));
}

export async function checkScopedPath(
  p: string,
  root: string,
  scopePatterns: readonly string[]
): Promise<ScopeCheck> {
  const res = await canonicalize(p, root);
  if (!res.ok) return { allowed: false, reason: res.reason };
  if (!matchesScope(res.relative, scopePatterns)) {
    return { allowed: false, reason: "outside_write_scope", relative: res.relative };
  }
  return { allowed: true, absolute: res.absolute, relative: res.relative };
}
