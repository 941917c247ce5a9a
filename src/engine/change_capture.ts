import { createHash } from "node:crypto";
import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import { createTwoFilesPatch } from "diff";
import { errnoCode } from "../store/fs.js";
import type { GateTarget } from "./tool_gate.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

export type FileSnapshot = {
  relative: string;
  absolute: string;
  // null: nothing there, or not a regular file.
  content: string | null;
};

async function readSnapshot(absolute: string): Promise<string | null> {
  let stat: Stats;
  try {
    stat = await fs.stat(absolute);
  } catch (e) {
    if (errnoCode(e) === "ENOENT" || errnoCode(e) === "ENOTDIR") return null;
    throw e;
  }
  if (!stat.isFile()) return null;
  if (stat.size > MAX_CAPTURE_BYTES) {
    return `<file too large to capture: ${stat.size} bytes, modified ${stat.mtime.toISOString()}>\n`;
  }
  const buf = await fs.readFile(absolute);
  if (buf.includes(0)) {
    const digest = createHash("sha256").update(buf).digest("hex");
    return `<binary file: ${buf.length} bytes, sha256 ${digest}>\n`;
  }
  return buf.toString("utf8");
}

export async function snapshotTargets(targets: readonly GateTarget[]): Promise<FileSnapshot[]> {
  const out: FileSnapshot[] = [];
  for (const t of targets) {
    out.push({ relative: t.relative, absolute: t.absolute, content: await readSnapshot(t.absolute) });
  }
  return out;
}

/** One unified diff covering every target of a call, in target order. */
export function diffSnapshots(before: readonly FileSnapshot[], after: readonly FileSnapshot[]): string {
  return before
    .map((b, idx) => {
      const a = after[idx];
      return createTwoFilesPatch(
        b.content === null ? "/dev/null" : `a/${b.relative}`,
        a?.content === null || a === undefined ? "/dev/null" : `b/${b.relative}`,
        b.content ?? "",
        a?.content ?? ""
      );
    })
    .join("");
}
