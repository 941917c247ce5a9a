import fs from "node:fs/promises";
import { errorMessage } from "../core/errors.js";
import { RunEvent } from "../schemas/events.js";
import { errnoCode } from "../store/fs.js";

export type EventLogIssue = {
  line_no: number;
  raw: string;
  error: string;
};

export type EventLogScan = {
  events: RunEvent[];
  issues: EventLogIssue[];
  // Byte length of the prefix made of newline-terminated lines.
  complete_bytes: number;
  torn_tail: boolean;
};

export function parseEventLine(raw: string): { ok: true; event: RunEvent } | { ok: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
  const parsed = RunEvent.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }
  return { ok: true, event: parsed.data };
}

/**
 * Only newline-terminated lines count: a writer that crashed mid-append leaves
 * at most one unterminated trailing fragment, reported as `torn_tail`.
 */
export function parseEventLog(text: string): EventLogScan {
  const lastNewline = text.lastIndexOf("\n");
  const complete = lastNewline === -1 ? "" : text.slice(0, lastNewline + 1);
  const torn = text.slice(lastNewline + 1);

  const events: RunEvent[] = [];
  const issues: EventLogIssue[] = [];
  const lines = complete.split("\n");
  lines.pop();
  lines.forEach((line, idx) => {
    if (line.trim().length === 0) return;
    const res = parseEventLine(line);
    if (res.ok) events.push(res.event);
    else issues.push({ line_no: idx + 1, raw: line, error: res.error });
  });

  return {
    events,
    issues,
    complete_bytes: Buffer.byteLength(complete, "utf8"),
    torn_tail: torn.length > 0
  };
}

export async function readEventLog(eventsPath: string): Promise<EventLogScan> {
  let text = "";
  try {
    text = await fs.readFile(eventsPath, { encoding: "utf8" });
  } catch (e) {
    if (errnoCode(e) !== "ENOENT") throw e;
  }
  return parseEventLog(text);
}
