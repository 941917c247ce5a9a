import { nowIso } from "../core/time.js";
import { appendEvent, writeArtifact, type RunHandle } from "../ledger/run_ledger.js";
import type { RunMode } from "../schemas/run.js";
import type { RunReport, ToolCallRecord } from "../schemas/report.js";
import type { TurnOutcome } from "./drive_turn.js";

export type ReportDraft = {
  run_id: string;
  mode: RunMode;
  started_at: string;
  // seq of this invocation's session.start; names the report files.
  session_seq: number;
  turns: number;
  tool_calls: ToolCallRecord[];
  diffs: string[];
  warnings: string[];
  errors: string[];
};

export function startReport(args: {
  run_id: string;
  mode: RunMode;
  started_at: string;
  session_seq: number;
}): ReportDraft {
  return { ...args, turns: 0, tool_calls: [], diffs: [], warnings: [], errors: [] };
}

export function addTurnToReport(draft: ReportDraft, outcome: TurnOutcome): void {
  draft.turns += 1;
  draft.tool_calls.push(...outcome.calls);
  draft.diffs.push(...outcome.artifacts);
  if (outcome.error) draft.errors.push(`turn ${outcome.turn_id}: ${outcome.error}`);
}

/** `command` as a string or an argv list; anything else is not a command. */
export function commandFromArguments(args: Record<string, unknown>): string | null {
  const value = args.command ?? args.cmd;
  if (typeof value === "string") return value.trim() || null;
  if (Array.isArray(value) && value.length > 0 && value.every((v): v is string => typeof v === "string")) {
    return value.join(" ");
  }
  return null;
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

export function finishReport(draft: ReportDraft, status: "closed" | "failed", now = nowIso()): RunReport {
  const succeeded = draft.tool_calls.filter((c) => c.outcome === "succeeded");
  return {
    run_id: draft.run_id,
    mode: draft.mode,
    status,
    started_at: draft.started_at,
    finished_at: now,
    turns: draft.turns,
    tool_calls: draft.tool_calls,
    files_touched: unique(succeeded.filter((c) => c.mutating).flatMap((c) => c.targets)),
    commands_run: succeeded.flatMap((c) => (c.command === null ? [] : [c.command])),
    diffs: draft.diffs,
    warnings: draft.warnings,
    errors: draft.errors
  };
}

function describeCall(call: ToolCallRecord): string {
  const paths = call.target_paths.length ? ` ${call.target_paths.join(", ")}` : "";
  if (call.outcome === "denied") return `${call.name}${paths}: denied (${call.reason})`;
  const tail = call.error ? `: ${call.error}` : "";
  return `${call.name}${paths}: ${call.outcome.replace("_", " ")}${tail}`;
}

function section(title: string, items: readonly string[]): string[] {
  if (items.length === 0) return [];
  return [`## ${title}`, ...items.map((item) => `- ${item}`), ""];
}

export function renderReportMarkdown(report: RunReport): string {
  const denied = report.tool_calls.filter((c) => c.outcome === "denied").length;
  const lines = [
    `# Run report ${report.run_id}`,
    "",
    `mode: ${report.mode}   status: ${report.status}`,
    `started: ${report.started_at}   finished: ${report.finished_at}`,
    `turns: ${report.turns}   tool calls: ${report.tool_calls.length} (${denied} denied)`,
    "",
    ...section("Errors", report.errors),
    ...section("Warnings", report.warnings),
    ...section("Files touched", report.files_touched),
    ...section("Commands run", report.commands_run),
    ...section("Tool calls", report.tool_calls.map(describeCall)),
    ...section("Diffs", report.diffs)
  ];
  return `${lines.join("\n").trimEnd()}\n`;
}

/**
 * Stores the finished report as JSON and Markdown under `reports/` with one
 * artifact.write event each.
 */
export async function writeRunReport(
  handle: RunHandle,
  draft: ReportDraft,
  status: "closed" | "failed"
): Promise<{ report: RunReport; paths: string[] }> {
  const report = finishReport(draft, status);
  const base = `reports/${draft.session_seq}-report`;
  const files: Array<[string, string]> = [
    [`${base}.json`, `${JSON.stringify(report, null, 2)}\n`],
    [`${base}.md`, renderReportMarkdown(report)]
  ];
  const written: string[] = [];
  for (const [rel, text] of files) {
    const stored = await writeArtifact(handle, rel, text);
    await appendEvent(handle, {
      type: "artifact.write",
      data: {
        path: stored,
        summary: `run report (${report.status}, ${report.tool_calls.length} tool call(s))`,
        bytes: Buffer.byteLength(text, "utf8")
      }
    });
    written.push(stored);
  }
  return { report, paths: written };
}
