import path from "node:path";
import type { RunEvent } from "../schemas/events.js";
import type { ListedRun, RunDetails } from "./run_queries.js";

export function shorten(text: string, limit = 160): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length <= limit ? flat : `${flat.slice(0, limit - 3)}...`;
}

function statusLabel(run: Pick<ListedRun, "status" | "stale">): string {
  return run.stale ? `${run.status} (stale)` : run.status;
}

export function formatRunsTable(runs: readonly ListedRun[]): string {
  const rows: string[][] = [["run_id", "status", "mode", "updated_at", "title", "dir"]];
  for (const r of runs) {
    rows.push([r.run_id, statusLabel(r), r.mode, r.updated_at, shorten(r.title, 30), path.basename(r.dir)]);
  }
  const widths = rows[0].map((_, i) => Math.max(...rows.map((row) => row[i].length)));
  const lines: string[] = [];
  rows.forEach((row, idx) => {
    const line = row
      .map((cell, i) => cell.padEnd(widths[i]))
      .join("  ")
      .trimEnd();
    lines.push(line);
    if (idx === 0) lines.push("-".repeat(line.length));
  });
  return lines.join("\n");
}

export function summarizeEvent(ev: RunEvent): string {
  switch (ev.type) {
    case "session.start":
      return ev.data.append ? `${ev.data.mode} (append, was ${ev.data.prior_status ?? "new"})` : ev.data.mode;
    case "session.end":
      return ev.data.reason ? `${ev.data.status}: ${shorten(ev.data.reason)}` : ev.data.status;
    case "input.user":
    case "model.output":
      return shorten(ev.data.text);
    case "context.resolved":
      return ev.data.items.length
        ? ev.data.items.map((i) => `${i.id}@${i.version} (${i.mode})`).join(", ")
        : "(none)";
    case "tool.call":
      return ev.data.target_paths.length
        ? `${ev.data.name} ${ev.data.target_paths.join(", ")}`
        : ev.data.name;
    case "tool.result": {
      if (ev.data.denied) return `${ev.data.name} denied: ${ev.data.reason ?? "unknown"}`;
      return ev.data.ok ? `${ev.data.name} ok` : `${ev.data.name} failed: ${shorten(ev.data.error ?? "")}`;
    }
    case "artifact.write":
      return ev.data.path;
    case "status.change":
      return `${ev.data.from ?? "none"} -> ${ev.data.to}`;
    case "playbook.plan":
      return ev.data.steps ? `${ev.data.steps.length} step(s)` : `unparsed: ${ev.data.error ?? ""}`;
  }
}

export function formatEventLine(ev: RunEvent): string {
  return `${ev.seq} [${ev.timestamp}] ${ev.type} (turn ${ev.turn_id ?? "-"}): ${summarizeEvent(ev)}`;
}

export function formatRunShow(details: RunDetails): string {
  const m = details.manifest;
  const lines = [
    `run: ${path.basename(details.run.dir)}`,
    `run_id: ${m.run_id}`,
    `status: ${statusLabel(details.run)}   mode: ${m.mode}   workspace: ${m.workspace}`,
    `created: ${m.created_at}   updated: ${m.updated_at}`,
    `title: ${m.title}`,
    `llm: ${m.llm.provider}${m.llm.model ? `/${m.llm.model}` : ""} temperature=${m.llm.temperature} max_output_tokens=${m.llm.max_output_tokens}`,
    "",
    `events (${details.events.length} of ${details.total_events}):`,
    ...details.events.map(formatEventLine)
  ];
  for (const issue of details.issues) {
    lines.push(`! line ${issue.line_no} unreadable: ${shorten(issue.error)}`);
  }
  if (details.torn_tail) lines.push("! trailing partial line ignored");
  return lines.join("\n");
}
