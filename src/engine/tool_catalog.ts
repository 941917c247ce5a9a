import type { ExecutionMode } from "../schemas/common.js";
import type { ToolCapability } from "./agent_runtime.js";

export const READ_ONLY_TOOLS: ReadonlySet<string> = new Set([
  "list_directory",
  "read_file",
  "search_text",
  "report_intent",
  "ask_user"
]);

export const MUTATING_TOOLS: ReadonlySet<string> = new Set([
  "write_file",
  "delete_path",
  "move_path",
  "run_command",
  "python_exec",
  "apply_patch",
  "edit_file",
  "create_file"
]);

export const KNOWN_TOOLS: readonly string[] = [...READ_ONLY_TOOLS, ...MUTATING_TOOLS];

const MUTATING_NAME_HINT = /write|edit|create|delete|remove|move|rename|patch|exec|run|shell|bash/i;

/** Unknown tools fall back to a name heuristic that errs toward mutating. */
export function isMutatingTool(name: string): boolean {
  if (READ_ONLY_TOOLS.has(name)) return false;
  if (MUTATING_TOOLS.has(name)) return true;
  return MUTATING_NAME_HINT.test(name);
}

export function buildCapabilities(
  toolNames: readonly string[],
  mode: ExecutionMode
): ToolCapability[] {
  const seen = new Set<string>();
  const out: ToolCapability[] = [];
  for (const name of toolNames) {
    if (seen.has(name)) continue;
    seen.add(name);
    const mutating = isMutatingTool(name);
    out.push({ name, mutating, allowed: !(mode === "plan" && mutating) });
  }
  return out;
}
