import type { ExecutionMode } from "../schemas/common.js";
import type { Playbook } from "./load_playbook.js";
import type { ResolvedParameters } from "./parameters.js";

const PLACEHOLDER_RE = /\{\{\s*([^{}\s]+)\s*\}\}/g;

/**
 * Substitutes `{{name}}` placeholders with resolved values. Placeholders with
 * no resolved value stay verbatim.
 */
export function render(playbook: Pick<Playbook, "body">, params: ResolvedParameters): string {
  return playbook.body.replace(PLACEHOLDER_RE, (whole, name: string) =>
    Object.hasOwn(params, name) ? String(params[name]) : whole
  );
}

function modeBlock(mode: ExecutionMode): string {
  if (mode === "plan") {
    return [
      "Execution mode: PLAN",
      "Do not modify files; mutating tools will be refused. Produce a JSON plan with this structure:",
      '{"steps":[{"description":"...","tools":["tool_name"],"files":["path/relative/to/workspace"]}]}'
    ].join("\n");
  }
  return ["Execution mode: APPLY", "Use only the allowed tools and stay within the write scope."].join("\n");
}

export function buildPrompt(playbook: Playbook, params: ResolvedParameters, mode: ExecutionMode): string {
  const entries = Object.entries(params);
  const paramLines = entries.length ? entries.map(([k, v]) => `- ${k}: ${String(v)}`).join("\n") : "- (none)";
  return [
    `Playbook: ${playbook.id} (v${playbook.version})`,
    `Description: ${playbook.description}`,
    `Parameters:\n${paramLines}`,
    `Allowed tools: ${playbook.allowed_tools.join(", ")}`,
    `Write scope: ${playbook.write_scope.join(", ")}`,
    "Parameter values have already been resolved and validated; proceed directly with the playbook steps.",
    modeBlock(mode),
    "",
    "Playbook instructions:",
    render(playbook, params),
    ""
  ].join("\n");
}
