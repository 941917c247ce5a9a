import { canonicalize, checkScopedPath } from "../sandbox/paths.js";
import type { ExecutionMode } from "../schemas/common.js";
import type { ToolCallRequest } from "./agent_runtime.js";
import { isMutatingTool } from "./tool_catalog.js";

// Argument keys that commonly name a filesystem target.
export const PATH_ARGUMENT_KEYS = [
  "path",
  "paths",
  "file",
  "files",
  "file_path",
  "filePath",
  "target_file",
  "src",
  "dst",
  "destination",
  "cwd"
] as const;

export type ToolGateContext = {
  mode: ExecutionMode;
  // null: no allowlist (every tool the runtime offers).
  allowed_tools: readonly string[] | null;
  write_scope: readonly string[];
  root: string;
};

export type GateTarget = {
  raw: string;
  absolute: string;
  relative: string;
};

export type ToolGateDecision =
  | {
      allowed: true;
      rule_id: string;
      reason: string;
      mutating: boolean;
      targets: GateTarget[];
      target_paths: string[];
    }
  | {
      allowed: false;
      rule_id: string;
      reason: string;
      mutating: boolean;
      target_paths: string[];
    };

export function extractTargetPaths(args: Record<string, unknown>): string[] {
  const out: string[] = [];
  const push = (v: unknown): void => {
    if (typeof v === "string" && !out.includes(v)) out.push(v);
  };
  for (const key of PATH_ARGUMENT_KEYS) {
    const value = args[key];
    if (Array.isArray(value)) value.forEach(push);
    else push(value);
  }
  return out;
}

/**
 * The single point where a tool call is let through or refused. Mutating
 * calls are judged against the write-scope; read-only calls only need their
 * paths to stay inside the workspace root.
 */
export async function evaluateToolCall(
  call: ToolCallRequest,
  ctx: ToolGateContext
): Promise<ToolGateDecision> {
  const mutating = isMutatingTool(call.name);
  const target_paths = extractTargetPaths(call.arguments);
  const deny = (rule_id: string, reason: string): ToolGateDecision => ({
    allowed: false,
    rule_id,
    reason,
    mutating,
    target_paths
  });

  if (ctx.allowed_tools && !ctx.allowed_tools.includes(call.name)) {
    return deny("tool.allowlist", "tool_not_allowed");
  }
  if (mutating && ctx.mode === "plan") {
    return deny("mode.plan", "plan_mode_mutation");
  }

  const targets: GateTarget[] = [];
  if (!mutating) {
    for (const raw of target_paths) {
      const res = await canonicalize(raw, ctx.root);
      if (!res.ok) return deny("path.root", res.reason);
      targets.push({ raw, absolute: res.absolute, relative: res.relative });
    }
    return { allowed: true, rule_id: "tool.read_only", reason: "read_only", mutating, targets, target_paths };
  }

  if (target_paths.length === 0) {
    return deny("scope.write", "no_target_path");
  }
  for (const raw of target_paths) {
    const check = await checkScopedPath(raw, ctx.root, ctx.write_scope);
    if (!check.allowed) return deny("scope.write", check.reason);
    targets.push({ raw, absolute: check.absolute, relative: check.relative });
  }
  return { allowed: true, rule_id: "scope.write", reason: "in_write_scope", mutating, targets, target_paths };
}
