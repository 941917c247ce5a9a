import type { LlmSettings } from "../schemas/settings.js";

export type ToolCapability = {
  name: string;
  mutating: boolean;
  // false: offered for visibility only; every call will be refused.
  allowed: boolean;
};

export type ToolCallRequest = {
  call_id: string;
  name: string;
  arguments: Record<string, unknown>;
};

export type ToolDecision =
  | { allowed: true; reason: string }
  | { allowed: false; reason: string };

export type AgentRuntimeEvent =
  | { type: "text.delta"; text: string }
  | { type: "tool.result"; call_id: string; ok: boolean; output?: unknown; error?: string }
  | { type: "turn.end" }
  | { type: "terminal"; status: "completed" | "failed"; error?: string };

export type AgentRunRequest = {
  prompt: string;
  tools: ToolCapability[];
  deny_mutation: boolean;
  llm: LlmSettings;
  signal: AbortSignal;
  /**
   * Must be awaited before a tool executes; a denied call must not run and
   * should be reported back to the model as a failed tool result.
   */
  intercept: (call: ToolCallRequest) => Promise<ToolDecision>;
};

/**
 * The model-and-tools side of an invocation. The engine never executes
 * tools; it only accepts or denies them through `intercept`.
 */
export interface AgentRuntime {
  run(request: AgentRunRequest): AsyncIterable<AgentRuntimeEvent>;
}
