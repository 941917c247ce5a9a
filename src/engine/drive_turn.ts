import debug from "debug";
import { InterruptedError, errorMessage } from "../core/errors.js";
import { safeSlug } from "../ledger/layout.js";
import { appendEvent, writeArtifact, type RunHandle } from "../ledger/run_ledger.js";
import type { ToolCallRecord } from "../schemas/report.js";
import type { LlmSettings } from "../schemas/settings.js";
import type {
  AgentRuntime,
  AgentRuntimeEvent,
  ToolCallRequest,
  ToolCapability,
  ToolDecision
} from "./agent_runtime.js";
import { diffSnapshots, snapshotTargets, type FileSnapshot } from "./change_capture.js";
import { commandFromArguments } from "./run_report.js";
import { evaluateToolCall, type GateTarget, type ToolGateContext } from "./tool_gate.js";

const log = debug("puk:engine");

export type DriveTurnArgs = {
  handle: RunHandle;
  turn_id: number;
  runtime: AgentRuntime;
  prompt: string;
  llm: LlmSettings;
  gate: ToolGateContext;
  capabilities: ToolCapability[];
  signal: AbortSignal;
};

export type TurnOutcome = {
  turn_id: number;
  status: "completed" | "failed";
  // All model text of the turn, concatenated.
  text: string;
  error: string | null;
  allowed_calls: number;
  denied_calls: number;
  artifacts: string[];
  // Every intercepted call in arrival order.
  calls: ToolCallRecord[];
};

type TurnState = {
  buffered: string;
  text: string;
  allowed_calls: number;
  denied_calls: number;
  fatal: { error: unknown } | null;
  terminal: { status: "completed" | "failed"; error?: string } | null;
};

type PendingCall = {
  name: string;
  call_seq: number;
  targets: GateTarget[];
  // Present only for mutating calls in apply mode.
  before: FileSnapshot[] | null;
};

/**
 * Drives one request/response cycle of the agent runtime and relays what it
 * reports into the ledger, in the order received. Ledger failures and
 * interrupts are thrown; runtime failures come back as a failed outcome.
 */
export async function driveTurn(args: DriveTurnArgs): Promise<TurnOutcome> {
  const { handle, turn_id, gate } = args;
  const pending = new Map<string, PendingCall>();
  const denied = new Set<string>();
  const artifacts: string[] = [];
  const calls = new Map<string, ToolCallRecord>();
  const st: TurnState = {
    buffered: "",
    text: "",
    allowed_calls: 0,
    denied_calls: 0,
    fatal: null,
    terminal: null
  };

  const flushText = async (): Promise<void> => {
    if (!st.buffered) return;
    const chunk = st.buffered;
    st.buffered = "";
    await appendEvent(handle, { type: "model.output", turn_id, data: { text: chunk } });
  };

  const intercept = async (call: ToolCallRequest): Promise<ToolDecision> => {
    if (st.fatal) return { allowed: false, reason: "ledger_unavailable" };
    try {
      await flushText();
      const decision = await evaluateToolCall(call, gate);
      const callEvent = await appendEvent(handle, {
        type: "tool.call",
        turn_id,
        data: {
          call_id: call.call_id,
          name: call.name,
          arguments: call.arguments,
          mutating: decision.mutating,
          target_paths: decision.target_paths
        }
      });
      calls.set(call.call_id, {
        turn_id,
        call_id: call.call_id,
        name: call.name,
        mutating: decision.mutating,
        reason: decision.reason,
        target_paths: decision.target_paths,
        targets: decision.allowed ? decision.targets.map((t) => t.relative) : [],
        command: decision.allowed ? commandFromArguments(call.arguments) : null,
        outcome: decision.allowed ? "no_result" : "denied",
        error: null
      });
      if (!decision.allowed) {
        denied.add(call.call_id);
        st.denied_calls += 1;
        await appendEvent(handle, {
          type: "tool.result",
          turn_id,
          data: { call_id: call.call_id, name: call.name, ok: false, denied: true, reason: decision.reason }
        });
        log("denied %s (%s: %s)", call.name, decision.rule_id, decision.reason);
        return { allowed: false, reason: decision.reason };
      }

      st.allowed_calls += 1;
      let before: FileSnapshot[] | null = null;
      if (decision.mutating && gate.mode === "apply") {
        before = await snapshotTargets(decision.targets).catch((e: unknown) => {
          log("could not snapshot targets of %s: %s", call.name, errorMessage(e));
          return null;
        });
      }
      pending.set(call.call_id, { name: call.name, call_seq: callEvent.seq, targets: decision.targets, before });
      return { allowed: true, reason: decision.reason };
    } catch (e) {
      st.fatal = { error: e };
      return { allowed: false, reason: "ledger_unavailable" };
    }
  };

  const recordChange = async (callId: string, call: PendingCall, before: FileSnapshot[]): Promise<void> => {
    const after = await snapshotTargets(call.targets);
    const patch = diffSnapshots(before, after);
    const name = safeSlug(call.name) || "tool";
    const rel = await writeArtifact(handle, `changes/${call.call_seq}-${name}.diff`, patch);
    await appendEvent(handle, {
      type: "artifact.write",
      turn_id,
      data: {
        path: rel,
        summary: `${call.name}: ${call.targets.map((t) => t.relative).join(", ")}`,
        bytes: Buffer.byteLength(patch, "utf8"),
        call_id: callId
      }
    });
    artifacts.push(rel);
  };

  const onEvent = async (ev: AgentRuntimeEvent): Promise<void> => {
    switch (ev.type) {
      case "text.delta":
        st.buffered += ev.text;
        st.text += ev.text;
        return;
      case "tool.result": {
        await flushText();
        if (denied.has(ev.call_id)) {
          // Already recorded as a denial at intercept time.
          log("ignoring runtime result for denied call %s", ev.call_id);
          return;
        }
        const call = pending.get(ev.call_id);
        pending.delete(ev.call_id);
        const record = calls.get(ev.call_id);
        if (record) {
          record.outcome = ev.ok ? "succeeded" : "failed";
          record.error = ev.error ?? null;
        }
        await appendEvent(handle, {
          type: "tool.result",
          turn_id,
          data: {
            call_id: ev.call_id,
            name: call?.name ?? "unknown",
            ok: ev.ok,
            denied: false,
            output: ev.output,
            error: ev.error
          }
        });
        if (ev.ok && call?.before) await recordChange(ev.call_id, call, call.before);
        return;
      }
      case "turn.end":
        await flushText();
        return;
      case "terminal":
        await flushText();
        st.terminal = { status: ev.status, error: ev.error };
        return;
    }
  };

  let runtimeError: string | null = null;
  try {
    const stream = args.runtime.run({
      prompt: args.prompt,
      tools: args.capabilities,
      deny_mutation: gate.mode === "plan",
      llm: args.llm,
      signal: args.signal,
      intercept
    });
    for await (const ev of stream) {
      if (st.fatal || args.signal.aborted) break;
      try {
        await onEvent(ev);
      } catch (e) {
        st.fatal = { error: e };
        break;
      }
    }
  } catch (e) {
    runtimeError = errorMessage(e);
  }

  if (st.fatal) throw st.fatal.error;
  if (args.signal.aborted) throw new InterruptedError();
  await flushText();

  let error: string | null = runtimeError;
  if (!error && !st.terminal) error = "agent runtime ended without reporting completion";
  if (!error && st.terminal?.status === "failed") error = st.terminal.error ?? "agent runtime reported failure";
  if (error) log("turn %d failed: %s", turn_id, error);

  return {
    turn_id,
    status: error ? "failed" : "completed",
    text: st.text,
    error,
    allowed_calls: st.allowed_calls,
    denied_calls: st.denied_calls,
    artifacts,
    calls: [...calls.values()]
  };
}
