import { AgentRuntimeError, InterruptedError } from "../core/errors.js";
import { appendEvent, nextTurnId } from "../ledger/run_ledger.js";
import type { Settings } from "../schemas/settings.js";
import type { AgentRuntime } from "./agent_runtime.js";
import { driveTurn, type TurnOutcome } from "./drive_turn.js";
import { addTurnToReport, startReport, writeRunReport } from "./run_report.js";
import { abortSession, endSession, openSession, resolveWorkspaceRoot } from "./session.js";
import { KNOWN_TOOLS, buildCapabilities } from "./tool_catalog.js";
import type { ToolGateContext } from "./tool_gate.js";

// Conversational turns may write anywhere under the workspace root, never outside it.
const CONVERSATION_WRITE_SCOPE = ["**"];

export type OpenConversationArgs = {
  workspace_dir: string;
  mode: "oneshot" | "repl";
  settings: Settings;
  runtime: AgentRuntime;
  append_to_run?: string;
  argv?: string[];
  title?: string;
};

export type ConversationSession = {
  readonly run_id: string;
  readonly run_dir: string;
  ask(text: string, signal?: AbortSignal): Promise<TurnOutcome>;
  close(): Promise<"closed" | "failed">;
};

export async function openConversation(args: OpenConversationArgs): Promise<ConversationSession> {
  const root = await resolveWorkspaceRoot(args.workspace_dir);
  const { handle, session_seq, started_at } = await openSession({
    root,
    mode: args.mode,
    llm: args.settings.llm,
    argv: args.argv ?? [],
    title: args.title,
    append_to_run: args.append_to_run
  });
  const allowedTools = args.settings.session.tools;
  const gate: ToolGateContext = {
    mode: "apply",
    allowed_tools: allowedTools,
    write_scope: CONVERSATION_WRITE_SCOPE,
    root
  };
  const capabilities = buildCapabilities(allowedTools ?? KNOWN_TOOLS, "apply");
  const draft = startReport({ run_id: handle.run_id, mode: args.mode, started_at, session_seq });
  let failedTurns = 0;
  let aborted = false;

  return {
    run_id: handle.run_id,
    run_dir: handle.run_dir,

    async ask(text, signal = new AbortController().signal) {
      if (aborted) throw new InterruptedError("Conversation was aborted");
      try {
        if (signal.aborted) throw new InterruptedError();
        const turn_id = nextTurnId(handle);
        await appendEvent(handle, { type: "input.user", turn_id, data: { text } });
        await appendEvent(handle, { type: "context.resolved", turn_id, data: { items: [] } });
        const outcome = await driveTurn({
          handle,
          turn_id,
          runtime: args.runtime,
          prompt: text,
          llm: args.settings.llm,
          gate,
          capabilities,
          signal
        });
        if (outcome.status === "failed") failedTurns += 1;
        addTurnToReport(draft, outcome);
        return outcome;
      } catch (e) {
        aborted = true;
        await abortSession(handle, e);
        throw e;
      }
    },

    async close() {
      if (aborted) return "failed";
      const status = failedTurns > 0 ? "failed" : "closed";
      try {
        await writeRunReport(handle, draft, status);
      } catch (e) {
        aborted = true;
        await abortSession(handle, e);
        throw e;
      }
      if (status === "failed") {
        await endSession(handle, "failed", `${failedTurns} turn(s) failed`);
        return "failed";
      }
      await endSession(handle, "closed", "completed");
      return "closed";
    }
  };
}

export type OneShotResult = {
  run_id: string;
  run_dir: string;
  outcome: TurnOutcome;
};

/** A single prompt in its own (or an appended) run; a failed turn fails the run. */
export async function runOneShot(
  args: Omit<OpenConversationArgs, "mode"> & { prompt: string; signal?: AbortSignal }
): Promise<OneShotResult> {
  const session = await openConversation({ ...args, mode: "oneshot" });
  const outcome = await session.ask(args.prompt, args.signal);
  await session.close();
  if (outcome.status === "failed") {
    throw new AgentRuntimeError(
      `Agent runtime failed (run ${session.run_id}): ${outcome.error ?? "unknown error"}`
    );
  }
  return { run_id: session.run_id, run_dir: session.run_dir, outcome };
}
