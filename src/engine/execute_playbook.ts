import fs from "node:fs/promises";
import debug from "debug";
import {
  AgentRuntimeError,
  InterruptedError,
  PolicyViolationError,
  ValidationError
} from "../core/errors.js";
import { appendEvent, nextTurnId } from "../ledger/run_ledger.js";
import { loadPlaybook, type Playbook } from "../playbooks/load_playbook.js";
import { resolveParameters, type ResolvedParameters } from "../playbooks/parameters.js";
import { extractPlanFromText, type PlanExtraction } from "../playbooks/plan_output.js";
import { buildPrompt } from "../playbooks/render.js";
import { checkScopedPath } from "../sandbox/paths.js";
import type { ExecutionMode } from "../schemas/common.js";
import type { Settings } from "../schemas/settings.js";
import { ensureDir, errnoCode } from "../store/fs.js";
import type { AgentRuntime } from "./agent_runtime.js";
import { driveTurn, type TurnOutcome } from "./drive_turn.js";
import { addTurnToReport, startReport, writeRunReport } from "./run_report.js";
import { activeStateForMode, transitionExecutionState, type ExecutionState } from "./execution_state.js";
import { abortSession, endSession, openSession, resolveWorkspaceRoot } from "./session.js";
import { buildCapabilities } from "./tool_catalog.js";

const log = debug("puk:engine");

const OUTPUT_DIR_PARAM = "output_dir";

export type ExecutePlaybookArgs = {
  workspace_dir: string;
  playbook_path: string;
  params: Record<string, string>;
  // Overrides the playbook's run_mode.
  mode?: ExecutionMode;
  append_to_run?: string;
  settings: Settings;
  runtime: AgentRuntime;
  argv?: string[];
  signal?: AbortSignal;
  on_warning?: (message: string) => void;
};

export type PreparedPlaybook = {
  root: string;
  playbook: Playbook;
  mode: ExecutionMode;
  params: ResolvedParameters;
  prompt: string;
  output_dir: string | null;
};

export type PlaybookRunResult = {
  run_id: string;
  run_dir: string;
  mode: ExecutionMode;
  state: ExecutionState;
  outcome: TurnOutcome;
  plan: PlanExtraction | null;
  // Run-relative report paths; apply mode only.
  report: string[];
};

async function checkOutputDir(
  playbook: Playbook,
  params: ResolvedParameters,
  root: string
): Promise<string | null> {
  const value = params[OUTPUT_DIR_PARAM];
  if (playbook.parameters[OUTPUT_DIR_PARAM]?.type !== "path" || typeof value !== "string") return null;
  const check = await checkScopedPath(value, root, playbook.write_scope);
  if (!check.allowed) {
    throw new PolicyViolationError(
      `Parameter '${OUTPUT_DIR_PARAM}' (${check.relative ?? value}) is outside the playbook write scope`
    );
  }
  const stat = await fs.stat(check.absolute).catch((e: unknown) => {
    if (errnoCode(e) === "ENOENT") return null;
    throw e;
  });
  if (stat && !stat.isDirectory()) {
    throw new ValidationError(
      "type_conversion",
      `Parameter '${OUTPUT_DIR_PARAM}' must name a directory: ${check.absolute} is not one`,
      { key: OUTPUT_DIR_PARAM }
    );
  }
  return check.absolute;
}

/**
 * Everything that can be rejected without touching the ledger: playbook
 * shape, parameters, effective mode. Nothing is created when this throws.
 */
export async function preparePlaybook(
  args: Pick<ExecutePlaybookArgs, "workspace_dir" | "playbook_path" | "params" | "mode" | "on_warning">
): Promise<PreparedPlaybook> {
  const root = await resolveWorkspaceRoot(args.workspace_dir);
  const playbook = await loadPlaybook(args.playbook_path);
  for (const w of playbook.warnings) args.on_warning?.(w);
  const mode = args.mode ?? playbook.run_mode;
  const params = await resolveParameters(playbook, args.params, root);
  const output_dir = mode === "apply" ? await checkOutputDir(playbook, params, root) : null;
  return { root, playbook, mode, params, prompt: buildPrompt(playbook, params, mode), output_dir };
}

export async function executePlaybook(args: ExecutePlaybookArgs): Promise<PlaybookRunResult> {
  const prepared = await preparePlaybook(args);
  const { root, playbook, mode, params } = prepared;
  const signal = args.signal ?? new AbortController().signal;
  if (signal.aborted) throw new InterruptedError();

  const { handle, session_seq, started_at } = await openSession({
    root,
    mode: "playbook",
    llm: args.settings.llm,
    argv: args.argv ?? [],
    title: playbook.id,
    append_to_run: args.append_to_run
  });

  let state: ExecutionState = "initialized";
  const advance = (next: ExecutionState): void => {
    log("run %s: %s -> %s", handle.run_id, state, next);
    state = transitionExecutionState(state, next);
  };

  let outcome: TurnOutcome;
  let plan: PlanExtraction | null = null;
  let report: string[] = [];
  const draft = startReport({ run_id: handle.run_id, mode: "playbook", started_at, session_seq });
  draft.warnings.push(...playbook.warnings);
  try {
    advance(activeStateForMode(mode));
    const turn_id = nextTurnId(handle);
    await appendEvent(handle, {
      type: "context.resolved",
      turn_id,
      data: {
        items: [{ type: "playbook", id: playbook.id, version: playbook.version, mode, parameters: params }]
      }
    });
    await appendEvent(handle, { type: "input.user", turn_id, data: { text: prepared.prompt } });
    if (prepared.output_dir) await ensureDir(prepared.output_dir);

    outcome = await driveTurn({
      handle,
      turn_id,
      runtime: args.runtime,
      prompt: prepared.prompt,
      llm: args.settings.llm,
      gate: { mode, allowed_tools: playbook.allowed_tools, write_scope: playbook.write_scope, root },
      capabilities: buildCapabilities(playbook.allowed_tools, mode),
      signal
    });

    if (mode === "plan" && outcome.status === "completed") {
      plan = extractPlanFromText(outcome.text);
      await appendEvent(handle, {
        type: "playbook.plan",
        turn_id,
        data: plan.ok ? { steps: plan.plan.steps, error: null } : { steps: null, error: plan.error }
      });
    }

    if (mode === "apply") {
      addTurnToReport(draft, outcome);
      report = (await writeRunReport(handle, draft, outcome.status === "failed" ? "failed" : "closed")).paths;
    }

    if (outcome.status === "failed") {
      advance("failed");
      await endSession(handle, "failed", "agent runtime failure", outcome.error ?? undefined);
    } else {
      advance("succeeded");
      await endSession(handle, "closed", "completed");
    }
  } catch (e) {
    await abortSession(handle, e);
    throw e;
  }

  if (outcome.status === "failed") {
    throw new AgentRuntimeError(`Agent runtime failed (run ${handle.run_id}): ${outcome.error ?? "unknown error"}`);
  }
  return { run_id: handle.run_id, run_dir: handle.run_dir, mode, state, outcome, plan, report };
}
