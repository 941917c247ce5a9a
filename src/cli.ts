#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import process from "node:process";
import readline from "node:readline";
import { createStdioAgentRuntime } from "./agent/stdio_runtime.js";
import { resolveSettings } from "./config/settings.js";
import { InterruptedError, PukError, ValidationError } from "./core/errors.js";
import { openConversation, runOneShot } from "./engine/execute_conversation.js";
import { executePlaybook } from "./engine/execute_playbook.js";
import { formatEventLine, formatRunShow, formatRunsTable } from "./inspect/format.js";
import { listRuns, showRun, tailEvents } from "./inspect/run_queries.js";
import { resolveRunRef } from "./ledger/run_ref.js";
import { parseParamAssignments } from "./playbooks/parameters.js";
import { ExecutionMode } from "./schemas/common.js";
import { LlmProvider, type SettingsLayer } from "./schemas/settings.js";

function reportError(e: unknown): void {
  const err = e instanceof Error ? e : new Error(String(e));
  process.stderr.write(`ERROR: ${err.message}\n`);
  if (process.env.PUK_DEBUG === "1" && err.stack) {
    process.stderr.write(`${err.stack}\n`);
  }
}

async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (e) {
    reportError(e);
    process.exitCode = e instanceof PukError ? e.exit_code : 1;
  }
}

function warn(message: string): void {
  process.stderr.write(`WARN: ${message}\n`);
}

/** SIGINT aborts the signal handed to `fn` instead of killing the process. */
async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError(`'${value}' is not a number`);
  return n;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError(`'${value}' is not a non-negative integer`);
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

type LlmFlags = {
  provider?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
};

type WorkspaceFlags = { workspace: string };

function llmOverrides(opts: LlmFlags): SettingsLayer {
  const llm: NonNullable<SettingsLayer["llm"]> = {};
  if (opts.provider !== undefined) {
    const provider = LlmProvider.safeParse(opts.provider);
    if (!provider.success) {
      throw new ValidationError(
        "invalid_settings",
        `Unsupported provider '${opts.provider}' (expected one of ${LlmProvider.options.join(", ")})`
      );
    }
    llm.provider = provider.data;
  }
  if (opts.model !== undefined) llm.model = opts.model;
  if (opts.temperature !== undefined) llm.temperature = opts.temperature;
  if (opts.maxOutputTokens !== undefined) llm.max_output_tokens = opts.maxOutputTokens;
  return { llm };
}

function addLlmFlags(cmd: Command): Command {
  return cmd
    .option("--provider <provider>", "LLM provider (copilot, openai, azure, anthropic)")
    .option("--model <model>", "Model name")
    .option("--temperature <t>", "Sampling temperature (0..2)", parseNumber)
    .option("--max-output-tokens <n>", "Maximum output tokens", parseCount);
}

async function loadContext(opts: LlmFlags & WorkspaceFlags) {
  const resolved = await resolveSettings({ workspace_dir: opts.workspace, overrides: llmOverrides(opts) });
  const runtime = createStdioAgentRuntime(resolved.settings.agent.command, { cwd: opts.workspace });
  return { settings: resolved.settings, runtime };
}

const program = new Command();

program.name("puk").description("Local automation runner with a durable run ledger").version("0.1.0");

type AskOpts = LlmFlags & WorkspaceFlags & { appendToRun?: string };

addLlmFlags(
  program
    .command("ask")
    .description("Ask once with a prompt, or start an interactive session without one")
    .argument("[prompt]", "Prompt text")
    .option("--append-to-run <ref>", "Append to an existing run instead of starting a new one")
    .option("--workspace <dir>", "Workspace root", process.cwd())
).action(async (prompt: string | undefined, opts: AskOpts) => {
  await runAction(async () => {
    const { settings, runtime } = await loadContext(opts);
    const argv = process.argv.slice(2);

    if (prompt !== undefined) {
      const res = await withInterrupt((signal) =>
        runOneShot({
          workspace_dir: opts.workspace,
          settings,
          runtime,
          prompt,
          signal,
          argv,
          title: prompt,
          append_to_run: opts.appendToRun
        })
      );
      if (res.outcome.text) process.stdout.write(`${res.outcome.text.trimEnd()}\n`);
      process.stderr.write(`run ${res.run_id} closed\n`);
      return;
    }

    const session = await openConversation({
      workspace_dir: opts.workspace,
      mode: "repl",
      settings,
      runtime,
      argv,
      append_to_run: opts.appendToRun
    });
    process.stderr.write(`run ${session.run_id} (type /exit to quit)\n`);
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false });
    try {
      for await (const raw of rl) {
        const line = raw.trim();
        if (line === "/exit") break;
        if (!line) continue;
        const outcome = await withInterrupt((signal) => session.ask(line, signal));
        if (outcome.text) process.stdout.write(`${outcome.text.trimEnd()}\n`);
        if (outcome.status === "failed") warn(`turn failed: ${outcome.error ?? "unknown error"}`);
      }
    } finally {
      rl.close();
    }
    const status = await session.close();
    process.stderr.write(`run ${session.run_id} ${status}\n`);
    if (status === "failed") process.exitCode = 4;
  });
});

type RunOpts = LlmFlags & WorkspaceFlags & { param: string[]; mode?: string; appendToRun?: string };

addLlmFlags(
  program
    .command("run")
    .description("Execute a playbook in plan or apply mode")
    .argument("<playbook>", "Path to the playbook document")
    .option("--param <key=value>", "Playbook parameter (repeatable)", collect, [])
    .addOption(new Option("--mode <mode>", "Override the playbook run_mode").choices(["plan", "apply"]))
    .option("--append-to-run <ref>", "Append to an existing run instead of starting a new one")
    .option("--workspace <dir>", "Workspace root", process.cwd())
).action(async (playbookPath: string, opts: RunOpts) => {
  await runAction(async () => {
    const params = parseParamAssignments(opts.param);
    const mode = opts.mode === undefined ? undefined : ExecutionMode.parse(opts.mode);
    const { settings, runtime } = await loadContext(opts);
    const res = await withInterrupt((signal) =>
      executePlaybook({
        workspace_dir: opts.workspace,
        playbook_path: playbookPath,
        params,
        mode,
        append_to_run: opts.appendToRun,
        settings,
        runtime,
        argv: process.argv.slice(2),
        signal,
        on_warning: warn
      })
    );
    if (res.outcome.text) process.stdout.write(`${res.outcome.text.trimEnd()}\n`);
    if (res.plan && !res.plan.ok) warn(`plan output could not be parsed: ${res.plan.error}`);
    if (res.plan?.ok) process.stderr.write(`plan: ${res.plan.plan.steps.length} step(s)\n`);
    process.stderr.write(
      `run ${res.run_id} closed (${res.mode}; ${res.outcome.allowed_calls} call(s) allowed, ${res.outcome.denied_calls} denied, ${res.outcome.artifacts.length} artifact(s))\n`
    );
    for (const rel of res.report) process.stderr.write(`report: ${rel}\n`);
  });
});

const runs = program.command("runs").description("Inspect recorded runs");

runs
  .command("list")
  .description("List runs, most recently updated first")
  .option("--json", "Print JSON", false)
  .option("--workspace <dir>", "Workspace root", process.cwd())
  .action(async (opts: WorkspaceFlags & { json: boolean }) => {
    await runAction(async () => {
      const { settings } = await resolveSettings({ workspace_dir: opts.workspace });
      const listed = await listRuns({
        workspace_dir: opts.workspace,
        stale_after_seconds: settings.runs.stale_after_seconds
      });
      if (opts.json) {
        process.stdout.write(`${JSON.stringify(listed, null, 2)}\n`);
        return;
      }
      process.stdout.write(listed.length ? `${formatRunsTable(listed)}\n` : "No runs yet.\n");
    });
  });

runs
  .command("show")
  .description("Show a run's manifest and recent events")
  .argument("<ref>", "Run id or run directory")
  .option("--tail <n>", "Number of trailing events to show", parseCount, 20)
  .option("--json", "Print JSON", false)
  .option("--workspace <dir>", "Workspace root", process.cwd())
  .action(async (ref: string, opts: WorkspaceFlags & { tail: number; json: boolean }) => {
    await runAction(async () => {
      const { settings } = await resolveSettings({ workspace_dir: opts.workspace });
      const details = await showRun({
        workspace_dir: opts.workspace,
        run_ref: ref,
        tail: opts.tail,
        stale_after_seconds: settings.runs.stale_after_seconds
      });
      process.stdout.write(opts.json ? `${JSON.stringify(details, null, 2)}\n` : `${formatRunShow(details)}\n`);
    });
  });

runs
  .command("tail")
  .description("Print a run's events, optionally following new ones")
  .argument("<ref>", "Run id or run directory")
  .option("--follow", "Keep waiting for new events", false)
  .option("--limit <n>", "Stop after this many events", parseCount)
  .option("--workspace <dir>", "Workspace root", process.cwd())
  .action(async (ref: string, opts: WorkspaceFlags & { follow: boolean; limit?: number }) => {
    await runAction(async () => {
      const dir = await resolveRunRef(opts.workspace, ref);
      await withInterrupt(async (signal) => {
        for await (const ev of tailEvents(dir, { follow: opts.follow, limit: opts.limit, signal })) {
          process.stdout.write(`${formatEventLine(ev)}\n`);
        }
      });
    });
  });

try {
  await program.parseAsync(process.argv);
} catch (e) {
  reportError(e);
  process.exitCode = e instanceof InterruptedError ? 130 : 1;
}
