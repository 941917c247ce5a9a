import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { defaultSettings } from "../src/config/settings.js";
import {
  AgentRuntimeError,
  InterruptedError,
  PolicyViolationError,
  ValidationError
} from "../src/core/errors.js";
import { executePlaybook } from "../src/engine/execute_playbook.js";
import { buildCapabilities } from "../src/engine/tool_catalog.js";
import { readEventLog } from "../src/ledger/event_log.js";
import { readManifest } from "../src/ledger/run_ledger.js";
import { listRunDirs } from "../src/ledger/run_ref.js";
import type { Settings } from "../src/schemas/settings.js";
import { pathExists } from "../src/store/fs.js";
import { ScriptedRuntime, toolCall } from "./helpers/scripted_runtime.js";

async function mkTmpDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "puk-"));
  return fs.realpath(dir);
}

const WRITE_NOTE = `---
id: write-note
version: "1.0"
description: Write a note
parameters:
  output_dir:
    type: path
    default: out
  message:
    type: string
    required: true
allowed_tools: [read_file, write_file]
write_scope: ["out/**"]
run_mode: plan
owner: ops
---
Write {{message}} to {{output_dir}}/x.txt.
`;

const PLAN_TEXT = 'Planned.\n```json\n{"steps":[{"description":"write x","tools":["write_file"],"files":["out/x.txt"]}]}\n```';

async function setup(): Promise<{ root: string; playbook: string }> {
  const root = await mkTmpDir();
  const playbook = path.join(root, "playbooks", "write-note.md");
  await fs.mkdir(path.dirname(playbook), { recursive: true });
  await fs.writeFile(playbook, WRITE_NOTE);
  return { root, playbook };
}

async function eventsOf(runDir: string) {
  return (await readEventLog(path.join(runDir, "events.ndjson"))).events;
}

const WRITE_X = toolCall("c1", "write_file", { path: "out/x.txt", content: "hello\n" });

describe("executePlaybook", () => {
  test("plan mode records the plan and refuses the write", async () => {
    const { root, playbook } = await setup();
    const runtime = new ScriptedRuntime([
      [
        { kind: "text", text: PLAN_TEXT },
        {
          kind: "tool",
          call: WRITE_X,
          perform: () => fs.writeFile(path.join(root, "out", "x.txt"), "hello\n")
        },
        { kind: "done", status: "completed" }
      ]
    ]);
    const warnings: string[] = [];

    const res = await executePlaybook({
      workspace_dir: root,
      playbook_path: playbook,
      params: { message: "hello" },
      settings: defaultSettings(),
      runtime,
      on_warning: (w) => warnings.push(w)
    });

    expect(res.mode).toBe("plan");
    expect(res.state).toBe("succeeded");
    expect(res.outcome.denied_calls).toBe(1);
    expect(res.report).toEqual([]);
    expect(res.plan).toEqual({
      ok: true,
      plan: { steps: [{ description: "write x", tools: ["write_file"], files: ["out/x.txt"] }] }
    });
    expect(warnings).toEqual([`Playbook '${playbook}': ignoring unknown front-matter key 'owner'`]);
    expect(await pathExists(path.join(root, "out"))).toBe(false);
    expect(runtime.requests[0].deny_mutation).toBe(true);
    expect(runtime.requests[0].tools).toEqual(buildCapabilities(["read_file", "write_file"], "plan"));
    expect(runtime.decisions.map((d) => d.decision)).toEqual([{ allowed: false, reason: "plan_mode_mutation" }]);

    const events = await eventsOf(res.run_dir);
    expect(events.map((e) => e.type)).toEqual([
      "session.start",
      "context.resolved",
      "input.user",
      "model.output",
      "tool.call",
      "tool.result",
      "playbook.plan",
      "session.end",
      "status.change"
    ]);
    expect(events.map((e) => e.seq)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    const ctx = events[1];
    expect(ctx.type === "context.resolved" && ctx.data.items).toEqual([
      {
        type: "playbook",
        id: "write-note",
        version: "1.0",
        mode: "plan",
        parameters: { output_dir: path.join(root, "out"), message: "hello" }
      }
    ]);
    const result = events[5];
    expect(result.type === "tool.result" && result.data).toEqual({
      call_id: "c1",
      name: "write_file",
      ok: false,
      denied: true,
      reason: "plan_mode_mutation"
    });
    const manifest = await readManifest(res.run_dir);
    expect([manifest.status, manifest.mode, manifest.title]).toEqual(["closed", "playbook", "write-note"]);
  });

  test("apply mode performs the write and records its diff", async () => {
    const { root, playbook } = await setup();
    const runtime = new ScriptedRuntime([
      [
        {
          kind: "tool",
          call: WRITE_X,
          perform: async () => {
            await fs.writeFile(path.join(root, "out", "x.txt"), "hello\n");
            return "written";
          }
        },
        { kind: "text", text: "done" },
        { kind: "done", status: "completed" }
      ]
    ]);

    const res = await executePlaybook({
      workspace_dir: root,
      playbook_path: playbook,
      params: { message: "hello" },
      mode: "apply",
      settings: defaultSettings(),
      runtime
    });

    expect(res.mode).toBe("apply");
    expect(res.plan).toBe(null);
    expect(res.outcome.text).toBe("done");
    expect(res.outcome.artifacts).toEqual(["artifacts/changes/3-write_file.diff"]);
    expect(await fs.readFile(path.join(root, "out", "x.txt"), { encoding: "utf8" })).toBe("hello\n");
    expect(runtime.requests[0].deny_mutation).toBe(false);

    const events = await eventsOf(res.run_dir);
    expect(events.map((e) => e.type)).toEqual([
      "session.start",
      "context.resolved",
      "input.user",
      "tool.call",
      "tool.result",
      "artifact.write",
      "model.output",
      "artifact.write",
      "artifact.write",
      "session.end",
      "status.change"
    ]);
    expect(res.report).toEqual(["artifacts/reports/0-report.json", "artifacts/reports/0-report.md"]);
    const patch = await fs.readFile(path.join(res.run_dir, "artifacts", "changes", "3-write_file.diff"), {
      encoding: "utf8"
    });
    expect(patch).toContain("+++ b/out/x.txt");
    expect(patch.split("\n")).toContain("+hello");
    const written = events[5];
    expect(written.type === "artifact.write" && written.data).toEqual({
      path: "artifacts/changes/3-write_file.diff",
      summary: "write_file: out/x.txt",
      bytes: Buffer.byteLength(patch, "utf8"),
      call_id: "c1"
    });
    const result = events[4];
    expect(result.type === "tool.result" && [result.data.ok, result.data.denied, result.data.output]).toEqual([
      true,
      false,
      "written"
    ]);
  });

  test("apply mode refuses writes outside the scope and tools outside the allowlist", async () => {
    const { root, playbook } = await setup();
    const runtime = new ScriptedRuntime([
      [
        {
          kind: "tool",
          call: toolCall("c1", "write_file", { path: "src/evil.ts" }),
          perform: () => fs.writeFile(path.join(root, "src", "evil.ts"), "x")
        },
        { kind: "tool", call: toolCall("c2", "delete_path", { path: "out/x.txt" }) },
        { kind: "done", status: "completed" }
      ]
    ]);

    const res = await executePlaybook({
      workspace_dir: root,
      playbook_path: playbook,
      params: { message: "hi" },
      mode: "apply",
      settings: defaultSettings(),
      runtime
    });

    expect(res.outcome.denied_calls).toBe(2);
    expect(await pathExists(path.join(root, "src", "evil.ts"))).toBe(false);
    const denials = (await eventsOf(res.run_dir)).flatMap((e) =>
      e.type === "tool.result" ? [[e.data.call_id, e.data.denied, e.data.reason]] : []
    );
    expect(denials).toEqual([
      ["c1", true, "outside_write_scope"],
      ["c2", true, "tool_not_allowed"]
    ]);
    expect((await readManifest(res.run_dir)).status).toBe("closed");
  });

  test("a runtime failure fails the run", async () => {
    const { root, playbook } = await setup();
    const runtime = new ScriptedRuntime([
      [
        { kind: "text", text: "oops" },
        { kind: "done", status: "failed", error: "model exploded" }
      ]
    ]);

    const err = await executePlaybook({
      workspace_dir: root,
      playbook_path: playbook,
      params: { message: "hi" },
      settings: defaultSettings(),
      runtime
    }).catch((e: unknown) => e);

    const [runDir] = await listRunDirs(root);
    const manifest = await readManifest(runDir);
    expect(err).toBeInstanceOf(AgentRuntimeError);
    expect(err instanceof Error && err.message).toBe(`Agent runtime failed (run ${manifest.run_id}): model exploded`);
    expect(manifest.status).toBe("failed");

    const events = await eventsOf(runDir);
    expect(events.map((e) => e.type)).toEqual([
      "session.start",
      "context.resolved",
      "input.user",
      "model.output",
      "session.end",
      "status.change"
    ]);
    const end = events[4];
    expect(end.type === "session.end" && end.data).toEqual({
      status: "failed",
      reason: "agent runtime failure",
      error: "model exploded"
    });
    const change = events[5];
    expect(change.type === "status.change" && change.data).toEqual({
      from: "open",
      to: "failed",
      reason: "agent runtime failure"
    });
  });

  test("a runtime that crashes or stops early fails the run", async () => {
    const { root, playbook } = await setup();
    const base = { workspace_dir: root, playbook_path: playbook, params: { message: "hi" }, settings: defaultSettings() };

    await expect(
      executePlaybook({ ...base, runtime: new ScriptedRuntime([[{ kind: "crash", message: "bridge died" }]]) })
    ).rejects.toThrow(/: bridge died$/);
    await expect(
      executePlaybook({ ...base, runtime: new ScriptedRuntime([[{ kind: "text", text: "partial" }]]) })
    ).rejects.toThrow(/: agent runtime ended without reporting completion$/);

    const statuses = await Promise.all((await listRunDirs(root)).map(async (d) => (await readManifest(d)).status));
    expect(statuses).toEqual(["failed", "failed"]);
  });

  test("validation problems are reported before a run exists", async () => {
    const { root, playbook } = await setup();
    const runtime = new ScriptedRuntime([]);
    const base = { workspace_dir: root, playbook_path: playbook, settings: defaultSettings(), runtime };

    await expect(executePlaybook({ ...base, params: {} })).rejects.toBeInstanceOf(ValidationError);
    await expect(executePlaybook({ ...base, params: { message: "hi", extra: "1" } })).rejects.toThrow(
      "Unknown parameter(s): extra"
    );
    await expect(
      executePlaybook({ ...base, params: { message: "hi", output_dir: "src" }, mode: "apply" })
    ).rejects.toBeInstanceOf(PolicyViolationError);
    await expect(
      executePlaybook({ ...base, playbook_path: path.join(root, "missing.md"), params: {} })
    ).rejects.toThrow("file does not exist");

    expect(runtime.requests).toHaveLength(0);
    expect(await pathExists(path.join(root, ".puk"))).toBe(false);
  });

  test("appending continues the existing run", async () => {
    const { root, playbook } = await setup();
    const first = await executePlaybook({
      workspace_dir: root,
      playbook_path: playbook,
      params: { message: "hi" },
      settings: defaultSettings(),
      runtime: new ScriptedRuntime([[{ kind: "text", text: PLAN_TEXT }, { kind: "done", status: "completed" }]])
    });

    const second = await executePlaybook({
      workspace_dir: root,
      playbook_path: playbook,
      params: { message: "hi" },
      mode: "apply",
      append_to_run: first.run_id,
      settings: defaultSettings(),
      runtime: new ScriptedRuntime([[{ kind: "done", status: "completed" }]])
    });

    expect(second.run_id).toBe(first.run_id);
    expect(second.run_dir).toBe(first.run_dir);
    expect(await listRunDirs(root)).toHaveLength(1);

    const events = await eventsOf(first.run_dir);
    expect(events.map((e) => e.seq)).toEqual(events.map((_, i) => i));
    const appended = events.slice(7);
    expect(appended.map((e) => [e.type, e.turn_id])).toEqual([
      ["status.change", null],
      ["session.start", null],
      ["context.resolved", 1],
      ["input.user", 1],
      ["artifact.write", null],
      ["artifact.write", null],
      ["session.end", null],
      ["status.change", null]
    ]);
    const start = appended[1];
    expect(start.type === "session.start" && [start.data.append, start.data.prior_status]).toEqual([true, "closed"]);
    expect(second.report).toEqual(["artifacts/reports/8-report.json", "artifacts/reports/8-report.md"]);
    expect((await readManifest(first.run_dir)).status).toBe("closed");
  });

  test("an interrupt fails the run and releases it", async () => {
    const { root, playbook } = await setup();
    const controller = new AbortController();
    const runtime = new ScriptedRuntime([
      [
        { kind: "text", text: "thinking" },
        { kind: "hook", fn: () => controller.abort() },
        { kind: "wait_for_abort" }
      ]
    ]);

    await expect(
      executePlaybook({
        workspace_dir: root,
        playbook_path: playbook,
        params: { message: "hi" },
        settings: defaultSettings(),
        runtime,
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(InterruptedError);

    const [runDir] = await listRunDirs(root);
    expect((await readManifest(runDir)).status).toBe("failed");
    expect(await pathExists(path.join(runDir, "run.lock"))).toBe(false);
    const events = await eventsOf(runDir);
    expect(events.map((e) => e.type)).toEqual([
      "session.start",
      "context.resolved",
      "input.user",
      "session.end",
      "status.change"
    ]);
    const end = events[3];
    expect(end.type === "session.end" && end.data).toEqual({
      status: "failed",
      reason: "interrupted",
      error: "Interrupted"
    });
  });

  test("an already aborted signal starts nothing", async () => {
    const { root, playbook } = await setup();
    const controller = new AbortController();
    controller.abort();
    await expect(
      executePlaybook({
        workspace_dir: root,
        playbook_path: playbook,
        params: { message: "hi" },
        settings: defaultSettings(),
        runtime: new ScriptedRuntime([]),
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(InterruptedError);
    expect(await pathExists(path.join(root, ".puk"))).toBe(false);
  });

  test("the manifest captures the LLM settings of the run", async () => {
    const { root, playbook } = await setup();
    const base = defaultSettings();
    const settings: Settings = {
      ...base,
      llm: {
        ...base.llm,
        provider: "openai",
        model: "gpt-test",
        api_key: "test-secret",
        temperature: 0.5,
        max_output_tokens: 512
      }
    };
    const runtime = new ScriptedRuntime([[{ kind: "done", status: "completed" }]]);
    const res = await executePlaybook({
      workspace_dir: root,
      playbook_path: playbook,
      params: { message: "hi" },
      settings,
      runtime
    });
    expect((await readManifest(res.run_dir)).llm).toEqual({
      provider: "openai",
      model: "gpt-test",
      temperature: 0.5,
      max_output_tokens: 512
    });
    expect(runtime.requests[0].llm.model).toBe("gpt-test");
  });
});
