import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { defaultSettings } from "../src/config/settings.js";
import { AgentRuntimeError } from "../src/core/errors.js";
import { openConversation, runOneShot } from "../src/engine/execute_conversation.js";
import { KNOWN_TOOLS } from "../src/engine/tool_catalog.js";
import { readEventLog } from "../src/ledger/event_log.js";
import { readManifest } from "../src/ledger/run_ledger.js";
import { listRunDirs } from "../src/ledger/run_ref.js";
import { ScriptedRuntime, toolCall } from "./helpers/scripted_runtime.js";

async function mkTmpDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "puk-"));
  return fs.realpath(dir);
}

async function eventsOf(runDir: string) {
  return (await readEventLog(path.join(runDir, "events.ndjson"))).events;
}

describe("conversations", () => {
  test("a one-shot prompt gets its own closed run", async () => {
    const root = await mkTmpDir();
    const runtime = new ScriptedRuntime([
      [
        { kind: "text", text: "hi " },
        { kind: "text", text: "there" },
        { kind: "done", status: "completed" }
      ]
    ]);
    const res = await runOneShot({
      workspace_dir: root,
      settings: defaultSettings(),
      runtime,
      prompt: "say hi",
      title: "say hi",
      argv: ["ask", "say hi"]
    });

    expect(res.outcome.text).toBe("hi there");
    expect(path.basename(res.run_dir).endsWith("-say-hi")).toBe(true);
    const manifest = await readManifest(res.run_dir);
    expect([manifest.status, manifest.mode, manifest.title]).toEqual(["closed", "oneshot", "say hi"]);

    const events = await eventsOf(res.run_dir);
    expect(events.map((e) => [e.seq, e.type, e.turn_id])).toEqual([
      [0, "session.start", null],
      [1, "input.user", 0],
      [2, "context.resolved", 0],
      [3, "model.output", 0],
      [4, "artifact.write", null],
      [5, "artifact.write", null],
      [6, "session.end", null],
      [7, "status.change", null]
    ]);
    const start = events[0];
    expect(start.type === "session.start" && start.data).toEqual({
      mode: "oneshot",
      argv: ["ask", "say hi"],
      workspace: root,
      append: false,
      prior_status: null
    });
    const output = events[3];
    expect(output.type === "model.output" && output.data.text).toBe("hi there");
  });

  test("a failed one-shot turn fails the run", async () => {
    const root = await mkTmpDir();
    const runtime = new ScriptedRuntime([[{ kind: "done", status: "failed", error: "quota" }]]);
    const err = await runOneShot({ workspace_dir: root, settings: defaultSettings(), runtime, prompt: "x" }).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(AgentRuntimeError);
    const [runDir] = await listRunDirs(root);
    expect((await readManifest(runDir)).status).toBe("failed");
    const events = await eventsOf(runDir);
    const end = events[events.length - 2];
    expect(end.type === "session.end" && end.data).toEqual({ status: "failed", reason: "1 turn(s) failed" });
  });

  test("repl turns share one run with increasing turn ids", async () => {
    const root = await mkTmpDir();
    const runtime = new ScriptedRuntime([
      [{ kind: "text", text: "one" }, { kind: "done", status: "completed" }],
      [{ kind: "text", text: "two" }, { kind: "done", status: "completed" }]
    ]);
    const session = await openConversation({ workspace_dir: root, mode: "repl", settings: defaultSettings(), runtime });
    expect((await session.ask("first")).text).toBe("one");
    expect((await session.ask("second")).text).toBe("two");
    expect(await session.close()).toBe("closed");

    const inputs = (await eventsOf(session.run_dir)).flatMap((e) =>
      e.type === "input.user" ? [[e.turn_id, e.data.text]] : []
    );
    expect(inputs).toEqual([
      [0, "first"],
      [1, "second"]
    ]);
    expect((await readManifest(session.run_dir)).mode).toBe("repl");
  });

  test("a failed repl turn does not end the session but fails the run", async () => {
    const root = await mkTmpDir();
    const runtime = new ScriptedRuntime([
      [{ kind: "crash", message: "connection reset" }],
      [{ kind: "text", text: "recovered" }, { kind: "done", status: "completed" }]
    ]);
    const session = await openConversation({ workspace_dir: root, mode: "repl", settings: defaultSettings(), runtime });
    const bad = await session.ask("first");
    expect([bad.status, bad.error]).toEqual(["failed", "connection reset"]);
    const good = await session.ask("second");
    expect(good.status).toBe("completed");
    expect(await session.close()).toBe("failed");
    expect((await readManifest(session.run_dir)).status).toBe("failed");
  });

  test("conversations write anywhere inside the workspace", async () => {
    const root = await mkTmpDir();
    const runtime = new ScriptedRuntime([
      [
        {
          kind: "tool",
          call: toolCall("c1", "write_file", { path: "notes.txt" }),
          perform: () => fs.writeFile(path.join(root, "notes.txt"), "note\n")
        },
        {
          kind: "tool",
          call: toolCall("c2", "write_file", { path: "../escape.txt" }),
          perform: () => fs.writeFile(path.join(root, "..", "escape.txt"), "x")
        },
        { kind: "done", status: "completed" }
      ]
    ]);
    const res = await runOneShot({ workspace_dir: root, settings: defaultSettings(), runtime, prompt: "take notes" });

    expect(runtime.requests[0].tools).toHaveLength(KNOWN_TOOLS.length);
    expect(runtime.requests[0].deny_mutation).toBe(false);
    expect(runtime.decisions.map((d) => d.decision)).toEqual([
      { allowed: true, reason: "in_write_scope" },
      { allowed: false, reason: "outside_root" }
    ]);
    expect(res.outcome.artifacts).toEqual(["artifacts/changes/3-write_file.diff"]);
    expect(await fs.readFile(path.join(root, "notes.txt"), { encoding: "utf8" })).toBe("note\n");
  });

  test("session.tools restricts the tools a conversation may use", async () => {
    const root = await mkTmpDir();
    const base = defaultSettings();
    const runtime = new ScriptedRuntime([
      [
        { kind: "tool", call: toolCall("c1", "write_file", { path: "notes.txt" }) },
        { kind: "tool", call: toolCall("c2", "read_file", { path: "notes.txt" }) },
        { kind: "done", status: "completed" }
      ]
    ]);
    await runOneShot({
      workspace_dir: root,
      settings: { ...base, session: { tools: ["read_file"] } },
      runtime,
      prompt: "look"
    });
    expect(runtime.requests[0].tools).toEqual([{ name: "read_file", mutating: false, allowed: true }]);
    expect(runtime.decisions.map((d) => d.decision)).toEqual([
      { allowed: false, reason: "tool_not_allowed" },
      { allowed: true, reason: "read_only" }
    ]);
  });

  test("a one-shot prompt can append to an earlier run", async () => {
    const root = await mkTmpDir();
    const first = await runOneShot({
      workspace_dir: root,
      settings: defaultSettings(),
      runtime: new ScriptedRuntime([]),
      prompt: "one"
    });
    const second = await runOneShot({
      workspace_dir: root,
      settings: defaultSettings(),
      runtime: new ScriptedRuntime([]),
      prompt: "two",
      append_to_run: first.run_id
    });
    expect(second.run_id).toBe(first.run_id);
    const inputs = (await eventsOf(first.run_dir)).flatMap((e) =>
      e.type === "input.user" ? [[e.turn_id, e.data.text]] : []
    );
    expect(inputs).toEqual([
      [0, "one"],
      [1, "two"]
    ]);
  });
});
