import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { buildCapabilities, isMutatingTool } from "../src/engine/tool_catalog.js";
import { evaluateToolCall, extractTargetPaths, type ToolGateContext } from "../src/engine/tool_gate.js";

async function mkTmpDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "puk-"));
  return fs.realpath(dir);
}

function call(name: string, args: Record<string, unknown> = {}) {
  return { call_id: "c1", name, arguments: args };
}

describe("tool catalog", () => {
  test("classifies known tools and falls back to the name", () => {
    expect(isMutatingTool("read_file")).toBe(false);
    expect(isMutatingTool("write_file")).toBe(true);
    expect(isMutatingTool("shell_exec")).toBe(true);
    expect(isMutatingTool("custom_lookup")).toBe(false);
  });

  test("plan mode offers mutating tools as not allowed", () => {
    expect(buildCapabilities(["read_file", "write_file", "read_file"], "plan")).toEqual([
      { name: "read_file", mutating: false, allowed: true },
      { name: "write_file", mutating: true, allowed: false }
    ]);
    expect(buildCapabilities(["write_file"], "apply")).toEqual([{ name: "write_file", mutating: true, allowed: true }]);
  });
});

describe("tool gate", () => {
  test("collects target paths from the usual argument keys", () => {
    expect(extractTargetPaths({ path: "a", paths: ["b", "a"], src: "c", other: "d", cwd: 5 })).toEqual([
      "a",
      "b",
      "c"
    ]);
  });

  test("plan mode refuses mutating calls", async () => {
    const root = await mkTmpDir();
    const ctx: ToolGateContext = { mode: "plan", allowed_tools: ["read_file", "write_file"], write_scope: ["out/**"], root };
    expect(await evaluateToolCall(call("write_file", { path: "out/x.txt" }), ctx)).toEqual({
      allowed: false,
      rule_id: "mode.plan",
      reason: "plan_mode_mutation",
      mutating: true,
      target_paths: ["out/x.txt"]
    });
  });

  test("the allowlist is checked first", async () => {
    const root = await mkTmpDir();
    const ctx: ToolGateContext = { mode: "plan", allowed_tools: ["read_file"], write_scope: ["out/**"], root };
    const decision = await evaluateToolCall(call("delete_path", { path: "out/x.txt" }), ctx);
    expect([decision.allowed, decision.rule_id, decision.reason]).toEqual([false, "tool.allowlist", "tool_not_allowed"]);
  });

  test("apply mode allows mutating calls inside the write scope", async () => {
    const root = await mkTmpDir();
    const ctx: ToolGateContext = { mode: "apply", allowed_tools: ["write_file"], write_scope: ["out/**"], root };
    expect(await evaluateToolCall(call("write_file", { path: "out/x.txt" }), ctx)).toEqual({
      allowed: true,
      rule_id: "scope.write",
      reason: "in_write_scope",
      mutating: true,
      targets: [{ raw: "out/x.txt", absolute: path.join(root, "out", "x.txt"), relative: "out/x.txt" }],
      target_paths: ["out/x.txt"]
    });
  });

  test("apply mode refuses writes outside the scope or the root", async () => {
    const root = await mkTmpDir();
    const ctx: ToolGateContext = { mode: "apply", allowed_tools: null, write_scope: ["out/**"], root };
    const reasons = await Promise.all(
      [
        call("write_file", { path: "src/a.ts" }),
        call("write_file", { path: "../x.txt" }),
        call("write_file", {}),
        call("move_path", { src: "out/a.txt", dst: "src/a.txt" })
      ].map(async (c) => (await evaluateToolCall(c, ctx)).reason)
    );
    expect(reasons).toEqual(["outside_write_scope", "outside_root", "no_target_path", "outside_write_scope"]);
  });

  test("read-only calls need only stay inside the root", async () => {
    const root = await mkTmpDir();
    const ctx: ToolGateContext = { mode: "plan", allowed_tools: null, write_scope: ["out/**"], root };
    const inside = await evaluateToolCall(call("read_file", { path: "src/a.ts" }), ctx);
    expect([inside.allowed, inside.reason]).toEqual([true, "read_only"]);
    const outside = await evaluateToolCall(call("read_file", { path: "../secret.txt" }), ctx);
    expect([outside.allowed, outside.rule_id, outside.reason]).toEqual([false, "path.root", "outside_root"]);
  });

  test("a symlink followed by '..' cannot smuggle a write out of the root", async () => {
    const root = await mkTmpDir();
    const outside = await mkTmpDir();
    await fs.mkdir(path.join(outside, "sub"));
    await fs.symlink(path.join(outside, "sub"), path.join(root, "link"));
    const ctx: ToolGateContext = { mode: "apply", allowed_tools: null, write_scope: ["**"], root };
    const decision = await evaluateToolCall(call("write_file", { path: "link/../evil.txt" }), ctx);
    expect([decision.allowed, decision.rule_id, decision.reason]).toEqual([false, "scope.write", "outside_root"]);
  });
});
