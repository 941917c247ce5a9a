import { spawn } from "node:child_process";
import debug from "debug";
import { AgentRuntimeError, InterruptedError, ValidationError, errorMessage } from "../core/errors.js";
import type { AgentRunRequest, AgentRuntime, AgentRuntimeEvent } from "../engine/agent_runtime.js";
import { BridgeMessage, type EngineMessage } from "../schemas/bridge.js";

const log = debug("puk:agent");

const STDERR_TAIL_CHARS = 4000;

export type StdioRuntimeOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

type InboxItem = { kind: "message"; message: BridgeMessage } | { kind: "exit"; code: number | null; signal: string | null };

/** Single-consumer queue between the child's stdout and the event generator. */
class Inbox {
  private items: InboxItem[] = [];
  private waiter: { resolve: (item: InboxItem) => void; reject: (e: unknown) => void } | null = null;
  private failure: { error: unknown } | null = null;

  push(item: InboxItem): void {
    if (this.failure) return;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.resolve(item);
    } else {
      this.items.push(item);
    }
  }

  fail(error: unknown): void {
    if (this.failure) return;
    this.failure = { error };
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.reject(error);
    }
  }

  next(): Promise<InboxItem> {
    const item = this.items.shift();
    if (item) return Promise.resolve(item);
    if (this.failure) return Promise.reject(this.failure.error);
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }
}

export function splitCompleteLines(buffer: string): { lines: string[]; rest: string } {
  const parts = buffer.replace(/\r\n/g, "\n").split("\n");
  const rest = parts.pop() ?? "";
  return { lines: parts.filter((l) => l.trim().length > 0), rest };
}

async function* runBridge(
  command: readonly string[],
  opts: StdioRuntimeOptions,
  request: AgentRunRequest
): AsyncGenerator<AgentRuntimeEvent> {
  const [bin, ...argv] = command;
  const child = spawn(bin, argv, {
    cwd: opts.cwd,
    env: opts.env ?? process.env,
    stdio: ["pipe", "pipe", "pipe"]
  });
  log("spawned %s (pid %s)", command.join(" "), child.pid ?? "?");

  const inbox = new Inbox();
  let stdoutBuffer = "";
  let stderrTail = "";

  const send = (msg: EngineMessage): void => {
    if (child.stdin.destroyed || child.stdin.writableEnded) return;
    child.stdin.write(`${JSON.stringify(msg)}\n`, "utf8");
  };

  const handleLine = (line: string): void => {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (e) {
      inbox.fail(new AgentRuntimeError(`Agent bridge wrote an unparseable line: ${errorMessage(e)}`));
      return;
    }
    const parsed = BridgeMessage.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      inbox.fail(new AgentRuntimeError(`Agent bridge sent an invalid message: ${detail}`));
      return;
    }
    inbox.push({ kind: "message", message: parsed.data });
  };

  child.stdout.on("data", (buf: Buffer) => {
    stdoutBuffer += buf.toString("utf8");
    const split = splitCompleteLines(stdoutBuffer);
    stdoutBuffer = split.rest;
    for (const line of split.lines) handleLine(line);
  });
  child.stderr.on("data", (buf: Buffer) => {
    const text = buf.toString("utf8");
    log("bridge stderr: %s", text.trimEnd());
    stderrTail = (stderrTail + text).slice(-STDERR_TAIL_CHARS);
  });
  child.stdin.on("error", (e) => log("bridge stdin: %s", errorMessage(e)));
  child.on("error", (e) => {
    inbox.fail(new AgentRuntimeError(`Failed to start agent bridge '${bin}': ${errorMessage(e)}`, { cause: e }));
  });
  child.on("close", (code, signal) => {
    if (stdoutBuffer.trim()) handleLine(stdoutBuffer);
    stdoutBuffer = "";
    inbox.push({ kind: "exit", code, signal });
  });

  const onAbort = (): void => {
    child.kill();
    inbox.fail(new InterruptedError());
  };
  if (request.signal.aborted) onAbort();
  else request.signal.addEventListener("abort", onAbort, { once: true });

  try {
    send({
      type: "run",
      prompt: request.prompt,
      tools: request.tools,
      deny_mutation: request.deny_mutation,
      llm: request.llm
    });

    for (;;) {
      const item = await inbox.next();
      if (item.kind === "exit") {
        const how = item.signal ? `signal ${item.signal}` : `code ${String(item.code)}`;
        const tail = stderrTail.trim();
        throw new AgentRuntimeError(
          `Agent bridge exited (${how}) without reporting completion${tail ? `: ${tail}` : ""}`
        );
      }
      const msg = item.message;
      switch (msg.type) {
        case "text.delta":
          yield { type: "text.delta", text: msg.text };
          break;
        case "tool.request": {
          const decision = await request.intercept({
            call_id: msg.call_id,
            name: msg.name,
            arguments: msg.arguments
          });
          send({ type: "tool.decision", call_id: msg.call_id, allowed: decision.allowed, reason: decision.reason });
          break;
        }
        case "tool.result":
          yield { type: "tool.result", call_id: msg.call_id, ok: msg.ok, output: msg.output, error: msg.error };
          break;
        case "turn.end":
          yield { type: "turn.end" };
          break;
        case "done":
          yield { type: "terminal", status: msg.status, error: msg.error };
          return;
      }
    }
  } finally {
    request.signal.removeEventListener("abort", onAbort);
    child.stdin.end();
    if (child.exitCode === null && child.signalCode === null) child.kill();
  }
}

/**
 * Runs the configured bridge command once per turn and speaks NDJSON with it
 * over stdio. The bridge owns the model and the tools; every tool request is
 * answered with a tool.decision before the bridge may execute it.
 */
export function createStdioAgentRuntime(command: readonly string[], opts: StdioRuntimeOptions = {}): AgentRuntime {
  if (command.length === 0 || !command[0]) {
    throw new ValidationError(
      "invalid_settings",
      "No agent runtime configured: set agent.command in .puk.yaml or the global config"
    );
  }
  return {
    run: (request) => runBridge(command, opts, request)
  };
}
