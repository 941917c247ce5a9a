import { z } from "zod";
import { ExecutionMode, IsoDateTime } from "./common.js";
import { RunMode, RunStatus } from "./run.js";

const JsonRecord = z.record(z.string(), z.unknown());
const ParameterValue = z.union([z.string(), z.number(), z.boolean()]);

export const PlaybookContextItem = z
  .object({
    type: z.literal("playbook"),
    id: z.string(),
    version: z.string(),
    mode: ExecutionMode,
    parameters: z.record(z.string(), ParameterValue)
  })
  .strict();

export const EventData = {
  "session.start": z
    .object({
      mode: RunMode,
      argv: z.array(z.string()),
      workspace: z.string(),
      append: z.boolean(),
      prior_status: RunStatus.nullable()
    })
    .strict(),
  "session.end": z
    .object({
      status: RunStatus,
      reason: z.string(),
      error: z.string().optional()
    })
    .strict(),
  "input.user": z.object({ text: z.string() }).strict(),
  "context.resolved": z.object({ items: z.array(PlaybookContextItem) }).strict(),
  "model.output": z.object({ text: z.string() }).strict(),
  "tool.call": z
    .object({
      call_id: z.string(),
      name: z.string(),
      arguments: JsonRecord,
      mutating: z.boolean(),
      target_paths: z.array(z.string())
    })
    .strict(),
  "tool.result": z
    .object({
      call_id: z.string(),
      name: z.string(),
      ok: z.boolean(),
      denied: z.boolean(),
      reason: z.string().optional(),
      output: z.unknown().optional(),
      error: z.string().optional()
    })
    .strict(),
  "artifact.write": z
    .object({
      path: z.string(),
      summary: z.string(),
      bytes: z.number().int().nonnegative(),
      call_id: z.string().optional()
    })
    .strict(),
  "status.change": z
    .object({
      from: RunStatus.nullable(),
      to: RunStatus,
      reason: z.string()
    })
    .strict(),
  "playbook.plan": z
    .object({
      steps: z.array(z.unknown()).nullable(),
      error: z.string().nullable()
    })
    .strict()
} as const;

export type EventType = keyof typeof EventData;

function variant<T extends EventType>(type: T) {
  return z
    .object({
      seq: z.number().int().nonnegative(),
      timestamp: IsoDateTime,
      type: z.literal(type),
      run_id: z.string(),
      turn_id: z.number().int().nonnegative().nullable(),
      data: EventData[type]
    })
    .strict();
}

export const RunEvent = z.discriminatedUnion("type", [
  variant("session.start"),
  variant("session.end"),
  variant("input.user"),
  variant("context.resolved"),
  variant("model.output"),
  variant("tool.call"),
  variant("tool.result"),
  variant("artifact.write"),
  variant("status.change"),
  variant("playbook.plan")
]);
export type RunEvent = z.infer<typeof RunEvent>;

export type EventPayload<T extends EventType> = z.infer<(typeof EventData)[T]>;

/** What a caller supplies; the ledger assigns seq, timestamp and run_id. */
export type RunEventInput = {
  [T in EventType]: { type: T; turn_id?: number | null; data: EventPayload<T> };
}[EventType];

export type PlaybookContextItem = z.infer<typeof PlaybookContextItem>;
