import { z } from "zod";

// Lines the agent bridge process writes to stdout, one JSON object each.
export const BridgeMessage = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text.delta"), text: z.string() }),
  z.object({
    type: z.literal("tool.request"),
    call_id: z.string().min(1),
    name: z.string().min(1),
    arguments: z.record(z.string(), z.unknown()).default({})
  }),
  z.object({
    type: z.literal("tool.result"),
    call_id: z.string().min(1),
    ok: z.boolean(),
    output: z.unknown().optional(),
    error: z.string().optional()
  }),
  z.object({ type: z.literal("turn.end") }),
  z.object({
    type: z.literal("done"),
    status: z.enum(["completed", "failed"]),
    error: z.string().optional()
  })
]);
export type BridgeMessage = z.infer<typeof BridgeMessage>;

export type EngineMessage =
  | {
      type: "run";
      prompt: string;
      tools: Array<{ name: string; mutating: boolean; allowed: boolean }>;
      deny_mutation: boolean;
      llm: Record<string, unknown>;
    }
  | { type: "tool.decision"; call_id: string; allowed: boolean; reason: string };
