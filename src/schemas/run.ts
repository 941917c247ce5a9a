import { z } from "zod";
import { IsoDateTime } from "./common.js";

export const RunStatus = z.enum(["open", "closed", "failed"]);
export type RunStatus = z.infer<typeof RunStatus>;

export const RunMode = z.enum(["repl", "oneshot", "playbook"]);
export type RunMode = z.infer<typeof RunMode>;

// Captured once at creation for reproducibility; never recomputed.
export const RunLlmSnapshot = z
  .object({
    provider: z.string().min(1),
    model: z.string(),
    temperature: z.number().finite(),
    max_output_tokens: z.number().int().positive()
  })
  .strict();
export type RunLlmSnapshot = z.infer<typeof RunLlmSnapshot>;

export const RunManifest = z
  .object({
    run_id: z.string().min(1),
    created_at: IsoDateTime,
    updated_at: IsoDateTime,
    status: RunStatus,
    title: z.string(),
    mode: RunMode,
    workspace: z.string().min(1),
    llm: RunLlmSnapshot
  })
  .strict();
export type RunManifest = z.infer<typeof RunManifest>;
