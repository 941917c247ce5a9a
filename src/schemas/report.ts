import { z } from "zod";
import { IsoDateTime } from "./common.js";
import { RunMode, RunStatus } from "./run.js";

export const ToolCallOutcome = z.enum(["denied", "succeeded", "failed", "no_result"]);
export type ToolCallOutcome = z.infer<typeof ToolCallOutcome>;

export const ToolCallRecord = z
  .object({
    turn_id: z.number().int().nonnegative(),
    call_id: z.string(),
    name: z.string(),
    mutating: z.boolean(),
    reason: z.string(),
    target_paths: z.array(z.string()),
    // Workspace-relative targets of an allowed call.
    targets: z.array(z.string()),
    command: z.string().nullable(),
    outcome: ToolCallOutcome,
    error: z.string().nullable()
  })
  .strict();
export type ToolCallRecord = z.infer<typeof ToolCallRecord>;

export const RunReport = z
  .object({
    run_id: z.string().min(1),
    mode: RunMode,
    status: RunStatus,
    started_at: IsoDateTime,
    finished_at: IsoDateTime,
    turns: z.number().int().nonnegative(),
    tool_calls: z.array(ToolCallRecord),
    files_touched: z.array(z.string()),
    commands_run: z.array(z.string()),
    diffs: z.array(z.string()),
    warnings: z.array(z.string()),
    errors: z.array(z.string())
  })
  .strict();
export type RunReport = z.infer<typeof RunReport>;
