import { z } from "zod";

export const IsoDateTime = z
  .string()
  .datetime({ offset: true })
  .or(z.string().datetime({ local: true }));

export const ExecutionMode = z.enum(["plan", "apply"]);
export type ExecutionMode = z.infer<typeof ExecutionMode>;
