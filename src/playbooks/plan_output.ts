import { z } from "zod";

export const PlanDocument = z.object({ steps: z.array(z.unknown()) }).passthrough();
export type PlanDocument = z.infer<typeof PlanDocument>;

export type PlanExtraction = { ok: true; plan: PlanDocument } | { ok: false; error: string };

const JSON_FENCE_RE = /```(?:json)?[ \t]*\r?\n([\s\S]*?)```/gi;

function tryJson(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

/**
 * Finds the JSON plan in free model text: fenced blocks first, then the whole
 * text, then the outermost brace span.
 */
export function extractPlanFromText(text: string): PlanExtraction {
  const trimmed = text.trim();
  if (!trimmed) return { ok: false, error: "plan output is empty" };

  const candidates = [...trimmed.matchAll(JSON_FENCE_RE)].map((m) => m[1]);
  candidates.push(trimmed);
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first !== -1 && last > first) candidates.push(trimmed.slice(first, last + 1));

  let sawJson = false;
  for (const candidate of candidates) {
    const parsed = tryJson(candidate);
    if (!parsed.ok) continue;
    sawJson = true;
    const plan = PlanDocument.safeParse(parsed.value);
    if (plan.success) return { ok: true, plan: plan.data };
  }
  return {
    ok: false,
    error: sawJson ? "plan output must be a JSON object with a 'steps' list" : "plan output is not valid JSON"
  };
}
