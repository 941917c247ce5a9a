import { ValidationError } from "../core/errors.js";
import { canonicalize } from "../sandbox/paths.js";
import type { ParameterDefinition } from "../schemas/playbook.js";
import type { Playbook } from "./load_playbook.js";

export type ParameterValue = string | number | boolean;
export type ResolvedParameters = Record<string, ParameterValue>;

const TRUE_WORDS = new Set(["true", "1", "yes"]);
const FALSE_WORDS = new Set(["false", "0", "no"]);
const INTEGER_RE = /^[+-]?\d+$/;

function conversionError(name: string, expected: string, value: unknown): ValidationError {
  return new ValidationError(
    "type_conversion",
    `Parameter '${name}' must be ${expected} (got '${String(value)}')`,
    { key: name }
  );
}

function toInteger(name: string, value: ParameterValue): number {
  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) return value;
    throw conversionError(name, "an integer", value);
  }
  if (typeof value === "string" && INTEGER_RE.test(value.trim())) {
    const n = Number(value.trim());
    if (Number.isSafeInteger(n)) return n;
  }
  throw conversionError(name, "an integer", value);
}

function toFloat(name: string, value: ParameterValue): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim().length > 0) {
    const n = Number(value.trim());
    if (Number.isFinite(n)) return n;
  }
  throw conversionError(name, "a finite number", value);
}

function toBoolean(name: string, value: ParameterValue): boolean {
  if (typeof value === "boolean") return value;
  const word = String(value).trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw conversionError(name, "a boolean (true/false, yes/no, 1/0)", value);
}

async function convert(
  name: string,
  def: ParameterDefinition,
  value: ParameterValue,
  sandboxRoot: string
): Promise<ParameterValue> {
  switch (def.type) {
    case "string":
      return String(value);
    case "integer":
      return toInteger(name, value);
    case "float":
      return toFloat(name, value);
    case "boolean":
      return toBoolean(name, value);
    case "enum": {
      const allowed = def.enum_values ?? [];
      const s = String(value);
      if (!allowed.includes(s)) {
        throw conversionError(name, `one of ${allowed.join(", ")}`, value);
      }
      return s;
    }
    case "path": {
      const res = await canonicalize(String(value), sandboxRoot);
      if (!res.ok) {
        throw new ValidationError(
          "path_escape",
          `Parameter '${name}' path escapes workspace: '${String(value)}' (${res.reason})`,
          { key: name }
        );
      }
      return res.absolute;
    }
  }
}

/**
 * Binds caller overrides against the playbook's declarations. Fails on the
 * first problem; unknown override keys are checked before anything else.
 */
export async function resolveParameters(
  playbook: Pick<Playbook, "parameters">,
  overrides: Record<string, string>,
  sandboxRoot: string
): Promise<ResolvedParameters> {
  const unknown = Object.keys(overrides)
    .filter((k) => !Object.hasOwn(playbook.parameters, k))
    .sort();
  if (unknown.length) {
    throw new ValidationError("unknown_parameter", `Unknown parameter(s): ${unknown.join(", ")}`, {
      key: unknown[0]
    });
  }

  const resolved: ResolvedParameters = {};
  for (const [name, def] of Object.entries(playbook.parameters)) {
    let raw: ParameterValue;
    if (Object.hasOwn(overrides, name)) {
      raw = overrides[name];
    } else if (def.default !== undefined && def.default !== null) {
      raw = def.default;
    } else if (def.required) {
      throw new ValidationError("missing_parameter", `Missing required parameter '${name}'`, { key: name });
    } else {
      continue;
    }
    resolved[name] = await convert(name, def, raw, sandboxRoot);
  }
  return resolved;
}

/** Parses repeated `--param key=value` flags; later assignments win. */
export function parseParamAssignments(assignments: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const item of assignments) {
    const eq = item.indexOf("=");
    if (eq === -1) {
      throw new ValidationError("invalid_assignment", `Parameters must be given as key=value (got '${item}')`);
    }
    const key = item.slice(0, eq).trim();
    if (!key) {
      throw new ValidationError("invalid_assignment", `Parameter name cannot be empty (got '${item}')`);
    }
    out[key] = item.slice(eq + 1);
  }
  return out;
}
