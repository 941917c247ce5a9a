import fs from "node:fs/promises";
import path from "node:path";
import debug from "debug";
import type { z } from "zod";
import { ValidationError, errorMessage } from "../core/errors.js";
import type { ExecutionMode } from "../schemas/common.js";
import {
  KNOWN_FRONT_MATTER_KEYS,
  PlaybookFrontMatter,
  REQUIRED_FRONT_MATTER_KEYS,
  type ParameterDefinition
} from "../schemas/playbook.js";
import { errnoCode } from "../store/fs.js";
import { parseFrontMatter } from "./frontmatter.js";

const log = debug("puk:playbook");

export type Playbook = {
  id: string;
  version: string;
  description: string;
  parameters: Record<string, ParameterDefinition>;
  allowed_tools: string[];
  write_scope: string[];
  run_mode: ExecutionMode;
  body: string;
  path: string;
  // Unrecognized front-matter keys are ignored, not fatal.
  warnings: string[];
};

function malformed(playbookPath: string, detail: string, cause?: unknown): ValidationError {
  return new ValidationError("malformed_playbook", `Malformed playbook '${playbookPath}': ${detail}`, { cause });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

function isPlainRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function parsePlaybook(text: string, playbookPath: string): Playbook {
  const fm = parseFrontMatter(text);
  if (!fm.ok) throw malformed(playbookPath, fm.error);
  if (!isPlainRecord(fm.frontmatter)) {
    throw malformed(playbookPath, "front-matter must be a YAML mapping");
  }
  const data = fm.frontmatter;

  const missing = REQUIRED_FRONT_MATTER_KEYS.filter((k) => !(k in data));
  if (missing.length) {
    throw malformed(playbookPath, `missing required front-matter field(s): ${missing.join(", ")}`);
  }

  const warnings = Object.keys(data)
    .filter((k) => !KNOWN_FRONT_MATTER_KEYS.has(k))
    .map((k) => `Playbook '${playbookPath}': ignoring unknown front-matter key '${k}'`);
  for (const w of warnings) log(w);

  const parsed = PlaybookFrontMatter.safeParse(data);
  if (!parsed.success) throw malformed(playbookPath, formatIssues(parsed.error));

  return {
    ...parsed.data,
    body: fm.body,
    path: playbookPath,
    warnings
  };
}

/** Loaded fresh on every invocation; the file is the only durable copy. */
export async function loadPlaybook(playbookPath: string): Promise<Playbook> {
  const abs = path.resolve(playbookPath);
  let text: string;
  try {
    text = await fs.readFile(abs, { encoding: "utf8" });
  } catch (e) {
    if (errnoCode(e) === "ENOENT") throw malformed(playbookPath, "file does not exist", e);
    throw malformed(playbookPath, `cannot read file: ${errorMessage(e)}`, e);
  }
  const playbook = parsePlaybook(text, abs);
  log("loaded playbook %s v%s from %s", playbook.id, playbook.version, abs);
  return playbook;
}
