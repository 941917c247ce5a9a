import YAML from "yaml";
import { errorMessage } from "../core/errors.js";

export type FrontMatterParseResult =
  | {
      ok: true;
      frontmatter: unknown;
      body: string;
    }
  | {
      ok: false;
      error: string;
    };

const BOUNDARY = "---";

export function parseFrontMatter(text: string): FrontMatterParseResult {
  const source = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const lines = source.split(/\r?\n/);
  // Strict: the block must open on the very first line.
  if (lines.length === 0 || lines[0].trim() !== BOUNDARY) {
    return { ok: false, error: "missing front-matter block (first line must be '---')" };
  }

  let endIdx = -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === BOUNDARY) {
      endIdx = i;
      break;
    }
  }
  if (endIdx === -1) return { ok: false, error: "front-matter block is not closed" };

  let frontmatter: unknown;
  try {
    frontmatter = YAML.parse(lines.slice(1, endIdx).join("\n"));
  } catch (e) {
    return { ok: false, error: `front-matter is not valid YAML: ${errorMessage(e)}` };
  }

  const body = lines
    .slice(endIdx + 1)
    .join("\n")
    .replace(/^\n+/, "");
  return { ok: true, frontmatter, body };
}
