const compiled = new Map<string, RegExp>();

function escapeRegex(ch: string): string {
  return /[\\^$.*+?()[\]{}|/]/.test(ch) ? `\\${ch}` : ch;
}

// `[abc]`, `[a-z]` and negated `[!x]` / `[^x]`; an unclosed `[` is literal.
function bracketToRegex(seg: string, open: number): { source: string; end: number } | null {
  let i = open + 1;
  let negate = false;
  if (seg[i] === "!" || seg[i] === "^") {
    negate = true;
    i += 1;
  }
  const start = i;
  // A `]` right after the opening is a member, not the close.
  if (seg[i] === "]") i += 1;
  while (i < seg.length && seg[i] !== "]") i += 1;
  if (i >= seg.length) return null;
  const body = [...seg.slice(start, i)].map((ch) => (ch === "-" ? "-" : escapeRegex(ch))).join("");
  return { source: negate ? `[^/${body}]` : `[${body}]`, end: i };
}

function segmentToRegex(seg: string): string {
  let out = "";
  for (let i = 0; i < seg.length; i += 1) {
    const ch = seg[i];
    if (ch === "*") out += "[^/]*";
    else if (ch === "?") out += "[^/]";
    else if (ch === "[") {
      const cls = bracketToRegex(seg, i);
      if (cls) {
        out += cls.source;
        i = cls.end;
      } else {
        out += escapeRegex(ch);
      }
    } else out += escapeRegex(ch);
  }
  return out;
}

export function normalizeGlobPattern(pattern: string): string {
  let p = pattern.trim().replace(/\\/g, "/").replace(/\/{2,}/g, "/");
  while (p.startsWith("./")) p = p.slice(2);
  while (p.startsWith("/")) p = p.slice(1);
  // "out/" means everything under out.
  if (p.endsWith("/")) p = `${p}**`;
  return p;
}

/**
 * Segment-aware glob: `*`, `?` and `[...]` never cross `/`, a whole `**` segment spans
 * zero or more segments, so `out/**` also matches `out` itself.
 */
export function globToRegExp(pattern: string): RegExp {
  const normalized = normalizeGlobPattern(pattern);
  const cached = compiled.get(normalized);
  if (cached) return cached;

  const segs = normalized.split("/");
  let body = "";
  let joinNext = false;
  segs.forEach((seg, idx) => {
    const isFirst = idx === 0;
    const isLast = idx === segs.length - 1;
    if (seg === "**") {
      if (isLast) {
        body += isFirst || joinNext ? ".*" : "(?:/.*)?";
      } else {
        body += `${isFirst || joinNext ? "" : "/"}(?:[^/]+/)*`;
        joinNext = true;
      }
      return;
    }
    body += `${isFirst || joinNext ? "" : "/"}${segmentToRegex(seg)}`;
    joinNext = false;
  });

  const re = new RegExp(`^${body}$`);
  compiled.set(normalized, re);
  return re;
}

export function matchesGlob(relativePath: string, pattern: string): boolean {
  if (normalizeGlobPattern(pattern).length === 0) return false;
  return globToRegExp(pattern).test(relativePath);
}
