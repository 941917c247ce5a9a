export function nowIso(): string {
  return new Date().toISOString();
}

// Run directory names must be filesystem-safe on every platform, so no colons.
export function runDirTimestamp(d: Date = new Date()): string {
  return d.toISOString().replace(/\.\d{3}Z$/, "Z").replace(/:/g, "-");
}

export function laterIso(previous: string, candidate: string): string {
  return Date.parse(candidate) >= Date.parse(previous) ? candidate : previous;
}
