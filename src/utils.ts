export function trimTo(s: string | undefined, n = 300): string | undefined {
  if (!s) return s;
  const t = collapseWhitespace(s);
  return t.length > n ? t.slice(0, n - 1) + "…" : t;
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export function nowIso(): string {
  return new Date().toISOString();
}

export async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

// Models like to wrap JSON in ```json fences even when told not to.
export function stripCodeFences(text: string): string {
  const t = text.trim();
  const fenced = t.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/);
  return (fenced ? fenced[1] : t).trim();
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
