export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Parses an integer cell ("2020", " 2020.0 "); anything else is undefined. */
export function parseIntCell(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? Math.trunc(v) : undefined;
  const s = asString(v)?.trim();
  if (!s || !NUMERIC.test(s)) return undefined;
  return Math.trunc(Number(s));
}

/** Missing or unparseable years surface as null, never as an exception. */
export function parseYear(v: unknown): number | null {
  return parseIntCell(v) ?? null;
}

export function nonEmpty(v: unknown): string | null {
  const s = asString(v);
  return s && s.length > 0 ? s : null;
}
