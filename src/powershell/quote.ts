/**
 * PowerShell literal quoting.
 *
 * Caller data only ever reaches a script as a single-quoted literal, so
 * `$` and backticks are never interpreted.
 */

export type PsValue = string | number | boolean | null | PsValue[] | { [key: string]: PsValue };

/** PowerShell treats the typographic single quotes as quote characters too. */
const SINGLE_QUOTES = /['‘’‚‛]/g;

export function psString(value: string): string {
  return `'${value.replace(SINGLE_QUOTES, (q) => q + q)}'`;
}

export function psNumber(value: number): string {
  if (!Number.isFinite(value)) throw new RangeError(`Cannot write ${value} as a PowerShell number`);
  return String(value);
}

export function psBool(value: boolean): string {
  return value ? "$true" : "$false";
}

const BARE_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function psHashtable(record: { [key: string]: PsValue }): string {
  const entries = Object.entries(record).map(
    ([key, value]) => `${BARE_KEY.test(key) ? key : psString(key)} = ${psValue(value)}`,
  );
  return entries.length === 0 ? "@{}" : `@{ ${entries.join("; ")} }`;
}

export function psArray(values: readonly PsValue[]): string {
  return `@(${values.map(psValue).join(", ")})`;
}

export function psValue(value: PsValue): string {
  if (value === null) return "$null";
  if (typeof value === "string") return psString(value);
  if (typeof value === "number") return psNumber(value);
  if (typeof value === "boolean") return psBool(value);
  if (Array.isArray(value)) return psArray(value);
  return psHashtable(value);
}

/**
 * Base64 of the UTF-8 bytes, for passing file contents into a script
 * without any quoting or line-ending concerns.
 */
export function psBase64(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}
