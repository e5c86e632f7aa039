import type { JsonValue } from "./types.js";

export const UNKNOWN = "Unknown";

export type CodeTable = ReadonlyMap<number, string>;

export const VM_STATES: CodeTable = new Map([
  [2, "Running"],
  [3, "Stopped"],
  [6, "Saved"],
  [9, "Paused"],
]);

export const VHD_TYPES: CodeTable = new Map([
  [1, "FixedSize"],
  [2, "DynamicExpanding"],
  [3, "Differencing"],
]);

/**
 * Resolves a numeric code (or its string form) through `table`. A name that
 * already appears in the table passes through; anything else is Unknown.
 */
export function lookupCode(table: CodeTable, value: JsonValue | undefined): string {
  if (typeof value === "number") return table.get(value) ?? UNKNOWN;
  if (typeof value !== "string") return UNKNOWN;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return table.get(Number(trimmed)) ?? UNKNOWN;

  for (const name of table.values()) {
    if (name.toLowerCase() === trimmed.toLowerCase()) return name;
  }
  return UNKNOWN;
}
