import { ScriptError } from "./errors.js";

// PowerShell treats the typographic single quotes as literal delimiters too.
const SINGLE_QUOTES = /['‘’‚‛]/g;

const RAW = Symbol("raw");

/** A trusted script fragment inserted verbatim. Never build one from unescaped user input. */
export interface RawFragment {
  readonly [RAW]: string;
}

export type ScriptValue = string | number | boolean | RawFragment;

export function raw(text: string): RawFragment {
  return { [RAW]: text };
}

function isRaw(value: ScriptValue): value is RawFragment {
  return typeof value === "object" && RAW in value;
}

/** Single-quoted PowerShell literal; embedded quote characters are doubled. */
export function quote(value: string): string {
  if (value.includes("\0")) {
    throw new ScriptError("String values must not contain NUL characters");
  }
  return `'${value.replace(SINGLE_QUOTES, (q) => q + q)}'`;
}

export function literal(value: ScriptValue): string {
  if (isRaw(value)) return value[RAW];
  if (typeof value === "string") return quote(value);
  if (typeof value === "boolean") return value ? "$true" : "$false";
  if (!Number.isSafeInteger(value)) {
    throw new ScriptError(`Cannot embed non-integer number ${String(value)} in a script`);
  }
  return String(value);
}

/**
 * Tagged template for PowerShell statements. Every interpolation goes
 * through {@link literal}, so the template text alone decides the structure.
 *
 *   ps`Start-VM -Name ${name}`  // Start-VM -Name 'it''s'
 */
export function ps(strings: TemplateStringsArray, ...values: ScriptValue[]): string {
  let out = strings[0] ?? "";
  values.forEach((value, i) => {
    out += literal(value) + (strings[i + 1] ?? "");
  });
  return out;
}

/** Best-effort statement: its failure is swallowed inside the script. */
export function nonFatal(statement: string): string {
  return `try { ${statement} } catch { }`;
}

export function script(...statements: string[]): string {
  return statements.map((s) => s.trim()).filter((s) => s.length > 0).join("; ");
}

/**
 * Wraps an action script with the fixed preamble: progress output is
 * suppressed and cmdlet errors become terminating so they set the exit code.
 */
export function wrapScript(body: string): string {
  return `& { $ProgressPreference = 'SilentlyContinue'; $ErrorActionPreference = 'Stop'; ${body} }`;
}
