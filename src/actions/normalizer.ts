import { parseCsv, type CsvRow } from "./csv.js";
import { failures, type ActionFailure } from "./errors.js";
import type { ValidatedArguments } from "./validator.js";
import {
  ok,
  err,
  type JsonRecord,
  type JsonValue,
  type NormalizedResult,
  type RawExecutionResult,
  type Result,
} from "./types.js";

export type Scalar =
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "boolean"; readonly value: boolean };

type Build<T> = (input: T, args: ValidatedArguments) => NormalizedResult;

/**
 * How an action's stdout is turned into a result. Chosen once per action
 * when the catalog is built; only `json-many` sniffs the shape at runtime.
 */
export type OutputDecoder =
  | { readonly shape: "csv"; readonly columns: readonly string[]; readonly build: Build<CsvRow[]> }
  | {
      readonly shape: "json-one";
      readonly build: Build<JsonRecord>;
      /** Synthesized result when the side effect happened but the echo is unreadable. */
      readonly fallback?: (args: ValidatedArguments) => NormalizedResult;
    }
  | { readonly shape: "json-many"; readonly build: Build<JsonRecord[]> }
  | { readonly shape: "scalar"; readonly build: Build<Scalar> }
  | { readonly shape: "none"; readonly build: (args: ValidatedArguments) => NormalizedResult };

export type OutputShape = OutputDecoder["shape"];

export function normalize(
  decoder: OutputDecoder,
  raw: RawExecutionResult,
  args: ValidatedArguments,
): Result<NormalizedResult, ActionFailure> {
  if (!raw.exitSucceeded) {
    return err(failures.toolFailure(raw.stderr.trim() || raw.stdout.trim(), raw.exitCode, raw.signal));
  }

  const stdout = stripBom(raw.stdout);

  switch (decoder.shape) {
    case "csv":
      return ok(decoder.build(parseCsv(stdout, decoder.columns), args));

    case "json-one": {
      const parsed = parseJsonRecords(stdout);
      const record = parsed.ok ? parsed.value[0] : undefined;
      if (record) return ok(decoder.build(record, args));
      if (decoder.fallback) return ok(decoder.fallback(args));
      return err(parsed.ok ? failures.malformed(stdout, "expected a JSON object") : parsed.error);
    }

    case "json-many": {
      if (stdout.trim().length === 0) return ok(decoder.build([], args));
      const parsed = parseJsonRecords(stdout);
      return parsed.ok ? ok(decoder.build(parsed.value, args)) : parsed;
    }

    case "scalar": {
      const scalar = parseScalar(stdout);
      return scalar ? ok(decoder.build(scalar, args)) : err(failures.malformed(stdout, "expected a count or boolean"));
    }

    case "none":
      return ok(decoder.build(args));
  }
}

/**
 * Sniffs the first non-whitespace character: `{` is one record, `[` a
 * sequence of records. Non-object array entries are dropped.
 */
export function parseJsonRecords(text: string): Result<JsonRecord[], ActionFailure> {
  const trimmed = stripBom(text).trim();
  const first = trimmed.charAt(0);
  if (first !== "{" && first !== "[") {
    return err(failures.malformed(text, "expected JSON"));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (e) {
    return err(failures.malformed(text, e instanceof Error ? e.message : String(e)));
  }

  if (Array.isArray(parsed)) return ok(parsed.filter(isJsonRecord));
  if (isJsonRecord(parsed)) return ok([parsed]);
  return err(failures.malformed(text, "expected a JSON object or array"));
}

export function parseScalar(text: string): Scalar | undefined {
  const trimmed = stripBom(text).trim();
  if (/^[+-]?\d+$/.test(trimmed)) {
    return { kind: "integer", value: Number.parseInt(trimmed, 10) };
  }
  const lower = trimmed.toLowerCase();
  if (lower === "true" || lower === "false") {
    return { kind: "boolean", value: lower === "true" };
  }
  return undefined;
}

export function existsFrom(scalar: Scalar): boolean {
  return scalar.kind === "integer" ? scalar.value > 0 : scalar.value;
}

// JSON.parse only yields JSON values, so any plain object is a JsonRecord.
function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

// Field decoders: a missing or mistyped field yields the typed default.

export function textField(record: JsonRecord, key: string, fallback = "unknown"): string {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return fallback;
}

export function intField(record: JsonRecord, key: string, fallback = 0): number {
  const value: JsonValue | undefined = record[key];
  if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === "string" && /^[+-]?\d+(\.\d+)?$/.test(value.trim())) {
    return Math.trunc(Number(value));
  }
  return fallback;
}
