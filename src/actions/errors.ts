import type { ParamKind } from "./types.js";

export type ValidationError =
  | {
      readonly kind: "MissingRequiredParameter";
      readonly parameter: string;
      readonly message: string;
    }
  | {
      readonly kind: "TypeMismatch";
      readonly parameter: string;
      readonly expected: ParamKind;
      readonly actual: unknown;
      readonly message: string;
    };

export type ExecutionError =
  | { readonly kind: "SpawnFailure"; readonly cause: string; readonly message: string }
  | { readonly kind: "Timeout"; readonly timeoutMs: number; readonly message: string }
  | {
      readonly kind: "OutputOverflow";
      readonly limitBytes: number;
      /** Output read before the limit was hit. */
      readonly raw: string;
      readonly message: string;
    };

export type ActionFailure =
  | ValidationError
  | ExecutionError
  | { readonly kind: "ActionNotFound"; readonly action: string; readonly message: string }
  | { readonly kind: "InvalidArgument"; readonly message: string }
  | {
      readonly kind: "ToolExecutionFailure";
      readonly stderr: string;
      readonly exitCode: number;
      readonly signal?: string;
      readonly message: string;
    }
  | { readonly kind: "MalformedOutput"; readonly raw: string; readonly message: string }
  | { readonly kind: "PreconditionFailed"; readonly message: string };

export type FailureKind = ActionFailure["kind"];

export const failures = {
  actionNotFound: (action: string): ActionFailure => ({
    kind: "ActionNotFound",
    action,
    message: `Action '${action}' not found`,
  }),

  missingParameter: (parameter: string): ValidationError => ({
    kind: "MissingRequiredParameter",
    parameter,
    message: `Missing required parameter '${parameter}'`,
  }),

  typeMismatch: (parameter: string, expected: ParamKind, actual: unknown): ValidationError => ({
    kind: "TypeMismatch",
    parameter,
    expected,
    actual,
    message: `Parameter '${parameter}' must be ${expected === "integer" ? "an" : "a"} ${expected}, got ${describeValue(actual)}`,
  }),

  spawn: (cause: string): ExecutionError => ({
    kind: "SpawnFailure",
    cause,
    message: `Failed to execute PowerShell command: ${cause}`,
  }),

  timeout: (timeoutMs: number): ExecutionError => ({
    kind: "Timeout",
    timeoutMs,
    message: `PowerShell command timed out after ${timeoutMs}ms`,
  }),

  overflow: (limitBytes: number, raw: string): ExecutionError => ({
    kind: "OutputOverflow",
    limitBytes,
    raw,
    message: `PowerShell output exceeded ${limitBytes} bytes: ${excerpt(raw)}`,
  }),

  toolFailure: (stderr: string, exitCode: number, signal?: string): ActionFailure => ({
    kind: "ToolExecutionFailure",
    stderr,
    exitCode,
    ...(signal === undefined ? {} : { signal }),
    message: `PowerShell command failed (${signal === undefined ? `exit ${exitCode}` : `killed by ${signal}`}): ${stderr.trim() || "no error output"}`,
  }),

  malformed: (raw: string, reason: string): ActionFailure => ({
    kind: "MalformedOutput",
    raw,
    message: `Unexpected output from PowerShell (${reason}): ${excerpt(raw)}`,
  }),

  invalidArgument: (message: string): ActionFailure => ({ kind: "InvalidArgument", message }),

  precondition: (message: string): ActionFailure => ({ kind: "PreconditionFailed", message }),
};

/** Thrown while rendering a script when a value cannot be embedded safely. */
export class ScriptError extends Error {
  override readonly name = "ScriptError";
}

export function formatFailure(failure: ActionFailure): string {
  return `${failure.kind}: ${failure.message}`;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "string") return `string ${JSON.stringify(value)}`;
  if (typeof value === "number" || typeof value === "boolean") return `${typeof value} ${String(value)}`;
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function excerpt(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "<empty>";
  return trimmed.length > 200 ? `${trimmed.slice(0, 200)}…` : trimmed;
}
