export type ParamKind = "string" | "integer" | "boolean";

export type ArgValue = string | number | boolean;

export type KindValue<K extends ParamKind> = K extends "string"
  ? string
  : K extends "integer"
    ? number
    : boolean;

interface ParameterBase<K extends ParamKind> {
  readonly name: string;
  readonly kind: K;
  readonly description: string;
}

export interface RequiredParameter<K extends ParamKind = ParamKind>
  extends ParameterBase<K> {
  readonly required: true;
}

export interface OptionalParameter<K extends ParamKind = ParamKind>
  extends ParameterBase<K> {
  readonly required: false;
  readonly default: KindValue<K>;
}

export type ParameterSpec =
  | RequiredParameter
  | { [K in ParamKind]: OptionalParameter<K> }[ParamKind];

export interface ActionDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterSpec[];
}

/** Loosely-typed caller input, e.g. straight out of a JSON request body. */
export type InputParameters = Readonly<Record<string, unknown>>;

export interface RawExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitSucceeded: boolean;
  readonly exitCode: number;
  /** Set when the process was terminated by a signal instead of exiting. */
  readonly signal?: string;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonRecord = { [key: string]: JsonValue };

/** Structured payload handed back to the caller of an action. */
export type NormalizedResult = { readonly success: boolean } & Readonly<Record<string, JsonValue>>;

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
