import { z } from "zod";
import { failures, ScriptError, type ValidationError } from "./errors.js";
import {
  ok,
  err,
  type ActionDefinition,
  type ArgValue,
  type InputParameters,
  type ParamKind,
  type Result,
} from "./types.js";

const INTEGER_LITERAL = /^[+-]?\d+$/;

const kindSchemas: { readonly [K in ParamKind]: z.ZodType<ArgValue> } = {
  string: z.string(),
  integer: z.union([
    z.number().int().safe(),
    z
      .string()
      .trim()
      .regex(INTEGER_LITERAL)
      .transform((s) => Number.parseInt(s, 10))
      .pipe(z.number().int().safe()),
  ]),
  boolean: z.union([
    z.boolean(),
    z
      .string()
      .trim()
      .toLowerCase()
      .pipe(z.enum(["true", "false"]))
      .transform((s) => s === "true"),
  ]),
};

export function coerceValue(kind: ParamKind, value: unknown): ArgValue | undefined {
  const parsed = kindSchemas[kind].safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/** Arguments after coercion and defaulting. Only produced by {@link validate}. */
export class ValidatedArguments {
  private readonly values: ReadonlyMap<string, ArgValue>;

  constructor(entries: Iterable<readonly [string, ArgValue]>) {
    this.values = new Map(entries);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): ArgValue | undefined {
    return this.values.get(name);
  }

  string(name: string): string {
    const value = this.values.get(name);
    if (typeof value !== "string") throw new ScriptError(`Argument '${name}' is not a string`);
    return value;
  }

  integer(name: string): number {
    const value = this.values.get(name);
    if (typeof value !== "number") throw new ScriptError(`Argument '${name}' is not an integer`);
    return value;
  }

  boolean(name: string): boolean {
    const value = this.values.get(name);
    if (typeof value !== "boolean") throw new ScriptError(`Argument '${name}' is not a boolean`);
    return value;
  }

  toJSON(): Record<string, ArgValue> {
    return Object.fromEntries(this.values);
  }
}

export function validate(
  definition: ActionDefinition,
  input: InputParameters,
): Result<ValidatedArguments, ValidationError> {
  const entries: [string, ArgValue][] = [];

  for (const spec of definition.parameters) {
    const raw = Object.hasOwn(input, spec.name) ? input[spec.name] : undefined;

    if (raw === undefined || raw === null) {
      if (spec.required) return err(failures.missingParameter(spec.name));
      entries.push([spec.name, spec.default]);
      continue;
    }

    const value = coerceValue(spec.kind, raw);
    if (value === undefined) {
      return err(failures.typeMismatch(spec.name, spec.kind, raw));
    }
    entries.push([spec.name, value]);
  }

  return ok(new ValidatedArguments(entries));
}
