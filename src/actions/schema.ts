import type {
  ActionDefinition,
  KindValue,
  OptionalParameter,
  ParamKind,
  ParameterSpec,
  RequiredParameter,
} from "./types.js";

export function required<K extends ParamKind>(
  name: string,
  kind: K,
  description: string,
): RequiredParameter<K> {
  return { name, kind, description, required: true };
}

export function optional<K extends ParamKind>(
  name: string,
  kind: K,
  description: string,
  defaultValue: KindValue<K>,
): OptionalParameter<K> {
  return { name, kind, description, required: false, default: defaultValue };
}

export function matchesKind(kind: ParamKind, value: unknown): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isSafeInteger(value);
    case "boolean":
      return typeof value === "boolean";
  }
}

/**
 * Throws when a definition breaks the schema rules: duplicate parameter
 * names, or an optional parameter whose default does not fit its kind.
 */
export function checkDefinition(definition: ActionDefinition): void {
  const seen = new Set<string>();
  for (const spec of definition.parameters) {
    if (seen.has(spec.name)) {
      throw new Error(`Action '${definition.name}' declares parameter '${spec.name}' twice`);
    }
    seen.add(spec.name);

    if (!spec.required && !matchesKind(spec.kind, spec.default)) {
      throw new Error(
        `Action '${definition.name}': default for '${spec.name}' is not a valid ${spec.kind}`,
      );
    }
  }
}

export function freezeDefinition(definition: ActionDefinition): ActionDefinition {
  return Object.freeze({
    name: definition.name,
    description: definition.description,
    parameters: Object.freeze(definition.parameters.map((p): ParameterSpec => Object.freeze({ ...p }))),
  });
}
