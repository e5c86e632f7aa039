import { checkDefinition, freezeDefinition } from "./schema.js";
import type { OutputDecoder } from "./normalizer.js";
import type { ActionDefinition, ParamKind } from "./types.js";
import type { ValidatedArguments } from "./validator.js";

/** Existence query run before the main script of a creating action. */
export interface Precheck {
  readonly render: (args: ValidatedArguments) => string;
  /** Failure message used when the resource is already present. */
  readonly conflict: (args: ValidatedArguments) => string;
}

export interface ActionEntry {
  readonly definition: ActionDefinition;
  readonly render: (args: ValidatedArguments) => string;
  readonly output: OutputDecoder;
  readonly precheck?: Precheck;
}

export interface ActionManifest {
  [action: string]: {
    description: string;
    output: OutputDecoder["shape"];
    parameters: Array<{
      name: string;
      kind: ParamKind;
      required: boolean;
      default?: string | number | boolean;
      description: string;
    }>;
  };
}

export class ActionRegistry {
  private readonly entries: ReadonlyMap<string, ActionEntry>;

  constructor(entries: readonly ActionEntry[]) {
    const map = new Map<string, ActionEntry>();
    for (const entry of entries) {
      const name = entry.definition.name;
      if (map.has(name)) {
        throw new Error(`Duplicate action: ${name}`);
      }
      checkDefinition(entry.definition);
      map.set(name, { ...entry, definition: freezeDefinition(entry.definition) });
    }
    this.entries = map;
  }

  listActions(): string[] {
    return [...this.entries.keys()];
  }

  describeAction(name: string): ActionDefinition | undefined {
    return this.entries.get(name)?.definition;
  }

  get(name: string): ActionEntry | undefined {
    return this.entries.get(name);
  }

  getManifest(): ActionManifest {
    const manifest: ActionManifest = {};
    for (const [name, entry] of this.entries) {
      manifest[name] = {
        description: entry.definition.description,
        output: entry.output.shape,
        parameters: entry.definition.parameters.map((p) => ({
          name: p.name,
          kind: p.kind,
          required: p.required,
          ...(p.required ? {} : { default: p.default }),
          description: p.description,
        })),
      };
    }
    return manifest;
  }
}
