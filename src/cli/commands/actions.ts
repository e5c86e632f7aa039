import { Command, Option } from "clipanion";
import { formatFailure } from "../../actions/errors.js";
import type { ParameterSpec } from "../../actions/types.js";
import { errorMessage, type CliContext } from "../context.js";
import type { Provider } from "../../provider.js";

function describeParameter(spec: ParameterSpec): string {
  const presence = spec.required ? "required" : `default: ${JSON.stringify(spec.default)}`;
  return `  ${spec.name} (${spec.kind}, ${presence})  ${spec.description}`;
}

/** Turns `--param key=value` pairs and `--params-json` into one input map. */
export function collectParams(pairs: string[], json?: string): Record<string, unknown> {
  const params: Record<string, unknown> = {};

  if (json !== undefined) {
    const parsed: unknown = JSON.parse(json);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error("--params-json must be a JSON object");
    }
    Object.assign(params, parsed);
  }

  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Invalid --param '${pair}', expected key=value`);
    }
    params[pair.slice(0, eq)] = pair.slice(eq + 1);
  }

  return params;
}

abstract class ProviderCommand extends Command<CliContext> {
  configPath = Option.String("--config", {
    description: "Path to the provider config file",
  });

  protected provider(): Provider {
    return this.context.createProvider(this.context.loadConfig(this.configPath));
  }
}

export class ActionsListCommand extends ProviderCommand {
  static override paths = [["actions", "list"]];

  static override usage = Command.Usage({
    description: "List the actions this provider exposes",
    examples: [
      ["List actions", "hyperv-provider actions list"],
      ["Print the full manifest as JSON", "hyperv-provider actions list --json"],
    ],
  });

  json = Option.Boolean("--json", false, {
    description: "Print the action manifest as JSON",
  });

  async execute(): Promise<number> {
    const { registry } = this.provider();

    if (this.json) {
      this.context.stdout.write(JSON.stringify(registry.getManifest(), null, 2) + "\n");
      return 0;
    }

    const names = registry.listActions();
    const width = Math.max(...names.map((n) => n.length));
    this.context.stdout.write(`Actions (${names.length}):\n`);
    for (const name of names) {
      const description = registry.describeAction(name)?.description ?? "";
      this.context.stdout.write(`  ${name.padEnd(width)}  ${description}\n`);
    }
    return 0;
  }
}

export class ActionsDescribeCommand extends ProviderCommand {
  static override paths = [["actions", "describe"]];

  static override usage = Command.Usage({
    description: "Show the parameters of one action",
    examples: [["Describe create_worker", "hyperv-provider actions describe create_worker"]],
  });

  action = Option.String({ name: "action", required: true });

  async execute(): Promise<number> {
    const definition = this.provider().registry.describeAction(this.action);
    if (!definition) {
      this.context.stdout.write(`Action not found: ${this.action}\n`);
      return 1;
    }

    this.context.stdout.write(`${definition.name}: ${definition.description}\n`);
    if (definition.parameters.length === 0) {
      this.context.stdout.write("  (no parameters)\n");
    }
    for (const spec of definition.parameters) {
      this.context.stdout.write(describeParameter(spec) + "\n");
    }
    return 0;
  }
}

export class ActionsRunCommand extends ProviderCommand {
  static override paths = [["actions", "run"]];

  static override usage = Command.Usage({
    description: "Run an action and print its result as JSON",
    examples: [
      ["List VMs", "hyperv-provider actions run list_workers"],
      [
        "Create a VM with 4 GB of memory",
        "hyperv-provider actions run create_worker --param worker_name=build-01 --param memory_mb=4096",
      ],
      [
        "Show the script without running it",
        "hyperv-provider actions run delete_worker --param worker_name=build-01 --dry-run",
      ],
    ],
  });

  action = Option.String({ name: "action", required: true });

  params = Option.Array("--param", [], {
    description: "Action parameter as key=value (repeatable)",
  });

  paramsJson = Option.String("--params-json", {
    description: "Action parameters as a JSON object",
  });

  dryRun = Option.Boolean("--dry-run", false, {
    description: "Print the rendered script instead of running it",
  });

  async execute(): Promise<number> {
    let input: Record<string, unknown>;
    try {
      input = collectParams(this.params, this.paramsJson);
    } catch (err) {
      this.context.stdout.write(`Invalid parameters: ${errorMessage(err)}\n`);
      return 1;
    }

    const { dispatcher } = this.provider();

    if (this.dryRun) {
      const rendered = dispatcher.render(this.action, input);
      if (!rendered.ok) {
        this.context.stdout.write(formatFailure(rendered.error) + "\n");
        return 1;
      }
      this.context.stdout.write(rendered.value + "\n");
      return 0;
    }

    const outcome = await dispatcher.execute(this.action, input);
    if (!outcome.ok) {
      const { kind, message } = outcome.error;
      this.context.stdout.write(
        JSON.stringify({ ok: false, action: outcome.action, error: { kind, message } }, null, 2) + "\n",
      );
      return 1;
    }

    this.context.stdout.write(JSON.stringify(outcome.result, null, 2) + "\n");
    return 0;
  }
}
