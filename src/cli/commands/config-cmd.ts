import { Command, Option } from "clipanion";
import { expandEnv, readConfigSource } from "../../config/loader.js";
import { resolveConfigPath } from "../../config/paths.js";
import { ConfigError, parseConfig } from "../../config/schema.js";
import { errorMessage, type CliContext } from "../context.js";

export class ConfigShowCommand extends Command<CliContext> {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [
      ["Show config", "hyperv-provider config show"],
      ["Show a specific file", "hyperv-provider config show --config ./hyperv.json"],
    ],
  });

  configPath = Option.String("--config", {
    description: "Path to the provider config file",
  });

  async execute(): Promise<number> {
    try {
      const config = this.context.loadConfig(this.configPath);
      this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
      return 0;
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class ConfigValidateCommand extends Command<CliContext> {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "hyperv-provider config validate"],
      ["Validate specific file", "hyperv-provider config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = resolveConfigPath(this.configFile);
    try {
      const source = readConfigSource(configPath);
      if (!source.found) {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      parseConfig(expandEnv(source.document));
    } catch (err) {
      const details =
        err instanceof ConfigError && err.issues.length > 0
          ? err.issues.map((issue) => `  - ${issue}`)
          : [`  ${errorMessage(err)}`];
      this.context.stdout.write(`Config is INVALID: ${configPath}\n${details.join("\n")}\n`);
      return 1;
    }
    this.context.stdout.write(`Config is valid: ${configPath}\n`);
    return 0;
  }
}
