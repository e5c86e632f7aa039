import { Command, Option } from "clipanion";
import type { ProviderConfig } from "../../config/types.js";
import { errorMessage, type CliContext } from "../context.js";

export class DoctorCommand extends Command<CliContext> {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description: "Check the configuration and whether Hyper-V is reachable through PowerShell",
    examples: [["Run diagnostics", "hyperv-provider doctor"]],
  });

  configPath = Option.String("--config", {
    description: "Path to the provider config file",
  });

  async execute(): Promise<number> {
    this.context.stdout.write("Hyper-V Provider Doctor\n");
    this.context.stdout.write("=======================\n\n");

    let allPassed = true;

    // Check 1: Config valid
    let config: ProviderConfig | undefined;
    try {
      config = this.context.loadConfig(this.configPath);
      this.context.stdout.write("[PASS] Config valid\n");
    } catch (err) {
      this.context.stdout.write(`[FAIL] Config invalid: ${errorMessage(err)}\n`);
      allPassed = false;
    }

    if (config) {
      // Check 2: PowerShell runs and the Hyper-V module is present
      const { dispatcher } = this.context.createProvider(config);
      const outcome = await dispatcher.execute("test_install", {});

      if (!outcome.ok) {
        this.context.stdout.write(`[FAIL] PowerShell not usable: ${outcome.error.message}\n`);
        allPassed = false;
      } else {
        this.context.stdout.write(`[PASS] PowerShell reachable (version ${String(outcome.result["version"])})\n`);
        const commands = outcome.result["hyperv_commands"];
        if (outcome.result["installed"] === true) {
          this.context.stdout.write(`[PASS] Hyper-V module loaded (${String(commands)} commands)\n`);
        } else {
          this.context.stdout.write("[FAIL] Hyper-V module not found\n");
          allPassed = false;
        }
      }
    }

    this.context.stdout.write("\n");
    if (allPassed) {
      this.context.stdout.write("All checks passed.\n");
      return 0;
    }
    this.context.stdout.write("Some checks failed.\n");
    return 1;
  }
}
