import { Cli } from "clipanion";
import {
  ActionsDescribeCommand,
  ActionsListCommand,
  ActionsRunCommand,
} from "./commands/actions.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { DoctorCommand } from "./commands/doctor.js";
import type { CliContext } from "./context.js";

export const VERSION = "0.1.0";

export function createCli(): Cli<CliContext> {
  const cli = new Cli<CliContext>({
    binaryLabel: "Hyper-V provider",
    binaryName: "hyperv-provider",
    binaryVersion: VERSION,
  });

  // Action catalog
  cli.register(ActionsListCommand);
  cli.register(ActionsDescribeCommand);
  cli.register(ActionsRunCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(DoctorCommand);

  return cli;
}
