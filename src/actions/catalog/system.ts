import { intField, textField } from "../normalizer.js";
import type { ActionEntry } from "../registry.js";
import { script } from "../script.js";

export const testInstall: ActionEntry = {
  definition: {
    name: "test_install",
    description: "Test if Hyper-V is properly installed",
    parameters: [],
  },
  render: () =>
    script(
      "$count = (Get-Command -Module Hyper-V -ErrorAction SilentlyContinue | Measure-Object).Count",
      "[PSCustomObject]@{ Version = $PSVersionTable.PSVersion.ToString(); HyperVCommands = $count } | ConvertTo-Json -Compress",
    ),
  output: {
    shape: "json-one",
    build: (info) => {
      const commands = intField(info, "HyperVCommands");
      return {
        success: true,
        version: textField(info, "Version"),
        hyperv_commands: commands,
        installed: commands > 0,
      };
    },
  },
};
