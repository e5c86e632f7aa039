import { lookupCode, VM_STATES } from "../codes.js";
import { existsFrom, intField, textField } from "../normalizer.js";
import type { ActionEntry } from "../registry.js";
import { optional, required } from "../schema.js";
import { nonFatal, ps, raw, script } from "../script.js";
import type { CatalogDefaults } from "./defaults.js";
import { countVms, requireVm } from "./lookup.js";

const workerName = required("worker_name", "string", "Name of the VM");

// Id and State are flattened so both output formats carry plain strings and ints.
const VM_ID = raw("@{Name='Id';Expression={$_.Id.ToString()}}");
const VM_STATE = raw("@{Name='State';Expression={[int]$_.State}}");
const VM_DETAILS = raw(
  "@{Name='memory_mb';Expression={[int64]($_.MemoryStartup / 1MB)}}, " +
    "@{Name='cpu_count';Expression={$_.ProcessorCount}}, " +
    "@{Name='generation';Expression={$_.Generation}}",
);

export const listWorkers: ActionEntry = {
  definition: {
    name: "list_workers",
    description: "List all virtual machines",
    parameters: [],
  },
  render: () => ps`Get-VM | Select-Object Name, ${VM_ID}, ${VM_STATE} | ConvertTo-Csv -NoTypeInformation`,
  output: {
    shape: "csv",
    columns: ["name", "id", "state"],
    build: (rows) => ({
      success: true,
      workers: rows.map((row) => ({
        name: row["name"] ?? "",
        id: row["id"] ?? "",
        state: lookupCode(VM_STATES, row["state"]),
      })),
    }),
  },
};

export function createWorker(defaults: CatalogDefaults): ActionEntry {
  return {
    definition: {
      name: "create_worker",
      description: "Create a new virtual machine",
      parameters: [
        required("worker_name", "string", "Name of the VM to create"),
        optional("memory_mb", "integer", "Memory in MB", defaults.memory_mb),
        optional("cpu_count", "integer", "Number of CPUs", defaults.cpu_count),
        optional("generation", "integer", "VM generation (1 or 2)", defaults.generation),
        optional("switch_name", "string", "Network switch to connect to", defaults.switch_name),
      ],
    },
    precheck: {
      render: (args) => countVms(args.string("worker_name")),
      conflict: (args) => `VM '${args.string("worker_name")}' already exists`,
    },
    render: (args) => {
      const name = args.string("worker_name");
      return script(
        ps`$vm = New-VM -Name ${name} -MemoryStartupBytes ${args.integer("memory_mb")}MB -Generation ${args.integer("generation")} -SwitchName ${args.string("switch_name")}`,
        ps`Set-VM -VM $vm -ProcessorCount ${args.integer("cpu_count")}`,
        ps`$vm | Select-Object Name, ${VM_ID}, ${VM_STATE} | ConvertTo-Json -Compress`,
      );
    },
    output: {
      shape: "json-one",
      build: (vm, args) => ({
        success: true,
        id: textField(vm, "Id"),
        name: args.string("worker_name"),
      }),
    },
  };
}

export const deleteWorker: ActionEntry = {
  definition: {
    name: "delete_worker",
    description: "Delete a virtual machine",
    parameters: [required("worker_name", "string", "Name of the VM to delete")],
  },
  render: (args) =>
    script(
      requireVm(args.string("worker_name")),
      nonFatal("$vm | Stop-VM -TurnOff -Force -ErrorAction SilentlyContinue"),
      "$vm | Remove-VM -Force",
    ),
  output: { shape: "none", build: () => ({ success: true }) },
};

export const getWorker: ActionEntry = {
  definition: {
    name: "get_worker",
    description: "Get information about a virtual machine",
    parameters: [workerName],
  },
  render: (args) =>
    script(
      requireVm(args.string("worker_name")),
      ps`$vm | Select-Object Name, ${VM_ID}, ${VM_STATE}, ${VM_DETAILS} | ConvertTo-Json -Compress`,
    ),
  output: {
    shape: "json-one",
    build: (vm) => ({
      success: true,
      vm: {
        name: textField(vm, "Name"),
        id: textField(vm, "Id"),
        state: lookupCode(VM_STATES, vm["State"]),
        memory_mb: intField(vm, "memory_mb"),
        cpu_count: intField(vm, "cpu_count"),
        generation: intField(vm, "generation"),
      },
    }),
  },
};

export const hasWorker: ActionEntry = {
  definition: {
    name: "has_worker",
    description: "Check if a virtual machine exists",
    parameters: [workerName],
  },
  render: (args) => countVms(args.string("worker_name")),
  output: {
    shape: "scalar",
    build: (count) => ({ success: true, exists: existsFrom(count) }),
  },
};

export const startWorker: ActionEntry = {
  definition: {
    name: "start_worker",
    description: "Start a virtual machine",
    parameters: [required("worker_name", "string", "Name of the VM to start")],
  },
  render: (args) => script(requireVm(args.string("worker_name")), "$vm | Start-VM"),
  output: {
    shape: "none",
    build: (args) => ({ success: true, started: args.string("worker_name") }),
  },
};

export const rebootWorker: ActionEntry = {
  definition: {
    name: "reboot_worker",
    description: "Reboot a VM",
    parameters: [workerName],
  },
  render: (args) => script(requireVm(args.string("worker_name")), "$vm | Restart-VM -Force"),
  output: { shape: "none", build: () => ({ success: true }) },
};

export const configureNetworks: ActionEntry = {
  definition: {
    name: "configure_networks",
    description: "Configure network settings for a VM",
    parameters: [workerName, required("switch_name", "string", "Name of the virtual switch")],
  },
  render: (args) =>
    script(
      requireVm(args.string("worker_name")),
      ps`$vm | Get-VMNetworkAdapter | Connect-VMNetworkAdapter -SwitchName ${args.string("switch_name")}`,
    ),
  output: { shape: "none", build: () => ({ success: true }) },
};

/** Hyper-V has no metadata store; entries are appended to the VM notes as key=value lines. */
export const setWorkerMetadata: ActionEntry = {
  definition: {
    name: "set_worker_metadata",
    description: "Set metadata for a VM",
    parameters: [
      workerName,
      required("key", "string", "Metadata key"),
      required("value", "string", "Metadata value"),
    ],
  },
  render: (args) =>
    script(
      requireVm(args.string("worker_name")),
      ps`$entry = ${args.string("key")} + '=' + ${args.string("value")}`,
      "$notes = if ($vm.Notes) { $vm.Notes + [char]10 + $entry } else { $entry }",
      "Set-VM -VM $vm -Notes $notes",
    ),
  output: { shape: "none", build: () => ({ success: true }) },
};
