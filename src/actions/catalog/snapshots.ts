import { existsFrom, textField } from "../normalizer.js";
import type { ActionEntry } from "../registry.js";
import { required } from "../schema.js";
import { ps, script } from "../script.js";
import type { ValidatedArguments } from "../validator.js";
import { requireVm, snapshotNamed } from "./lookup.js";

const snapshotParams = [
  required("worker_name", "string", "Name of the VM"),
  required("snapshot_name", "string", "Name of the snapshot"),
];

function syntheticId(args: ValidatedArguments): string {
  return `${args.string("worker_name")}-${args.string("snapshot_name")}`;
}

export const createSnapshot: ActionEntry = {
  definition: {
    name: "create_snapshot",
    description: "Create a snapshot of a VM",
    parameters: snapshotParams,
  },
  render: (args) =>
    script(
      requireVm(args.string("worker_name")),
      ps`$vm | Checkpoint-VM -SnapshotName ${args.string("snapshot_name")} -Passthru` +
        " | Select-Object @{Name='Id';Expression={$_.Id.ToString()}} | ConvertTo-Json -Compress",
    ),
  output: {
    shape: "json-one",
    build: (snapshot, args) => ({ success: true, id: textField(snapshot, "Id", syntheticId(args)) }),
    fallback: (args) => ({ success: true, id: syntheticId(args) }),
  },
};

export const deleteSnapshot: ActionEntry = {
  definition: {
    name: "delete_snapshot",
    description: "Delete a snapshot of a VM",
    parameters: snapshotParams,
  },
  render: (args) => {
    const vm = args.string("worker_name");
    const name = args.string("snapshot_name");
    return script(
      ps`$snapshot = ${snapshotNamed(vm, name)}`,
      ps`if (-not $snapshot) { throw ${`Snapshot '${name}' of VM '${vm}' not found`} }`,
      "$snapshot | Remove-VMSnapshot -IncludeAllChildSnapshots -Confirm:$false",
    );
  },
  output: { shape: "none", build: () => ({ success: true }) },
};

export const hasSnapshot: ActionEntry = {
  definition: {
    name: "has_snapshot",
    description: "Check if a snapshot exists",
    parameters: snapshotParams,
  },
  render: (args) =>
    ps`(${snapshotNamed(args.string("worker_name"), args.string("snapshot_name"))} | Measure-Object).Count`,
  output: {
    shape: "scalar",
    build: (count) => ({ success: true, exists: existsFrom(count) }),
  },
};
