import { lookupCode, VHD_TYPES } from "../codes.js";
import { existsFrom, intField, textField, type OutputDecoder } from "../normalizer.js";
import type { ActionEntry } from "../registry.js";
import { optional, required } from "../schema.js";
import { ps, raw, script } from "../script.js";
import type { ParameterSpec } from "../types.js";
import type { CatalogDefaults } from "./defaults.js";
import { requireVm } from "./lookup.js";

const BYTES_PER_MB = 1024 * 1024;

const diskPath = required("disk_path", "string", "Path to the disk");

type Controller = "IDE" | "SCSI" | "DVD";

/** `ide` and `dvd` (any case) select those controllers; everything else is SCSI. */
export function controllerOf(value: string): Controller {
  switch (value.trim().toLowerCase()) {
    case "ide":
      return "IDE";
    case "dvd":
      return "DVD";
    default:
      return "SCSI";
  }
}

/** Echo of a disk path after it was written; falls back to the requested path. */
function diskEcho(pathArg: string): OutputDecoder {
  return {
    shape: "json-one",
    build: (disk, args) => {
      const path = textField(disk, "Path", args.string(pathArg));
      return { success: true, id: path, path };
    },
    fallback: (args) => {
      const path = args.string(pathArg);
      return { success: true, id: path, path };
    },
  };
}

export const getVolumes: ActionEntry = {
  definition: {
    name: "get_volumes",
    description: "List all virtual disk volumes",
    parameters: [],
  },
  render: () =>
    "Get-VM | Get-VMHardDiskDrive | Where-Object { $_.Path } | Get-VHD" +
    " | Select-Object Path, @{Name='VhdType';Expression={[int]$_.VhdType}}, Size" +
    " | ConvertTo-Json -Compress",
  output: {
    shape: "json-many",
    build: (disks) => ({
      success: true,
      volumes: disks.map((disk) => {
        const path = textField(disk, "Path");
        return {
          id: path,
          path,
          size_mb: Math.trunc(intField(disk, "Size") / BYTES_PER_MB),
          format: lookupCode(VHD_TYPES, disk["VhdType"]),
        };
      }),
    }),
  },
};

export const hasVolume: ActionEntry = {
  definition: {
    name: "has_volume",
    description: "Check if a disk volume exists",
    parameters: [diskPath],
  },
  render: (args) => ps`Test-Path -LiteralPath ${args.string("disk_path")} -PathType Leaf`,
  output: {
    shape: "scalar",
    build: (found) => ({ success: true, exists: existsFrom(found) }),
  },
};

export const createVolume: ActionEntry = {
  definition: {
    name: "create_volume",
    description: "Create a new disk volume",
    parameters: [
      required("disk_path", "string", "Path for the new disk"),
      required("size_mb", "integer", "Size in MB"),
    ],
  },
  render: (args) => {
    const path = args.string("disk_path");
    return script(
      ps`New-VHD -Path ${path} -SizeBytes ${args.integer("size_mb")}MB -Dynamic | Out-Null`,
      ps`Get-VHD -Path ${path} | Select-Object Path | ConvertTo-Json -Compress`,
    );
  },
  output: diskEcho("disk_path"),
};

export const deleteVolume: ActionEntry = {
  definition: {
    name: "delete_volume",
    description: "Delete a disk volume",
    parameters: [diskPath],
  },
  render: (args) => ps`Remove-Item -LiteralPath ${args.string("disk_path")} -Force`,
  output: { shape: "none", build: () => ({ success: true }) },
};

function controllerParams(defaults: CatalogDefaults): ParameterSpec[] {
  return [
    required("worker_name", "string", "Name of the VM"),
    optional("controller_type", "string", "Type of controller (IDE, SCSI, DVD)", defaults.controller_type),
    diskPath,
  ];
}

export function attachVolume(defaults: CatalogDefaults): ActionEntry {
  return {
    definition: {
      name: "attach_volume",
      description: "Attach a disk to a VM",
      parameters: controllerParams(defaults),
    },
    render: (args) => {
      const path = args.string("disk_path");
      const controller = controllerOf(args.string("controller_type"));
      return script(
        requireVm(args.string("worker_name")),
        controller === "DVD"
          ? ps`$vm | Add-VMDvdDrive -Path ${path}`
          : ps`$vm | Add-VMHardDiskDrive -Path ${path} -ControllerType ${raw(controller)}`,
      );
    },
    output: { shape: "none", build: () => ({ success: true }) },
  };
}

export function detachVolume(defaults: CatalogDefaults): ActionEntry {
  return {
    definition: {
      name: "detach_volume",
      description: "Detach a disk from a VM",
      parameters: controllerParams(defaults),
    },
    render: (args) => {
      const path = args.string("disk_path");
      const [getDrive, removeDrive]: [string, string] =
        controllerOf(args.string("controller_type")) === "DVD"
          ? ["Get-VMDvdDrive", "Remove-VMDvdDrive -VMDvdDrive"]
          : ["Get-VMHardDiskDrive", "Remove-VMHardDiskDrive -VMHardDiskDrive"];
      return script(
        requireVm(args.string("worker_name")),
        ps`$drive = $vm | ${raw(getDrive)} | Where-Object { $_.Path -eq ${path} }`,
        `if ($drive) { ${removeDrive} $drive }`,
      );
    },
    output: { shape: "none", build: () => ({ success: true }) },
  };
}

export const snapshotVolume: ActionEntry = {
  definition: {
    name: "snapshot_volume",
    description: "Clone a disk volume",
    parameters: [
      required("source_volume_path", "string", "Path to the source disk"),
      required("target_volume_path", "string", "Path for the cloned disk"),
    ],
  },
  render: (args) => {
    const target = args.string("target_volume_path");
    return script(
      ps`New-VHD -Path ${target} -ParentPath ${args.string("source_volume_path")} -Differencing | Out-Null`,
      ps`Get-VHD -Path ${target} | Select-Object Path | ConvertTo-Json -Compress`,
    );
  },
  output: diskEcho("target_volume_path"),
};
