import { ps, raw, type RawFragment } from "../script.js";

// Cmdlet -Name/-VMName parameters expand `*`, `?` and `[...]`, so VMs and
// snapshots are always selected by exact (case-insensitive) name instead.

/** Pipeline yielding the VM named exactly `name`, or nothing. */
export function vmNamed(name: string): RawFragment {
  return raw(ps`Get-VM | Where-Object { $_.Name -eq ${name} }`);
}

/** Binds `$vm` to the VM named exactly `name`; the script fails if there is none. */
export function requireVm(name: string): string {
  return ps`$vm = ${vmNamed(name)}; if (-not $vm) { throw ${`VM '${name}' not found`} }`;
}

/** Pipeline yielding the snapshot `snapshot` of the VM `vm`, or nothing. */
export function snapshotNamed(vm: string, snapshot: string): RawFragment {
  return raw(ps`${vmNamed(vm)} | Get-VMSnapshot | Where-Object { $_.Name -eq ${snapshot} }`);
}

/** Number of VMs named exactly `name`. */
export function countVms(name: string): string {
  return ps`(${vmNamed(name)} | Measure-Object).Count`;
}
