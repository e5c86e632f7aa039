import { resolve } from "node:path";

export function getConfigPath(): string {
  return process.env["HVP_CONFIG_PATH"] ?? "hyperv-provider.config.json";
}

export function resolveConfigPath(path?: string): string {
  return resolve(path ?? getConfigPath());
}
