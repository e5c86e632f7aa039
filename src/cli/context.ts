import type { BaseContext } from "clipanion";
import { loadConfig } from "../config/loader.js";
import type { ProviderConfig } from "../config/types.js";
import { createProvider, type Provider } from "../provider.js";

export interface CliContext extends BaseContext {
  loadConfig: (path?: string) => ProviderConfig;
  createProvider: (config: ProviderConfig) => Provider;
}

export const defaultCliContext: Omit<CliContext, keyof BaseContext> = {
  loadConfig,
  // Each command runs at most one action, so there is nothing to warm up for.
  createProvider: (config) => createProvider({ config, warmUp: false }),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
