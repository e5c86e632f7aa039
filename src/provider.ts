import { createRegistry, PROVIDER_NAME, PROVIDER_TYPE } from "./actions/catalog/index.js";
import { ActionDispatcher } from "./actions/dispatcher.js";
import { PowerShellExecutor, type ScriptExecutor } from "./actions/executor.js";
import type { ActionRegistry } from "./actions/registry.js";
import { parseConfig } from "./config/schema.js";
import type { ProviderConfig } from "./config/types.js";
import { createLogger, type Logger } from "./logging/logger.js";

export interface Provider {
  readonly name: string;
  readonly type: string;
  readonly registry: ActionRegistry;
  readonly executor: ScriptExecutor;
  readonly dispatcher: ActionDispatcher;
  readonly logger: Logger;
}

export interface CreateProviderOpts {
  config?: ProviderConfig;
  logger?: Logger;
  /** Replaces the PowerShell subprocess, e.g. with a test double. */
  executor?: ScriptExecutor;
  /** Overrides `executor.warmUp` from the config. */
  warmUp?: boolean;
}

export function createProvider(opts: CreateProviderOpts = {}): Provider {
  const config = opts.config ?? parseConfig({});
  const logger = opts.logger ?? createLogger(config.logging);
  const registry = createRegistry(config.defaults);
  const executor =
    opts.executor ??
    new PowerShellExecutor({
      binary: config.executor.binary ?? process.env["HVP_POWERSHELL"],
      timeout: config.executor.timeoutMs,
      maxBuffer: config.executor.maxBufferBytes,
      logger,
    });

  const dispatcher = new ActionDispatcher({
    registry,
    executor,
    logger,
    precheckPolicy: config.provider.precheckPolicy,
  });

  if (opts.warmUp ?? config.executor.warmUp) {
    dispatcher.startWarmUp();
  }

  return { name: PROVIDER_NAME, type: PROVIDER_TYPE, registry, executor, dispatcher, logger };
}
