import type { PrecheckPolicy } from "../actions/dispatcher.js";
import type { CatalogDefaults } from "../actions/catalog/defaults.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface ProviderConfig {
  readonly executor: ExecutorConfig;
  readonly provider: ProviderSettings;
  readonly defaults: CatalogDefaults;
  readonly logging: LoggingConfig;
}

export interface ExecutorConfig {
  readonly binary?: string;
  readonly timeoutMs: number;
  readonly maxBufferBytes: number;
  readonly warmUp: boolean;
}

export interface ProviderSettings {
  readonly precheckPolicy: PrecheckPolicy;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
