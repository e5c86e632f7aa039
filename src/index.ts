export { createProvider, type Provider, type CreateProviderOpts } from "./provider.js";
export {
  ActionDispatcher,
  type ActionOutcome,
  type PrecheckPolicy,
} from "./actions/dispatcher.js";
export { ActionRegistry, type ActionEntry, type ActionManifest, type Precheck } from "./actions/registry.js";
export { createCatalog, createRegistry, CATALOG_DEFAULTS, type CatalogDefaults } from "./actions/catalog/index.js";
export {
  DEFAULT_MAX_BUFFER,
  PowerShellExecutor,
  powerShellArgs,
  type ExecOutcome,
  type ScriptExecutor,
} from "./actions/executor.js";
export { validate, ValidatedArguments } from "./actions/validator.js";
export { normalize, type OutputDecoder, type Scalar } from "./actions/normalizer.js";
export { ps, quote, raw, nonFatal, script } from "./actions/script.js";
export { failures, formatFailure, ScriptError, type ActionFailure, type FailureKind } from "./actions/errors.js";
export type {
  ActionDefinition,
  InputParameters,
  NormalizedResult,
  ParameterSpec,
  ParamKind,
  RawExecutionResult,
} from "./actions/types.js";
export { expandEnv, loadConfig, readConfigSource, type ConfigSource } from "./config/loader.js";
export { ConfigError, parseConfig } from "./config/schema.js";
export type { ProviderConfig } from "./config/types.js";
export { createLogger, type Logger } from "./logging/logger.js";
