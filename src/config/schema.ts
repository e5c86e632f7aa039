import { z } from "zod";
import { CATALOG_DEFAULTS } from "../actions/catalog/defaults.js";
import { DEFAULT_MAX_BUFFER } from "../actions/executor.js";
import type { ProviderConfig } from "./types.js";

const executorSchema = z.object({
  binary: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(120_000),
  maxBufferBytes: z.number().int().positive().default(DEFAULT_MAX_BUFFER),
  warmUp: z.boolean().default(true),
});

const providerSchema = z.object({
  precheckPolicy: z.enum(["absent-on-error", "strict"]).default("absent-on-error"),
});

const defaultsSchema = z.object({
  memory_mb: z.number().int().positive().default(CATALOG_DEFAULTS.memory_mb),
  cpu_count: z.number().int().positive().default(CATALOG_DEFAULTS.cpu_count),
  generation: z.number().int().min(1).max(2).default(CATALOG_DEFAULTS.generation),
  switch_name: z.string().min(1).default(CATALOG_DEFAULTS.switch_name),
  controller_type: z.enum(["IDE", "SCSI", "DVD"]).default("SCSI"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const providerConfigSchema = z.object({
  executor: executorSchema.default({}),
  provider: providerSchema.default({}),
  defaults: defaultsSchema.default({}),
  logging: loggingSchema.default({}),
});

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    /** One `path: problem` line per offending setting. */
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}

export function parseConfig(raw: unknown): ProviderConfig {
  const parsed = providerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.map(String).join(".") || "<root>"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid config: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
