import { readFileSync } from "node:fs";
import type { ProviderConfig } from "./types.js";
import { resolveConfigPath } from "./paths.js";
import { ConfigError, parseConfig } from "./schema.js";

// ${env:NAME} or ${env:NAME:-fallback}
const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/g;

export type ConfigSource =
  | { readonly path: string; readonly found: false }
  | { readonly path: string; readonly found: true; readonly document: unknown };

/** Reads and JSON-decodes the config file. A missing file is reported, not thrown. */
export function readConfigSource(path?: string): ConfigSource {
  const configPath = resolveConfigPath(path);

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { path: configPath, found: false };
    }
    throw err;
  }

  try {
    const document: unknown = JSON.parse(content);
    return { path: configPath, found: true, document };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON in ${configPath}: ${reason}`);
  }
}

/**
 * Replaces `${env:NAME}` references in every string of a decoded document.
 * Values are substituted after decoding, so they need no JSON escaping.
 */
export function expandEnv(value: unknown, at: readonly string[] = []): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_PATTERN, (_match, name: string, fallback: string | undefined) => {
      const resolved = process.env[name] ?? fallback;
      if (resolved === undefined) {
        throw new ConfigError(`Missing environment variable: ${name}`, [
          `${at.join(".") || "<root>"}: environment variable ${name} is not set`,
        ]);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => expandEnv(item, [...at, String(i)]));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]: [string, unknown]) => [key, expandEnv(item, [...at, key])]),
    );
  }
  return value;
}

/** Loads the config file, falling back to defaults when there is none. */
export function loadConfig(path?: string): ProviderConfig {
  const source = readConfigSource(path);
  return parseConfig(source.found ? expandEnv(source.document) : {});
}
