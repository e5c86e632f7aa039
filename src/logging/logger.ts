import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

// stdout carries action results, so everything logs to stderr (fd 2).
const STDERR = 2;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  const options: pino.LoggerOptions = { name: "hyperv-provider", level };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  if (!isJson) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: STDERR },
      },
    });
  }

  return pino(options, pino.destination(STDERR));
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
