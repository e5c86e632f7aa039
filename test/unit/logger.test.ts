import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger, createSilentLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it("creates a JSON logger with default level", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("creates a child logger that keeps the level", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ component: "executor" });
    expect(child.level).toBe("warn");
  });

  it("writes to a file when one is configured", () => {
    tempDir = mkdtempSync(join(tmpdir(), "hvp-log-test-"));
    const logger = createLogger({ level: "error", file: join(tempDir, "provider.log") });
    expect(logger.level).toBe("error");
  });

  it("creates a silent logger", () => {
    expect(createSilentLogger().level).toBe("silent");
  });
});
