import { describe, it, expect, vi } from "vitest";
import { createProvider } from "../../src/provider.js";
import { PowerShellExecutor } from "../../src/actions/executor.js";
import { parseConfig } from "../../src/config/schema.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import { FakeExecutor } from "../helpers/fake-executor.js";

describe("createProvider", () => {
  it("identifies itself as the hyperv command provider", () => {
    const provider = createProvider({ logger: createSilentLogger(), executor: new FakeExecutor() });
    expect(provider.name).toBe("hyperv");
    expect(provider.type).toBe("command");
    expect(provider.registry.listActions()).toHaveLength(20);
  });

  it("builds a PowerShell executor from config", () => {
    const config = parseConfig({ executor: { binary: "/opt/pwsh/pwsh" } });
    const provider = createProvider({ config, logger: createSilentLogger(), warmUp: false });
    expect(provider.executor).toBeInstanceOf(PowerShellExecutor);
    if (!(provider.executor instanceof PowerShellExecutor)) return;
    expect(provider.executor.binary).toBe("/opt/pwsh/pwsh");
  });

  it("applies configured defaults to the catalog", () => {
    const config = parseConfig({ defaults: { switch_name: "Lab" } });
    const provider = createProvider({ config, logger: createSilentLogger(), executor: new FakeExecutor() });
    const rendered = provider.dispatcher.render("create_worker", { worker_name: "vm1" });
    expect(rendered.ok).toBe(true);
    if (!rendered.ok) return;
    expect(rendered.value).toContain("-SwitchName 'Lab'");
  });

  it("routes actions through the supplied executor", async () => {
    const executor = new FakeExecutor().succeed("True");
    const provider = createProvider({ logger: createSilentLogger(), executor });
    const outcome = await provider.dispatcher.execute("has_volume", { disk_path: "C:\\d.vhdx" });
    expect(outcome).toEqual({ ok: true, action: "has_volume", result: { success: true, exists: true } });
    expect(executor.scripts).toEqual(["Test-Path -LiteralPath 'C:\\d.vhdx' -PathType Leaf"]);
  });

  it("starts the warm-up when built", async () => {
    const executor = new FakeExecutor();
    createProvider({ logger: createSilentLogger(), executor });
    await vi.waitFor(() => expect(executor.warmUps).toBe(1));
  });

  it("skips the warm-up when disabled in config", async () => {
    const executor = new FakeExecutor();
    const config = parseConfig({ executor: { warmUp: false } });
    createProvider({ config, logger: createSilentLogger(), executor });
    await new Promise((resolve) => setImmediate(resolve));
    expect(executor.warmUps).toBe(0);
  });

  it("passes the output cap to the PowerShell executor", () => {
    const config = parseConfig({ executor: { maxBufferBytes: 4096 } });
    const provider = createProvider({ config, logger: createSilentLogger(), warmUp: false });
    expect(provider.executor).toBeInstanceOf(PowerShellExecutor);
    if (!(provider.executor instanceof PowerShellExecutor)) return;
    expect(provider.executor.maxBuffer).toBe(4096);
  });
});
