import { describe, it, expect } from "vitest";
import {
  intField,
  normalize,
  parseJsonRecords,
  parseScalar,
  textField,
  type OutputDecoder,
} from "../../src/actions/normalizer.js";
import { listWorkers, getWorker, hasWorker } from "../../src/actions/catalog/workers.js";
import { createVolume, getVolumes } from "../../src/actions/catalog/volumes.js";
import { createSnapshot } from "../../src/actions/catalog/snapshots.js";
import { testInstall } from "../../src/actions/catalog/system.js";
import { ValidatedArguments } from "../../src/actions/validator.js";
import type { RawExecutionResult } from "../../src/actions/types.js";

function stdout(text: string): RawExecutionResult {
  return { stdout: text, stderr: "", exitSucceeded: true, exitCode: 0 };
}

const noArgs = new ValidatedArguments([]);

describe("normalize: csv", () => {
  it("maps list output to workers with decoded states", () => {
    const raw = stdout('"Name","Id","State"\r\n"vm1","GUID-1","2"\r\n');
    expect(normalize(listWorkers.output, raw, noArgs)).toEqual({
      ok: true,
      value: { success: true, workers: [{ name: "vm1", id: "GUID-1", state: "Running" }] },
    });
  });

  it("returns an empty list for header-only output", () => {
    const raw = stdout('"Name","Id","State"\r\n');
    expect(normalize(listWorkers.output, raw, noArgs)).toEqual({
      ok: true,
      value: { success: true, workers: [] },
    });
  });

  it("maps unknown state codes to Unknown", () => {
    const raw = stdout('"Name","Id","State"\n"vm1","GUID-1","99"\n');
    const result = normalize(listWorkers.output, raw, noArgs);
    expect(result).toEqual({
      ok: true,
      value: { success: true, workers: [{ name: "vm1", id: "GUID-1", state: "Unknown" }] },
    });
  });
});

describe("normalize: json", () => {
  const vm = { Name: "vm1", Id: "GUID-1", State: 3, memory_mb: 4096, cpu_count: 4, generation: 2 };

  it("decodes a single object", () => {
    const result = normalize(getWorker.output, stdout(JSON.stringify(vm)), noArgs);
    expect(result).toEqual({
      ok: true,
      value: {
        success: true,
        vm: { name: "vm1", id: "GUID-1", state: "Stopped", memory_mb: 4096, cpu_count: 4, generation: 2 },
      },
    });
  });

  it("treats a one-element array like the bare object", () => {
    const single = normalize(getWorker.output, stdout(JSON.stringify(vm)), noArgs);
    const wrapped = normalize(getWorker.output, stdout(JSON.stringify([vm])), noArgs);
    expect(wrapped).toEqual(single);
  });

  it("strips a byte order mark", () => {
    const result = normalize(getWorker.output, stdout("\uFEFF" + JSON.stringify(vm)), noArgs);
    expect(result.ok).toBe(true);
  });

  it("fills missing fields with typed defaults", () => {
    const result = normalize(getWorker.output, stdout('{"Name":"vm1"}'), noArgs);
    expect(result).toEqual({
      ok: true,
      value: {
        success: true,
        vm: { name: "vm1", id: "unknown", state: "Unknown", memory_mb: 0, cpu_count: 0, generation: 0 },
      },
    });
  });

  it("reports unparseable output as MalformedOutput", () => {
    const result = normalize(getWorker.output, stdout("WARNING: something odd"), noArgs);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      kind: "MalformedOutput",
      raw: "WARNING: something odd",
      message: "Unexpected output from PowerShell (expected JSON): WARNING: something odd",
    });
  });

  it("reports empty output as MalformedOutput when there is no fallback", () => {
    const result = normalize(getWorker.output, stdout(""), noArgs);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Unexpected output from PowerShell (expected JSON): <empty>");
  });

  it("reports the install check", () => {
    const raw = stdout('{"Version":"5.1.22621.2506","HyperVCommands":245}');
    expect(normalize(testInstall.output, raw, noArgs)).toEqual({
      ok: true,
      value: { success: true, version: "5.1.22621.2506", hyperv_commands: 245, installed: true },
    });
  });

  it("synthesizes the snapshot id when the echo is unreadable", () => {
    const args = new ValidatedArguments([
      ["worker_name", "vm1"],
      ["snapshot_name", "before-upgrade"],
    ]);
    expect(normalize(createSnapshot.output, stdout(""), args)).toEqual({
      ok: true,
      value: { success: true, id: "vm1-before-upgrade" },
    });
  });

  it("uses the requested disk path when the echo is unreadable", () => {
    const args = new ValidatedArguments([
      ["disk_path", "C:\\disks\\data.vhdx"],
      ["size_mb", 1024],
    ]);
    expect(normalize(createVolume.output, stdout("not json"), args)).toEqual({
      ok: true,
      value: { success: true, id: "C:\\disks\\data.vhdx", path: "C:\\disks\\data.vhdx" },
    });
  });

  it("decodes a list of disks", () => {
    const disks = [
      { Path: "C:\\a.vhdx", VhdType: 2, Size: 10737418240 },
      { Path: "C:\\b.vhdx", VhdType: 1, Size: 1572864 },
    ];
    expect(normalize(getVolumes.output, stdout(JSON.stringify(disks)), noArgs)).toEqual({
      ok: true,
      value: {
        success: true,
        volumes: [
          { id: "C:\\a.vhdx", path: "C:\\a.vhdx", size_mb: 10240, format: "DynamicExpanding" },
          { id: "C:\\b.vhdx", path: "C:\\b.vhdx", size_mb: 1, format: "FixedSize" },
        ],
      },
    });
  });

  it("returns an empty disk list for empty output", () => {
    expect(normalize(getVolumes.output, stdout("  \r\n"), noArgs)).toEqual({
      ok: true,
      value: { success: true, volumes: [] },
    });
  });
});

describe("normalize: scalar", () => {
  it("maps a positive count to exists", () => {
    expect(normalize(hasWorker.output, stdout("1\r\n"), noArgs)).toEqual({
      ok: true,
      value: { success: true, exists: true },
    });
  });

  it("maps zero to absent", () => {
    expect(normalize(hasWorker.output, stdout("0"), noArgs)).toEqual({
      ok: true,
      value: { success: true, exists: false },
    });
  });

  it("rejects output that is neither a count nor a boolean", () => {
    const result = normalize(hasWorker.output, stdout("maybe"), noArgs);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("MalformedOutput");
  });
});

describe("normalize: exit status", () => {
  const none: OutputDecoder = { shape: "none", build: () => ({ success: true }) };

  it("reports a non-zero exit with its stderr", () => {
    const raw: RawExecutionResult = {
      stdout: "",
      stderr: "Remove-VM : VM not found\r\n",
      exitSucceeded: false,
      exitCode: 1,
    };
    expect(normalize(none, raw, noArgs)).toEqual({
      ok: false,
      error: {
        kind: "ToolExecutionFailure",
        stderr: "Remove-VM : VM not found",
        exitCode: 1,
        message: "PowerShell command failed (exit 1): Remove-VM : VM not found",
      },
    });
  });

  it("falls back to stdout when stderr is empty", () => {
    const raw: RawExecutionResult = { stdout: "boom", stderr: "", exitSucceeded: false, exitCode: 2 };
    const result = normalize(none, raw, noArgs);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("PowerShell command failed (exit 2): boom");
  });

  it("names the signal of a killed process", () => {
    const raw: RawExecutionResult = {
      stdout: "",
      stderr: "",
      exitSucceeded: false,
      exitCode: 137,
      signal: "SIGKILL",
    };
    expect(normalize(none, raw, noArgs)).toEqual({
      ok: false,
      error: {
        kind: "ToolExecutionFailure",
        stderr: "",
        exitCode: 137,
        signal: "SIGKILL",
        message: "PowerShell command failed (killed by SIGKILL): no error output",
      },
    });
  });

  it("ignores stdout entirely for a none decoder", () => {
    expect(normalize(none, stdout("noise"), noArgs)).toEqual({ ok: true, value: { success: true } });
  });
});

describe("parseJsonRecords", () => {
  it("drops non-object entries of an array", () => {
    expect(parseJsonRecords('[{"a":1}, 2, null, {"b":"x"}]')).toEqual({
      ok: true,
      value: [{ a: 1 }, { b: "x" }],
    });
  });

  it("reports invalid JSON", () => {
    const result = parseJsonRecords("{broken");
    expect(result.ok).toBe(false);
  });
});

describe("parseScalar", () => {
  it("reads counts and booleans", () => {
    expect(parseScalar(" 3 ")).toEqual({ kind: "integer", value: 3 });
    expect(parseScalar("True")).toEqual({ kind: "boolean", value: true });
    expect(parseScalar("False\r\n")).toEqual({ kind: "boolean", value: false });
    expect(parseScalar("")).toBeUndefined();
  });
});

describe("field decoders", () => {
  it("reads text fields with a default", () => {
    expect(textField({ Id: "x" }, "Id")).toBe("x");
    expect(textField({ Id: 7 }, "Id")).toBe("7");
    expect(textField({ Id: null }, "Id")).toBe("unknown");
    expect(textField({}, "Id", "fallback")).toBe("fallback");
  });

  it("reads integer fields with a default", () => {
    expect(intField({ n: 4.9 }, "n")).toBe(4);
    expect(intField({ n: "12" }, "n")).toBe(12);
    expect(intField({ n: "abc" }, "n")).toBe(0);
    expect(intField({}, "n", -1)).toBe(-1);
  });
});
