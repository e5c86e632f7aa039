import { describe, it, expect } from "vitest";
import { parseCsv, splitCsvLine } from "../../src/actions/csv.js";
import { lookupCode, UNKNOWN, VHD_TYPES, VM_STATES } from "../../src/actions/codes.js";

describe("splitCsvLine", () => {
  it("splits quoted fields", () => {
    expect(splitCsvLine('"vm1","GUID-1","2"')).toEqual(["vm1", "GUID-1", "2"]);
  });

  it("keeps delimiters inside quotes", () => {
    expect(splitCsvLine('"web, primary","x"')).toEqual(["web, primary", "x"]);
  });

  it("unescapes doubled quotes", () => {
    expect(splitCsvLine('"say ""hi""",b')).toEqual(['say "hi"', "b"]);
  });

  it("trims unquoted fields", () => {
    expect(splitCsvLine(" a , b ")).toEqual(["a", "b"]);
  });
});

describe("parseCsv", () => {
  const columns = ["name", "id", "state"];

  it("maps rows to columns and skips the header", () => {
    const text = '"Name","Id","State"\r\n"vm1","GUID-1","2"\r\n"vm2","GUID-2","3"\r\n';
    expect(parseCsv(text, columns)).toEqual([
      { name: "vm1", id: "GUID-1", state: "2" },
      { name: "vm2", id: "GUID-2", state: "3" },
    ]);
  });

  it("returns no rows for header-only output", () => {
    expect(parseCsv('"Name","Id","State"\n', columns)).toEqual([]);
  });

  it("returns no rows for empty output", () => {
    expect(parseCsv("", columns)).toEqual([]);
  });

  it("drops short rows and blank lines", () => {
    const text = '"Name","Id","State"\n\n"vm1","GUID-1"\n"vm2","GUID-2","3"';
    expect(parseCsv(text, columns)).toEqual([{ name: "vm2", id: "GUID-2", state: "3" }]);
  });
});

describe("lookupCode", () => {
  it("maps known state codes", () => {
    expect(lookupCode(VM_STATES, 2)).toBe("Running");
    expect(lookupCode(VM_STATES, "3")).toBe("Stopped");
  });

  it("maps unknown codes to Unknown", () => {
    expect(lookupCode(VM_STATES, 99)).toBe(UNKNOWN);
    expect(lookupCode(VM_STATES, "99")).toBe(UNKNOWN);
    expect(lookupCode(VM_STATES, null)).toBe(UNKNOWN);
    expect(lookupCode(VM_STATES, undefined)).toBe(UNKNOWN);
  });

  it("passes through names already in the table", () => {
    expect(lookupCode(VM_STATES, "running")).toBe("Running");
    expect(lookupCode(VHD_TYPES, "Differencing")).toBe("Differencing");
    expect(lookupCode(VHD_TYPES, "Sparse")).toBe(UNKNOWN);
  });

  it("maps disk type codes", () => {
    expect(lookupCode(VHD_TYPES, 1)).toBe("FixedSize");
    expect(lookupCode(VHD_TYPES, 2)).toBe("DynamicExpanding");
    expect(lookupCode(VHD_TYPES, 3)).toBe("Differencing");
  });
});
