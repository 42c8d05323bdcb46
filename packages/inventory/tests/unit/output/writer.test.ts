import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { formatTimestamp, resolveOutputPath, writeReport } from "../../../src/output/writer.js";

// Local time, 2026-03-07 09:05:02
const now = new Date(2026, 2, 7, 9, 5, 2);

describe("formatTimestamp", () => {
  it("zero-pads every component", () => {
    expect(formatTimestamp(now)).toBe("20260307-090502");
  });
});

describe("resolveOutputPath", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cachescope-writer-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("generates a file name for a trailing-slash directory", () => {
    const target = `${path.join(tempDir, "reports")}/`;

    expect(resolveOutputPath({ output: target, region: "us-east-1", extension: "csv", now })).toBe(
      path.join(tempDir, "reports", "elasticache-us-east-1-20260307-090502.csv")
    );
  });

  it("generates a file name for an existing directory", () => {
    expect(resolveOutputPath({ output: tempDir, region: "eu-west-1", extension: "md", now })).toBe(
      path.join(tempDir, "elasticache-eu-west-1-20260307-090502.md")
    );
  });

  it("uses an explicit file path as given", () => {
    const file = path.join(tempDir, "inventory.csv");

    expect(resolveOutputPath({ output: file, region: "us-east-1", extension: "csv", now })).toBe(file);
  });
});

describe("writeReport", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cachescope-writer-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("creates missing parent directories", () => {
    const file = path.join(tempDir, "a", "b", "report.csv");

    writeReport(file, "Name\r\nrg-1\r\n");

    expect(fs.readFileSync(file, "utf-8")).toBe("Name\r\nrg-1\r\n");
  });
});
