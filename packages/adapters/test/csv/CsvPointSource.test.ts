import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CsvPointSource, parsePointCsv } from "../../src/csv/CsvPointSource";
import { PointDataError } from "../../src/errors";

describe("parsePointCsv", () => {
  it("reads x,y rows in order", () => {
    expect(parsePointCsv("0,0.1\n0.5,0.25\n1,-0.05\n")).toEqual([
      [0, 0.1],
      [0.5, 0.25],
      [1, -0.05],
    ]);
  });

  it("skips blank lines and ignores extra columns", () => {
    expect(parsePointCsv("\n1, 2, note\r\n\n 3 ,4\n   \n")).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("skips a header row when asked", () => {
    expect(parsePointCsv("x;y\n1;2\n", { delimiter: ";", header: true })).toEqual([[1, 2]]);
  });

  it("reports the line of a row with one field", () => {
    expect(() => parsePointCsv("1,2\n\n3\n")).toThrow('Line 3: expected x,y, got "3"');
  });

  it("reports the line of a non-numeric field", () => {
    let caught: unknown;
    try {
      parsePointCsv("1,2\nabc,4\n");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PointDataError);
    if (!(caught instanceof PointDataError)) return;
    expect(caught.line).toBe(2);
    expect(caught.message).toBe('Line 2: x "abc" is not a number');
  });

  it("rejects empty fields", () => {
    expect(() => parsePointCsv("1,\n")).toThrow('Line 1: y "" is not a number');
  });
});

describe("CsvPointSource", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "linework-csv-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads points from a file", async () => {
    const path = join(dir, "profile.csv");
    await writeFile(path, "0,0\n2,0.5\n", "utf8");
    await expect(new CsvPointSource(path).load()).resolves.toEqual([
      [0, 0],
      [2, 0.5],
    ]);
  });

  it("fails for a missing file", async () => {
    await expect(new CsvPointSource(join(dir, "missing.csv")).load()).rejects.toThrow("ENOENT");
  });
});
