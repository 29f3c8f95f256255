import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import ExcelJS from "exceljs";
import { pickUrlColumn, readIdentifiers, resolveInputFile } from "../src/input.ts";

describe("pickUrlColumn", () => {
  it("picks the first header mentioning url, case-insensitively", () => {
    expect(pickUrlColumn(["Company", "Job URL", "Other url"])).toBe(1);
  });

  it("falls back to the first column", () => {
    expect(pickUrlColumn(["Link", "Notes"])).toBe(0);
  });
});

describe("readIdentifiers", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "jobscope-input-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads one trimmed identifier per non-empty line of a text file", async () => {
    const path = join(dir, "links.txt");
    writeFileSync(path, "https://a.example/job\n\n  https://b.example/job  \n   \n");

    expect(await readIdentifiers(path)).toEqual({
      identifiers: ["https://a.example/job", "https://b.example/job"],
    });
  });

  it("uses the url column of a CSV and drops empty cells", async () => {
    const path = join(dir, "links.csv");
    writeFileSync(path, "Company,Job URL\nAcme,https://a.example/job\nGlobex,\nInitech, https://c.example/job\n");

    expect((await readIdentifiers(path)).identifiers).toEqual(["https://a.example/job", "https://c.example/job"]);
  });

  it("uses the first column of a CSV without a url header", async () => {
    const path = join(dir, "links.csv");
    writeFileSync(path, "link,notes\nhttps://a.example/job,first\n");

    expect((await readIdentifiers(path)).identifiers).toEqual(["https://a.example/job"]);
  });

  it("reads the url column of the first worksheet of an xlsx file", async () => {
    const path = join(dir, "links.xlsx");
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet("Links");
    sheet.addRow(["Company", "Posting URL"]);
    sheet.addRow(["Acme", "https://a.example/job"]);
    sheet.addRow(["Globex", null]);
    sheet.addRow(["Initech", "https://c.example/job"]);
    await workbook.xlsx.writeFile(path);

    expect(await readIdentifiers(path)).toEqual({
      identifiers: ["https://a.example/job", "https://c.example/job"],
    });
  });

  it("returns a diagnostic for a missing file", async () => {
    const path = join(dir, "missing.txt");
    expect(await readIdentifiers(path)).toEqual({
      identifiers: [],
      diagnostic: `Input file not found: ${path}`,
    });
  });

  it("returns a diagnostic for a legacy .xls workbook", async () => {
    const path = join(dir, "links.xls");
    writeFileSync(path, "not really a workbook");

    const result = await readIdentifiers(path);
    expect(result.identifiers).toEqual([]);
    expect(result.diagnostic).toBe(
      `Could not read ${path}: legacy .xls workbooks are not supported, save the file as .xlsx`
    );
  });

  it("returns a diagnostic for a corrupt xlsx file", async () => {
    const path = join(dir, "broken.xlsx");
    writeFileSync(path, "definitely not a zip archive");

    const result = await readIdentifiers(path);
    expect(result.identifiers).toEqual([]);
    expect(result.diagnostic).toMatch(new RegExp(`^Could not read ${path.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}: `));
  });
});

describe("resolveInputFile", () => {
  it("prefers INPUT_FILE", () => {
    expect(resolveInputFile({ INPUT_FILE: "my-links.csv" }, () => true)).toBe("my-links.csv");
  });

  it("uses job_links.xlsx when it exists", () => {
    expect(resolveInputFile({}, (path) => path === "job_links.xlsx")).toBe("job_links.xlsx");
  });

  it("falls back to job_links.txt", () => {
    expect(resolveInputFile({}, () => false)).toBe("job_links.txt");
  });
});
