import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { extname } from "path";
import ExcelJS from "exceljs";
import { parseCSVRows } from "./utils/csv.ts";
import { errorMessage } from "./utils/fetch-with-timeout.ts";
import { logger } from "./utils/logger.ts";

export const DEFAULT_INPUT_TXT = "job_links.txt";
export const DEFAULT_INPUT_XLSX = "job_links.xlsx";

export interface SourceReadResult {
  identifiers: string[];
  diagnostic?: string;
}

/** First column whose header mentions "url", else the first column. */
export function pickUrlColumn(headers: string[]): number {
  const idx = headers.findIndex((h) => h.toLowerCase().includes("url"));
  return idx >= 0 ? idx : 0;
}

function fromTable(rows: string[][]): string[] {
  if (rows.length === 0) return [];
  const col = pickUrlColumn(rows[0]);
  return rows
    .slice(1)
    .map((row) => (row[col] ?? "").trim())
    .filter((value) => value !== "");
}

function fromLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

async function readWorkbookRows(path: string): Promise<string[][]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  const sheet = workbook.worksheets[0];
  if (!sheet) return [];

  const rows: string[][] = [];
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: string[] = [];
    for (let c = 1; c <= sheet.columnCount; c++) {
      cells.push(row.getCell(c).text.trim());
    }
    rows.push(cells);
  }
  return rows;
}

/**
 * Loads job URLs (or company names) from a .xlsx, .csv or plain text file.
 * Problems with the file come back as a diagnostic with no identifiers.
 */
export async function readIdentifiers(path: string): Promise<SourceReadResult> {
  const ext = extname(path).toLowerCase();

  if (!existsSync(path)) {
    const diagnostic = `Input file not found: ${path}`;
    logger.error(diagnostic);
    return { identifiers: [], diagnostic };
  }

  try {
    let identifiers: string[];
    let kind: string;

    if (ext === ".xlsx") {
      identifiers = fromTable(await readWorkbookRows(path));
      kind = "Excel";
    } else if (ext === ".xls") {
      throw new Error("legacy .xls workbooks are not supported, save the file as .xlsx");
    } else if (ext === ".csv") {
      identifiers = fromTable(parseCSVRows(await readFile(path, "utf-8")));
      kind = "CSV";
    } else {
      identifiers = fromLines(await readFile(path, "utf-8"));
      kind = "text file";
    }

    logger.info(`Loaded ${identifiers.length} entries from ${kind}: ${path}`);
    return { identifiers };
  } catch (err) {
    const diagnostic = `Could not read ${path}: ${errorMessage(err)}`;
    logger.error(diagnostic);
    return { identifiers: [], diagnostic };
  }
}

/**
 * Input file when --input is not given: INPUT_FILE, else job_links.xlsx if
 * present, else job_links.txt.
 */
export function resolveInputFile(
  env: Record<string, string | undefined>,
  exists: (path: string) => boolean = existsSync
): string {
  const configured = env.INPUT_FILE?.trim();
  if (configured) return configured;
  return exists(DEFAULT_INPUT_XLSX) ? DEFAULT_INPUT_XLSX : DEFAULT_INPUT_TXT;
}
