import ExcelJS from "exceljs";
import type { FieldValue, JobPosting, ReviewBundle } from "./utils/types.ts";

export const SHEET_SUMMARY = "Summary";
export const SHEET_JOBS = "Jobs Summary";
export const SHEET_REVIEWS = "Company Reviews";

export const JOB_HEADERS = ["Company", "Role", "Experience", "Level", "Location", "Remote", "Match Score"] as const;
export const REVIEW_HEADERS = ["Company", "Review Score", "Source", "Rating", "Comment", "URL"] as const;

const TOP_MATCHES = 5;

type Cell = FieldValue | null;
type Row = Cell[];

// ── Sorting ──────────────────────────────────────────────────────────

const DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Canonical score used by every ranking in the report: finite numbers as-is,
 * plain decimal strings parsed, anything else 0.
 */
export function scoreOf(value: FieldValue | undefined): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && DECIMAL.test(value.trim())) {
    return Number(value.trim());
  }
  return 0;
}

/** Highest match score first; equal scores keep their input order. */
export function rankByMatchScore(postings: readonly JobPosting[]): JobPosting[] {
  return postings
    .map((posting, index) => ({ posting, index, score: scoreOf(posting.matchScore) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ posting }) => posting);
}

// ── Row builders ─────────────────────────────────────────────────────

export function jobsSheetRows(postings: readonly JobPosting[]): Row[] {
  return rankByMatchScore(postings).map((job) => [
    job.companyName,
    job.roleName,
    job.experienceRequired,
    job.experienceType,
    job.location.city,
    job.remote,
    job.matchScore,
  ]);
}

export function reviewSheetRows(bundles: readonly ReviewBundle[]): Row[] {
  const rows: Row[] = [];
  for (const bundle of bundles) {
    if (bundle.reviews.length === 0) {
      rows.push([bundle.companyName, bundle.aggregatedReviewScore, null, null, null, null]);
      continue;
    }
    for (const review of bundle.reviews) {
      rows.push([
        bundle.companyName,
        bundle.aggregatedReviewScore,
        review.source,
        review.rating,
        review.comment,
        review.url,
      ]);
    }
  }
  return rows;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatGenerated(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/** Local time as YYYYMMDD_HHMMSS, used in default report names. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function defaultReportName(date: Date): string {
  return `jobs_${fileTimestamp(date)}.xlsx`;
}

export function summaryRows(
  postings: readonly JobPosting[],
  bundles: readonly ReviewBundle[],
  generatedAt: Date
): Row[] {
  const rows: Row[] = [
    ["Job Scraping Report", ""],
    ["Generated", formatGenerated(generatedAt)],
    ["", ""],
    ["Total Jobs Found", postings.length],
    ["Companies Reviewed", bundles.length],
    ["", ""],
  ];

  if (postings.length > 0) {
    rows.push(["Top Matches", ""]);
    rankByMatchScore(postings)
      .slice(0, TOP_MATCHES)
      .forEach((job, idx) => {
        rows.push([`${idx + 1}. ${job.companyName} - ${job.roleName}`, `Score: ${job.matchScore}`]);
      });
  }
  return rows;
}

// ── Workbook ─────────────────────────────────────────────────────────

const HEADER_FILL: ExcelJS.Fill = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FF4472C4" },
};
const HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" }, size: 11 };
const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: "thin" },
  left: { style: "thin" },
  bottom: { style: "thin" },
  right: { style: "thin" },
};
const CENTER: Partial<ExcelJS.Alignment> = { horizontal: "center", vertical: "middle", wrapText: true };
const LEFT: Partial<ExcelJS.Alignment> = { horizontal: "left", vertical: "top", wrapText: true };

interface TableLayout {
  headers: readonly string[];
  widths: number[];
  centered: ReadonlySet<string>;
}

const JOBS_LAYOUT: TableLayout = {
  headers: JOB_HEADERS,
  widths: [25, 30, 15, 15, 20, 12, 12],
  centered: new Set(["Remote", "Match Score"]),
};

const REVIEWS_LAYOUT: TableLayout = {
  headers: REVIEW_HEADERS,
  widths: [25, 12, 15, 10, 45, 35],
  centered: new Set(["Review Score", "Rating"]),
};

function addTableSheet(workbook: ExcelJS.Workbook, name: string, layout: TableLayout, rows: Row[]): void {
  const sheet = workbook.addWorksheet(name);
  sheet.columns = layout.headers.map((header, i) => ({ header, width: layout.widths[i] }));

  sheet.getRow(1).eachCell((cell) => {
    cell.fill = HEADER_FILL;
    cell.font = HEADER_FONT;
    cell.border = THIN_BORDER;
    cell.alignment = CENTER;
  });

  for (const values of rows) {
    const row = sheet.addRow(values);
    layout.headers.forEach((header, i) => {
      const cell = row.getCell(i + 1);
      if (cell.value === null) return;
      cell.border = THIN_BORDER;
      cell.alignment = layout.centered.has(header) ? CENTER : LEFT;
    });
  }
}

function addSummarySheet(workbook: ExcelJS.Workbook, rows: Row[]): void {
  const sheet = workbook.addWorksheet(SHEET_SUMMARY);
  sheet.getColumn(1).width = 35;
  sheet.getColumn(2).width = 20;

  rows.forEach((values, idx) => {
    const row = sheet.addRow(values);
    const rowNumber = idx + 1;
    if (rowNumber === 1) {
      row.eachCell((cell) => {
        cell.font = { bold: true, size: 14, color: { argb: "FFFFFFFF" } };
        cell.fill = HEADER_FILL;
      });
    } else if (values[0] === "Total Jobs Found" || values[0] === "Top Matches") {
      row.eachCell((cell) => {
        cell.font = { bold: true, size: 12 };
      });
    }
  });
}

/**
 * Summary always comes first; the jobs and reviews sheets are added only
 * when there is something to put in them.
 */
export function buildWorkbook(
  postings: readonly JobPosting[],
  bundles: readonly ReviewBundle[],
  generatedAt: Date
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = generatedAt;

  addSummarySheet(workbook, summaryRows(postings, bundles, generatedAt));
  if (postings.length > 0) addTableSheet(workbook, SHEET_JOBS, JOBS_LAYOUT, jobsSheetRows(postings));
  if (bundles.length > 0) addTableSheet(workbook, SHEET_REVIEWS, REVIEWS_LAYOUT, reviewSheetRows(bundles));

  return workbook;
}

export type ReportOutcome = { status: "empty" } | { status: "written"; path: string };

export interface WriteReportOptions {
  outputPath?: string;
  now?: Date;
}

/** Writes the workbook, or reports "empty" without touching disk when there is no data. */
export async function writeReport(
  postings: readonly JobPosting[],
  bundles: readonly ReviewBundle[],
  options: WriteReportOptions = {}
): Promise<ReportOutcome> {
  if (postings.length === 0 && bundles.length === 0) {
    return { status: "empty" };
  }

  const now = options.now ?? new Date();
  const path = options.outputPath ?? defaultReportName(now);
  await buildWorkbook(postings, bundles, now).xlsx.writeFile(path);
  return { status: "written", path };
}
