import { logger } from "../lib/logger";
import type { Logger } from "../lib/logger";
import { formatDay, parseDate, TABLE_DATE_STRATEGIES } from "../lib/dates";
import { dedupeBy, fileExists, readCsv, readJson, writeCsv, writeJson } from "../lib/files";
import { uniqueCount, valueRange } from "../lib/summary";
import type { ValueRange } from "../lib/summary";
import { GdeltArticleSchema, GDELT_ROW_COLUMNS } from "../types/gdelt";
import { toGdeltRow } from "./gdelt";

export type Table = {
  columns: string[];
  rows: Record<string, string>[];
};

/** Lowercase, collapse whitespace runs, trim. */
export function cleanTitle(title: unknown): string {
  if (typeof title !== "string") return "";
  return title.toLowerCase().replace(/\s+/g, " ").trim();
}

/** Any supported timestamp -> `YYYY-MM-DD`, or null. */
export function standardizeDate(raw: unknown): string | null {
  if (typeof raw !== "string" || raw === "") return null;
  const r = parseDate(raw, TABLE_DATE_STRATEGIES);
  return r.ok ? formatDay(r.value) : null;
}

const LEADING_COLUMNS = [
  "published_at",
  "title_cleaned",
  "title",
  "url",
  "source",
  "snippet",
  "language",
];

export function orderColumns(columns: string[]): string[] {
  const lead = LEADING_COLUMNS.filter((c) => columns.includes(c));
  const rest = columns.filter((c) => !LEADING_COLUMNS.includes(c));
  return [...lead, ...rest];
}

/**
 * Language filter, date standardization, title cleaning, empty-title drop,
 * URL dedup, then a stable sort by date. Steps whose column is missing are
 * skipped.
 */
export function cleanTable(
  input: Table,
  language: string,
  log: Logger = logger.child({ job: "clean" })
): Table {
  const has = (c: string) => input.columns.includes(c);
  let rows = input.rows.map((r) => ({ ...r }));
  const columns = [...input.columns];
  log.info({ rows: rows.length }, "original data");

  if (has("language")) {
    const want = language.toLowerCase();
    rows = rows.filter((r) => (r.language ?? "").toLowerCase() === want);
    log.info({ rows: rows.length }, `after language filter (${language})`);
  } else {
    log.warn("no language column, skipping language filter");
  }

  if (has("published_at")) {
    const kept: Record<string, string>[] = [];
    for (const r of rows) {
      const day = standardizeDate(r.published_at);
      if (day) kept.push({ ...r, published_at: day });
    }
    rows = kept;
    log.info({ rows: rows.length }, "after date standardization");
  }

  if (has("seendate")) {
    rows = rows.map((r) => ({ ...r, seendate_standardized: standardizeDate(r.seendate) ?? "" }));
    columns.push("seendate_standardized");
  }

  if (has("title")) {
    rows = rows.map((r) => ({ ...r, title_cleaned: cleanTitle(r.title) }));
    columns.push("title_cleaned");
    rows = rows.filter((r) => r.title_cleaned !== "");
    log.info({ rows: rows.length }, "after removing empty titles");
  }

  if (has("url")) {
    rows = dedupeBy(rows, (r) => r.url ?? "");
    log.info({ rows: rows.length }, "after url dedup");
  }

  if (has("published_at")) {
    // Array#sort is stable, so equal dates keep their input order
    rows = [...rows].sort((a, b) =>
      a.published_at < b.published_at ? -1 : a.published_at > b.published_at ? 1 : 0
    );
  }

  return { columns: orderColumns(columns), rows };
}

export type LoadedTable = Table & { from: string };

/** The fetcher's CSV when present, otherwise its raw JSON projected to the same columns. */
export function loadGdeltTable(csvPath: string, jsonPath: string): LoadedTable {
  if (fileExists(csvPath)) {
    return { ...readCsv(csvPath), from: csvPath };
  }
  if (fileExists(jsonPath)) {
    const data = readJson(jsonPath);
    const items = Array.isArray(data) ? data : [];
    const rows: Record<string, string>[] = [];
    for (const item of items) {
      const parsed = GdeltArticleSchema.safeParse(item);
      if (parsed.success) rows.push(toGdeltRow(parsed.data));
    }
    return { columns: [...GDELT_ROW_COLUMNS], rows, from: jsonPath };
  }
  throw new Error(`Neither ${csvPath} nor ${jsonPath} found`);
}

export type CleaningSummary = {
  loadedFrom: string;
  originalRows: number;
  cleanedRows: number;
  removedRows: number;
  dateRange: ValueRange | null;
  uniqueSources: number | null;
};

export type CleaningPaths = {
  inputCsv: string;
  inputJson: string;
  outputCsv: string;
  outputJson: string;
};

export function cleanGdeltFiles(
  paths: CleaningPaths,
  language: string,
  log: Logger = logger.child({ job: "clean" })
): CleaningSummary {
  const input = loadGdeltTable(paths.inputCsv, paths.inputJson);
  log.info({ from: input.from, rows: input.rows.length, columns: input.columns }, "loaded");

  const cleaned = cleanTable(input, language, log);
  writeCsv(paths.outputCsv, cleaned.rows, cleaned.columns);
  writeJson(
    paths.outputJson,
    cleaned.rows.map((r) => Object.fromEntries(cleaned.columns.map((c) => [c, r[c] ?? ""])))
  );

  return {
    loadedFrom: input.from,
    originalRows: input.rows.length,
    cleanedRows: cleaned.rows.length,
    removedRows: input.rows.length - cleaned.rows.length,
    dateRange: cleaned.columns.includes("published_at")
      ? valueRange(cleaned.rows.map((r) => r.published_at ?? ""))
      : null,
    uniqueSources: cleaned.columns.includes("source")
      ? uniqueCount(cleaned.rows.map((r) => r.source ?? ""))
      : null,
  };
}
