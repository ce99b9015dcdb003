import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { ENV } from "./env";

type CsvValue = string | number | null;
export type CsvRow = Record<string, CsvValue>;

/** Resolve a file name inside DATA_DIR; absolute paths pass through. */
export function dataPath(name: string): string {
  return path.isAbsolute(name) ? name : path.resolve(ENV.DATA_DIR, name);
}

/** `foo.json` -> `foo.csv`; any other name gets `.csv` appended. */
export function csvPathFor(jsonPath: string): string {
  return /\.json$/i.test(jsonPath) ? jsonPath.replace(/\.json$/i, ".csv") : `${jsonPath}.csv`;
}

function ensureDir(file: string) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
}

export function writeJson(file: string, data: unknown) {
  ensureDir(file);
  fs.writeFileSync(file, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

export function writeCsv(file: string, rows: CsvRow[], columns: readonly string[]) {
  ensureDir(file);
  const out = stringify(rows, {
    header: true,
    columns: columns.map((key) => ({ key })),
  });
  fs.writeFileSync(file, out, "utf-8");
}

const CsvRecords = z.array(z.array(z.string()));

/** Rows keyed by header; every cell is a string, empty cells are "". */
export function readCsv(file: string): { columns: string[]; rows: Record<string, string>[] } {
  const text = fs.readFileSync(file, "utf-8");
  const records = CsvRecords.parse(parse(text, { bom: true, skip_empty_lines: true }));
  const [header, ...body] = records;
  if (!header) return { columns: [], rows: [] };
  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((col, i) => {
      row[col] = cells[i] ?? "";
    });
    return row;
  });
  return { columns: header, rows };
}

export function fileExists(file: string): boolean {
  return fs.existsSync(file);
}

/** Keeps the first row for each key, preserving order. */
export function dedupeBy<T>(rows: T[], key: (row: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const r of rows) {
    const k = key(r);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(r);
  }
  return out;
}
