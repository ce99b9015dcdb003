import fs from "fs";
import os from "os";
import path from "path";
import pino from "pino";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { readCsv, writeCsv, writeJson } from "../lib/files";
import { GDELT_ROW_COLUMNS } from "../types/gdelt";
import type { GdeltRow } from "../types/gdelt";
import {
  cleanGdeltFiles,
  cleanTable,
  cleanTitle,
  loadGdeltTable,
  orderColumns,
  standardizeDate,
} from "./clean";
import { verifyCleanedFile } from "./verify";

const log = pino({ level: "silent" });

const row = (over: Partial<GdeltRow>): GdeltRow => ({
  title: "",
  url: "",
  published_at: "",
  seendate: "",
  source: "",
  snippet: "",
  language: "English",
  ...over,
});

const rows: GdeltRow[] = [
  row({
    title: "Bitcoin Surges  Past $100K!!",
    url: "u1",
    published_at: "2024-12-05 10:00:00",
    seendate: "20241205T100000Z",
    source: "a.example",
  }),
  row({ title: "ETH news", url: "u2", published_at: "2024-11-02 08:00:00", language: "Spanish" }),
  row({ title: "   ", url: "u3", published_at: "2024-11-03 08:00:00", language: "english" }),
  row({ title: "Crypto Winter", url: "u4", published_at: "not a date", language: "ENGLISH" }),
  row({
    title: "Blockchain\tWeekly",
    url: "u5",
    published_at: "2024-11-20 00:00:00",
    seendate: "bad",
    source: "b.example",
  }),
  row({ title: "Bitcoin Again", url: "u1", published_at: "2024-12-06 00:00:00" }),
];

describe("cleanTitle", () => {
  it("lowercases and collapses whitespace", () => {
    expect(cleanTitle("Bitcoin Surges  Past $100K!!")).toBe("bitcoin surges past $100k!!");
    expect(cleanTitle("  Tabs\tand\nnewlines ")).toBe("tabs and newlines");
    expect(cleanTitle(null)).toBe("");
  });
});

describe("standardizeDate", () => {
  it.each([
    ["2024-11-01 08:00:00", "2024-11-01"],
    ["2024-11-01", "2024-11-01"],
    ["20241118T080000Z", "2024-11-18"],
    ["2024-11-18T08:00:00Z", "2024-11-18"],
    ["2024-11-18T08:00:00", "2024-11-18"],
    ["crawled 2024-11-05 (utc)", "2024-11-05"],
  ])("%s -> %s", (raw, day) => {
    expect(standardizeDate(raw)).toBe(day);
  });

  it("returns null for unusable input", () => {
    expect(standardizeDate("Nov 5, 2024")).toBeNull();
    expect(standardizeDate("")).toBeNull();
    expect(standardizeDate(undefined)).toBeNull();
  });
});

describe("cleanTable", () => {
  it("filters, normalizes, dedups and sorts", () => {
    const out = cleanTable({ columns: [...GDELT_ROW_COLUMNS], rows }, "english", log);

    expect(out.columns).toEqual([
      "published_at",
      "title_cleaned",
      "title",
      "url",
      "source",
      "snippet",
      "language",
      "seendate",
      "seendate_standardized",
    ]);
    expect(out.rows.map((r) => [r.published_at, r.title_cleaned, r.url])).toEqual([
      ["2024-11-20", "blockchain weekly", "u5"],
      ["2024-12-05", "bitcoin surges past $100k!!", "u1"],
    ]);
    expect(out.rows.map((r) => r.seendate_standardized)).toEqual(["", "2024-12-05"]);
  });

  it("does not mutate its input", () => {
    const input = { columns: [...GDELT_ROW_COLUMNS], rows: [row({ title: "A", url: "x", published_at: "2024-11-01" })] };
    cleanTable(input, "english", log);
    expect(input.rows[0].published_at).toBe("2024-11-01");
    expect(input.columns).toHaveLength(7);
  });

  it("skips the language step when the column is absent", () => {
    const out = cleanTable(
      { columns: ["title", "published_at"], rows: [{ title: "Hola Bitcoin", published_at: "2024-11-01" }] },
      "english",
      log
    );
    expect(out.rows).toEqual([
      { title: "Hola Bitcoin", published_at: "2024-11-01", title_cleaned: "hola bitcoin" },
    ]);
  });
});

describe("orderColumns", () => {
  it("puts the known columns first", () => {
    expect(orderColumns(["extra", "language", "title", "published_at"])).toEqual([
      "published_at",
      "title",
      "language",
      "extra",
    ]);
  });
});

describe("files", () => {
  let dir: string;
  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "gdelt-clean-"));
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const paths = () => ({
    inputCsv: path.join(dir, "gdelt_data.csv"),
    inputJson: path.join(dir, "gdelt_data.json"),
    outputCsv: path.join(dir, "gdelt_data_cleaned.csv"),
    outputJson: path.join(dir, "gdelt_data_cleaned.json"),
  });

  it("falls back to the raw JSON export", () => {
    const p = paths();
    writeJson(p.inputJson, [
      { title: "Bitcoin", url: "u1", seendate: "20241109T164500Z", domain: "a.example", language: "English" },
      "not an article",
    ]);

    const table = loadGdeltTable(p.inputCsv, p.inputJson);

    expect(table.from).toBe(p.inputJson);
    expect(table.columns).toEqual([...GDELT_ROW_COLUMNS]);
    expect(table.rows).toEqual([
      {
        title: "Bitcoin",
        url: "u1",
        published_at: "2024-11-09 16:45:00",
        seendate: "20241109T164500Z",
        source: "a.example",
        snippet: "",
        language: "English",
      },
    ]);
  });

  it("fails when neither input exists", () => {
    const p = paths();
    expect(() => loadGdeltTable(p.inputCsv, p.inputJson)).toThrow(
      `Neither ${p.inputCsv} nor ${p.inputJson} found`
    );
  });

  it("cleans the CSV export into files that pass verification", () => {
    const p = paths();
    writeCsv(p.inputCsv, rows, GDELT_ROW_COLUMNS);

    const summary = cleanGdeltFiles(p, "english", log);

    expect(summary).toEqual({
      loadedFrom: p.inputCsv,
      originalRows: 6,
      cleanedRows: 2,
      removedRows: 4,
      dateRange: { min: "2024-11-20", max: "2024-12-05" },
      uniqueSources: 2,
    });

    const csv = readCsv(p.outputCsv);
    expect(csv.columns[0]).toBe("published_at");
    expect(csv.rows[1].title).toBe("Bitcoin Surges  Past $100K!!");

    const json: unknown = JSON.parse(fs.readFileSync(p.outputJson, "utf-8"));
    expect(Array.isArray(json) && Object.keys(json[0])).toEqual(csv.columns);

    expect(verifyCleanedFile(p.outputCsv).passed).toBe(true);
  });
});
