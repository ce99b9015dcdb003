import { describe, it, expect } from "vitest";
import { isCleanTitle, verifyCleanedTable } from "./verify";

const columns = ["published_at", "title_cleaned", "title", "language"];

describe("verifyCleanedTable", () => {
  it("passes a cleaned table", () => {
    const report = verifyCleanedTable({
      columns,
      rows: [
        { published_at: "2024-11-20", title_cleaned: "bitcoin surges past $100k!!", title: "Bitcoin Surges  Past $100K!!", language: "English" },
        { published_at: "2024-12-01", title_cleaned: "eth flat", title: "ETH flat", language: "english" },
      ],
    });

    expect(report.passed).toBe(true);
    expect(report.checks.map((c) => [c.name, c.passed, c.failures])).toEqual([
      ["date-format", true, 0],
      ["language", true, 0],
      ["title-lowercase", true, 0],
    ]);
    expect(report.languages).toEqual({ English: 1, english: 1 });
    expect(report.sample).toEqual({
      published_at: "2024-11-20",
      title: "Bitcoin Surges  Past $100K!!",
      title_cleaned: "bitcoin surges past $100k!!",
    });
  });

  it("counts failures per check", () => {
    const report = verifyCleanedTable({
      columns,
      rows: [
        { published_at: "2024/11/20", title_cleaned: "Bitcoin", title: "Bitcoin", language: "French" },
        { published_at: "2024-11-21 10:00:00", title_cleaned: "two  spaces", title: "x", language: "English" },
        { published_at: "2024-11-22", title_cleaned: "fine", title: "Fine", language: "English" },
      ],
    });

    expect(report.passed).toBe(false);
    expect(report.checks.map((c) => [c.name, c.passed, c.failures])).toEqual([
      ["date-format", false, 2],
      ["language", false, 1],
      ["title-lowercase", false, 2],
    ]);
  });

  it("fails a check whose column is missing", () => {
    const report = verifyCleanedTable({
      columns: ["published_at", "language"],
      rows: [{ published_at: "2024-11-20", language: "English" }],
    });
    expect(report.checks[2]).toEqual({
      name: "title-lowercase",
      column: "title_cleaned",
      passed: false,
      failures: 1,
    });
  });

  it("passes vacuously on an empty table with all columns", () => {
    const report = verifyCleanedTable({ columns, rows: [] });
    expect(report.passed).toBe(true);
    expect(report.sample).toBeNull();
  });
});

describe("isCleanTitle", () => {
  it("requires lowercase without whitespace runs", () => {
    expect(isCleanTitle("bitcoin surges past $100k!!")).toBe(true);
    expect(isCleanTitle("Bitcoin")).toBe(false);
    expect(isCleanTitle("a\t\tb")).toBe(false);
  });
});
