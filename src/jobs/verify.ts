import { readCsv } from "../lib/files";
import { countBy } from "../lib/summary";
import type { Table } from "./clean";

export type CheckName = "date-format" | "language" | "title-lowercase";

export type CheckResult = {
  name: CheckName;
  column: string;
  passed: boolean;
  failures: number;
};

export type VerificationReport = {
  rows: number;
  checks: CheckResult[];
  passed: boolean;
  languages: Record<string, number>;
  sample: { published_at: string; title: string; title_cleaned: string } | null;
};

const DAY = /^\d{4}-\d{2}-\d{2}$/;

export const isCleanTitle = (t: string) => t === t.toLowerCase() && !/\s{2,}/.test(t);

function check(
  table: Table,
  name: CheckName,
  column: string,
  ok: (value: string) => boolean
): CheckResult {
  if (!table.columns.includes(column)) {
    return { name, column, passed: false, failures: table.rows.length };
  }
  const failures = table.rows.filter((r) => !ok(r[column] ?? "")).length;
  return { name, column, passed: failures === 0, failures };
}

export function verifyCleanedTable(table: Table, language = "english"): VerificationReport {
  const want = language.toLowerCase();
  const checks = [
    check(table, "date-format", "published_at", (v) => DAY.test(v)),
    check(table, "language", "language", (v) => v.toLowerCase() === want),
    check(table, "title-lowercase", "title_cleaned", isCleanTitle),
  ];
  const first = table.rows[0];
  return {
    rows: table.rows.length,
    checks,
    passed: checks.every((c) => c.passed),
    languages: countBy(table.rows.map((r) => r.language ?? "")),
    sample: first
      ? {
          published_at: first.published_at ?? "",
          title: first.title ?? "",
          title_cleaned: first.title_cleaned ?? "",
        }
      : null,
  };
}

export function verifyCleanedFile(csvPath: string, language = "english"): VerificationReport {
  return verifyCleanedTable(readCsv(csvPath), language);
}
