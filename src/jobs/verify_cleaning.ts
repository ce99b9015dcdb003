import { logger } from "../lib/logger";
import { dataPath } from "../lib/files";
import { CLEANING } from "./config";
import { verifyCleanedFile } from "./verify";

const log = logger.child({ job: "verify" });

function main(): number {
  const report = verifyCleanedFile(dataPath(CLEANING.outputCsv), CLEANING.language);
  log.info({ rows: report.rows, languages: report.languages, sample: report.sample }, "[verify] loaded");

  for (const c of report.checks) {
    const line = `[verify] ${c.name} (${c.column}): ${c.passed ? "OK" : "FAIL"}`;
    if (c.passed) log.info(line);
    else log.warn({ failures: c.failures }, line);
  }

  if (!report.passed) {
    log.error("[verify] some cleaning requirements not met");
    return 1;
  }
  log.info("[verify] all cleaning requirements met");
  return 0;
}

try {
  process.exitCode = main();
} catch (e: unknown) {
  log.fatal({ err: e }, "[verify] FATAL");
  process.exitCode = 1;
}
