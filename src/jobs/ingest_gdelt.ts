import { logger } from "../lib/logger";
import { parseArgs, resolveWindow } from "../lib/args";
import { dataPath } from "../lib/files";
import { GDELT } from "./config";
import { exportGdeltData, fetchGdeltData } from "./gdelt";

const log = logger.child({ job: "gdelt" });

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const window = resolveWindow(args, GDELT);
  const outFile = args.out ?? dataPath(GDELT.outputFile);

  log.info({ keywords: GDELT.keywords, ...window }, "[gdelt] start");
  const { articles, chunks, failedChunks } = await fetchGdeltData({ ...GDELT, ...window });

  const summary = exportGdeltData(articles, outFile);
  if (!summary) {
    log.error(
      { chunks, failedChunks },
      "[gdelt] no articles fetched — check the keywords, the date range, or GDELT rate limiting"
    );
    return 1;
  }

  log.info(
    {
      json: summary.jsonPath,
      csv: summary.csvPath,
      total: summary.total,
      unique: summary.unique,
      dateRange: summary.dateRange,
      uniqueSources: summary.uniqueSources,
      languages: summary.languages,
      failedChunks,
    },
    "[gdelt] ALL DONE"
  );
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    log.fatal({ err: e }, "[gdelt] FATAL");
    process.exitCode = 1;
  }
);
