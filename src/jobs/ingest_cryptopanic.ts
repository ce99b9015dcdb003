import { ENV, must } from "../lib/env";
import { logger } from "../lib/logger";
import { parseArgs, resolveWindow } from "../lib/args";
import { dataPath } from "../lib/files";
import { CRYPTOPANIC } from "./config";
import { exportCryptoPanicData, fetchCryptoPanicData } from "./cryptopanic";

const log = logger.child({ job: "cryptopanic" });

async function main(): Promise<number> {
  // fail before any request goes out
  const apiKey = must("CRYPTOPANIC_API_KEY");
  const args = parseArgs(process.argv.slice(2));
  const window = resolveWindow(args, CRYPTOPANIC);
  const currencies = args.currencies ?? CRYPTOPANIC.currencies;
  const outFile = args.out ?? dataPath(CRYPTOPANIC.outputFile);

  log.info(
    { ...window, currencies, env: ENV.NODE_ENV, apiKey: "***" },
    "[cryptopanic] start (historical access may be limited on the free plan)"
  );

  const { posts, pages, stopReason } = await fetchCryptoPanicData(
    { ...CRYPTOPANIC, ...window, currencies },
    apiKey
  );

  const summary = exportCryptoPanicData(posts, outFile);
  if (!summary) {
    log.error(
      { pages, stopReason },
      "[cryptopanic] no posts in the date window — try a more recent range or check the API plan"
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
      averageVotes: Number(summary.averageVotes.toFixed(2)),
      positiveVotes: summary.positiveVotes,
      negativeVotes: summary.negativeVotes,
      pages,
      stopReason,
    },
    "[cryptopanic] ALL DONE"
  );
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    log.fatal({ err: e }, "[cryptopanic] FATAL");
    process.exitCode = 1;
  }
);
