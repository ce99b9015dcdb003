import { logger } from "../lib/logger";
import { dataPath } from "../lib/files";
import { CLEANING } from "./config";
import { cleanGdeltFiles } from "./clean";

const log = logger.child({ job: "clean" });

function main(): number {
  const summary = cleanGdeltFiles(
    {
      inputCsv: dataPath(CLEANING.inputCsv),
      inputJson: dataPath(CLEANING.inputJson),
      outputCsv: dataPath(CLEANING.outputCsv),
      outputJson: dataPath(CLEANING.outputJson),
    },
    CLEANING.language,
    log
  );
  log.info(
    { ...summary, outputs: [CLEANING.outputCsv, CLEANING.outputJson] },
    "[clean] ALL DONE"
  );
  return 0;
}

try {
  process.exitCode = main();
} catch (e: unknown) {
  log.fatal({ err: e }, "[clean] FATAL");
  process.exitCode = 1;
}
