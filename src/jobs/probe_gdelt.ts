import { logger } from "../lib/logger";
import { httpGet, truncate } from "../lib/http";
import { GDELT, PROBE } from "./config";
import { buildQuery, describePayload } from "./gdelt";

const log = logger.child({ job: "probe" });

/** One small artlist request to see what the API answers right now. */
async function main(): Promise<number> {
  const query = buildQuery(PROBE.keywords);
  log.info(
    { url: GDELT.baseUrl, query, from: PROBE.startDateTime, to: PROBE.endDateTime },
    "[probe] testing GDELT API"
  );

  const res = await httpGet(
    GDELT.baseUrl,
    {
      query,
      mode: "artlist",
      maxrecords: PROBE.maxRecords,
      format: "json",
      startdatetime: PROBE.startDateTime,
      enddatetime: PROBE.endDateTime,
    },
    PROBE.timeoutMs
  );

  log.info({ status: res.status, contentType: res.contentType, length: res.body.length }, "[probe] response");
  if (res.status !== 200) {
    log.error({ body: truncate(res.body, 500) }, "[probe] error response");
    return 1;
  }
  log.info({ head: truncate(res.body.trim(), 500) }, "[probe] first 500 characters");
  log.info(`[probe] ${describePayload(res.body)}`);
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    log.fatal({ err: e }, "[probe] FATAL");
    process.exitCode = 1;
  }
);
