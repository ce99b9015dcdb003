import { httpGet } from "./http";
import type { HttpGet } from "./http";
import { logger } from "./logger";
import type { Logger } from "./logger";
import { sleep } from "./rate_limit";
import type { Sleep } from "./rate_limit";

/** Side effects a fetch job needs; tests swap in fakes. */
export type FetchDeps = {
  http: HttpGet;
  sleep: Sleep;
  log: Logger;
};

export function resolveDeps(job: string, deps: Partial<FetchDeps> = {}): FetchDeps {
  return {
    http: deps.http ?? httpGet,
    sleep: deps.sleep ?? sleep,
    log: deps.log ?? logger.child({ job }),
  };
}
