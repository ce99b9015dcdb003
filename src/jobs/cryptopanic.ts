import { parseJson, truncate, describeError, maskParams } from "../lib/http";
import type { HttpResponse, QueryParams } from "../lib/http";
import { resolveDeps } from "../lib/deps";
import type { FetchDeps } from "../lib/deps";
import { parseDate, parseDay, POST_DATE_STRATEGIES } from "../lib/dates";
import { csvPathFor, dedupeBy, writeCsv, writeJson } from "../lib/files";
import { uniqueCount, valueRange } from "../lib/summary";
import type { ValueRange } from "../lib/summary";
import type { CryptoPanicOptions } from "./config";
import { CryptoPanicPostSchema, CRYPTOPANIC_ROW_COLUMNS } from "../types/cryptopanic";
import type { CryptoPanicPost, CryptoPanicRow } from "../types/cryptopanic";

export type StopReason =
  | "empty-page"
  | "older-than-start"
  | "nothing-in-window"
  | "no-next-page"
  | "probe-exhausted"
  | "page-limit"
  | "http-error"
  | "transport-error"
  | "invalid-json";

export type CryptoPanicFetchResult = {
  posts: CryptoPanicPost[];
  pages: number;
  stopReason: StopReason;
};

type Page = { posts: unknown[]; next: unknown };

/** Posts live under `results`, at the top level, or under `data`. */
export function readPage(payload: unknown): Page {
  if (Array.isArray(payload)) return { posts: payload, next: null };
  if (payload && typeof payload === "object") {
    const obj: Record<string, unknown> = { ...payload };
    const posts = Array.isArray(obj.results)
      ? obj.results
      : Array.isArray(obj.data)
        ? obj.data
        : [];
    return { posts, next: obj.next ?? null };
  }
  return { posts: [], next: null };
}

/** First truthy of published_at, created_at, date. */
export function postDate(post: CryptoPanicPost): unknown {
  return post.published_at || post.created_at || post.date || undefined;
}

/**
 * Walks the posts feed page by page, keeping posts inside
 * [startDate 00:00Z, endDate 00:00Z]. Any failure ends the walk; whatever was
 * collected so far is returned.
 */
export async function fetchCryptoPanicData(
  options: CryptoPanicOptions,
  apiKey: string,
  deps: Partial<FetchDeps> = {}
): Promise<CryptoPanicFetchResult> {
  const { http, sleep, log } = resolveDeps("cryptopanic", deps);
  const start = parseDay(options.startDate).getTime();
  const end = parseDay(options.endDate).getTime();

  log.info(
    { start: options.startDate, end: options.endDate, currencies: options.currencies },
    "fetching CryptoPanic posts"
  );

  const collected: CryptoPanicPost[] = [];
  const done = (stopReason: StopReason, pages: number): CryptoPanicFetchResult => {
    log.info({ total: collected.length, pages, stopReason }, "CryptoPanic fetch finished");
    return { posts: collected, pages, stopReason };
  };

  for (let page = 1; page <= options.maxPages; page++) {
    if (page > 1) await sleep(options.delayMs);

    const params: QueryParams = {
      auth_token: apiKey,
      currencies: options.currencies,
      page,
      public: "true",
    };
    const plog = log.child({ page });
    plog.debug({ url: options.baseUrl, params: maskParams(params, ["auth_token"]) }, "request");

    let res: HttpResponse;
    try {
      res = await http(options.baseUrl, params, options.timeoutMs);
    } catch (e) {
      plog.error({ err: describeError(e) }, "request failed");
      return done("transport-error", page);
    }

    if (res.status !== 200) {
      plog.error({ status: res.status, body: truncate(res.body, 500) }, "non-200 response");
      return done("http-error", page);
    }

    const json = parseJson(res.body);
    if (!json.ok) {
      plog.error({ err: json.error }, "response is not JSON");
      return done("invalid-json", page);
    }

    const { posts, next } = readPage(json.value);
    plog.debug({ posts: posts.length, hasNext: next !== null }, "page received");

    if (posts.length === 0) {
      if (page === 1) {
        plog.warn("first page returned no posts; check the API key and parameters");
      } else {
        plog.info("no more results");
      }
      return done("empty-page", page);
    }

    const inWindow: CryptoPanicPost[] = [];
    let sawOnOrAfterStart = false;

    for (const [i, raw] of posts.entries()) {
      const parsed = CryptoPanicPostSchema.safeParse(raw);
      if (!parsed.success) {
        if (i < 3) plog.debug({ issues: parsed.error.issues.length }, `post ${i + 1} malformed`);
        continue;
      }
      const post = parsed.data;
      const value = postDate(post);
      if (typeof value !== "string") {
        if (i < 3) plog.debug({ value }, `post ${i + 1} has no usable date`);
        continue;
      }
      const when = parseDate(value, POST_DATE_STRATEGIES);
      if (!when.ok) {
        if (i < 3) plog.debug({ value }, `post ${i + 1} date unparsable`);
        continue;
      }

      const t = when.value.getTime();
      if (t >= start) sawOnOrAfterStart = true;
      if (t >= start && t <= end) {
        inWindow.push(post);
      } else if (t < start && options.stopAtOlderThanStart) {
        collected.push(...inWindow);
        plog.warn(
          { date: when.value.toISOString() },
          "reached a post older than the start date; assuming newest-first order and stopping"
        );
        return done("older-than-start", page);
      }
      // newer than endDate: keep paging
    }

    collected.push(...inWindow);
    plog.info({ inWindow: inWindow.length, total: collected.length }, "page done");

    if (inWindow.length === 0 && !sawOnOrAfterStart) {
      plog.info("no post on this page is on or after the start date");
      return done("nothing-in-window", page);
    }

    // `next` is known to come back null while later pages still have data.
    if (next === null) {
      if (collected.length > 0) {
        plog.info("no next page");
        return done("no-next-page", page);
      }
      if (page < options.manualProbePages) {
        plog.info(`next is null, probing page ${page + 1} anyway`);
        continue;
      }
      const first = CryptoPanicPostSchema.safeParse(posts[0]);
      const last = CryptoPanicPostSchema.safeParse(posts[posts.length - 1]);
      plog.warn(
        {
          returnedFrom: first.success ? postDate(first.data) : null,
          returnedTo: last.success ? postDate(last.data) : null,
          requested: `${options.startDate}..${options.endDate}`,
        },
        "no posts in the date window; the plan may only expose recent posts"
      );
      return done("probe-exhausted", page);
    }
  }

  log.warn({ maxPages: options.maxPages }, "page limit reached");
  return done("page-limit", options.maxPages);
}

const count = (n: number | null | undefined) => n ?? 0;

export function toCryptoPanicRow(post: CryptoPanicPost): CryptoPanicRow {
  const positive = count(post.votes?.positive);
  const negative = count(post.votes?.negative);
  const published = postDate(post);
  return {
    id: post.id ?? "",
    title: post.title ?? "",
    url: post.url ?? "",
    published_at: typeof published === "string" ? published : "",
    source: post.source?.title ?? "",
    votes: positive - negative,
    positive_votes: positive,
    negative_votes: negative,
    comments_count: count(post.comments_count),
    currencies: (post.currencies ?? []).map((c) => c.code ?? "").join(", "),
    kind: post.kind ?? "",
  };
}

export type CryptoPanicExportSummary = {
  jsonPath: string;
  csvPath: string;
  total: number;
  unique: number;
  dateRange: ValueRange | null;
  uniqueSources: number;
  averageVotes: number;
  positiveVotes: number;
  negativeVotes: number;
};

/**
 * Raw posts to `jsonPath`, one CSV row per post id beside it. Returns null
 * when there is nothing to write.
 */
export function exportCryptoPanicData(
  posts: CryptoPanicPost[],
  jsonPath: string
): CryptoPanicExportSummary | null {
  if (posts.length === 0) return null;

  writeJson(jsonPath, posts);
  const rows = dedupeBy(posts.map(toCryptoPanicRow), (r) => String(r.id));
  const csvPath = csvPathFor(jsonPath);
  writeCsv(csvPath, rows, CRYPTOPANIC_ROW_COLUMNS);

  const sum = (pick: (r: CryptoPanicRow) => number) =>
    rows.reduce((acc, r) => acc + pick(r), 0);

  return {
    jsonPath,
    csvPath,
    total: posts.length,
    unique: rows.length,
    dateRange: valueRange(rows.map((r) => r.published_at)),
    uniqueSources: uniqueCount(rows.map((r) => r.source)),
    averageVotes: sum((r) => r.votes) / rows.length,
    positiveVotes: sum((r) => r.positive_votes),
    negativeVotes: sum((r) => r.negative_votes),
  };
}
