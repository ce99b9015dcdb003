import { parseJson, truncate, describeError } from "../lib/http";
import type { HttpResponse } from "../lib/http";
import { resolveDeps } from "../lib/deps";
import type { FetchDeps } from "../lib/deps";
import { formatDay, formatDateTime, parseDay, parseDate, GDELT_SEENDATE } from "../lib/dates";
import { csvPathFor, dedupeBy, writeCsv, writeJson } from "../lib/files";
import { countBy, uniqueCount, valueRange } from "../lib/summary";
import type { ValueRange } from "../lib/summary";
import type { GdeltOptions } from "./config";
import {
  GdeltArticleSchema,
  GdeltResponseSchema,
  GDELT_ROW_COLUMNS,
} from "../types/gdelt";
import type { GdeltArticle, GdeltRow } from "../types/gdelt";

/** GDELT wants OR queries wrapped in parentheses. */
export function buildQuery(keywords: string[]): string {
  return `(${keywords.join(" OR ")})`;
}

export type DateChunk = { start: string; end: string };

/** Calendar-month chunks covering [start, end], first and last clipped. */
export function splitMonthly(startDate: string, endDate: string): DateChunk[] {
  const end = parseDay(endDate);
  const chunks: DateChunk[] = [];
  let current = parseDay(startDate);
  while (current < end) {
    const nextMonth = new Date(
      Date.UTC(current.getUTCFullYear(), current.getUTCMonth() + 1, 1)
    );
    const lastOfMonth = new Date(nextMonth.getTime() - 864e5);
    const chunkEnd = lastOfMonth < end ? lastOfMonth : end;
    chunks.push({ start: formatDay(current), end: formatDay(chunkEnd) });
    current = nextMonth;
  }
  return chunks;
}

/** YYYY-MM-DD -> YYYYMMDDHHMMSS at the start or the last second of the day. */
export function toGdeltDateTime(day: string, endOfDay = false): string {
  const compact = formatDay(parseDay(day)).replace(/-/g, "");
  return compact + (endOfDay ? "235959" : "000000");
}

const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Word-bounded, case-insensitive alternation of the keywords. */
export function buildIncludePattern(keywords: string[]): RegExp {
  const alts = keywords.map((k) =>
    k.trim().split(/\s+/).map(escapeRegex).join("\\s+")
  );
  return new RegExp(`\\b(${alts.join("|")})\\b`, "i");
}

export function articleText(a: GdeltArticle): string {
  return `${a.title ?? ""} ${a.snippet ?? ""} ${a.url ?? ""}`;
}

/** Keep articles that mention a keyword and match no exclusion pattern. */
export function filterRelevantArticles(
  articles: GdeltArticle[],
  include: RegExp,
  exclude: RegExp[]
): GdeltArticle[] {
  return articles.filter((a) => {
    const text = articleText(a);
    if (!include.test(text)) return false;
    return !exclude.some((re) => re.test(text));
  });
}

export type ArticlesPayload =
  | { ok: true; articles: GdeltArticle[]; dropped: number }
  | { ok: false; reason: "invalid-json"; error: string }
  | { ok: false; reason: "unexpected-shape"; keys: string[] };

/** Accepts `{ "articles": [...] }` or a bare list. */
export function readArticles(body: string): ArticlesPayload {
  const json = parseJson(body);
  if (!json.ok) return { ok: false, reason: "invalid-json", error: json.error };

  const shape = GdeltResponseSchema.safeParse(json.value);
  if (!shape.success) {
    const v = json.value;
    const keys = v && typeof v === "object" ? Object.keys(v) : [];
    return { ok: false, reason: "unexpected-shape", keys };
  }

  const items = Array.isArray(shape.data) ? shape.data : shape.data.articles;
  const articles: GdeltArticle[] = [];
  for (const item of items) {
    const parsed = GdeltArticleSchema.safeParse(item);
    if (parsed.success) articles.push(parsed.data);
  }
  return { ok: true, articles, dropped: items.length - articles.length };
}

export type GdeltFetchResult = {
  articles: GdeltArticle[];
  chunks: number;
  failedChunks: number;
};

/**
 * One artlist request per month of the window. A chunk that errors is logged
 * and skipped; results are concatenated without deduplication.
 */
export async function fetchGdeltData(
  options: GdeltOptions,
  deps: Partial<FetchDeps> = {}
): Promise<GdeltFetchResult> {
  const { http, sleep, log } = resolveDeps("gdelt", deps);
  const query = buildQuery(options.keywords);
  const include = buildIncludePattern(options.keywords);
  const chunks = splitMonthly(options.startDate, options.endDate);

  log.info(
    { start: options.startDate, end: options.endDate, query, chunks: chunks.length },
    "fetching GDELT articles"
  );

  const all: GdeltArticle[] = [];
  let failedChunks = 0;

  for (const [i, chunk] of chunks.entries()) {
    if (i > 0) await sleep(options.delayMs);
    const clog = log.child({ chunk: `${i + 1}/${chunks.length}` });
    clog.info(`chunk ${chunk.start} to ${chunk.end}`);

    const params = {
      query,
      mode: "artlist",
      maxrecords: options.maxRecords,
      format: "json",
      startdatetime: toGdeltDateTime(chunk.start),
      enddatetime: toGdeltDateTime(chunk.end, true),
    };

    let res: HttpResponse;
    try {
      res = await http(options.baseUrl, params, options.timeoutMs);
    } catch (e) {
      clog.error({ err: describeError(e) }, "request failed, skipping chunk");
      failedChunks++;
      continue;
    }

    if (res.status !== 200) {
      clog.error(
        { status: res.status, body: truncate(res.body, 200) },
        "non-200 response, skipping chunk"
      );
      failedChunks++;
      continue;
    }

    const payload = readArticles(res.body);
    if (!payload.ok) {
      if (payload.reason === "invalid-json") {
        clog.error({ err: payload.error }, "response is not JSON, skipping chunk");
      } else {
        clog.warn({ keys: payload.keys }, "unexpected response format, skipping chunk");
      }
      failedChunks++;
      continue;
    }
    if (payload.dropped > 0) {
      clog.debug({ dropped: payload.dropped }, "ignored malformed entries");
    }

    const relevant = filterRelevantArticles(
      payload.articles,
      include,
      options.excludePatterns
    );
    clog.info(
      { fetched: payload.articles.length, relevant: relevant.length },
      "chunk done"
    );
    all.push(...relevant);
  }

  log.info({ total: all.length, failedChunks }, "GDELT fetch finished");
  return { articles: all, chunks: chunks.length, failedChunks };
}

/** `20241109T164500Z` -> `2024-11-09 16:45:00`; unparsable values pass through. */
export function formatSeendate(seendate: string): string {
  if (!seendate) return "";
  const r = parseDate(seendate, [GDELT_SEENDATE]);
  return r.ok ? formatDateTime(r.value) : seendate;
}

export function toGdeltRow(a: GdeltArticle): GdeltRow {
  const seendate = a.seendate ?? "";
  return {
    title: a.title ?? "",
    url: a.url ?? "",
    published_at: formatSeendate(seendate),
    seendate,
    source: a.domain || a.source || "",
    snippet: a.snippet ?? "",
    language: a.language ?? "unknown",
  };
}

export type GdeltExportSummary = {
  jsonPath: string;
  csvPath: string;
  total: number;
  unique: number;
  dateRange: ValueRange | null;
  uniqueSources: number;
  languages: Record<string, number>;
};

/**
 * Raw articles to `jsonPath`, the row projection (one row per URL) to the
 * sibling .csv. Returns null when there is nothing to write.
 */
export function exportGdeltData(
  articles: GdeltArticle[],
  jsonPath: string
): GdeltExportSummary | null {
  if (articles.length === 0) return null;

  writeJson(jsonPath, articles);
  const rows = dedupeBy(articles.map(toGdeltRow), (r) => r.url);
  const csvPath = csvPathFor(jsonPath);
  writeCsv(csvPath, rows, GDELT_ROW_COLUMNS);

  return {
    jsonPath,
    csvPath,
    total: articles.length,
    unique: rows.length,
    dateRange: valueRange(rows.map((r) => r.published_at)),
    uniqueSources: uniqueCount(rows.map((r) => r.source)),
    languages: countBy(rows.map((r) => r.language)),
  };
}

/** Human-readable shape of a probe response body. */
export function describePayload(body: string): string {
  const content = body.trim();
  const json = parseJson(content);
  if (json.ok) {
    const v = json.value;
    if (Array.isArray(v)) {
      const first: unknown = v[0];
      const keys = first && typeof first === "object" ? Object.keys(first) : [];
      return `JSON array of ${v.length} items; first item keys: ${keys.join(", ")}`;
    }
    if (v && typeof v === "object") {
      return `JSON object; keys: ${Object.keys(v).join(", ")}`;
    }
    return `JSON ${typeof v}`;
  }
  const lines = content.split("\n");
  if (lines.length > 1) {
    const first = parseJson(lines[0]);
    if (first.ok && first.value && typeof first.value === "object") {
      return `JSON lines (${lines.length}); first line keys: ${Object.keys(first.value).join(", ")}`;
    }
  }
  return `unrecognized payload (${content.length} chars): ${json.error}`;
}
