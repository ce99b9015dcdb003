import axios from "axios";

export type QueryParams = Record<string, string | number>;

export type HttpResponse = {
  status: number;
  contentType: string;
  body: string;
};

/**
 * GET returning the raw body. Non-2xx statuses resolve instead of throwing so
 * callers can log the body; only transport failures (DNS, reset, timeout) reject.
 */
export type HttpGet = (
  url: string,
  params: QueryParams,
  timeoutMs: number
) => Promise<HttpResponse>;

export const httpGet: HttpGet = async (url, params, timeoutMs) => {
  const res = await axios.get<string>(url, {
    params,
    timeout: timeoutMs,
    responseType: "text",
    validateStatus: () => true,
    headers: { "User-Agent": "crypto-news-collector/0.1" },
  });
  const contentType = res.headers["content-type"];
  return {
    status: res.status,
    contentType: typeof contentType === "string" ? contentType : "unknown",
    body: typeof res.data === "string" ? res.data : JSON.stringify(res.data),
  };
};

export type JsonResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export function parseJson(body: string): JsonResult {
  try {
    return { ok: true, value: JSON.parse(body.trim()) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

/** Copy of params safe for logs. */
export function maskParams(params: QueryParams, secretKeys: string[]): QueryParams {
  const out: QueryParams = {};
  for (const [k, v] of Object.entries(params)) {
    out[k] = secretKeys.includes(k) ? "***" : v;
  }
  return out;
}

export function describeError(e: unknown): string {
  if (axios.isAxiosError(e)) {
    return e.code ? `${e.code}: ${e.message}` : e.message;
  }
  return e instanceof Error ? e.message : String(e);
}
