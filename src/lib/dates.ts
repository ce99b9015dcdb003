/**
 * Timestamp parsing as an ordered list of strategies. The first strategy that
 * recognizes the string wins; all dates are interpreted as UTC.
 */

export type DateParseResult =
  | { ok: true; value: Date; strategy: string }
  | { ok: false; reason: "unparsable"; raw: string };

type DateStrategy = {
  name: string;
  parse: (raw: string) => Date | null;
};

type Parts = {
  y: number;
  mo: number;
  d: number;
  h?: number;
  mi?: number;
  s?: number;
  ms?: number;
  offsetMin?: number;
};

/** Builds a UTC date, rejecting out-of-range fields such as 2024-02-30 or 25:00. */
function utcDate(p: Parts): Date | null {
  const h = p.h ?? 0;
  const mi = p.mi ?? 0;
  const s = p.s ?? 0;
  const dt = new Date(Date.UTC(p.y, p.mo - 1, p.d, h, mi, s, p.ms ?? 0));
  if (
    dt.getUTCFullYear() !== p.y ||
    dt.getUTCMonth() !== p.mo - 1 ||
    dt.getUTCDate() !== p.d ||
    dt.getUTCHours() !== h ||
    dt.getUTCMinutes() !== mi ||
    dt.getUTCSeconds() !== s
  ) {
    return null;
  }
  if (p.offsetMin) dt.setTime(dt.getTime() - p.offsetMin * 60_000);
  return dt;
}

const num = (v: string | undefined) => (v === undefined ? undefined : Number(v));

/**
 * Strategy from a regex with named groups y, mo, d and optionally h, mi, s,
 * frac (fractional seconds) and tz (`Z`, `±HH:MM` or `±HHMM`).
 */
function patternStrategy(name: string, re: RegExp): DateStrategy {
  return {
    name,
    parse(raw) {
      const g = re.exec(raw)?.groups;
      if (!g) return null;
      let offsetMin = 0;
      if (g.tz && g.tz !== "Z") {
        const sign = g.tz.startsWith("-") ? -1 : 1;
        const hhmm = g.tz.slice(1).replace(":", "");
        offsetMin = sign * (Number(hhmm.slice(0, 2)) * 60 + Number(hhmm.slice(2)));
      }
      return utcDate({
        y: Number(g.y),
        mo: Number(g.mo),
        d: Number(g.d),
        h: num(g.h),
        mi: num(g.mi),
        s: num(g.s),
        ms: g.frac ? Math.floor(Number(`0${g.frac}`) * 1000) : 0,
        offsetMin,
      });
    },
  };
}

const DATE = String.raw`(?<y>\d{4})-(?<mo>\d{2})-(?<d>\d{2})`;
const TIME = String.raw`(?<h>\d{2}):(?<mi>\d{2}):(?<s>\d{2})`;

const DATETIME_SPACE = patternStrategy(
  "datetime-space",
  new RegExp(`^${DATE} ${TIME}$`)
);
const DATE_ONLY = patternStrategy("date", new RegExp(`^${DATE}$`));
export const GDELT_SEENDATE = patternStrategy(
  "gdelt-seendate",
  /^(?<y>\d{4})(?<mo>\d{2})(?<d>\d{2})T(?<h>\d{2})(?<mi>\d{2})(?<s>\d{2})Z$/
);
const ISO_UTC = patternStrategy("iso-utc", new RegExp(`^${DATE}T${TIME}Z$`));
const ISO_NAIVE = patternStrategy("iso-naive", new RegExp(`^${DATE}T${TIME}$`));
const ISO_ZONED = patternStrategy(
  "iso-zoned",
  new RegExp(String.raw`^${DATE}[T ]${TIME}(?<frac>\.\d+)?(?<tz>Z|[+-]\d{2}:?\d{2})?$`)
);

/** First `YYYY-MM-DD` anywhere in the string. */
const EMBEDDED_DATE = patternStrategy("embedded-date", new RegExp(DATE));

/** Formats seen in exported tables, falling back to pulling a date out of the text. */
export const TABLE_DATE_STRATEGIES: readonly DateStrategy[] = [
  DATETIME_SPACE,
  DATE_ONLY,
  GDELT_SEENDATE,
  ISO_UTC,
  ISO_NAIVE,
  EMBEDDED_DATE,
];

/** API post timestamps: ISO with or without zone, then the first 19 chars in plain layouts. */
export const POST_DATE_STRATEGIES: readonly DateStrategy[] = [
  ISO_ZONED,
  {
    name: "leading-19",
    parse: (raw) => {
      const head = raw.slice(0, 19);
      return ISO_NAIVE.parse(head) ?? DATETIME_SPACE.parse(head) ?? DATE_ONLY.parse(head);
    },
  },
];

export function parseDate(
  raw: string,
  strategies: readonly DateStrategy[]
): DateParseResult {
  const text = raw.trim();
  for (const s of strategies) {
    const value = s.parse(text);
    if (value) return { ok: true, value, strategy: s.name };
  }
  return { ok: false, reason: "unparsable", raw };
}

const pad = (n: number, w = 2) => String(n).padStart(w, "0");

/** `YYYY-MM-DD` in UTC. */
export function formatDay(d: Date): string {
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatDateTime(d: Date): string {
  return `${formatDay(d)} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(
    d.getUTCSeconds()
  )}`;
}

/** Parses a strict `YYYY-MM-DD` into UTC midnight; throws on anything else. */
export function parseDay(day: string): Date {
  const d = DATE_ONLY.parse(day);
  if (!d) throw new Error(`Invalid date (expected YYYY-MM-DD): ${day}`);
  return d;
}
