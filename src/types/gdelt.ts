import { z } from "zod";

/** One artlist entry. GDELT omits or nulls fields freely, so everything is optional. */
export const GdeltArticleSchema = z
  .object({
    url: z.string().nullish(),
    url_mobile: z.string().nullish(),
    title: z.string().nullish(),
    seendate: z.string().nullish(), // 20241109T164500Z
    socialimage: z.string().nullish(),
    domain: z.string().nullish(),
    language: z.string().nullish(), // "English"
    sourcecountry: z.string().nullish(),
    snippet: z.string().nullish(),
    source: z.string().nullish(),
  })
  .passthrough();

export type GdeltArticle = z.infer<typeof GdeltArticleSchema>;

export const GdeltResponseSchema = z.union([
  z.object({ articles: z.array(z.unknown()) }).passthrough(),
  z.array(z.unknown()),
]);

/** Flat CSV projection of an article. */
export type GdeltRow = {
  title: string;
  url: string;
  published_at: string; // YYYY-MM-DD HH:MM:SS, or raw seendate
  seendate: string;
  source: string;
  snippet: string;
  language: string;
};

export const GDELT_ROW_COLUMNS = [
  "title",
  "url",
  "published_at",
  "seendate",
  "source",
  "snippet",
  "language",
] as const satisfies readonly (keyof GdeltRow)[];
