import { z } from "zod";

const Count = z.number().nullish();

export const CryptoPanicPostSchema = z
  .object({
    id: z.union([z.number(), z.string()]).nullish(),
    kind: z.string().nullish(),
    title: z.string().nullish(),
    url: z.string().nullish(),
    // any of these may carry the timestamp; types vary between API versions
    published_at: z.unknown(),
    created_at: z.unknown(),
    date: z.unknown(),
    source: z
      .object({ title: z.string().nullish(), domain: z.string().nullish() })
      .passthrough()
      .nullish(),
    votes: z
      .object({ positive: Count, negative: Count })
      .passthrough()
      .nullish(),
    comments_count: Count,
    currencies: z
      .array(z.object({ code: z.string().nullish() }).passthrough())
      .nullish(),
  })
  .passthrough();

export type CryptoPanicPost = z.infer<typeof CryptoPanicPostSchema>;

export type CryptoPanicRow = {
  id: string | number;
  title: string;
  url: string;
  published_at: string;
  source: string;
  votes: number;
  positive_votes: number;
  negative_votes: number;
  comments_count: number;
  currencies: string;
  kind: string;
};

export const CRYPTOPANIC_ROW_COLUMNS = [
  "id",
  "title",
  "url",
  "published_at",
  "source",
  "votes",
  "positive_votes",
  "negative_votes",
  "comments_count",
  "currencies",
  "kind",
] as const satisfies readonly (keyof CryptoPanicRow)[];
