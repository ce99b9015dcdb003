export type GdeltOptions = {
  baseUrl: string;
  keywords: string[];
  /** Drop matches that are about energy/mining rather than crypto markets. */
  excludePatterns: RegExp[];
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
  maxRecords: number; // per request; GDELT caps artlist at 250
  delayMs: number;
  timeoutMs: number;
  outputFile: string;
};

export type CryptoPanicOptions = {
  baseUrl: string;
  currencies: string; // "BTC,ETH"
  startDate: string;
  endDate: string;
  maxPages: number;
  /** When `next` is null and nothing is collected yet, keep going up to this page. */
  manualProbePages: number;
  /**
   * Treat the feed as newest-first and stop at the first post older than the
   * start date. Unverified against the API; turn off to scan every page.
   */
  stopAtOlderThanStart: boolean;
  delayMs: number;
  timeoutMs: number;
  outputFile: string;
};

export const GDELT: GdeltOptions = {
  baseUrl: "https://api.gdeltproject.org/api/v2/doc/doc",
  keywords: [
    "bitcoin",
    "btc",
    "ethereum",
    "eth",
    "cryptocurrency",
    "crypto",
    "blockchain",
    "digital currency",
  ],
  excludePatterns: [
    /\b(energy|power|electricity|mining)\s+(bitcoin|btc)\b/i,
    /\b(bitcoin|btc)\s+(mining|energy)/i,
  ],
  startDate: "2022-11-01",
  endDate: "2025-11-01",
  maxRecords: 250,
  delayMs: 1000,
  timeoutMs: 60_000,
  outputFile: "gdelt_data.json",
};

export const CRYPTOPANIC: CryptoPanicOptions = {
  baseUrl: "https://cryptopanic.com/api/v1/posts/",
  currencies: "BTC,ETH",
  startDate: "2024-11-01",
  endDate: "2025-11-01",
  maxPages: 50,
  manualProbePages: 5,
  stopAtOlderThanStart: true,
  delayMs: 500,
  timeoutMs: 30_000,
  outputFile: "cryptopanic_data.json",
};

export const CLEANING = {
  inputCsv: "gdelt_data.csv",
  inputJson: "gdelt_data.json",
  outputCsv: "gdelt_data_cleaned.csv",
  outputJson: "gdelt_data_cleaned.json",
  language: "english",
};

export const PROBE = {
  keywords: ["bitcoin", "btc", "ethereum", "eth"],
  maxRecords: 10,
  startDateTime: "20241101000000",
  endDateTime: "20241110000000",
  timeoutMs: 30_000,
};
