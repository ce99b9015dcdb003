export type Sleep = (ms: number) => Promise<void>;

/** Fixed client-side pause between API requests. */
export const sleep: Sleep = (ms) => {
  if (ms <= 0) return Promise.resolve();
  return new Promise((r) => setTimeout(r, ms));
};
