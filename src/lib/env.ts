import * as dotenv from "dotenv";
dotenv.config();

export function must(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}

export const ENV = {
  NODE_ENV: process.env.NODE_ENV ?? "development",
  LOG_LEVEL: process.env.LOG_LEVEL ?? "",
  DATA_DIR: process.env.DATA_DIR ?? "data",
  CRYPTOPANIC_API_KEY: process.env.CRYPTOPANIC_API_KEY ?? "",
};
