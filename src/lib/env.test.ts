import { afterEach, describe, it, expect, vi } from "vitest";
import { must } from "./env";

describe("must", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("returns a set variable", () => {
    vi.stubEnv("CRYPTOPANIC_API_KEY", "test-key");
    expect(must("CRYPTOPANIC_API_KEY")).toBe("test-key");
  });

  it("throws on a missing or empty variable", () => {
    vi.stubEnv("CRYPTOPANIC_API_KEY", "");
    expect(() => must("CRYPTOPANIC_API_KEY")).toThrow("Missing env var: CRYPTOPANIC_API_KEY");
  });
});
