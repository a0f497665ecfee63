import { describe, it, expect, afterEach, vi } from "vitest";
import { ZodError } from "zod";
import { parseEnv } from "../../src/config/env";

describe("parseEnv", () => {
  it("applies defaults", () => {
    expect(parseEnv({})).toEqual({
      AUCTION_LOG_LEVEL: "info",
      AUCTION_MAX_BIDS: 10000
    });
  });

  it("coerces numeric settings", () => {
    expect(parseEnv({ AUCTION_MAX_BIDS: "250", AUCTION_LOG_LEVEL: "warn" })).toEqual({
      AUCTION_MAX_BIDS: 250,
      AUCTION_LOG_LEVEL: "warn"
    });
  });

  it("ignores the host's own settings", () => {
    expect(parseEnv({ NODE_ENV: "staging", LOG_LEVEL: "trace" })).toEqual({
      AUCTION_LOG_LEVEL: "info",
      AUCTION_MAX_BIDS: 10000
    });
  });

  it("rejects unknown log levels", () => {
    expect(() => parseEnv({ AUCTION_LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });

  it("rejects a non-positive bid cap", () => {
    expect(() => parseEnv({ AUCTION_MAX_BIDS: "0" })).toThrow(ZodError);
  });
});

describe("loading the library", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("imports under a host NODE_ENV and LOG_LEVEL it does not know", async () => {
    vi.stubEnv("NODE_ENV", "staging");
    vi.stubEnv("LOG_LEVEL", "trace");
    vi.resetModules();

    const library = await import("../../src/index");

    expect(library.resolveBids(new library.AuctionBuilder().build(), [])).toEqual([]);
  });
});
