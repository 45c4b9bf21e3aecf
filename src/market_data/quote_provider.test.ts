import { describe, expect, it } from "vitest";
import { ScriptedQuoteProvider } from "../testing/fakes.js";
import { CachedQuoteProvider, MapQuoteProvider, PaperQuoteProvider } from "./quote_provider.js";

describe("quote providers", () => {
  it("serves map quotes and null for unknown instruments", async () => {
    const quote = { bid: { price: 50, qty: 75 }, ask: { price: 51, qty: 75 } };
    const provider = new MapQuoteProvider(new Map([["45001", quote]]));
    expect(await provider.getQuote("45001")).toEqual(quote);
    expect(await provider.getQuote("99999")).toBeNull();
  });

  it("builds a synthetic paper book", async () => {
    const provider = new PaperQuoteProvider({ price: 100, spread: 0.5, depth: 1800 });
    expect(await provider.getQuote("45001")).toEqual({
      bid: { price: 100, qty: 1800 },
      ask: { price: 100.5, qty: 1800 }
    });
  });

  it("caches for the ttl and refetches after it", async () => {
    const upstream = new ScriptedQuoteProvider();
    let clock = 1_000;
    const cached = new CachedQuoteProvider(upstream, 2_000, () => clock);

    await cached.getQuote("45001");
    clock += 1_999;
    await cached.getQuote("45001");
    expect(upstream.requests).toEqual(["45001"]);

    clock += 1;
    await cached.getQuote("45001");
    expect(upstream.requests).toEqual(["45001", "45001"]);
  });

  it("shares one upstream fetch between concurrent misses", async () => {
    const upstream = new ScriptedQuoteProvider();
    const cached = new CachedQuoteProvider(upstream, 2_000);
    await Promise.all([cached.getQuote("45001"), cached.getQuote("45001"), cached.getQuote("45002")]);
    expect(upstream.requests).toEqual(["45001", "45002"]);
  });

  it("does not cache a failed fetch", async () => {
    const upstream = new ScriptedQuoteProvider().set("45001", new Error("feed down"), {
      bid: { price: 1, qty: 1 },
      ask: { price: 2, qty: 1 }
    });
    const cached = new CachedQuoteProvider(upstream, 2_000);
    await expect(cached.getQuote("45001")).rejects.toThrow("feed down");
    expect(await cached.getQuote("45001")).toEqual({ bid: { price: 1, qty: 1 }, ask: { price: 2, qty: 1 } });
  });
});
