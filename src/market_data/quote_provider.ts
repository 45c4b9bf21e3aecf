import { LiquidityQuote } from "../types.js";

export interface QuoteProvider {
  // null when the instrument has no quote at all
  getQuote(instrument: string): Promise<LiquidityQuote | null>;
}

export class MapQuoteProvider implements QuoteProvider {
  constructor(private quotes: Map<string, LiquidityQuote>) {}

  async getQuote(instrument: string): Promise<LiquidityQuote | null> {
    return this.quotes.get(instrument) ?? null;
  }
}

export class PaperQuoteProvider implements QuoteProvider {
  constructor(private cfg: { price: number; spread: number; depth: number }) {}

  async getQuote(_instrument: string): Promise<LiquidityQuote | null> {
    return {
      bid: { price: this.cfg.price, qty: this.cfg.depth },
      ask: { price: this.cfg.price + this.cfg.spread, qty: this.cfg.depth }
    };
  }
}

/**
 * Read-through cache in front of an upstream provider. Entries are served for at
 * most `ttlMs`; concurrent misses for one instrument share a single fetch.
 */
export class CachedQuoteProvider implements QuoteProvider {
  private cache = new Map<string, { at: number; quote: LiquidityQuote | null }>();
  private inflight = new Map<string, Promise<LiquidityQuote | null>>();

  constructor(
    private upstream: QuoteProvider,
    private ttlMs: number,
    private now: () => number = Date.now
  ) {}

  async getQuote(instrument: string): Promise<LiquidityQuote | null> {
    const hit = this.cache.get(instrument);
    if (hit && this.now() - hit.at < this.ttlMs) {
      return hit.quote;
    }
    const pending = this.inflight.get(instrument);
    if (pending) {
      return pending;
    }
    const fetching = this.upstream
      .getQuote(instrument)
      .then((quote) => {
        this.cache.set(instrument, { at: this.now(), quote });
        return quote;
      })
      .finally(() => {
        this.inflight.delete(instrument);
      });
    this.inflight.set(instrument, fetching);
    return fetching;
  }
}
