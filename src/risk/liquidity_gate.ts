import { errorMessage } from "../errors.js";
import { QuoteProvider } from "../market_data/quote_provider.js";
import { GateResult, LiquidityQuote } from "../types.js";
import { withTimeout } from "../utils/timing.js";

export interface LiquidityLimits {
  minQtyMultiplier: number;
  maxSpreadPoints: number;
  quoteTimeoutMs: number;
}

export interface LiquidityCheck extends GateResult {
  // soft rejections (thin book, wide spread) earn one retry; hard ones do not
  soft: boolean;
  quote: LiquidityQuote | null;
  spread?: number;
}

export class LiquidityGate {
  constructor(private quotes: QuoteProvider, private limits: LiquidityLimits) {}

  async check(instrument: string, qty: number): Promise<LiquidityCheck> {
    let quote: LiquidityQuote | null;
    try {
      quote = await withTimeout(
        this.quotes.getQuote(instrument),
        this.limits.quoteTimeoutMs,
        `quote ${instrument}`
      );
    } catch (err) {
      return { ok: false, soft: false, quote: null, reason: `Quote unavailable: ${errorMessage(err)}` };
    }

    const bid = quote?.bid;
    const ask = quote?.ask;
    if (!bid || !ask) {
      return { ok: false, soft: false, quote, reason: "Missing bid or ask" };
    }
    if (bid.price <= 0 || ask.price <= 0) {
      return { ok: false, soft: false, quote, reason: "Invalid bid/ask price" };
    }

    const spread = ask.price - bid.price;
    const minQty = qty * this.limits.minQtyMultiplier;
    if (bid.qty < minQty || ask.qty < minQty) {
      return {
        ok: false,
        soft: true,
        quote,
        spread,
        reason: `Insufficient depth: bid ${bid.qty}, ask ${ask.qty}, need ${minQty}`
      };
    }
    if (spread > this.limits.maxSpreadPoints) {
      return {
        ok: false,
        soft: true,
        quote,
        spread,
        reason: `Spread ${round2(spread)} exceeds ${this.limits.maxSpreadPoints}`
      };
    }
    return { ok: true, soft: false, quote, spread };
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
