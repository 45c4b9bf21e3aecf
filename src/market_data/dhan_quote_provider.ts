import { DhanHttp } from "../execution/dhan_http.js";
import { BookLevel, LiquidityQuote } from "../types.js";
import { asRecord, toNumber } from "../utils/guards.js";
import { QuoteProvider } from "./quote_provider.js";

export class DhanQuoteProvider implements QuoteProvider {
  private exchangeSegment: string;
  private timeoutMs?: number;

  constructor(private http: DhanHttp, cfg: { exchangeSegment?: string; timeoutMs?: number } = {}) {
    this.exchangeSegment = cfg.exchangeSegment ?? "NSE_FNO";
    this.timeoutMs = cfg.timeoutMs;
  }

  async getQuote(instrument: string): Promise<LiquidityQuote | null> {
    const securityId = Number(instrument);
    const json = asRecord(
      await this.http.request(
        "POST",
        "/v2/marketfeed/quote",
        { [this.exchangeSegment]: [Number.isFinite(securityId) ? securityId : instrument] },
        this.timeoutMs
      )
    );
    const segment = asRecord(asRecord(json?.data)?.[this.exchangeSegment]);
    const row = asRecord(segment?.[instrument]);
    if (!row) {
      return null;
    }
    const depth = asRecord(row.depth);
    return {
      bid: topLevel(depth?.buy),
      ask: topLevel(depth?.sell)
    };
  }
}

function topLevel(side: unknown): BookLevel | null {
  if (!Array.isArray(side) || side.length === 0) {
    return null;
  }
  const level = asRecord(side[0]);
  const price = toNumber(level?.price);
  const qty = toNumber(level?.quantity);
  if (price === null || qty === null) {
    return null;
  }
  return { price, qty };
}
