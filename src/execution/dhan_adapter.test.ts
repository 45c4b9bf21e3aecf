import { describe, expect, it } from "vitest";
import { DhanQuoteProvider } from "../market_data/dhan_quote_provider.js";
import { DhanAdapter, mapDhanStatus } from "./dhan_adapter.js";
import { DhanHttp, DhanHttpError, FetchFn } from "./dhan_http.js";

type Call = { url: string; method?: string; headers?: unknown; body: unknown };

function stubHttp(responses: Array<{ status?: number; body: unknown }>) {
  const calls: Call[] = [];
  const fetchImpl: FetchFn = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      headers: init?.headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined
    });
    const next = responses.shift() ?? { body: null };
    const text = typeof next.body === "string" ? next.body : next.body === null ? "" : JSON.stringify(next.body);
    return new Response(text, { status: next.status ?? 200 });
  };
  const http = new DhanHttp({
    clientId: "test-client",
    accessToken: "test-token",
    baseUrl: "https://dhan.test",
    fetchImpl
  });
  return { http, calls };
}

describe("DhanAdapter", () => {
  it("places a market day order with auth headers", async () => {
    const { http, calls } = stubHttp([{ body: { orderId: "112", orderStatus: "TRANSIT" } }]);
    const adapter = new DhanAdapter(http);

    const placed = await adapter.placeOrder({ side: "BUY", instrument: "45001", qty: 75, correlationId: "S1-call" });

    expect(placed).toEqual({ orderId: "112", status: "PENDING" });
    expect(calls[0]).toEqual({
      url: "https://dhan.test/v2/orders",
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        "access-token": "test-token",
        "client-id": "test-client"
      },
      body: {
        dhanClientId: "test-client",
        transactionType: "BUY",
        exchangeSegment: "NSE_FNO",
        productType: "MARGIN",
        orderType: "MARKET",
        validity: "DAY",
        securityId: "45001",
        quantity: 75,
        correlationId: "S1-call"
      }
    });
  });

  it("rejects a placement response without an order id", async () => {
    const { http } = stubHttp([{ body: { errorMessage: "bad" } }]);
    await expect(new DhanAdapter(http).placeOrder({ side: "SELL", instrument: "45002", qty: 75 })).rejects.toThrow(
      "Dhan place order missing orderId"
    );
  });

  it("surfaces HTTP errors", async () => {
    const { http } = stubHttp([{ status: 401, body: "invalid token" }]);
    const failure = new DhanAdapter(http).getPositions();
    await expect(failure).rejects.toBeInstanceOf(DhanHttpError);
    await expect(failure).rejects.toThrow("Dhan GET /v2/positions failed 401: invalid token");
  });

  it("reads order status from an array-wrapped response", async () => {
    const { http, calls } = stubHttp([
      {
        body: [
          { orderId: "112", orderStatus: "REJECTED", filledQty: 0, omsErrorDescription: "RMS: margin shortfall" }
        ]
      }
    ]);
    expect(await new DhanAdapter(http).getOrderStatus("112")).toEqual({
      orderId: "112",
      status: "REJECTED",
      filledQty: 0,
      averagePrice: undefined,
      reason: "RMS: margin shortfall"
    });
    expect(calls[0]?.url).toBe("https://dhan.test/v2/orders/112");
  });

  it("maps net positions by security id", async () => {
    const { http } = stubHttp([
      { body: [{ securityId: "45001", netQty: 75 }, { securityId: 45002, netQty: "-75" }, { netQty: 5 }] }
    ]);
    expect(await new DhanAdapter(http).getPositions()).toEqual([
      { instrument: "45001", netQty: 75 },
      { instrument: "45002", netQty: -75 }
    ]);
  });

  it("keeps only rows from the configured segment", async () => {
    const { http } = stubHttp([
      {
        body: [
          { securityId: "45002", exchangeSegment: "NSE_FNO", productType: "INTRADAY", netQty: 0 },
          { securityId: "45002", exchangeSegment: "NSE_FNO", productType: "MARGIN", netQty: -75 },
          { securityId: "45002", exchangeSegment: "BSE_FNO", productType: "MARGIN", netQty: 20 }
        ]
      }
    ]);
    expect(await new DhanAdapter(http).getPositions()).toEqual([
      { instrument: "45002", netQty: 0 },
      { instrument: "45002", netQty: -75 }
    ]);
  });

  it("estimates margin", async () => {
    const { http, calls } = stubHttp([
      { body: { totalMargin: 120000, availableBalance: 150000, insufficientBalance: 0 } }
    ]);
    const estimate = await new DhanAdapter(http).estimate({ side: "SELL", instrument: "45002", qty: 75, price: 100 });
    expect(estimate).toEqual({ totalMargin: 120000, availableBalance: 150000, insufficientBalance: 0 });
    expect(calls[0]?.url).toBe("https://dhan.test/v2/margincalculator");
  });

  it("runs the fund-limit preflight", async () => {
    const { http } = stubHttp([{ body: { availabelBalance: 98000.5 } }, { status: 500, body: "down" }]);
    const adapter = new DhanAdapter(http);
    expect(await adapter.preflightCheck()).toEqual({
      ok: true,
      message: "Live preflight passed",
      availableBalance: 98000.5
    });
    expect(await adapter.preflightCheck()).toEqual({
      ok: false,
      message: "Live preflight failed: Dhan GET /v2/fundlimit failed 500: down"
    });
  });

  it("maps broker statuses onto the order lifecycle", () => {
    expect(mapDhanStatus("traded")).toBe("TRADED");
    expect(mapDhanStatus("PART_TRADED")).toBe("PART_TRADED");
    expect(mapDhanStatus("PENDING")).toBe("PENDING");
    expect(mapDhanStatus("CONFIRMED")).toBe("PLACED");
    expect(mapDhanStatus("EXPIRED")).toBe("EXPIRED");
    expect(mapDhanStatus(undefined)).toBe("PENDING");
  });
});

describe("DhanQuoteProvider", () => {
  it("reads the top of the depth ladder", async () => {
    const { http, calls } = stubHttp([
      {
        body: {
          status: "success",
          data: {
            NSE_FNO: {
              "45001": {
                depth: {
                  buy: [{ price: 100, quantity: 300 }, { price: 99.5, quantity: 900 }],
                  sell: [{ price: 101, quantity: 150 }]
                }
              }
            }
          }
        }
      }
    ]);
    const quote = await new DhanQuoteProvider(http).getQuote("45001");
    expect(quote).toEqual({ bid: { price: 100, qty: 300 }, ask: { price: 101, qty: 150 } });
    expect(calls[0]?.body).toEqual({ NSE_FNO: [45001] });
  });

  it("returns null when the instrument is absent", async () => {
    const { http } = stubHttp([{ body: { data: { NSE_FNO: {} } } }]);
    expect(await new DhanQuoteProvider(http).getQuote("45001")).toBeNull();
  });

  it("reports an empty side as missing", async () => {
    const { http } = stubHttp([{ body: { data: { NSE_FNO: { "45001": { depth: { buy: [], sell: [] } } } } } }]);
    expect(await new DhanQuoteProvider(http).getQuote("45001")).toEqual({ bid: null, ask: null });
  });
});
