import { describe, expect, it } from "vitest";
import {
  FakeBroker,
  FakeMarginEstimator,
  ScriptedQuoteProvider,
  buildExecutor
} from "../testing/fakes.js";

const WIDE = { bid: { price: 100, qty: 200 }, ask: { price: 110, qty: 200 } };

describe("OrderExecutor", () => {
  it("retries a wide spread once after the backoff, then gives up without placing", async () => {
    const broker = new FakeBroker();
    const quotes = new ScriptedQuoteProvider().set("45001", WIDE);
    const { executor, sleeps } = buildExecutor(broker, quotes);

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result).toEqual({
      placed: false,
      failure: { kind: "LIQUIDITY_REJECTED", message: "Spread 10 exceeds 5" }
    });
    expect(sleeps).toEqual([5000]);
    expect(quotes.requests).toEqual(["45001", "45001"]);
    expect(broker.calls).toEqual([]);
  });

  it("places once the retry sees a tradable book", async () => {
    const broker = new FakeBroker();
    const quotes = new ScriptedQuoteProvider().set("45001", WIDE, {
      bid: { price: 100, qty: 200 },
      ask: { price: 101, qty: 200 }
    });
    const { executor, sleeps } = buildExecutor(broker, quotes);

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result.filledCompletely).toBe(true);
    expect(sleeps).toEqual([5000]);
  });

  it("does not retry a hard rejection", async () => {
    const broker = new FakeBroker();
    const quotes = new ScriptedQuoteProvider().set("45001", { bid: null, ask: { price: 101, qty: 200 } });
    const { executor, sleeps } = buildExecutor(broker, quotes);

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result.failure).toEqual({ kind: "LIQUIDITY_REJECTED", message: "Missing bid or ask" });
    expect(sleeps).toEqual([]);
    expect(quotes.requests).toEqual(["45001"]);
  });

  it("checks margin at the ask for a buy and stops on rejection", async () => {
    const broker = new FakeBroker();
    const estimator = new FakeMarginEstimator({ totalMargin: 9000, availableBalance: 1000, insufficientBalance: 8000 });
    const { executor } = buildExecutor(broker, new ScriptedQuoteProvider(), estimator);

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(estimator.requests).toEqual([{ side: "BUY", instrument: "45001", qty: 75, price: 102 }]);
    expect(result).toEqual({
      placed: false,
      failure: { kind: "MARGIN_REJECTED", message: "Insufficient margin: need 9000, available 1000" }
    });
    expect(broker.calls).toEqual([]);
  });

  it("checks margin at the bid for a sell", async () => {
    const estimator = new FakeMarginEstimator({ totalMargin: 100, availableBalance: 1000, insufficientBalance: 0 });
    const { executor } = buildExecutor(new FakeBroker(), new ScriptedQuoteProvider(), estimator);

    await executor.submit({ side: "SELL", instrument: "45002", qty: 75, waitForFill: false });

    expect(estimator.requests[0]?.price).toBe(100);
  });

  it("reports a placement error as not placed", async () => {
    const broker = new FakeBroker().scriptPlacement("45001", new Error("503 from broker"));
    const { executor } = buildExecutor(broker, new ScriptedQuoteProvider());

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result).toEqual({
      placed: false,
      failure: { kind: "ORDER_PLACEMENT_FAILED", message: "503 from broker" }
    });
  });

  it("treats an order rejected at placement as not placed", async () => {
    const broker = new FakeBroker().scriptPlacement("45001", "REJECTED");
    const { executor } = buildExecutor(broker, new ScriptedQuoteProvider());

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result.placed).toBe(false);
    expect(result.orderId).toBe("ORD-1");
    expect(result.failure?.kind).toBe("ORDER_PLACEMENT_FAILED");
    expect(broker.calls).toEqual(["place BUY 45001"]);
  });

  it("reports a complete fill", async () => {
    const broker = new FakeBroker().scriptStatus("45001", "PLACED", "TRADED");
    const { executor, sleeps } = buildExecutor(broker, new ScriptedQuoteProvider());

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result).toEqual({
      placed: true,
      orderId: "ORD-1",
      filledCompletely: true,
      terminalStatus: "TRADED",
      filledQty: 75
    });
    expect(sleeps).toEqual([1000]);
    expect(broker.calls).toEqual(["place BUY 45001", "status ORD-1", "status ORD-1"]);
  });

  it("does not count a partial fill as filled", async () => {
    const broker = new FakeBroker().scriptStatus("45001", { status: "PART_TRADED", filledQty: 25 });
    const { executor } = buildExecutor(broker, new ScriptedQuoteProvider());

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result.placed).toBe(true);
    expect(result.filledCompletely).toBe(false);
    expect(result.filledQty).toBe(25);
    expect(result.failure).toEqual({
      kind: "NOT_FILLED",
      message: "Order ORD-1 ended PART_TRADED with 25/75 filled"
    });
  });

  it("times out after the polling window when the order never trades", async () => {
    const broker = new FakeBroker().scriptStatus("45001", "PLACED");
    const { executor, sleeps } = buildExecutor(broker, new ScriptedQuoteProvider());

    const result = await executor.submit({ side: "BUY", instrument: "45001", qty: 75, waitForFill: true });

    expect(result).toEqual({
      placed: true,
      orderId: "ORD-1",
      filledCompletely: false,
      terminalStatus: "PLACED",
      failure: { kind: "FILL_TIMEOUT", message: "Order ORD-1 not terminal after 20 polls (last PLACED)" }
    });
    expect(broker.calls.filter((c) => c === "status ORD-1")).toHaveLength(20);
    expect(sleeps).toEqual(new Array(19).fill(1000));
  });

  it("returns right after placement when not waiting for the fill", async () => {
    const broker = new FakeBroker();
    const { executor } = buildExecutor(broker, new ScriptedQuoteProvider());

    const result = await executor.submit({ side: "SELL", instrument: "45002", qty: 75, waitForFill: false });

    expect(result).toEqual({ placed: true, orderId: "ORD-1" });
    expect(broker.calls).toEqual(["place SELL 45002"]);
  });
});
