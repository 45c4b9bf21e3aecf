import { errorMessage } from "../errors.js";
import { BrokerClient } from "../execution/broker.js";
import { FillObserver } from "../execution/fill_observer.js";
import { LiquidityCheck, LiquidityGate } from "../risk/liquidity_gate.js";
import { MarginGate } from "../risk/margin_gate.js";
import { OrderResult, Side } from "../types.js";
import { Sleep, sleep as realSleep, withTimeout } from "../utils/timing.js";

export interface SubmitRequest {
  side: Side;
  instrument: string;
  qty: number;
  waitForFill: boolean;
  correlationId?: string;
}

export interface OrderExecutorConfig {
  liquidityRetryBackoffMs: number;
  orderTimeoutMs: number;
  sleep?: Sleep;
}

export class OrderExecutor {
  private sleep: Sleep;

  constructor(
    private broker: BrokerClient,
    private liquidity: LiquidityGate,
    private margin: MarginGate,
    private fills: FillObserver,
    private cfg: OrderExecutorConfig
  ) {
    this.sleep = cfg.sleep ?? realSleep;
  }

  async submit(req: SubmitRequest): Promise<OrderResult> {
    const { side, instrument, qty } = req;

    const liquidity = await this.checkLiquidity(instrument, qty);
    if (!liquidity.ok) {
      console.warn("LIQUIDITY_REJECTED", side, qty, instrument, liquidity.reason);
      return {
        placed: false,
        failure: { kind: "LIQUIDITY_REJECTED", message: liquidity.reason ?? "liquidity check failed" }
      };
    }

    const referencePrice = side === "BUY" ? liquidity.quote?.ask?.price : liquidity.quote?.bid?.price;
    if (referencePrice !== undefined && this.margin.enabled) {
      const margin = await this.margin.check(instrument, side, qty, referencePrice);
      if (!margin.ok) {
        console.warn("MARGIN_REJECTED", side, qty, instrument, margin.reason);
        return {
          placed: false,
          failure: { kind: "MARGIN_REJECTED", message: margin.reason ?? "margin check failed" }
        };
      }
    }

    let orderId: string;
    try {
      const placed = await withTimeout(
        this.broker.placeOrder({ side, instrument, qty, correlationId: req.correlationId }),
        this.cfg.orderTimeoutMs,
        `place ${side} ${instrument}`
      );
      orderId = placed.orderId;
      if (placed.status === "REJECTED") {
        console.error("ORDER_REJECTED", side, qty, instrument, orderId);
        return {
          placed: false,
          orderId,
          terminalStatus: "REJECTED",
          failure: { kind: "ORDER_PLACEMENT_FAILED", message: `Broker rejected order ${orderId}` }
        };
      }
    } catch (err) {
      console.error("ORDER_PLACEMENT_FAILED", side, qty, instrument, errorMessage(err));
      return {
        placed: false,
        failure: { kind: "ORDER_PLACEMENT_FAILED", message: errorMessage(err) }
      };
    }
    console.log("ORDER_PLACED", side, qty, instrument, orderId);

    if (!req.waitForFill) {
      return { placed: true, orderId };
    }

    const outcome = await this.fills.waitForTerminal(orderId);
    if (!outcome.terminal) {
      console.warn("FILL_TIMEOUT", side, qty, instrument, orderId, `last=${outcome.lastStatus ?? "unknown"}`);
      return {
        placed: true,
        orderId,
        filledCompletely: false,
        terminalStatus: outcome.lastStatus,
        failure: {
          kind: "FILL_TIMEOUT",
          message: `Order ${orderId} not terminal after ${outcome.polls} polls (last ${outcome.lastStatus ?? "unknown"})`
        }
      };
    }

    const { status, filledQty } = outcome.terminal;
    const filledCompletely = status === "TRADED" && filledQty === qty;
    if (!filledCompletely) {
      console.warn("ORDER_NOT_FILLED", side, qty, instrument, orderId, status, `filled=${filledQty}`);
      return {
        placed: true,
        orderId,
        filledCompletely: false,
        terminalStatus: status,
        filledQty,
        failure: {
          kind: "NOT_FILLED",
          message: `Order ${orderId} ended ${status} with ${filledQty}/${qty} filled${
            outcome.terminal.reason ? `: ${outcome.terminal.reason}` : ""
          }`
        }
      };
    }
    console.log("ORDER_FILLED", side, qty, instrument, orderId);
    return { placed: true, orderId, filledCompletely: true, terminalStatus: status, filledQty };
  }

  private async checkLiquidity(instrument: string, qty: number): Promise<LiquidityCheck> {
    const first = await this.liquidity.check(instrument, qty);
    if (first.ok || !first.soft) {
      return first;
    }
    console.warn("LIQUIDITY_RETRY", instrument, qty, first.reason, `backoff=${this.cfg.liquidityRetryBackoffMs}ms`);
    await this.sleep(this.cfg.liquidityRetryBackoffMs);
    return this.liquidity.check(instrument, qty);
  }
}
