import {
  BrokerPosition,
  MarginEstimate,
  MarginRequest,
  OrderRequest,
  OrderStatus,
  OrderStatusReport,
  PlacedOrder
} from "../types.js";
import { asRecord, toNumber } from "../utils/guards.js";
import { BrokerClient, MarginEstimator } from "./broker.js";
import { DhanHttp } from "./dhan_http.js";

export interface DhanAdapterConfig {
  exchangeSegment?: string; // default NSE_FNO
  productType?: string; // default MARGIN
}

export class DhanAdapter implements BrokerClient, MarginEstimator {
  private exchangeSegment: string;
  private productType: string;

  constructor(private http: DhanHttp, cfg: DhanAdapterConfig = {}) {
    this.exchangeSegment = cfg.exchangeSegment ?? "NSE_FNO";
    this.productType = cfg.productType ?? "MARGIN";
  }

  async placeOrder(req: OrderRequest): Promise<PlacedOrder> {
    const payload: Record<string, unknown> = {
      dhanClientId: this.http.clientId,
      transactionType: req.side,
      exchangeSegment: this.exchangeSegment,
      productType: this.productType,
      orderType: "MARKET",
      validity: "DAY",
      securityId: req.instrument,
      quantity: req.qty
    };
    if (req.correlationId) {
      payload.correlationId = req.correlationId;
    }
    const json = asRecord(await this.http.request("POST", "/v2/orders", payload));
    const orderId = json?.orderId;
    if (typeof orderId !== "string" && typeof orderId !== "number") {
      throw new Error(`Dhan place order missing orderId: ${JSON.stringify(json)}`);
    }
    return {
      orderId: String(orderId),
      status: mapDhanStatus(json?.orderStatus)
    };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
    const raw = await this.http.request("GET", `/v2/orders/${encodeURIComponent(orderId)}`);
    // Some API revisions wrap the order in a single-element array.
    const row = asRecord(Array.isArray(raw) ? raw[0] : raw);
    if (!row) {
      throw new Error(`Dhan order ${orderId} not found`);
    }
    const reason =
      typeof row.omsErrorDescription === "string" && row.omsErrorDescription
        ? row.omsErrorDescription
        : undefined;
    return {
      orderId,
      status: mapDhanStatus(row.orderStatus),
      filledQty: toNumber(row.filledQty) ?? 0,
      averagePrice: toNumber(row.averageTradedPrice) ?? undefined,
      reason
    };
  }

  async getPositions(): Promise<BrokerPosition[]> {
    const raw = await this.http.request("GET", "/v2/positions");
    if (!Array.isArray(raw)) {
      return [];
    }
    const out: BrokerPosition[] = [];
    for (const item of raw) {
      const row = asRecord(item);
      if (!row || row.securityId === undefined) {
        continue;
      }
      // Security ids are only unique within a segment.
      if (row.exchangeSegment !== undefined && String(row.exchangeSegment) !== this.exchangeSegment) {
        continue;
      }
      out.push({
        instrument: String(row.securityId),
        netQty: toNumber(row.netQty) ?? 0
      });
    }
    return out;
  }

  async estimate(req: MarginRequest): Promise<MarginEstimate> {
    const json = asRecord(
      await this.http.request("POST", "/v2/margincalculator", {
        dhanClientId: this.http.clientId,
        exchangeSegment: this.exchangeSegment,
        transactionType: req.side,
        quantity: req.qty,
        productType: this.productType,
        securityId: req.instrument,
        price: req.price
      })
    );
    const totalMargin = toNumber(json?.totalMargin);
    const availableBalance = toNumber(json?.availableBalance);
    if (totalMargin === null || availableBalance === null) {
      throw new Error(`Dhan margin response incomplete: ${JSON.stringify(json)}`);
    }
    return {
      totalMargin,
      availableBalance,
      insufficientBalance: toNumber(json?.insufficientBalance) ?? 0
    };
  }

  async preflightCheck(): Promise<{ ok: boolean; message: string; availableBalance?: number }> {
    try {
      const json = asRecord(await this.http.request("GET", "/v2/fundlimit"));
      const balance = toNumber(json?.availabelBalance ?? json?.availableBalance);
      return {
        ok: true,
        message: "Live preflight passed",
        availableBalance: balance ?? undefined
      };
    } catch (err) {
      return {
        ok: false,
        message: `Live preflight failed: ${err instanceof Error ? err.message : String(err)}`
      };
    }
  }
}

export function mapDhanStatus(raw: unknown): OrderStatus {
  switch (String(raw ?? "").toUpperCase()) {
    case "TRADED":
      return "TRADED";
    case "PART_TRADED":
      return "PART_TRADED";
    case "REJECTED":
      return "REJECTED";
    case "CANCELLED":
      return "CANCELLED";
    case "EXPIRED":
      return "EXPIRED";
    case "CONFIRMED":
    case "OPEN":
    case "MODIFIED":
      return "PLACED";
    default:
      return "PENDING";
  }
}
