import { BrokerPosition, OrderRequest, OrderStatusReport, PlacedOrder } from "../types.js";
import { BrokerClient } from "./broker.js";

// Paper mode: MARKET orders fill immediately and net positions are tracked locally.
export class PaperBroker implements BrokerClient {
  private orders = new Map<string, OrderStatusReport>();
  private net = new Map<string, number>();
  private seq = 0;

  async placeOrder(req: OrderRequest): Promise<PlacedOrder> {
    this.seq += 1;
    const orderId = `PAPER-${Date.now()}-${this.seq}`;
    this.orders.set(orderId, { orderId, status: "TRADED", filledQty: req.qty });
    const signed = req.side === "BUY" ? req.qty : -req.qty;
    const next = (this.net.get(req.instrument) ?? 0) + signed;
    if (next === 0) {
      this.net.delete(req.instrument);
    } else {
      this.net.set(req.instrument, next);
    }
    console.log("[PAPER] FILLED", req.side, req.qty, req.instrument, orderId);
    return { orderId, status: "TRADED" };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new Error(`Paper order not found: ${orderId}`);
    }
    return { ...order };
  }

  async getPositions(): Promise<BrokerPosition[]> {
    return Array.from(this.net.entries()).map(([instrument, netQty]) => ({ instrument, netQty }));
  }
}
