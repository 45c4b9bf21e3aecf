import {
  BrokerPosition,
  MarginEstimate,
  MarginRequest,
  OrderRequest,
  OrderStatusReport,
  PlacedOrder
} from "../types.js";

export interface BrokerClient {
  placeOrder(req: OrderRequest): Promise<PlacedOrder>;
  getOrderStatus(orderId: string): Promise<OrderStatusReport>;
  getPositions(): Promise<BrokerPosition[]>;
}

export interface MarginEstimator {
  estimate(req: MarginRequest): Promise<MarginEstimate>;
}
