export type Side = "BUY" | "SELL";
export type OrderStatus =
  | "PENDING"
  | "PLACED"
  | "PART_TRADED"
  | "TRADED"
  | "REJECTED"
  | "CANCELLED"
  | "EXPIRED";

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = [
  "TRADED",
  "PART_TRADED",
  "REJECTED",
  "CANCELLED",
  "EXPIRED"
];

export type SignalType = "BUY" | "SELL" | "EXIT" | "CHECK";

export type PositionStatus = "OPEN" | "PARTIAL_OPEN" | "CLOSED";
export type PositionLifecycle = "ABSENT" | "ENTERING" | "OPEN" | "PARTIAL_OPEN" | "EXITING";

export interface Contract {
  expiry: string; // YYYY-MM-DD, market date
  strike: number;
  callInstrument: string;
  putInstrument: string;
}

export interface SystemPosition {
  systemId: string;
  underlying: string;
  contract: Contract;
  qty: number;
  status: PositionStatus;
  callLeg: string;
  putLeg: string | null; // null when the short put is not held
  warning: string | null;
  enteredAt: string;
}

export interface BookLevel {
  price: number;
  qty: number;
}

export interface LiquidityQuote {
  bid: BookLevel | null;
  ask: BookLevel | null;
}

export interface OrderRequest {
  side: Side;
  instrument: string;
  qty: number;
  correlationId?: string;
}

export interface PlacedOrder {
  orderId: string;
  status: OrderStatus;
}

export interface OrderStatusReport {
  orderId: string;
  status: OrderStatus;
  filledQty: number;
  averagePrice?: number;
  reason?: string;
}

export interface BrokerPosition {
  instrument: string;
  netQty: number;
}

export interface MarginRequest {
  side: Side;
  instrument: string;
  qty: number;
  price: number;
}

export interface MarginEstimate {
  totalMargin: number;
  availableBalance: number;
  insufficientBalance: number;
}

export interface GateResult {
  ok: boolean;
  reason?: string;
}

export type OrderFailureKind =
  | "LIQUIDITY_REJECTED"
  | "MARGIN_REJECTED"
  | "ORDER_PLACEMENT_FAILED"
  | "FILL_TIMEOUT"
  | "NOT_FILLED";

export interface OrderFailure {
  kind: OrderFailureKind;
  message: string;
}

export interface OrderResult {
  placed: boolean;
  // undefined when the caller did not wait for the fill
  filledCompletely?: boolean;
  orderId?: string;
  terminalStatus?: OrderStatus;
  filledQty?: number;
  failure?: OrderFailure;
}

export interface EnterRequest {
  systemId: string;
  underlying: string;
  contract: Contract;
  qty: number;
}

export interface EnterResult {
  systemId: string;
  entered: boolean;
  partial: boolean;
  ignored: boolean;
  reason?: string;
  warning?: string;
  position?: SystemPosition;
  callOrder?: OrderResult;
  putOrder?: OrderResult;
}

export interface ExitResult {
  systemId: string;
  exited: boolean;
  ignored: boolean;
  status?: PositionStatus;
  reason?: string;
  putOrder?: OrderResult;
  callOrder?: OrderResult;
  skippedLegs: string[];
}

export type RolloverOutcome = "ROLLED" | "EXIT_FAILED" | "ENTRY_FAILED" | "SKIPPED";

export interface RolloverItem {
  systemId: string;
  outcome: RolloverOutcome;
  fromContract?: Contract;
  toContract?: Contract;
  manualIntervention: boolean;
  partial?: boolean;
  reason?: string;
}

export interface RolloverSummary {
  ran: boolean;
  marketDate: string;
  items: RolloverItem[];
}

export interface SignalPayload {
  signal: SignalType;
  systemId: string;
  underlying?: string;
  qty: number;
}
