import { errorMessage } from "../errors.js";
import { OrderStatus, OrderStatusReport, TERMINAL_ORDER_STATUSES } from "../types.js";
import { Sleep, sleep as realSleep, withTimeout } from "../utils/timing.js";
import { BrokerClient } from "./broker.js";

export interface FillOutcome {
  // null when the wait window ran out before a terminal status
  terminal: OrderStatusReport | null;
  lastStatus?: OrderStatus;
  polls: number;
}

export interface FillObserver {
  waitForTerminal(orderId: string): Promise<FillOutcome>;
}

export interface PollingFillObserverConfig {
  pollMs: number;
  maxWaitMs: number;
  requestTimeoutMs: number;
  // cap on terminal updates held for orders nobody waits on yet (default 256)
  maxUnclaimed?: number;
  sleep?: Sleep;
}

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.includes(status);
}

/**
 * Polls order status until a terminal state or the wait window closes. An
 * order-update feed can call `notify` to end a pending wait before the next poll.
 */
export class PollingFillObserver implements FillObserver {
  private waiters = new Map<string, () => void>();
  private pushed = new Map<string, OrderStatusReport>();
  private sleep: Sleep;
  private maxUnclaimed: number;

  constructor(private broker: BrokerClient, private cfg: PollingFillObserverConfig) {
    if (!(cfg.pollMs > 0) || !(cfg.maxWaitMs > 0)) {
      throw new RangeError(`pollMs and maxWaitMs must be positive, got ${cfg.pollMs} and ${cfg.maxWaitMs}`);
    }
    this.sleep = cfg.sleep ?? realSleep;
    this.maxUnclaimed = cfg.maxUnclaimed ?? 256;
  }

  notify(report: OrderStatusReport): void {
    if (!isTerminal(report.status)) {
      return;
    }
    // Kept even with no waiter yet: the update can beat the caller's wait.
    this.pushed.delete(report.orderId);
    this.pushed.set(report.orderId, report);
    this.evictUnclaimed();
    this.waiters.get(report.orderId)?.();
  }

  async waitForTerminal(orderId: string): Promise<FillOutcome> {
    const maxPolls = Math.max(1, Math.ceil(this.cfg.maxWaitMs / this.cfg.pollMs));
    let lastStatus: OrderStatus | undefined;
    const wake = new Promise<void>((resolve) => {
      this.waiters.set(orderId, resolve);
    });

    try {
      for (let poll = 1; poll <= maxPolls; poll += 1) {
        const pushed = this.takePushed(orderId);
        if (pushed) {
          return { terminal: pushed, lastStatus: pushed.status, polls: poll - 1 };
        }
        try {
          const report = await withTimeout(
            this.broker.getOrderStatus(orderId),
            this.cfg.requestTimeoutMs,
            `order status ${orderId}`
          );
          lastStatus = report.status;
          if (isTerminal(report.status)) {
            return { terminal: report, lastStatus, polls: poll };
          }
        } catch (err) {
          console.warn("ORDER_STATUS_POLL_FAIL", orderId, errorMessage(err));
        }
        if (poll < maxPolls) {
          await Promise.race([this.sleep(this.cfg.pollMs), wake]);
        }
      }
      const pushed = this.takePushed(orderId);
      if (pushed) {
        return { terminal: pushed, lastStatus: pushed.status, polls: maxPolls };
      }
      return { terminal: null, lastStatus, polls: maxPolls };
    } finally {
      this.waiters.delete(orderId);
      this.pushed.delete(orderId);
    }
  }

  // Oldest first; updates for orders with a waiter stay.
  private evictUnclaimed(): void {
    let excess = this.pushed.size - this.maxUnclaimed;
    for (const orderId of this.pushed.keys()) {
      if (excess <= 0) {
        break;
      }
      if (!this.waiters.has(orderId)) {
        this.pushed.delete(orderId);
        excess -= 1;
      }
    }
  }

  private takePushed(orderId: string): OrderStatusReport | null {
    const report = this.pushed.get(orderId) ?? null;
    this.pushed.delete(orderId);
    return report;
  }
}
