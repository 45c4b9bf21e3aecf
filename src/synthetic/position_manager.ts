import { StatePersistenceError, errorMessage } from "../errors.js";
import { BrokerClient } from "../execution/broker.js";
import { OrderExecutor } from "../oms/order_executor.js";
import { Alerter } from "../ops/alerter.js";
import { PositionStore } from "../persistence/position_store.js";
import {
  Contract,
  EnterRequest,
  EnterResult,
  ExitResult,
  PositionLifecycle,
  RolloverItem,
  SystemPosition
} from "../types.js";
import { KeyedLock } from "../utils/key_lock.js";
import { withTimeout } from "../utils/timing.js";

export interface SyntheticPositionManagerDeps {
  store: PositionStore;
  executor: OrderExecutor;
  broker: BrokerClient;
  alerter: Alerter;
  lock?: KeyedLock;
  reconcileBeforeExit?: boolean;
  brokerTimeoutMs?: number;
  now?: () => Date;
}

/**
 * Two-leg synthetic long: long call first, short put only once the call is
 * fully filled. Exit closes the short put before the long call. Every public
 * operation holds the per-system lock for its whole read-decide-write span.
 */
export class SyntheticPositionManager {
  private store: PositionStore;
  private executor: OrderExecutor;
  private broker: BrokerClient;
  private alerter: Alerter;
  private lock: KeyedLock;
  private reconcileBeforeExit: boolean;
  private brokerTimeoutMs: number;
  private now: () => Date;
  private inflight = new Map<string, "ENTERING" | "EXITING">();

  constructor(deps: SyntheticPositionManagerDeps) {
    this.store = deps.store;
    this.executor = deps.executor;
    this.broker = deps.broker;
    this.alerter = deps.alerter;
    this.lock = deps.lock ?? new KeyedLock();
    this.reconcileBeforeExit = deps.reconcileBeforeExit ?? true;
    this.brokerTimeoutMs = deps.brokerTimeoutMs ?? 10_000;
    this.now = deps.now ?? (() => new Date());
  }

  enter(req: EnterRequest): Promise<EnterResult> {
    return this.lock.runExclusive(req.systemId, () => this.enterLocked(req));
  }

  exit(systemId: string): Promise<ExitResult> {
    return this.lock.runExclusive(systemId, () => this.exitLocked(systemId));
  }

  /**
   * Exit the position expiring on `expiringOn`, then enter `nextContract(position)`
   * with the same qty. Never enters if the exit did not complete.
   */
  rollover(
    systemId: string,
    expiringOn: string,
    nextContract: (position: SystemPosition) => Promise<Contract>
  ): Promise<RolloverItem> {
    return this.lock.runExclusive(systemId, async (): Promise<RolloverItem> => {
      const position = await this.store.get(systemId);
      if (!position || position.contract.expiry !== expiringOn) {
        return {
          systemId,
          outcome: "SKIPPED",
          fromContract: position?.contract,
          manualIntervention: false,
          reason: position ? `Contract expires ${position.contract.expiry}` : "No position"
        };
      }

      const exit = await this.exitLocked(systemId);
      if (!exit.exited) {
        return {
          systemId,
          outcome: "EXIT_FAILED",
          fromContract: position.contract,
          manualIntervention: false,
          reason: exit.reason
        };
      }

      let contract: Contract;
      try {
        contract = await nextContract(position);
      } catch (err) {
        return this.entryGap(position, undefined, `Next contract unavailable: ${errorMessage(err)}`);
      }

      const entry = await this.enterLocked({
        systemId,
        underlying: position.underlying,
        contract,
        qty: position.qty
      });
      if (!entry.entered) {
        return this.entryGap(position, contract, entry.reason ?? "Entry failed");
      }
      return {
        systemId,
        outcome: "ROLLED",
        fromContract: position.contract,
        toContract: contract,
        manualIntervention: false,
        partial: entry.partial,
        reason: entry.warning
      };
    });
  }

  async state(systemId: string): Promise<PositionLifecycle> {
    const inflight = this.inflight.get(systemId);
    if (inflight) {
      return inflight;
    }
    const position = await this.store.get(systemId);
    if (!position || position.status === "CLOSED") {
      return "ABSENT";
    }
    return position.status;
  }

  private async enterLocked(req: EnterRequest): Promise<EnterResult> {
    const { systemId, underlying, contract, qty } = req;
    const existing = await this.store.get(systemId);
    if (existing) {
      console.log("ENTRY_IGNORED", systemId, `status=${existing.status}`);
      return {
        systemId,
        entered: false,
        partial: false,
        ignored: true,
        reason: `Position already ${existing.status}`
      };
    }

    this.inflight.set(systemId, "ENTERING");
    try {
      console.log("ENTRY_START", systemId, underlying, contract.expiry, contract.strike, qty);
      const callOrder = await this.executor.submit({
        side: "BUY",
        instrument: contract.callInstrument,
        qty,
        waitForFill: true
      });
      if (!callOrder.filledCompletely) {
        // Nothing persisted; whatever the broker holds of this order is left to it.
        console.warn("ENTRY_ABORTED", systemId, callOrder.failure?.message);
        return {
          systemId,
          entered: false,
          partial: false,
          ignored: false,
          reason: `Long call leg not filled: ${callOrder.failure?.message ?? "unknown"}`,
          callOrder
        };
      }

      const putOrder = await this.executor.submit({
        side: "SELL",
        instrument: contract.putInstrument,
        qty,
        waitForFill: false
      });
      const partial = !putOrder.placed;
      const warning = partial
        ? `Naked long leg: short put ${contract.putInstrument} not placed (${
            putOrder.failure?.message ?? "unknown"
          })`
        : null;

      const position: SystemPosition = {
        systemId,
        underlying,
        contract: { ...contract },
        qty,
        status: partial ? "PARTIAL_OPEN" : "OPEN",
        callLeg: contract.callInstrument,
        putLeg: partial ? null : contract.putInstrument,
        warning,
        enteredAt: this.now().toISOString()
      };

      if (partial) {
        console.error("NAKED_LEG", systemId, contract.callInstrument, warning);
        await this.alerter.notify("critical", "naked_long_leg", warning ?? "", {
          systemId,
          contract
        });
      }

      const persistWarning = await this.persistEntry(position);
      const warnings = [warning, persistWarning].filter((w): w is string => Boolean(w));
      console.log("ENTRY_DONE", systemId, position.status);
      return {
        systemId,
        entered: true,
        partial,
        ignored: false,
        warning: warnings.length > 0 ? warnings.join("; ") : undefined,
        position,
        callOrder,
        putOrder
      };
    } finally {
      this.inflight.delete(systemId);
    }
  }

  // Returns a warning when the filled position could not be recorded.
  private async persistEntry(position: SystemPosition): Promise<string | null> {
    let inserted: boolean;
    try {
      inserted = await this.store.insertIfAbsent(position.systemId, position);
    } catch (err) {
      const message = `Filled position for ${position.systemId} not persisted: ${errorMessage(err)}`;
      console.error("ENTRY_PERSIST_FAIL", position.systemId, errorMessage(err));
      await this.alerter.notify("critical", "state_persistence_failed", message, { position });
      if (err instanceof StatePersistenceError) {
        return message;
      }
      throw err;
    }
    if (!inserted) {
      const message = `Another entry for ${position.systemId} was recorded concurrently; broker legs need reconciling`;
      console.error("ENTRY_DUPLICATE_RACE", position.systemId);
      await this.alerter.notify("critical", "state_persistence_failed", message, { position });
      return message;
    }
    return null;
  }

  private async exitLocked(systemId: string): Promise<ExitResult> {
    const position = await this.store.get(systemId);
    if (!position) {
      console.log("EXIT_IGNORED", systemId, "no position");
      return { systemId, exited: false, ignored: true, reason: "No position", skippedLegs: [] };
    }

    this.inflight.set(systemId, "EXITING");
    try {
      console.log("EXIT_START", systemId, position.status, position.contract.expiry);
      const skippedLegs: string[] = [];
      let putOrder: ExitResult["putOrder"];

      if (position.putLeg) {
        const putLeg = position.putLeg;
        if ((await this.brokerExposure(putLeg)) === 0) {
          console.warn("LEG_ALREADY_CLOSED", systemId, putLeg);
          skippedLegs.push(putLeg);
        } else {
          putOrder = await this.executor.submit({
            side: "BUY",
            instrument: putLeg,
            qty: position.qty,
            waitForFill: true
          });
          if (!putOrder.filledCompletely) {
            console.warn("EXIT_ABORTED", systemId, "short leg close failed", putOrder.failure?.message);
            return {
              systemId,
              exited: false,
              ignored: false,
              status: position.status,
              reason: `Short put leg close failed: ${putOrder.failure?.message ?? "unknown"}`,
              putOrder,
              skippedLegs
            };
          }
        }
        await this.recordShortClosed(position);
      }

      let callOrder: ExitResult["callOrder"];
      if ((await this.brokerExposure(position.callLeg)) === 0) {
        console.warn("LEG_ALREADY_CLOSED", systemId, position.callLeg);
        skippedLegs.push(position.callLeg);
      } else {
        callOrder = await this.executor.submit({
          side: "SELL",
          instrument: position.callLeg,
          qty: position.qty,
          waitForFill: true
        });
        if (!callOrder.filledCompletely) {
          const reason = `Long call leg close failed: ${callOrder.failure?.message ?? "unknown"}`;
          console.error("EXIT_PARTIAL", systemId, reason);
          await this.alerter.notify("warning", "exit_partial", reason, { systemId });
          return {
            systemId,
            exited: false,
            ignored: false,
            status: "PARTIAL_OPEN",
            reason,
            putOrder,
            callOrder,
            skippedLegs
          };
        }
      }

      try {
        await this.store.delete(systemId);
      } catch (err) {
        console.error("EXIT_PERSIST_FAIL", systemId, errorMessage(err));
        await this.alerter.notify(
          "critical",
          "state_persistence_failed",
          `Legs closed for ${systemId} but state delete failed: ${errorMessage(err)}`,
          { systemId }
        );
        if (!(err instanceof StatePersistenceError)) {
          throw err;
        }
      }
      console.log("EXIT_DONE", systemId);
      return { systemId, exited: true, ignored: false, status: "CLOSED", putOrder, callOrder, skippedLegs };
    } finally {
      this.inflight.delete(systemId);
    }
  }

  // After the short put is closed, a retry must resume from the long leg only.
  private async recordShortClosed(position: SystemPosition): Promise<void> {
    const updated: SystemPosition = {
      ...position,
      status: "PARTIAL_OPEN",
      putLeg: null,
      warning: "Short put closed; long call exit pending"
    };
    try {
      await this.store.put(position.systemId, updated);
    } catch (err) {
      console.error("EXIT_PERSIST_FAIL", position.systemId, errorMessage(err));
      if (!(err instanceof StatePersistenceError)) {
        throw err;
      }
    }
  }

  // Net broker qty for an instrument summed over every product row; null when unknown or not checked.
  private async brokerExposure(instrument: string): Promise<number | null> {
    if (!this.reconcileBeforeExit) {
      return null;
    }
    try {
      const positions = await withTimeout(this.broker.getPositions(), this.brokerTimeoutMs, "broker positions");
      return positions
        .filter((p) => p.instrument === instrument)
        .reduce((sum, p) => sum + p.netQty, 0);
    } catch (err) {
      console.warn("RECONCILE_UNAVAILABLE", instrument, errorMessage(err));
      return null;
    }
  }

  private async entryGap(
    position: SystemPosition,
    contract: Contract | undefined,
    reason: string
  ): Promise<RolloverItem> {
    try {
      await this.store.delete(position.systemId);
    } catch (err) {
      console.error("ROLLOVER_PERSIST_FAIL", position.systemId, errorMessage(err));
    }
    console.error("ROLLOVER_MANUAL_INTERVENTION", position.systemId, reason);
    await this.alerter.notify(
      "critical",
      "rollover_manual_intervention",
      `${position.systemId} exited ${position.contract.expiry} but re-entry failed: ${reason}`,
      { systemId: position.systemId, fromContract: position.contract, toContract: contract }
    );
    return {
      systemId: position.systemId,
      outcome: "ENTRY_FAILED",
      fromContract: position.contract,
      toContract: contract,
      manualIntervention: true,
      reason
    };
  }
}
