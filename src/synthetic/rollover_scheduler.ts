import { errorMessage } from "../errors.js";
import { ContractResolver, resolveNextContract } from "../market_data/contract_resolver.js";
import { Alerter } from "../ops/alerter.js";
import { PositionStore } from "../persistence/position_store.js";
import { RolloverItem, RolloverSummary, SystemPosition } from "../types.js";
import { asyncPool } from "../utils/async_pool.js";
import { isAtOrAfter, marketParts } from "../utils/market_time.js";
import { SyntheticPositionManager } from "./position_manager.js";

export interface RolloverSchedulerConfig {
  cutoff: string; // HH:MM market time
  utcOffsetMinutes: number;
  concurrency?: number;
}

export class RolloverScheduler {
  constructor(
    private store: PositionStore,
    private manager: SyntheticPositionManager,
    private resolver: ContractResolver,
    private alerter: Alerter,
    private cfg: RolloverSchedulerConfig
  ) {}

  async run(now: Date = new Date()): Promise<RolloverSummary> {
    const parts = marketParts(now, this.cfg.utcOffsetMinutes);
    if (!isAtOrAfter(parts, this.cfg.cutoff)) {
      console.log("ROLLOVER_BEFORE_CUTOFF", parts.date, `cutoff=${this.cfg.cutoff}`);
      return { ran: false, marketDate: parts.date, items: [] };
    }

    const due = Object.values(await this.store.all()).filter(
      (p) => p.contract.expiry === parts.date
    );
    console.log("ROLLOVER_START", parts.date, `due=${due.length}`);

    const items = await asyncPool(due, this.cfg.concurrency ?? 2, (position) =>
      this.rollOne(position, parts.date)
    );

    for (const item of items) {
      if (item.outcome === "EXIT_FAILED") {
        await this.alerter.notify(
          "warning",
          "rollover_exit_failed",
          `${item.systemId} rollover skipped, exit failed: ${item.reason ?? "unknown"}`,
          { systemId: item.systemId, fromContract: item.fromContract }
        );
      }
    }
    console.log(
      "ROLLOVER_DONE",
      parts.date,
      items.map((i) => `${i.systemId}:${i.outcome}${i.manualIntervention ? ":MANUAL" : ""}`).join(",")
    );
    return { ran: true, marketDate: parts.date, items };
  }

  private async rollOne(position: SystemPosition, marketDate: string): Promise<RolloverItem> {
    try {
      return await this.manager.rollover(position.systemId, marketDate, (current) =>
        resolveNextContract(this.resolver, current.underlying, current.contract.expiry)
      );
    } catch (err) {
      console.error("ROLLOVER_ERROR", position.systemId, errorMessage(err));
      return {
        systemId: position.systemId,
        outcome: "EXIT_FAILED",
        fromContract: position.contract,
        manualIntervention: true,
        reason: errorMessage(err)
      };
    }
  }
}
