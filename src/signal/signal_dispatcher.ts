import { ValidationError, errorMessage } from "../errors.js";
import { ContractResolver, resolveEntryContract } from "../market_data/contract_resolver.js";
import { SyntheticPositionManager } from "../synthetic/position_manager.js";
import { RolloverScheduler } from "../synthetic/rollover_scheduler.js";
import { Contract, EnterResult, ExitResult, RolloverSummary, SignalPayload, SignalType } from "../types.js";
import { isRecord, toNumber } from "../utils/guards.js";
import { marketParts } from "../utils/market_time.js";

const SIGNALS: SignalType[] = ["BUY", "SELL", "EXIT", "CHECK"];

export type DispatchResult =
  | { signal: "BUY"; systemId: string; result: EnterResult }
  | { signal: "SELL" | "EXIT"; systemId: string; result: ExitResult }
  | { signal: "CHECK"; result: RolloverSummary };

function isSignalType(value: string): value is SignalType {
  return SIGNALS.some((s) => s === value);
}

export function parseSignal(body: unknown, cfg: { lotSize: number; defaultQty: number }): SignalPayload {
  if (!isRecord(body)) {
    throw new ValidationError("payload must be a JSON object");
  }
  const signalType = String(body.signal ?? "").trim().toUpperCase();
  if (!isSignalType(signalType)) {
    throw new ValidationError(`invalid signal: ${signalType}`, "signal");
  }

  const rawId = body.system_id ?? body.systemId;
  const systemId = typeof rawId === "string" || typeof rawId === "number" ? String(rawId).trim() : "";
  if (!systemId && signalType !== "CHECK") {
    throw new ValidationError("system_id missing", "system_id");
  }

  const rawUnderlying = body.underlying ?? body.symbol;
  const underlying = typeof rawUnderlying === "string" ? rawUnderlying.trim().toUpperCase() : "";
  if (!underlying && signalType === "BUY") {
    throw new ValidationError("underlying missing", "underlying");
  }

  const qty = body.qty === undefined || body.qty === null ? cfg.defaultQty : toNumber(body.qty);
  if (qty === null || !Number.isInteger(qty) || qty <= 0) {
    throw new ValidationError(`qty must be a positive integer, got ${String(body.qty)}`, "qty");
  }
  if (qty % cfg.lotSize !== 0) {
    throw new ValidationError(`qty ${qty} is not a multiple of lot size ${cfg.lotSize}`, "qty");
  }

  return {
    signal: signalType,
    systemId,
    underlying: underlying || undefined,
    qty
  };
}

export class SignalDispatcher {
  constructor(
    private manager: SyntheticPositionManager,
    private rollover: RolloverScheduler,
    private resolver: ContractResolver,
    private cfg: { utcOffsetMinutes: number; now?: () => Date }
  ) {}

  async dispatch(payload: SignalPayload, now: Date = this.cfg.now?.() ?? new Date()): Promise<DispatchResult> {
    console.log("SIGNAL", payload.signal, payload.systemId, payload.underlying ?? "", payload.qty);
    switch (payload.signal) {
      case "BUY":
        return { signal: "BUY", systemId: payload.systemId, result: await this.buy(payload, now) };
      case "SELL":
      case "EXIT":
        return {
          signal: payload.signal,
          systemId: payload.systemId,
          result: await this.manager.exit(payload.systemId)
        };
      case "CHECK":
        return { signal: "CHECK", result: await this.rollover.run(now) };
    }
  }

  private async buy(payload: SignalPayload, now: Date): Promise<EnterResult> {
    const { systemId } = payload;
    const state = await this.manager.state(systemId);
    if (state !== "ABSENT") {
      console.log("ENTRY_IGNORED", systemId, `state=${state}`);
      return { systemId, entered: false, partial: false, ignored: true, reason: `Position already ${state}` };
    }
    const underlying = payload.underlying;
    if (!underlying) {
      throw new ValidationError("underlying missing", "underlying");
    }

    const marketDate = marketParts(now, this.cfg.utcOffsetMinutes).date;
    let contract: Contract;
    try {
      contract = await resolveEntryContract(this.resolver, underlying, marketDate);
    } catch (err) {
      console.warn("CONTRACT_RESOLVE_FAIL", systemId, underlying, errorMessage(err));
      return {
        systemId,
        entered: false,
        partial: false,
        ignored: false,
        reason: `Contract resolution failed: ${errorMessage(err)}`
      };
    }
    return this.manager.enter({ systemId, underlying, contract, qty: payload.qty });
  }
}
