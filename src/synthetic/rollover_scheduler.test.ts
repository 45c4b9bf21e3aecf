import { describe, expect, it } from "vitest";
import { InMemoryPositionStore } from "../storage/store.js";
import {
  FakeBroker,
  NIFTY_NOV,
  NIFTY_OCT,
  RecordingAlerter,
  ScriptedQuoteProvider,
  StaticContractResolver,
  buildExecutor,
  openPosition
} from "../testing/fakes.js";
import { SyntheticPositionManager } from "./position_manager.js";
import { RolloverScheduler } from "./rollover_scheduler.js";

// 15:15 and 14:30 IST on Tuesday 2026-10-27
const AFTER_CUTOFF = new Date("2026-10-27T09:45:00.000Z");
const BEFORE_CUTOFF = new Date("2026-10-27T09:00:00.000Z");
const NOW = new Date("2026-10-27T09:46:00.000Z");

function setup(contracts = [NIFTY_OCT, NIFTY_NOV]) {
  const broker = new FakeBroker();
  const store = new InMemoryPositionStore();
  const alerter = new RecordingAlerter();
  const manager = new SyntheticPositionManager({
    store,
    executor: buildExecutor(broker, new ScriptedQuoteProvider()).executor,
    broker,
    alerter,
    reconcileBeforeExit: false,
    now: () => NOW
  });
  const scheduler = new RolloverScheduler(
    store,
    manager,
    new StaticContractResolver({ NIFTY: contracts }),
    alerter,
    { cutoff: "15:00", utcOffsetMinutes: 330, concurrency: 1 }
  );
  return { broker, store, alerter, scheduler };
}

describe("RolloverScheduler", () => {
  it("does nothing before the cutoff", async () => {
    const { broker, store, scheduler } = setup();
    await store.put("S1", openPosition("S1"));

    expect(await scheduler.run(BEFORE_CUTOFF)).toEqual({ ran: false, marketDate: "2026-10-27", items: [] });
    expect(broker.calls).toEqual([]);
  });

  it("rolls an expiring position into the next expiry at the same qty", async () => {
    const { broker, store, scheduler } = setup();
    await store.put("S1", openPosition("S1"));

    const summary = await scheduler.run(AFTER_CUTOFF);

    expect(summary).toEqual({
      ran: true,
      marketDate: "2026-10-27",
      items: [
        {
          systemId: "S1",
          outcome: "ROLLED",
          fromContract: NIFTY_OCT,
          toContract: NIFTY_NOV,
          manualIntervention: false,
          partial: false,
          reason: undefined
        }
      ]
    });
    expect(broker.placedLegs()).toEqual(["BUY 45002", "SELL 45001", "BUY 45101", "SELL 45102"]);
    expect(broker.placed.every((o) => o.qty === 75)).toBe(true);
    expect(await store.get("S1")).toEqual({
      ...openPosition("S1", NIFTY_NOV),
      enteredAt: NOW.toISOString()
    });
  });

  it("leaves positions on later expiries alone", async () => {
    const { broker, store, scheduler } = setup();
    await store.put("S2", openPosition("S2", NIFTY_NOV));

    const summary = await scheduler.run(AFTER_CUTOFF);

    expect(summary.items).toEqual([]);
    expect(broker.calls).toEqual([]);
  });

  it("skips a position whose exit fails and keeps it for the next run", async () => {
    const { broker, store, alerter, scheduler } = setup();
    await store.put("S1", openPosition("S1"));
    broker.scriptStatus("45002", "REJECTED");

    const summary = await scheduler.run(AFTER_CUTOFF);

    expect(summary.items).toEqual([
      {
        systemId: "S1",
        outcome: "EXIT_FAILED",
        fromContract: NIFTY_OCT,
        manualIntervention: false,
        reason: "Short put leg close failed: Order ORD-1 ended REJECTED with 0/75 filled"
      }
    ]);
    expect(await store.get("S1")).toEqual(openPosition("S1"));
    expect(alerter.alerts.map((a) => [a.severity, a.type])).toEqual([["warning", "rollover_exit_failed"]]);
  });

  it("flags manual intervention when the re-entry fails after a clean exit", async () => {
    const { broker, store, alerter, scheduler } = setup();
    await store.put("S1", openPosition("S1"));
    broker.scriptStatus("45101", "REJECTED");

    const summary = await scheduler.run(AFTER_CUTOFF);

    expect(summary.items).toEqual([
      {
        systemId: "S1",
        outcome: "ENTRY_FAILED",
        fromContract: NIFTY_OCT,
        toContract: NIFTY_NOV,
        manualIntervention: true,
        reason: "Long call leg not filled: Order ORD-3 ended REJECTED with 0/75 filled"
      }
    ]);
    expect(await store.get("S1")).toBeNull();
    expect(alerter.alerts.map((a) => [a.severity, a.type])).toEqual([["critical", "rollover_manual_intervention"]]);
  });

  it("flags manual intervention when no later expiry is listed", async () => {
    const { store, scheduler } = setup([NIFTY_OCT]);
    await store.put("S1", openPosition("S1"));

    const [item] = (await scheduler.run(AFTER_CUTOFF)).items;

    expect(item?.outcome).toBe("ENTRY_FAILED");
    expect(item?.manualIntervention).toBe(true);
    expect(item?.reason).toBe("Next contract unavailable: No expiry for NIFTY after 2026-10-27");
  });

  it("processes each due position independently", async () => {
    const { broker, store, scheduler } = setup();
    await store.put("S1", openPosition("S1"));
    await store.put("S2", openPosition("S2"));
    broker.scriptPlacement("45002", new Error("rate limited"));

    const summary = await scheduler.run(AFTER_CUTOFF);

    expect(summary.items.map((i) => [i.systemId, i.outcome])).toEqual([
      ["S1", "EXIT_FAILED"],
      ["S2", "ROLLED"]
    ]);
  });
});
