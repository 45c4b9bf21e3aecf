import { describe, expect, it } from "vitest";
import { isAtOrAfter, isWeekday, marketParts, minutesOfDay } from "./market_time.js";

describe("market time", () => {
  it("shifts UTC into market wall-clock time", () => {
    expect(marketParts(new Date("2026-10-27T09:30:00.000Z"), 330)).toEqual({
      weekday: "Tue",
      date: "2026-10-27",
      hour: 15,
      minute: 0
    });
  });

  it("rolls the market date past UTC midnight", () => {
    expect(marketParts(new Date("2026-10-24T19:00:00.000Z"), 330).date).toBe("2026-10-25");
  });

  it("compares against an HH:MM cutoff inclusively", () => {
    const at = marketParts(new Date("2026-10-27T09:30:00.000Z"), 330);
    expect(isAtOrAfter(at, "15:00")).toBe(true);
    expect(isAtOrAfter(at, "15:01")).toBe(false);
    expect(minutesOfDay("09:15")).toBe(555);
  });

  it("knows weekends", () => {
    expect(isWeekday(marketParts(new Date("2026-10-25T06:00:00.000Z"), 330))).toBe(false);
    expect(isWeekday(marketParts(new Date("2026-10-26T06:00:00.000Z"), 330))).toBe(true);
  });
});
