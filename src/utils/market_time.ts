export interface MarketParts {
  weekday: string;
  date: string; // YYYY-MM-DD
  hour: number;
  minute: number;
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

// Wall-clock parts at a fixed UTC offset (IST is +330).
export function marketParts(now: Date, utcOffsetMinutes: number): MarketParts {
  const shifted = new Date(now.getTime() + utcOffsetMinutes * 60_000);
  const year = shifted.getUTCFullYear();
  const month = String(shifted.getUTCMonth() + 1).padStart(2, "0");
  const day = String(shifted.getUTCDate()).padStart(2, "0");
  return {
    weekday: WEEKDAYS[shifted.getUTCDay()] ?? "",
    date: `${year}-${month}-${day}`,
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes()
  };
}

export function minutesOfDay(hhmm: string): number {
  const [h, m] = hhmm.split(":").map((x) => Number(x.trim()));
  return (h ?? 0) * 60 + (m ?? 0);
}

export function isAtOrAfter(parts: MarketParts, hhmm: string): boolean {
  return parts.hour * 60 + parts.minute >= minutesOfDay(hhmm);
}

export function isWeekday(parts: MarketParts): boolean {
  return ["Mon", "Tue", "Wed", "Thu", "Fri"].includes(parts.weekday);
}
