import { errorMessage } from "../errors.js";
import { RolloverSummary } from "../types.js";
import { isAtOrAfter, isWeekday, marketParts } from "../utils/market_time.js";

type TickerState = {
  enabled: boolean;
  tickSeconds: number;
  cutoff: string;
  lastRunDate: string | null;
  lastRunAt: string | null;
  lastError: string | null;
  lastSummary: RolloverSummary | null;
};

type TickerHandlers = {
  runRollover: (now: Date) => Promise<RolloverSummary>;
  canRun: () => boolean;
};

export class RolloverTicker {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private lastRunDate: string | null = null;
  private lastRunAt: string | null = null;
  private lastError: string | null = null;
  private lastSummary: RolloverSummary | null = null;

  constructor(
    private handlers: TickerHandlers,
    private cfg: {
      tickSeconds: number;
      cutoff: string;
      utcOffsetMinutes: number;
    }
  ) {}

  start() {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, Math.max(5, this.cfg.tickSeconds) * 1000);
    void this.tick();
  }

  stop() {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning() {
    return Boolean(this.timer);
  }

  getState(): TickerState {
    return {
      enabled: this.isRunning(),
      tickSeconds: this.cfg.tickSeconds,
      cutoff: this.cfg.cutoff,
      lastRunDate: this.lastRunDate,
      lastRunAt: this.lastRunAt,
      lastError: this.lastError,
      lastSummary: this.lastSummary
    };
  }

  // One rollover pass per market date, on weekdays, once the cutoff has passed.
  async tick(now: Date = new Date()): Promise<void> {
    const p = marketParts(now, this.cfg.utcOffsetMinutes);
    if (!isWeekday(p) || !isAtOrAfter(p, this.cfg.cutoff)) {
      return;
    }
    if (this.lastRunDate === p.date || this.running || !this.handlers.canRun()) {
      return;
    }
    this.running = true;
    try {
      this.lastSummary = await this.handlers.runRollover(now);
      this.lastRunDate = p.date;
      this.lastRunAt = now.toISOString();
      this.lastError = null;
    } catch (err) {
      // Left unmarked so the next tick retries.
      this.lastError = errorMessage(err);
      console.error("SCHED_ROLLOVER_FAIL", p.date, this.lastError);
    } finally {
      this.running = false;
    }
  }
}
