import { errorMessage } from "../errors.js";

export type AlertSeverity = "info" | "warning" | "critical";

export type AlertType =
  | "naked_long_leg"
  | "rollover_manual_intervention"
  | "rollover_exit_failed"
  | "state_persistence_failed"
  | "exit_partial";

export interface Alerter {
  notify(severity: AlertSeverity, type: AlertType, message: string, context?: unknown): Promise<void>;
}

export class NullAlerter implements Alerter {
  async notify(
    _severity: AlertSeverity,
    _type: AlertType,
    _message: string,
    _context?: unknown
  ): Promise<void> {}
}

export class TelegramAlerter implements Alerter {
  private lastByKey = new Map<string, number>();

  constructor(
    private botToken: string,
    private chatId: string,
    private cooldownMs: number,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async notify(
    severity: AlertSeverity,
    type: AlertType,
    message: string,
    context?: unknown
  ): Promise<void> {
    const now = Date.now();
    const key = `${severity}:${type}:${message}`;
    const last = this.lastByKey.get(key) ?? 0;
    if (now - last < this.cooldownMs) {
      return;
    }
    this.lastByKey.set(key, now);

    const contextJson = context ? JSON.stringify(context) : undefined;
    const text = [
      `[${severity.toUpperCase()}] ${type}`,
      message,
      contextJson ? `context: ${contextJson}` : ""
    ]
      .filter(Boolean)
      .join("\n");

    // Delivery failures are logged, never thrown.
    try {
      const res = await this.fetchImpl(`https://api.telegram.org/bot${this.botToken}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: this.chatId, text }),
        signal: AbortSignal.timeout(5000)
      });
      if (!res.ok) {
        console.error("ALERT_SEND_FAIL", type, res.status);
      }
    } catch (err) {
      console.error("ALERT_SEND_FAIL", type, errorMessage(err));
    }
  }
}

export function buildAlerter(env: Record<string, string | undefined> = process.env): Alerter {
  const botToken = env.TELEGRAM_BOT_TOKEN;
  const chatId = env.TELEGRAM_CHAT_ID;
  const cooldownMs = Number(env.ALERT_COOLDOWN_MS ?? "60000");
  if (!botToken || !chatId) {
    return new NullAlerter();
  }
  return new TelegramAlerter(botToken, chatId, cooldownMs);
}
