import { AlertConfig } from "../config/config.js";
import { AlertSeverity, Persistence } from "../persistence/persistence.js";

export interface Alerter {
  notify(severity: AlertSeverity, type: string, message: string, context?: unknown): Promise<void>;
}

export class NullAlerter implements Alerter {
  async notify(
    _severity: AlertSeverity,
    _type: string,
    _message: string,
    _context?: unknown
  ): Promise<void> {}
}

export class TelegramAlerter implements Alerter {
  private lastByKey = new Map<string, number>();

  constructor(
    private persistence: Persistence,
    private botToken: string,
    private chatId: string,
    private cooldownMs: number,
    private now: () => number = Date.now
  ) {}

  async notify(
    severity: AlertSeverity,
    type: string,
    message: string,
    context?: unknown
  ): Promise<void> {
    const now = this.now();
    const key = `${severity}:${type}:${message}`;
    const last = this.lastByKey.get(key);
    if (last !== undefined && now - last < this.cooldownMs) {
      return;
    }
    this.lastByKey.set(key, now);

    const contextJson = context === undefined ? undefined : JSON.stringify(context);
    await this.persistence.insertAlertEvent({ severity, type, message, contextJson });

    const text = [`[${severity.toUpperCase()}] ${type}`, message, contextJson ? `context: ${contextJson}` : ""]
      .filter(Boolean)
      .join("\n");

    const res = await fetch(`https://api.telegram.org/bot${this.botToken}/sendMessage`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ chat_id: this.chatId, text })
    });
    if (!res.ok) {
      console.warn("ALERT_SEND_FAIL", type, res.status);
    }
  }
}

export function buildAlerter(persistence: Persistence, cfg: AlertConfig): Alerter {
  if (!cfg.telegramBotToken || !cfg.telegramChatId) {
    return new NullAlerter();
  }
  return new TelegramAlerter(persistence, cfg.telegramBotToken, cfg.telegramChatId, cfg.cooldownMs);
}
