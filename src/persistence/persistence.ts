import { Order, Trade } from "../types.js";

export interface DailySnapshot {
  tradeDate: string;
  equity: number;
  realizedPnl: number;
  unrealizedPnl: number;
  openPositions: number;
  trades: number;
  note?: string;
  createdAt: string;
}

export type AlertSeverity = "info" | "warning" | "critical";

export interface AlertEvent {
  severity: AlertSeverity;
  type: string;
  message: string;
  contextJson?: string;
}

/**
 * Reporting journal. The engine writes to it and never reads trading state
 * back; restart state comes from the event log.
 */
export interface Persistence {
  init(): Promise<void>;
  upsertOrder(order: Order): Promise<void>;
  insertTrade(trade: Trade): Promise<void>;
  upsertDailySnapshot(snapshot: DailySnapshot): Promise<void>;
  insertAlertEvent(event: AlertEvent): Promise<void>;
  close(): Promise<void>;
}

export class NoopPersistence implements Persistence {
  async init(): Promise<void> {}
  async upsertOrder(_order: Order): Promise<void> {}
  async insertTrade(_trade: Trade): Promise<void> {}
  async upsertDailySnapshot(_snapshot: DailySnapshot): Promise<void> {}
  async insertAlertEvent(_event: AlertEvent): Promise<void> {}
  async close(): Promise<void> {}
}
