import pg from "pg";
import { Order, Trade } from "../types.js";
import { tradeDateIST } from "../utils/ist_time.js";
import { AlertEvent, DailySnapshot, NoopPersistence, Persistence } from "./persistence.js";

export class PostgresPersistence implements Persistence {
  private pool: pg.Pool;

  constructor(databaseUrl: string) {
    this.pool = new pg.Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS orders (
        order_id TEXT PRIMARY KEY,
        broker_order_id TEXT,
        symbol TEXT NOT NULL,
        side TEXT NOT NULL,
        qty INTEGER NOT NULL,
        status TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        limit_price DOUBLE PRECISION NOT NULL,
        fill_qty INTEGER NOT NULL,
        fill_price DOUBLE PRECISION,
        rejected_reason TEXT,
        idempotency_key TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS trades (
        position_id TEXT PRIMARY KEY,
        trade_date DATE NOT NULL,
        symbol TEXT NOT NULL,
        exit_reason TEXT NOT NULL,
        net_pnl DOUBLE PRECISION NOT NULL,
        payload JSONB NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE TABLE IF NOT EXISTS daily_snapshots (
        trade_date DATE PRIMARY KEY,
        equity DOUBLE PRECISION NOT NULL,
        realized_pnl DOUBLE PRECISION NOT NULL,
        unrealized_pnl DOUBLE PRECISION NOT NULL,
        open_positions INTEGER NOT NULL,
        trades INTEGER NOT NULL,
        note TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE TABLE IF NOT EXISTS alert_events (
        id BIGSERIAL PRIMARY KEY,
        severity TEXT NOT NULL,
        type TEXT NOT NULL,
        message TEXT NOT NULL,
        context_json TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
  }

  async upsertOrder(order: Order): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO orders (
        order_id, broker_order_id, symbol, side, qty, status, attempts, limit_price,
        fill_qty, fill_price, rejected_reason, idempotency_key, created_at, updated_at
      )
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14)
      ON CONFLICT (order_id)
      DO UPDATE SET
        broker_order_id = EXCLUDED.broker_order_id,
        status = EXCLUDED.status,
        attempts = EXCLUDED.attempts,
        limit_price = EXCLUDED.limit_price,
        fill_qty = EXCLUDED.fill_qty,
        fill_price = EXCLUDED.fill_price,
        rejected_reason = EXCLUDED.rejected_reason,
        updated_at = EXCLUDED.updated_at
      `,
      [
        order.orderId,
        order.brokerOrderId,
        order.symbol,
        order.side,
        order.quantity,
        order.status,
        order.attempts,
        order.currentLimitPrice,
        order.fillQuantity,
        order.fillPrice,
        order.rejectedReason,
        order.idempotencyKey,
        order.createdAt,
        order.updatedAt
      ]
    );
  }

  async insertTrade(trade: Trade): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO trades (position_id, trade_date, symbol, exit_reason, net_pnl, payload)
      VALUES ($1,$2,$3,$4,$5,$6)
      ON CONFLICT (position_id) DO NOTHING
      `,
      [
        trade.positionId,
        tradeDateIST(new Date(trade.exitTime)),
        trade.symbol,
        trade.exitReason,
        trade.netPnl,
        JSON.stringify(trade)
      ]
    );
  }

  async upsertDailySnapshot(snapshot: DailySnapshot): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO daily_snapshots (
        trade_date, equity, realized_pnl, unrealized_pnl, open_positions, trades, note, created_at
      )
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
      ON CONFLICT (trade_date)
      DO UPDATE SET
        equity = EXCLUDED.equity,
        realized_pnl = EXCLUDED.realized_pnl,
        unrealized_pnl = EXCLUDED.unrealized_pnl,
        open_positions = EXCLUDED.open_positions,
        trades = EXCLUDED.trades,
        note = EXCLUDED.note,
        created_at = EXCLUDED.created_at
      `,
      [
        snapshot.tradeDate,
        snapshot.equity,
        snapshot.realizedPnl,
        snapshot.unrealizedPnl,
        snapshot.openPositions,
        snapshot.trades,
        snapshot.note ?? null,
        snapshot.createdAt
      ]
    );
  }

  async insertAlertEvent(event: AlertEvent): Promise<void> {
    await this.pool.query(
      `INSERT INTO alert_events (severity, type, message, context_json) VALUES ($1,$2,$3,$4)`,
      [event.severity, event.type, event.message, event.contextJson ?? null]
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Postgres journal when DATABASE_URL is set; otherwise, or when the database
 * is unreachable and REQUIRE_DB is off, the no-op journal.
 */
export async function buildPersistence(
  databaseUrl: string | null,
  requireDb: boolean
): Promise<Persistence> {
  if (!databaseUrl) {
    return new NoopPersistence();
  }
  const journal = new PostgresPersistence(databaseUrl);
  try {
    await journal.init();
    return journal;
  } catch (err) {
    if (requireDb) {
      throw err;
    }
    console.warn(
      "DB unavailable. Falling back to no-op journal. Set REQUIRE_DB=1 to fail hard.",
      err
    );
    await journal.close();
    return new NoopPersistence();
  }
}
