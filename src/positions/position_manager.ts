import { randomUUID } from "node:crypto";
import { z } from "zod";
import { RiskConfig } from "../config/config.js";
import { TradingError } from "../errors/trading_error.js";
import { EventBus, LoggedEvent } from "../events/event_bus.js";
import { NoopPersistence, Persistence } from "../persistence/persistence.js";
import { ExitReason, OptionType, Position, Side, Trade } from "../types.js";

export type ExitPriority = 1 | 2 | 3 | 4;

/** Lower number wins: mandatory, then risk, then profit, then technical. */
export const EXIT_PRIORITY: Readonly<Record<ExitReason, ExitPriority>> = {
  VIX_SPIKE: 1,
  DAILY_LOSS_LIMIT: 1,
  EOD_MANDATORY_EXIT: 1,
  SESSION_CLOSE: 1,
  TOKEN_EXPIRY: 1,
  KILL_SWITCH: 1,
  SHUTDOWN: 1,
  STOP_LOSS: 2,
  TARGET: 3,
  ALIGNMENT_LOST: 4,
  TRAILING_STOP: 4
};

export interface ExitDecision {
  positionId: string;
  primary: ExitReason;
  secondary: ExitReason[];
  priority: ExitPriority;
}

export interface NewPosition {
  symbol: string;
  token: string;
  underlying: string;
  strike: number;
  optionType: OptionType;
  side?: Side;
  quantity: number;
  entryPrice: number;
  underlyingEntry: number;
  entryReason: string;
  idempotencyKey: string;
  vixAtEntry: number | null;
  positionId?: string;
  entryTime?: Date;
}

const openedPayloadSchema = z.object({
  position_id: z.string(),
  symbol: z.string(),
  token: z.string(),
  underlying: z.string(),
  strike: z.number(),
  option_type: z.enum(["CE", "PE"]),
  side: z.enum(["BUY", "SELL"]),
  quantity: z.number().int().positive(),
  entry_price: z.number().positive(),
  entry_time: z.string(),
  underlying_entry: z.number(),
  stop_loss: z.number(),
  target: z.number().nullable(),
  entry_reason: z.string(),
  idempotency_key: z.string(),
  vix_at_entry: z.number().nullable()
});

const closedPayloadSchema = z.object({ position_id: z.string() });

const markPayloadSchema = z.object({
  position_id: z.string(),
  current_price: z.number().positive(),
  trail_stop: z.number().nullable().optional()
});

const MARK_EVENTS: ReadonlySet<string> = new Set([
  "POSITION_UPDATED",
  "TRAILING_STOP_ACTIVATED",
  "TRAILING_STOP_UPDATED",
  "STOP_LOSS_TRIGGERED",
  "TARGET_REACHED"
]);

/**
 * Live option positions and the day's closed trades. Exit levels are
 * evaluated on every price update; `close` turns a position into a Trade and
 * books its net PnL into `dailyPnl`.
 */
export class PositionManager {
  private positions = new Map<string, Position>();
  private pendingExits = new Map<string, Set<ExitReason>>();
  private closedTrades = new Map<string, Trade>();
  private trades: Trade[] = [];
  private dailyPnl = 0;

  constructor(
    private cfg: RiskConfig,
    private bus: EventBus,
    private persistence: Persistence = new NoopPersistence()
  ) {}

  /** Builds an OPEN position with stop and target derived from the entry price. */
  buildPosition(input: NewPosition): Position {
    const entry = input.entryPrice;
    return {
      positionId: input.positionId ?? `POS-${randomUUID()}`,
      symbol: input.symbol,
      token: input.token,
      underlying: input.underlying,
      strike: input.strike,
      optionType: input.optionType,
      side: input.side ?? "BUY",
      quantity: input.quantity,
      entryPrice: entry,
      entryTime: (input.entryTime ?? new Date()).toISOString(),
      underlyingEntry: input.underlyingEntry,
      stopLoss: entry * (1 - this.cfg.optionStopLossPct),
      target: this.cfg.optionTargetPct > 0 ? entry * (1 + this.cfg.optionTargetPct) : null,
      trailStop: null,
      trailActive: false,
      currentPrice: entry,
      pnl: 0,
      pnlPct: 0,
      highWater: entry,
      lowWater: entry,
      vixAtEntry: input.vixAtEntry,
      status: "OPEN",
      entryReason: input.entryReason,
      idempotencyKey: input.idempotencyKey
    };
  }

  async open(position: Position): Promise<Position> {
    if (this.positions.has(position.positionId) || this.closedTrades.has(position.positionId)) {
      throw new TradingError("DUPLICATE_POSITION", `Position already exists: ${position.positionId}`);
    }
    const stored = { ...position, status: "OPEN" as const };
    this.positions.set(stored.positionId, stored);
    await this.bus.emit("POSITION_OPENED", {
      position_id: stored.positionId,
      symbol: stored.symbol,
      token: stored.token,
      underlying: stored.underlying,
      strike: stored.strike,
      option_type: stored.optionType,
      side: stored.side,
      quantity: stored.quantity,
      entry_price: stored.entryPrice,
      entry_time: stored.entryTime,
      underlying_entry: stored.underlyingEntry,
      stop_loss: stored.stopLoss,
      target: stored.target,
      entry_reason: stored.entryReason,
      idempotency_key: stored.idempotencyKey,
      vix_at_entry: stored.vixAtEntry
    });
    console.log(
      "POSITION_OPENED",
      stored.positionId,
      stored.symbol,
      stored.quantity,
      stored.entryPrice.toFixed(2),
      `sl=${stored.stopLoss.toFixed(2)}`
    );
    return { ...stored };
  }

  /** Marks the position to `currentPrice` and returns the exit reason it triggers, if any. */
  async update(positionId: string, currentPrice: number): Promise<ExitReason | null> {
    const position = this.requireOpen(positionId);
    const diff = currentPrice - position.entryPrice;
    position.currentPrice = currentPrice;
    position.pnl = diff * position.quantity;
    position.pnlPct = (diff / position.entryPrice) * 100;
    position.highWater = Math.max(position.highWater, currentPrice);
    position.lowWater = Math.min(position.lowWater, currentPrice);

    const gap = this.cfg.trailGapPct;
    if (this.cfg.useTrailingStop && !position.trailActive && position.pnlPct >= this.cfg.trailActivatePnlPct) {
      position.trailActive = true;
      position.trailStop = currentPrice * (1 - gap);
      await this.bus.emit("TRAILING_STOP_ACTIVATED", {
        position_id: positionId,
        current_price: currentPrice,
        trail_stop: position.trailStop,
        pnl_pct: position.pnlPct
      });
      console.log("TRAIL_ACTIVATED", positionId, position.trailStop.toFixed(2));
    } else if (position.trailActive && position.trailStop !== null) {
      const candidate = currentPrice * (1 - gap);
      if (candidate > position.trailStop) {
        const previous = position.trailStop;
        position.trailStop = candidate;
        await this.bus.emit("TRAILING_STOP_UPDATED", {
          position_id: positionId,
          previous_trail_stop: previous,
          trail_stop: candidate,
          current_price: currentPrice
        });
      }
    }

    if (currentPrice <= position.stopLoss) {
      await this.bus.emit("STOP_LOSS_TRIGGERED", {
        position_id: positionId,
        current_price: currentPrice,
        stop_loss: position.stopLoss
      });
      console.warn("STOP_LOSS", positionId, currentPrice.toFixed(2), `sl=${position.stopLoss.toFixed(2)}`);
      return "STOP_LOSS";
    }
    if (position.trailActive && position.trailStop !== null && currentPrice <= position.trailStop) {
      console.log("TRAIL_STOP_HIT", positionId, currentPrice.toFixed(2), `trail=${position.trailStop.toFixed(2)}`);
      return "TRAILING_STOP";
    }
    if (position.target !== null && currentPrice >= position.target) {
      await this.bus.emit("TARGET_REACHED", {
        position_id: positionId,
        current_price: currentPrice,
        target: position.target
      });
      return "TARGET";
    }

    await this.bus.emit("POSITION_UPDATED", {
      position_id: positionId,
      current_price: currentPrice,
      pnl: position.pnl,
      pnl_pct: position.pnlPct,
      trail_stop: position.trailStop
    });
    return null;
  }

  /** Queues an externally raised exit reason (risk breaker, alignment loss, EOD). */
  requestExit(positionId: string, reason: ExitReason): void {
    this.requireOpen(positionId);
    const reasons = this.pendingExits.get(positionId) ?? new Set<ExitReason>();
    reasons.add(reason);
    this.pendingExits.set(positionId, reasons);
  }

  pendingExitReasons(positionId: string): ExitReason[] {
    return Array.from(this.pendingExits.get(positionId) ?? []);
  }

  /**
   * Picks the highest-priority reason among the queued ones and `extra`,
   * publishes EXIT_SIGNAL_GENERATED and returns the decision; null when
   * there is nothing to act on.
   */
  async selectExit(positionId: string, extra: ExitReason | null = null): Promise<ExitDecision | null> {
    const reasons = this.pendingExitReasons(positionId);
    if (extra && !reasons.includes(extra)) {
      reasons.push(extra);
    }
    const ranked = rankExitReasons(reasons);
    if (!ranked) {
      return null;
    }
    const decision: ExitDecision = { positionId, ...ranked };
    await this.bus.emit("EXIT_SIGNAL_GENERATED", {
      position_id: positionId,
      primary_reason: decision.primary,
      secondary_reasons: decision.secondary,
      priority: decision.priority
    });
    return decision;
  }

  /** Closes the position at `exitPrice`. Closing an already-closed position returns its trade. */
  async close(
    positionId: string,
    exitPrice: number,
    reason: ExitReason,
    opts: { secondaryReasons?: ExitReason[]; vixAtExit?: number | null; now?: Date } = {}
  ): Promise<Trade> {
    const done = this.closedTrades.get(positionId);
    if (done) {
      return done;
    }
    const position = this.requireOpen(positionId);
    this.positions.delete(positionId);
    this.pendingExits.delete(positionId);

    const exitTime = opts.now ?? new Date();
    const diff = exitPrice - position.entryPrice;
    const grossPnl = diff * position.quantity;
    const brokerage = Math.max(this.cfg.brokerageRate * exitPrice * position.quantity, this.cfg.brokerageFloor);
    const netPnl = grossPnl - brokerage;
    const trade: Trade = {
      positionId,
      symbol: position.symbol,
      underlying: position.underlying,
      strike: position.strike,
      optionType: position.optionType,
      side: position.side,
      quantity: position.quantity,
      entryPrice: position.entryPrice,
      entryTime: position.entryTime,
      entryReason: position.entryReason,
      exitPrice,
      exitTime: exitTime.toISOString(),
      exitReason: reason,
      secondaryReasons: (opts.secondaryReasons ?? []).filter((r) => r !== reason),
      grossPnl,
      grossPnlPct: (diff / position.entryPrice) * 100,
      brokerage,
      netPnl,
      durationSec: Math.max(0, Math.round((exitTime.getTime() - Date.parse(position.entryTime)) / 1000)),
      highWater: Math.max(position.highWater, exitPrice),
      lowWater: Math.min(position.lowWater, exitPrice),
      vixEntry: position.vixAtEntry,
      vixExit: opts.vixAtExit ?? null,
      idempotencyKey: position.idempotencyKey
    };
    this.closedTrades.set(positionId, trade);
    this.trades.push(trade);
    this.dailyPnl += netPnl;

    await this.bus.emit("POSITION_CLOSED", {
      position_id: positionId,
      exit_price: exitPrice,
      exit_reason: reason,
      pnl_gross: grossPnl,
      pnl_gross_pct: trade.grossPnlPct,
      pnl_net: netPnl
    });
    try {
      await this.persistence.insertTrade(trade);
    } catch (err) {
      console.warn("TRADE_JOURNAL_FAIL", positionId, err);
    }
    console.log(
      "POSITION_CLOSED",
      positionId,
      reason,
      exitPrice.toFixed(2),
      `net=${netPnl.toFixed(2)}`,
      `day=${this.dailyPnl.toFixed(2)}`
    );
    return trade;
  }

  /**
   * Closes every open position, at the price `exitPrice` resolves (normally
   * the exit order's fill) or else at the last marked price. A position whose
   * exit fails stays open.
   */
  async closeAll(
    reason: ExitReason,
    opts: {
      vixAtExit?: number | null;
      now?: Date;
      exitPrice?: (position: Position) => Promise<number>;
    } = {}
  ): Promise<Trade[]> {
    const snapshot = Array.from(this.positions.values()).map((p) => ({ ...p }));
    const closed: Trade[] = [];
    for (const position of snapshot) {
      const id = position.positionId;
      try {
        const price = opts.exitPrice ? await opts.exitPrice(position) : position.currentPrice;
        closed.push(
          await this.close(id, price, reason, {
            secondaryReasons: this.pendingExitReasons(id),
            vixAtExit: opts.vixAtExit,
            now: opts.now
          })
        );
      } catch (err) {
        console.warn("POSITION_CLOSE_FAIL", id, err);
      }
    }
    if (closed.length > 0) {
      await this.bus.emit("POSITIONS_CLOSED", {
        count: closed.length,
        reason,
        daily_pnl: this.dailyPnl
      });
    }
    return closed;
  }

  /**
   * Rebuilds the open-position set from replayed events: every
   * POSITION_OPENED without a later POSITION_CLOSED, marked to its last logged
   * price and carrying its trailing stop. Nothing is republished.
   */
  recoverOpenPositions(events: readonly LoggedEvent[]): Position[] {
    const recovered = new Map<string, Position>();
    for (const event of events) {
      if (event.kind === "POSITION_OPENED") {
        const parsed = openedPayloadSchema.safeParse(event.payload);
        if (!parsed.success) {
          console.warn("RECOVERY_EVENT_SKIPPED", event.idempotency_key, parsed.error.issues[0]?.message);
          continue;
        }
        const p = parsed.data;
        recovered.set(p.position_id, {
          positionId: p.position_id,
          symbol: p.symbol,
          token: p.token,
          underlying: p.underlying,
          strike: p.strike,
          optionType: p.option_type,
          side: p.side,
          quantity: p.quantity,
          entryPrice: p.entry_price,
          entryTime: p.entry_time,
          underlyingEntry: p.underlying_entry,
          stopLoss: p.stop_loss,
          target: p.target,
          trailStop: null,
          trailActive: false,
          currentPrice: p.entry_price,
          pnl: 0,
          pnlPct: 0,
          highWater: p.entry_price,
          lowWater: p.entry_price,
          vixAtEntry: p.vix_at_entry,
          status: "OPEN",
          entryReason: p.entry_reason,
          idempotencyKey: p.idempotency_key
        });
      } else if (event.kind === "POSITION_CLOSED") {
        const parsed = closedPayloadSchema.safeParse(event.payload);
        if (parsed.success) {
          recovered.delete(parsed.data.position_id);
        }
      } else if (MARK_EVENTS.has(event.kind)) {
        const parsed = markPayloadSchema.safeParse(event.payload);
        const position = parsed.success ? recovered.get(parsed.data.position_id) : undefined;
        if (parsed.success && position) {
          applyMark(position, parsed.data.current_price, parsed.data.trail_stop ?? null);
        }
      }
    }
    for (const position of recovered.values()) {
      if (!this.positions.has(position.positionId)) {
        this.positions.set(position.positionId, position);
      }
    }
    if (recovered.size > 0) {
      console.log("POSITIONS_RECOVERED", recovered.size);
    }
    return Array.from(recovered.values()).map((p) => ({ ...p }));
  }

  getPosition(positionId: string): Position | null {
    const position = this.positions.get(positionId);
    return position ? { ...position } : null;
  }

  openPositions(): Position[] {
    return Array.from(this.positions.values()).map((p) => ({ ...p }));
  }

  openCount(): number {
    return this.positions.size;
  }

  getDailyPnl(): number {
    return this.dailyPnl;
  }

  dailyTrades(): Trade[] {
    return this.trades.slice();
  }

  /** Start-of-day reset of PnL and the trade list; open positions are untouched. */
  resetDaily(): void {
    this.dailyPnl = 0;
    this.trades = [];
    this.closedTrades.clear();
  }

  private requireOpen(positionId: string): Position {
    const position = this.positions.get(positionId);
    if (!position) {
      throw new TradingError("POSITION_NOT_FOUND", `Position not found: ${positionId}`);
    }
    return position;
  }
}

export function rankExitReasons(
  reasons: readonly ExitReason[]
): { primary: ExitReason; secondary: ExitReason[]; priority: ExitPriority } | null {
  if (reasons.length === 0) {
    return null;
  }
  const sorted = reasons.slice().sort((a, b) => EXIT_PRIORITY[a] - EXIT_PRIORITY[b]);
  const [primary, ...secondary] = sorted;
  return { primary, secondary, priority: EXIT_PRIORITY[primary] };
}

/** Replays one logged mark onto a recovered position; the trail stop only ratchets up. */
function applyMark(position: Position, price: number, trailStop: number | null) {
  const diff = price - position.entryPrice;
  position.currentPrice = price;
  position.pnl = diff * position.quantity;
  position.pnlPct = (diff / position.entryPrice) * 100;
  position.highWater = Math.max(position.highWater, price);
  position.lowWater = Math.min(position.lowWater, price);
  if (trailStop !== null) {
    position.trailActive = true;
    position.trailStop = position.trailStop === null ? trailStop : Math.max(position.trailStop, trailStop);
  }
}
