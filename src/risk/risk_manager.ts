import { RiskConfig } from "../config/config.js";
import { ErrorKind, TradingError } from "../errors/trading_error.js";
import { EventBus } from "../events/event_bus.js";
import { ExitReason, Position } from "../types.js";

/** What the risk manager needs from the position book. */
export interface PositionBook {
  openPositions(): Position[];
  getDailyPnl(): number;
  requestExit(positionId: string, reason: ExitReason): void;
}

export interface SizingInput {
  capital: number;
  vix: number;
  daysToExpiry: number;
  lotSize: number;
}

export interface RiskStatus {
  vix: number | null;
  circuitBreakerActive: boolean;
  lossLimitBreached: boolean;
  consecutiveLosses: number;
  entriesBlocked: boolean;
  killSwitch: string | null;
  startCapital: number;
  dailyPnl: number;
}

export function vixMultiplier(vix: number, cfg: RiskConfig): number {
  const a = cfg.vixMultAnchors;
  if (vix <= 12) {
    return a.vix12OrBelow;
  }
  if (vix <= 20) {
    const t = (vix - 12) / 8;
    return a.vix12OrBelow * (1 - t) + a.vix20 * t;
  }
  if (vix <= 30) {
    const t = (vix - 20) / 10;
    return a.vix20 * (1 - t) + a.vix30 * t;
  }
  return a.vix30OrAbove;
}

export function dteMultiplier(daysToExpiry: number, cfg: RiskConfig): number {
  if (daysToExpiry >= 5) {
    return cfg.dteMult.gte5Days;
  }
  if (daysToExpiry >= 2) {
    return cfg.dteMult.days2To4;
  }
  return cfg.dteMult.day1;
}

/**
 * VIX circuit breaker with hysteresis, daily-loss limit, consecutive-loss
 * cap, kill switch, pre-entry gate and position sizing.
 */
export class RiskManager {
  private vix: number | null = null;
  private breakerActive = false;
  private lossLimitBreached = false;
  private consecutiveLosses = 0;
  private killSwitch: string | null = null;
  private startCapital: number;

  constructor(
    private cfg: RiskConfig,
    private bus: EventBus,
    private book: PositionBook
  ) {
    this.startCapital = cfg.startCapital;
  }

  currentVix(): number | null {
    return this.vix;
  }

  isCircuitBreakerActive(): boolean {
    return this.breakerActive;
  }

  async updateVix(vix: number): Promise<void> {
    this.vix = vix;
    await this.bus.emit("VIX_DATA_RECEIVED", { vix });

    if (vix >= this.cfg.vixSpikeThreshold) {
      if (this.breakerActive) {
        return;
      }
      this.breakerActive = true;
      const ids = this.book.openPositions().map((p) => p.positionId);
      await this.bus.emit("VIX_SPIKE", {
        vix,
        threshold: this.cfg.vixSpikeThreshold,
        positions_to_exit: ids
      });
      console.warn("VIX_SPIKE", vix.toFixed(2), `threshold=${this.cfg.vixSpikeThreshold}`, `exits=${ids.length}`);
      await this.requestMandatoryExits(ids, "VIX_SPIKE");
      return;
    }

    if (vix < this.cfg.vixResumeThreshold && this.breakerActive) {
      this.breakerActive = false;
      await this.bus.emit("VIX_NORMAL_RESUMED", { vix, threshold: this.cfg.vixResumeThreshold });
      console.log("VIX_NORMAL_RESUMED", vix.toFixed(2));
    }
  }

  /**
   * True while the day's loss is at or beyond the limit. The first breach
   * publishes DAILY_LOSS_LIMIT_BREACHED; every breached check queues a
   * mandatory exit for whatever is still open.
   */
  async checkDailyLossLimit(): Promise<boolean> {
    const dailyPnl = this.book.getDailyPnl();
    const lossPct = (dailyPnl / this.startCapital) * 100;
    if (lossPct > -this.cfg.dailyLossLimitPct) {
      return false;
    }
    const ids = this.book.openPositions().map((p) => p.positionId);
    if (!this.lossLimitBreached) {
      this.lossLimitBreached = true;
      await this.bus.emit("DAILY_LOSS_LIMIT_BREACHED", {
        daily_pnl: dailyPnl,
        loss_pct: lossPct,
        limit_pct: this.cfg.dailyLossLimitPct,
        positions_to_exit: ids
      });
      console.warn("DAILY_LOSS_LIMIT_BREACHED", lossPct.toFixed(2), `limit=-${this.cfg.dailyLossLimitPct}`);
    }
    await this.requestMandatoryExits(ids, "DAILY_LOSS_LIMIT");
    return true;
  }

  /** Feeds a closed trade's net PnL into the consecutive-loss counter; true once the cap is hit. */
  recordTradeResult(netPnl: number): boolean {
    if (netPnl > 0) {
      this.consecutiveLosses = 0;
      return false;
    }
    this.consecutiveLosses += 1;
    const hit = this.consecutiveLosses >= this.cfg.consecutiveLossLimit;
    if (hit) {
      console.warn("CONSECUTIVE_LOSS_LIMIT", this.consecutiveLosses);
    }
    return hit;
  }

  async activateKillSwitch(reason: string): Promise<void> {
    if (this.killSwitch !== null) {
      return;
    }
    this.killSwitch = reason;
    await this.bus.emit("KILL_SWITCH_ACTIVATED", { reason });
    console.error("KILL_SWITCH_ACTIVATED", reason);
    await this.requestMandatoryExits(
      this.book.openPositions().map((p) => p.positionId),
      "KILL_SWITCH"
    );
  }

  /** Throws a TradingError naming the first failed gate; publishes the outcome either way. */
  async preEntryCheck(underlying: string): Promise<void> {
    const failure = this.firstFailure();
    if (failure) {
      const err = new TradingError(failure.kind, failure.reason);
      await this.bus.emit("RISK_CHECK_FAILED", { underlying, reason: failure.reason, code: err.code });
      console.warn("RISK_CHECK_FAILED", underlying, failure.reason);
      throw err;
    }
    await this.bus.emit("RISK_CHECK_PASSED", {
      underlying,
      open_positions: this.book.openPositions().length
    });
  }

  /** Whole lots of the VIX- and DTE-scaled share of capital, never below one lot. */
  positionSize(input: SizingInput): number {
    const { capital, vix, daysToExpiry, lotSize } = input;
    if (lotSize <= 0) {
      throw new TradingError("INVALID_PARAMETER", `Invalid lot size ${lotSize}`);
    }
    const vixMult = vixMultiplier(vix, this.cfg);
    const dteMult = dteMultiplier(daysToExpiry, this.cfg);
    const budget = capital * (this.cfg.basePositionSizePct / 100) * vixMult * dteMult;
    const quantity = Math.max(1, Math.floor(budget / lotSize)) * lotSize;
    console.log(
      "POSITION_SIZE",
      `vix=${vix.toFixed(1)} mult=${vixMult.toFixed(2)}`,
      `dte=${daysToExpiry} mult=${dteMult.toFixed(2)}`,
      `qty=${quantity}`
    );
    return quantity;
  }

  setStartCapital(capital: number): void {
    if (capital > 0) {
      this.startCapital = capital;
    }
  }

  resetDaily(): void {
    this.consecutiveLosses = 0;
    this.breakerActive = false;
    this.lossLimitBreached = false;
    console.log("RISK_DAILY_RESET");
  }

  status(): RiskStatus {
    return {
      vix: this.vix,
      circuitBreakerActive: this.breakerActive,
      lossLimitBreached: this.lossLimitBreached,
      consecutiveLosses: this.consecutiveLosses,
      entriesBlocked: this.firstFailure() !== null,
      killSwitch: this.killSwitch,
      startCapital: this.startCapital,
      dailyPnl: this.book.getDailyPnl()
    };
  }

  private firstFailure(): { kind: ErrorKind; reason: string } | null {
    if (this.breakerActive) {
      return { kind: "RISK_CHECK_FAILED", reason: "VIX circuit breaker active" };
    }
    if (this.killSwitch !== null) {
      return { kind: "RISK_CHECK_FAILED", reason: `Kill switch active: ${this.killSwitch}` };
    }
    const lossPct = (this.book.getDailyPnl() / this.startCapital) * 100;
    if (this.lossLimitBreached || lossPct <= -this.cfg.dailyLossLimitPct) {
      return { kind: "DAILY_LOSS_LIMIT", reason: "Daily loss limit breached" };
    }
    const open = this.book.openPositions().length;
    if (open >= this.cfg.maxPositions) {
      return { kind: "POSITION_LIMIT_EXCEEDED", reason: `Max positions: ${this.cfg.maxPositions}` };
    }
    if (this.consecutiveLosses >= this.cfg.consecutiveLossLimit) {
      return {
        kind: "RISK_CHECK_FAILED",
        reason: `Consecutive loss limit reached: ${this.consecutiveLosses}`
      };
    }
    return null;
  }

  /** Ids closed since the snapshot was taken are skipped. */
  private async requestMandatoryExits(ids: string[], reason: ExitReason) {
    for (const id of ids) {
      if (!this.book.openPositions().some((p) => p.positionId === id)) {
        console.warn("MANDATORY_EXIT_SKIPPED", id, reason, "position no longer open");
        continue;
      }
      this.book.requestExit(id, reason);
      await this.bus.emit("EXIT_SIGNAL_GENERATED", {
        position_id: id,
        primary_reason: reason,
        secondary_reasons: [],
        priority: 1
      });
    }
  }
}
