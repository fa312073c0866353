import { StrategyConfig } from "../config/config.js";
import { TradingError } from "../errors/trading_error.js";
import { EventBus } from "../events/event_bus.js";
import { Bar, Bias, DirectionalIndex, EntrySignal, OptionType } from "../types.js";
import { adx, atmStrike, closes, ema, rsi } from "../utils/indicators.js";

export type StrategyState =
  | { kind: "IDLE" }
  | { kind: "DAILY_DIRECTION_SET"; date: string; bias: Bias; daily: DirectionalIndex | null }
  | {
      kind: "HOURLY_ALIGNED";
      date: string;
      bias: OptionType;
      daily: DirectionalIndex | null;
      hourly: DirectionalIndex;
    }
  | {
      kind: "SIGNAL_ARMED";
      date: string;
      bias: OptionType;
      daily: DirectionalIndex | null;
      hourly: DirectionalIndex;
      signal: EntrySignal;
    };

export type EntryFilter = "RSI" | "EMA" | "VIX";

export interface FilterInputs {
  rsi: number | null;
  ema: number | null;
  close: number | null;
  vix: number;
}

export interface FilterResult {
  passed: boolean;
  failed: EntryFilter | null;
  reason: string;
}

/** Daily bias from a directional-index reading: weak trend or a DI tie means no trade. */
export function directionFromAdx(di: DirectionalIndex | null, threshold: number): Bias {
  if (!di || di.adx < threshold) {
    return "NO_TRADE";
  }
  if (di.plusDi > di.minusDi) {
    return "CE";
  }
  if (di.minusDi > di.plusDi) {
    return "PE";
  }
  return "NO_TRADE";
}

export function isAligned(bias: OptionType, di: DirectionalIndex, threshold: number): boolean {
  if (di.adx < threshold) {
    return false;
  }
  return bias === "CE" ? di.plusDi > di.minusDi : di.minusDi > di.plusDi;
}

/** RSI, then EMA, then VIX; stops at the first failure. */
export function evaluateEntryFilters(
  bias: OptionType,
  inputs: FilterInputs,
  cfg: Pick<StrategyConfig, "rsiOverbought" | "rsiOversold">,
  vixThreshold: number
): FilterResult {
  const { rsi: rsiValue, ema: emaValue, close, vix } = inputs;

  if (rsiValue === null) {
    return { passed: false, failed: "RSI", reason: "RSI unavailable" };
  }
  const rsiOk = bias === "CE" ? rsiValue < cfg.rsiOverbought : rsiValue > cfg.rsiOversold;
  if (!rsiOk) {
    return { passed: false, failed: "RSI", reason: `RSI filter failed: ${rsiValue.toFixed(2)}` };
  }

  if (emaValue === null || close === null) {
    return { passed: false, failed: "EMA", reason: "EMA unavailable" };
  }
  const emaOk = bias === "CE" ? close > emaValue : close < emaValue;
  if (!emaOk) {
    return {
      passed: false,
      failed: "EMA",
      reason: `EMA filter failed: close ${close.toFixed(2)} vs EMA ${emaValue.toFixed(2)}`
    };
  }

  if (vix > vixThreshold) {
    return {
      passed: false,
      failed: "VIX",
      reason: `VIX too high: ${vix.toFixed(2)} > ${vixThreshold.toFixed(2)}`
    };
  }

  return { passed: true, failed: null, reason: "all entry filters passed" };
}

/**
 * Daily-bias / hourly-alignment / entry-filter state machine for one
 * underlying. Transitions: IDLE -> DAILY_DIRECTION_SET -> HOURLY_ALIGNED ->
 * SIGNAL_ARMED; consuming the signal drops back to DAILY_DIRECTION_SET and
 * `reset()` returns to IDLE at end of day.
 */
export class AdxStrategy {
  private current: StrategyState = { kind: "IDLE" };

  constructor(
    readonly underlying: string,
    private cfg: StrategyConfig,
    private vixThreshold: number,
    private bus: EventBus
  ) {}

  state(): StrategyState {
    return this.current;
  }

  bias(): Bias | null {
    return this.current.kind === "IDLE" ? null : this.current.bias;
  }

  async analyzeDaily(dailyBars: readonly Bar[], date: string): Promise<Bias> {
    return this.applyDailyDirection(adx(dailyBars, this.cfg.dailyAdxPeriod), date);
  }

  async applyDailyDirection(di: DirectionalIndex | null, date: string): Promise<Bias> {
    if (this.current.kind !== "IDLE" && !this.cfg.invalidateOnRecompute) {
      throw new TradingError(
        "INVALID_STRATEGY_STATE",
        `Daily direction already set for ${this.underlying} (${this.current.kind})`
      );
    }
    const bias = directionFromAdx(di, this.cfg.dailyAdxThreshold);
    this.current = { kind: "DAILY_DIRECTION_SET", date, bias, daily: di };
    await this.bus.emit("DAILY_DIRECTION_DETERMINED", {
      underlying: this.underlying,
      direction: bias,
      adx: di?.adx ?? null,
      plus_di: di?.plusDi ?? null,
      minus_di: di?.minusDi ?? null
    });
    console.log(
      "DAILY_DIRECTION",
      this.underlying,
      bias,
      di ? `adx=${di.adx.toFixed(2)} +di=${di.plusDi.toFixed(2)} -di=${di.minusDi.toFixed(2)}` : "adx=n/a"
    );
    return bias;
  }

  async analyzeHourly(hourlyBars: readonly Bar[]): Promise<boolean> {
    return this.applyHourlyAlignment(adx(hourlyBars, this.cfg.hourlyAdxPeriod));
  }

  async applyHourlyAlignment(di: DirectionalIndex | null): Promise<boolean> {
    const state = this.current;
    if (state.kind === "IDLE") {
      throw new TradingError("INVALID_STRATEGY_STATE", "Hourly analysis before daily direction");
    }
    if (state.kind === "SIGNAL_ARMED") {
      return true;
    }
    if (state.bias === "NO_TRADE") {
      return false;
    }

    const bias = state.bias;
    if (di && isAligned(bias, di, this.cfg.hourlyAdxThreshold)) {
      this.current = { kind: "HOURLY_ALIGNED", date: state.date, bias, daily: state.daily, hourly: di };
      await this.bus.emit("HOURLY_ALIGNMENT_CONFIRMED", {
        underlying: this.underlying,
        direction: bias,
        adx: di.adx,
        plus_di: di.plusDi,
        minus_di: di.minusDi
      });
      return true;
    }

    this.current = { kind: "DAILY_DIRECTION_SET", date: state.date, bias, daily: state.daily };
    await this.bus.emit("NO_TRADE_SIGNAL", {
      underlying: this.underlying,
      reason: di ? `hourly not aligned (adx=${di.adx.toFixed(2)})` : "hourly ADX unavailable"
    });
    return false;
  }

  async evaluateEntry(
    hourlyBars: readonly Bar[],
    underlyingLtp: number,
    vix: number,
    now: Date = new Date()
  ): Promise<EntrySignal | null> {
    const values = closes(hourlyBars);
    return this.applyEntryFilters(
      {
        rsi: rsi(values, this.cfg.rsiPeriod),
        ema: ema(values, this.cfg.emaPeriod),
        close: values.length > 0 ? values[values.length - 1] : null,
        vix
      },
      underlyingLtp,
      now
    );
  }

  async applyEntryFilters(
    inputs: FilterInputs,
    underlyingLtp: number,
    now: Date = new Date()
  ): Promise<EntrySignal | null> {
    const state = this.current;
    if (state.kind === "SIGNAL_ARMED") {
      return state.signal;
    }
    if (state.kind !== "HOURLY_ALIGNED") {
      return null;
    }

    const result = evaluateEntryFilters(state.bias, inputs, this.cfg, this.vixThreshold);
    await this.bus.emit("ENTRY_FILTERS_EVALUATED", {
      underlying: this.underlying,
      passed: result.passed,
      failed_filter: result.failed,
      rsi: inputs.rsi,
      ema: inputs.ema,
      close: inputs.close,
      vix: inputs.vix
    });
    if (!result.passed) {
      await this.bus.emit("NO_TRADE_SIGNAL", { underlying: this.underlying, reason: result.reason });
      return null;
    }

    const strike = atmStrike(underlyingLtp, this.cfg.strikeIncrement);
    if (strike === null) {
      await this.bus.emit("NO_TRADE_SIGNAL", {
        underlying: this.underlying,
        reason: `cannot derive strike from ltp ${underlyingLtp}`
      });
      return null;
    }

    const signal: EntrySignal = {
      underlying: this.underlying,
      bias: state.bias,
      underlyingLtp,
      strike,
      optionType: state.bias,
      side: "BUY",
      reason: `ADX trend ${state.bias}: daily adx ${state.daily?.adx.toFixed(2) ?? "n/a"}, hourly adx ${state.hourly.adx.toFixed(2)}`,
      generatedAt: now.toISOString()
    };
    this.current = { ...state, kind: "SIGNAL_ARMED", signal };
    await this.bus.emit("SIGNAL_GENERATED", {
      underlying: this.underlying,
      option_type: signal.optionType,
      strike: signal.strike,
      underlying_ltp: underlyingLtp,
      side: signal.side,
      reason: signal.reason
    });
    return signal;
  }

  /** Hands the armed signal to the caller and waits for a fresh alignment. */
  consumeSignal(): EntrySignal | null {
    const state = this.current;
    if (state.kind !== "SIGNAL_ARMED") {
      return null;
    }
    this.current = { kind: "DAILY_DIRECTION_SET", date: state.date, bias: state.bias, daily: state.daily };
    return state.signal;
  }

  /** True (and ALIGNMENT_LOST published) when hourly DI has turned against an open position. */
  async checkTechnicalExit(optionType: OptionType, hourlyBars: readonly Bar[]): Promise<boolean> {
    return this.applyTechnicalExit(optionType, adx(hourlyBars, this.cfg.hourlyAdxPeriod));
  }

  async applyTechnicalExit(optionType: OptionType, di: DirectionalIndex | null): Promise<boolean> {
    if (!di) {
      return false;
    }
    const reversed = optionType === "CE" ? di.minusDi > di.plusDi : di.plusDi > di.minusDi;
    if (!reversed) {
      return false;
    }
    await this.bus.emit("ALIGNMENT_LOST", {
      underlying: this.underlying,
      direction: optionType,
      plus_di: di.plusDi,
      minus_di: di.minusDi,
      reason: "hourly DI reversed"
    });
    return true;
  }

  reset(): void {
    this.current = { kind: "IDLE" };
  }
}
