import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventBus } from "../../src/events/event_bus.js";
import { EventKind } from "../../src/events/events.js";
import { AdxStrategy, directionFromAdx, evaluateEntryFilters } from "../../src/strategy/adx_strategy.js";
import { biasSummary, DailyBiasCalculator, filterByBias } from "../../src/strategy/daily_bias.js";
import { makeTempDir, recordKinds, removeDir, startedBus, testConfig, trendingBars } from "./helpers.js";

const DAY = 86_400_000;
const HOUR = 3_600_000;
const T0 = Date.UTC(2024, 11, 2, 3, 30);

describe("directionFromAdx", () => {
  it("maps DI dominance above the threshold to a bias", () => {
    expect(directionFromAdx({ adx: 28, plusDi: 30, minusDi: 20 }, 20)).toBe("CE");
    expect(directionFromAdx({ adx: 28, plusDi: 18, minusDi: 26 }, 20)).toBe("PE");
    expect(directionFromAdx({ adx: 19.9, plusDi: 30, minusDi: 20 }, 20)).toBe("NO_TRADE");
    expect(directionFromAdx({ adx: 28, plusDi: 25, minusDi: 25 }, 20)).toBe("NO_TRADE");
    expect(directionFromAdx(null, 20)).toBe("NO_TRADE");
  });
});

describe("evaluateEntryFilters", () => {
  const cfg = { rsiOverbought: 70, rsiOversold: 30 };

  it("checks RSI, then EMA, then VIX", () => {
    expect(evaluateEntryFilters("CE", { rsi: 75, ema: 90, close: 100, vix: 30 }, cfg, 22).failed).toBe("RSI");
    expect(evaluateEntryFilters("CE", { rsi: 55, ema: 100, close: 100, vix: 30 }, cfg, 22).failed).toBe("EMA");
    expect(evaluateEntryFilters("CE", { rsi: 55, ema: 90, close: 100, vix: 30 }, cfg, 22).failed).toBe("VIX");
    expect(evaluateEntryFilters("CE", { rsi: 55, ema: 90, close: 100, vix: 22 }, cfg, 22).passed).toBe(true);
  });

  it("mirrors the conditions for puts", () => {
    expect(evaluateEntryFilters("PE", { rsi: 25, ema: 110, close: 100, vix: 15 }, cfg, 22).failed).toBe("RSI");
    expect(evaluateEntryFilters("PE", { rsi: 45, ema: 90, close: 100, vix: 15 }, cfg, 22).failed).toBe("EMA");
    expect(evaluateEntryFilters("PE", { rsi: 45, ema: 110, close: 100, vix: 15 }, cfg, 22).passed).toBe(true);
  });

  it("fails when an indicator is unavailable", () => {
    expect(evaluateEntryFilters("CE", { rsi: null, ema: 90, close: 100, vix: 15 }, cfg, 22).reason).toBe("RSI unavailable");
    expect(evaluateEntryFilters("CE", { rsi: 50, ema: null, close: 100, vix: 15 }, cfg, 22).reason).toBe("EMA unavailable");
  });
});

describe("AdxStrategy", () => {
  let dir: string;
  let bus: EventBus;
  let kinds: EventKind[];
  const cfg = testConfig();

  beforeEach(async () => {
    dir = await makeTempDir();
    bus = await startedBus(dir);
    kinds = recordKinds(bus);
  });

  afterEach(async () => {
    await bus.stop();
    await removeDir(dir);
  });

  it("walks daily direction, hourly alignment and entry filters to a call signal", async () => {
    const strategy = new AdxStrategy("NIFTY", cfg.strategy, cfg.risk.vixThreshold, bus);

    expect(await strategy.applyDailyDirection({ adx: 28, plusDi: 30, minusDi: 20 }, "2025-01-06")).toBe("CE");
    expect(await strategy.applyHourlyAlignment({ adx: 26, plusDi: 28, minusDi: 22 })).toBe(true);
    const now = new Date("2025-01-06T05:00:00Z");
    const signal = await strategy.applyEntryFilters({ rsi: 55, ema: 23500, close: 23547.5, vix: 18 }, 23547.5, now);
    await bus.idle();

    expect(signal).toMatchObject({
      underlying: "NIFTY",
      strike: 23550,
      optionType: "CE",
      side: "BUY",
      underlyingLtp: 23547.5,
      generatedAt: "2025-01-06T05:00:00.000Z"
    });
    expect(strategy.state().kind).toBe("SIGNAL_ARMED");
    expect(kinds).toEqual([
      "DAILY_DIRECTION_DETERMINED",
      "HOURLY_ALIGNMENT_CONFIRMED",
      "ENTRY_FILTERS_EVALUATED",
      "SIGNAL_GENERATED"
    ]);

    expect(strategy.consumeSignal()?.strike).toBe(23550);
    expect(strategy.state().kind).toBe("DAILY_DIRECTION_SET");
    expect(strategy.consumeSignal()).toBeNull();
  });

  it("stays put when the hourly trend does not agree", async () => {
    const strategy = new AdxStrategy("NIFTY", cfg.strategy, cfg.risk.vixThreshold, bus);
    await strategy.applyDailyDirection({ adx: 28, plusDi: 30, minusDi: 20 }, "2025-01-06");

    expect(await strategy.applyHourlyAlignment({ adx: 26, plusDi: 18, minusDi: 22 })).toBe(false);
    expect(await strategy.applyHourlyAlignment({ adx: 15, plusDi: 28, minusDi: 22 })).toBe(false);
    expect(strategy.state().kind).toBe("DAILY_DIRECTION_SET");
  });

  it("never aligns on a no-trade day", async () => {
    const strategy = new AdxStrategy("NIFTY", cfg.strategy, cfg.risk.vixThreshold, bus);
    expect(await strategy.applyDailyDirection({ adx: 12, plusDi: 30, minusDi: 20 }, "2025-01-06")).toBe("NO_TRADE");
    expect(await strategy.applyHourlyAlignment({ adx: 40, plusDi: 35, minusDi: 10 })).toBe(false);
    expect(strategy.bias()).toBe("NO_TRADE");
  });

  it("refuses hourly analysis before the daily direction", async () => {
    const strategy = new AdxStrategy("NIFTY", cfg.strategy, cfg.risk.vixThreshold, bus);
    await expect(strategy.analyzeHourly([])).rejects.toMatchObject({ kind: "INVALID_STRATEGY_STATE" });
  });

  it("refuses a second daily direction unless recompute is allowed", async () => {
    const locked = testConfig({ STRATEGY_INVALIDATE_ON_RECOMPUTE: "0" });
    const strategy = new AdxStrategy("NIFTY", locked.strategy, locked.risk.vixThreshold, bus);
    await strategy.applyDailyDirection({ adx: 28, plusDi: 30, minusDi: 20 }, "2025-01-06");
    await expect(
      strategy.applyDailyDirection({ adx: 28, plusDi: 20, minusDi: 30 }, "2025-01-06")
    ).rejects.toMatchObject({ kind: "INVALID_STRATEGY_STATE" });

    strategy.reset();
    expect(strategy.state().kind).toBe("IDLE");
  });

  it("flags a technical exit when hourly DI turns against the position", async () => {
    const strategy = new AdxStrategy("NIFTY", cfg.strategy, cfg.risk.vixThreshold, bus);
    expect(await strategy.applyTechnicalExit("CE", { adx: 25, plusDi: 18, minusDi: 24 })).toBe(true);
    expect(await strategy.applyTechnicalExit("CE", { adx: 25, plusDi: 28, minusDi: 24 })).toBe(false);
    expect(await strategy.applyTechnicalExit("PE", { adx: 25, plusDi: 28, minusDi: 24 })).toBe(true);
    expect(await strategy.applyTechnicalExit("PE", null)).toBe(false);
    await bus.idle();
    expect(kinds.filter((k) => k === "ALIGNMENT_LOST")).toHaveLength(2);
  });

  it("derives a call bias from rising daily bars", async () => {
    const strategy = new AdxStrategy("NIFTY", cfg.strategy, cfg.risk.vixThreshold, bus);
    const bars = trendingBars(20, T0, DAY);
    expect(await strategy.analyzeDaily(bars, "2025-01-06")).toBe("CE");
    expect(await strategy.analyzeHourly(trendingBars(20, T0, HOUR))).toBe(true);
  });
});

describe("DailyBiasCalculator", () => {
  it("computes a bias per underlying and skips failures", async () => {
    const calculator = new DailyBiasCalculator(14, 20, 2);
    const biases = await calculator.calculateAll(
      [
        { underlying: "NIFTY", spotToken: "256265" },
        { underlying: "BANKNIFTY", spotToken: "260105" },
        { underlying: "FINNIFTY", spotToken: "257801" }
      ],
      async (target) => {
        if (target.underlying === "BANKNIFTY") {
          throw new Error("historical fetch failed");
        }
        return trendingBars(target.underlying === "NIFTY" ? 15 : 10, T0, DAY);
      }
    );

    expect(biases).toHaveLength(1);
    expect(biases[0]).toMatchObject({ underlying: "NIFTY", bias: "CE", adx: 100, closePrice: 240 });
    expect(filterByBias(biases, "PE")).toEqual([]);
    expect(biasSummary(biases)).toEqual({ total: 1, ce: 1, pe: 0, noTrade: 0 });
  });
});
