import { describe, expect, it } from "vitest";
import { freezeQuantityFor, loadConfig, lotSizeFor } from "../../src/config/config.js";

describe("loadConfig", () => {
  it("fills in the documented defaults", () => {
    const cfg = loadConfig({});

    expect(cfg.underlying).toBe("NIFTY");
    expect(cfg.underlyings).toEqual(["NIFTY", "BANKNIFTY", "FINNIFTY"]);
    expect(cfg.session).toMatchObject({ marketOpenTime: "09:15", entryWindowStart: "10:15", eodExitTime: "15:15" });
    expect(cfg.risk).toMatchObject({
      optionStopLossPct: 0.3,
      optionTargetPct: 0,
      maxPositions: 1,
      dailyLossLimitPct: 3,
      vixSpikeThreshold: 25,
      vixResumeThreshold: 20
    });
    expect(cfg.orders.retryStepsPct).toEqual([0.5, 1, 1.5]);
    expect(cfg.orders.retryBackoffsSec).toEqual([8, 8, 8]);
    expect(cfg.broker).toMatchObject({ paperTrading: true, apiKey: null, baseUrl: "https://api.kite.trade" });
    expect(cfg.data.holidaysFile).toBeNull();
  });

  it("parses lists, flags and numbers from strings", () => {
    const cfg = loadConfig({
      UNDERLYINGS: " nifty , banknifty ,",
      ENABLE_PAPER_TRADING: "false",
      ORDER_RETRY_STEPS_PCT: "0.25, 0.75",
      MAX_POSITIONS: "2"
    });

    expect(cfg.underlyings).toEqual(["NIFTY", "BANKNIFTY"]);
    expect(cfg.broker.paperTrading).toBe(false);
    expect(cfg.orders.retryStepsPct).toEqual([0.25, 0.75]);
    expect(cfg.risk.maxPositions).toBe(2);
  });

  it("returns a frozen object", () => {
    const cfg = loadConfig({});
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.limits.freezeQuantity)).toBe(true);
  });

  it("names the offending variable when parsing fails", () => {
    expect(() => loadConfig({ MAX_POSITIONS: "0" })).toThrow("MAX_POSITIONS");
    expect(() => loadConfig({ ENABLE_PAPER_TRADING: "yes" })).toThrow("ENABLE_PAPER_TRADING");
  });

  it("rejects inconsistent settings", () => {
    expect(() => loadConfig({ RSI_OVERSOLD: "80" })).toThrow("rsi_oversold must be < rsi_overbought");
    expect(() => loadConfig({ ENTRY_WINDOW_START: "14:30" })).toThrow(
      "entry_window_start must be before entry_window_end"
    );
    expect(() => loadConfig({ VIX_SPIKE_THRESHOLD: "18" })).toThrow("vix_spike_threshold must be > vix_resume_threshold");
    expect(() => loadConfig({ EOD_EXIT_TIME: "25:00" })).toThrow('Invalid eod_exit_time: "25:00"');
    expect(() => loadConfig({ OPTION_STOP_LOSS_PCT: "30" })).toThrow("Invalid option_stop_loss_pct: 30");
  });
});

describe("per-underlying limits", () => {
  const cfg = loadConfig({});

  it("falls back to the default for unknown underlyings", () => {
    expect(lotSizeFor(cfg, "banknifty")).toBe(35);
    expect(lotSizeFor(cfg, "MIDCPNIFTY")).toBe(75);
    expect(freezeQuantityFor(cfg, "BANKNIFTY")).toBe(900);
    expect(freezeQuantityFor(cfg, "SENSEX")).toBe(1800);
  });
});
