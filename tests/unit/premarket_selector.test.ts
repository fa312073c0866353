import { describe, expect, it } from "vitest";
import { KiteInstrumentDirectory } from "../../src/broker/instrument_directory.js";
import { DailyBias } from "../../src/strategy/daily_bias.js";
import {
  detectStrikeIncrement,
  PremarketSelector,
  selectExpiry,
  tradeableOption
} from "../../src/strategy/premarket_selector.js";
import { Bias, Instrument, OptionType } from "../../src/types.js";
import { ist } from "./helpers.js";

function option(token: string, underlying: string, strike: number, optionType: OptionType, expiry: string, lotSize = 75): Instrument {
  return {
    token,
    symbol: `${underlying}${expiry.replaceAll("-", "")}${strike}${optionType}`,
    underlying,
    expiry,
    strike,
    lotSize,
    kind: underlying === "RELIANCE" ? "STOCK_OPT" : "INDEX_OPT",
    optionType,
    exchange: "NFO",
    tickSize: 0.05
  };
}

function bias(underlying: string, direction: Bias, closePrice: number): DailyBias {
  return {
    underlying,
    spotToken: `${underlying}-SPOT`,
    bias: direction,
    adx: 30,
    plusDi: 28,
    minusDi: 12,
    closePrice,
    barTime: "2025-01-03T18:30:00.000Z"
  };
}

const directory = new KiteInstrumentDirectory(async () => "", [], () => ist("2025-01-06", "08:00"));
directory.load([
  option("N1", "NIFTY", 23550, "CE", "2025-01-07"),
  option("N2", "NIFTY", 23550, "PE", "2025-01-07"),
  option("N3", "NIFTY", 23550, "CE", "2025-01-09"),
  option("N4", "NIFTY", 23550, "PE", "2025-01-09"),
  option("N5", "NIFTY", 23500, "CE", "2025-01-09"),
  option("B1", "BANKNIFTY", 48900, "PE", "2025-01-07", 35),
  option("R1", "RELIANCE", 1280, "CE", "2025-01-30", 500),
  option("R2", "RELIANCE", 1300, "CE", "2025-01-09", 500),
  option("R3", "RELIANCE", 1300, "CE", "2025-01-30", 500),
  option("R4", "RELIANCE", 1320, "PE", "2025-01-30", 500)
]);
const selector = new PremarketSelector(directory, 50, () => ist("2025-01-06", "08:00"));

describe("selectExpiry", () => {
  it("takes the nearest expiry with enough days left", () => {
    expect(selectExpiry("NIFTY", ["2025-01-09", "2025-01-07", "2025-01-09"], "2025-01-06")).toBe("2025-01-09");
    expect(selectExpiry("RELIANCE", ["2025-01-09", "2025-01-30"], "2025-01-06")).toBe("2025-01-30");
  });

  it("falls back to the farthest expiry", () => {
    expect(selectExpiry("NIFTY", ["2025-01-06", "2025-01-07"], "2025-01-06")).toBe("2025-01-07");
    expect(selectExpiry("NIFTY", [], "2025-01-06")).toBeNull();
  });
});

describe("detectStrikeIncrement", () => {
  it("uses the gap between the two lowest strikes", () => {
    expect(detectStrikeIncrement(directory.optionsFor("RELIANCE"))).toBe(20);
    expect(detectStrikeIncrement(directory.optionsFor("BANKNIFTY"))).toBeNull();
  });
});

describe("PremarketSelector", () => {
  it("picks the ATM pair of the nearest usable index expiry", () => {
    const selected = selector.select(bias("NIFTY", "CE", 23547.5));

    expect(selected).toEqual({
      underlying: "NIFTY",
      spotToken: "NIFTY-SPOT",
      bias: "CE",
      closePrice: 23547.5,
      atmStrike: 23550,
      distanceFromPrice: 2.5,
      ceToken: "N3",
      ceSymbol: "NIFTY2025010923550CE",
      peToken: "N4",
      peSymbol: "NIFTY2025010923550PE",
      lotSize: 75,
      expiry: "2025-01-09"
    });
    expect(selected && tradeableOption(selected)).toEqual({ token: "N3", symbol: "NIFTY2025010923550CE" });
  });

  it("uses fixed index increments and detected stock increments", () => {
    expect(selector.strikeIncrement("BANKNIFTY", [])).toBe(100);
    expect(selector.strikeIncrement("SBIN", [])).toBe(50);

    const bank = selector.select(bias("BANKNIFTY", "PE", 48923.75));
    expect(bank).toMatchObject({ atmStrike: 48900, expiry: "2025-01-07", ceToken: null, peToken: "B1", lotSize: 35 });
    expect(bank && tradeableOption(bank)).toEqual({ token: "B1", symbol: "BANKNIFTY2025010748900PE" });

    expect(selector.select(bias("RELIANCE", "CE", 1291))).toMatchObject({
      atmStrike: 1300,
      expiry: "2025-01-30",
      ceToken: "R3",
      peToken: null
    });
  });

  it("skips no-trade biases and names without a listed contract", () => {
    expect(selector.select(bias("NIFTY", "NO_TRADE", 23547.5))).toBeNull();
    expect(selector.select(bias("SBIN", "CE", 812))).toBeNull();
    expect(selector.select(bias("NIFTY", "PE", 23610))).toBeNull();
  });

  it("returns no tradeable contract when the bias side is missing", () => {
    const reliancePut = selector.select(bias("RELIANCE", "PE", 1291));
    expect(reliancePut).toMatchObject({ bias: "PE", peToken: null });
    expect(reliancePut && tradeableOption(reliancePut)).toBeNull();
  });

  it("selects across every directional bias", () => {
    const selected = selector.selectAll([
      bias("NIFTY", "CE", 23547.5),
      bias("BANKNIFTY", "PE", 48923.75),
      bias("FINNIFTY", "NO_TRADE", 23010)
    ]);
    expect(selected.map((o) => [o.underlying, o.bias])).toEqual([
      ["NIFTY", "CE"],
      ["BANKNIFTY", "PE"]
    ]);
  });
});
