import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { computePerformance, maxDrawdown } from "../../src/analytics/performance.js";
import { DailyArtifacts, tradesFileName } from "../../src/reports/daily_artifacts.js";
import { makeTempDir, makeTrade, removeDir } from "./helpers.js";

describe("computePerformance", () => {
  const trades = [
    makeTrade("POS-3", 200, "2025-01-06T06:30:00.000Z", { durationSec: 3000 }),
    makeTrade("POS-1", 730, "2025-01-06T04:30:00.000Z", { exitReason: "TARGET" }),
    makeTrade("POS-2", -770, "2025-01-06T05:30:00.000Z", {
      optionType: "PE",
      exitReason: "STOP_LOSS",
      durationSec: 600
    })
  ];

  it("summarises the day in exit order", () => {
    const m = computePerformance("2025-01-06", trades);

    expect(m).toMatchObject({
      totalTrades: 3,
      winningTrades: 2,
      losingTrades: 1,
      breakevenTrades: 0,
      avgWin: 465,
      avgLoss: -770,
      largestWin: 730,
      largestLoss: -770,
      grossProfit: 930,
      grossLoss: -770,
      netPnl: 160,
      totalBrokerage: 60,
      maxDrawdown: 770,
      ceTrades: 2,
      peTrades: 1,
      exitReasons: { TARGET: 1, STOP_LOSS: 1, EOD_MANDATORY_EXIT: 1 },
      sharpeRatio: null
    });
    expect(m.winRate).toBeCloseTo(66.667, 2);
    expect(m.profitFactor).toBeCloseTo(930 / 770);
    expect(m.avgHoldMinutes).toBeCloseTo(30);
  });

  it("leaves the profit factor empty without losing trades", () => {
    expect(computePerformance("2025-01-06", [makeTrade("POS-1", 50, "2025-01-06T05:00:00.000Z")]).profitFactor).toBeNull();
    expect(computePerformance("2025-01-06", [])).toMatchObject({ totalTrades: 0, winRate: 0, netPnl: 0 });
  });
});

describe("maxDrawdown", () => {
  it("measures from a zero start", () => {
    expect(maxDrawdown([-100, 50])).toBe(100);
    expect(maxDrawdown([100, -30, 50, -80])).toBe(80);
    expect(maxDrawdown([])).toBe(0);
  });
});

describe("DailyArtifacts", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("writes the trades file and reads it back", async () => {
    const artifacts = new DailyArtifacts(join(dir, "data"));
    const trades = [makeTrade("POS-1", 730, "2025-01-06T04:30:00.000Z")];

    const path = await artifacts.writeTrades("20250106", trades, computePerformance("2025-01-06", trades));

    expect(path).toBe(join(dir, "data", tradesFileName("20250106")));
    expect(await artifacts.readTrades("20250106")).toEqual(trades);
    const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
    expect(raw).toMatchObject({ date: "20250106", performance: { netPnl: 730 } });
  });

  it("treats a missing day as empty and rejects a malformed one", async () => {
    const artifacts = new DailyArtifacts(dir);
    expect(await artifacts.readTrades("20250107")).toEqual([]);

    await writeFile(join(dir, "trades_20250108.json"), JSON.stringify({ date: "20250108", trades: [{}] }), "utf-8");
    await expect(artifacts.readTrades("20250108")).rejects.toMatchObject({ kind: "DESERIALIZATION" });
  });

  it("writes bias and position snapshots", async () => {
    const artifacts = new DailyArtifacts(dir);
    const biasPath = await artifacts.writeBias("20250106", []);
    const positionsPath = await artifacts.writePositions("20250106", [], new Date("2025-01-06T10:00:00Z"));

    expect(JSON.parse(await readFile(biasPath, "utf-8"))).toEqual({ date: "20250106", biases: [] });
    expect(JSON.parse(await readFile(positionsPath, "utf-8"))).toEqual({
      date: "20250106",
      at: "2025-01-06T10:00:00.000Z",
      positions: []
    });
  });

  it("writes the preselected options and crossover signals", async () => {
    const artifacts = new DailyArtifacts(dir);
    const signal = {
      underlying: "NIFTY",
      spotToken: "256265",
      timestamp: "2025-01-06T05:45:00.000Z",
      direction: "CE" as const,
      adx: 31.5,
      plusDi: 27,
      minusDi: 14,
      closePrice: 23610
    };

    const preselectedPath = await artifacts.writePreselected("20250106", []);
    const crossoverPath = await artifacts.writeCrossovers("20250106", [signal]);

    expect(preselectedPath).toBe(join(dir, "preselected_20250106.json"));
    expect(JSON.parse(await readFile(preselectedPath, "utf-8"))).toEqual({ date: "20250106", options: [] });
    expect(crossoverPath).toBe(join(dir, "crossover_20250106.json"));
    expect(JSON.parse(await readFile(crossoverPath, "utf-8"))).toEqual({ date: "20250106", signals: [signal] });
  });
});
