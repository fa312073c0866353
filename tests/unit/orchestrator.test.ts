import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InstrumentDirectory } from "../../src/broker/instrument_directory.js";
import { PaperBroker } from "../../src/broker/paper_broker.js";
import { barFileName, serializeBar } from "../../src/data/bar_store.js";
import { EventBus } from "../../src/events/event_bus.js";
import { EventKind } from "../../src/events/events.js";
import { Orchestrator } from "../../src/orchestrator.js";
import { DailyArtifacts } from "../../src/reports/daily_artifacts.js";
import { HolidayCalendar } from "../../src/session/trading_calendar.js";
import { Instrument } from "../../src/types.js";
import { ist, makeTempDir, recordKinds, removeDir, startedBus, testConfig, trendingBars } from "./helpers.js";

const DAY = 86_400_000;
const HOUR = 3_600_000;
const SPOT = "256265";
const VIX = "264969";

const OPTION: Instrument = {
  token: "12345",
  symbol: "NIFTY25JAN23550CE",
  underlying: "NIFTY",
  expiry: "2025-01-09",
  strike: 23550,
  lotSize: 75,
  kind: "INDEX_OPT",
  optionType: "CE",
  exchange: "NFO",
  tickSize: 0.05
};

class FakeInstruments implements InstrumentDirectory {
  async refresh(): Promise<number> {
    return 1;
  }

  findOption(): Instrument {
    return OPTION;
  }

  optionsFor(underlying: string): Instrument[] {
    return underlying.toUpperCase() === OPTION.underlying ? [OPTION] : [];
  }

  underlyingToken(name: string): string {
    return name.toUpperCase() === "INDIAVIX" ? VIX : SPOT;
  }

  byToken(token: string): Instrument | null {
    return token === OPTION.token ? OPTION : null;
  }
}

async function seedBars(dir: string) {
  const daily = trendingBars(20, Date.UTC(2024, 11, 1, 18, 30), DAY);
  const hourly = trendingBars(25, Date.UTC(2025, 0, 2, 3, 30), HOUR);
  await writeFile(join(dir, barFileName("NIFTY", "1d")), daily.map((b) => `${serializeBar(b)}\n`).join(""), "utf-8");
  await writeFile(join(dir, barFileName("NIFTY", "1h")), hourly.map((b) => `${serializeBar(b)}\n`).join(""), "utf-8");
}

describe("Orchestrator", () => {
  let dir: string;
  let bus: EventBus;
  let kinds: EventKind[];
  let broker: PaperBroker;
  let now: Date;

  const engine = () =>
    new Orchestrator({
      config: testConfig({
        DATA_DIR: dir,
        ENABLE_WEBSOCKET: "0",
        UNDERLYINGS: "NIFTY",
        BASE_POSITION_SIZE_PCT: "0.01"
      }),
      broker,
      instruments: new FakeInstruments(),
      calendar: new HolidayCalendar(),
      bus,
      clock: () => now,
      sleepMs: async () => undefined
    });

  beforeEach(async () => {
    dir = await makeTempDir();
    bus = await startedBus(dir);
    kinds = recordKinds(bus);
    broker = new PaperBroker({ slippageBps: 0, tickSize: 0.05, startingFunds: 1_000_000 });
    vi.spyOn(broker, "historicalCandles").mockResolvedValue([]);
    broker.setLtp(SPOT, 23547.5, 0);
    broker.setLtp(VIX, 15, 0);
    broker.setLtp(OPTION.token, 100, 0);
  });

  afterEach(async () => {
    await bus.stop();
    await removeDir(dir);
  });

  it("does nothing on a weekend", async () => {
    now = ist("2025-01-04", "10:00");
    const outcome = await engine().run();

    expect(outcome).toEqual({ reason: "non-trading day", fatal: false, trades: 0, dailyPnl: 0 });
    expect(kinds).not.toContain("DATA_READY");
  });

  it("refuses to trade without enough history", async () => {
    now = ist("2025-01-06", "09:00");

    await expect(engine().run()).rejects.toThrow("Not enough history for NIFTY: daily 0/15, hourly 0/20");
    expect(kinds).toContain("FATAL_ERROR");
  });

  it("enters on a call signal, stops out and writes the day's trades", async () => {
    await seedBars(dir);
    now = ist("2025-01-06", "09:00");
    const orchestrator = engine();
    vi.spyOn(orchestrator.strategy, "evaluateEntry").mockImplementation((_bars, ltp, vix, at) =>
      orchestrator.strategy.applyEntryFilters({ rsi: 55, ema: 23500, close: 23547.5, vix }, ltp, at)
    );

    expect(await orchestrator.startup()).toBe(true);
    expect(orchestrator.risk.currentVix()).toBe(15);

    now = ist("2025-01-06", "10:20");
    await orchestrator.runCycle(now);
    const [position] = orchestrator.positions.openPositions();
    // 1M * 0.01% * 0.925 (VIX 15) * 0.75 (3 days to expiry) is under a lot -> one lot
    expect(position).toMatchObject({ symbol: OPTION.symbol, quantity: 75, entryPrice: 100, strike: 23550 });

    now = ist("2025-01-06", "10:40");
    broker.setLtp(OPTION.token, 69.5, now.getTime());
    await orchestrator.runCycle(now);
    expect(orchestrator.positions.openCount()).toBe(0);
    expect(orchestrator.positions.dailyTrades()[0]).toMatchObject({
      exitReason: "STOP_LOSS",
      exitPrice: 69.5,
      netPnl: -2307.5
    });

    now = ist("2025-01-06", "15:31");
    await orchestrator.runCycle(now);
    const outcome = await orchestrator.shutdown();

    expect(outcome).toEqual({ reason: "session closed", fatal: false, trades: 1, dailyPnl: -2307.5 });
    expect(
      kinds.filter((k) =>
        [
          "DATA_READY",
          "DAILY_DIRECTION_DETERMINED",
          "SIGNAL_GENERATED",
          "POSITION_OPENED",
          "STOP_LOSS_TRIGGERED",
          "POSITION_CLOSED",
          "EOD_MANDATORY_EXIT",
          "SHUTDOWN_COMPLETED"
        ].includes(k)
      )
    ).toEqual([
      "DATA_READY",
      "DAILY_DIRECTION_DETERMINED",
      "SIGNAL_GENERATED",
      "POSITION_OPENED",
      "STOP_LOSS_TRIGGERED",
      "POSITION_CLOSED",
      "EOD_MANDATORY_EXIT",
      "SHUTDOWN_COMPLETED"
    ]);

    const trades = await new DailyArtifacts(dir).readTrades("20250106");
    expect(trades.map((t) => [t.exitReason, t.netPnl])).toEqual([["STOP_LOSS", -2307.5]]);
    const bias: unknown = JSON.parse(await readFile(join(dir, "bias_20250106.json"), "utf-8"));
    expect(bias).toMatchObject({ biases: [{ underlying: "NIFTY", bias: "CE" }] });
    // the seeded daily close of 290 has no listed 300 strike
    const preselected: unknown = JSON.parse(await readFile(join(dir, "preselected_20250106.json"), "utf-8"));
    expect(preselected).toEqual({ date: "20250106", options: [] });
  });

  it("flattens what is open when asked to shut down", async () => {
    await seedBars(dir);
    now = ist("2025-01-06", "09:00");
    const orchestrator = engine();
    vi.spyOn(orchestrator.strategy, "evaluateEntry").mockImplementation((_bars, ltp, vix, at) =>
      orchestrator.strategy.applyEntryFilters({ rsi: 55, ema: 23500, close: 23547.5, vix }, ltp, at)
    );
    await orchestrator.startup();

    now = ist("2025-01-06", "10:20");
    await orchestrator.runCycle(now);
    expect(orchestrator.positions.openCount()).toBe(1);

    orchestrator.requestShutdown("operator");
    const outcome = await orchestrator.shutdown();

    // exit at the marked 100: zero gross, minimum brokerage
    expect(outcome).toEqual({ reason: "operator", fatal: false, trades: 1, dailyPnl: -20 });
    expect(orchestrator.positions.dailyTrades()[0].exitReason).toBe("SHUTDOWN");
  });
});
