import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BarStoreRegistry } from "../../src/data/bar_store.js";
import { HistoricalSync } from "../../src/data/historical_sync.js";
import { Timeframe } from "../../src/data/timeframe.js";
import { EventBus } from "../../src/events/event_bus.js";
import { VixFeed } from "../../src/market_data/vix_feed.js";
import { Bar } from "../../src/types.js";
import { makeBar, makeTempDir, recordKinds, removeDir, startedBus, testConfig } from "./helpers.js";

const HOUR = 3_600_000;
const T0 = Date.UTC(2025, 0, 6, 3, 45);
const NOW = new Date("2025-01-06T10:00:00Z");

describe("HistoricalSync", () => {
  let dir: string;
  let bus: EventBus;
  let stores: BarStoreRegistry;
  const candles = vi.fn(async (_token: string, _tf: Timeframe, _from: Date, _to: Date): Promise<Bar[]> => []);

  beforeEach(async () => {
    dir = await makeTempDir();
    bus = await startedBus(dir);
    stores = new BarStoreRegistry(dir, 50);
    candles.mockReset();
  });

  afterEach(async () => {
    await bus.stop();
    await removeDir(dir);
  });

  const sync = (data = testConfig().data) =>
    new HistoricalSync({ historicalCandles: candles }, stores, bus, data, () => NOW);

  it("backfills complete bars in time order over the lookback window", async () => {
    candles.mockResolvedValueOnce([
      makeBar(T0 + HOUR, 110, 100, 105),
      makeBar(T0, 110, 100, 102),
      makeBar(T0 + 2 * HOUR, 110, 100, 107, { complete: false })
    ]);

    expect(await sync().ensureBars("NIFTY", "256265", "1h", 2)).toBe(2);

    const [token, timeframe, from, to] = candles.mock.calls[0];
    expect([token, timeframe, to]).toEqual(["256265", "1h", NOW]);
    expect(from.toISOString()).toBe("2024-12-17T10:00:00.000Z");
    expect(stores.get("NIFTY", "1h").last()?.close).toBe(105);
  });

  it("skips the fetch when the store already has enough bars", async () => {
    await stores.get("NIFTY", "1d").append(makeBar(T0, 110, 100, 105));
    expect(await sync().ensureBars("NIFTY", "256265", "1d", 1)).toBe(1);
    expect(candles).not.toHaveBeenCalled();
  });

  it("pulls only bars newer than the last stored one", async () => {
    await stores.get("NIFTY", "1h").append(makeBar(T0, 110, 100, 105));
    candles.mockResolvedValueOnce([makeBar(T0, 110, 100, 105), makeBar(T0 + HOUR, 112, 101, 111)]);

    expect(await sync().pullRecent("NIFTY", "256265", "1h")).toBe(1);
    expect(candles.mock.calls[0][2].getTime()).toBe(T0);
  });

  it("reports a recovered gap on the bus", async () => {
    const kinds = recordKinds(bus);
    candles.mockResolvedValueOnce([makeBar(T0, 110, 100, 105)]);

    expect(await sync().recoverGap("NIFTY", "256265", "1h", new Date(T0), NOW)).toBe(1);
    await bus.idle();
    expect(kinds).toEqual(["RECOVERY_STARTED", "RECOVERY_COMPLETED"]);
  });

  it("gives up on a recovery that outlasts the timeout", async () => {
    candles.mockReturnValueOnce(new Promise<Bar[]>(() => undefined));
    const data = { ...testConfig().data, recoveryTimeoutSec: 0.05 };

    await expect(sync(data).recoverGap("NIFTY", "256265", "1h", new Date(T0), NOW)).rejects.toMatchObject({
      kind: "RECOVERY_TIMEOUT"
    });
  });
});

describe("VixFeed", () => {
  it("pushes valid readings and shares a poll in flight", async () => {
    const sink = { updateVix: vi.fn(async (_vix: number) => undefined) };
    const ltp = vi.fn(async (_token: string) => 18.4);
    const feed = new VixFeed({ ltp }, "264969", sink, 60);

    const [a, b] = await Promise.all([feed.pollOnce(), feed.pollOnce()]);

    expect([a, b]).toEqual([18.4, 18.4]);
    expect(ltp).toHaveBeenCalledTimes(1);
    expect(sink.updateVix).toHaveBeenCalledWith(18.4);
    expect(feed.latest()).toBe(18.4);
  });

  it("ignores failed and nonsensical readings", async () => {
    const sink = { updateVix: vi.fn(async (_vix: number) => undefined) };
    const ltp = vi.fn(async (_token: string) => 0);
    ltp.mockRejectedValueOnce(new Error("quote unavailable"));
    const feed = new VixFeed({ ltp }, "264969", sink, 60);

    expect(await feed.pollOnce()).toBeNull();
    expect(await feed.pollOnce()).toBeNull();
    expect(sink.updateVix).not.toHaveBeenCalled();
    expect(feed.latest()).toBeNull();
  });
});
