import { mkdir } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BarAggregator, MultiBarAggregator } from "../../src/data/bar_aggregator.js";
import { BarStore } from "../../src/data/bar_store.js";
import { EventBus } from "../../src/events/event_bus.js";
import { makeBar, makeTempDir, makeTick, removeDir, startedBus } from "./helpers.js";

const at = (clock: string) => Date.parse(`2025-01-06T${clock}+05:30`);

describe("BarAggregator", () => {
  let dir: string;
  let bus: EventBus;
  let store: BarStore;
  let now: number;

  beforeEach(async () => {
    dir = await makeTempDir();
    bus = await startedBus(dir);
    store = new BarStore("NIFTY", "1h", dir, 50);
    now = at("10:00:00");
  });

  afterEach(async () => {
    await bus.stop();
    await removeDir(dir);
  });

  it("completes the 10:00 bar on the first tick after 11:00", async () => {
    const aggregator = new BarAggregator("NIFTY", "1h", store, bus, () => now);
    const ready: string[] = [];
    bus.subscribe("BAR_READY", (event) => {
      ready.push(event.payload.bar_time);
    });

    expect(await aggregator.onTick(makeTick("NIFTY", 100, at("10:15:00"), 5))).toBeNull();
    expect(await aggregator.onTick(makeTick("NIFTY", 104, at("10:40:00"), 3))).toBeNull();
    expect(await aggregator.onTick(makeTick("NIFTY", 98, at("10:59:58"), 2))).toBeNull();
    const completed = await aggregator.onTick(makeTick("NIFTY", 101, at("11:00:02"), 4));
    await bus.idle();

    expect(completed).toMatchObject({
      timestamp: "2025-01-06T04:30:00.000Z",
      open: 100,
      high: 104,
      low: 98,
      close: 98,
      volume: 10,
      complete: true
    });
    expect(ready).toEqual(["2025-01-06T04:30:00.000Z"]);
    expect(store.last()?.close).toBe(98);
    expect(aggregator.currentPartial()).toMatchObject({
      boundaryMs: at("11:00:00"),
      open: 101,
      high: 101,
      low: 101,
      close: 101,
      volume: 4,
      tickCount: 1
    });
  });

  it("drops ticks older than the partial bar", async () => {
    const aggregator = new BarAggregator("NIFTY", "1h", store, bus, () => now);
    await aggregator.onTick(makeTick("NIFTY", 100, at("11:05:00")));
    expect(await aggregator.onTick(makeTick("NIFTY", 90, at("10:55:00")))).toBeNull();
    expect(aggregator.currentPartial()?.low).toBe(100);
  });

  it("finalize completes the partial bar once", async () => {
    const aggregator = new BarAggregator("NIFTY", "1h", store, bus, () => now);
    await aggregator.onTick(makeTick("NIFTY", 100, at("15:10:00")));
    expect((await aggregator.finalize())?.timestamp).toBe("2025-01-06T09:30:00.000Z");
    expect(await aggregator.finalize()).toBeNull();
    expect(store.memorySize()).toBe(1);
  });

  it("keeps aggregating when a backfill already stored the partial's bar", async () => {
    const aggregator = new BarAggregator("NIFTY", "1h", store, bus, () => now);
    await aggregator.onTick(makeTick("NIFTY", 100, at("10:15:00")));
    await store.append(makeBar(at("10:00:00"), 106, 99, 103));

    expect(await aggregator.onTick(makeTick("NIFTY", 104, at("11:31:00")))).toBeNull();
    expect(await aggregator.onTick(makeTick("NIFTY", 105, at("11:45:00")))).toBeNull();
    const completed = await aggregator.onTick(makeTick("NIFTY", 107, at("12:05:00")));

    expect(completed).toMatchObject({ timestamp: "2025-01-06T05:30:00.000Z", open: 104, close: 105 });
    expect(store.memorySize()).toBe(2);
    expect(store.last()?.close).toBe(105);
    expect(aggregator.currentPartial()?.boundaryMs).toBe(at("12:00:00"));
  });

  it("moves on to the next bar when completing one fails", async () => {
    await mkdir(store.filePath);
    const aggregator = new BarAggregator("NIFTY", "1h", store, bus, () => now);
    await aggregator.onTick(makeTick("NIFTY", 100, at("10:15:00")));

    await expect(aggregator.onTick(makeTick("NIFTY", 101, at("11:05:00")))).rejects.toMatchObject({
      kind: "FILE_WRITE_FAILED"
    });
    expect(aggregator.currentPartial()).toMatchObject({ boundaryMs: at("11:00:00"), open: 101 });
    expect(await aggregator.onTick(makeTick("NIFTY", 102, at("11:20:00")))).toBeNull();
    expect(aggregator.currentPartial()?.close).toBe(102);
  });

  it("reports a gap when no tick arrived within the threshold", async () => {
    const aggregator = new BarAggregator("NIFTY", "1h", store, bus, () => now);
    expect(aggregator.gapCheck(60)).toBe(true);
    await aggregator.onTick(makeTick("NIFTY", 100, at("10:00:30")));
    now += 60_000;
    expect(aggregator.gapCheck(60)).toBe(false);
    now += 1_000;
    expect(aggregator.gapCheck(60)).toBe(true);
    expect(aggregator.secondsSinceLastTick()).toBe(61);
  });

  it("routes ticks by symbol or token across timeframes", async () => {
    const multi = new MultiBarAggregator();
    multi.add(new BarAggregator("NIFTY", "1h", store, bus, () => now));
    multi.add(new BarAggregator("NIFTY", "1d", new BarStore("NIFTY", "1d", dir, 50), bus, () => now));
    multi.add(new BarAggregator("BANKNIFTY", "1h", new BarStore("BANKNIFTY", "1h", dir, 50), bus, () => now));

    await multi.onTick(makeTick("NIFTY", 100, at("10:10:00")));
    const done = await multi.onTick(makeTick("NIFTY", 102, at("11:10:00")));

    expect(done.map((b) => b.close)).toEqual([100]);
    expect(multi.find("NIFTY", "1d")?.currentPartial()?.close).toBe(102);
    expect(multi.find("BANKNIFTY", "1h")?.currentPartial()).toBeNull();
    expect(multi.checkAllGaps(60, now).map((g) => `${g.symbol}|${g.timeframe}`)).toEqual(["BANKNIFTY|1h"]);
  });
});
