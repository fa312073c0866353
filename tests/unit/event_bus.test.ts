import { appendFile, readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventBus } from "../../src/events/event_bus.js";
import { createEvent } from "../../src/events/events.js";
import { makeTempDir, recordKinds, removeDir } from "./helpers.js";

describe("EventBus", () => {
  let dir: string;
  let bus: EventBus;

  beforeEach(async () => {
    dir = await makeTempDir();
    bus = new EventBus(join(dir, "logs", "events.jsonl"));
    await bus.start();
  });

  afterEach(async () => {
    await bus.stop();
    await removeDir(dir);
  });

  it("delivers events in publish order to kind and wildcard subscribers", async () => {
    const vix: number[] = [];
    bus.subscribe("VIX_DATA_RECEIVED", (event) => {
      vix.push(event.payload.vix);
    });
    const kinds = recordKinds(bus);

    await bus.emit("VIX_DATA_RECEIVED", { vix: 14 });
    await bus.emit("NO_TRADE_SIGNAL", { underlying: "NIFTY", reason: "flat" });
    await bus.emit("VIX_DATA_RECEIVED", { vix: 15 });
    await bus.idle();

    expect(vix).toEqual([14, 15]);
    expect(kinds).toEqual(["VIX_DATA_RECEIVED", "NO_TRADE_SIGNAL", "VIX_DATA_RECEIVED"]);
  });

  it("rejects a repeated idempotency key", async () => {
    const event = createEvent("VIX_DATA_RECEIVED", { vix: 14 }, { idempotencyKey: "vix-1" });
    await bus.publish(event);

    await expect(bus.publish(event)).rejects.toMatchObject({ kind: "DUPLICATE_EVENT" });
    expect(bus.hasSeen("vix-1")).toBe(true);
  });

  it("keeps delivering after a handler throws", async () => {
    const delivered: number[] = [];
    bus.subscribe("VIX_DATA_RECEIVED", () => {
      throw new Error("handler failure");
    });
    bus.subscribe("VIX_DATA_RECEIVED", (event) => {
      delivered.push(event.payload.vix);
    });

    await bus.emit("VIX_DATA_RECEIVED", { vix: 21 });
    await bus.idle();

    expect(delivered).toEqual([21]);
  });

  it("unsubscribes", async () => {
    const seen: number[] = [];
    const off = bus.subscribe("VIX_DATA_RECEIVED", (event) => {
      seen.push(event.payload.vix);
    });
    await bus.emit("VIX_DATA_RECEIVED", { vix: 1 });
    await bus.idle();
    off();
    await bus.emit("VIX_DATA_RECEIVED", { vix: 2 });
    await bus.idle();

    expect(seen).toEqual([1]);
  });

  it("replays logged events from a timestamp and skips corrupt lines", async () => {
    await bus.emit("VIX_DATA_RECEIVED", { vix: 10 }, { now: new Date(1_000) });
    await bus.emit("VIX_DATA_RECEIVED", { vix: 11 }, { now: new Date(2_000) });
    await bus.idle();
    await appendFile(bus.path, "{broken\n", "utf-8");

    const replayed = await bus.replay(1_500);
    expect(replayed).toHaveLength(1);
    expect(replayed[0]).toMatchObject({ kind: "VIX_DATA_RECEIVED", timestamp_ms: 2_000, payload: { vix: 11 } });

    const lines = (await readFile(bus.path, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(3);
  });

  it("fails to publish before start", async () => {
    const cold = new EventBus(join(dir, "cold.jsonl"));
    await expect(cold.emit("VIX_DATA_RECEIVED", { vix: 1 })).rejects.toMatchObject({
      kind: "EVENT_DISPATCH_FAILED"
    });
  });
});
