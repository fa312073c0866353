import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EngineConfig, loadConfig } from "../../src/config/config.js";
import { EventBus } from "../../src/events/event_bus.js";
import { EventKind } from "../../src/events/events.js";
import { Bar, Tick, Trade } from "../../src/types.js";

// ─── Fixtures ───────────────────────────────────────────────────────

export function makeBar(timestampMs: number, high: number, low: number, close: number, overrides: Partial<Bar> = {}): Bar {
  return {
    timestamp: new Date(timestampMs).toISOString(),
    timestampMs,
    open: close,
    high,
    low,
    close,
    volume: 100,
    complete: true,
    ...overrides
  };
}

/** Bars climbing by `step` each interval: +DI dominates, ADX is high. */
export function trendingBars(count: number, startMs: number, intervalMs: number, step = 10, base = 100): Bar[] {
  const bars: Bar[] = [];
  for (let i = 0; i < count; i += 1) {
    const close = base + i * step;
    bars.push(makeBar(startMs + i * intervalMs, close + 2, close - 2, close, { open: close - 1 }));
  }
  return bars;
}

export function makeTick(symbol: string, lastPrice: number, timestampMs: number, volume = 0): Tick {
  return { symbol, token: symbol, lastPrice, bid: null, ask: null, volume, timestampMs };
}

export function makeTrade(positionId: string, netPnl: number, exitTime: string, overrides: Partial<Trade> = {}): Trade {
  return {
    positionId,
    symbol: "NIFTY25JAN23550CE",
    underlying: "NIFTY",
    strike: 23550,
    optionType: "CE",
    side: "BUY",
    quantity: 75,
    entryPrice: 100,
    entryTime: "2025-01-06T04:45:00.000Z",
    entryReason: "ADX CE aligned",
    exitPrice: 100,
    exitTime,
    exitReason: "EOD_MANDATORY_EXIT",
    secondaryReasons: [],
    grossPnl: netPnl + 20,
    grossPnlPct: 0,
    brokerage: 20,
    netPnl,
    durationSec: 1800,
    highWater: 100,
    lowWater: 100,
    vixEntry: 15,
    vixExit: null,
    idempotencyKey: `key-${positionId}`,
    ...overrides
  };
}

export function testConfig(overrides: Record<string, string> = {}): EngineConfig {
  return loadConfig({ DATA_DIR: "data-test", ...overrides });
}

// ─── Temp dirs and buses ────────────────────────────────────────────

export async function makeTempDir(prefix = "engine-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function startedBus(dir: string): Promise<EventBus> {
  const bus = new EventBus(join(dir, "events.jsonl"));
  await bus.start();
  return bus;
}

/** Records every event kind delivered on `bus`, in order. */
export function recordKinds(bus: EventBus): EventKind[] {
  const seen: EventKind[] = [];
  bus.subscribeAll((event) => {
    seen.push(event.kind);
  });
  return seen;
}

/** IST wall-clock instant, e.g. ist("2025-01-06", "10:15"). */
export function ist(date: string, clock: string): Date {
  return new Date(`${date}T${clock.length === 5 ? `${clock}:00` : clock}+05:30`);
}
