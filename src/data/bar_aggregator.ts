import { EventBus } from "../events/event_bus.js";
import { Bar, Tick } from "../types.js";
import { BarStore } from "./bar_store.js";
import { Timeframe, barBoundary } from "./timeframe.js";

export interface PartialBar {
  boundaryMs: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tickCount: number;
}

/**
 * Folds ticks for one (symbol, timeframe) into bars. A tick whose boundary is
 * later than the partial bar's completes that bar (appended to the store,
 * announced with BAR_READY) and opens the next one. Ticks are processed one
 * at a time in arrival order.
 */
export class BarAggregator {
  private partial: PartialBar | null = null;
  private lastTickAt: number | null = null;
  private chain: Promise<void> = Promise.resolve();

  constructor(
    readonly symbol: string,
    readonly timeframe: Timeframe,
    private store: BarStore,
    private bus: EventBus,
    private clock: () => number = Date.now
  ) {}

  /** Resolves with the bar this tick completed, if any. */
  onTick(tick: Tick): Promise<Bar | null> {
    const run = this.chain.then(() => this.process(tick));
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Force-completes the partial bar (end of day). No-op without one. */
  finalize(): Promise<Bar | null> {
    const run = this.chain.then(async () => {
      if (!this.partial) {
        return null;
      }
      const partial = this.partial;
      this.partial = null;
      return this.complete(partial);
    });
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** True when no tick has been accepted yet or the last one is older than `thresholdSec`. */
  gapCheck(thresholdSec: number, now: number = this.clock()): boolean {
    if (this.lastTickAt === null) {
      return true;
    }
    return (now - this.lastTickAt) / 1000 > thresholdSec;
  }

  secondsSinceLastTick(now: number = this.clock()): number | null {
    return this.lastTickAt === null ? null : (now - this.lastTickAt) / 1000;
  }

  currentPartial(): PartialBar | null {
    return this.partial ? { ...this.partial } : null;
  }

  private async process(tick: Tick): Promise<Bar | null> {
    const boundary = barBoundary(tick.timestampMs, this.timeframe);
    const partial = this.partial;

    if (!partial) {
      this.partial = openPartial(boundary, tick);
      this.lastTickAt = this.clock();
      return null;
    }

    if (boundary === partial.boundaryMs) {
      partial.close = tick.lastPrice;
      partial.high = Math.max(partial.high, tick.lastPrice);
      partial.low = Math.min(partial.low, tick.lastPrice);
      partial.volume += tick.volume;
      partial.tickCount += 1;
      this.lastTickAt = this.clock();
      return null;
    }

    if (boundary < partial.boundaryMs) {
      console.warn(
        "LATE_TICK_DROPPED",
        this.symbol,
        this.timeframe,
        new Date(tick.timestampMs).toISOString()
      );
      return null;
    }

    // the next bar opens even when completing this one fails
    this.partial = openPartial(boundary, tick);
    this.lastTickAt = this.clock();
    return this.complete(partial);
  }

  /** Null when the store already holds a bar at or after the partial's boundary. */
  private async complete(partial: PartialBar): Promise<Bar | null> {
    const stored = this.store.last();
    if (stored && stored.timestampMs >= partial.boundaryMs) {
      console.warn(
        "PARTIAL_BAR_SUPERSEDED",
        this.symbol,
        this.timeframe,
        new Date(partial.boundaryMs).toISOString()
      );
      return null;
    }
    const bar: Bar = {
      timestamp: new Date(partial.boundaryMs).toISOString(),
      timestampMs: partial.boundaryMs,
      open: partial.open,
      high: partial.high,
      low: partial.low,
      close: partial.close,
      volume: partial.volume,
      complete: true
    };
    await this.store.append(bar);
    await this.bus.emit("BAR_READY", {
      symbol: this.symbol,
      timeframe: this.timeframe,
      bar_time: bar.timestamp,
      bar_complete: true
    });
    return bar;
  }
}

function openPartial(boundaryMs: number, tick: Tick): PartialBar {
  return {
    boundaryMs,
    open: tick.lastPrice,
    high: tick.lastPrice,
    low: tick.lastPrice,
    close: tick.lastPrice,
    volume: tick.volume,
    tickCount: 1
  };
}

export interface GapReport {
  symbol: string;
  timeframe: Timeframe;
  gapSec: number | null;
}

/** Routes each tick to every aggregator keyed by the tick's symbol or token. */
export class MultiBarAggregator {
  private aggregators: BarAggregator[] = [];

  add(aggregator: BarAggregator): void {
    this.aggregators.push(aggregator);
  }

  list(): BarAggregator[] {
    return this.aggregators.slice();
  }

  find(symbol: string, timeframe: Timeframe): BarAggregator | null {
    return (
      this.aggregators.find((a) => a.symbol === symbol && a.timeframe === timeframe) ?? null
    );
  }

  async onTick(tick: Tick): Promise<Bar[]> {
    const targets = this.aggregators.filter(
      (a) => a.symbol === tick.symbol || a.symbol === tick.token
    );
    const results = await Promise.all(targets.map((a) => a.onTick(tick)));
    return results.filter((bar): bar is Bar => bar !== null);
  }

  async finalizeAll(): Promise<Bar[]> {
    const results = await Promise.all(this.aggregators.map((a) => a.finalize()));
    return results.filter((bar): bar is Bar => bar !== null);
  }

  checkAllGaps(thresholdSec: number, now: number = Date.now()): GapReport[] {
    return this.aggregators
      .filter((a) => a.gapCheck(thresholdSec, now))
      .map((a) => ({
        symbol: a.symbol,
        timeframe: a.timeframe,
        gapSec: a.secondsSinceLastTick(now)
      }));
  }
}
