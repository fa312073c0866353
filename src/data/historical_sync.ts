import { BrokerGateway } from "../broker/broker_gateway.js";
import { DataConfig } from "../config/config.js";
import { TradingError, isTradingError } from "../errors/trading_error.js";
import { EventBus } from "../events/event_bus.js";
import { Bar } from "../types.js";
import { DAY_MS } from "../utils/ist_time.js";
import { BarStore, BarStoreRegistry } from "./bar_store.js";
import { Timeframe } from "./timeframe.js";

/**
 * Backfills bar stores from the broker's historical candles. Only complete
 * bars newer than a store's last bar are appended, so repeated syncs are safe.
 */
export class HistoricalSync {
  constructor(
    private broker: Pick<BrokerGateway, "historicalCandles">,
    private stores: BarStoreRegistry,
    private bus: EventBus,
    private cfg: DataConfig,
    private now: () => Date = () => new Date()
  ) {}

  /** Makes sure the store holds at least `minBars`; returns how many it holds afterwards. */
  async ensureBars(symbol: string, token: string, timeframe: Timeframe, minBars: number): Promise<number> {
    const store = this.stores.get(symbol, timeframe);
    if (store.memorySize() === 0) {
      await store.load();
    }
    if (store.memorySize() >= minBars) {
      return store.memorySize();
    }
    const to = this.now();
    const days = timeframe === "1d" ? this.cfg.lookbackDaysDaily : this.cfg.lookbackDaysHourly;
    const from = new Date(to.getTime() - days * DAY_MS);
    const bars = await this.broker.historicalCandles(token, timeframe, from, to);
    const added = await appendNewer(store, bars);
    console.log("HISTORY_SYNCED", symbol, timeframe, `fetched=${bars.length}`, `added=${added}`, `held=${store.memorySize()}`);
    return store.memorySize();
  }

  /** Short-window REST pull of bars completed since the store's last one; used when no tick feed runs. */
  async pullRecent(symbol: string, token: string, timeframe: Timeframe): Promise<number> {
    const store = this.stores.get(symbol, timeframe);
    const to = this.now();
    const last = store.last();
    const from = last ? new Date(last.timestampMs) : new Date(to.getTime() - this.cfg.lookbackDaysHourly * DAY_MS);
    const bars = await this.broker.historicalCandles(token, timeframe, from, to);
    return appendNewer(store, bars);
  }

  /** Fetches the bars of a feed gap, bounded by the recovery timeout. */
  async recoverGap(symbol: string, token: string, timeframe: Timeframe, from: Date, to: Date): Promise<number> {
    const started = Date.now();
    await this.bus.emit("RECOVERY_STARTED", {
      symbol,
      timeframe,
      from: from.toISOString(),
      to: to.toISOString()
    });
    const store = this.stores.get(symbol, timeframe);
    const bars = await withTimeout(
      this.broker.historicalCandles(token, timeframe, from, to),
      this.cfg.recoveryTimeoutSec * 1000,
      `Recovery of ${symbol} ${timeframe} timed out after ${this.cfg.recoveryTimeoutSec}s`
    );
    const added = await appendNewer(store, bars);
    await this.bus.emit("RECOVERY_COMPLETED", {
      symbol,
      timeframe,
      bars_recovered: added,
      duration_ms: Date.now() - started
    });
    return added;
  }
}

async function appendNewer(store: BarStore, bars: readonly Bar[]): Promise<number> {
  const sorted = bars.filter((b) => b.complete).sort((a, b) => a.timestampMs - b.timestampMs);
  let added = 0;
  for (const bar of sorted) {
    const last = store.last();
    if (last && bar.timestampMs <= last.timestampMs) {
      continue;
    }
    try {
      await store.append(bar);
      added += 1;
    } catch (err) {
      if (isTradingError(err, "INVALID_BAR")) {
        console.warn("HISTORY_BAR_SKIPPED", store.symbol, bar.timestamp, err.message);
        continue;
      }
      throw err;
    }
  }
  return added;
}

async function withTimeout<T>(work: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TradingError("RECOVERY_TIMEOUT", message)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
