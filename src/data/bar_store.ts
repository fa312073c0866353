import { mkdir, open, readFile, rename } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { TradingError } from "../errors/trading_error.js";
import { Bar } from "../types.js";
import { archiveStampIST } from "../utils/ist_time.js";
import { RwLock } from "../utils/rw_lock.js";
import { Timeframe } from "./timeframe.js";

const barLineSchema = z.object({
  timestamp: z.string(),
  timestamp_ms: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
  bar_complete: z.boolean()
});

export function serializeBar(bar: Bar): string {
  return JSON.stringify({
    timestamp: bar.timestamp,
    timestamp_ms: bar.timestampMs,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
    bar_complete: bar.complete
  });
}

export function parseBar(line: string): Bar {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new TradingError("DESERIALIZATION", `Bar line is not JSON: ${line.slice(0, 80)}`, {
      cause: err
    });
  }
  const parsed = barLineSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TradingError("DESERIALIZATION", `Malformed bar line: ${parsed.error.message}`);
  }
  const b = parsed.data;
  return {
    timestamp: b.timestamp,
    timestampMs: b.timestamp_ms,
    open: b.open,
    high: b.high,
    low: b.low,
    close: b.close,
    volume: b.volume,
    complete: b.bar_complete
  };
}

export function barFileName(symbol: string, timeframe: Timeframe): string {
  const slug = symbol
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `bars_${slug}_${timeframe}.jsonl`;
}

/**
 * Append-only OHLCV series for one (symbol, timeframe): a bounded in-memory
 * window of the newest bars in front of a JSON-lines log holding every bar.
 * Writes take the lock exclusively; reads share it.
 */
export class BarStore {
  private memory: Bar[] = [];
  private lock = new RwLock();
  private path: string;

  constructor(
    readonly symbol: string,
    readonly timeframe: Timeframe,
    dataDir: string,
    private capacity: number
  ) {
    if (capacity < 1) {
      throw new TradingError("INVALID_PARAMETER", `Bar store capacity must be >= 1, got ${capacity}`);
    }
    this.path = join(dataDir, barFileName(symbol, timeframe));
  }

  get filePath(): string {
    return this.path;
  }

  /** Newest bar held in memory, if any. */
  last(): Bar | null {
    return this.memory.length > 0 ? this.memory[this.memory.length - 1] : null;
  }

  memorySize(): number {
    return this.memory.length;
  }

  async append(bar: Bar): Promise<void> {
    await this.lock.write(async () => {
      validateBar(bar);
      const last = this.last();
      if (last && bar.timestampMs <= last.timestampMs) {
        throw new TradingError(
          "INVALID_BAR",
          `Bar ${bar.timestamp} is not after last stored bar ${last.timestamp} for ${this.symbol} ${this.timeframe}`
        );
      }
      await this.writeLines(this.path, [serializeBar(bar)], "a");
      this.memory.push(bar);
      if (this.memory.length > this.capacity) {
        this.memory.shift();
      }
    });
  }

  /** The `n` newest bars, oldest first. */
  async recent(n: number): Promise<Bar[]> {
    if (n <= 0) {
      return [];
    }
    return this.lock.read(async () => {
      if (n <= this.memory.length) {
        return this.memory.slice(this.memory.length - n);
      }
      const disk = await this.readLog();
      if (disk.length <= this.memory.length) {
        return this.memory.slice();
      }
      return disk.slice(Math.max(0, disk.length - n));
    });
  }

  /** Rehydrates the memory window from the log; returns the number of bars loaded. */
  async load(n: number = this.capacity): Promise<number> {
    return this.lock.write(async () => {
      const disk = await this.readLog();
      const take = Math.min(n, this.capacity, disk.length);
      this.memory = disk.slice(disk.length - take);
      return this.memory.length;
    });
  }

  /**
   * Archives the current log as `<path>.YYYYMMDD_HHMMSS.archive` and starts a
   * fresh log (at `newPath` when given) holding the in-memory tail.
   */
  async rotate(newPath?: string, now: Date = new Date()): Promise<string> {
    return this.lock.write(async () => {
      const archivePath = `${this.path}.${archiveStampIST(now)}.archive`;
      try {
        await rename(this.path, archivePath);
      } catch (err) {
        if (!isMissingFile(err)) {
          throw new TradingError("FILE_WRITE_FAILED", `Failed to archive ${this.path}`, {
            cause: err
          });
        }
      }
      const target = newPath ?? this.path;
      await this.writeLines(target, this.memory.map(serializeBar), "w");
      this.path = target;
      console.log("BAR_LOG_ROTATED", this.symbol, this.timeframe, archivePath);
      return archivePath;
    });
  }

  private async readLog(): Promise<Bar[]> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new TradingError("FILE_IO", `Failed to read ${this.path}`, { cause: err });
    }
    const bars: Bar[] = [];
    for (const line of content.split("\n")) {
      if (line.trim().length === 0) {
        continue;
      }
      try {
        bars.push(parseBar(line));
      } catch (err) {
        console.warn("BAR_LINE_SKIPPED", this.path, err instanceof Error ? err.message : err);
      }
    }
    return bars;
  }

  private async writeLines(path: string, lines: string[], flags: "a" | "w") {
    try {
      await mkdir(dirname(path), { recursive: true });
      const handle = await open(path, flags);
      try {
        if (lines.length > 0) {
          await handle.appendFile(lines.map((l) => `${l}\n`).join(""), "utf-8");
        }
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      throw new TradingError("FILE_WRITE_FAILED", `Failed to write ${path}`, { cause: err });
    }
  }
}

/** One BarStore per (symbol, timeframe), created on first use. */
export class BarStoreRegistry {
  private stores = new Map<string, BarStore>();

  constructor(
    private dataDir: string,
    private capacity: number
  ) {}

  get(symbol: string, timeframe: Timeframe): BarStore {
    const key = `${symbol.toUpperCase()}|${timeframe}`;
    let store = this.stores.get(key);
    if (!store) {
      store = new BarStore(symbol, timeframe, this.dataDir, this.capacity);
      this.stores.set(key, store);
    }
    return store;
  }

  all(): BarStore[] {
    return Array.from(this.stores.values());
  }
}

function validateBar(bar: Bar) {
  const values = [bar.open, bar.high, bar.low, bar.close, bar.volume, bar.timestampMs];
  if (values.some((v) => !Number.isFinite(v))) {
    throw new TradingError("INVALID_BAR", `Bar ${bar.timestamp} has non-finite fields`);
  }
  if (bar.high < bar.low || bar.high < Math.max(bar.open, bar.close) || bar.low > Math.min(bar.open, bar.close)) {
    throw new TradingError("INVALID_BAR", `Bar ${bar.timestamp} has inconsistent OHLC`);
  }
  if (bar.volume < 0) {
    throw new TradingError("INVALID_BAR", `Bar ${bar.timestamp} has negative volume`);
  }
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
