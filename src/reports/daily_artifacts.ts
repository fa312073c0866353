import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { PerformanceMetrics } from "../analytics/performance.js";
import { isMissingFile } from "../data/bar_store.js";
import { TradingError } from "../errors/trading_error.js";
import { DailyBias } from "../strategy/daily_bias.js";
import { CrossoverSignal } from "../strategy/hourly_crossover.js";
import { PreselectedOption } from "../strategy/premarket_selector.js";
import { Position, Trade } from "../types.js";

const exitReason = z.enum([
  "STOP_LOSS",
  "TRAILING_STOP",
  "TARGET",
  "ALIGNMENT_LOST",
  "VIX_SPIKE",
  "DAILY_LOSS_LIMIT",
  "EOD_MANDATORY_EXIT",
  "SESSION_CLOSE",
  "TOKEN_EXPIRY",
  "KILL_SWITCH",
  "SHUTDOWN"
]);

export const tradeSchema = z.object({
  positionId: z.string(),
  symbol: z.string(),
  underlying: z.string(),
  strike: z.number(),
  optionType: z.enum(["CE", "PE"]),
  side: z.enum(["BUY", "SELL"]),
  quantity: z.number(),
  entryPrice: z.number(),
  entryTime: z.string(),
  entryReason: z.string(),
  exitPrice: z.number(),
  exitTime: z.string(),
  exitReason,
  secondaryReasons: z.array(exitReason),
  grossPnl: z.number(),
  grossPnlPct: z.number(),
  brokerage: z.number(),
  netPnl: z.number(),
  durationSec: z.number(),
  highWater: z.number(),
  lowWater: z.number(),
  vixEntry: z.number().nullable(),
  vixExit: z.number().nullable(),
  idempotencyKey: z.string()
});

const tradesFileSchema = z.object({
  date: z.string(),
  trades: z.array(tradeSchema)
});

export function tradesFileName(compactDate: string): string {
  return `trades_${compactDate}.json`;
}

/**
 * Day files under the data directory: trades_, bias_, preselected_, crossover_
 * and positions_YYYYMMDD.json.
 * Each write replaces the whole file through a temp file and rename.
 */
export class DailyArtifacts {
  constructor(private dataDir: string) {}

  async writeTrades(
    compactDate: string,
    trades: readonly Trade[],
    performance: PerformanceMetrics | null = null
  ): Promise<string> {
    const path = join(this.dataDir, tradesFileName(compactDate));
    await writeJson(path, { date: compactDate, trades, performance });
    console.log("TRADES_FILE_WRITTEN", path, trades.length);
    return path;
  }

  async readTrades(compactDate: string): Promise<Trade[]> {
    const path = join(this.dataDir, tradesFileName(compactDate));
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new TradingError("FILE_IO", `Failed to read ${path}`, { cause: err });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new TradingError("DESERIALIZATION", `${path} is not JSON`, { cause: err });
    }
    const parsed = tradesFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TradingError("DESERIALIZATION", `Malformed trades file ${path}: ${parsed.error.message}`);
    }
    return parsed.data.trades;
  }

  async writeBias(compactDate: string, biases: readonly DailyBias[]): Promise<string> {
    const path = join(this.dataDir, `bias_${compactDate}.json`);
    await writeJson(path, { date: compactDate, biases });
    return path;
  }

  async writePreselected(compactDate: string, options: readonly PreselectedOption[]): Promise<string> {
    const path = join(this.dataDir, `preselected_${compactDate}.json`);
    await writeJson(path, { date: compactDate, options });
    return path;
  }

  async writeCrossovers(compactDate: string, signals: readonly CrossoverSignal[]): Promise<string> {
    const path = join(this.dataDir, `crossover_${compactDate}.json`);
    await writeJson(path, { date: compactDate, signals });
    return path;
  }

  async writePositions(compactDate: string, positions: readonly Position[], at: Date = new Date()): Promise<string> {
    const path = join(this.dataDir, `positions_${compactDate}.json`);
    await writeJson(path, { date: compactDate, at: at.toISOString(), positions });
    return path;
  }
}

async function writeJson(path: string, value: unknown): Promise<void> {
  const tmp = `${path}.tmp`;
  try {
    await mkdir(join(path, ".."), { recursive: true });
    await writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
    await rename(tmp, path);
  } catch (err) {
    throw new TradingError("FILE_WRITE_FAILED", `Failed to write ${path}`, { cause: err });
  }
}
