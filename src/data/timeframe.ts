import { TradingError } from "../errors/trading_error.js";
import { DAY_MS, IST_OFFSET_MS } from "../utils/ist_time.js";

export const TIMEFRAMES = ["1m", "5m", "15m", "1h", "1d"] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

const DURATION_MS: Record<Timeframe, number> = {
  "1m": 60_000,
  "5m": 5 * 60_000,
  "15m": 15 * 60_000,
  "1h": 60 * 60_000,
  "1d": DAY_MS
};

// Interval names used by the Kite historical candles endpoint.
const KITE_INTERVAL: Record<Timeframe, string> = {
  "1m": "minute",
  "5m": "5minute",
  "15m": "15minute",
  "1h": "60minute",
  "1d": "day"
};

export function isTimeframe(value: string): value is Timeframe {
  return TIMEFRAMES.some((tf) => tf === value);
}

export function parseTimeframe(value: string): Timeframe {
  const normalized = value.trim().toLowerCase();
  if (isTimeframe(normalized)) {
    return normalized;
  }
  throw new TradingError("INVALID_PARAMETER", `Unknown timeframe: ${value}`);
}

export function timeframeMs(tf: Timeframe): number {
  return DURATION_MS[tf];
}

export function kiteInterval(tf: Timeframe): string {
  return KITE_INTERVAL[tf];
}

/**
 * Start of the bar containing `timestampMs`: the interval floor taken on the
 * IST wall clock (daily bars start at IST midnight), returned as UTC epoch ms.
 * Hourly bars therefore start at 09:00, 10:00, ... IST, not at 09:15.
 */
export function barBoundary(timestampMs: number, tf: Timeframe): number {
  const size = DURATION_MS[tf];
  const local = timestampMs + IST_OFFSET_MS;
  return Math.floor(local / size) * size - IST_OFFSET_MS;
}
