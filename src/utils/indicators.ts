import { Bar, DirectionalIndex } from "../types.js";

// Every indicator returns null when the input is too short or a division by
// zero would be needed; callers treat null as "no reading".

export function closes(bars: readonly Bar[]): number[] {
  return bars.map((bar) => bar.close);
}

export function sma(values: readonly number[], period: number = values.length): number | null {
  if (period < 1 || values.length < period) {
    return null;
  }
  let sum = 0;
  for (let i = values.length - period; i < values.length; i += 1) {
    sum += values[i];
  }
  return sum / period;
}

export function ema(values: readonly number[], period: number): number | null {
  if (period < 1 || values.length < period) {
    return null;
  }
  const alpha = 2 / (period + 1);
  let current = mean(values, 0, period);
  for (let i = period; i < values.length; i += 1) {
    current = values[i] * alpha + current * (1 - alpha);
  }
  return current;
}

export function rsi(values: readonly number[], period: number): number | null {
  if (period < 1 || values.length < period + 1) {
    return null;
  }

  let gains = 0;
  let losses = 0;
  for (let i = 1; i <= period; i += 1) {
    const delta = values[i] - values[i - 1];
    gains += Math.max(delta, 0);
    losses += Math.max(-delta, 0);
  }

  let avgGain = gains / period;
  let avgLoss = losses / period;

  for (let i = period + 1; i < values.length; i += 1) {
    const delta = values[i] - values[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(delta, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-delta, 0)) / period;
  }

  if (avgLoss === 0) {
    return 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function atr(bars: readonly Bar[], period: number): number | null {
  if (period < 1 || bars.length < period + 1) {
    return null;
  }
  const trueRanges: number[] = [];
  for (let i = 1; i < bars.length; i += 1) {
    trueRanges.push(trueRange(bars[i], bars[i - 1]));
  }
  let value = mean(trueRanges, 0, period);
  for (let i = period; i < trueRanges.length; i += 1) {
    value = wilder(value, trueRanges[i], period);
  }
  return value;
}

/**
 * Wilder's ADX with +DI / -DI. TR, +DM and -DM are smoothed with an
 * SMA-seeded Wilder recursion; DX is then smoothed the same way. When fewer
 * than `period` DX readings exist the seed is the mean of those available, so
 * exactly `period + 1` bars yield ADX equal to the single DX.
 */
export function adx(bars: readonly Bar[], period: number): DirectionalIndex | null {
  if (period < 1 || bars.length < period + 1) {
    return null;
  }

  const tr: number[] = [];
  const plusDm: number[] = [];
  const minusDm: number[] = [];
  for (let i = 1; i < bars.length; i += 1) {
    const cur = bars[i];
    const prev = bars[i - 1];
    const up = cur.high - prev.high;
    const down = prev.low - cur.low;
    tr.push(trueRange(cur, prev));
    plusDm.push(up > down && up > 0 ? up : 0);
    minusDm.push(down > up && down > 0 ? down : 0);
  }

  let sTr = mean(tr, 0, period);
  let sPlus = mean(plusDm, 0, period);
  let sMinus = mean(minusDm, 0, period);

  const dx: number[] = [];
  let plusDi = 0;
  let minusDi = 0;
  let defined = false;

  for (let i = period - 1; i < tr.length; i += 1) {
    if (i >= period) {
      sTr = wilder(sTr, tr[i], period);
      sPlus = wilder(sPlus, plusDm[i], period);
      sMinus = wilder(sMinus, minusDm[i], period);
    }
    if (sTr === 0) {
      defined = false;
      dx.push(0);
      continue;
    }
    plusDi = (100 * sPlus) / sTr;
    minusDi = (100 * sMinus) / sTr;
    const diSum = plusDi + minusDi;
    defined = diSum !== 0;
    dx.push(defined ? (100 * Math.abs(plusDi - minusDi)) / diSum : 0);
  }

  if (!defined) {
    return null;
  }

  const seedLength = Math.min(period, dx.length);
  let adxValue = mean(dx, 0, seedLength);
  for (let i = seedLength; i < dx.length; i += 1) {
    adxValue = wilder(adxValue, dx[i], period);
  }
  return { adx: adxValue, plusDi, minusDi };
}

export function vwap(bars: readonly Bar[]): number | null {
  let pv = 0;
  let volume = 0;
  for (const bar of bars) {
    const typical = (bar.high + bar.low + bar.close) / 3;
    pv += typical * bar.volume;
    volume += bar.volume;
  }
  if (volume === 0) {
    return null;
  }
  return pv / volume;
}

/** Floors a price to a multiple of the strike increment. */
export function roundToStrike(price: number, increment: number): number | null {
  if (!(increment > 0) || !Number.isFinite(price)) {
    return null;
  }
  return Math.floor(price / increment) * increment;
}

/** Strike nearest to the price (at-the-money). */
export function atmStrike(price: number, increment: number): number | null {
  if (!(increment > 0) || !Number.isFinite(price)) {
    return null;
  }
  return Math.round(price / increment) * increment;
}

function trueRange(cur: Bar, prev: Bar): number {
  return Math.max(
    cur.high - cur.low,
    Math.abs(cur.high - prev.close),
    Math.abs(cur.low - prev.close)
  );
}

function wilder(previous: number, value: number, period: number): number {
  return ((period - 1) * previous + value) / period;
}

function mean(values: readonly number[], from: number, count: number): number {
  let sum = 0;
  for (let i = from; i < from + count; i += 1) {
    sum += values[i];
  }
  return sum / count;
}
