import { TradingError } from "../errors/trading_error.js";
import { Bar, Bias, DirectionalIndex, OptionType } from "../types.js";
import { asyncPool } from "../utils/async_pool.js";
import { adx } from "../utils/indicators.js";
import { BiasTarget, DailyBias } from "./daily_bias.js";

export interface CrossoverSignal {
  underlying: string;
  spotToken: string;
  timestamp: string;
  direction: OptionType;
  adx: number;
  plusDi: number;
  minusDi: number;
  closePrice: number;
}

export type HourlyBarLoader = (target: BiasTarget, count: number) => Promise<Bar[]>;

/** +DI crossing above -DI is a call signal, the reverse a put signal. */
export function detectCrossover(
  prev: Pick<DirectionalIndex, "plusDi" | "minusDi">,
  cur: Pick<DirectionalIndex, "plusDi" | "minusDi">
): OptionType | null {
  if (prev.plusDi <= prev.minusDi && cur.plusDi > cur.minusDi) {
    return "CE";
  }
  if (prev.minusDi <= prev.plusDi && cur.minusDi > cur.plusDi) {
    return "PE";
  }
  return null;
}

/**
 * Watches hourly DI lines per underlying and reports crossovers that agree
 * with the day's bias. Readings under the ADX threshold leave the previous
 * DI state in place.
 */
export class HourlyCrossoverMonitor {
  private states = new Map<string, DirectionalIndex>();

  constructor(
    private adxPeriod: number,
    private adxThreshold: number,
    private loadBars: HourlyBarLoader,
    private concurrency = 4
  ) {}

  async check(target: BiasTarget, dailyBias: Bias): Promise<CrossoverSignal | null> {
    const bars = await this.loadBars(target, this.adxPeriod + 10);
    const last = bars[bars.length - 1];
    if (!last || bars.length < this.adxPeriod + 2) {
      console.warn("CROSSOVER_SKIPPED", target.underlying, `bars=${bars.length}`);
      return null;
    }
    const cur = adx(bars, this.adxPeriod);
    if (!cur) {
      throw new TradingError("INVALID_BAR", `ADX undefined over ${bars.length} hourly bars of ${target.underlying}`);
    }
    if (cur.adx < this.adxThreshold) {
      return null;
    }
    const prev = this.states.get(target.spotToken);
    this.states.set(target.spotToken, cur);
    const direction = prev ? detectCrossover(prev, cur) : null;
    if (direction === null) {
      return null;
    }
    if (direction !== dailyBias) {
      console.log("CROSSOVER_NOT_ALIGNED", target.underlying, `hourly=${direction}`, `daily=${dailyBias}`);
      return null;
    }
    console.log(
      "CROSSOVER_DETECTED",
      target.underlying,
      direction,
      last.timestamp,
      `adx=${cur.adx.toFixed(2)} +di=${cur.plusDi.toFixed(2)} -di=${cur.minusDi.toFixed(2)}`
    );
    return {
      underlying: target.underlying,
      spotToken: target.spotToken,
      timestamp: last.timestamp,
      direction,
      adx: cur.adx,
      plusDi: cur.plusDi,
      minusDi: cur.minusDi,
      closePrice: last.close
    };
  }

  async checkAll(biases: DailyBias[]): Promise<CrossoverSignal[]> {
    const outcomes = await asyncPool(biases, this.concurrency, async (bias) => this.check(bias, bias.bias));
    const signals: CrossoverSignal[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        console.warn("CROSSOVER_CHECK_FAIL", outcome.item.underlying, outcome.error);
        continue;
      }
      if (outcome.value) {
        signals.push(outcome.value);
      }
    }
    return signals;
  }

  clear(): void {
    this.states.clear();
  }
}
