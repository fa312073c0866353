import { Bar, Bias } from "../types.js";
import { asyncPool } from "../utils/async_pool.js";
import { adx } from "../utils/indicators.js";
import { directionFromAdx } from "./adx_strategy.js";

export interface BiasTarget {
  underlying: string;
  spotToken: string;
}

export interface DailyBias {
  underlying: string;
  spotToken: string;
  bias: Bias;
  adx: number;
  plusDi: number;
  minusDi: number;
  closePrice: number;
  barTime: string;
}

export interface BiasSummary {
  total: number;
  ce: number;
  pe: number;
  noTrade: number;
}

export type DailyBarLoader = (target: BiasTarget) => Promise<Bar[]>;

/** Per-underlying daily ADX bias across many F&O names. */
export class DailyBiasCalculator {
  constructor(
    private adxPeriod: number,
    private adxThreshold: number,
    private concurrency = 4
  ) {}

  calculateBias(target: BiasTarget, bars: readonly Bar[]): DailyBias | null {
    const di = adx(bars, this.adxPeriod);
    const last = bars[bars.length - 1];
    if (!di || !last) {
      console.warn("BIAS_SKIPPED", target.underlying, `bars=${bars.length}`);
      return null;
    }
    return {
      underlying: target.underlying,
      spotToken: target.spotToken,
      bias: directionFromAdx(di, this.adxThreshold),
      adx: di.adx,
      plusDi: di.plusDi,
      minusDi: di.minusDi,
      closePrice: last.close,
      barTime: last.timestamp
    };
  }

  async calculateAll(targets: BiasTarget[], loadBars: DailyBarLoader): Promise<DailyBias[]> {
    console.log("BIAS_CALC_START", targets.length);
    const outcomes = await asyncPool(targets, this.concurrency, async (target) =>
      this.calculateBias(target, await loadBars(target))
    );
    const results: DailyBias[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        console.warn("BIAS_FETCH_FAIL", outcome.item.underlying, outcome.error);
        continue;
      }
      if (outcome.value) {
        results.push(outcome.value);
      }
    }
    console.log("BIAS_CALC_DONE", `${results.length}/${targets.length}`);
    return results;
  }
}

export function filterByBias(biases: readonly DailyBias[], bias: Bias): DailyBias[] {
  return biases.filter((b) => b.bias === bias);
}

export function biasSummary(biases: readonly DailyBias[]): BiasSummary {
  return {
    total: biases.length,
    ce: biases.filter((b) => b.bias === "CE").length,
    pe: biases.filter((b) => b.bias === "PE").length,
    noTrade: biases.filter((b) => b.bias === "NO_TRADE").length
  };
}
