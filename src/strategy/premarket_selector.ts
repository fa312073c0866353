import { InstrumentDirectory } from "../broker/instrument_directory.js";
import { Instrument, OptionType } from "../types.js";
import { atmStrike } from "../utils/indicators.js";
import { DAY_MS, parseDateIST, tradeDateIST } from "../utils/ist_time.js";
import { DailyBias } from "./daily_bias.js";

export interface PreselectedOption {
  underlying: string;
  spotToken: string;
  bias: OptionType;
  closePrice: number;
  atmStrike: number;
  distanceFromPrice: number;
  ceToken: string | null;
  ceSymbol: string | null;
  peToken: string | null;
  peSymbol: string | null;
  lotSize: number;
  expiry: string;
}

const STRIKE_INCREMENTS: Readonly<Record<string, number>> = {
  NIFTY: 50,
  FINNIFTY: 50,
  BANKNIFTY: 100
};

const INDEX_UNDERLYINGS = new Set(["NIFTY", "BANKNIFTY", "FINNIFTY", "MIDCPNIFTY"]);

export const MIN_DTE_INDEX = 2;
export const MIN_DTE_STOCK = 7;

/** Gap between the two lowest distinct listed strikes. */
export function detectStrikeIncrement(options: readonly Instrument[]): number | null {
  const strikes = Array.from(
    new Set(options.flatMap((o) => (o.strike === null ? [] : [o.strike])))
  ).sort((a, b) => a - b);
  return strikes.length >= 2 ? strikes[1] - strikes[0] : null;
}

/**
 * Nearest expiry at least MIN_DTE_INDEX (indices) or MIN_DTE_STOCK (stocks)
 * calendar days out; the farthest listed expiry when every one is closer.
 */
export function selectExpiry(underlying: string, expiries: readonly string[], today: string): string | null {
  const sorted = Array.from(new Set(expiries)).sort();
  const minDte = INDEX_UNDERLYINGS.has(underlying.toUpperCase()) ? MIN_DTE_INDEX : MIN_DTE_STOCK;
  const todayMs = parseDateIST(today);
  for (const expiry of sorted) {
    const dte = Math.round((parseDateIST(expiry) - todayMs) / DAY_MS);
    if (dte >= minDte) {
      return expiry;
    }
  }
  const farthest = sorted[sorted.length - 1];
  if (farthest === undefined) {
    return null;
  }
  console.warn("EXPIRY_FALLBACK", underlying, farthest, `min_dte=${minDte}`);
  return farthest;
}

/** Token and symbol of the contract on the bias side, when it is listed. */
export function tradeableOption(option: PreselectedOption): { token: string; symbol: string } | null {
  const token = option.bias === "CE" ? option.ceToken : option.peToken;
  const symbol = option.bias === "CE" ? option.ceSymbol : option.peSymbol;
  return token !== null && symbol !== null ? { token, symbol } : null;
}

/** Picks the ATM CE/PE pair for each directional bias from the previous close. */
export class PremarketSelector {
  constructor(
    private instruments: InstrumentDirectory,
    private defaultIncrement: number,
    private now: () => Date = () => new Date()
  ) {}

  strikeIncrement(underlying: string, options: readonly Instrument[]): number {
    return STRIKE_INCREMENTS[underlying.toUpperCase()] ?? detectStrikeIncrement(options) ?? this.defaultIncrement;
  }

  select(bias: DailyBias): PreselectedOption | null {
    const side = bias.bias;
    if (side === "NO_TRADE") {
      return null;
    }
    const options = this.instruments.optionsFor(bias.underlying);
    const strike = atmStrike(bias.closePrice, this.strikeIncrement(bias.underlying, options));
    if (strike === null) {
      return null;
    }
    const expiry = selectExpiry(
      bias.underlying,
      options.flatMap((o) => (o.expiry === null ? [] : [o.expiry])),
      tradeDateIST(this.now())
    );
    if (expiry === null) {
      console.warn("PRESELECT_SKIPPED", bias.underlying, "no listed expiry");
      return null;
    }
    const atm = options.filter((o) => o.strike === strike && o.expiry === expiry);
    const first = atm[0];
    if (!first) {
      console.warn("PRESELECT_SKIPPED", bias.underlying, `no ${strike} strike for ${expiry}`);
      return null;
    }
    const ce = atm.find((o) => o.optionType === "CE");
    const pe = atm.find((o) => o.optionType === "PE");
    console.log("PRESELECTED", bias.underlying, side, strike, expiry);
    return {
      underlying: bias.underlying,
      spotToken: bias.spotToken,
      bias: side,
      closePrice: bias.closePrice,
      atmStrike: strike,
      distanceFromPrice: Math.abs(strike - bias.closePrice),
      ceToken: ce?.token ?? null,
      ceSymbol: ce?.symbol ?? null,
      peToken: pe?.token ?? null,
      peSymbol: pe?.symbol ?? null,
      lotSize: first.lotSize,
      expiry
    };
  }

  selectAll(biases: readonly DailyBias[]): PreselectedOption[] {
    const selected: PreselectedOption[] = [];
    for (const bias of biases) {
      const option = this.select(bias);
      if (option) {
        selected.push(option);
      }
    }
    const ce = selected.filter((o) => o.bias === "CE").length;
    console.log("PRESELECT_DONE", selected.length, `ce=${ce}`, `pe=${selected.length - ce}`);
    return selected;
  }
}
