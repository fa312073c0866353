import { TradingError } from "../errors/trading_error.js";
import { Instrument, InstrumentKind, OptionType } from "../types.js";
import { tradeDateIST } from "../utils/ist_time.js";

export interface InstrumentDirectory {
  refresh(): Promise<number>;
  findOption(underlying: string, strike: number, optionType: OptionType, expiry?: string | null): Instrument;
  optionsFor(underlying: string): Instrument[];
  underlyingToken(name: string): string;
  byToken(token: string): Instrument | null;
}

/** Fetches the raw instruments CSV for one exchange segment. */
export type InstrumentSource = (exchange: string) => Promise<string>;

// Index tokens on the NSE segment, used when the dump does not carry them.
const INDEX_TOKENS: Readonly<Record<string, string>> = {
  NIFTY: "256265",
  BANKNIFTY: "260105",
  FINNIFTY: "257801",
  MIDCPNIFTY: "288009",
  INDIAVIX: "264969"
};

const INDEX_NAMES: Readonly<Record<string, string>> = {
  "NIFTY 50": "NIFTY",
  "NIFTY BANK": "BANKNIFTY",
  "NIFTY FIN SERVICE": "FINNIFTY",
  "NIFTY MID SELECT": "MIDCPNIFTY",
  "INDIA VIX": "INDIAVIX"
};

const REQUIRED_COLUMNS = [
  "instrument_token",
  "tradingsymbol",
  "name",
  "expiry",
  "strike",
  "tick_size",
  "lot_size",
  "instrument_type",
  "segment",
  "exchange"
] as const;

type Column = (typeof REQUIRED_COLUMNS)[number];

function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let current = "";
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') {
      quoted = !quoted;
    } else if (ch === "," && !quoted) {
      out.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  out.push(current);
  return out;
}

function kindOf(instrumentType: string, segment: string, underlying: string): InstrumentKind {
  const index = underlying in INDEX_TOKENS;
  switch (instrumentType) {
    case "CE":
    case "PE":
      return index ? "INDEX_OPT" : "STOCK_OPT";
    case "FUT":
      return index ? "INDEX_FUT" : "STOCK_FUT";
    case "EQ":
      return segment === "INDICES" ? "INDEX" : "STOCK";
    default:
      return segment === "INDICES" ? "INDEX" : "OTHER";
  }
}

export function parseInstrumentsCsv(csv: string): Instrument[] {
  const lines = csv.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length < 2) {
    throw new TradingError("MISSING_DATA", "Kite instruments response is empty");
  }
  const header = splitCsvLine(lines[0]);
  const idx = new Map<Column, number>();
  for (const column of REQUIRED_COLUMNS) {
    const at = header.indexOf(column);
    if (at < 0) {
      throw new TradingError("DESERIALIZATION", `Kite instruments CSV missing column ${column}`);
    }
    idx.set(column, at);
  }

  const instruments: Instrument[] = [];
  for (let i = 1; i < lines.length; i += 1) {
    const cols = splitCsvLine(lines[i]);
    const get = (column: Column) => cols[idx.get(column) ?? -1] ?? "";
    const symbol = get("tradingsymbol");
    const token = get("instrument_token");
    if (!symbol || !token) {
      continue;
    }
    const instrumentType = get("instrument_type");
    const segment = get("segment");
    const rawName = get("name").toUpperCase();
    const underlying = INDEX_NAMES[rawName] ?? (rawName || symbol);
    const optionType: OptionType | null =
      instrumentType === "CE" || instrumentType === "PE" ? instrumentType : null;
    const strike = Number(get("strike"));
    instruments.push({
      token,
      symbol,
      underlying,
      expiry: get("expiry") || null,
      strike: optionType && Number.isFinite(strike) ? strike : null,
      lotSize: Number(get("lot_size")) || 1,
      kind: kindOf(instrumentType, segment, underlying),
      optionType,
      exchange: get("exchange"),
      tickSize: Number(get("tick_size")) || 0.05
    });
  }
  return instruments;
}

/** Option and index lookup over the Kite instrument dump. */
export class KiteInstrumentDirectory implements InstrumentDirectory {
  private options: Instrument[] = [];
  private tokens = new Map<string, Instrument>();
  private indexTokens = new Map<string, string>();

  constructor(
    private source: InstrumentSource,
    private exchanges: readonly string[] = ["NFO", "NSE"],
    private now: () => Date = () => new Date()
  ) {}

  async refresh(): Promise<number> {
    const loaded: Instrument[] = [];
    for (const exchange of this.exchanges) {
      const csv = await this.source(exchange);
      loaded.push(...parseInstrumentsCsv(csv));
    }
    this.load(loaded);
    console.log("INSTRUMENTS_LOADED", loaded.length, `options=${this.options.length}`);
    return loaded.length;
  }

  load(instruments: readonly Instrument[]): void {
    this.options = instruments.filter((i) => i.optionType !== null);
    this.tokens = new Map(instruments.map((i) => [i.token, i]));
    this.indexTokens = new Map(
      instruments.filter((i) => i.kind === "INDEX").map((i) => [i.underlying, i.token])
    );
  }

  size(): number {
    return this.tokens.size;
  }

  byToken(token: string): Instrument | null {
    return this.tokens.get(token) ?? null;
  }

  /** Exact contract when `expiry` is given, otherwise the nearest expiry not before today. */
  findOption(
    underlying: string,
    strike: number,
    optionType: OptionType,
    expiry: string | null = null
  ): Instrument {
    const name = underlying.toUpperCase();
    const today = tradeDateIST(this.now());
    const candidates = this.options
      .filter(
        (i) =>
          i.underlying === name &&
          i.optionType === optionType &&
          i.strike === strike &&
          i.expiry !== null &&
          (expiry === null ? i.expiry >= today : i.expiry === expiry)
      )
      .sort((a, b) => (a.expiry ?? "").localeCompare(b.expiry ?? ""));
    const match = candidates[0];
    if (!match) {
      throw new TradingError(
        "INSTRUMENT_NOT_FOUND",
        `No ${name} ${strike} ${optionType} option${expiry ? ` expiring ${expiry}` : ""}`
      );
    }
    return match;
  }

  /** Every listed option contract on the underlying, across strikes and expiries. */
  optionsFor(underlying: string): Instrument[] {
    const name = underlying.toUpperCase();
    return this.options.filter((i) => i.underlying === name);
  }

  underlyingToken(name: string): string {
    const key = name.toUpperCase().replace(/\s+/g, "");
    const token = this.indexTokens.get(key) ?? INDEX_TOKENS[key];
    if (!token) {
      throw new TradingError("INSTRUMENT_NOT_FOUND", `No index token for ${name}`);
    }
    return token;
  }
}
