import { LimitsConfig } from "../config/config.js";
import { TradingError } from "../errors/trading_error.js";
import { Instrument } from "../types.js";

const TICK_TOLERANCE = 1e-3;

export interface MarketHours {
  isMarketOpen(now: Date): boolean;
}

export interface OrderCheck {
  symbol: string;
  quantity: number;
  price: number;
  instrument: Instrument;
  /** Price the band is centred on, normally the option's last traded price. */
  referencePrice: number;
  accountBalance: number;
  now?: Date;
}

/**
 * Pre-trade checks, run in a fixed order; the first failing one throws a
 * TradingError whose kind names the breach.
 */
export class OrderValidator {
  constructor(
    private limits: LimitsConfig,
    private hours: MarketHours
  ) {}

  validate(check: OrderCheck): void {
    const { symbol, quantity, price, instrument } = check;
    this.checkFreezeQuantity(quantity, instrument.underlying);
    this.checkLotSize(quantity, instrument.lotSize);
    this.checkTickSize(price, instrument.tickSize > 0 ? instrument.tickSize : this.limits.tickSize);
    this.checkPriceBand(price, check.referencePrice);
    this.checkMargin(quantity, price, check.accountBalance);
    this.checkSymbol(symbol, instrument);
    this.checkMarketOpen(check.now ?? new Date());
    if (quantity <= 0) {
      throw new TradingError("INVALID_PARAMETER", `Quantity must be positive, got ${quantity}`);
    }
    if (price <= 0) {
      throw new TradingError("INVALID_PARAMETER", `Price must be positive, got ${price}`);
    }
  }

  freezeLimit(underlying: string): number {
    return this.limits.freezeQuantity[underlying.toUpperCase()] ?? this.limits.defaultFreezeQuantity;
  }

  private checkFreezeQuantity(quantity: number, underlying: string) {
    const limit = this.freezeLimit(underlying);
    if (quantity > limit) {
      throw new TradingError(
        "FREEZE_QUANTITY_BREACH",
        `Quantity ${quantity} exceeds freeze limit ${limit} for ${underlying}`
      );
    }
  }

  private checkLotSize(quantity: number, lotSize: number) {
    if (!Number.isInteger(quantity) || lotSize <= 0 || quantity % lotSize !== 0) {
      throw new TradingError(
        "INVALID_PARAMETER",
        `Quantity ${quantity} is not a multiple of lot size ${lotSize}`
      );
    }
  }

  private checkTickSize(price: number, tickSize: number) {
    const rem = Math.abs(price % tickSize);
    if (rem > TICK_TOLERANCE && tickSize - rem > TICK_TOLERANCE) {
      throw new TradingError(
        "INVALID_PARAMETER",
        `Price ${price} is not a multiple of tick size ${tickSize}`
      );
    }
  }

  private checkPriceBand(price: number, reference: number) {
    const deviation = reference * (this.limits.priceBandPct / 100);
    const upper = reference + deviation;
    const lower = Math.max(0, reference - deviation);
    if (price > upper || price < lower) {
      throw new TradingError(
        "PRICE_BAND_BREACH",
        `Price ${price} outside bands [${lower.toFixed(2)}, ${upper.toFixed(2)}]`
      );
    }
  }

  private checkMargin(quantity: number, price: number, balance: number) {
    const premium = quantity * price;
    const required = premium * (1 + this.limits.marginBufferPct / 100);
    if (required > balance) {
      throw new TradingError(
        "INSUFFICIENT_MARGIN",
        `Required: ${required.toFixed(2)}, Available: ${balance.toFixed(2)}`
      );
    }
  }

  private checkSymbol(symbol: string, instrument: Instrument) {
    if (symbol !== instrument.symbol) {
      throw new TradingError(
        "INVALID_PARAMETER",
        `Symbol mismatch: ${symbol} != ${instrument.symbol}`
      );
    }
  }

  private checkMarketOpen(now: Date) {
    if (!this.hours.isMarketOpen(now)) {
      throw new TradingError("MARKET_CLOSED", "Market is closed");
    }
  }
}
