import { randomUUID } from "node:crypto";
import { Timeframe } from "../data/timeframe.js";
import { TradingError } from "../errors/trading_error.js";
import { roundToTick } from "../oms/order_manager.js";
import { Bar } from "../types.js";
import {
  BrokerGateway,
  BrokerOrderStatus,
  PlacedOrder,
  PlaceOrderRequest,
  SessionInfo,
  TickListener
} from "./broker_gateway.js";

export interface PaperBrokerOptions {
  slippageBps: number;
  tickSize: number;
  startingFunds: number;
  /** Real gateway used for market data only; orders never reach it. */
  marketData?: BrokerGateway | null;
}

/**
 * Simulated execution: every LIMIT order fills immediately at its price moved
 * against the trader by `slippageBps`. Market data comes from the wrapped
 * gateway when there is one, otherwise from prices set with `setLtp`.
 */
export class PaperBroker implements BrokerGateway {
  readonly name = "paper";
  private orders = new Map<string, BrokerOrderStatus>();
  private prices = new Map<string, number>();
  private listeners = new Set<TickListener>();
  private funds: number;
  private marketData: BrokerGateway | null;

  constructor(private opts: PaperBrokerOptions) {
    this.funds = opts.startingFunds;
    this.marketData = opts.marketData ?? null;
  }

  async authenticate(): Promise<SessionInfo> {
    if (this.marketData) {
      return this.marketData.authenticate();
    }
    return { userId: "PAPER", accessToken: "paper", expiresAt: null };
  }

  async placeOrder(req: PlaceOrderRequest): Promise<PlacedOrder> {
    if (req.quantity <= 0 || req.price <= 0) {
      throw new TradingError("ORDER_REJECTED", `Paper order needs positive quantity and price`);
    }
    const slip = this.opts.slippageBps / 10_000;
    const raw = req.side === "BUY" ? req.price * (1 + slip) : req.price * (1 - slip);
    const fill = roundToTick(raw, this.opts.tickSize);
    const brokerOrderId = `PAPER_${randomUUID()}`;
    this.funds += (req.side === "BUY" ? -1 : 1) * fill * req.quantity;
    this.orders.set(brokerOrderId, {
      brokerOrderId,
      status: "FILLED",
      averagePrice: fill,
      filledQuantity: req.quantity,
      message: null
    });
    console.log("PAPER_FILL", brokerOrderId, req.side, req.symbol, req.quantity, fill.toFixed(2));
    return { brokerOrderId, averagePrice: fill, filledQuantity: req.quantity };
  }

  async orderStatus(brokerOrderId: string): Promise<BrokerOrderStatus> {
    const order = this.orders.get(brokerOrderId);
    if (!order) {
      throw new TradingError("ORDER_NOT_FOUND", `Paper order not found: ${brokerOrderId}`);
    }
    return { ...order };
  }

  async historicalCandles(token: string, timeframe: Timeframe, from: Date, to: Date): Promise<Bar[]> {
    return this.requireMarketData().historicalCandles(token, timeframe, from, to);
  }

  async ltp(token: string): Promise<number> {
    const local = this.prices.get(token);
    if (local !== undefined) {
      return local;
    }
    return this.requireMarketData().ltp(token);
  }

  async subscribe(tokens: string[], exchange: string): Promise<void> {
    if (this.marketData) {
      await this.marketData.subscribe(tokens, exchange);
    }
  }

  onTick(listener: TickListener): () => void {
    this.listeners.add(listener);
    const upstream = this.marketData?.onTick(listener) ?? null;
    return () => {
      this.listeners.delete(listener);
      upstream?.();
    };
  }

  async availableFunds(): Promise<number> {
    return this.funds;
  }

  async close(): Promise<void> {
    this.listeners.clear();
    if (this.marketData) {
      await this.marketData.close();
    }
  }

  /** Pins a price for `token`; also pushed to tick listeners. */
  setLtp(token: string, price: number, timestampMs: number = Date.now()): void {
    this.prices.set(token, price);
    for (const listener of this.listeners) {
      listener({ symbol: token, token, lastPrice: price, bid: null, ask: null, volume: 0, timestampMs });
    }
  }

  private requireMarketData(): BrokerGateway {
    if (!this.marketData) {
      throw new TradingError("MISSING_DATA", "Paper broker has no market-data source");
    }
    return this.marketData;
  }
}
