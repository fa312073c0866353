import { Timeframe } from "../data/timeframe.js";
import { Bar, OrderStatus, OrderType, Side, Tick } from "../types.js";

export interface SessionInfo {
  userId: string | null;
  accessToken: string;
  /** ISO-8601; null when the broker does not say. */
  expiresAt: string | null;
}

export interface PlaceOrderRequest {
  symbol: string;
  token: string;
  exchange: string;
  side: Side;
  orderType: OrderType;
  quantity: number;
  price: number;
}

export interface PlacedOrder {
  brokerOrderId: string;
  /** Average fill price when the broker already reports the order complete. */
  averagePrice: number | null;
  filledQuantity: number;
}

export interface BrokerOrderStatus {
  brokerOrderId: string;
  status: OrderStatus;
  averagePrice: number | null;
  filledQuantity: number;
  message: string | null;
}

export type TickListener = (tick: Tick) => void;

/** Everything the engine needs from a broker: auth, orders, market data. */
export interface BrokerGateway {
  readonly name: string;
  authenticate(): Promise<SessionInfo>;
  placeOrder(req: PlaceOrderRequest): Promise<PlacedOrder>;
  orderStatus(brokerOrderId: string): Promise<BrokerOrderStatus>;
  historicalCandles(token: string, timeframe: Timeframe, from: Date, to: Date): Promise<Bar[]>;
  ltp(token: string): Promise<number>;
  subscribe(tokens: string[], exchange: string): Promise<void>;
  onTick(listener: TickListener): () => void;
  availableFunds(): Promise<number>;
  close(): Promise<void>;
}
