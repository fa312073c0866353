export type Side = "BUY" | "SELL";
export type OrderType = "MARKET" | "LIMIT";
export type OrderStatus =
  | "PENDING"
  | "SUBMITTED"
  | "PARTIALLY_FILLED"
  | "FILLED"
  | "REJECTED"
  | "CANCELLED"
  | "FAILED";

export type OptionType = "CE" | "PE";
export type Bias = OptionType | "NO_TRADE";

export type InstrumentKind =
  | "INDEX"
  | "STOCK"
  | "INDEX_FUT"
  | "STOCK_FUT"
  | "INDEX_OPT"
  | "STOCK_OPT"
  | "OTHER";

export interface Bar {
  timestamp: string; // ISO-8601 UTC of the bar boundary
  timestampMs: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  complete: boolean;
}

export interface Tick {
  symbol: string;
  token: string;
  lastPrice: number;
  bid: number | null;
  ask: number | null;
  volume: number;
  timestampMs: number;
}

export interface Instrument {
  token: string;
  symbol: string;
  underlying: string;
  expiry: string | null; // YYYY-MM-DD
  strike: number | null;
  lotSize: number;
  kind: InstrumentKind;
  optionType: OptionType | null;
  exchange: string;
  tickSize: number;
}

export interface OrderIntent {
  intentId: string;
  symbol: string;
  token: string;
  exchange: string;
  side: Side;
  quantity: number;
  initialLimitPrice: number;
  idempotencyKey: string;
}

export interface Order extends OrderIntent {
  orderId: string;
  brokerOrderId: string | null;
  status: OrderStatus;
  attempts: number;
  currentLimitPrice: number;
  fillPrice: number | null;
  fillQuantity: number;
  fillTime: string | null;
  rejectedReason: string | null;
  createdAt: string;
  updatedAt: string;
}

export type PositionStatus = "OPEN" | "CLOSING" | "CLOSED";

export type ExitReason =
  | "STOP_LOSS"
  | "TRAILING_STOP"
  | "TARGET"
  | "ALIGNMENT_LOST"
  | "VIX_SPIKE"
  | "DAILY_LOSS_LIMIT"
  | "EOD_MANDATORY_EXIT"
  | "SESSION_CLOSE"
  | "TOKEN_EXPIRY"
  | "KILL_SWITCH"
  | "SHUTDOWN";

export interface Position {
  positionId: string;
  symbol: string;
  token: string;
  underlying: string;
  strike: number;
  optionType: OptionType;
  side: Side;
  quantity: number;
  entryPrice: number;
  entryTime: string;
  underlyingEntry: number;
  stopLoss: number;
  target: number | null;
  trailStop: number | null;
  trailActive: boolean;
  currentPrice: number;
  pnl: number;
  pnlPct: number;
  highWater: number;
  lowWater: number;
  vixAtEntry: number | null;
  status: PositionStatus;
  entryReason: string;
  idempotencyKey: string;
}

export interface Trade {
  positionId: string;
  symbol: string;
  underlying: string;
  strike: number;
  optionType: OptionType;
  side: Side;
  quantity: number;
  entryPrice: number;
  entryTime: string;
  entryReason: string;
  exitPrice: number;
  exitTime: string;
  exitReason: ExitReason;
  secondaryReasons: ExitReason[];
  grossPnl: number;
  grossPnlPct: number;
  brokerage: number;
  netPnl: number;
  durationSec: number;
  highWater: number;
  lowWater: number;
  vixEntry: number | null;
  vixExit: number | null;
  idempotencyKey: string;
}

export interface EntrySignal {
  underlying: string;
  bias: OptionType;
  underlyingLtp: number;
  strike: number;
  optionType: OptionType;
  side: Side;
  reason: string;
  generatedAt: string;
}

export interface DirectionalIndex {
  adx: number;
  plusDi: number;
  minusDi: number;
}
