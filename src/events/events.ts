import { randomUUID } from "node:crypto";
import { Bias, ExitReason, OptionType, OrderStatus, Side } from "../types.js";

export interface OpenedPositionPayload {
  position_id: string;
  symbol: string;
  token: string;
  underlying: string;
  strike: number;
  option_type: OptionType;
  side: Side;
  quantity: number;
  entry_price: number;
  entry_time: string;
  underlying_entry: number;
  stop_loss: number;
  target: number | null;
  entry_reason: string;
  idempotency_key: string;
  vix_at_entry: number | null;
}

/** Payload carried by each event kind; keys are serialized as-is into the event log. */
export interface EventPayloads {
  LOG_INITIALIZED: { log_path: string };
  CONFIG_LOADED: { underlying: string; paper_trading: boolean };
  BROKER_CLIENT_READY: { broker: string; user_id: string | null };
  TRADING_DAY_CHECK: { date: string; is_trading_day: boolean };
  MARKET_OPEN: { date: string; open_at: string; close_at: string };
  TOKEN_EXPIRY_WARNING: { expires_at: string; minutes_left: number };
  INSTRUMENT_MASTER_DOWNLOADED: { count: number };
  WEBSOCKET_CONNECTED: { url: string; tokens: string[] };
  WEBSOCKET_DISCONNECTED: { code: number; reason: string };
  BAR_READY: { symbol: string; timeframe: string; bar_time: string; bar_complete: boolean };
  DATA_GAP_DETECTED: { symbol: string; timeframe: string; gap_sec: number | null };
  RECOVERY_STARTED: { symbol: string; timeframe: string; from: string; to: string };
  RECOVERY_COMPLETED: {
    symbol: string;
    timeframe: string;
    bars_recovered: number;
    duration_ms: number;
  };
  DATA_READY: { symbol: string; daily_bars: number; hourly_bars: number };
  DAILY_DIRECTION_DETERMINED: {
    underlying: string;
    direction: Bias;
    adx: number | null;
    plus_di: number | null;
    minus_di: number | null;
  };
  HOURLY_ALIGNMENT_CONFIRMED: {
    underlying: string;
    direction: OptionType;
    adx: number;
    plus_di: number;
    minus_di: number;
  };
  ALIGNMENT_LOST: {
    underlying: string;
    direction: OptionType;
    plus_di: number | null;
    minus_di: number | null;
    reason: string;
  };
  ENTRY_FILTERS_EVALUATED: {
    underlying: string;
    passed: boolean;
    failed_filter: string | null;
    rsi: number | null;
    ema: number | null;
    close: number | null;
    vix: number;
  };
  SIGNAL_GENERATED: {
    underlying: string;
    option_type: OptionType;
    strike: number;
    underlying_ltp: number;
    side: Side;
    reason: string;
  };
  NO_TRADE_SIGNAL: { underlying: string; reason: string };
  VIX_DATA_RECEIVED: { vix: number };
  VIX_SPIKE: { vix: number; threshold: number; positions_to_exit: string[] };
  VIX_NORMAL_RESUMED: { vix: number; threshold: number };
  DAILY_LOSS_LIMIT_BREACHED: {
    daily_pnl: number;
    loss_pct: number;
    limit_pct: number;
    positions_to_exit: string[];
  };
  RISK_CHECK_PASSED: { underlying: string; open_positions: number };
  RISK_CHECK_FAILED: { underlying: string; reason: string; code: string };
  ORDER_INTENT_CREATED: {
    order_id: string;
    symbol: string;
    side: Side;
    quantity: number;
    price: number;
    idempotency_key: string;
  };
  ORDER_PLACED: {
    order_id: string;
    broker_order_id: string;
    symbol: string;
    price: number;
    attempt: number;
  };
  ORDER_EXECUTED: {
    order_id: string;
    fill_price: number;
    fill_quantity: number;
    status: OrderStatus;
  };
  ORDER_PARTIALLY_FILLED: {
    order_id: string;
    fill_price: number;
    fill_quantity: number;
    remaining: number;
  };
  ORDER_REJECTED: { order_id: string; reason: string };
  ORDER_FAILED: { order_id: string; attempts: number; error: string };
  ORDER_RETRYING: {
    order_id: string;
    attempt: number;
    max_retries: number;
    backoff_sec: number;
    price: number;
  };
  POSITION_OPENED: OpenedPositionPayload;
  POSITION_UPDATED: {
    position_id: string;
    current_price: number;
    pnl: number;
    pnl_pct: number;
    trail_stop: number | null;
  };
  EXIT_SIGNAL_GENERATED: {
    position_id: string;
    primary_reason: ExitReason;
    secondary_reasons: ExitReason[];
    priority: number;
  };
  STOP_LOSS_TRIGGERED: { position_id: string; current_price: number; stop_loss: number };
  TRAILING_STOP_ACTIVATED: {
    position_id: string;
    current_price: number;
    trail_stop: number;
    pnl_pct: number;
  };
  TRAILING_STOP_UPDATED: {
    position_id: string;
    previous_trail_stop: number;
    trail_stop: number;
    current_price: number;
  };
  TARGET_REACHED: { position_id: string; current_price: number; target: number };
  EOD_MANDATORY_EXIT: { positions: string[]; at: string };
  POSITION_CLOSED: {
    position_id: string;
    exit_price: number;
    exit_reason: ExitReason;
    pnl_gross: number;
    pnl_gross_pct: number;
    pnl_net: number;
  };
  POSITIONS_CLOSED: { count: number; reason: ExitReason; daily_pnl: number };
  GRACEFUL_SHUTDOWN_INITIATED: { reason: string };
  SHUTDOWN_COMPLETED: { trades: number; daily_pnl: number };
  FATAL_ERROR: { code: string; message: string };
  KILL_SWITCH_ACTIVATED: { reason: string };
}

export type EventKind = keyof EventPayloads;

export const EVENT_KINDS = [
  "LOG_INITIALIZED",
  "CONFIG_LOADED",
  "BROKER_CLIENT_READY",
  "TRADING_DAY_CHECK",
  "MARKET_OPEN",
  "TOKEN_EXPIRY_WARNING",
  "INSTRUMENT_MASTER_DOWNLOADED",
  "WEBSOCKET_CONNECTED",
  "WEBSOCKET_DISCONNECTED",
  "BAR_READY",
  "DATA_GAP_DETECTED",
  "RECOVERY_STARTED",
  "RECOVERY_COMPLETED",
  "DATA_READY",
  "DAILY_DIRECTION_DETERMINED",
  "HOURLY_ALIGNMENT_CONFIRMED",
  "ALIGNMENT_LOST",
  "ENTRY_FILTERS_EVALUATED",
  "SIGNAL_GENERATED",
  "NO_TRADE_SIGNAL",
  "VIX_DATA_RECEIVED",
  "VIX_SPIKE",
  "VIX_NORMAL_RESUMED",
  "DAILY_LOSS_LIMIT_BREACHED",
  "RISK_CHECK_PASSED",
  "RISK_CHECK_FAILED",
  "ORDER_INTENT_CREATED",
  "ORDER_PLACED",
  "ORDER_EXECUTED",
  "ORDER_PARTIALLY_FILLED",
  "ORDER_REJECTED",
  "ORDER_FAILED",
  "ORDER_RETRYING",
  "POSITION_OPENED",
  "POSITION_UPDATED",
  "EXIT_SIGNAL_GENERATED",
  "STOP_LOSS_TRIGGERED",
  "TRAILING_STOP_ACTIVATED",
  "TRAILING_STOP_UPDATED",
  "TARGET_REACHED",
  "EOD_MANDATORY_EXIT",
  "POSITION_CLOSED",
  "POSITIONS_CLOSED",
  "GRACEFUL_SHUTDOWN_INITIATED",
  "SHUTDOWN_COMPLETED",
  "FATAL_ERROR",
  "KILL_SWITCH_ACTIVATED"
] as const satisfies readonly EventKind[];

export interface TradingEvent<K extends EventKind = EventKind> {
  kind: K;
  timestamp: string;
  timestamp_ms: number;
  idempotency_key: string;
  payload: EventPayloads[K];
}

export type EventHandler<K extends EventKind = EventKind> = (
  event: TradingEvent<K>
) => void | Promise<void>;

export function createEvent<K extends EventKind>(
  kind: K,
  payload: EventPayloads[K],
  opts: { idempotencyKey?: string; now?: Date } = {}
): TradingEvent<K> {
  const now = opts.now ?? new Date();
  const ms = now.getTime();
  return {
    kind,
    timestamp: now.toISOString(),
    timestamp_ms: ms,
    idempotency_key: opts.idempotencyKey ?? `${kind}:${ms}:${randomUUID()}`,
    payload
  };
}

export function isEventOf<K extends EventKind>(
  event: TradingEvent,
  kind: K
): event is TradingEvent<K> {
  return event.kind === kind;
}
