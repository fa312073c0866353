export const ERROR_CODES = {
  AUTH_FAILED: "AUTH_001",
  TOKEN_EXPIRED: "AUTH_002",
  TOKEN_REFRESH_FAILED: "AUTH_003",
  HTTP_ERROR: "NET_001",
  WEBSOCKET_ERROR: "NET_002",
  WEBSOCKET_DISCONNECTED: "NET_003",
  NETWORK_TIMEOUT: "NET_004",
  DATA_GAP: "DATA_001",
  INVALID_BAR: "DATA_002",
  MISSING_DATA: "DATA_003",
  DESERIALIZATION: "DATA_004",
  ORDER_PLACEMENT_FAILED: "ORDER_001",
  ORDER_NOT_FOUND: "ORDER_002",
  ORDER_REJECTED: "ORDER_003",
  INSUFFICIENT_MARGIN: "ORDER_004",
  FREEZE_QUANTITY_BREACH: "ORDER_005",
  PRICE_BAND_BREACH: "ORDER_006",
  POSITION_NOT_FOUND: "POS_001",
  POSITION_LIMIT_EXCEEDED: "POS_002",
  DUPLICATE_POSITION: "POS_003",
  DAILY_LOSS_LIMIT: "RISK_001",
  VIX_SPIKE: "RISK_002",
  RISK_CHECK_FAILED: "RISK_003",
  INVALID_STRATEGY_STATE: "STRAT_001",
  NO_TRADE_SIGNAL: "STRAT_002",
  ALIGNMENT_LOST: "STRAT_003",
  CONFIG_ERROR: "CFG_001",
  INVALID_PARAMETER: "CFG_002",
  FILE_IO: "FILE_001",
  FILE_NOT_FOUND: "FILE_002",
  FILE_WRITE_FAILED: "FILE_003",
  MARKET_CLOSED: "MKT_001",
  OUTSIDE_ENTRY_WINDOW: "MKT_002",
  NON_TRADING_DAY: "MKT_003",
  BROKER_API: "BROKER_001",
  RATE_LIMIT_EXCEEDED: "BROKER_002",
  INSTRUMENT_NOT_FOUND: "BROKER_003",
  SYSTEM_SHUTDOWN: "SYS_001",
  FATAL: "SYS_002",
  GRACEFUL_EXIT: "SYS_003",
  EVENT_DISPATCH_FAILED: "EVENT_001",
  EVENT_HANDLER_ERROR: "EVENT_002",
  DUPLICATE_EVENT: "IDEM_001",
  IDEMPOTENCY_COLLISION: "IDEM_002",
  RECOVERY_FAILED: "REC_001",
  RECOVERY_TIMEOUT: "REC_002",
  INTERNAL: "INT_001",
  OTHER: "GEN_001"
} as const;

export type ErrorKind = keyof typeof ERROR_CODES;
export type ErrorCode = (typeof ERROR_CODES)[ErrorKind];

const RECOVERABLE = new Set<ErrorKind>([
  "NETWORK_TIMEOUT",
  "WEBSOCKET_DISCONNECTED",
  "DATA_GAP",
  "ORDER_PLACEMENT_FAILED",
  "RATE_LIMIT_EXCEEDED"
]);

const FATAL = new Set<ErrorKind>(["FATAL", "TOKEN_REFRESH_FAILED", "SYSTEM_SHUTDOWN"]);

const REQUIRES_EXIT = new Set<ErrorKind>([
  "VIX_SPIKE",
  "DAILY_LOSS_LIMIT",
  "TOKEN_EXPIRED",
  "MARKET_CLOSED"
]);

export class TradingError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TradingError";
  }

  get code(): ErrorCode {
    return ERROR_CODES[this.kind];
  }

  get isRecoverable(): boolean {
    return RECOVERABLE.has(this.kind);
  }

  get isFatal(): boolean {
    return FATAL.has(this.kind);
  }

  get requiresExit(): boolean {
    return REQUIRES_EXIT.has(this.kind);
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  static from(err: unknown, kind: ErrorKind = "OTHER"): TradingError {
    if (err instanceof TradingError) {
      return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    return new TradingError(kind, message, { cause: err });
  }
}

export function isTradingError(err: unknown, kind?: ErrorKind): err is TradingError {
  return err instanceof TradingError && (kind === undefined || err.kind === kind);
}
