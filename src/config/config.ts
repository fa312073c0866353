import { z } from "zod";
import { TradingError } from "../errors/trading_error.js";
import { parseClock } from "../utils/ist_time.js";

// ─── Env schema ───────────────────────────────────────────────────────

const flag = (fallback: "1" | "0") =>
  z
    .enum(["1", "0", "true", "false"])
    .default(fallback)
    .transform((v) => v === "1" || v === "true");

const numberList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((raw) =>
      raw
        .split(",")
        .map((x) => x.trim())
        .filter((x) => x.length > 0)
        .map(Number)
    )
    .pipe(z.array(z.number().finite().nonnegative()));

const stringList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((raw) =>
      raw
        .split(",")
        .map((x) => x.trim().toUpperCase())
        .filter((x) => x.length > 0)
    );

const clock = (fallback: string) => z.string().trim().default(fallback);

const envSchema = z.object({
  // Instruments
  UNDERLYING: z.string().trim().toUpperCase().default("NIFTY"),
  UNDERLYINGS: stringList("NIFTY,BANKNIFTY,FINNIFTY"),
  OPTION_EXCHANGE: z.string().default("NFO"),
  UNDERLYING_EXCHANGE: z.string().default("NSE"),

  // Session
  MARKET_OPEN_TIME: clock("09:15"),
  MARKET_CLOSE_TIME: clock("15:30"),
  ENTRY_WINDOW_START: clock("10:15"),
  ENTRY_WINDOW_END: clock("14:30"),
  EOD_EXIT_TIME: clock("15:15"),
  DAILY_ANALYSIS_DELAY_MIN: z.coerce.number().int().min(0).default(15),
  BAR_READY_GRACE_SEC: z.coerce.number().int().min(0).default(5),
  CYCLE_INTERVAL_SEC: z.coerce.number().int().min(1).default(60),

  // Position exits
  OPTION_STOP_LOSS_PCT: z.coerce.number().default(0.3),
  OPTION_TARGET_PCT: z.coerce.number().min(0).default(0),
  TRAIL_ACTIVATE_PNL_PCT: z.coerce.number().min(0).default(10),
  TRAIL_GAP_PCT: z.coerce.number().min(0).max(1).default(0.05),
  USE_TRAILING_STOP: flag("1"),
  BROKERAGE_RATE: z.coerce.number().min(0).default(0.0003),
  BROKERAGE_FLOOR: z.coerce.number().min(0).default(20),

  // Risk caps
  MAX_POSITIONS: z.coerce.number().int().min(1).default(1),
  DAILY_LOSS_LIMIT_PCT: z.coerce.number().default(3),
  CONSECUTIVE_LOSS_LIMIT: z.coerce.number().int().min(1).default(3),
  START_CAPITAL: z.coerce.number().positive().default(1_000_000),

  // VIX
  VIX_THRESHOLD: z.coerce.number().positive().default(22),
  VIX_SPIKE_THRESHOLD: z.coerce.number().positive().default(25),
  VIX_RESUME_THRESHOLD: z.coerce.number().positive().default(20),
  VIX_POLL_SEC: z.coerce.number().int().min(1).default(60),

  // Sizing
  BASE_POSITION_SIZE_PCT: z.coerce.number().positive().max(100).default(2),
  VIX_MULT_12_OR_BELOW: z.coerce.number().min(0).default(1.0),
  VIX_MULT_20: z.coerce.number().min(0).default(0.8),
  VIX_MULT_30: z.coerce.number().min(0).default(0.5),
  VIX_MULT_30_OR_ABOVE: z.coerce.number().min(0).default(0.3),
  DTE_MULT_GTE_5: z.coerce.number().min(0).default(1.0),
  DTE_MULT_2_TO_4: z.coerce.number().min(0).default(0.75),
  DTE_MULT_1: z.coerce.number().min(0).default(0.5),

  // Order retry ladder
  ORDER_RETRY_STEPS_PCT: numberList("0.5,1.0,1.5"),
  ORDER_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  ORDER_RETRY_BACKOFFS_SEC: numberList("8,8,8"),
  RETRY_CAP_SEC: z.coerce.number().int().min(0).default(30),

  // Exchange limits
  FREEZE_QTY_NIFTY: z.coerce.number().int().positive().default(1800),
  FREEZE_QTY_BANKNIFTY: z.coerce.number().int().positive().default(900),
  FREEZE_QTY_FINNIFTY: z.coerce.number().int().positive().default(1800),
  FREEZE_QTY_DEFAULT: z.coerce.number().int().positive().default(1800),
  LOT_SIZE_NIFTY: z.coerce.number().int().positive().default(75),
  LOT_SIZE_BANKNIFTY: z.coerce.number().int().positive().default(35),
  LOT_SIZE_FINNIFTY: z.coerce.number().int().positive().default(65),
  LOT_SIZE_DEFAULT: z.coerce.number().int().positive().default(75),
  TICK_SIZE: z.coerce.number().positive().default(0.05),
  PRICE_BAND_PCT: z.coerce.number().positive().default(40),
  MARGIN_BUFFER_PCT: z.coerce.number().min(0).default(20),

  // Strategy
  DAILY_ADX_PERIOD: z.coerce.number().int().default(14),
  DAILY_ADX_THRESHOLD: z.coerce.number().min(0).default(20),
  HOURLY_ADX_PERIOD: z.coerce.number().int().default(14),
  HOURLY_ADX_THRESHOLD: z.coerce.number().min(0).default(20),
  RSI_PERIOD: z.coerce.number().int().min(1).default(14),
  RSI_OVERSOLD: z.coerce.number().min(0).max(100).default(30),
  RSI_OVERBOUGHT: z.coerce.number().min(0).max(100).default(70),
  EMA_PERIOD: z.coerce.number().int().min(1).default(20),
  STRIKE_INCREMENT: z.coerce.number().positive().default(50),
  STRATEGY_INVALIDATE_ON_RECOMPUTE: flag("1"),

  // Data
  DATA_DIR: z.string().default("data"),
  BAR_MEMORY_CAPACITY: z.coerce.number().int().min(1).default(300),
  TICK_BUFFER_CAPACITY: z.coerce.number().int().min(1).default(1000),
  DATA_GAP_THRESHOLD_SEC: z.coerce.number().int().min(1).default(120),
  RECOVERY_TIMEOUT_SEC: z.coerce.number().int().min(1).default(60),
  HISTORY_LOOKBACK_DAYS_DAILY: z.coerce.number().int().min(1).default(120),
  HISTORY_LOOKBACK_DAYS_HOURLY: z.coerce.number().int().min(1).default(20),
  HOLIDAYS_FILE: z.string().optional(),

  // Tokens
  TOKEN_FILE: z.string().default("data/tokens.json"),
  TOKEN_EXPIRY_WARNING_MIN: z.coerce.number().int().min(0).default(30),
  TOKEN_GRACE_TO_FLATTEN_SEC: z.coerce.number().int().min(0).default(300),

  // Rate limits (requests per second)
  RATE_LIMIT_ORDERS: z.coerce.number().positive().default(8),
  RATE_LIMIT_MARKET_DATA: z.coerce.number().positive().default(1),
  RATE_LIMIT_HISTORICAL: z.coerce.number().positive().default(3),

  // Market-data feed
  ENABLE_WEBSOCKET: flag("1"),
  WS_PING_INTERVAL_SEC: z.coerce.number().int().min(1).default(30),
  WS_RECONNECT_BACKOFF_SEC: numberList("1,2,5,10,30"),
  WS_MAX_RECONNECTS_PER_MINUTE: z.coerce.number().int().min(1).default(5),

  // Broker
  ENABLE_PAPER_TRADING: flag("1"),
  PAPER_SLIPPAGE_BPS: z.coerce.number().min(0).default(5),
  KITE_API_KEY: z.string().optional(),
  KITE_API_SECRET: z.string().optional(),
  KITE_REQUEST_TOKEN: z.string().optional(),
  KITE_BASE_URL: z.string().url().default("https://api.kite.trade"),
  KITE_WS_URL: z.string().url().default("wss://ws.kite.trade"),
  KITE_PRODUCT: z.string().default("MIS"),
  BROKER_STATUS_POLL_COUNT: z.coerce.number().int().min(0).default(5),
  BROKER_STATUS_POLL_MS: z.coerce.number().int().min(0).default(1500),

  // Journal and alerts
  DATABASE_URL: z.string().optional(),
  REQUIRE_DB: flag("0"),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  ALERT_COOLDOWN_MS: z.coerce.number().int().min(0).default(60_000)
});

// ─── Engine config ────────────────────────────────────────────────────

export interface SessionConfig {
  readonly marketOpenTime: string;
  readonly marketCloseTime: string;
  readonly entryWindowStart: string;
  readonly entryWindowEnd: string;
  readonly eodExitTime: string;
  readonly dailyAnalysisDelayMin: number;
  readonly barReadyGraceSec: number;
}

export interface VixMultipliers {
  readonly vix12OrBelow: number;
  readonly vix20: number;
  readonly vix30: number;
  readonly vix30OrAbove: number;
}

export interface DteMultipliers {
  readonly gte5Days: number;
  readonly days2To4: number;
  readonly day1: number;
}

export interface RiskConfig {
  readonly optionStopLossPct: number;
  readonly optionTargetPct: number;
  readonly trailActivatePnlPct: number;
  readonly trailGapPct: number;
  readonly useTrailingStop: boolean;
  readonly brokerageRate: number;
  readonly brokerageFloor: number;
  readonly maxPositions: number;
  readonly dailyLossLimitPct: number;
  readonly consecutiveLossLimit: number;
  readonly startCapital: number;
  readonly vixThreshold: number;
  readonly vixSpikeThreshold: number;
  readonly vixResumeThreshold: number;
  readonly basePositionSizePct: number;
  readonly vixMultAnchors: VixMultipliers;
  readonly dteMult: DteMultipliers;
}

export interface OrderConfig {
  readonly retryStepsPct: readonly number[];
  readonly maxRetries: number;
  readonly retryBackoffsSec: readonly number[];
  readonly retryCapSec: number;
}

export interface LimitsConfig {
  readonly freezeQuantity: Readonly<Record<string, number>>;
  readonly defaultFreezeQuantity: number;
  readonly lotSize: Readonly<Record<string, number>>;
  readonly defaultLotSize: number;
  readonly tickSize: number;
  readonly priceBandPct: number;
  readonly marginBufferPct: number;
}

export interface StrategyConfig {
  readonly dailyAdxPeriod: number;
  readonly dailyAdxThreshold: number;
  readonly hourlyAdxPeriod: number;
  readonly hourlyAdxThreshold: number;
  readonly rsiPeriod: number;
  readonly rsiOversold: number;
  readonly rsiOverbought: number;
  readonly emaPeriod: number;
  readonly strikeIncrement: number;
  readonly invalidateOnRecompute: boolean;
}

export interface DataConfig {
  readonly dataDir: string;
  readonly barMemoryCapacity: number;
  readonly tickBufferCapacity: number;
  readonly gapThresholdSec: number;
  readonly recoveryTimeoutSec: number;
  readonly lookbackDaysDaily: number;
  readonly lookbackDaysHourly: number;
  readonly holidaysFile: string | null;
}

export interface TokenConfig {
  readonly tokenFile: string;
  readonly expiryWarningMin: number;
  readonly graceToFlattenSec: number;
}

export interface FeedConfig {
  readonly enableWebsocket: boolean;
  readonly pingIntervalSec: number;
  readonly reconnectBackoffSec: readonly number[];
  readonly maxReconnectsPerMinute: number;
  readonly vixPollSec: number;
}

export interface BrokerConfig {
  readonly paperTrading: boolean;
  readonly paperSlippageBps: number;
  readonly apiKey: string | null;
  readonly apiSecret: string | null;
  readonly requestToken: string | null;
  readonly baseUrl: string;
  readonly wsUrl: string;
  readonly product: string;
  readonly statusPollCount: number;
  readonly statusPollMs: number;
  readonly rateLimits: { readonly orders: number; readonly marketData: number; readonly historical: number };
}

export interface JournalConfig {
  readonly databaseUrl: string | null;
  readonly requireDb: boolean;
}

export interface AlertConfig {
  readonly telegramBotToken: string | null;
  readonly telegramChatId: string | null;
  readonly cooldownMs: number;
}

export interface EngineConfig {
  readonly underlying: string;
  readonly underlyings: readonly string[];
  readonly optionExchange: string;
  readonly underlyingExchange: string;
  readonly cycleIntervalSec: number;
  readonly session: SessionConfig;
  readonly risk: RiskConfig;
  readonly orders: OrderConfig;
  readonly limits: LimitsConfig;
  readonly strategy: StrategyConfig;
  readonly data: DataConfig;
  readonly tokens: TokenConfig;
  readonly feed: FeedConfig;
  readonly broker: BrokerConfig;
  readonly journal: JournalConfig;
  readonly alerts: AlertConfig;
}

// ─── Loader ───────────────────────────────────────────────────────────

/** Parses and validates the engine configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new TradingError("CONFIG_ERROR", `Invalid configuration:\n${errors}`);
  }
  const e = result.data;

  const config: EngineConfig = {
    underlying: e.UNDERLYING,
    underlyings: e.UNDERLYINGS,
    optionExchange: e.OPTION_EXCHANGE,
    underlyingExchange: e.UNDERLYING_EXCHANGE,
    cycleIntervalSec: e.CYCLE_INTERVAL_SEC,
    session: {
      marketOpenTime: e.MARKET_OPEN_TIME,
      marketCloseTime: e.MARKET_CLOSE_TIME,
      entryWindowStart: e.ENTRY_WINDOW_START,
      entryWindowEnd: e.ENTRY_WINDOW_END,
      eodExitTime: e.EOD_EXIT_TIME,
      dailyAnalysisDelayMin: e.DAILY_ANALYSIS_DELAY_MIN,
      barReadyGraceSec: e.BAR_READY_GRACE_SEC
    },
    risk: {
      optionStopLossPct: e.OPTION_STOP_LOSS_PCT,
      optionTargetPct: e.OPTION_TARGET_PCT,
      trailActivatePnlPct: e.TRAIL_ACTIVATE_PNL_PCT,
      trailGapPct: e.TRAIL_GAP_PCT,
      useTrailingStop: e.USE_TRAILING_STOP,
      brokerageRate: e.BROKERAGE_RATE,
      brokerageFloor: e.BROKERAGE_FLOOR,
      maxPositions: e.MAX_POSITIONS,
      dailyLossLimitPct: e.DAILY_LOSS_LIMIT_PCT,
      consecutiveLossLimit: e.CONSECUTIVE_LOSS_LIMIT,
      startCapital: e.START_CAPITAL,
      vixThreshold: e.VIX_THRESHOLD,
      vixSpikeThreshold: e.VIX_SPIKE_THRESHOLD,
      vixResumeThreshold: e.VIX_RESUME_THRESHOLD,
      basePositionSizePct: e.BASE_POSITION_SIZE_PCT,
      vixMultAnchors: {
        vix12OrBelow: e.VIX_MULT_12_OR_BELOW,
        vix20: e.VIX_MULT_20,
        vix30: e.VIX_MULT_30,
        vix30OrAbove: e.VIX_MULT_30_OR_ABOVE
      },
      dteMult: {
        gte5Days: e.DTE_MULT_GTE_5,
        days2To4: e.DTE_MULT_2_TO_4,
        day1: e.DTE_MULT_1
      }
    },
    orders: {
      retryStepsPct: e.ORDER_RETRY_STEPS_PCT,
      maxRetries: e.ORDER_MAX_RETRIES,
      retryBackoffsSec: e.ORDER_RETRY_BACKOFFS_SEC,
      retryCapSec: e.RETRY_CAP_SEC
    },
    limits: {
      freezeQuantity: {
        NIFTY: e.FREEZE_QTY_NIFTY,
        BANKNIFTY: e.FREEZE_QTY_BANKNIFTY,
        FINNIFTY: e.FREEZE_QTY_FINNIFTY
      },
      defaultFreezeQuantity: e.FREEZE_QTY_DEFAULT,
      lotSize: {
        NIFTY: e.LOT_SIZE_NIFTY,
        BANKNIFTY: e.LOT_SIZE_BANKNIFTY,
        FINNIFTY: e.LOT_SIZE_FINNIFTY
      },
      defaultLotSize: e.LOT_SIZE_DEFAULT,
      tickSize: e.TICK_SIZE,
      priceBandPct: e.PRICE_BAND_PCT,
      marginBufferPct: e.MARGIN_BUFFER_PCT
    },
    strategy: {
      dailyAdxPeriod: e.DAILY_ADX_PERIOD,
      dailyAdxThreshold: e.DAILY_ADX_THRESHOLD,
      hourlyAdxPeriod: e.HOURLY_ADX_PERIOD,
      hourlyAdxThreshold: e.HOURLY_ADX_THRESHOLD,
      rsiPeriod: e.RSI_PERIOD,
      rsiOversold: e.RSI_OVERSOLD,
      rsiOverbought: e.RSI_OVERBOUGHT,
      emaPeriod: e.EMA_PERIOD,
      strikeIncrement: e.STRIKE_INCREMENT,
      invalidateOnRecompute: e.STRATEGY_INVALIDATE_ON_RECOMPUTE
    },
    data: {
      dataDir: e.DATA_DIR,
      barMemoryCapacity: e.BAR_MEMORY_CAPACITY,
      tickBufferCapacity: e.TICK_BUFFER_CAPACITY,
      gapThresholdSec: e.DATA_GAP_THRESHOLD_SEC,
      recoveryTimeoutSec: e.RECOVERY_TIMEOUT_SEC,
      lookbackDaysDaily: e.HISTORY_LOOKBACK_DAYS_DAILY,
      lookbackDaysHourly: e.HISTORY_LOOKBACK_DAYS_HOURLY,
      holidaysFile: e.HOLIDAYS_FILE ?? null
    },
    tokens: {
      tokenFile: e.TOKEN_FILE,
      expiryWarningMin: e.TOKEN_EXPIRY_WARNING_MIN,
      graceToFlattenSec: e.TOKEN_GRACE_TO_FLATTEN_SEC
    },
    feed: {
      enableWebsocket: e.ENABLE_WEBSOCKET,
      pingIntervalSec: e.WS_PING_INTERVAL_SEC,
      reconnectBackoffSec: e.WS_RECONNECT_BACKOFF_SEC,
      maxReconnectsPerMinute: e.WS_MAX_RECONNECTS_PER_MINUTE,
      vixPollSec: e.VIX_POLL_SEC
    },
    broker: {
      paperTrading: e.ENABLE_PAPER_TRADING,
      paperSlippageBps: e.PAPER_SLIPPAGE_BPS,
      apiKey: e.KITE_API_KEY ?? null,
      apiSecret: e.KITE_API_SECRET ?? null,
      requestToken: e.KITE_REQUEST_TOKEN ?? null,
      baseUrl: e.KITE_BASE_URL,
      wsUrl: e.KITE_WS_URL,
      product: e.KITE_PRODUCT,
      statusPollCount: e.BROKER_STATUS_POLL_COUNT,
      statusPollMs: e.BROKER_STATUS_POLL_MS,
      rateLimits: {
        orders: e.RATE_LIMIT_ORDERS,
        marketData: e.RATE_LIMIT_MARKET_DATA,
        historical: e.RATE_LIMIT_HISTORICAL
      }
    },
    journal: {
      databaseUrl: e.DATABASE_URL ?? null,
      requireDb: e.REQUIRE_DB
    },
    alerts: {
      telegramBotToken: e.TELEGRAM_BOT_TOKEN ?? null,
      telegramChatId: e.TELEGRAM_CHAT_ID ?? null,
      cooldownMs: e.ALERT_COOLDOWN_MS
    }
  };

  validateConfig(config);
  return deepFreeze(config);
}

export function validateConfig(config: EngineConfig): void {
  const { session, risk, strategy, orders } = config;
  if (session.entryWindowStart.length === 0) {
    throw new TradingError("CONFIG_ERROR", "entry_window_start is empty");
  }
  const clocks: Array<[string, string]> = [
    ["market_open_time", session.marketOpenTime],
    ["market_close_time", session.marketCloseTime],
    ["entry_window_start", session.entryWindowStart],
    ["entry_window_end", session.entryWindowEnd],
    ["eod_exit_time", session.eodExitTime]
  ];
  for (const [name, value] of clocks) {
    try {
      parseClock(value);
    } catch (err) {
      throw new TradingError("CONFIG_ERROR", `Invalid ${name}: "${value}"`, { cause: err });
    }
  }
  if (parseClock(session.entryWindowStart) >= parseClock(session.entryWindowEnd)) {
    throw new TradingError("CONFIG_ERROR", "entry_window_start must be before entry_window_end");
  }
  if (risk.optionStopLossPct <= 0 || risk.optionStopLossPct > 1) {
    throw new TradingError(
      "CONFIG_ERROR",
      `Invalid option_stop_loss_pct: ${risk.optionStopLossPct}`
    );
  }
  if (risk.dailyLossLimitPct <= 0) {
    throw new TradingError(
      "CONFIG_ERROR",
      `Invalid daily_loss_limit_pct: ${risk.dailyLossLimitPct}`
    );
  }
  if (risk.vixSpikeThreshold <= risk.vixResumeThreshold) {
    throw new TradingError(
      "CONFIG_ERROR",
      "vix_spike_threshold must be > vix_resume_threshold"
    );
  }
  if (strategy.dailyAdxPeriod < 2 || strategy.hourlyAdxPeriod < 2) {
    throw new TradingError("CONFIG_ERROR", "ADX periods must be >= 2");
  }
  if (strategy.rsiOversold >= strategy.rsiOverbought) {
    throw new TradingError("CONFIG_ERROR", "rsi_oversold must be < rsi_overbought");
  }
  if (orders.maxRetries > 0 && orders.retryStepsPct.length === 0) {
    throw new TradingError("CONFIG_ERROR", "order_retry_steps_pct is empty");
  }
}

export function lotSizeFor(config: EngineConfig, underlying: string): number {
  return config.limits.lotSize[underlying.toUpperCase()] ?? config.limits.defaultLotSize;
}

export function freezeQuantityFor(config: EngineConfig, underlying: string): number {
  return (
    config.limits.freezeQuantity[underlying.toUpperCase()] ?? config.limits.defaultFreezeQuantity
  );
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
