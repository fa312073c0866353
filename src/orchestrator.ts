import { randomUUID } from "node:crypto";
import { computePerformance, logPerformance } from "./analytics/performance.js";
import { BrokerGateway } from "./broker/broker_gateway.js";
import { InstrumentDirectory } from "./broker/instrument_directory.js";
import { EngineConfig, lotSizeFor } from "./config/config.js";
import { BarAggregator, MultiBarAggregator } from "./data/bar_aggregator.js";
import { BarStoreRegistry } from "./data/bar_store.js";
import { HistoricalSync } from "./data/historical_sync.js";
import { TickBuffer } from "./data/tick_buffer.js";
import { barBoundary } from "./data/timeframe.js";
import { ErrorKind, TradingError } from "./errors/trading_error.js";
import { EventBus } from "./events/event_bus.js";
import { EventKind } from "./events/events.js";
import { VixFeed } from "./market_data/vix_feed.js";
import { OrderManager, roundToTick } from "./oms/order_manager.js";
import { OrderValidator } from "./oms/order_validator.js";
import { Alerter, NullAlerter } from "./ops/alerter.js";
import { AlertSeverity, NoopPersistence, Persistence } from "./persistence/persistence.js";
import { ExitDecision, PositionManager } from "./positions/position_manager.js";
import { DailyArtifacts } from "./reports/daily_artifacts.js";
import { RiskManager } from "./risk/risk_manager.js";
import { SessionClock } from "./session/session_clock.js";
import { TradingCalendar } from "./session/trading_calendar.js";
import { AdxStrategy } from "./strategy/adx_strategy.js";
import { biasSummary, BiasTarget, DailyBias, DailyBiasCalculator } from "./strategy/daily_bias.js";
import { CrossoverSignal, HourlyCrossoverMonitor } from "./strategy/hourly_crossover.js";
import { PremarketSelector } from "./strategy/premarket_selector.js";
import { Bar, EntrySignal, ExitReason, Instrument, Position, Tick, Trade } from "./types.js";
import { entryOrderKey, exitOrderKey } from "./utils/idempotency.js";
import { istMidnightMs, tradeDateIST } from "./utils/ist_time.js";

export interface OrchestratorDeps {
  config: EngineConfig;
  broker: BrokerGateway;
  instruments: InstrumentDirectory;
  calendar: TradingCalendar;
  bus: EventBus;
  persistence?: Persistence;
  alerter?: Alerter;
  clock?: () => Date;
  sleepMs?: (ms: number) => Promise<void>;
}

export interface RunOutcome {
  reason: string;
  fatal: boolean;
  trades: number;
  dailyPnl: number;
}

interface PendingEntry {
  orderId: string;
  signal: EntrySignal;
  instrument: Instrument;
  idempotencyKey: string;
  vix: number | null;
}

const ALERTS: ReadonlyArray<[EventKind, AlertSeverity]> = [
  ["VIX_SPIKE", "critical"],
  ["DAILY_LOSS_LIMIT_BREACHED", "critical"],
  ["ORDER_FAILED", "critical"],
  ["FATAL_ERROR", "critical"],
  ["KILL_SWITCH_ACTIVATED", "critical"],
  ["TOKEN_EXPIRY_WARNING", "warning"]
];

function exitReasonFor(kind: ErrorKind): ExitReason {
  switch (kind) {
    case "VIX_SPIKE":
      return "VIX_SPIKE";
    case "DAILY_LOSS_LIMIT":
      return "DAILY_LOSS_LIMIT";
    case "TOKEN_EXPIRED":
      return "TOKEN_EXPIRY";
    default:
      return "SESSION_CLOSE";
  }
}

/**
 * Runs one trading day for the configured underlying: startup and data
 * readiness, then a fixed-interval cycle (bars, daily direction, hourly
 * alignment and entry, position exits, risk, EOD flatten) until the session
 * closes or shutdown is requested.
 */
export class Orchestrator {
  readonly session: SessionClock;
  readonly stores: BarStoreRegistry;
  readonly aggregators = new MultiBarAggregator();
  readonly strategy: AdxStrategy;
  readonly positions: PositionManager;
  readonly risk: RiskManager;
  readonly orders: OrderManager;

  private cfg: EngineConfig;
  private broker: BrokerGateway;
  private instruments: InstrumentDirectory;
  private bus: EventBus;
  private persistence: Persistence;
  private alerter: Alerter;
  private clock: () => Date;
  private ticks: TickBuffer;
  private sync: HistoricalSync;
  private validator: OrderValidator;
  private artifacts: DailyArtifacts;
  private biasCalculator: DailyBiasCalculator;
  private preselector: PremarketSelector;
  private crossovers: HourlyCrossoverMonitor;
  private dayBiases: DailyBias[] = [];
  private daySignals: CrossoverSignal[] = [];
  private vixFeed: VixFeed | null = null;

  private underlyingToken: string | null = null;
  private tokenSymbols = new Map<string, string>();
  private pendingEntries = new Map<string, PendingEntry>();
  private lastRecovery = new Map<string, number>();
  private unsubscribeTicks: (() => void) | null = null;
  private sessionExpiresAt: number | null = null;

  private tradeDate = "";
  private sessionId = "";
  private marketOpenAnnounced = false;
  private dailyAnalysisDone = false;
  private lastExitCheckBoundary: number | null = null;
  private lastEntryBoundary: number | null = null;
  private eodAnnounced = false;
  private artifactsWritten = false;
  private closeDone = false;
  private tokenWarned = false;
  private positionOpenedToday = false;

  private stopReason: string | null = null;
  private fatal = false;
  private finished: RunOutcome | null = null;
  private wake: (() => void) | null = null;

  constructor(deps: OrchestratorDeps) {
    const cfg = deps.config;
    this.cfg = cfg;
    this.broker = deps.broker;
    this.instruments = deps.instruments;
    this.bus = deps.bus;
    this.persistence = deps.persistence ?? new NoopPersistence();
    this.alerter = deps.alerter ?? new NullAlerter();
    this.clock = deps.clock ?? (() => new Date());

    this.session = new SessionClock(cfg.session, deps.calendar);
    this.stores = new BarStoreRegistry(cfg.data.dataDir, cfg.data.barMemoryCapacity);
    this.ticks = new TickBuffer(cfg.data.tickBufferCapacity);
    this.sync = new HistoricalSync(this.broker, this.stores, this.bus, cfg.data, this.clock);
    this.strategy = new AdxStrategy(cfg.underlying, cfg.strategy, cfg.risk.vixThreshold, this.bus);
    this.positions = new PositionManager(cfg.risk, this.bus, this.persistence);
    this.risk = new RiskManager(cfg.risk, this.bus, this.positions);
    this.orders = new OrderManager({
      broker: this.broker,
      bus: this.bus,
      config: cfg.orders,
      tickSize: cfg.limits.tickSize,
      persistence: this.persistence,
      sleepMs: deps.sleepMs
    });
    this.validator = new OrderValidator(cfg.limits, this.session);
    this.artifacts = new DailyArtifacts(cfg.data.dataDir);
    this.biasCalculator = new DailyBiasCalculator(cfg.strategy.dailyAdxPeriod, cfg.strategy.dailyAdxThreshold);
    this.preselector = new PremarketSelector(this.instruments, cfg.strategy.strikeIncrement, this.clock);
    this.crossovers = new HourlyCrossoverMonitor(
      cfg.strategy.hourlyAdxPeriod,
      cfg.strategy.hourlyAdxThreshold,
      (target, count) => this.hourlyBarsFor(target, count)
    );
  }

  /** Startup, the cycle loop and graceful shutdown. Startup failures are rethrown after FATAL_ERROR. */
  async run(): Promise<RunOutcome> {
    let ready: boolean;
    try {
      ready = await this.startup();
    } catch (err) {
      this.fatal = true;
      await this.reportFatal(err);
      await this.release();
      throw err;
    }
    if (!ready) {
      await this.release();
      return { reason: "non-trading day", fatal: false, trades: 0, dailyPnl: 0 };
    }

    while (this.stopReason === null) {
      try {
        await this.runCycle(this.clock());
      } catch (err) {
        this.fatal = true;
        await this.reportFatal(err);
        this.requestShutdown(err instanceof Error ? err.message : String(err));
        break;
      }
      if (this.stopReason === null) {
        await this.pause(this.cfg.cycleIntervalSec * 1000);
      }
    }
    return this.shutdown();
  }

  /** Asks the loop to stop at the next cycle boundary; wakes it if it is sleeping. */
  requestShutdown(reason: string): void {
    if (this.stopReason === null) {
      this.stopReason = reason;
      console.log("SHUTDOWN_REQUESTED", reason);
    }
    this.wake?.();
  }

  /** Returns false on a non-trading day; throws when the engine cannot trade. */
  async startup(): Promise<boolean> {
    const cfg = this.cfg;
    const now = this.clock();
    await this.bus.start();
    await this.bus.emit("LOG_INITIALIZED", { log_path: this.bus.path });
    await this.bus.emit("CONFIG_LOADED", {
      underlying: cfg.underlying,
      paper_trading: cfg.broker.paperTrading
    });
    this.installAlerts();

    const date = tradeDateIST(now);
    const tradingDay = this.session.isTradingDay(date);
    await this.bus.emit("TRADING_DAY_CHECK", { date, is_trading_day: tradingDay });
    if (!tradingDay) {
      console.log("NON_TRADING_DAY", date, `next_open=${this.session.nextMarketOpen(now).toISOString()}`);
      return false;
    }
    this.beginDay(date);

    const sessionInfo = await this.broker.authenticate();
    this.sessionExpiresAt = sessionInfo.expiresAt === null ? null : Date.parse(sessionInfo.expiresAt);
    await this.bus.emit("BROKER_CLIENT_READY", { broker: this.broker.name, user_id: sessionInfo.userId });

    const count = await this.instruments.refresh();
    await this.bus.emit("INSTRUMENT_MASTER_DOWNLOADED", { count });

    const token = this.instruments.underlyingToken(cfg.underlying);
    this.underlyingToken = token;
    this.tokenSymbols.set(token, cfg.underlying);
    this.risk.setStartCapital(await this.broker.availableFunds());

    for (const timeframe of ["1h", "1d"] as const) {
      this.aggregators.add(
        new BarAggregator(
          cfg.underlying,
          timeframe,
          this.stores.get(cfg.underlying, timeframe),
          this.bus,
          () => this.clock().getTime()
        )
      );
    }
    this.unsubscribeTicks = this.broker.onTick((tick) => {
      this.onTick(tick).catch((err: unknown) => console.error("TICK_PROCESSING_ERROR", tick.token, err));
    });
    await this.broker.subscribe([token], cfg.underlyingExchange);

    await this.ensureDataReady(token);
    await this.recoverPositions(now);

    this.vixFeed = new VixFeed(
      this.broker,
      this.instruments.underlyingToken("INDIAVIX"),
      this.risk,
      cfg.feed.vixPollSec
    );
    await this.vixFeed.pollOnce();
    this.vixFeed.start();
    console.log("ENGINE_READY", cfg.underlying, `session=${this.sessionId}`);
    return true;
  }

  /** One pass of the trading loop at `now`. Recoverable step failures are logged; fatal ones are thrown. */
  async runCycle(now: Date = this.clock()): Promise<void> {
    const date = tradeDateIST(now);
    if (date !== this.tradeDate) {
      if (this.tradeDate !== "" && !this.artifactsWritten) {
        await this.step("artifacts", () => this.writeDayArtifacts(now));
      }
      this.beginDay(date);
    }
    if (!this.session.isTradingDay(now)) {
      return;
    }
    if (!this.marketOpenAnnounced && this.session.isMarketOpen(now)) {
      this.marketOpenAnnounced = true;
      const window = this.session.sessionWindow(date);
      await this.bus.emit("MARKET_OPEN", {
        date,
        open_at: window.open.toISOString(),
        close_at: window.close.toISOString()
      });
    }

    await this.step("pending_entries", () => this.settlePendingEntries(now));
    await this.step("bars", () => this.refreshBars(now));
    await this.step("token", () => this.checkToken(now));
    await this.step("daily_analysis", () => this.runDailyAnalysis(now, date));
    await this.step("hourly_analysis", () => this.runHourlyAnalysis(now));
    await this.step("risk", async () => {
      await this.risk.checkDailyLossLimit();
    });
    await this.step("positions", () => this.updatePositions(now));
    await this.step("end_of_day", () => this.endOfDay(now));
  }

  /** Flattens, writes the day's files and stops the collaborators. Safe to call more than once. */
  async shutdown(): Promise<RunOutcome> {
    if (this.finished) {
      return this.finished;
    }
    const reason = this.stopReason ?? "shutdown";
    this.stopReason = reason;
    const now = this.clock();
    await this.bus.emit("GRACEFUL_SHUTDOWN_INITIATED", { reason });
    this.vixFeed?.stop();

    try {
      await this.flatten("SHUTDOWN", now);
    } catch (err) {
      console.error("SHUTDOWN_FLATTEN_FAIL", TradingError.from(err).toString());
    }
    if (!this.closeDone && this.session.isAfterClose(now)) {
      await this.aggregators.finalizeAll();
    }
    await this.writeDayArtifacts(now);
    await this.persistSnapshot("shutdown");

    const outcome: RunOutcome = {
      reason,
      fatal: this.fatal,
      trades: this.positions.dailyTrades().length,
      dailyPnl: this.positions.getDailyPnl()
    };
    await this.bus.emit("SHUTDOWN_COMPLETED", { trades: outcome.trades, daily_pnl: outcome.dailyPnl });
    await this.release();
    this.finished = outcome;
    console.log("SHUTDOWN_COMPLETED", reason, `trades=${outcome.trades}`, `pnl=${outcome.dailyPnl.toFixed(2)}`);
    return outcome;
  }

  // ─── Startup ──────────────────────────────────────────────────────────

  private beginDay(date: string) {
    this.tradeDate = date;
    this.sessionId = `${date.replaceAll("-", "")}-${randomUUID().slice(0, 8)}`;
    this.marketOpenAnnounced = false;
    this.dailyAnalysisDone = false;
    this.lastExitCheckBoundary = null;
    this.lastEntryBoundary = null;
    this.eodAnnounced = false;
    this.artifactsWritten = false;
    this.closeDone = false;
    this.tokenWarned = false;
    this.positionOpenedToday = false;
    this.pendingEntries.clear();
    this.positions.resetDaily();
    this.risk.resetDaily();
    this.strategy.reset();
    this.dayBiases = [];
    this.daySignals = [];
    this.crossovers.clear();
    this.orders.clearCompletedOrders();
  }

  private minBars(): { daily: number; hourly: number } {
    const s = this.cfg.strategy;
    return {
      daily: s.dailyAdxPeriod + 1,
      hourly: Math.max(s.hourlyAdxPeriod + 1, s.rsiPeriod + 1, s.emaPeriod)
    };
  }

  private async ensureDataReady(token: string) {
    const symbol = this.cfg.underlying;
    const min = this.minBars();
    let daily: number;
    let hourly: number;
    try {
      daily = await this.sync.ensureBars(symbol, token, "1d", min.daily);
      hourly = await this.sync.ensureBars(symbol, token, "1h", min.hourly);
    } catch (err) {
      throw new TradingError("FATAL", `Historical sync failed for ${symbol}`, { cause: err });
    }
    if (daily < min.daily || hourly < min.hourly) {
      throw new TradingError(
        "FATAL",
        `Not enough history for ${symbol}: daily ${daily}/${min.daily}, hourly ${hourly}/${min.hourly}`
      );
    }
    await this.bus.emit("DATA_READY", { symbol, daily_bars: daily, hourly_bars: hourly });
  }

  private async recoverPositions(now: Date) {
    const events = await this.bus.replay(istMidnightMs(now.getTime()));
    const recovered = this.positions.recoverOpenPositions(events);
    this.positionOpenedToday = events.some((e) => e.kind === "POSITION_OPENED");
    if (recovered.length === 0) {
      return;
    }
    for (const position of recovered) {
      this.tokenSymbols.set(position.token, position.symbol);
    }
    await this.broker.subscribe(
      recovered.map((p) => p.token),
      this.cfg.optionExchange
    );
  }

  private installAlerts() {
    for (const [kind, severity] of ALERTS) {
      this.bus.subscribe(kind, async (event) => {
        try {
          await this.alerter.notify(severity, kind.toLowerCase(), `${kind} (${this.cfg.underlying})`, event.payload);
        } catch (err) {
          console.warn("ALERT_FAIL", kind, err);
        }
      });
    }
  }

  // ─── Cycle steps ──────────────────────────────────────────────────────

  private async step(name: string, work: () => Promise<void>): Promise<void> {
    try {
      await work();
    } catch (err) {
      const error = TradingError.from(err);
      if (error.isFatal) {
        throw error;
      }
      if (error.requiresExit) {
        console.warn("CYCLE_REQUIRES_EXIT", name, error.toString());
        await this.flatten(exitReasonFor(error.kind), this.clock());
        return;
      }
      console.warn("CYCLE_STEP_FAILED", name, error.toString());
    }
  }

  private async onTick(tick: Tick): Promise<void> {
    const symbol = this.tokenSymbols.get(tick.token) ?? tick.symbol;
    const normalized = symbol === tick.symbol ? tick : { ...tick, symbol };
    this.ticks.push(normalized);
    if (symbol === this.cfg.underlying) {
      await this.aggregators.onTick(normalized);
    }
  }

  /** Live feed: recover bars after a tick gap. No feed: pull completed hourly bars over REST. */
  private async refreshBars(now: Date) {
    if (!this.session.isMarketOpen(now)) {
      return;
    }
    const token = this.requireUnderlyingToken();
    if (!this.cfg.feed.enableWebsocket) {
      await this.sync.pullRecent(this.cfg.underlying, token, "1h");
      return;
    }
    const thresholdMs = this.cfg.data.gapThresholdSec * 1000;
    const openedAt = this.session.sessionWindow(this.tradeDate).open.getTime();
    if (now.getTime() - openedAt < thresholdMs) {
      return;
    }
    for (const gap of this.aggregators.checkAllGaps(this.cfg.data.gapThresholdSec, now.getTime())) {
      if (gap.timeframe === "1d") {
        continue;
      }
      const key = `${gap.symbol}|${gap.timeframe}`;
      const last = this.lastRecovery.get(key);
      if (last !== undefined && now.getTime() - last < thresholdMs) {
        continue;
      }
      this.lastRecovery.set(key, now.getTime());
      await this.bus.emit("DATA_GAP_DETECTED", {
        symbol: gap.symbol,
        timeframe: gap.timeframe,
        gap_sec: gap.gapSec
      });
      const lastBar = this.stores.get(gap.symbol, gap.timeframe).last();
      const from = new Date(lastBar ? lastBar.timestampMs : openedAt);
      await this.sync.recoverGap(gap.symbol, token, gap.timeframe, from, now);
    }
  }

  private async checkToken(now: Date) {
    if (this.sessionExpiresAt === null) {
      return;
    }
    const secondsLeft = (this.sessionExpiresAt - now.getTime()) / 1000;
    if (secondsLeft <= this.cfg.tokens.graceToFlattenSec) {
      console.error("TOKEN_EXPIRING", `seconds_left=${Math.floor(secondsLeft)}`);
      await this.flatten("TOKEN_EXPIRY", now);
      this.requestShutdown("access token expiry");
      return;
    }
    if (!this.tokenWarned && secondsLeft <= this.cfg.tokens.expiryWarningMin * 60) {
      this.tokenWarned = true;
      await this.bus.emit("TOKEN_EXPIRY_WARNING", {
        expires_at: new Date(this.sessionExpiresAt).toISOString(),
        minutes_left: Math.floor(secondsLeft / 60)
      });
    }
  }

  private async runDailyAnalysis(now: Date, date: string) {
    if (this.dailyAnalysisDone || now.getTime() < this.session.dailyAnalysisTime(date).getTime()) {
      return;
    }
    const bars = await this.completedDailyBars(this.cfg.underlying, now);
    await this.strategy.analyzeDaily(bars, date);
    this.dailyAnalysisDone = true;
    await this.writeBias(now);
  }

  private async completedDailyBars(symbol: string, now: Date): Promise<Bar[]> {
    const today = istMidnightMs(now.getTime());
    const bars = await this.stores.get(symbol, "1d").recent(this.cfg.data.barMemoryCapacity);
    return bars.filter((b) => b.timestampMs < today);
  }

  /** Daily bias across every configured underlying, written to bias_YYYYMMDD.json. */
  private async writeBias(now: Date) {
    const targets: BiasTarget[] = [];
    for (const underlying of this.cfg.underlyings) {
      try {
        targets.push({ underlying, spotToken: this.instruments.underlyingToken(underlying) });
      } catch (err) {
        console.warn("BIAS_TARGET_SKIPPED", underlying, TradingError.from(err).toString());
      }
    }
    const minDaily = this.minBars().daily;
    const biases = await this.biasCalculator.calculateAll(targets, async (target) => {
      await this.sync.ensureBars(target.underlying, target.spotToken, "1d", minDaily);
      return this.completedDailyBars(target.underlying, now);
    });
    const summary = biasSummary(biases);
    console.log("BIAS_SUMMARY", `ce=${summary.ce}`, `pe=${summary.pe}`, `no_trade=${summary.noTrade}`);
    await this.artifacts.writeBias(this.compactDate(), biases);
    this.dayBiases = biases;
    await this.artifacts.writePreselected(this.compactDate(), this.preselector.selectAll(biases));
  }

  /** Hourly DI crossovers across the biased underlyings, accumulated in crossover_YYYYMMDD.json. */
  private async scanCrossovers() {
    const signals = await this.crossovers.checkAll(this.dayBiases.filter((b) => b.bias !== "NO_TRADE"));
    if (signals.length === 0) {
      return;
    }
    this.daySignals.push(...signals);
    await this.artifacts.writeCrossovers(this.compactDate(), this.daySignals);
  }

  // Only the traded underlying is fed live; the others are topped up over REST.
  private async hourlyBarsFor(target: BiasTarget, count: number): Promise<Bar[]> {
    if (target.underlying !== this.cfg.underlying) {
      await this.sync.ensureBars(target.underlying, target.spotToken, "1h", count);
      await this.sync.pullRecent(target.underlying, target.spotToken, "1h");
    }
    return this.stores.get(target.underlying, "1h").recent(count);
  }

  private async runHourlyAnalysis(now: Date) {
    if (!this.dailyAnalysisDone || !this.session.isMarketOpen(now)) {
      return;
    }
    const boundary = barBoundary(now.getTime() - this.cfg.session.barReadyGraceSec * 1000, "1h");
    const hourly = await this.stores.get(this.cfg.underlying, "1h").recent(this.cfg.data.barMemoryCapacity);

    if (boundary !== this.lastExitCheckBoundary) {
      this.lastExitCheckBoundary = boundary;
      for (const position of this.positions.openPositions()) {
        if (await this.strategy.checkTechnicalExit(position.optionType, hourly)) {
          this.positions.requestExit(position.positionId, "ALIGNMENT_LOST");
        }
      }
      await this.step("crossovers", () => this.scanCrossovers());
    }

    if (boundary === this.lastEntryBoundary || !this.session.isInEntryWindow(now)) {
      return;
    }
    this.lastEntryBoundary = boundary;
    if (this.pendingEntries.size > 0) {
      return;
    }
    if (!(await this.strategy.analyzeHourly(hourly))) {
      return;
    }
    const vix = this.risk.currentVix();
    if (vix === null) {
      await this.bus.emit("NO_TRADE_SIGNAL", { underlying: this.cfg.underlying, reason: "VIX unavailable" });
      return;
    }
    const ltp = await this.broker.ltp(this.requireUnderlyingToken());
    const signal = await this.strategy.evaluateEntry(hourly, ltp, vix, now);
    if (signal) {
      await this.enter(signal, now);
    }
  }

  private async enter(signal: EntrySignal, now: Date) {
    const cfg = this.cfg;
    const underlying = signal.underlying;
    this.strategy.consumeSignal();
    try {
      await this.risk.preEntryCheck(underlying);
    } catch (err) {
      if (err instanceof TradingError) {
        return;
      }
      throw err;
    }

    const instrument = this.instruments.findOption(underlying, signal.strike, signal.optionType);
    const premium = await this.broker.ltp(instrument.token);
    const tickSize = instrument.tickSize > 0 ? instrument.tickSize : cfg.limits.tickSize;
    const price = roundToTick(premium, tickSize);
    const funds = await this.broker.availableFunds();
    const vix = this.risk.currentVix();
    const lotSize = instrument.lotSize > 0 ? instrument.lotSize : lotSizeFor(cfg, underlying);
    const sized = this.risk.positionSize({
      capital: this.risk.status().startCapital,
      vix: vix ?? cfg.risk.vixThreshold,
      daysToExpiry: this.session.daysToExpiry(now, instrument.expiry),
      lotSize
    });
    const quantity = Math.min(sized, Math.floor(this.validator.freezeLimit(underlying) / lotSize) * lotSize);

    try {
      this.validator.validate({
        symbol: instrument.symbol,
        quantity,
        price,
        instrument,
        referencePrice: premium,
        accountBalance: funds,
        now
      });
    } catch (err) {
      if (err instanceof TradingError) {
        console.warn("ENTRY_VALIDATION_FAILED", instrument.symbol, err.toString());
        await this.bus.emit("RISK_CHECK_FAILED", { underlying, reason: err.message, code: err.code });
        return;
      }
      throw err;
    }

    const idempotencyKey = entryOrderKey(
      this.sessionId,
      underlying,
      signal.optionType,
      signal.strike,
      Date.parse(signal.generatedAt)
    );
    this.tokenSymbols.set(instrument.token, instrument.symbol);
    let orderId: string;
    try {
      orderId = await this.orders.placeOrder({
        symbol: instrument.symbol,
        token: instrument.token,
        exchange: instrument.exchange,
        side: signal.side,
        quantity,
        initialLimitPrice: price,
        idempotencyKey
      });
    } catch (err) {
      console.error("ENTRY_ORDER_FAILED", instrument.symbol, TradingError.from(err).toString());
      return;
    }
    this.pendingEntries.set(orderId, { orderId, signal, instrument, idempotencyKey, vix });
    await this.broker.subscribe([instrument.token], instrument.exchange);
    await this.settleEntry(orderId, now);
  }

  private async settlePendingEntries(now: Date) {
    for (const orderId of Array.from(this.pendingEntries.keys())) {
      await this.settleEntry(orderId, now);
    }
  }

  /** Opens the position once the entry order reports a fill; drops the entry if the order died. */
  private async settleEntry(orderId: string, now: Date) {
    const pending = this.pendingEntries.get(orderId);
    if (!pending) {
      return;
    }
    let order = this.orders.getOrder(orderId);
    if (order && order.status === "SUBMITTED") {
      order = await this.orders.refreshStatus(orderId);
    }
    if (!order || order.status === "REJECTED" || order.status === "CANCELLED" || order.status === "FAILED") {
      this.pendingEntries.delete(orderId);
      console.warn("ENTRY_ORDER_DROPPED", orderId, order?.status ?? "missing");
      return;
    }
    if (order.fillPrice === null || order.fillQuantity <= 0) {
      return;
    }
    this.pendingEntries.delete(orderId);
    const { signal, instrument } = pending;
    const position = this.positions.buildPosition({
      symbol: instrument.symbol,
      token: instrument.token,
      underlying: signal.underlying,
      strike: signal.strike,
      optionType: signal.optionType,
      side: signal.side,
      quantity: order.fillQuantity,
      entryPrice: order.fillPrice,
      underlyingEntry: signal.underlyingLtp,
      entryReason: signal.reason,
      idempotencyKey: pending.idempotencyKey,
      vixAtEntry: pending.vix,
      entryTime: now
    });
    await this.positions.open(position);
    this.positionOpenedToday = true;
  }

  private async updatePositions(now: Date) {
    for (const position of this.positions.openPositions()) {
      try {
        const price = await this.markPrice(position, now);
        const triggered = await this.positions.update(position.positionId, price);
        const decision = await this.positions.selectExit(position.positionId, triggered);
        if (decision) {
          await this.exitPosition(decision, now);
        }
      } catch (err) {
        const error = TradingError.from(err);
        if (error.isFatal) {
          throw error;
        }
        console.warn("POSITION_CYCLE_FAIL", position.positionId, error.toString());
      }
    }
  }

  /** Fresh feed price when one arrived within the gap threshold, otherwise a REST quote. */
  private async markPrice(position: Position, now: Date): Promise<number> {
    const tick = this.ticks.last(position.symbol);
    if (tick && now.getTime() - tick.timestampMs <= this.cfg.data.gapThresholdSec * 1000) {
      return tick.lastPrice;
    }
    return this.broker.ltp(position.token);
  }

  private async exitPosition(decision: ExitDecision, now: Date) {
    const position = this.positions.getPosition(decision.positionId);
    if (!position) {
      return;
    }
    const fill = await this.executeExit(position, decision.primary);
    const trade = await this.positions.close(position.positionId, fill, decision.primary, {
      secondaryReasons: decision.secondary,
      vixAtExit: this.risk.currentVix(),
      now
    });
    this.risk.recordTradeResult(trade.netPnl);
    await this.risk.checkDailyLossLimit();
  }

  /** Places the closing order for `position` and resolves with its fill (or limit) price. */
  private async executeExit(position: Position, reason: ExitReason): Promise<number> {
    const instrument = this.instruments.byToken(position.token);
    const tickSize = instrument && instrument.tickSize > 0 ? instrument.tickSize : this.cfg.limits.tickSize;
    const price = roundToTick(position.currentPrice, tickSize);
    const orderId = await this.orders.placeOrder({
      symbol: position.symbol,
      token: position.token,
      exchange: instrument?.exchange ?? this.cfg.optionExchange,
      side: position.side === "BUY" ? "SELL" : "BUY",
      quantity: position.quantity,
      initialLimitPrice: price,
      idempotencyKey: exitOrderKey(position.positionId, reason)
    });
    let order = this.orders.getOrder(orderId);
    if (order && order.fillPrice === null && order.status === "SUBMITTED") {
      order = await this.orders.refreshStatus(orderId);
    }
    return order?.fillPrice ?? order?.currentLimitPrice ?? price;
  }

  private async flatten(reason: ExitReason, now: Date): Promise<Trade[]> {
    if (this.positions.openCount() === 0) {
      return [];
    }
    const trades = await this.positions.closeAll(reason, {
      vixAtExit: this.risk.currentVix(),
      now,
      exitPrice: (position) => this.executeExit(position, reason)
    });
    for (const trade of trades) {
      this.risk.recordTradeResult(trade.netPnl);
    }
    await this.risk.checkDailyLossLimit();
    return trades;
  }

  private async endOfDay(now: Date) {
    if (this.session.isEodReached(now)) {
      if (!this.eodAnnounced) {
        this.eodAnnounced = true;
        this.pendingEntries.clear();
        await this.bus.emit("EOD_MANDATORY_EXIT", {
          positions: this.positions.openPositions().map((p) => p.positionId),
          at: now.toISOString()
        });
      }
      await this.flatten("EOD_MANDATORY_EXIT", now);
      if (!this.artifactsWritten && this.positions.openCount() === 0) {
        await this.writeDayArtifacts(now);
      }
    }
    if (!this.closeDone && this.session.isAfterClose(now)) {
      this.closeDone = true;
      await this.aggregators.finalizeAll();
      await this.persistSnapshot("close");
      this.requestShutdown("session closed");
    }
  }

  // ─── Reporting ────────────────────────────────────────────────────────

  private compactDate(): string {
    return this.tradeDate.replaceAll("-", "");
  }

  /** trades_ and positions_ files for the day; trades already on disk from an earlier run are kept. */
  private async writeDayArtifacts(now: Date) {
    const today = this.positions.dailyTrades();
    if (today.length === 0 && !this.positionOpenedToday) {
      return;
    }
    const compact = this.compactDate();
    const ids = new Set(today.map((t) => t.positionId));
    const earlier = (await this.artifacts.readTrades(compact)).filter((t) => !ids.has(t.positionId));
    const trades = [...earlier, ...today];
    const performance = computePerformance(this.tradeDate, trades);
    logPerformance(performance);
    await this.artifacts.writeTrades(compact, trades, performance);
    await this.artifacts.writePositions(compact, this.positions.openPositions(), now);
    this.artifactsWritten = true;
  }

  private async persistSnapshot(note: string) {
    const open = this.positions.openPositions();
    const realized = this.positions.getDailyPnl();
    try {
      await this.persistence.upsertDailySnapshot({
        tradeDate: this.tradeDate,
        equity: this.risk.status().startCapital + realized,
        realizedPnl: realized,
        unrealizedPnl: open.reduce((acc, p) => acc + p.pnl, 0),
        openPositions: open.length,
        trades: this.positions.dailyTrades().length,
        note,
        createdAt: new Date().toISOString()
      });
    } catch (err) {
      console.warn("SNAPSHOT_PERSIST_FAIL", err);
    }
  }

  private async reportFatal(err: unknown) {
    const error = TradingError.from(err, "FATAL");
    console.error("FATAL_ERROR", error.toString());
    try {
      await this.bus.emit("FATAL_ERROR", { code: error.code, message: error.message });
    } catch (emitErr) {
      console.error("FATAL_EVENT_NOT_LOGGED", emitErr);
    }
  }

  private async release() {
    this.vixFeed?.stop();
    this.unsubscribeTicks?.();
    this.unsubscribeTicks = null;
    await this.broker.close();
    await this.bus.stop();
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private requireUnderlyingToken(): string {
    if (this.underlyingToken === null) {
      throw new TradingError("INVALID_STRATEGY_STATE", "Engine has not completed startup");
    }
    return this.underlyingToken;
  }
}
