import { join } from "node:path";
import dotenv from "dotenv";
import { BrokerGateway } from "../broker/broker_gateway.js";
import { KiteInstrumentDirectory } from "../broker/instrument_directory.js";
import { KiteGateway } from "../broker/kite_gateway.js";
import { PaperBroker } from "../broker/paper_broker.js";
import { TokenStore } from "../broker/token_store.js";
import { EngineConfig, loadConfig } from "../config/config.js";
import { TradingError } from "../errors/trading_error.js";
import { EventBus } from "../events/event_bus.js";
import { buildAlerter } from "../ops/alerter.js";
import { Orchestrator } from "../orchestrator.js";
import { buildPersistence } from "../persistence/postgres_persistence.js";
import { loadHolidayCalendar } from "../session/trading_calendar.js";
import { RateLimiterSet } from "../utils/rate_limiter.js";

dotenv.config();

function buildGateways(cfg: EngineConfig, bus: EventBus): { broker: BrokerGateway; kite: KiteGateway } {
  const kite = new KiteGateway({
    broker: cfg.broker,
    feed: cfg.feed,
    tokenStore: new TokenStore(cfg.tokens.tokenFile),
    limiter: new RateLimiterSet(cfg.broker.rateLimits),
    bus
  });
  if (!cfg.broker.paperTrading) {
    return { broker: kite, kite };
  }
  const paper = new PaperBroker({
    slippageBps: cfg.broker.paperSlippageBps,
    tickSize: cfg.limits.tickSize,
    startingFunds: cfg.risk.startCapital,
    marketData: kite
  });
  return { broker: paper, kite };
}

async function main(): Promise<number> {
  const cfg = loadConfig();
  console.log("LIVE_LOOP_START", cfg.underlying, `paper=${cfg.broker.paperTrading}`, `interval=${cfg.cycleIntervalSec}s`);
  if (!cfg.broker.apiKey) {
    throw new TradingError("CONFIG_ERROR", "KITE_API_KEY is required for market data, also in paper mode");
  }

  const persistence = await buildPersistence(cfg.journal.databaseUrl, cfg.journal.requireDb);
  const alerter = buildAlerter(persistence, cfg.alerts);
  const calendar = await loadHolidayCalendar(cfg.data.holidaysFile);
  const bus = new EventBus(join(cfg.data.dataDir, "events.jsonl"));
  const { broker, kite } = buildGateways(cfg, bus);
  const instruments = new KiteInstrumentDirectory((exchange) => kite.instrumentsCsv(exchange), [
    cfg.optionExchange,
    cfg.underlyingExchange
  ]);

  const engine = new Orchestrator({ config: cfg, broker, instruments, calendar, bus, persistence, alerter });
  const onSignal = (signal: NodeJS.Signals) => {
    console.log("SIGNAL_RECEIVED", signal);
    engine.requestShutdown(`signal ${signal}`);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const outcome = await engine.run();
    console.log("LIVE_LOOP_END", outcome.reason, `fatal=${outcome.fatal}`, new Date().toISOString());
    return outcome.fatal ? 1 : 0;
  } finally {
    await persistence.close();
  }
}

try {
  process.exitCode = await main();
} catch (err) {
  console.error("LIVE_LOOP_FATAL", TradingError.from(err, "FATAL").toString());
  process.exitCode = 1;
}
