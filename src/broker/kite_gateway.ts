import { createHash } from "node:crypto";
import { z } from "zod";
import { BrokerConfig, FeedConfig } from "../config/config.js";
import { Timeframe, barBoundary, kiteInterval, timeframeMs } from "../data/timeframe.js";
import { ErrorKind, TradingError } from "../errors/trading_error.js";
import { EventBus } from "../events/event_bus.js";
import { Bar, OrderStatus } from "../types.js";
import { partsIST } from "../utils/ist_time.js";
import { RateLimiterSet, RequestClass } from "../utils/rate_limiter.js";
import { sleep } from "../utils/sleep.js";
import {
  BrokerGateway,
  BrokerOrderStatus,
  PlacedOrder,
  PlaceOrderRequest,
  SessionInfo,
  TickListener
} from "./broker_gateway.js";
import { KiteTicker } from "./kite_ticker.js";
import { StoredTokens, TokenStore, kiteSessionExpiry } from "./token_store.js";

// ─── Response schemas ─────────────────────────────────────────────────

const errorEnvelope = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  error_type: z.string().optional()
});

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({ status: z.literal("success"), data });

const sessionSchema = envelope(
  z.object({
    user_id: z.string(),
    access_token: z.string(),
    refresh_token: z.string().nullish(),
    public_token: z.string().nullish()
  })
);

const profileSchema = envelope(z.object({ user_id: z.string() }));

const orderPlacedSchema = envelope(z.object({ order_id: z.string() }));

const orderHistorySchema = envelope(
  z.array(
    z.object({
      order_id: z.string(),
      status: z.string(),
      quantity: z.number().default(0),
      average_price: z.number().nullish(),
      filled_quantity: z.number().nullish(),
      status_message: z.string().nullish()
    })
  )
);

const candleSchema = z
  .tuple([z.string(), z.number(), z.number(), z.number(), z.number(), z.number()])
  .rest(z.number());

const historicalSchema = envelope(z.object({ candles: z.array(candleSchema) }));

const ltpSchema = envelope(z.record(z.object({ last_price: z.number() })));

const marginsSchema = envelope(
  z.object({
    equity: z.object({ net: z.number() })
  })
);

// ─── Helpers ──────────────────────────────────────────────────────────

const KITE_ERROR_KIND: Readonly<Record<string, ErrorKind>> = {
  TokenException: "TOKEN_EXPIRED",
  PermissionException: "AUTH_FAILED",
  OrderException: "ORDER_REJECTED",
  MarginException: "INSUFFICIENT_MARGIN",
  InputException: "BROKER_API",
  NetworkException: "NETWORK_TIMEOUT",
  DataException: "BROKER_API"
};

export function checksum(apiKey: string, requestToken: string, apiSecret: string): string {
  return createHash("sha256").update(`${apiKey}${requestToken}${apiSecret}`).digest("hex");
}

/** Kite wall-clock format for historical queries: "YYYY-MM-DD HH:MM:SS" in IST. */
export function kiteDateTime(at: Date): string {
  const p = partsIST(at);
  return `${p.date} ${p.hour}:${p.minute}:${p.second}`;
}

/** Parses Kite's "2024-01-15T09:15:00+0530" candle timestamps. */
export function parseKiteTimestamp(value: string): number {
  const ms = Date.parse(value.replace(/([+-]\d{2})(\d{2})$/, "$1:$2"));
  if (Number.isNaN(ms)) {
    throw new TradingError("DESERIALIZATION", `Bad candle timestamp: ${value}`);
  }
  return ms;
}

export function mapKiteStatus(status: string, filled: number, quantity: number): OrderStatus {
  switch (status.toUpperCase()) {
    case "COMPLETE":
      return "FILLED";
    case "REJECTED":
      return "REJECTED";
    case "CANCELLED":
      return filled > 0 && filled < quantity ? "PARTIALLY_FILLED" : "CANCELLED";
    default:
      return filled > 0 ? "PARTIALLY_FILLED" : "SUBMITTED";
  }
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TradingError(
      "DESERIALIZATION",
      `Unexpected Kite ${what} response: ${parsed.error.issues[0]?.message ?? "schema"}`
    );
  }
  return parsed.data;
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return { status: "error", message: text.slice(0, 200) };
  }
}

function errorFrom(status: number, body: unknown, what: string): TradingError {
  const parsed = errorEnvelope.safeParse(body);
  const message = parsed.success ? parsed.data.message ?? "" : "";
  const errorType = parsed.success ? parsed.data.error_type ?? "" : "";
  let kind: ErrorKind = KITE_ERROR_KIND[errorType] ?? "BROKER_API";
  if (status === 429) {
    kind = "RATE_LIMIT_EXCEEDED";
  } else if (status === 403 && kind === "BROKER_API") {
    kind = "TOKEN_EXPIRED";
  }
  return new TradingError(kind, `Kite ${what} ${status}: ${errorType} ${message}`.trim());
}

/** Exchanges a login request token for an access token (Kite `/session/token`). */
export async function exchangeRequestToken(
  baseUrl: string,
  apiKey: string,
  apiSecret: string,
  requestToken: string,
  now: Date = new Date()
): Promise<StoredTokens> {
  const form = new URLSearchParams({
    api_key: apiKey,
    request_token: requestToken,
    checksum: checksum(apiKey, requestToken, apiSecret)
  });
  let res: Response;
  try {
    res = await fetch(`${baseUrl}/session/token`, {
      method: "POST",
      headers: { "X-Kite-Version": "3" },
      body: form
    });
  } catch (err) {
    throw new TradingError("TOKEN_REFRESH_FAILED", "Token exchange request failed", { cause: err });
  }
  const body = await readJson(res);
  if (!res.ok) {
    const err = errorFrom(res.status, body, "session/token");
    throw new TradingError("TOKEN_REFRESH_FAILED", err.message, { cause: err });
  }
  const session = parseBody(sessionSchema, body, "session");
  return {
    accessToken: session.data.access_token,
    feedToken: session.data.public_token ?? null,
    accessExpiry: kiteSessionExpiry(now).toISOString(),
    feedExpiry: null,
    refreshToken: session.data.refresh_token ?? null,
    userId: session.data.user_id,
    createdAt: now.toISOString()
  };
}

// ─── Gateway ──────────────────────────────────────────────────────────

export interface KiteGatewayDeps {
  broker: BrokerConfig;
  feed: FeedConfig;
  tokenStore: TokenStore;
  limiter: RateLimiterSet;
  bus?: EventBus;
  sleepMs?: (ms: number) => Promise<void>;
}

const MAX_GET_ATTEMPTS = 3;
const HTTP_TIMEOUT_MS = 10_000;

/** Kite Connect v3 over REST, with the binary ticker for live ticks. */
export class KiteGateway implements BrokerGateway {
  readonly name = "kite";
  private accessToken: string | null = null;
  private ticker: KiteTicker | null = null;
  private listeners = new Set<TickListener>();
  private cfg: BrokerConfig;
  private feed: FeedConfig;
  private tokenStore: TokenStore;
  private limiter: RateLimiterSet;
  private bus: EventBus | null;
  private sleepMs: (ms: number) => Promise<void>;

  constructor(deps: KiteGatewayDeps) {
    this.cfg = deps.broker;
    this.feed = deps.feed;
    this.tokenStore = deps.tokenStore;
    this.limiter = deps.limiter;
    this.bus = deps.bus ?? null;
    this.sleepMs = deps.sleepMs ?? sleep;
  }

  async authenticate(now: Date = new Date()): Promise<SessionInfo> {
    const apiKey = this.apiKey();
    let tokens = await this.tokenStore.loadValid(now);
    if (!tokens) {
      const { apiSecret, requestToken } = this.cfg;
      if (!apiSecret || !requestToken) {
        throw new TradingError(
          "AUTH_FAILED",
          "No valid access token. Run the login callback server or set KITE_REQUEST_TOKEN and KITE_API_SECRET."
        );
      }
      tokens = await exchangeRequestToken(this.cfg.baseUrl, apiKey, apiSecret, requestToken, now);
      await this.tokenStore.save(tokens);
      console.log("KITE_TOKEN_EXCHANGED", tokens.userId, `expires=${tokens.accessExpiry}`);
    }
    this.accessToken = tokens.accessToken;

    const profile = parseBody(profileSchema, await this.get("/user/profile", "marketData"), "profile");
    console.log("KITE_AUTHENTICATED", profile.data.user_id);
    return {
      userId: profile.data.user_id,
      accessToken: tokens.accessToken,
      expiresAt: tokens.accessExpiry
    };
  }

  async placeOrder(req: PlaceOrderRequest): Promise<PlacedOrder> {
    const form = new URLSearchParams({
      exchange: req.exchange,
      tradingsymbol: req.symbol,
      transaction_type: req.side,
      quantity: String(req.quantity),
      order_type: req.orderType,
      product: this.cfg.product,
      validity: "DAY"
    });
    if (req.orderType === "LIMIT") {
      form.set("price", String(req.price));
    }
    await this.limiter.acquire("orders");
    const res = await this.send(`${this.cfg.baseUrl}/orders/regular`, {
      method: "POST",
      headers: this.headers(),
      body: form
    });
    const body = await readJson(res);
    if (!res.ok) {
      throw errorFrom(res.status, body, "place order");
    }
    const brokerOrderId = parseBody(orderPlacedSchema, body, "place order").data.order_id;
    return this.awaitFill(brokerOrderId);
  }

  async orderStatus(brokerOrderId: string): Promise<BrokerOrderStatus> {
    const history = parseBody(
      orderHistorySchema,
      await this.get(`/orders/${encodeURIComponent(brokerOrderId)}`, "orders"),
      "order history"
    );
    const latest = history.data[history.data.length - 1];
    if (!latest) {
      throw new TradingError("ORDER_NOT_FOUND", `Kite has no history for order ${brokerOrderId}`);
    }
    const filled = latest.filled_quantity ?? 0;
    return {
      brokerOrderId,
      status: mapKiteStatus(latest.status, filled, latest.quantity),
      averagePrice: latest.average_price && latest.average_price > 0 ? latest.average_price : null,
      filledQuantity: filled,
      message: latest.status_message ?? null
    };
  }

  async historicalCandles(token: string, timeframe: Timeframe, from: Date, to: Date): Promise<Bar[]> {
    const query = new URLSearchParams({ from: kiteDateTime(from), to: kiteDateTime(to) });
    const path = `/instruments/historical/${encodeURIComponent(token)}/${kiteInterval(timeframe)}?${query.toString()}`;
    const json = parseBody(historicalSchema, await this.get(path, "historical"), "historical");
    const now = Date.now();
    const size = timeframeMs(timeframe);
    const bars: Bar[] = [];
    for (const candle of json.data.candles) {
      const [time, open, high, low, close, volume] = candle;
      const boundary = barBoundary(parseKiteTimestamp(time), timeframe);
      bars.push({
        timestamp: new Date(boundary).toISOString(),
        timestampMs: boundary,
        open,
        high,
        low,
        close,
        volume,
        complete: boundary + size <= now
      });
    }
    return bars;
  }

  async ltp(token: string): Promise<number> {
    const json = parseBody(
      ltpSchema,
      await this.get(`/quote/ltp?i=${encodeURIComponent(token)}`, "marketData"),
      "ltp"
    );
    const quote = json.data[token] ?? Object.values(json.data)[0];
    if (!quote) {
      throw new TradingError("MISSING_DATA", `LTP missing for ${token}`);
    }
    return quote.last_price;
  }

  /** Raw instruments CSV for one exchange segment. */
  async instrumentsCsv(exchange: string): Promise<string> {
    const res = await this.getWithRetry(`/instruments/${encodeURIComponent(exchange)}`, "historical");
    return res.text();
  }

  async subscribe(tokens: string[], _exchange: string): Promise<void> {
    if (!this.feed.enableWebsocket) {
      return;
    }
    if (!this.ticker) {
      this.ticker = new KiteTicker({
        url: this.cfg.wsUrl,
        apiKey: this.apiKey(),
        accessToken: this.requireToken(),
        pingIntervalSec: this.feed.pingIntervalSec,
        reconnectBackoffSec: this.feed.reconnectBackoffSec,
        maxReconnectsPerMinute: this.feed.maxReconnectsPerMinute,
        bus: this.bus ?? undefined,
        onTick: (tick) => {
          for (const listener of this.listeners) {
            listener(tick);
          }
        }
      });
      this.ticker.connect();
    }
    this.ticker.subscribe(tokens);
  }

  onTick(listener: TickListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async availableFunds(): Promise<number> {
    const json = parseBody(marginsSchema, await this.get("/user/margins", "marketData"), "margins");
    return json.data.equity.net;
  }

  async close(): Promise<void> {
    this.ticker?.close();
    this.ticker = null;
    this.listeners.clear();
  }

  private async awaitFill(brokerOrderId: string): Promise<PlacedOrder> {
    let filled = 0;
    for (let i = 0; i < this.cfg.statusPollCount; i += 1) {
      const status = await this.orderStatus(brokerOrderId);
      filled = status.filledQuantity;
      if (status.status === "FILLED") {
        return { brokerOrderId, averagePrice: status.averagePrice, filledQuantity: filled };
      }
      if (status.status === "REJECTED" || status.status === "CANCELLED") {
        throw new TradingError(
          "ORDER_REJECTED",
          `Kite order ${brokerOrderId} ${status.status}: ${status.message ?? "no reason from broker"}`
        );
      }
      await this.sleepMs(this.cfg.statusPollMs);
    }
    return { brokerOrderId, averagePrice: null, filledQuantity: filled };
  }

  private async get(path: string, kind: RequestClass): Promise<unknown> {
    const res = await this.getWithRetry(path, kind);
    return readJson(res);
  }

  private async getWithRetry(path: string, kind: RequestClass): Promise<Response> {
    let lastError: TradingError | null = null;
    for (let attempt = 1; attempt <= MAX_GET_ATTEMPTS; attempt += 1) {
      await this.limiter.acquire(kind);
      let res: Response;
      try {
        res = await this.send(`${this.cfg.baseUrl}${path}`, { headers: this.headers() });
      } catch (err) {
        lastError = TradingError.from(err, "NETWORK_TIMEOUT");
        await this.backoff(attempt);
        continue;
      }
      if (res.ok) {
        return res;
      }
      const error = errorFrom(res.status, await readJson(res), `GET ${path.split("?")[0]}`);
      if (res.status >= 500 || res.status === 429) {
        lastError = error;
        await this.backoff(attempt);
        continue;
      }
      throw error;
    }
    throw lastError ?? new TradingError("BROKER_API", `Kite request failed: ${path}`);
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(HTTP_TIMEOUT_MS) });
    } catch (err) {
      throw new TradingError("NETWORK_TIMEOUT", `Kite request failed: ${url.split("?")[0]}`, {
        cause: err
      });
    }
  }

  private async backoff(attempt: number) {
    const jitter = Math.floor(Math.random() * 60);
    await this.sleepMs(Math.min(1200, attempt * 200 + jitter));
  }

  private headers(): Record<string, string> {
    return {
      "X-Kite-Version": "3",
      Authorization: `token ${this.apiKey()}:${this.requireToken()}`
    };
  }

  private apiKey(): string {
    if (!this.cfg.apiKey) {
      throw new TradingError("CONFIG_ERROR", "KITE_API_KEY must be set for live trading");
    }
    return this.cfg.apiKey;
  }

  private requireToken(): string {
    if (!this.accessToken) {
      throw new TradingError("AUTH_FAILED", "Kite gateway is not authenticated");
    }
    return this.accessToken;
  }
}
