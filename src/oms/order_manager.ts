import { randomUUID } from "node:crypto";
import { BrokerGateway } from "../broker/broker_gateway.js";
import { OrderConfig } from "../config/config.js";
import { TradingError } from "../errors/trading_error.js";
import { EventBus } from "../events/event_bus.js";
import { NoopPersistence, Persistence } from "../persistence/persistence.js";
import { Order, OrderIntent, OrderStatus, Side } from "../types.js";
import { sleep } from "../utils/sleep.js";

const DEFAULT_BACKOFF_SEC = 8;
const ACTIVE: ReadonlySet<OrderStatus> = new Set(["PENDING", "SUBMITTED", "PARTIALLY_FILLED"]);

export interface OrderManagerDeps {
  broker: BrokerGateway;
  bus: EventBus;
  config: OrderConfig;
  tickSize: number;
  persistence?: Persistence;
  sleepMs?: (ms: number) => Promise<void>;
}

export type PlaceOrderInput = Omit<OrderIntent, "intentId">;

/**
 * Idempotent LIMIT order placement. A key that has already produced an order
 * returns that order's id without touching the broker; otherwise the order is
 * tried up to `maxRetries + 1` times, walking the price up the configured
 * ladder between attempts.
 */
export class OrderManager {
  private orders = new Map<string, Order>();
  private processed = new Map<string, string>();
  private inFlight = new Map<string, Promise<string>>();
  private broker: BrokerGateway;
  private bus: EventBus;
  private cfg: OrderConfig;
  private tickSize: number;
  private persistence: Persistence;
  private sleepMs: (ms: number) => Promise<void>;

  constructor(deps: OrderManagerDeps) {
    this.broker = deps.broker;
    this.bus = deps.bus;
    this.cfg = deps.config;
    this.tickSize = deps.tickSize;
    this.persistence = deps.persistence ?? new NoopPersistence();
    this.sleepMs = deps.sleepMs ?? sleep;
  }

  async placeOrder(input: PlaceOrderInput): Promise<string> {
    const existing = this.processed.get(input.idempotencyKey);
    if (existing) {
      console.log("ORDER_ALREADY_PROCESSED", existing);
      return existing;
    }
    const pending = this.inFlight.get(input.idempotencyKey);
    if (pending) {
      return pending;
    }
    const run = this.submit(input).finally(() => {
      this.inFlight.delete(input.idempotencyKey);
    });
    this.inFlight.set(input.idempotencyKey, run);
    return run;
  }

  async markExecuted(orderId: string, fillPrice: number, fillQuantity: number): Promise<Order> {
    const order = this.require(orderId);
    const status: OrderStatus = fillQuantity >= order.quantity ? "FILLED" : "PARTIALLY_FILLED";
    const updated = this.store({
      ...order,
      status,
      fillPrice,
      fillQuantity,
      fillTime: new Date().toISOString()
    });
    await this.bus.emit("ORDER_EXECUTED", {
      order_id: orderId,
      fill_price: fillPrice,
      fill_quantity: fillQuantity,
      status
    });
    if (status === "PARTIALLY_FILLED") {
      await this.bus.emit("ORDER_PARTIALLY_FILLED", {
        order_id: orderId,
        fill_price: fillPrice,
        fill_quantity: fillQuantity,
        remaining: order.quantity - fillQuantity
      });
    }
    await this.journal(updated);
    console.log("ORDER_EXECUTED", orderId, status, fillQuantity, fillPrice.toFixed(2));
    return updated;
  }

  async markRejected(orderId: string, reason: string): Promise<Order> {
    const order = this.require(orderId);
    const updated = this.store({ ...order, status: "REJECTED", rejectedReason: reason });
    await this.bus.emit("ORDER_REJECTED", { order_id: orderId, reason });
    await this.journal(updated);
    console.warn("ORDER_REJECTED", orderId, reason);
    return updated;
  }

  /** Polls the broker for a submitted order and applies any fill or rejection it reports. */
  async refreshStatus(orderId: string): Promise<Order> {
    const order = this.require(orderId);
    if (!ACTIVE.has(order.status) || !order.brokerOrderId) {
      return { ...order };
    }
    const report = await this.broker.orderStatus(order.brokerOrderId);
    if (report.status === "REJECTED" || report.status === "CANCELLED") {
      return this.markRejected(orderId, report.message ?? report.status);
    }
    if (
      report.averagePrice !== null &&
      report.filledQuantity > order.fillQuantity &&
      (report.status === "FILLED" || report.status === "PARTIALLY_FILLED")
    ) {
      return this.markExecuted(orderId, report.averagePrice, report.filledQuantity);
    }
    return { ...order };
  }

  getOrder(orderId: string): Order | null {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  getActiveOrders(): Order[] {
    return Array.from(this.orders.values())
      .filter((o) => ACTIVE.has(o.status))
      .map((o) => ({ ...o }));
  }

  /** Drops terminal orders from memory; idempotency records are kept. */
  clearCompletedOrders(): number {
    let removed = 0;
    for (const [id, order] of Array.from(this.orders.entries())) {
      if (!ACTIVE.has(order.status)) {
        this.orders.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  private async submit(input: PlaceOrderInput): Promise<string> {
    const now = new Date().toISOString();
    const orderId = `ORD-${randomUUID()}`;
    let order = this.store({
      ...input,
      intentId: randomUUID(),
      orderId,
      brokerOrderId: null,
      status: "PENDING",
      attempts: 0,
      currentLimitPrice: input.initialLimitPrice,
      fillPrice: null,
      fillQuantity: 0,
      fillTime: null,
      rejectedReason: null,
      createdAt: now,
      updatedAt: now
    });
    await this.bus.emit("ORDER_INTENT_CREATED", {
      order_id: orderId,
      symbol: input.symbol,
      side: input.side,
      quantity: input.quantity,
      price: input.initialLimitPrice,
      idempotency_key: input.idempotencyKey
    });
    await this.journal(order);

    const maxRetries = this.cfg.maxRetries;
    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      let price = order.currentLimitPrice;
      if (attempt > 0) {
        const backoffSec = Math.min(
          this.cfg.retryBackoffsSec[attempt - 1] ?? DEFAULT_BACKOFF_SEC,
          this.cfg.retryCapSec
        );
        price = this.walkPrice(input.initialLimitPrice, attempt, input.side);
        await this.bus.emit("ORDER_RETRYING", {
          order_id: orderId,
          attempt,
          max_retries: maxRetries,
          backoff_sec: backoffSec,
          price
        });
        await this.sleepMs(backoffSec * 1000);
      }
      order = this.store({ ...order, attempts: attempt + 1, currentLimitPrice: price });

      try {
        const placed = await this.broker.placeOrder({
          symbol: input.symbol,
          token: input.token,
          exchange: input.exchange,
          side: input.side,
          orderType: "LIMIT",
          quantity: input.quantity,
          price
        });
        order = this.store({ ...order, brokerOrderId: placed.brokerOrderId, status: "SUBMITTED" });
        this.processed.set(input.idempotencyKey, orderId);
        await this.bus.emit("ORDER_PLACED", {
          order_id: orderId,
          broker_order_id: placed.brokerOrderId,
          symbol: input.symbol,
          price,
          attempt: attempt + 1
        });
        await this.journal(order);
        console.log("ORDER_PLACED", orderId, placed.brokerOrderId, input.side, input.quantity, price.toFixed(2));
        if (placed.averagePrice !== null && placed.filledQuantity > 0) {
          await this.markExecuted(orderId, placed.averagePrice, placed.filledQuantity);
        }
        return orderId;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error("ORDER_ATTEMPT_FAIL", orderId, `attempt=${attempt + 1}`, message);
        if (attempt === maxRetries) {
          order = this.store({ ...order, status: "FAILED", rejectedReason: message });
          await this.bus.emit("ORDER_FAILED", {
            order_id: orderId,
            attempts: attempt + 1,
            error: message
          });
          await this.journal(order);
          throw new TradingError(
            "ORDER_PLACEMENT_FAILED",
            `Order failed after ${maxRetries + 1} attempts: ${message}`,
            { cause: err }
          );
        }
      }
    }
    throw new TradingError("ORDER_PLACEMENT_FAILED", "Max retries exceeded");
  }

  /** Buys walk up the ladder and sells walk down it. */
  private walkPrice(initial: number, attempt: number, side: Side): number {
    const steps = this.cfg.retryStepsPct;
    const step = steps[attempt - 1] ?? steps[steps.length - 1] ?? 0;
    const direction = side === "BUY" ? 1 : -1;
    return roundToTick(initial * (1 + (direction * step) / 100), this.tickSize);
  }

  private store(order: Order): Order {
    const updated = { ...order, updatedAt: new Date().toISOString() };
    this.orders.set(order.orderId, updated);
    return updated;
  }

  private require(orderId: string): Order {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new TradingError("ORDER_NOT_FOUND", `Order not found: ${orderId}`);
    }
    return order;
  }

  private async journal(order: Order) {
    try {
      await this.persistence.upsertOrder(order);
    } catch (err) {
      console.warn("ORDER_JOURNAL_FAIL", order.orderId, err);
    }
  }
}

export function roundToTick(price: number, tickSize: number): number {
  if (tickSize <= 0) {
    return price;
  }
  return Number((Math.round(price / tickSize) * tickSize).toFixed(2));
}
