import { sleep } from "./sleep.js";

export type RequestClass = "orders" | "marketData" | "historical";

/** Token bucket refilled continuously at `ratePerSec`, holding at most `capacity` tokens. */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private ratePerSec: number,
    private capacity: number = Math.max(1, ratePerSec),
    private now: () => number = Date.now
  ) {
    if (ratePerSec <= 0) {
      throw new Error(`Token bucket rate must be positive, got ${ratePerSec}`);
    }
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  async acquire(): Promise<void> {
    while (!this.tryAcquire()) {
      await sleep(this.msUntilToken());
    }
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  private msUntilToken(): number {
    const missing = 1 - this.tokens;
    return Math.max(1, Math.ceil((missing / this.ratePerSec) * 1000));
  }

  private refill() {
    const now = this.now();
    const elapsedSec = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSec * this.ratePerSec);
    this.lastRefill = now;
  }
}

export class RateLimiterSet {
  private buckets: Record<RequestClass, TokenBucket>;

  constructor(rates: Record<RequestClass, number>) {
    this.buckets = {
      orders: new TokenBucket(rates.orders),
      marketData: new TokenBucket(rates.marketData),
      historical: new TokenBucket(rates.historical)
    };
  }

  acquire(kind: RequestClass): Promise<void> {
    return this.buckets[kind].acquire();
  }

  tryAcquire(kind: RequestClass): boolean {
    return this.buckets[kind].tryAcquire();
  }
}
