import { Tick } from "../types.js";

/** Bounded most-recent tick history per symbol. In memory only. */
export class TickBuffer {
  private bySymbol = new Map<string, Tick[]>();

  constructor(private capacity: number) {
    if (capacity < 1) {
      throw new Error(`Tick buffer capacity must be >= 1, got ${capacity}`);
    }
  }

  push(tick: Tick): void {
    let ticks = this.bySymbol.get(tick.symbol);
    if (!ticks) {
      ticks = [];
      this.bySymbol.set(tick.symbol, ticks);
    }
    ticks.push(tick);
    if (ticks.length > this.capacity) {
      ticks.shift();
    }
  }

  last(symbol: string): Tick | null {
    const ticks = this.bySymbol.get(symbol);
    return ticks && ticks.length > 0 ? ticks[ticks.length - 1] : null;
  }

  /** The `k` newest ticks for `symbol`, oldest first. */
  recent(symbol: string, k: number): Tick[] {
    const ticks = this.bySymbol.get(symbol) ?? [];
    if (k <= 0) {
      return [];
    }
    return ticks.slice(Math.max(0, ticks.length - k));
  }

  all(symbol: string): Tick[] {
    return (this.bySymbol.get(symbol) ?? []).slice();
  }

  size(symbol: string): number {
    return this.bySymbol.get(symbol)?.length ?? 0;
  }

  symbols(): string[] {
    return Array.from(this.bySymbol.keys());
  }

  clear(symbol?: string): void {
    if (symbol === undefined) {
      this.bySymbol.clear();
      return;
    }
    this.bySymbol.delete(symbol);
  }
}
