import WebSocket from "ws";
import { z } from "zod";
import { EventBus } from "../events/event_bus.js";
import { Tick } from "../types.js";

export interface KitePacket {
  token: string;
  lastPrice: number;
  /** Day's cumulative traded volume; null for LTP and index packets. */
  cumulativeVolume: number | null;
  bid: number | null;
  ask: number | null;
  exchangeTimestampMs: number | null;
}

export interface KiteTickerOptions {
  url: string;
  apiKey: string;
  accessToken: string;
  pingIntervalSec: number;
  reconnectBackoffSec: readonly number[];
  maxReconnectsPerMinute: number;
  onTick: (tick: Tick) => void;
  symbolFor?: (token: string) => string | undefined;
  bus?: EventBus;
}

const textMessageSchema = z.object({
  type: z.string(),
  data: z.unknown().optional()
});

// Packet sizes of the Kite binary feed.
const LTP_PACKET = 8;
const INDEX_QUOTE_PACKET = 28;
const INDEX_FULL_PACKET = 32;
const QUOTE_PACKET = 44;
const FULL_PACKET = 184;

function priceDivisor(token: number): number {
  const segment = token & 0xff;
  if (segment === 3) {
    return 10_000_000; // currency derivatives
  }
  if (segment === 6) {
    return 10_000; // BSE currency derivatives
  }
  return 100;
}

/** Decodes one binary frame of the Kite ticker into packets. Unknown sizes are skipped. */
export function parseKitePackets(frame: Buffer): KitePacket[] {
  if (frame.length < 2) {
    return [];
  }
  const count = frame.readUInt16BE(0);
  const packets: KitePacket[] = [];
  let offset = 2;
  for (let i = 0; i < count && offset + 2 <= frame.length; i += 1) {
    const len = frame.readUInt16BE(offset);
    const start = offset + 2;
    offset = start + len;
    if (offset > frame.length) {
      break;
    }
    const packet = parsePacket(frame.subarray(start, offset));
    if (packet) {
      packets.push(packet);
    }
  }
  return packets;
}

function parsePacket(p: Buffer): KitePacket | null {
  if (p.length < LTP_PACKET) {
    return null;
  }
  const rawToken = p.readUInt32BE(0);
  const div = priceDivisor(rawToken);
  const token = String(rawToken);
  const lastPrice = p.readInt32BE(4) / div;

  switch (p.length) {
    case LTP_PACKET:
    case INDEX_QUOTE_PACKET:
      return { token, lastPrice, cumulativeVolume: null, bid: null, ask: null, exchangeTimestampMs: null };
    case INDEX_FULL_PACKET:
      return {
        token,
        lastPrice,
        cumulativeVolume: null,
        bid: null,
        ask: null,
        exchangeTimestampMs: secondsToMs(p.readUInt32BE(28))
      };
    case QUOTE_PACKET:
      return {
        token,
        lastPrice,
        cumulativeVolume: p.readUInt32BE(16),
        bid: null,
        ask: null,
        exchangeTimestampMs: null
      };
    case FULL_PACKET: {
      // Market depth starts at byte 64: five bids then five asks, 12 bytes each.
      const bidQty = p.readUInt32BE(64);
      const askQty = p.readUInt32BE(124);
      return {
        token,
        lastPrice,
        cumulativeVolume: p.readUInt32BE(16),
        bid: bidQty > 0 ? p.readInt32BE(68) / div : null,
        ask: askQty > 0 ? p.readInt32BE(128) / div : null,
        exchangeTimestampMs: secondsToMs(p.readUInt32BE(60))
      };
    }
    default:
      return null;
  }
}

function secondsToMs(sec: number): number | null {
  return sec > 0 ? sec * 1000 : null;
}

/**
 * Kite streaming client. Subscribes in full mode, turns the day's cumulative
 * volume into per-tick volume, reconnects with jittered backoff and drops a
 * socket that has been silent for longer than the ping interval.
 */
export class KiteTicker {
  private ws: WebSocket | null = null;
  private tokens = new Set<string>();
  private lastVolume = new Map<string, number>();
  private reconnectTimes: number[] = [];
  private attempt = 0;
  private stopped = false;
  private connected = false;
  private lastMessageAt = 0;
  private pingTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(private opts: KiteTickerOptions) {}

  isConnected(): boolean {
    return this.connected;
  }

  connect(): void {
    this.stopped = false;
    this.open();
  }

  subscribe(tokens: string[]): void {
    for (const token of tokens) {
      this.tokens.add(token);
    }
    if (this.ws && this.connected) {
      this.sendSubscription(tokens);
    }
  }

  close(): void {
    this.stopped = true;
    this.clearTimers();
    this.ws?.close();
    this.ws = null;
    this.connected = false;
  }

  /** Converts a decoded packet into a tick, tracking volume per token. */
  toTick(packet: KitePacket, receivedAtMs: number): Tick {
    let volume = 0;
    if (packet.cumulativeVolume !== null) {
      const previous = this.lastVolume.get(packet.token);
      volume = previous === undefined ? 0 : Math.max(0, packet.cumulativeVolume - previous);
      this.lastVolume.set(packet.token, packet.cumulativeVolume);
    }
    return {
      symbol: this.opts.symbolFor?.(packet.token) ?? packet.token,
      token: packet.token,
      lastPrice: packet.lastPrice,
      bid: packet.bid,
      ask: packet.ask,
      volume,
      timestampMs: packet.exchangeTimestampMs ?? receivedAtMs
    };
  }

  private open() {
    if (this.stopped) {
      return;
    }
    const url = new URL(this.opts.url);
    url.searchParams.set("api_key", this.opts.apiKey);
    url.searchParams.set("access_token", this.opts.accessToken);
    const ws = new WebSocket(url.toString());
    this.ws = ws;

    ws.on("open", () => {
      this.connected = true;
      this.attempt = 0;
      this.lastMessageAt = Date.now();
      this.startPing();
      const tokens = Array.from(this.tokens);
      if (tokens.length > 0) {
        this.sendSubscription(tokens);
      }
      console.log("WS_CONNECTED", this.opts.url, `tokens=${tokens.length}`);
      if (this.opts.bus) {
        this.report("WEBSOCKET_CONNECTED", this.opts.bus.emit("WEBSOCKET_CONNECTED", { url: this.opts.url, tokens }));
      }
    });

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      this.lastMessageAt = Date.now();
      if (isBinary) {
        this.handleBinary(toBuffer(data));
        return;
      }
      this.handleText(toBuffer(data).toString("utf-8"));
    });

    ws.on("close", (code: number, reason: Buffer) => {
      this.connected = false;
      this.clearTimers();
      const text = reason.toString();
      console.warn("WS_DISCONNECTED", code, text);
      if (this.opts.bus) {
        this.report("WEBSOCKET_DISCONNECTED", this.opts.bus.emit("WEBSOCKET_DISCONNECTED", { code, reason: text }));
      }
      if (!this.stopped) {
        this.scheduleReconnect();
      }
    });

    // The close handler follows and schedules the reconnect.
    ws.on("error", (err: Error) => {
      console.error("WS_ERROR", err.message);
    });
  }

  private handleBinary(frame: Buffer) {
    // Kite heartbeats are single-byte frames.
    if (frame.length < 2) {
      return;
    }
    const receivedAt = Date.now();
    for (const packet of parseKitePackets(frame)) {
      this.opts.onTick(this.toTick(packet, receivedAt));
    }
  }

  private handleText(text: string) {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      console.warn("WS_TEXT_UNPARSED", text.slice(0, 120), err instanceof Error ? err.message : err);
      return;
    }
    const parsed = textMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return;
    }
    if (parsed.data.type === "error") {
      console.error("WS_SERVER_ERROR", JSON.stringify(parsed.data.data));
    }
  }

  private sendSubscription(tokens: string[]) {
    const numeric = tokens.map(Number).filter((t) => Number.isInteger(t));
    if (!this.ws) {
      return;
    }
    this.ws.send(JSON.stringify({ a: "subscribe", v: numeric }));
    this.ws.send(JSON.stringify({ a: "mode", v: ["full", numeric] }));
  }

  private startPing() {
    const intervalMs = this.opts.pingIntervalSec * 1000;
    this.pingTimer = setInterval(() => {
      const silentMs = Date.now() - this.lastMessageAt;
      if (silentMs > intervalMs) {
        console.warn("WS_SILENT", `${silentMs}ms`, "terminating");
        this.ws?.terminate();
        return;
      }
      this.ws?.ping();
    }, intervalMs);
  }

  private scheduleReconnect() {
    const now = Date.now();
    this.reconnectTimes = this.reconnectTimes.filter((t) => now - t < 60_000);
    const steps = this.opts.reconnectBackoffSec;
    const baseSec = steps[Math.min(this.attempt, steps.length - 1)] ?? 1;
    const jittered = Math.round(baseSec * 1000 * (0.5 + Math.random() * 0.5));
    let delay = Math.max(1000, jittered);
    const oldest = this.reconnectTimes[0];
    if (this.reconnectTimes.length >= this.opts.maxReconnectsPerMinute && oldest !== undefined) {
      delay = Math.max(delay, oldest + 60_000 - now);
    }
    this.attempt += 1;
    console.log("WS_RECONNECT", `attempt=${this.attempt}`, `in=${delay}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectTimes.push(Date.now());
      this.open();
    }, delay);
  }

  private clearTimers() {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private report(kind: string, sent: Promise<unknown>) {
    sent.catch((err: unknown) => console.error("WS_EVENT_PUBLISH_FAIL", kind, err));
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}
