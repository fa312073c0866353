import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { KiteInstrumentDirectory, parseInstrumentsCsv } from "../../src/broker/instrument_directory.js";
import { checksum, kiteDateTime, mapKiteStatus, parseKiteTimestamp } from "../../src/broker/kite_gateway.js";
import { KiteTicker, parseKitePackets } from "../../src/broker/kite_ticker.js";
import { PaperBroker } from "../../src/broker/paper_broker.js";
import { kiteSessionExpiry, TokenStore } from "../../src/broker/token_store.js";
import { Tick } from "../../src/types.js";
import { ist, makeTempDir, removeDir } from "./helpers.js";

function packet(size: number, token: number, pricePaise: number, fill: (p: Buffer) => void = () => undefined): Buffer {
  const p = Buffer.alloc(size);
  p.writeUInt32BE(token, 0);
  p.writeInt32BE(pricePaise, 4);
  fill(p);
  return p;
}

function frame(packets: Buffer[]): Buffer {
  const head = Buffer.alloc(2);
  head.writeUInt16BE(packets.length, 0);
  const parts: Buffer[] = [head];
  for (const p of packets) {
    const len = Buffer.alloc(2);
    len.writeUInt16BE(p.length, 0);
    parts.push(len, p);
  }
  return Buffer.concat(parts);
}

describe("parseKitePackets", () => {
  it("decodes LTP, quote and full packets and skips unknown sizes", () => {
    const full = packet(184, 12345, 10050, (p) => {
      p.writeUInt32BE(1500, 16);
      p.writeUInt32BE(1_736_140_500, 60);
      p.writeUInt32BE(300, 64);
      p.writeInt32BE(10045, 68);
      p.writeUInt32BE(0, 124);
    });
    const packets = parseKitePackets(
      frame([packet(8, 256265, 2354750), packet(10, 1, 1), packet(44, 12346, 9000, (p) => p.writeUInt32BE(20, 16)), full])
    );

    expect(packets).toEqual([
      { token: "256265", lastPrice: 23547.5, cumulativeVolume: null, bid: null, ask: null, exchangeTimestampMs: null },
      { token: "12346", lastPrice: 90, cumulativeVolume: 20, bid: null, ask: null, exchangeTimestampMs: null },
      {
        token: "12345",
        lastPrice: 100.5,
        cumulativeVolume: 1500,
        bid: 100.45,
        ask: null,
        exchangeTimestampMs: 1_736_140_500_000
      }
    ]);
  });

  it("ignores heartbeats and truncated frames", () => {
    expect(parseKitePackets(Buffer.from([0]))).toEqual([]);
    const truncated = frame([packet(8, 256265, 100)]).subarray(0, 8);
    expect(parseKitePackets(truncated)).toEqual([]);
  });
});

describe("KiteTicker.toTick", () => {
  it("turns cumulative volume into per-tick volume and maps symbols", () => {
    const ticker = new KiteTicker({
      url: "wss://ws.example.test",
      apiKey: "test-key",
      accessToken: "test-token",
      pingIntervalSec: 30,
      reconnectBackoffSec: [1],
      maxReconnectsPerMinute: 5,
      onTick: (_tick: Tick) => undefined,
      symbolFor: (token) => (token === "256265" ? "NIFTY" : undefined)
    });
    const base = { lastPrice: 100, bid: null, ask: null, exchangeTimestampMs: null };

    expect(ticker.toTick({ ...base, token: "12345", cumulativeVolume: 1000 }, 5).volume).toBe(0);
    expect(ticker.toTick({ ...base, token: "12345", cumulativeVolume: 1250 }, 6).volume).toBe(250);
    expect(ticker.toTick({ ...base, token: "12345", cumulativeVolume: 1200 }, 7).volume).toBe(0);
    const index = ticker.toTick({ ...base, token: "256265", cumulativeVolume: null, exchangeTimestampMs: 42 }, 8);
    expect(index).toMatchObject({ symbol: "NIFTY", volume: 0, timestampMs: 42 });
  });
});

describe("Kite helpers", () => {
  it("formats and parses Kite timestamps in IST", () => {
    expect(kiteDateTime(new Date("2025-01-06T04:00:00Z"))).toBe("2025-01-06 09:30:00");
    expect(parseKiteTimestamp("2024-01-15T09:15:00+0530")).toBe(Date.UTC(2024, 0, 15, 3, 45));
    expect(() => parseKiteTimestamp("yesterday")).toThrow("Bad candle timestamp: yesterday");
  });

  it("maps Kite order states", () => {
    expect(mapKiteStatus("COMPLETE", 75, 75)).toBe("FILLED");
    expect(mapKiteStatus("rejected", 0, 75)).toBe("REJECTED");
    expect(mapKiteStatus("OPEN", 0, 75)).toBe("SUBMITTED");
    expect(mapKiteStatus("OPEN", 25, 75)).toBe("PARTIALLY_FILLED");
    expect(mapKiteStatus("CANCELLED", 25, 75)).toBe("PARTIALLY_FILLED");
    expect(mapKiteStatus("CANCELLED", 0, 75)).toBe("CANCELLED");
  });

  it("builds a hex SHA-256 login checksum", () => {
    const sum = checksum("test-key", "test-request", "test-secret");
    expect(sum).toMatch(/^[0-9a-f]{64}$/);
    expect(sum).not.toBe(checksum("test-key", "other-request", "test-secret"));
  });

  it("expires sessions at the next 06:00 IST", () => {
    expect(kiteSessionExpiry(ist("2025-01-06", "10:00")).toISOString()).toBe("2025-01-07T00:30:00.000Z");
    expect(kiteSessionExpiry(ist("2025-01-06", "05:00")).toISOString()).toBe("2025-01-06T00:30:00.000Z");
  });
});

describe("TokenStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("saves and reloads tokens until they expire", async () => {
    const store = new TokenStore(join(dir, "nested", "tokens.json"));
    expect(await store.load()).toBeNull();

    const tokens = {
      accessToken: "test-access",
      feedToken: null,
      accessExpiry: "2025-01-07T00:30:00.000Z",
      feedExpiry: null,
      refreshToken: null,
      userId: "AB1234",
      createdAt: "2025-01-06T04:00:00.000Z"
    };
    await store.save(tokens);

    expect(await store.load()).toEqual(tokens);
    expect(await store.loadValid(new Date("2025-01-06T12:00:00Z"))).toEqual(tokens);
    expect(await store.loadValid(new Date("2025-01-07T00:30:00Z"))).toBeNull();
  });

  it("rejects a malformed token file", async () => {
    const path = join(dir, "tokens.json");
    await writeFile(path, JSON.stringify({ access_token: "" }), "utf-8");
    await expect(new TokenStore(path).load()).rejects.toMatchObject({ kind: "DESERIALIZATION" });
  });
});

const HEADER =
  "instrument_token,exchange_token,tradingsymbol,name,last_price,expiry,strike,tick_size,lot_size,instrument_type,segment,exchange";

const NFO_CSV = [
  HEADER,
  '12340,48,NIFTY2510223550CE,"NIFTY",0,2025-01-02,23550,0.05,75,CE,NFO-OPT,NFO',
  '12345,49,NIFTY25JAN23550CE,"NIFTY",0,2025-01-09,23550,0.05,75,CE,NFO-OPT,NFO',
  '12346,50,NIFTY2511623550CE,"NIFTY",0,2025-01-16,23550,0.05,75,CE,NFO-OPT,NFO',
  '12347,51,NIFTY25JAN23550PE,"NIFTY",0,2025-01-09,23550,0.05,75,PE,NFO-OPT,NFO',
  '12348,52,NIFTY25JANFUT,"NIFTY",0,2025-01-30,0,0.05,75,FUT,NFO-FUT,NFO',
  ",,,,,,,,,,,"
].join("\n");

const NSE_CSV = [HEADER, "256265,1001,NIFTY 50,NIFTY 50,0,,0,0,0,EQ,INDICES,NSE"].join("\r\n");

describe("parseInstrumentsCsv", () => {
  it("reads options, futures and indices", () => {
    const instruments = parseInstrumentsCsv(`${NFO_CSV}\n${NSE_CSV.split("\r\n")[1]}`);

    expect(instruments).toHaveLength(6);
    expect(instruments[1]).toEqual({
      token: "12345",
      symbol: "NIFTY25JAN23550CE",
      underlying: "NIFTY",
      expiry: "2025-01-09",
      strike: 23550,
      lotSize: 75,
      kind: "INDEX_OPT",
      optionType: "CE",
      exchange: "NFO",
      tickSize: 0.05
    });
    expect(instruments[4]).toMatchObject({ kind: "INDEX_FUT", strike: null, optionType: null });
    expect(instruments[5]).toMatchObject({ underlying: "NIFTY", kind: "INDEX", expiry: null, lotSize: 1 });
  });

  it("rejects a dump without the expected columns", () => {
    expect(() => parseInstrumentsCsv("instrument_token,tradingsymbol\n1,X")).toThrow(
      "Kite instruments CSV missing column name"
    );
    expect(() => parseInstrumentsCsv(HEADER)).toThrow("Kite instruments response is empty");
  });
});

describe("KiteInstrumentDirectory", () => {
  const source = vi.fn(async (exchange: string) => (exchange === "NFO" ? NFO_CSV : NSE_CSV));
  const directory = new KiteInstrumentDirectory(source, ["NFO", "NSE"], () => ist("2025-01-06", "10:00"));

  beforeEach(async () => {
    await directory.refresh();
  });

  it("loads every segment", () => {
    expect(source.mock.calls.map(([exchange]) => exchange)).toContain("NSE");
    expect(directory.size()).toBe(6);
    expect(directory.byToken("12347")?.optionType).toBe("PE");
  });

  it("finds the nearest live expiry or the exact one", () => {
    expect(directory.findOption("nifty", 23550, "CE").token).toBe("12345");
    expect(directory.findOption("NIFTY", 23550, "CE", "2025-01-16").token).toBe("12346");
    expect(() => directory.findOption("NIFTY", 23600, "CE")).toThrow("No NIFTY 23600 CE option");
  });

  it("lists the option contracts of one underlying", () => {
    expect(directory.optionsFor("nifty").map((i) => i.token)).toEqual(["12340", "12345", "12346", "12347"]);
    expect(directory.optionsFor("BANKNIFTY")).toEqual([]);
  });

  it("resolves index tokens from the dump or the known list", () => {
    expect(directory.underlyingToken("nifty")).toBe("256265");
    expect(directory.underlyingToken("BANK NIFTY")).toBe("260105");
    expect(() => directory.underlyingToken("SENSEX")).toThrow("No index token for SENSEX");
  });
});

describe("PaperBroker", () => {
  it("fills limit orders at once with slippage against the trader", async () => {
    const broker = new PaperBroker({ slippageBps: 5, tickSize: 0.05, startingFunds: 500_000 });

    const buy = await broker.placeOrder({
      symbol: "NIFTY25JAN23550CE",
      token: "12345",
      exchange: "NFO",
      side: "BUY",
      orderType: "LIMIT",
      quantity: 75,
      price: 100
    });
    expect(buy).toMatchObject({ averagePrice: 100.05, filledQuantity: 75 });
    expect(await broker.orderStatus(buy.brokerOrderId)).toMatchObject({ status: "FILLED", averagePrice: 100.05 });

    const sell = await broker.placeOrder({
      symbol: "NIFTY25JAN23550CE",
      token: "12345",
      exchange: "NFO",
      side: "SELL",
      orderType: "LIMIT",
      quantity: 75,
      price: 100
    });
    expect(sell.averagePrice).toBe(99.95);
    expect(await broker.availableFunds()).toBeCloseTo(499_992.5);
  });

  it("serves pinned prices and pushes them to listeners", async () => {
    const broker = new PaperBroker({ slippageBps: 0, tickSize: 0.05, startingFunds: 0 });
    const seen: number[] = [];
    const off = broker.onTick((tick) => seen.push(tick.lastPrice));

    broker.setLtp("12345", 101.5, 1);
    off();
    broker.setLtp("12345", 102, 2);

    expect(await broker.ltp("12345")).toBe(102);
    expect(seen).toEqual([101.5]);
    await expect(broker.ltp("99999")).rejects.toMatchObject({ kind: "MISSING_DATA" });
    await expect(broker.orderStatus("PAPER_missing")).rejects.toMatchObject({ kind: "ORDER_NOT_FOUND" });
  });
});
