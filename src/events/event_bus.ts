import { FileHandle, mkdir, open, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { isMissingFile } from "../data/bar_store.js";
import { TradingError } from "../errors/trading_error.js";
import {
  EVENT_KINDS,
  EventHandler,
  EventKind,
  EventPayloads,
  TradingEvent,
  createEvent,
  isEventOf
} from "./events.js";

const loggedEventSchema = z.object({
  kind: z.enum(EVENT_KINDS),
  timestamp: z.string(),
  timestamp_ms: z.number(),
  idempotency_key: z.string(),
  payload: z.record(z.unknown())
});

/** An event read back from the log; payloads are validated by whoever consumes them. */
export type LoggedEvent = z.infer<typeof loggedEventSchema>;

/**
 * In-process pub/sub. `publish` rejects a repeated idempotency key, appends
 * the event to a JSON-lines log (fsynced) and queues it; one consumer drains
 * the queue in order and awaits each subscriber in turn. A failing handler is
 * logged and does not stop delivery to the others.
 *
 * Handlers must not await `idle()` themselves.
 */
export class EventBus {
  private handlers = new Map<EventKind, EventHandler[]>();
  private wildcard: EventHandler[] = [];
  private seen = new Set<string>();
  private queue: TradingEvent[] = [];
  private draining: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private handle: FileHandle | null = null;

  constructor(private logPath: string) {}

  get path(): string {
    return this.logPath;
  }

  async start(): Promise<void> {
    if (this.handle) {
      return;
    }
    await mkdir(dirname(this.logPath), { recursive: true });
    this.handle = await open(this.logPath, "a");
    console.log("EVENT_LOG_OPEN", this.logPath);
  }

  subscribe<K extends EventKind>(kind: K, handler: EventHandler<K>): () => void {
    const wrapped: EventHandler = (event) => (isEventOf(event, kind) ? handler(event) : undefined);
    const list = this.handlers.get(kind) ?? [];
    list.push(wrapped);
    this.handlers.set(kind, list);
    return () => {
      const current = this.handlers.get(kind) ?? [];
      this.handlers.set(
        kind,
        current.filter((h) => h !== wrapped)
      );
    };
  }

  /** Receives every event, after the kind-specific subscribers. */
  subscribeAll(handler: EventHandler): () => void {
    this.wildcard.push(handler);
    return () => {
      this.wildcard = this.wildcard.filter((h) => h !== handler);
    };
  }

  async publish<K extends EventKind>(event: TradingEvent<K>): Promise<void> {
    const key = event.idempotency_key;
    if (this.seen.has(key)) {
      throw new TradingError("DUPLICATE_EVENT", `Duplicate event ${event.kind} (${key})`);
    }
    this.seen.add(key);
    try {
      await this.appendToLog(event);
    } catch (err) {
      this.seen.delete(key);
      throw err;
    }
    this.queue.push(event);
    this.kick();
  }

  /** Builds an event of `kind` with a fresh idempotency key and publishes it. */
  async emit<K extends EventKind>(
    kind: K,
    payload: EventPayloads[K],
    opts: { idempotencyKey?: string; now?: Date } = {}
  ): Promise<TradingEvent<K>> {
    const event = createEvent(kind, payload, opts);
    await this.publish(event);
    return event;
  }

  hasSeen(idempotencyKey: string): boolean {
    return this.seen.has(idempotencyKey);
  }

  /** Resolves once every queued event has been handed to its subscribers. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Logged events with `timestamp_ms >= fromMs`, in log order. */
  async replay(fromMs: number): Promise<LoggedEvent[]> {
    let content: string;
    try {
      content = await readFile(this.logPath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new TradingError("FILE_IO", `Failed to read event log ${this.logPath}`, {
        cause: err
      });
    }
    const events: LoggedEvent[] = [];
    for (const line of content.split("\n")) {
      if (line.trim().length === 0) {
        continue;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        console.warn("EVENT_LOG_LINE_SKIPPED", "invalid JSON", line.slice(0, 80));
        continue;
      }
      const parsed = loggedEventSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn("EVENT_LOG_LINE_SKIPPED", parsed.error.issues[0]?.message ?? "schema");
        continue;
      }
      if (parsed.data.timestamp_ms >= fromMs) {
        events.push(parsed.data);
      }
    }
    return events;
  }

  async stop(): Promise<void> {
    await this.idle();
    await this.writeChain;
    if (this.handle) {
      await this.handle.close();
      this.handle = null;
    }
  }

  private appendToLog(event: TradingEvent): Promise<void> {
    const line = `${JSON.stringify(event)}\n`;
    const write = this.writeChain.then(async () => {
      if (!this.handle) {
        throw new TradingError("EVENT_DISPATCH_FAILED", "Event bus is not started");
      }
      await this.handle.appendFile(line, "utf-8");
      await this.handle.sync();
    });
    // The failure reaches the publisher through `write`; the chain itself stays usable.
    this.writeChain = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private kick() {
    if (this.draining) {
      return;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.queue.length > 0) {
        this.kick();
      }
    });
  }

  private async drain(): Promise<void> {
    let event = this.queue.shift();
    while (event) {
      const subscribers = [...(this.handlers.get(event.kind) ?? []), ...this.wildcard];
      for (const handler of subscribers) {
        try {
          await handler(event);
        } catch (err) {
          console.error("EVENT_HANDLER_ERROR", event.kind, event.idempotency_key, err);
        }
      }
      event = this.queue.shift();
    }
  }
}
