import { BrokerGateway } from "../broker/broker_gateway.js";

export interface VixSink {
  updateVix(vix: number): Promise<void>;
}

/** Polls India VIX at a fixed interval and pushes each reading into the sink. */
export class VixFeed {
  private timer: NodeJS.Timeout | null = null;
  private polling: Promise<number | null> | null = null;
  private last: number | null = null;

  constructor(
    private broker: Pick<BrokerGateway, "ltp">,
    private vixToken: string,
    private sink: VixSink,
    private intervalSec: number
  ) {}

  latest(): number | null {
    return this.last;
  }

  /** One reading; overlapping calls share the request in flight. */
  pollOnce(): Promise<number | null> {
    if (!this.polling) {
      this.polling = this.fetchAndPush().finally(() => {
        this.polling = null;
      });
    }
    return this.polling;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.pollOnce().catch((err: unknown) => console.error("VIX_FEED_ERROR", err));
    }, this.intervalSec * 1000);
    console.log("VIX_FEED_STARTED", this.vixToken, `every=${this.intervalSec}s`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async fetchAndPush(): Promise<number | null> {
    let vix: number;
    try {
      vix = await this.broker.ltp(this.vixToken);
    } catch (err) {
      console.warn("VIX_POLL_FAIL", err instanceof Error ? err.message : err);
      return null;
    }
    if (!Number.isFinite(vix) || vix <= 0) {
      console.warn("VIX_POLL_INVALID", vix);
      return null;
    }
    this.last = vix;
    await this.sink.updateVix(vix);
    return vix;
  }
}
