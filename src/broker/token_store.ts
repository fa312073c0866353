import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { isMissingFile } from "../data/bar_store.js";
import { TradingError } from "../errors/trading_error.js";
import { addDaysIST, istDateTime, tradeDateIST } from "../utils/ist_time.js";

export interface StoredTokens {
  accessToken: string;
  feedToken: string | null;
  accessExpiry: string;
  feedExpiry: string | null;
  refreshToken: string | null;
  userId: string | null;
  createdAt: string;
}

const tokenFileSchema = z.object({
  access_token: z.string().min(1),
  feed_token: z.string().nullable().default(null),
  access_expiry: z.string(),
  feed_expiry: z.string().nullable().default(null),
  refresh_token: z.string().nullable().default(null),
  user_id: z.string().nullable().default(null),
  created_at: z.string()
});

// Kite Connect sessions end at 06:00 IST the morning after login.
const KITE_SESSION_RESET = "06:00";

export function kiteSessionExpiry(loginAt: Date): Date {
  const today = tradeDateIST(loginAt);
  const sameDay = istDateTime(today, KITE_SESSION_RESET);
  if (loginAt.getTime() < sameDay.getTime()) {
    return sameDay;
  }
  return istDateTime(addDaysIST(today, 1), KITE_SESSION_RESET);
}

export function secondsUntilExpiry(tokens: StoredTokens, now: Date): number {
  return Math.floor((Date.parse(tokens.accessExpiry) - now.getTime()) / 1000);
}

/** JSON token file, replaced atomically through a temp file and rename. */
export class TokenStore {
  constructor(readonly path: string) {}

  async load(): Promise<StoredTokens | null> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return null;
      }
      throw new TradingError("FILE_IO", `Failed to read token file ${this.path}`, { cause: err });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new TradingError("DESERIALIZATION", `Token file ${this.path} is not JSON`, { cause: err });
    }
    const parsed = tokenFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TradingError("DESERIALIZATION", `Malformed token file: ${parsed.error.message}`);
    }
    const t = parsed.data;
    return {
      accessToken: t.access_token,
      feedToken: t.feed_token,
      accessExpiry: t.access_expiry,
      feedExpiry: t.feed_expiry,
      refreshToken: t.refresh_token,
      userId: t.user_id,
      createdAt: t.created_at
    };
  }

  /** The stored tokens while the access token is still valid at `now`. */
  async loadValid(now: Date = new Date()): Promise<StoredTokens | null> {
    const tokens = await this.load();
    if (!tokens) {
      return null;
    }
    if (secondsUntilExpiry(tokens, now) <= 0) {
      console.warn("TOKEN_FILE_EXPIRED", tokens.accessExpiry);
      return null;
    }
    return tokens;
  }

  async save(tokens: StoredTokens): Promise<void> {
    const body = JSON.stringify(
      {
        access_token: tokens.accessToken,
        feed_token: tokens.feedToken,
        access_expiry: tokens.accessExpiry,
        feed_expiry: tokens.feedExpiry,
        refresh_token: tokens.refreshToken,
        user_id: tokens.userId,
        created_at: tokens.createdAt
      },
      null,
      2
    );
    const tmp = `${this.path}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmp, `${body}\n`, { encoding: "utf-8", mode: 0o600 });
      await rename(tmp, this.path);
    } catch (err) {
      throw new TradingError("FILE_WRITE_FAILED", `Failed to write token file ${this.path}`, {
        cause: err
      });
    }
  }
}
