import { createHash } from "node:crypto";

export function idempotencyKey(...components: Array<string | number>): string {
  return createHash("sha256").update(components.map(String).join("|")).digest("hex");
}

export function entryOrderKey(
  sessionId: string,
  underlying: string,
  optionType: string,
  strike: number,
  timestampMs: number
): string {
  return idempotencyKey("ENTRY", sessionId, underlying.toUpperCase(), optionType, strike, timestampMs);
}

export function exitOrderKey(positionId: string, reason: string): string {
  return idempotencyKey("EXIT", positionId, reason);
}
