import { TradingError } from "../errors/trading_error.js";

export const IST_TIME_ZONE = "Asia/Kolkata";

// India observes no daylight saving, so local time is always UTC+05:30.
export const IST_OFFSET_MS = (5 * 60 + 30) * 60 * 1000;
export const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export interface IstParts {
  weekday: Weekday;
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
  date: string; // YYYY-MM-DD
}

export function partsIST(now: Date): IstParts {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone: IST_TIME_ZONE,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit"
  }).formatToParts(now);
  const get = (type: string) => parts.find((x) => x.type === type)?.value ?? "";
  return {
    weekday: weekdayIST(now.getTime()),
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second"),
    date: `${get("year")}-${get("month")}-${get("day")}`
  };
}

export function weekdayIST(ms: number): Weekday {
  return WEEKDAYS[new Date(ms + IST_OFFSET_MS).getUTCDay()] ?? "Sun";
}

export function tradeDateIST(now: Date = new Date()): string {
  return partsIST(now).date;
}

export function archiveStampIST(now: Date = new Date()): string {
  const p = partsIST(now);
  return `${p.year}${p.month}${p.day}_${p.hour}${p.minute}${p.second}`;
}

export function secondsOfDayIST(now: Date): number {
  const local = now.getTime() + IST_OFFSET_MS;
  return Math.floor((((local % DAY_MS) + DAY_MS) % DAY_MS) / 1000);
}

/** Start of the IST calendar day containing `ms`, as a UTC epoch millisecond. */
export function istMidnightMs(ms: number): number {
  return Math.floor((ms + IST_OFFSET_MS) / DAY_MS) * DAY_MS - IST_OFFSET_MS;
}

/** Parses "HH:MM" or "HH:MM:SS" into seconds after midnight. */
export function parseClock(hhmm: string): number {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(hhmm.trim());
  if (!match) {
    throw new TradingError("INVALID_PARAMETER", `Invalid time of day: "${hhmm}"`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = Number(match[3] ?? "0");
  if (hour > 23 || minute > 59 || second > 59) {
    throw new TradingError("INVALID_PARAMETER", `Invalid time of day: "${hhmm}"`);
  }
  return hour * 3600 + minute * 60 + second;
}

/** UTC instant for an IST wall-clock time on the given YYYY-MM-DD date. */
export function istDateTime(date: string, clock: string): Date {
  const midnight = parseDateIST(date);
  return new Date(midnight + parseClock(clock) * 1000);
}

/** UTC epoch ms of IST midnight for a YYYY-MM-DD date. */
export function parseDateIST(date: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date.trim());
  if (!match) {
    throw new TradingError("INVALID_PARAMETER", `Invalid date: "${date}"`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) - IST_OFFSET_MS;
}

export function addDaysIST(date: string, days: number): string {
  return tradeDateIST(new Date(parseDateIST(date) + days * DAY_MS));
}
