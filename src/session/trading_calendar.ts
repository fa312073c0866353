import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { isMissingFile } from "../data/bar_store.js";
import { TradingError } from "../errors/trading_error.js";
import { addDaysIST, parseDateIST, weekdayIST } from "../utils/ist_time.js";

export interface TradingCalendar {
  /** `date` is an IST calendar date, YYYY-MM-DD. */
  isTradingDay(date: string): boolean;
}

const holidayFileSchema = z.object({
  exchange: z.string().optional(),
  holidays: z.array(
    z.object({
      date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
      name: z.string().optional()
    })
  )
});

export const DEFAULT_HOLIDAYS_PATH = fileURLToPath(
  new URL("../../resources/nse_holidays.json", import.meta.url)
);

// Bounded scan so a calendar full of holidays can't loop forever.
const MAX_SCAN_DAYS = 30;

/** Weekdays minus a fixed set of exchange holidays. */
export class HolidayCalendar implements TradingCalendar {
  private holidays: Set<string>;

  constructor(holidays: Iterable<string> = []) {
    this.holidays = new Set(holidays);
  }

  isTradingDay(date: string): boolean {
    const weekday = weekdayIST(parseDateIST(date));
    if (weekday === "Sat" || weekday === "Sun") {
      return false;
    }
    return !this.holidays.has(date);
  }

  isHoliday(date: string): boolean {
    return this.holidays.has(date);
  }

  holidayCount(): number {
    return this.holidays.size;
  }

  nextTradingDay(date: string): string {
    return scan(this, date, 1);
  }

  previousTradingDay(date: string): string {
    return scan(this, date, -1);
  }
}

function scan(calendar: TradingCalendar, from: string, step: 1 | -1): string {
  let date = from;
  for (let i = 0; i < MAX_SCAN_DAYS; i += 1) {
    date = addDaysIST(date, step);
    if (calendar.isTradingDay(date)) {
      return date;
    }
  }
  throw new TradingError("NON_TRADING_DAY", `No trading day within ${MAX_SCAN_DAYS} days of ${from}`);
}

/**
 * Reads the holiday file. An explicitly configured file must exist; a missing
 * bundled file degrades to a weekends-only calendar.
 */
export async function loadHolidayCalendar(path: string | null = null): Promise<HolidayCalendar> {
  const target = path ?? DEFAULT_HOLIDAYS_PATH;
  let content: string;
  try {
    content = await readFile(target, "utf-8");
  } catch (err) {
    if (isMissingFile(err) && path === null) {
      console.warn("HOLIDAYS_FILE_MISSING", target, "weekends only");
      return new HolidayCalendar();
    }
    throw new TradingError("FILE_NOT_FOUND", `Cannot read holidays file ${target}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new TradingError("DESERIALIZATION", `Holidays file ${target} is not JSON`, { cause: err });
  }
  const parsed = holidayFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TradingError("DESERIALIZATION", `Malformed holidays file ${target}: ${parsed.error.message}`);
  }
  const calendar = new HolidayCalendar(parsed.data.holidays.map((h) => h.date));
  console.log("HOLIDAYS_LOADED", target, calendar.holidayCount());
  return calendar;
}
