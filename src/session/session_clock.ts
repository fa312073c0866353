import { SessionConfig } from "../config/config.js";
import { MarketHours } from "../oms/order_validator.js";
import {
  addDaysIST,
  DAY_MS,
  istDateTime,
  istMidnightMs,
  parseClock,
  parseDateIST,
  secondsOfDayIST,
  tradeDateIST,
  weekdayIST
} from "../utils/ist_time.js";
import { TradingCalendar } from "./trading_calendar.js";

export interface SessionWindow {
  open: Date;
  close: Date;
}

const WEEKDAY_INDEX = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 } as const;
const EXPIRY_WEEKDAY = WEEKDAY_INDEX.Thu;

/**
 * Exchange session timing on the IST wall clock. Every check takes `now`
 * explicitly; nothing here reads the system clock.
 */
export class SessionClock implements MarketHours {
  private openSec: number;
  private closeSec: number;
  private entryStartSec: number;
  private entryEndSec: number;
  private eodSec: number;

  constructor(
    private cfg: SessionConfig,
    private calendar: TradingCalendar
  ) {
    this.openSec = parseClock(cfg.marketOpenTime);
    this.closeSec = parseClock(cfg.marketCloseTime);
    this.entryStartSec = parseClock(cfg.entryWindowStart);
    this.entryEndSec = parseClock(cfg.entryWindowEnd);
    this.eodSec = parseClock(cfg.eodExitTime);
  }

  isTradingDay(date: string | Date): boolean {
    return this.calendar.isTradingDay(typeof date === "string" ? date : tradeDateIST(date));
  }

  sessionWindow(date: string): SessionWindow {
    return {
      open: istDateTime(date, this.cfg.marketOpenTime),
      close: istDateTime(date, this.cfg.marketCloseTime)
    };
  }

  isMarketOpen(now: Date): boolean {
    if (!this.isTradingDay(now)) {
      return false;
    }
    const sec = secondsOfDayIST(now);
    return sec >= this.openSec && sec < this.closeSec;
  }

  isInEntryWindow(now: Date, start?: string, end?: string): boolean {
    if (!this.isTradingDay(now)) {
      return false;
    }
    const from = start === undefined ? this.entryStartSec : parseClock(start);
    const to = end === undefined ? this.entryEndSec : parseClock(end);
    const sec = secondsOfDayIST(now);
    return sec >= from && sec < to;
  }

  isEodReached(now: Date): boolean {
    return secondsOfDayIST(now) >= this.eodSec;
  }

  isAfterClose(now: Date): boolean {
    return secondsOfDayIST(now) >= this.closeSec;
  }

  /** Earliest instant the day's direction may be computed: open plus the analysis delay. */
  dailyAnalysisTime(date: string): Date {
    const open = istDateTime(date, this.cfg.marketOpenTime);
    return new Date(open.getTime() + this.cfg.dailyAnalysisDelayMin * 60_000);
  }

  /** Today's open if it is still ahead, otherwise the next trading day's. */
  nextMarketOpen(now: Date): Date {
    const today = tradeDateIST(now);
    if (this.isTradingDay(today)) {
      const open = istDateTime(today, this.cfg.marketOpenTime);
      if (now.getTime() < open.getTime()) {
        return open;
      }
    }
    let date = today;
    for (let i = 0; i < 30; i += 1) {
      date = addDaysIST(date, 1);
      if (this.isTradingDay(date)) {
        return istDateTime(date, this.cfg.marketOpenTime);
      }
    }
    return istDateTime(addDaysIST(today, 1), this.cfg.marketOpenTime);
  }

  /**
   * Weekly expiry on or after `date`: that week's Thursday, moved back to the
   * previous trading day when the Thursday is a holiday.
   */
  weeklyExpiry(date: string): string {
    const weekday = WEEKDAY_INDEX[weekdayIST(parseDateIST(date))];
    const ahead = (EXPIRY_WEEKDAY - weekday + 7) % 7;
    let thursday = addDaysIST(date, ahead);
    for (let week = 0; week < 3; week += 1) {
      let expiry = thursday;
      let guard = 0;
      while (!this.isTradingDay(expiry) && guard < 7) {
        expiry = addDaysIST(expiry, -1);
        guard += 1;
      }
      if (expiry >= date) {
        return expiry;
      }
      thursday = addDaysIST(thursday, 7);
    }
    return thursday;
  }

  /** Calendar days from today (IST) to `expiry`, or to the weekly expiry when none is known. */
  daysToExpiry(now: Date, expiry: string | null = null): number {
    const today = tradeDateIST(now);
    const target = expiry ?? this.weeklyExpiry(today);
    const days = Math.round((parseDateIST(target) - istMidnightMs(now.getTime())) / DAY_MS);
    return Math.max(0, days);
  }
}
