/**
 * NSE session helpers. IST is a fixed UTC+05:30 offset (no DST).
 */
import { format, getDay, isValid, parseISO, subDays } from "date-fns";

const IST_OFFSET_MS = (5 * 60 + 30) * 60 * 1000;
const OPEN_SECONDS = (9 * 60 + 15) * 60;
const CLOSE_SECONDS = (15 * 60 + 30) * 60;

export type MarketStatus = "open" | "closed" | "weekend";

export interface MarketNotice {
  level: "warning" | "info";
  message: string;
}

export interface DateSuggestion {
  /** yyyy-MM-dd */
  date: string;
  reason: string;
}

export const NO_DATA_REASONS: readonly string[] = [
  "Selected date is a weekend or market holiday",
  "Data is not yet available (market may still be open)",
  "NSE servers are temporarily unavailable",
  "No trading occurred on this date",
];

interface IstClock {
  date: string;
  weekday: number;
  secondsOfDay: number;
}

function toIst(now: Date): IstClock {
  const shifted = new Date(now.getTime() + IST_OFFSET_MS);
  const y = shifted.getUTCFullYear();
  const m = String(shifted.getUTCMonth() + 1).padStart(2, "0");
  const d = String(shifted.getUTCDate()).padStart(2, "0");
  return {
    date: `${y}-${m}-${d}`,
    weekday: shifted.getUTCDay(),
    secondsOfDay:
      shifted.getUTCHours() * 3600 +
      shifted.getUTCMinutes() * 60 +
      shifted.getUTCSeconds(),
  };
}

/** Today's date in IST, yyyy-MM-dd. */
export function todayInIst(now: Date): string {
  return toIst(now).date;
}

export function getMarketStatus(now: Date): MarketStatus {
  const ist = toIst(now);
  if (ist.weekday === 0 || ist.weekday === 6) return "weekend";
  if (ist.secondsOfDay >= OPEN_SECONDS && ist.secondsOfDay <= CLOSE_SECONDS) {
    return "open";
  }
  return "closed";
}

/**
 * Banner for a query on today's date. Only weekdays produce one.
 */
export function getMarketNotice(
  tradeDate: string,
  now: Date
): MarketNotice | undefined {
  const ist = toIst(now);
  if (tradeDate !== ist.date) return undefined;
  const status = getMarketStatus(now);
  if (status === "open") {
    return {
      level: "warning",
      message: "Market is open. Data may not be available yet.",
    };
  }
  if (status === "closed" && ist.secondsOfDay < OPEN_SECONDS) {
    return {
      level: "info",
      message: "Market hasn't opened. Previous day's data shown if available.",
    };
  }
  return undefined;
}

/**
 * Nearest date worth trying when `tradeDate` has no data: the previous
 * Friday for a weekend, the previous day for today.
 */
export function suggestAlternativeDate(
  tradeDate: string,
  today: string
): DateSuggestion | undefined {
  const date = parseISO(tradeDate);
  if (!isValid(date)) return undefined;
  const weekday = getDay(date);
  if (weekday === 6 || weekday === 0) {
    const friday = subDays(date, weekday === 6 ? 1 : 2);
    return { date: format(friday, "yyyy-MM-dd"), reason: "Previous Friday" };
  }
  if (tradeDate === today) {
    return {
      date: format(subDays(date, 1), "yyyy-MM-dd"),
      reason: "Previous day",
    };
  }
  return undefined;
}
