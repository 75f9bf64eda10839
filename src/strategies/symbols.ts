/**
 * Option symbol construction for the broker's symbology.
 *
 *   monthly  NSE:NIFTY25JAN22250CE      {YY}{MMM}
 *   weekly   NSE:NIFTY2511622250CE      {YY}{M}{DD}, M = 1-9, O, N, D
 *
 * Weekly expiries step by seven days, so the last expiry of a month is the
 * one whose next week falls in another month. That contract is listed under
 * the monthly code even in weekly mode.
 */

import type { ExpiryFormat } from "../config/schema";
import type { OptionType } from "../domain/trade.types";
import { zonedParts } from "../utils/time.util";

const MONTH_NAMES = [
  "JAN",
  "FEB",
  "MAR",
  "APR",
  "MAY",
  "JUN",
  "JUL",
  "AUG",
  "SEP",
  "OCT",
  "NOV",
  "DEC",
];

const WEEKLY_MONTH_CODES = ["1", "2", "3", "4", "5", "6", "7", "8", "9", "O", "N", "D"];

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export function isLastExpiryOfMonth(expiry: Date, timeZone: string): boolean {
  const nextWeek = new Date(expiry.getTime() + WEEK_MS);
  return zonedParts(nextWeek, timeZone).month !== zonedParts(expiry, timeZone).month;
}

/**
 * Expiry segment of an option symbol; the expiry date is read in `timeZone`
 */
export function expiryCode(expiry: Date, format: ExpiryFormat, timeZone: string): string {
  const { year, month, day } = zonedParts(expiry, timeZone);
  const yy = String(year % 100).padStart(2, "0");
  if (format === "monthly" || isLastExpiryOfMonth(expiry, timeZone)) {
    return `${yy}${MONTH_NAMES[month - 1]}`;
  }
  return `${yy}${WEEKLY_MONTH_CODES[month - 1]}${String(day).padStart(2, "0")}`;
}

export interface OptionSymbolParts {
  exchange: string;
  underlying: string;
  expiryCode: string;
  strike: number;
  optionType: OptionType;
}

export function buildOptionSymbol(parts: OptionSymbolParts): string {
  return `${parts.exchange}:${parts.underlying}${parts.expiryCode}${parts.strike}${parts.optionType}`;
}
