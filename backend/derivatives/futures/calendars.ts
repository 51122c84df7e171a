// futures/calendars.ts
// Month-end ("last trading Friday") expiry calendar and front-month selection
// for monthly cash-settled crypto futures. UTC dates only.

import { makeError } from "../../engine/errors";

/** ==== Types ==== */
export type ISODate = string; // "YYYY-MM-DD"

/** Sorted, distinct expiry dates covering a date range plus a forward buffer. */
export type ExpirySchedule = readonly ISODate[];

/** Forward buffer so dates near the end of a range still have a "next" expiry. */
export const EXPIRY_BUFFER_DAYS = 60;

const DAY_MS = 86_400_000;
const FRIDAY = 5; // 0 = Sun .. 6 = Sat

/** ==== Date helpers (no timezone shenanigans; use UTC parts only) ==== */
export function ymd(date: Date): { y: number; m: number; d: number } {
  return { y: date.getUTCFullYear(), m: date.getUTCMonth() + 1, d: date.getUTCDate() };
}
export function toISO(date: Date): ISODate {
  const { y, m, d } = ymd(date);
  const mm = String(m).padStart(2, "0");
  const dd = String(d).padStart(2, "0");
  return `${y}-${mm}-${dd}`;
}
export function fromYMD(y: number, m: number, d: number): Date {
  return new Date(Date.UTC(y, m - 1, d, 0, 0, 0, 0));
}
export function fromISO(s: ISODate): Date {
  const [y, m, d] = s.slice(0, 10).split("-").map(x => parseInt(x, 10));
  return fromYMD(y, m, d);
}
export function addDays(date: Date, delta: number): Date {
  const t = new Date(date.getTime());
  t.setUTCDate(t.getUTCDate() + delta);
  return t;
}
export function addDaysISO(iso: ISODate, delta: number): ISODate {
  return toISO(addDays(fromISO(iso), delta));
}
export function endOfMonth(y: number, m: number): Date {
  const d = fromYMD(y, m, 1);
  d.setUTCMonth(d.getUTCMonth() + 1);
  d.setUTCDate(0); // move to last day of previous month
  return d;
}
export function weekday(date: Date): number {
  return date.getUTCDay();
}
export function todayISO(): ISODate {
  return toISO(new Date());
}

/**
 * Accepts "YYYY-MM-DD", a full ISO timestamp, or a Date; returns the calendar
 * date, or undefined when the input is not a real date.
 */
export function parseISODate(x: string | Date): ISODate | undefined {
  if (x instanceof Date) return isNaN(x.getTime()) ? undefined : toISO(x);
  const m = /^(\d{4})-(\d{2})-(\d{2})/.exec(x.trim());
  if (!m) return undefined;
  const [y, mo, d] = [+m[1], +m[2], +m[3]];
  const date = fromYMD(y, mo, d);
  const back = ymd(date);
  if (back.y !== y || back.m !== mo || back.d !== d) return undefined;
  return toISO(date);
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: ISODate, to: ISODate): number {
  return Math.round((fromISO(to).getTime() - fromISO(from).getTime()) / DAY_MS);
}

export function daysToExpiry(expiry: ISODate, from: ISODate = todayISO()): number {
  return daysBetween(from, expiry);
}

/** ==== Expiry rule ==== */

/** Last Friday on or before the last calendar day of the month. */
export function lastTradingFriday(year: number, month: number): ISODate {
  const last = endOfMonth(year, month);
  const back = (weekday(last) - FRIDAY + 7) % 7;
  return toISO(addDays(last, -back));
}

/** ==== Contract month codes (YYYYMM) ==== */

export function yyyymm(year: number, month: number): string {
  return `${String(year).padStart(4, "0")}${String(month).padStart(2, "0")}`;
}

export function parseYYYYMM(code: string): { year: number; month: number } | undefined {
  if (!/^\d{6}$/.test(code)) return undefined;
  const year = parseInt(code.slice(0, 4), 10);
  const month = parseInt(code.slice(4, 6), 10);
  if (month < 1 || month > 12) return undefined;
  return { year, month };
}

export function expiryFromYYYYMM(code: string): ISODate {
  const parsed = parseYYYYMM(code);
  if (!parsed) throw makeError("Data", `Invalid contract month code: ${code}`, undefined, { code });
  return lastTradingFriday(parsed.year, parsed.month);
}

/** Contract month code of an expiry date ("2024-02-23" -> "202402"). */
export function expiryToCode(expiry: ISODate): string {
  const { y, m } = ymd(fromISO(expiry));
  return yyyymm(y, m);
}

/**
 * Front-month code for a reference date: the current month until its last
 * trading Friday, the following month from that Friday on.
 */
export function frontMonthCode(referenceDate: ISODate = todayISO()): string {
  const { y, m } = ymd(fromISO(referenceDate));
  if (referenceDate.slice(0, 10) < lastTradingFriday(y, m)) return yyyymm(y, m);
  return m === 12 ? yyyymm(y + 1, 1) : yyyymm(y, m + 1);
}

/** ==== Schedules ==== */

/**
 * Every month's expiry from `start`'s month through the month containing
 * `end + bufferDays`, sorted and de-duplicated.
 */
export function buildExpirySchedule(
  start: ISODate,
  end: ISODate,
  bufferDays: number = EXPIRY_BUFFER_DAYS
): ExpirySchedule {
  const limit = addDays(fromISO(end), bufferDays);
  let { y, m } = ymd(fromISO(start));
  const out = new Set<ISODate>();
  while (fromYMD(y, m, 1) <= limit) {
    out.add(lastTradingFriday(y, m));
    m++;
    if (m > 12) { m = 1; y++; }
  }
  return Array.from(out).sort();
}

/**
 * Nearest expiry on or after `date`. Past the buffered range this falls back
 * to the schedule's last entry; undefined only for an empty schedule.
 */
export function frontMonthExpiry(date: ISODate, schedule: ExpirySchedule): ISODate | undefined {
  const day = date.slice(0, 10);
  for (const expiry of schedule) {
    if (expiry >= day) return expiry;
  }
  return schedule[schedule.length - 1];
}

/**
 * Date range over which one contract is traded as front month.
 * Default: previous expiry .. expiry - 1 day.
 * endOnExpiry: previous expiry + 1 day .. expiry.
 */
export function expiryWindow(code: string, endOnExpiry = false): { start: ISODate; end: ISODate } {
  const expiry = expiryFromYYYYMM(code);
  const { y, m } = ymd(fromISO(expiry));
  const prev = m === 1 ? lastTradingFriday(y - 1, 12) : lastTradingFriday(y, m - 1);
  return endOnExpiry
    ? { start: addDaysISO(prev, 1), end: expiry }
    : { start: prev, end: addDaysISO(expiry, -1) };
}
