// data/observations.ts
// Observation series I/O, spot/futures merge, per-date basis rows and the
// rolling-expiry repair.

import fs from "fs";

import {
  buildExpirySchedule,
  daysBetween,
  frontMonthExpiry,
  parseISODate,
  type ExpirySchedule,
  type ISODate,
} from "../derivatives/futures/calendars";
import { err, makeError, ok, toFiniteNumber, type Result } from "../engine/errors";
import { parseCSV, toCSV, writeCSV, type TextRow } from "../engine/reporting/csv";
import { childLogger } from "../observability/logger";
import type { FuturesBar, Observation, SpotBar } from "./types";

const log = childLogger("observations");

export const OBSERVATION_COLUMNS = ["date", "spot_price", "futures_price", "futures_expiry"];

export type ParsedObservations = {
  observations: Observation[];
  skipped: number;      // rows that failed to parse
};

/* ---------------- CSV ---------------- */

function rowToObservation(row: TextRow): Observation | undefined {
  const date = parseISODate(row.date ?? "");
  const futuresExpiry = parseISODate(row.futures_expiry ?? "");
  const spotPrice = toFiniteNumber(row.spot_price);
  const futuresPrice = toFiniteNumber(row.futures_price);
  if (!date || !futuresExpiry || spotPrice === undefined || futuresPrice === undefined) return undefined;
  return { date, spotPrice, futuresPrice, futuresExpiry };
}

/** Rows are kept in file order; unparseable rows are skipped and counted. */
export function parseObservationsCSV(text: string): ParsedObservations {
  const observations: Observation[] = [];
  let skipped = 0;
  for (const row of parseCSV(text)) {
    const obs = rowToObservation(row);
    if (obs) observations.push(obs);
    else skipped++;
  }
  if (skipped > 0) log.warn(`skipped ${skipped} malformed observation rows`);
  return { observations, skipped };
}

export function readObservationsCSV(file: string): Result<ParsedObservations> {
  if (!fs.existsSync(file)) {
    return err(makeError("Data", `Observation file not found: ${file}`, undefined, { file }));
  }
  const parsed = parseObservationsCSV(fs.readFileSync(file, "utf8"));
  log.info(`loaded ${parsed.observations.length} observations from ${file}`);
  return ok(parsed);
}

export function observationRows(observations: readonly Observation[]): Record<string, string | number>[] {
  return observations.map(o => ({
    date: o.date,
    spot_price: o.spotPrice,
    futures_price: o.futuresPrice,
    futures_expiry: o.futuresExpiry,
  }));
}

export function observationsToCSV(observations: readonly Observation[]): string {
  return toCSV(observationRows(observations), { columns: OBSERVATION_COLUMNS });
}

export function writeObservationsCSV(observations: readonly Observation[], file: string): string {
  return writeCSV(observationRows(observations), file, { columns: OBSERVATION_COLUMNS });
}

/**
 * Daily spot closes from a `date,<price>` CSV; the price column may be named
 * price, close or spot_price. Unparseable rows are skipped.
 */
export function parseSpotCSV(text: string): SpotBar[] {
  const out: SpotBar[] = [];
  for (const row of parseCSV(text)) {
    const date = parseISODate(row.date ?? "");
    const price = toFiniteNumber(row.price ?? row.close ?? row.spot_price);
    if (date && price !== undefined) out.push({ date, price });
  }
  return out;
}

/* ---------------- merge ---------------- */

/**
 * Join spot and futures bars on date. Dates missing from either side are
 * dropped. A futures bar without its own expiry takes `contractExpiry`.
 */
export function mergeObservations(
  spot: readonly SpotBar[],
  futures: readonly FuturesBar[],
  contractExpiry: ISODate
): Observation[] {
  const futuresByDate = new Map<ISODate, FuturesBar>();
  for (const bar of futures) futuresByDate.set(bar.date, bar);

  const out: Observation[] = [];
  for (const s of spot) {
    const f = futuresByDate.get(s.date);
    if (!f) continue;
    out.push({
      date: s.date,
      spotPrice: s.price,
      futuresPrice: f.price,
      futuresExpiry: f.expiry ?? contractExpiry,
    });
  }
  out.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  const dropped = spot.length - out.length;
  if (dropped > 0) log.debug(`merge dropped ${dropped} spot dates without a futures bar`);
  return out;
}

/* ---------------- basis rows ---------------- */

export type BasisRow = {
  date: ISODate;
  spot_price: number;
  futures_price: number;
  futures_expiry: ISODate;
  basis_absolute: number;
  basis_percent: number;       // percent
  monthly_basis: number;       // percent, 0 when days_to_expiry <= 0
  annualized_basis: number;    // percent, 0 when days_to_expiry <= 0
  days_to_expiry: number;      // raw calendar days, may be <= 0
};

export function describeBasis(observations: readonly Observation[]): BasisRow[] {
  return observations.map(o => {
    const basis = o.futuresPrice - o.spotPrice;
    const pct = o.spotPrice > 0 ? (basis / o.spotPrice) * 100 : 0;
    const dte = daysBetween(o.date, o.futuresExpiry);
    return {
      date: o.date,
      spot_price: o.spotPrice,
      futures_price: o.futuresPrice,
      futures_expiry: o.futuresExpiry,
      basis_absolute: basis,
      basis_percent: pct,
      monthly_basis: dte > 0 ? pct * (30 / dte) : 0,
      annualized_basis: dte > 0 ? pct * (365 / dte) : 0,
      days_to_expiry: dte,
    };
  });
}

/* ---------------- rolling expiry ---------------- */

/**
 * Reassign each observation's expiry to the front-month expiry on its date.
 * Prices are left untouched. Each contract change is logged.
 */
export function applyRollingExpiry(
  observations: readonly Observation[],
  schedule?: ExpirySchedule
): Observation[] {
  if (observations.length === 0) return [];
  const sched = schedule ?? buildExpirySchedule(observations[0].date, observations[observations.length - 1].date);

  let current: ISODate | undefined;
  const out: Observation[] = [];
  for (const o of observations) {
    const front = frontMonthExpiry(o.date, sched) ?? o.futuresExpiry;
    if (current === undefined) {
      log.info(`initial contract expiry: ${front}`);
    } else if (front !== current) {
      log.info(
        `contract roll on ${o.date}: ${current} (${daysBetween(o.date, current)}d) -> ${front} (${daysBetween(o.date, front)}d)`
      );
    }
    current = front;
    out.push({ ...o, futuresExpiry: front });
  }
  return out;
}
