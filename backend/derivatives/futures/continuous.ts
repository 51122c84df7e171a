// futures/continuous.ts
// Front-month continuous series from per-contract daily rows, plus the
// tradable single-contract history used for basis backtests.
//
// Two different constructions:
//  • reference series: each date takes whichever contract is front month on
//    that date (rolls at expiry, no back-adjustment, no gap filling)
//  • tradable history: one contract, fixed at the run's start date, fetched
//    end-to-end; later contracts are probed only when it returns nothing

import {
  buildExpirySchedule,
  expiryToCode,
  frontMonthExpiry,
  type ExpirySchedule,
  type ISODate,
} from "./calendars";
import { contractName } from "./contracts";
import type { ContinuousPoint, ContractBar, FuturesBar } from "../../data/types";
import { err, makeError, ok, type Result } from "../../engine/errors";
import { childLogger } from "../../observability/logger";

const log = childLogger("continuous");

/** (date, contract code) -> row, for one root symbol. */
export type ContractRowIndex = Map<ISODate, Map<string, ContractBar>>;

export function indexContractRows(rows: readonly ContractBar[], root: string): ContractRowIndex {
  const index: ContractRowIndex = new Map();
  for (const row of rows) {
    if (row.root !== root) continue;
    let byCode = index.get(row.date);
    if (!byCode) {
      byCode = new Map();
      index.set(row.date, byCode);
    }
    byCode.set(row.code, row);
  }
  return index;
}

/**
 * For each date present in `index`, pick the price of the contract that is
 * front month on that date. Dates where that contract has no row are dropped.
 */
export function buildContinuousSeries(
  root: string,
  index: ContractRowIndex,
  schedule: ExpirySchedule
): ContinuousPoint[] {
  const out: ContinuousPoint[] = [];
  const dates = Array.from(index.keys()).sort();

  for (const date of dates) {
    const front = frontMonthExpiry(date, schedule);
    if (!front) continue;
    const code = expiryToCode(front);
    const bar = index.get(date)?.get(code);
    if (bar) out.push({ date, price: bar.price, code });
  }

  log.debug(`continuous ${root}: ${out.length}/${dates.length} dates kept`);
  return out;
}

/* ===================== Tradable front-month history ===================== */

export interface ContractHistorySource {
  fetchContract(root: string, code: string, start: ISODate, end: ISODate): Promise<Result<FuturesBar[]>>;
}

export type FrontContractHistory = {
  code: string;
  expiry: ISODate;
  bars: FuturesBar[];
};

/** Contracts to probe for a run starting at `start`, nearest expiry first. */
export function frontContractCandidates(start: ISODate, end: ISODate): { code: string; expiry: ISODate }[] {
  const schedule = buildExpirySchedule(start, end);
  const front = frontMonthExpiry(start, schedule);
  if (!front) return [];
  return schedule.filter(e => e >= front).map(expiry => ({ code: expiryToCode(expiry), expiry }));
}

/**
 * Fix the contract that is front month at `start` and fetch it for the whole
 * range. Candidates are probed in expiry order and the first one that returns
 * any bars is used.
 */
export async function resolveFrontContract(
  source: ContractHistorySource,
  root: string,
  start: ISODate,
  end: ISODate
): Promise<Result<FrontContractHistory>> {
  for (const { code, expiry } of frontContractCandidates(start, end)) {
    log.info(`trying contract ${contractName(root, code)}`);
    const res = await source.fetchContract(root, code, start, end);
    if (!res.ok) {
      log.warn(`fetch failed for ${contractName(root, code)}: ${res.error.message}`);
      continue;
    }
    if (res.value.length > 0) {
      log.info(`using contract ${contractName(root, code)} (${res.value.length} bars)`);
      return ok({ code, expiry, bars: res.value });
    }
    log.warn(`no data for ${contractName(root, code)}, trying next`);
  }
  return err(makeError("Fetch", `No ${root} contract returned data for ${start}..${end}`, undefined, { root, start, end }));
}

