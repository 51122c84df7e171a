// data/databento.ts
// Local Databento OHLCV-1d source for CME crypto futures. Reads the largest
// *.ohlcv-1d.csv in a directory once, on first use, and serves per-contract
// and continuous histories from that cache.

import fs from "fs";
import path from "path";

import {
  buildExpirySchedule,
  expiryFromYYYYMM,
  parseISODate,
  type ISODate,
} from "../derivatives/futures/calendars";
import { contractSymbol, parseContractSymbol } from "../derivatives/futures/contracts";
import {
  buildContinuousSeries,
  indexContractRows,
  type ContractHistorySource,
} from "../derivatives/futures/continuous";
import { err, makeError, ok, toFiniteNumber, type Result } from "../engine/errors";
import { readCSV } from "../engine/reporting/csv";
import { childLogger } from "../observability/logger";
import type { ContinuousPoint, ContractBar, FuturesBar } from "./types";

const log = childLogger("databento");

export const DATABENTO_FILE_SUFFIX = ".ohlcv-1d.csv";

/** Largest matching file in `dir`, or undefined when there is none. */
export function findDatabentoCSV(dir: string): string | undefined {
  if (!fs.existsSync(dir)) return undefined;
  const candidates = fs
    .readdirSync(dir)
    .filter(f => f.endsWith(DATABENTO_FILE_SUFFIX))
    .map(f => path.join(dir, f))
    .map(p => ({ p, size: fs.statSync(p).size }));
  if (candidates.length === 0) return undefined;
  candidates.sort((a, b) => b.size - a.size);
  return candidates[0].p;
}

/**
 * Outright contract rows of one Databento file. Spreads, unparseable symbols
 * and rows without a date or close are skipped.
 */
export function parseDatabentoRows(file: string): ContractBar[] {
  const out: ContractBar[] = [];
  for (const row of readCSV(file)) {
    const parsed = parseContractSymbol(row.symbol ?? "");
    if (!parsed) continue;
    const date = parseISODate((row.ts_event ?? "").slice(0, 10));
    const price = toFiniteNumber(row.close);
    if (!date || price === undefined) continue;
    out.push({
      date,
      root: parsed.root,
      code: parsed.code,
      symbol: row.symbol,
      price,
      volume: toFiniteNumber(row.volume),
    });
  }
  return out;
}

export class DatabentoLocalSource implements ContractHistorySource {
  readonly dataDir: string;
  private cache: Result<ContractBar[]> | undefined;

  constructor(dataDir = "databento") {
    this.dataDir = dataDir;
  }

  /** Loaded once per instance; a new instance re-reads the directory. */
  rows(): Result<ContractBar[]> {
    if (this.cache) return this.cache;

    const file = findDatabentoCSV(this.dataDir);
    if (!file) {
      log.warn(`no Databento CSV found in ${this.dataDir}`);
      this.cache = err(makeError("Data", `No *${DATABENTO_FILE_SUFFIX} file in ${this.dataDir}`, undefined, {
        dir: this.dataDir,
      }));
      return this.cache;
    }

    log.info(`loading Databento CSV: ${file}`);
    const rows = parseDatabentoRows(file);
    log.info(`loaded ${rows.length} contract rows`);
    this.cache = ok(rows);
    return this.cache;
  }

  async fetchContract(root: string, code: string, start: ISODate, end: ISODate): Promise<Result<FuturesBar[]>> {
    const symbol = contractSymbol(root, code);
    if (!symbol) return err(makeError("Fetch", `Invalid contract month code: ${code}`, undefined, { code }));

    const rows = this.rows();
    if (!rows.ok) return rows;

    const expiry = expiryFromYYYYMM(code);
    const bars = rows.value
      .filter(r => r.symbol === symbol && r.date >= start && r.date <= end)
      .map(r => ({ date: r.date, price: r.price, expiry }))
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    log.debug(`${symbol}: ${bars.length} bars in ${start}..${end}`);
    return ok(bars);
  }

  /** Front-month spliced series for `root` over [start, end]. */
  continuousSeries(root: string, start: ISODate, end: ISODate): Result<ContinuousPoint[]> {
    const rows = this.rows();
    if (!rows.ok) return rows;

    const inRange = rows.value.filter(r => r.root === root && r.date >= start && r.date <= end);
    if (inRange.length === 0) {
      log.warn(`no ${root} rows in ${start}..${end}`);
      return ok([]);
    }
    const series = buildContinuousSeries(root, indexContractRows(inRange, root), buildExpirySchedule(start, end));
    log.info(`continuous ${root}: ${series.length} bars`);
    return ok(series);
  }
}
