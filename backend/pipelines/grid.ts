// pipelines/grid.ts
// Grid pipeline: run the basis backtester across a threshold/holding grid.
//
// What it does:
//  • builds the cartesian product of entry, stop, exit and holding values
//  • drops combinations with entry <= stop or exit <= entry
//  • runs one backtest per surviving combination over the same read-only series
//  • ranks by total return and compares the best against the default parameters
//
// runGridSearch is synchronous; runGridSearchAsync drains the same combos
// through a bounded worker queue and stops early on an AbortSignal.

import fs from "fs";
import path from "path";

import { Backtester, type BacktesterConfig } from "../backtester/engine";
import type { BacktestResult } from "../backtester/trade";
import type { Observation } from "../data/types";
import { invariant } from "../engine/errors";
import { childLogger } from "../observability/logger";

const log = childLogger("grid");

/* ---------------- grid ---------------- */

export type GridSpec = {
  entry: number[];
  stop: number[];
  exit: number[];
  hold: number[];
};

export type GridParams = {
  entry: number;
  stop: number;
  exit: number;
  hold: number;
};

/** Inclusive float range, each value rounded to 6 places. */
export function frange(start: number, stop: number, step: number): number[] {
  invariant(step > 0, `frange step must be positive, got ${step}`, "Optimizer", { start, stop, step });
  const values: number[] = [];
  for (let val = start; val <= stop + step / 10; val += step) {
    values.push(Math.round(val * 1e6) / 1e6);
  }
  return values;
}

export const DEFAULT_GRID: Readonly<GridSpec> = {
  entry: frange(0.002, 0.02, 0.002),
  stop: frange(0.001, 0.005, 0.001),
  exit: frange(0.02, 0.06, 0.005),
  hold: [10, 20, 30, 40, 50, 60],
};

export const BASELINE_PARAMS: Readonly<GridParams> = { entry: 0.005, stop: 0.002, exit: 0.035, hold: 30 };

function cartesian<T>(arrs: T[][]): T[][] {
  return arrs.reduce<T[][]>((a, b) => a.flatMap(d => b.map(e => [...d, e])), [[]]);
}

export function isValidCombo(p: GridParams): boolean {
  return p.entry > p.stop && p.exit > p.entry;
}

/** Surviving combinations in grid order, plus the raw product size. */
export function buildGrid(spec: GridSpec = DEFAULT_GRID): { combos: GridParams[]; total: number } {
  const product = cartesian([spec.entry, spec.stop, spec.exit, spec.hold]);
  const combos = product
    .map(([entry, stop, exit, hold]) => ({ entry, stop, exit, hold }))
    .filter(isValidCombo);
  return { combos, total: product.length };
}

/* ---------------- scoring ---------------- */

export type GridRow = GridParams & {
  return: number;
  sharpe: number;
  maxDd: number;
  trades: number;
  winRate: number;
  wins: number;
  losses: number;
};

export type OptimizationReport = {
  totalCombos: number;     // raw product size
  evaluated: number;       // combinations actually run
  results: GridRow[];      // all evaluated rows, best return first
  valid: GridRow[];        // rows with at least one trade
  top: GridRow[];          // first topN of `valid`
  best: GridRow | null;
  baseline: GridRow;
  aborted: boolean;
};

export type GridOptions = {
  grid?: GridSpec;
  topN?: number;
};

function toRow(p: GridParams, r: BacktestResult): GridRow {
  return {
    ...p,
    return: r.totalReturn,
    sharpe: r.sharpeRatio,
    maxDd: r.maxDrawdown,
    trades: r.totalTrades,
    winRate: r.winRate,
    wins: r.winningTrades,
    losses: r.losingTrades,
  };
}

export function evaluateCombo(
  observations: readonly Observation[],
  base: Partial<BacktesterConfig>,
  p: GridParams
): GridRow {
  const bt = new Backtester({
    ...base,
    entryThreshold: p.entry,
    stopLossThreshold: p.stop,
    exitThreshold: p.exit,
    holdingDays: p.hold,
  });
  return toRow(p, bt.run(observations, p.hold));
}

type Indexed = { idx: number; row: GridRow };

function buildReport(
  scored: Indexed[],
  total: number,
  baseline: GridRow,
  topN: number,
  aborted: boolean
): OptimizationReport {
  // stable on grid order for equal returns
  const results = scored
    .slice()
    .sort((a, b) => b.row.return - a.row.return || a.idx - b.idx)
    .map(x => x.row);
  const valid = results.filter(r => r.trades > 0);
  return {
    totalCombos: total,
    evaluated: results.length,
    results,
    valid,
    top: valid.slice(0, topN),
    best: valid[0] ?? null,
    baseline,
    aborted,
  };
}

export function runGridSearch(
  observations: readonly Observation[],
  base: Partial<BacktesterConfig> = {},
  opts: GridOptions = {}
): OptimizationReport {
  const { combos, total } = buildGrid(opts.grid);
  log.info(`grid search: ${combos.length}/${total} valid combinations over ${observations.length} observations`);

  const scored = combos.map((p, idx) => ({ idx, row: evaluateCombo(observations, base, p) }));
  const baseline = evaluateCombo(observations, base, BASELINE_PARAMS);
  const report = buildReport(scored, total, baseline, opts.topN ?? 20, false);
  log.info(`grid search done: ${report.valid.length}/${report.evaluated} combinations traded`);
  return report;
}

export type AsyncGridOptions = GridOptions & {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
};

const yieldToLoop = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Same sweep as runGridSearch, drained by `concurrency` workers that yield
 * to the event loop between combinations. On abort, rows scored so far are
 * reported and `aborted` is set.
 */
export async function runGridSearchAsync(
  observations: readonly Observation[],
  base: Partial<BacktesterConfig> = {},
  opts: AsyncGridOptions = {}
): Promise<OptimizationReport> {
  const { combos, total } = buildGrid(opts.grid);
  const conc = Math.max(1, Math.floor(opts.concurrency ?? 2));
  log.info(`grid search: ${combos.length}/${total} valid combinations, concurrency ${conc}`);

  const scored: Indexed[] = [];
  const queue = combos.map((p, idx) => ({ idx, p }));
  let done = 0;

  const workers = Array.from({ length: Math.min(conc, queue.length || 1) }, async () => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      if (opts.signal?.aborted) return;
      scored.push({ idx: next.idx, row: evaluateCombo(observations, base, next.p) });
      done++;
      opts.onProgress?.(done, combos.length);
      await yieldToLoop();
    }
  });

  await Promise.all(workers);

  const aborted = opts.signal?.aborted ?? false;
  if (aborted) log.warn(`grid search aborted after ${scored.length}/${combos.length} combinations`);

  const baseline = evaluateCombo(observations, base, BASELINE_PARAMS);
  return buildReport(scored, total, baseline, opts.topN ?? 20, aborted);
}

/* ---------------- persistence ---------------- */

export type BestParams = {
  entry_threshold: number;
  stop_loss_threshold: number;
  exit_threshold: number;
  holding_days: number;
};

export function bestParams(row: GridParams): BestParams {
  return {
    entry_threshold: row.entry,
    stop_loss_threshold: row.stop,
    exit_threshold: row.exit,
    holding_days: row.hold,
  };
}

/** Writes the best row as JSON; returns false when there is no best row. */
export function saveBestParams(report: OptimizationReport, outPath: string): boolean {
  if (!report.best) return false;
  fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
  fs.writeFileSync(outPath, JSON.stringify(bestParams(report.best), null, 2) + "\n", "utf8");
  log.info(`saved best params to ${outPath}`);
  return true;
}
