#!/usr/bin/env node
// backtester/cli.ts
// basis-backtest <command> [--flag=value ...]

import fs from "fs";
import path from "path";

import { Backtester } from "./engine";
import { calculateNetPnl } from "./costs";
import type { BacktestResult } from "./trade";
import { DatabentoLocalSource } from "../data/databento";
import {
  applyRollingExpiry,
  describeBasis,
  mergeObservations,
  parseSpotCSV,
  readObservationsCSV,
  writeObservationsCSV,
} from "../data/observations";
import { generateSampleData } from "../data/sample";
import type { Observation } from "../data/types";
import {
  expiryWindow,
  frontMonthCode,
  parseISODate,
  todayISO,
  type ISODate,
} from "../derivatives/futures/calendars";
import { contractName } from "../derivatives/futures/contracts";
import { resolveFrontContract } from "../derivatives/futures/continuous";
import type { BasisConfig } from "../engine/config/defaults";
import { getPair, loadConfig, loadParamsFile } from "../engine/config/loaders";
import {
  err,
  EXIT_CODES,
  formatError,
  isOneOf,
  makeError,
  mapResult,
  ok,
  runWithBoundary,
  toBoolean,
  toFiniteNumber,
  unwrap,
  type AppError,
  type Result,
} from "../engine/errors";
import { printTable, writeCSV } from "../engine/reporting/csv";
import {
  optimizationLines,
  ReportWriter,
  summaryLines,
  tradeLogLines,
} from "../engine/reporting/report-writer";
import { childLogger, LOG_LEVELS, setLogLevel } from "../observability/logger";
import { runGridSearchAsync, saveBestParams } from "../pipelines/grid";

const log = childLogger("cli");

/* ============ Arg parsing (no deps) ============ */
export type Flags = Record<string, string>;

export function parseArgs(argv: string[]): { cmd: string; flags: Flags } {
  const [, , ...rest] = argv;
  let cmd = "";
  const flags: Flags = {};
  for (const tok of rest) {
    if (tok.startsWith("--")) {
      const [key, ...vparts] = tok.slice(2).split("=");
      flags[key] = vparts.length ? vparts.join("=") : "true";
    } else if (!cmd) cmd = tok;
  }
  return { cmd, flags };
}

const isOn = (v: string | undefined) => toBoolean(v) === true;

function numFlag(flags: Flags, key: string): number | undefined {
  const v = flags[key];
  if (v === undefined) return undefined;
  const n = toFiniteNumber(v);
  if (n === undefined) throw makeError("Config", `--${key} must be a number, got "${v}"`);
  return n;
}

function dateFlag(flags: Flags, key: string): ISODate | undefined {
  const v = flags[key];
  if (v === undefined) return undefined;
  const d = parseISODate(v);
  if (!d) throw makeError("Config", `--${key} must be a YYYY-MM-DD date, got "${v}"`);
  return d;
}

/** Strategy overrides given on the command line; absent flags are left out. */
export function flagOverrides(flags: Flags): Partial<BasisConfig> {
  const out: Partial<BasisConfig> = {};
  const numeric: Array<[string, "accountSize" | "fundingCostAnnual" | "entryThreshold" | "stopLossThreshold" | "exitThreshold" | "holdingDays"]> = [
    ["account-size", "accountSize"],
    ["funding", "fundingCostAnnual"],
    ["entry", "entryThreshold"],
    ["stop", "stopLossThreshold"],
    ["exit", "exitThreshold"],
    ["holding-days", "holdingDays"],
  ];
  for (const [flag, key] of numeric) {
    const n = numFlag(flags, flag);
    if (n !== undefined) out[key] = n;
  }
  if (flags["apply-costs"] !== undefined) out.applyTradingCosts = isOn(flags["apply-costs"]);
  if (flags["no-etf"] !== undefined) out.useEtf = !isOn(flags["no-etf"]);
  if (flags["databento-dir"]) out.databentoDataDir = flags["databento-dir"];
  if (flags["output-dir"]) out.outputDir = flags["output-dir"];
  return out;
}

/** Config file -> env -> params file -> flags. */
export function resolveConfig(flags: Flags): BasisConfig {
  let overrides: Partial<BasisConfig> = {};
  if (flags.params) overrides = unwrap(loadParamsFile(flags.params));
  return loadConfig({ file: flags.config, overrides: { ...overrides, ...flagOverrides(flags) } });
}

/* ============ Data ============ */

/**
 * Observations for a run, from (in order of preference) --data, --sample,
 * or --spot merged with the Databento front contract for --expiry or
 * --start/--end.
 */
export async function loadObservations(flags: Flags, cfg: BasisConfig): Promise<Result<Observation[]>> {
  if (flags.data) return mapResult(readObservationsCSV(flags.data), parsed => parsed.observations);

  if (isOn(flags.sample)) {
    const end = dateFlag(flags, "end") ?? todayISO();
    const start = dateFlag(flags, "start") ?? "2024-01-01";
    return ok(generateSampleData(start, end, { seed: numFlag(flags, "seed"), basePrice: numFlag(flags, "base-price") }));
  }

  if (flags.spot) {
    if (!fs.existsSync(flags.spot)) return err(makeError("Data", `Spot file not found: ${flags.spot}`));
    const spot = parseSpotCSV(fs.readFileSync(flags.spot, "utf8"));

    const pair = getPair(cfg, flags.pair);
    const root = pair.futures.symbol;
    const window = expiryWindow(flags.expiry ?? frontMonthCode(), isOn(flags["end-on-expiry"]));
    const start = dateFlag(flags, "start") ?? window.start;
    const end = dateFlag(flags, "end") ?? window.end;

    const source = new DatabentoLocalSource(path.join(cfg.databentoDataDir, pair.name));
    const front = await resolveFrontContract(source, root, start, end);
    if (!front.ok) return front;
    log.info(`accumulating ${contractName(root, front.value.code)} ${start}..${end}`);
    return ok(mergeObservations(spot, front.value.bars, front.value.expiry));
  }

  return err(makeError("Config", "one of --data=FILE, --sample or --spot=FILE is required"));
}

/* ============ Commands ============ */

type Out = (line: string) => void;

function printResult(result: BacktestResult, out: Out, showTrades: boolean) {
  if (showTrades) tradeLogLines(result).forEach(l => out(l));
  out("");
  summaryLines(result).forEach(l => out(l));
}

export async function cmdBacktest(flags: Flags, out: Out): Promise<number> {
  const cfg = resolveConfig(flags);
  const data = unwrap(await loadObservations(flags, cfg));
  const observations = isOn(flags.roll) ? applyRollingExpiry(data) : data;

  out(`Running backtest on ${observations.length} data points...`);
  const result = new Backtester(cfg).run(observations, cfg.holdingDays);
  printResult(result, out, !isOn(flags.quiet));

  if (cfg.applyTradingCosts && result.trades.length > 0) {
    const totals = result.trades.reduce((s, t) => s + (t.costs?.totalCosts ?? 0), 0);
    out(`Trading Costs:   $${totals.toFixed(2)}`);
  }

  if (isOn(flags.save)) {
    const files = new ReportWriter(cfg.outputDir).writeBacktest(result);
    out(`\nSaved ${files.json}`);
  }
  return 0;
}

export async function cmdOptimize(flags: Flags, out: Out): Promise<number> {
  const cfg = resolveConfig(flags);
  const data = unwrap(await loadObservations(flags, cfg));
  out(`Loaded ${data.length} data points`);

  const ac = new AbortController();
  const onSigint = () => ac.abort();
  process.once("SIGINT", onSigint);
  try {
    const report = await runGridSearchAsync(data, cfg, {
      topN: numFlag(flags, "top") ?? 20,
      concurrency: numFlag(flags, "concurrency") ?? 2,
      signal: ac.signal,
    });
    out(`\nGrid search: ${report.totalCombos} combinations`);
    optimizationLines(report).forEach(l => out(l));

    if (flags["save-params"]) {
      if (saveBestParams(report, flags["save-params"])) out(`\nSaved best params to ${flags["save-params"]}`);
      else out("\nNo combination traded; nothing saved");
    }
    if (isOn(flags.save)) {
      const files = new ReportWriter(cfg.outputDir).writeOptimization(report);
      out(`Saved ${files.json}`);
    }
    return report.aborted ? 130 : 0;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

export async function cmdSample(flags: Flags, out: Out): Promise<number> {
  const start = dateFlag(flags, "start") ?? "2024-01-01";
  const end = dateFlag(flags, "end") ?? "2024-12-31";
  const data = generateSampleData(start, end, { seed: numFlag(flags, "seed"), basePrice: numFlag(flags, "base-price") });
  const file = flags.out ?? path.join("data", `sample_basis_${start}_${end}.csv`);
  writeObservationsCSV(data, file);
  out(`Saved ${data.length} rows to ${file}`);
  return 0;
}

export async function cmdRoll(flags: Flags, out: Out): Promise<number> {
  const input = flags.in ?? flags.data;
  if (!input) throw makeError("Config", "--in=FILE is required");
  const fixed = applyRollingExpiry(unwrap(readObservationsCSV(input)).observations);
  const file = flags.out ?? input.replace(/\.csv$/i, "") + "_rolled.csv";
  writeObservationsCSV(fixed, file);
  out(`Written ${fixed.length} rows to ${file}`);
  return 0;
}

export async function cmdContinuous(flags: Flags, out: Out): Promise<number> {
  const cfg = resolveConfig(flags);
  const pair = getPair(cfg, flags.pair);
  const root = flags.root ?? pair.futures.symbol;
  const start = dateFlag(flags, "start") ?? "2021-05-01";
  const end = dateFlag(flags, "end") ?? todayISO();
  const dir = flags.dir ?? path.join(cfg.databentoDataDir, pair.name);

  const series = unwrap(new DatabentoLocalSource(dir).continuousSeries(root, start, end));
  const file = flags.out ?? path.join("data", `${root}_continuous_${start}_${end}.csv`);
  writeCSV(series, file, { columns: ["date", "price", "code"] });
  out(`Saved ${series.length} bars to ${file}`);
  return 0;
}

const BASIS_COLUMNS = ["date", "spot_price", "futures_price", "basis_percent", "monthly_basis", "annualized_basis", "days_to_expiry"];

/** Per-date basis table for an observation series; --out writes every row as CSV. */
export async function cmdBasis(flags: Flags, out: Out): Promise<number> {
  const cfg = resolveConfig(flags);
  const rows = describeBasis(unwrap(await loadObservations(flags, cfg)));

  const fixed = (x: number) => Number(x.toFixed(4));
  const tail = numFlag(flags, "tail") ?? 20;
  const shown = rows.slice(-tail).map(r => ({
    ...r,
    basis_percent: fixed(r.basis_percent),
    monthly_basis: fixed(r.monthly_basis),
    annualized_basis: fixed(r.annualized_basis),
  }));
  printTable(shown, { columns: BASIS_COLUMNS, out });

  if (flags.out) {
    const file = writeCSV(rows, flags.out);
    out(`Saved ${rows.length} rows to ${file}`);
  }
  return 0;
}

/** Net P&L of one hypothetical trade with the full cost model. */
export async function cmdCosts(flags: Flags, out: Out): Promise<number> {
  const need = (k: string) => {
    const n = numFlag(flags, k);
    if (n === undefined) throw makeError("Config", `--${k} is required`);
    return n;
  };
  const cfg = resolveConfig(flags);
  const pnl = calculateNetPnl(
    {
      entrySpot: need("entry-spot"),
      exitSpot: need("exit-spot"),
      entryFutures: need("entry-futures"),
      exitFutures: need("exit-futures"),
      positionSize: numFlag(flags, "size") ?? 1,
      holdingDays: need("days"),
    },
    { useEtf: cfg.useEtf, fundingRateAnnual: cfg.fundingCostAnnual, contractSize: cfg.cmeContractSize }
  );
  out(`Gross P&L:       $${pnl.grossPnl.toFixed(2)}`);
  out(`Total Costs:     $${pnl.costs.totalCosts.toFixed(2)}`);
  out(`Net P&L:         $${pnl.netPnl.toFixed(2)}`);
  out(`Net Return:      ${pnl.netReturnPct.toFixed(3)}%`);
  out(`Annualized:      ${pnl.annualizedReturn.toFixed(2)}%`);
  return 0;
}

/* ================ Help ==================== */
export const HELP = `
Usage:
  basis-backtest <command> [--flag=value ...]

Data (backtest, optimize):
  --data=FILE.csv                     date,spot_price,futures_price,futures_expiry
  --sample [--start --end --seed]     synthetic series
  --spot=FILE.csv [--pair=BTC] [--expiry=YYYYMM | --start --end] [--end-on-expiry]
                                      spot closes + Databento front contract

Commands:
  backtest   [--entry --stop --exit --holding-days --apply-costs --params=FILE --roll --save --quiet]
  optimize   [--top=20 --concurrency=2 --save-params=FILE --save]
  sample     [--start --end --seed --out]
  roll       --in=FILE [--out]
  continuous [--pair --root --start --end --dir --out]
  basis      [--tail=20 --out=FILE]       per-date basis table (uses the data flags)
  costs      --entry-spot --exit-spot --entry-futures --exit-futures --days [--size --no-etf]

Common:
  --config=FILE.json   --log-level=debug|info|warn|error|silent
`.trim();

const COMMANDS = new Map<string, (flags: Flags, out: Out) => Promise<number>>([
  ["backtest", cmdBacktest],
  ["optimize", cmdOptimize],
  ["sample", cmdSample],
  ["roll", cmdRoll],
  ["continuous", cmdContinuous],
  ["basis", cmdBasis],
  ["costs", cmdCosts],
]);

/* ===================== Router ===================== */
export async function main(argv: string[], out: Out = line => console.log(line)): Promise<number> {
  const { cmd, flags } = parseArgs(argv);
  if (!cmd || isOn(flags.help) || isOn(flags.h)) {
    out(HELP);
    return 0;
  }

  const level = flags["log-level"];
  if (level === "silent" || isOneOf(level, LOG_LEVELS)) setLogLevel(level);

  const run = COMMANDS.get(cmd);
  if (!run) {
    out(`Unknown command: ${cmd}\n`);
    out(HELP);
    return 1;
  }

  const failure: { error?: AppError } = {};
  const code = await runWithBoundary(() => run(flags, out), {
    kind: "Runtime",
    logger: e => {
      failure.error = e;
      log.error(formatError(e));
    },
  });
  if (code !== undefined) return code;
  return failure.error ? EXIT_CODES[failure.error.kind] : 1;
}

if (require.main === module) {
  main(process.argv).then(
    code => { process.exitCode = code; },
    (e: unknown) => {
      log.error(String(e));
      process.exitCode = 1;
    }
  );
}
