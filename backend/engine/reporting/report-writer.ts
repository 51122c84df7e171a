// reporting/report-writer.ts
// Timestamped report files under an output directory, plus the plain-text
// trade log / summary / optimizer table the CLI prints.

import * as fs from "fs";
import * as path from "path";

import type { BacktestResult } from "../../backtester/trade";
import type { GridRow, OptimizationReport } from "../../pipelines/grid";
import { writeCSV, type Row } from "./csv";

/* =========================
   Small formatters
   ========================= */

const pct = (x: number, d = 2) => (Number.isFinite(x) ? (x * 100).toFixed(d) + "%" : "-");
const num = (x: number, d = 2) => (Number.isFinite(x) ? x.toFixed(d) : "inf");
const money = (x: number) =>
  x.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });

const pad = (n: number) => String(n).padStart(2, "0");

/** YYYYMMDD_HHMMSS in local time. */
export function fileTimestamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

/** JSON with non-finite numbers written as strings ("Infinity"). */
export function toJSON(data: unknown): string {
  return JSON.stringify(data, (_k, v: unknown) => (typeof v === "number" && !Number.isFinite(v) ? String(v) : v), 2);
}

/* =========================
   Writer
   ========================= */

export type WrittenBacktest = { json: string; trades: string; equity: string };
export type WrittenOptimization = { json: string; csv: string };

export class ReportWriter {
  readonly outputDir: string;
  private now: () => Date;

  constructor(outputDir = "output", now: () => Date = () => new Date()) {
    this.outputDir = outputDir;
    this.now = now;
  }

  filePath(prefix: string, ext: string, subdir?: string): string {
    const dir = subdir ? path.join(this.outputDir, subdir) : this.outputDir;
    fs.mkdirSync(dir, { recursive: true });
    return path.join(dir, `${prefix}_${fileTimestamp(this.now())}.${ext}`);
  }

  writeJSON(data: unknown, prefix = "data", subdir = "analysis"): string {
    const file = this.filePath(prefix, "json", subdir);
    fs.writeFileSync(file, toJSON(data) + "\n", "utf8");
    return file;
  }

  writeRows(rows: readonly Row[], prefix: string, subdir: string, columns?: string[]): string {
    return writeCSV(rows, this.filePath(prefix, "csv", subdir), { columns });
  }

  /** Result JSON plus trade and equity CSVs under backtests/. */
  writeBacktest(result: BacktestResult, prefix = "backtest_result"): WrittenBacktest {
    const record = result.toRecord();
    return {
      json: this.writeJSON({ ...record, equity_curve: result.equityCurve }, prefix, "backtests"),
      trades: this.writeRows(record.trades, `${prefix}_trades`, "backtests"),
      equity: this.writeRows(result.equityCurve, `${prefix}_equity`, "backtests", ["date", "equity"]),
    };
  }

  /** Report JSON plus the ranked grid as CSV under optimizations/. */
  writeOptimization(report: OptimizationReport, prefix = "optimization"): WrittenOptimization {
    return {
      json: this.writeJSON(report, prefix, "optimizations"),
      csv: this.writeRows(report.results, prefix, "optimizations"),
    };
  }
}

/* =========================
   Console text
   ========================= */

export function tradeLogLines(result: BacktestResult): string[] {
  if (result.trades.length === 0) return [];
  const lines = [
    "=".repeat(100),
    "TRADE LOG",
    "=".repeat(100),
    `${"#".padStart(3)}  ${"Entry Date".padEnd(12)} ${"Exit Date".padEnd(12)} ${"Status".padEnd(13)} ` +
      `${"Entry Basis".padStart(12)} ${"Exit Basis".padStart(11)} ${"Days".padStart(5)} ${"Return%".padStart(8)} ${"P&L".padStart(12)}`,
    "-".repeat(100),
  ];
  result.trades.forEach((t, i) => {
    const r = t.returnPct;
    const pnl = t.realizedPnl;
    lines.push(
      `${String(i + 1).padStart(3)}  ${t.entryDate.padEnd(12)} ${(t.exitDate ?? "-").padEnd(12)} ${t.status.padEnd(13)} ` +
        `${money(t.entryBasis).padStart(12)} ${(t.exitBasis === null ? "-" : money(t.exitBasis)).padStart(11)} ` +
        `${String(t.holdingDays).padStart(5)} ${(r === null ? "-" : pct(r)).padStart(8)} ` +
        `${(pnl === null ? "-" : "$" + money(pnl)).padStart(12)}`
    );
  });
  return lines;
}

export function summaryLines(result: BacktestResult): string[] {
  const lines = [
    "=".repeat(50),
    "BACKTEST RESULTS",
    "=".repeat(50),
    `Period:          ${result.startDate ?? "-"} to ${result.endDate ?? "-"}`,
    `Total Return:    ${pct(result.totalReturn)}`,
    `Sharpe Ratio:    ${num(result.sharpeRatio)}`,
    `Max Drawdown:    ${pct(result.maxDrawdown)}`,
    `Win Rate:        ${pct(result.winRate)} (${result.winningTrades}W / ${result.losingTrades}L)`,
    `Total Trades:    ${result.totalTrades}`,
  ];
  if (result.avgWin) lines.push(`Avg Win:         ${pct(result.avgWin)}`);
  if (result.avgLoss) lines.push(`Avg Loss:        ${pct(result.avgLoss)}`);
  if (result.totalTrades > 0) lines.push(`Profit Factor:   ${num(result.profitFactor)}`);
  lines.push(`Initial Capital: $${money(result.initialCapital)}`);
  lines.push(`Final Capital:   $${money(result.finalCapital)}`);
  return lines;
}

function gridLine(r: GridRow): string {
  return `entry=${pct(r.entry, 1)}, stop=${pct(r.stop, 1)}, exit=${pct(r.exit, 1)}, hold=${r.hold}`;
}

function gridResult(r: GridRow): string {
  return `return=${pct(r.return)}, sharpe=${num(r.sharpe)}, trades=${r.trades}, win_rate=${pct(r.winRate, 1)}`;
}

export function optimizationLines(report: OptimizationReport): string[] {
  const lines = [
    `Valid combinations (trades > 0): ${report.valid.length} / ${report.evaluated}`,
    "",
    `${"Rank".padStart(4)}  ${"Entry%".padStart(7)} ${"Stop%".padStart(6)} ${"Exit%".padStart(6)} ${"Hold".padStart(5)} ` +
      `${"Return%".padStart(8)} ${"Sharpe".padStart(7)} ${"MaxDD%".padStart(7)} ${"Trades".padStart(7)} ${"WinRate".padStart(8)}`,
    "-".repeat(80),
  ];
  report.top.forEach((r, i) => {
    lines.push(
      `${String(i + 1).padStart(4)}  ${pct(r.entry, 1).padStart(7)} ${pct(r.stop, 1).padStart(6)} ${pct(r.exit, 1).padStart(6)} ` +
        `${String(r.hold).padStart(5)} ${pct(r.return).padStart(8)} ${num(r.sharpe).padStart(7)} ` +
        `${pct(-r.maxDd).padStart(7)} ${String(r.trades).padStart(7)} ${pct(r.winRate, 1).padStart(8)}`
    );
  });
  lines.push("");
  lines.push(`Default params: ${gridLine(report.baseline)}`);
  lines.push(`Default result: ${gridResult(report.baseline)}`);
  if (report.best) {
    lines.push(`Best params:    ${gridLine(report.best)}`);
    lines.push(`Best result:    ${gridResult(report.best)}`);
  }
  if (report.aborted) lines.push(`(aborted after ${report.evaluated} combinations)`);
  return lines;
}
