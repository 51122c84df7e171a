// backtester/trade.ts
// Trade lifecycle and the aggregate result of one backtest run.

import { daysBetween, type ISODate } from "../derivatives/futures/calendars";
import { makeError } from "../engine/errors";
import type { TradingCosts } from "./costs";

export type TradeStatus = "open" | "closed" | "stopped_out" | "forced_close";
export type ExitStatus = Exclude<TradeStatus, "open">;

export type TradeEntry = {
  entryDate: ISODate;
  entrySpot: number;
  entryFutures: number;
  entryBasis: number;     // futures - spot at entry
  positionSize?: number;  // units of the underlying, default 1
};

export type TradeExit = {
  exitDate: ISODate;
  exitSpot: number;
  exitFutures: number;
  status: ExitStatus;
  fundingCost: number;
  realizedPnl: number;
  costs?: TradingCosts;
};

export type TradeRecord = {
  entry_date: ISODate;
  exit_date: ISODate | null;
  entry_basis: number;
  exit_basis: number | null;
  holding_days: number;
  return_pct: number | null;
  annualized_return: number | null;
  status: TradeStatus;
};

/**
 * One long-spot / short-futures position. Created open; `close` sets the exit
 * fields exactly once.
 */
export class Trade {
  readonly entryDate: ISODate;
  readonly entrySpot: number;
  readonly entryFutures: number;
  readonly entryBasis: number;
  readonly positionSize: number;

  private _exitDate: ISODate | null = null;
  private _exitSpot: number | null = null;
  private _exitFutures: number | null = null;
  private _exitBasis: number | null = null;
  private _fundingCost = 0;
  private _realizedPnl: number | null = null;
  private _status: TradeStatus = "open";
  private _costs: TradingCosts | null = null;

  constructor(entry: TradeEntry) {
    this.entryDate = entry.entryDate;
    this.entrySpot = entry.entrySpot;
    this.entryFutures = entry.entryFutures;
    this.entryBasis = entry.entryBasis;
    this.positionSize = entry.positionSize ?? 1;
  }

  get exitDate() { return this._exitDate; }
  get exitSpot() { return this._exitSpot; }
  get exitFutures() { return this._exitFutures; }
  get exitBasis() { return this._exitBasis; }
  get fundingCost() { return this._fundingCost; }
  get realizedPnl() { return this._realizedPnl; }
  get status() { return this._status; }
  /** Itemised costs, only when the engine ran with full trading costs. */
  get costs() { return this._costs; }

  get isOpen(): boolean {
    return this._status === "open";
  }

  get entryNotional(): number {
    return this.entrySpot * this.positionSize;
  }

  /** Calendar days from entry to exit; 0 while open. */
  get holdingDays(): number {
    return this._exitDate === null ? 0 : daysBetween(this.entryDate, this._exitDate);
  }

  /** realizedPnl / entry notional; null while open. */
  get returnPct(): number | null {
    if (this._realizedPnl === null) return null;
    const notional = this.entryNotional;
    return notional > 0 ? this._realizedPnl / notional : 0;
  }

  get annualizedReturn(): number | null {
    const r = this.returnPct;
    const days = this.holdingDays;
    return r !== null && days > 0 ? r * (365 / days) : null;
  }

  close(exit: TradeExit): void {
    if (!this.isOpen) {
      throw makeError("Backtest", `Trade opened ${this.entryDate} is already ${this._status}`, undefined, {
        entryDate: this.entryDate,
        status: this._status,
      });
    }
    this._exitDate = exit.exitDate;
    this._exitSpot = exit.exitSpot;
    this._exitFutures = exit.exitFutures;
    this._exitBasis = exit.status === "forced_close" ? null : exit.exitFutures - exit.exitSpot;
    this._fundingCost = exit.fundingCost;
    this._realizedPnl = exit.realizedPnl;
    this._costs = exit.costs ?? null;
    this._status = exit.status;
  }

  /** Percent fields are scaled by 100. */
  toRecord(): TradeRecord {
    const r = this.returnPct;
    const ann = this.annualizedReturn;
    return {
      entry_date: this.entryDate,
      exit_date: this._exitDate,
      entry_basis: this.entryBasis,
      exit_basis: this._exitBasis,
      holding_days: this.holdingDays,
      return_pct: r === null ? null : r * 100,
      annualized_return: ann === null ? null : ann * 100,
      status: this._status,
    };
  }
}

/* ------------------------------- Result -------------------------------- */

export type EquityPoint = { date: ISODate | null; equity: number };

export type BacktestSummary = {
  initial_capital: number;
  final_capital: number;
  total_return: number;
  total_trades: number;
  winning_trades: number;
  losing_trades: number;
  win_rate: number;
  avg_win: number;
  avg_loss: number;
  profit_factor: number;
  max_drawdown: number;
  sharpe_ratio: number;
  start_date: ISODate | null;
  end_date: ISODate | null;
};

export type BacktestRecord = {
  summary: BacktestSummary;
  trades: TradeRecord[];
};

export type BacktestStats = {
  totalReturn: number;
  winningTrades: number;
  losingTrades: number;
  avgWin: number;
  avgLoss: number;
  maxDrawdown: number;
  sharpeRatio: number;
};

const ZERO_STATS: BacktestStats = {
  totalReturn: 0,
  winningTrades: 0,
  losingTrades: 0,
  avgWin: 0,
  avgLoss: 0,
  maxDrawdown: 0,
  sharpeRatio: 0,
};

/** Built once at the end of a run. */
export class BacktestResult {
  readonly trades: readonly Trade[];
  readonly equityCurve: readonly EquityPoint[];
  readonly initialCapital: number;
  readonly startDate: ISODate | null;
  readonly endDate: ISODate | null;

  readonly totalReturn: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  readonly avgWin: number;
  readonly avgLoss: number;
  readonly maxDrawdown: number;
  readonly sharpeRatio: number;

  constructor(init: {
    initialCapital: number;
    trades?: readonly Trade[];
    equityCurve?: readonly EquityPoint[];
    startDate?: ISODate | null;
    endDate?: ISODate | null;
    stats?: Partial<BacktestStats>;
  }) {
    this.initialCapital = init.initialCapital;
    this.trades = init.trades ?? [];
    this.equityCurve = init.equityCurve ?? [{ date: init.startDate ?? null, equity: init.initialCapital }];
    this.startDate = init.startDate ?? null;
    this.endDate = init.endDate ?? null;

    const s = { ...ZERO_STATS, ...init.stats };
    this.totalReturn = s.totalReturn;
    this.winningTrades = s.winningTrades;
    this.losingTrades = s.losingTrades;
    this.avgWin = s.avgWin;
    this.avgLoss = s.avgLoss;
    this.maxDrawdown = s.maxDrawdown;
    this.sharpeRatio = s.sharpeRatio;
  }

  /** Zeroed result for an empty run. */
  static empty(initialCapital: number): BacktestResult {
    return new BacktestResult({ initialCapital });
  }

  get totalTrades(): number {
    return this.trades.length;
  }

  get winRate(): number {
    return this.totalTrades === 0 ? 0 : this.winningTrades / this.totalTrades;
  }

  get profitFactor(): number {
    if (Math.abs(this.avgLoss) < 0.0001) return Infinity;
    return Math.abs(this.avgWin / this.avgLoss);
  }

  get finalCapital(): number {
    return this.initialCapital * (1 + this.totalReturn);
  }

  /** Flat record for export. Percent fields are scaled by 100. */
  toRecord(): BacktestRecord {
    return {
      summary: {
        initial_capital: this.initialCapital,
        final_capital: this.finalCapital,
        total_return: this.totalReturn * 100,
        total_trades: this.totalTrades,
        winning_trades: this.winningTrades,
        losing_trades: this.losingTrades,
        win_rate: this.winRate * 100,
        avg_win: this.avgWin * 100,
        avg_loss: this.avgLoss * 100,
        profit_factor: this.profitFactor,
        max_drawdown: this.maxDrawdown * 100,
        sharpe_ratio: this.sharpeRatio,
        start_date: this.startDate,
        end_date: this.endDate,
      },
      trades: this.trades.map(t => t.toRecord()),
    };
  }
}
