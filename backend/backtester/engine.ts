// backtester/engine.ts
// Basis trade engine: walks an ordered observation sequence, opens at most
// one long-spot / short-futures position at a time and closes it on a stop,
// a full exit, or the holding-period limit.

import { daysBetween } from "../derivatives/futures/calendars";
import type { Observation } from "../data/types";
import { childLogger } from "../observability/logger";
import { calculateCosts, fundingCost, grossPnl, type TradingCosts } from "./costs";
import { avg, maxDrawdown, sharpeRatio, toReturns, totalReturn } from "./metrics";
import { generateSignal, isEntrySignal, Signal, type SignalThresholds } from "./signals";
import { BacktestResult, Trade, type EquityPoint, type ExitStatus } from "./trade";

const log = childLogger("backtester");

export type BacktesterConfig = SignalThresholds & {
  accountSize: number;
  fundingCostAnnual: number;
  holdingDays: number;
  /** Deduct itemised trading costs instead of funding only. */
  applyTradingCosts: boolean;
  useEtf: boolean;
  cmeContractSize: number;
};

export const DEFAULT_BACKTESTER_CONFIG: Readonly<BacktesterConfig> = {
  accountSize: 200_000,
  fundingCostAnnual: 0.05,
  entryThreshold: 0.005,
  stopLossThreshold: 0.002,
  exitThreshold: 0.035,
  strongEntryThreshold: 0.01,
  holdingDays: 30,
  applyTradingCosts: false,
  useEtf: true,
  cmeContractSize: 5,
};

/** Position size of every trade, in units of the underlying. */
export const POSITION_SIZE = 1;

/* -------------------------------- Engine -------------------------------- */

export class Backtester {
  readonly cfg: Readonly<BacktesterConfig>;

  constructor(config: Partial<BacktesterConfig> = {}) {
    this.cfg = { ...DEFAULT_BACKTESTER_CONFIG, ...config };
  }

  get thresholds(): SignalThresholds {
    const { entryThreshold, stopLossThreshold, exitThreshold, strongEntryThreshold } = this.cfg;
    return { entryThreshold, stopLossThreshold, exitThreshold, strongEntryThreshold };
  }

  signalFor(obs: Observation): Signal {
    return generateSignal(obs.spotPrice, obs.futuresPrice, daysBetween(obs.date, obs.futuresExpiry), this.thresholds);
  }

  /**
   * Run over `observations` (strictly increasing dates; not re-sorted).
   * `holdingDays` overrides the configured limit for this run only.
   */
  run(observations: readonly Observation[], holdingDays: number = this.cfg.holdingDays): BacktestResult {
    const initial = this.cfg.accountSize;
    if (observations.length === 0) return BacktestResult.empty(initial);

    const first = observations[0];
    const last = observations[observations.length - 1];

    const trades: Trade[] = [];
    const curve: EquityPoint[] = [{ date: first.date, equity: initial }];
    let open: Trade | null = null;

    for (const obs of observations) {
      const signal = this.signalFor(obs);

      if (open) {
        const held = daysBetween(open.entryDate, obs.date);
        let status: ExitStatus | null = null;
        if (signal === Signal.StopLoss) status = "stopped_out";
        else if (signal === Signal.FullExit) status = "closed";
        else if (held >= holdingDays) status = "closed";

        if (status) {
          this.closeTrade(open, obs, status);
          trades.push(open);
          curve.push({ date: obs.date, equity: curve[curve.length - 1].equity + (open.realizedPnl ?? 0) });
          open = null;
        }
      }

      if (!open && isEntrySignal(signal)) {
        open = new Trade({
          entryDate: obs.date,
          entrySpot: obs.spotPrice,
          entryFutures: obs.futuresPrice,
          entryBasis: obs.futuresPrice - obs.spotPrice,
          positionSize: POSITION_SIZE,
        });
        log.debug(`open ${obs.date} ${signal} basis=${open.entryBasis.toFixed(2)}`);
      }
    }

    // a forced close is reported and counted, but never moves the equity curve
    if (open) {
      this.closeTrade(open, last, "forced_close");
      trades.push(open);
    }

    const result = this.summarize(trades, curve, first.date, last.date);
    log.debug(
      `backtest ${first.date}..${last.date}: ${result.totalTrades} trades, ` +
      `return ${(result.totalReturn * 100).toFixed(2)}%, sharpe ${result.sharpeRatio.toFixed(2)}`
    );
    return result;
  }

  /* ------------------------------- Internals ------------------------------ */

  private closeTrade(trade: Trade, obs: Observation, status: ExitStatus): void {
    const days = daysBetween(trade.entryDate, obs.date);
    const legs = {
      entrySpot: trade.entrySpot,
      exitSpot: obs.spotPrice,
      entryFutures: trade.entryFutures,
      exitFutures: obs.futuresPrice,
      positionSize: trade.positionSize,
      holdingDays: days,
    };
    const { spotPnl, futuresPnl } = grossPnl(legs);
    const funding = fundingCost(trade.entrySpot, trade.positionSize, days, this.cfg.fundingCostAnnual);

    let costs: TradingCosts | undefined;
    let deducted = funding;
    if (this.cfg.applyTradingCosts) {
      costs = calculateCosts(legs, {
        useEtf: this.cfg.useEtf,
        fundingRateAnnual: this.cfg.fundingCostAnnual,
        contractSize: this.cfg.cmeContractSize,
      });
      deducted = costs.totalCosts;
    }

    trade.close({
      exitDate: obs.date,
      exitSpot: obs.spotPrice,
      exitFutures: obs.futuresPrice,
      status,
      fundingCost: funding,
      realizedPnl: spotPnl + futuresPnl - deducted,
      costs,
    });
    log.debug(`close ${obs.date} ${status} after ${days}d pnl=${(trade.realizedPnl ?? 0).toFixed(2)}`);
  }

  private summarize(
    trades: Trade[],
    curve: EquityPoint[],
    startDate: string,
    endDate: string
  ): BacktestResult {
    const equity = curve.map(p => p.equity);
    const pnlOf = (t: Trade) => t.realizedPnl ?? 0;
    const winners = trades.filter(t => pnlOf(t) > 0);
    const losers = trades.filter(t => pnlOf(t) < 0);
    const returnsOf = (ts: Trade[]) => ts.map(t => t.returnPct ?? 0);

    return new BacktestResult({
      initialCapital: this.cfg.accountSize,
      trades,
      equityCurve: curve,
      startDate,
      endDate,
      stats: {
        totalReturn: totalReturn(equity),
        winningTrades: winners.length,
        losingTrades: losers.length,
        // zero-P&L trades fall in neither bucket
        avgWin: avg(returnsOf(winners)),
        avgLoss: avg(returnsOf(losers)),
        maxDrawdown: maxDrawdown(equity),
        sharpeRatio: sharpeRatio(toReturns(equity)),
      },
    });
  }
}

/** Convenience for callers that only need one run. */
export function runBacktest(
  observations: readonly Observation[],
  config: Partial<BacktesterConfig> = {}
): BacktestResult {
  return new Backtester(config).run(observations);
}
