// backtester/costs.ts
// Cost model for one basis trade: commissions and slippage on both legs,
// funding on the spot notional, and the ETF expense ratio when the long leg
// is an ETF proxy.

/* ----------------------------- Cost bundle ----------------------------- */

export type CostItems = {
  spotEntryCommission: number;
  spotExitCommission: number;
  futuresEntryCommission: number;
  futuresExitCommission: number;
  etfEntryCommission: number;
  etfExitCommission: number;
  spotEntrySlippage: number;
  spotExitSlippage: number;
  futuresEntrySlippage: number;
  futuresExitSlippage: number;
  fundingCost: number;
  etfExpenseRatio: number;  // expense accrued over the holding period
};

const ZERO_ITEMS: CostItems = {
  spotEntryCommission: 0,
  spotExitCommission: 0,
  futuresEntryCommission: 0,
  futuresExitCommission: 0,
  etfEntryCommission: 0,
  etfExitCommission: 0,
  spotEntrySlippage: 0,
  spotExitSlippage: 0,
  futuresEntrySlippage: 0,
  futuresExitSlippage: 0,
  fundingCost: 0,
  etfExpenseRatio: 0,
};

/** Immutable snapshot of the costs computed for one trade. */
export class TradingCosts {
  readonly items: Readonly<CostItems>;

  constructor(items: Partial<CostItems> = {}) {
    this.items = Object.freeze({ ...ZERO_ITEMS, ...items });
  }

  get totalEntryCosts(): number {
    const c = this.items;
    return c.spotEntryCommission + c.futuresEntryCommission + c.etfEntryCommission
      + c.spotEntrySlippage + c.futuresEntrySlippage;
  }

  get totalExitCosts(): number {
    const c = this.items;
    return c.spotExitCommission + c.futuresExitCommission + c.etfExitCommission
      + c.spotExitSlippage + c.futuresExitSlippage;
  }

  get totalHoldingCosts(): number {
    return this.items.fundingCost + this.items.etfExpenseRatio;
  }

  get totalCosts(): number {
    return this.totalEntryCosts + this.totalExitCosts + this.totalHoldingCosts;
  }

  /** Flat breakdown with the aggregates, snake_case like the report files. */
  toRecord(): Record<string, number> {
    const c = this.items;
    return {
      spot_entry_commission: c.spotEntryCommission,
      etf_entry_commission: c.etfEntryCommission,
      futures_entry_commission: c.futuresEntryCommission,
      spot_entry_slippage: c.spotEntrySlippage,
      futures_entry_slippage: c.futuresEntrySlippage,
      total_entry_costs: this.totalEntryCosts,
      spot_exit_commission: c.spotExitCommission,
      etf_exit_commission: c.etfExitCommission,
      futures_exit_commission: c.futuresExitCommission,
      spot_exit_slippage: c.spotExitSlippage,
      futures_exit_slippage: c.futuresExitSlippage,
      total_exit_costs: this.totalExitCosts,
      funding_cost: c.fundingCost,
      etf_expense_ratio: c.etfExpenseRatio,
      total_holding_costs: this.totalHoldingCosts,
      total_all_costs: this.totalCosts,
    };
  }
}

/* ------------------------------ Parameters ----------------------------- */

export type CostOptions = {
  /** Long leg through an ETF proxy (true) or direct spot (false). Default true */
  useEtf?: boolean;
  /** Annual funding rate on the entry notional. Default 0.05 */
  fundingRateAnnual?: number;
  /** Annual ETF expense ratio. Default 0.0025 */
  etfExpenseRatioAnnual?: number;
  /** Units of the underlying per futures contract. Default 5 */
  contractSize?: number;
};

export const COST_RATES = {
  etfCommission: 0.0005,
  etfMinCommission: 1,
  etfSlippage: 0.0001,
  spotCommission: 0.004,
  spotSlippage: 0.0005,
  futuresCommissionPerContract: 2,
  futuresSlippage: 0.0002,
} as const;

export type TradeLegs = {
  entrySpot: number;
  exitSpot: number;
  entryFutures: number;
  exitFutures: number;
  positionSize: number;
  holdingDays: number;
};

/** Funding on the entry spot notional over the holding period. */
export function fundingCost(entrySpot: number, positionSize: number, holdingDays: number, annualRate: number): number {
  return (annualRate / 365) * holdingDays * entrySpot * positionSize;
}

export function calculateCosts(legs: TradeLegs, opts: CostOptions = {}): TradingCosts {
  const useEtf = opts.useEtf ?? true;
  const fundingRate = opts.fundingRateAnnual ?? 0.05;
  const expenseRatio = opts.etfExpenseRatioAnnual ?? 0.0025;
  const contractSize = opts.contractSize ?? 5;

  const { entrySpot, exitSpot, entryFutures, exitFutures, positionSize, holdingDays } = legs;
  const entryNotional = entrySpot * positionSize;
  const exitNotional = exitSpot * positionSize;

  const items: Partial<CostItems> = {};

  if (useEtf) {
    items.etfEntryCommission = Math.max(COST_RATES.etfMinCommission, entryNotional * COST_RATES.etfCommission);
    items.etfExitCommission = Math.max(COST_RATES.etfMinCommission, exitNotional * COST_RATES.etfCommission);
    items.spotEntrySlippage = entryNotional * COST_RATES.etfSlippage;
    items.spotExitSlippage = exitNotional * COST_RATES.etfSlippage;
    items.etfExpenseRatio = (expenseRatio / 365) * holdingDays * entryNotional;
  } else {
    items.spotEntryCommission = entryNotional * COST_RATES.spotCommission;
    items.spotExitCommission = exitNotional * COST_RATES.spotCommission;
    items.spotEntrySlippage = entryNotional * COST_RATES.spotSlippage;
    items.spotExitSlippage = exitNotional * COST_RATES.spotSlippage;
  }

  const contracts = positionSize / contractSize;
  items.futuresEntryCommission = contracts * COST_RATES.futuresCommissionPerContract;
  items.futuresExitCommission = contracts * COST_RATES.futuresCommissionPerContract;
  items.futuresEntrySlippage = entryFutures * positionSize * COST_RATES.futuresSlippage;
  items.futuresExitSlippage = exitFutures * positionSize * COST_RATES.futuresSlippage;

  items.fundingCost = fundingCost(entrySpot, positionSize, holdingDays, fundingRate);

  return new TradingCosts(items);
}

/* --------------------------------- P&L --------------------------------- */

export type NetPnl = {
  spotPnl: number;
  futuresPnl: number;
  grossPnl: number;
  costs: TradingCosts;
  netPnl: number;
  netReturnPct: number;     // percent, e.g. 0.42 for 0.42%
  annualizedReturn: number; // percent; 0 when holdingDays <= 0
};

/** Long spot, short futures. */
export function grossPnl(legs: TradeLegs): { spotPnl: number; futuresPnl: number } {
  return {
    spotPnl: (legs.exitSpot - legs.entrySpot) * legs.positionSize,
    futuresPnl: (legs.entryFutures - legs.exitFutures) * legs.positionSize,
  };
}

export function calculateNetPnl(legs: TradeLegs, opts: CostOptions = {}): NetPnl {
  const { spotPnl, futuresPnl } = grossPnl(legs);
  const gross = spotPnl + futuresPnl;
  const costs = calculateCosts(legs, opts);
  const netPnl = gross - costs.totalCosts;
  const notional = legs.entrySpot * legs.positionSize;
  const netReturnPct = notional > 0 ? (netPnl / notional) * 100 : 0;

  return {
    spotPnl,
    futuresPnl,
    grossPnl: gross,
    costs,
    netPnl,
    netReturnPct,
    annualizedReturn: legs.holdingDays > 0 ? netReturnPct * (365 / legs.holdingDays) : 0,
  };
}
