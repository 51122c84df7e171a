// engine/config/defaults.ts
// Central defaults for the basis backtester. Zero deps.

export type PairCfg = {
  spot: { symbol: string; exchange: string; currency: string };
  futures: { symbol: string; exchange: string };   // symbol is the futures root, e.g. "MBT"
};

export type BacktestCfg = {
  accountSize: number;            // initial capital
  fundingCostAnnual: number;      // funding rate on the spot notional
  entryThreshold: number;         // monthly basis
  stopLossThreshold: number;      // monthly basis
  exitThreshold: number;          // monthly basis
  strongEntryThreshold: number;   // monthly basis
  holdingDays: number;            // max days in a trade
  useEtf: boolean;                // long leg via ETF proxy (cost model)
  applyTradingCosts: boolean;     // deduct full costs instead of funding only
  cmeContractSize: number;        // units per futures contract (cost model)
};

export type BasisConfig = BacktestCfg & {
  pairs: Record<string, PairCfg>;
  defaultPair: string;
  databentoDataDir: string;
  outputDir: string;
};

export const DEFAULT_PAIRS: Readonly<Record<string, PairCfg>> = {
  BTC: {
    spot: { symbol: "BTC", exchange: "PAXOS", currency: "USD" },
    futures: { symbol: "MBT", exchange: "CME" },
  },
  ETH: {
    spot: { symbol: "ETH", exchange: "PAXOS", currency: "USD" },
    futures: { symbol: "MET", exchange: "CME" },
  },
};

/** Default config (repo-relative paths). */
export function getDefaults(partial: Partial<BasisConfig> = {}): BasisConfig {
  return {
    accountSize: 200_000,
    fundingCostAnnual: 0.05,
    entryThreshold: 0.005,
    stopLossThreshold: 0.002,
    exitThreshold: 0.035,
    strongEntryThreshold: 0.01,
    holdingDays: 30,
    useEtf: true,
    applyTradingCosts: false,
    cmeContractSize: 5,
    pairs: { ...DEFAULT_PAIRS },
    defaultPair: "BTC",
    databentoDataDir: "databento",
    outputDir: "output",
    ...partial,
  };
}
