// backtester/signals.ts
// Basis signal classification. Pure: a function of one observation only.

export const Signal = {
  StrongEntry: "STRONG_ENTRY",
  AcceptableEntry: "ACCEPTABLE_ENTRY",
  PartialExit: "PARTIAL_EXIT",
  FullExit: "FULL_EXIT",
  StopLoss: "STOP_LOSS",
  NoEntry: "NO_ENTRY",
} as const;

export type Signal = (typeof Signal)[keyof typeof Signal];

export type SignalThresholds = {
  entryThreshold: number;        // monthly basis above which a trade may open
  stopLossThreshold: number;     // monthly basis below which an open trade is stopped
  exitThreshold: number;         // monthly basis above which the basis is taken off
  strongEntryThreshold: number;  // monthly basis above which entry is "strong"
};

export const DEFAULT_THRESHOLDS: Readonly<SignalThresholds> = {
  entryThreshold: 0.005,
  stopLossThreshold: 0.002,
  exitThreshold: 0.035,
  strongEntryThreshold: 0.01,
};

/** Fixed; not part of SignalThresholds. */
export const PARTIAL_EXIT_THRESHOLD = 0.025;

export type BasisMetrics = {
  basis: number;        // futures - spot
  basisPct: number;     // basis / spot
  monthlyBasis: number; // basisPct normalised to 30 days
  annualBasis: number;  // basisPct normalised to 365 days
  daysToExpiry: number; // as used in the normalisation (>= 1)
};

/**
 * Basis figures for one observation. Days to expiry are floored at 1 and a
 * non-positive spot yields zero ratios.
 */
export function basisMetrics(spot: number, futures: number, daysToExpiry: number): BasisMetrics {
  const dte = daysToExpiry <= 0 ? 1 : daysToExpiry;
  const basis = futures - spot;
  const basisPct = spot > 0 ? basis / spot : 0;
  return {
    basis,
    basisPct,
    monthlyBasis: (basisPct * 30) / dte,
    annualBasis: (basisPct * 365) / dte,
    daysToExpiry: dte,
  };
}

/**
 * Rules in order, first match wins: stop (negative basis or monthly below the
 * stop), full exit, partial exit, strong entry, acceptable entry, no entry.
 */
export function generateSignal(
  spot: number,
  futures: number,
  daysToExpiry: number,
  thresholds: SignalThresholds = DEFAULT_THRESHOLDS
): Signal {
  const { basisPct, monthlyBasis } = basisMetrics(spot, futures, daysToExpiry);

  if (basisPct < 0 || monthlyBasis < thresholds.stopLossThreshold) return Signal.StopLoss;
  if (monthlyBasis > thresholds.exitThreshold) return Signal.FullExit;
  if (monthlyBasis > PARTIAL_EXIT_THRESHOLD) return Signal.PartialExit;
  // nothing enters at or below the entry threshold, even when it sits above the strong one
  if (monthlyBasis <= thresholds.entryThreshold) return Signal.NoEntry;
  if (monthlyBasis > thresholds.strongEntryThreshold) return Signal.StrongEntry;
  return Signal.AcceptableEntry;
}

export function isEntrySignal(s: Signal): boolean {
  return s === Signal.StrongEntry || s === Signal.AcceptableEntry;
}
