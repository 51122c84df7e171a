// backtester/metrics.ts
// Performance statistics over a trade-to-trade equity curve (no deps).

export type MetricsOptions = {
  /** Annualisation factor for Sharpe. Default 365 (crypto trades every day) */
  periodsPerYear?: number;
};

export type DrawdownPoint = {
  idx: number;          // index into series
  equity: number;
  peak: number;
  ddPct: number;        // (peak - equity) / peak, >= 0
};

export type DrawdownStats = {
  maxDrawdown: number;  // largest ddPct observed, >= 0
  peakIdx: number;      // start of the worst drawdown
  troughIdx: number;    // where it bottomed
  ddSeries: DrawdownPoint[];
};

/* ----------------------------- Public API ----------------------------- */

/**
 * Simple returns between consecutive equity points. A zero previous value
 * yields a zero return rather than a division fault.
 */
export function toReturns(equity: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    const a = equity[i - 1], b = equity[i];
    out.push(a !== 0 ? (b - a) / a : 0);
  }
  return out;
}

/** Total return from first to last point; 0 for fewer than two points. */
export function totalReturn(equity: readonly number[]): number {
  if (equity.length < 2 || equity[0] === 0) return 0;
  return (equity[equity.length - 1] - equity[0]) / equity[0];
}

/** Running-peak drawdown as a fraction of the peak. */
export function drawdownStats(equity: readonly number[]): DrawdownStats {
  if (!equity.length) return { maxDrawdown: 0, peakIdx: 0, troughIdx: 0, ddSeries: [] };

  let peak = equity[0];
  let peakIdx = 0;
  let maxDD = 0, maxStart = 0, maxEnd = 0;
  const ddSeries: DrawdownPoint[] = [];

  for (let i = 0; i < equity.length; i++) {
    const v = equity[i];
    if (v > peak) { peak = v; peakIdx = i; }
    const ddPct = peak > 0 ? (peak - v) / peak : 0;
    ddSeries.push({ idx: i, equity: v, peak, ddPct });
    if (ddPct > maxDD) { maxDD = ddPct; maxStart = peakIdx; maxEnd = i; }
  }

  return { maxDrawdown: maxDD, peakIdx: maxStart, troughIdx: maxEnd, ddSeries };
}

export function maxDrawdown(equity: readonly number[]): number {
  return drawdownStats(equity).maxDrawdown;
}

/**
 * mean / sample stdev, annualised. Zero with fewer than two samples or
 * zero variance.
 */
export function sharpeRatio(returns: readonly number[], opts: MetricsOptions = {}): number {
  if (returns.length < 2) return 0;
  const s = std(returns);
  if (!(s > 0)) return 0;
  return (avg(returns) / s) * Math.sqrt(opts.periodsPerYear ?? 365);
}

/* ------------------------------- Math bits ------------------------------ */

export function avg(a: readonly number[]): number {
  return a.length ? a.reduce((s, x) => s + x, 0) / a.length : 0;
}

/** Sample standard deviation (n - 1). */
export function std(a: readonly number[]): number {
  if (a.length <= 1) return 0;
  const m = avg(a);
  let s2 = 0;
  for (const x of a) s2 += (x - m) ** 2;
  return Math.sqrt(s2 / (a.length - 1));
}
