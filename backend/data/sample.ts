// data/sample.ts
// Deterministic synthetic basis series for demos and tests.

import {
  addDaysISO,
  buildExpirySchedule,
  frontMonthExpiry,
  type ISODate,
} from "../derivatives/futures/calendars";
import type { Observation } from "./types";

export type SampleOptions = {
  basePrice?: number;   // starting spot, default 50_000
  seed?: number;        // RNG seed, default 42
  volatility?: number;  // daily sd of spot returns, default 0.02
  basisMean?: number;   // default 0.015
  basisSd?: number;     // default 0.01
  basisFloor?: number;  // default -0.01
  priceFloor?: number;  // default 10_000
};

/** LCG in [0, 1). */
export function makeRng(seed: number): () => number {
  let s = (seed >>> 0) || 1;
  return () => (s = (1664525 * s + 1013904223) >>> 0) / 2 ** 32;
}

/** Box-Muller over `rnd`. */
export function makeGauss(rnd: () => number): (mean: number, sd: number) => number {
  return (mean, sd) => {
    const u = Math.max(rnd(), 1e-12);
    const v = rnd();
    return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  };
}

/**
 * One observation per calendar day from `start` through `end`. The same seed
 * always produces the same series.
 */
export function generateSampleData(start: ISODate, end: ISODate, opts: SampleOptions = {}): Observation[] {
  const gauss = makeGauss(makeRng(opts.seed ?? 42));
  const vol = opts.volatility ?? 0.02;
  const basisMean = opts.basisMean ?? 0.015;
  const basisSd = opts.basisSd ?? 0.01;
  const basisFloor = opts.basisFloor ?? -0.01;
  const priceFloor = opts.priceFloor ?? 10_000;

  const schedule = buildExpirySchedule(start, end);
  const out: Observation[] = [];
  let price = opts.basePrice ?? 50_000;

  for (let date = start; date <= end; date = addDaysISO(date, 1)) {
    price = Math.max(priceFloor, price + gauss(0, vol) * price);
    const basisPct = Math.max(basisFloor, gauss(basisMean, basisSd));
    out.push({
      date,
      spotPrice: price,
      futuresPrice: price * (1 + basisPct),
      futuresExpiry: frontMonthExpiry(date, schedule) ?? addDaysISO(date, 30),
    });
  }
  return out;
}
