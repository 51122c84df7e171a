// data/types.ts
// Shapes exchanged between the data collaborators and the backtest core.

import type { ISODate } from "../derivatives/futures/calendars";

export type { ISODate };

/** One day of the basis series the engine consumes. */
export type Observation = {
  date: ISODate;
  spotPrice: number;
  futuresPrice: number;
  futuresExpiry: ISODate;
};

export type SpotBar = {
  date: ISODate;
  price: number;       // daily close
};

export type FuturesBar = {
  date: ISODate;
  price: number;       // daily close/settle
  expiry?: ISODate;    // contract expiry when the source knows it
};

/** A daily row of one listed contract, as read from a multi-contract file. */
export type ContractBar = {
  date: ISODate;
  root: string;        // e.g. "MBT"
  code: string;        // YYYYMM
  symbol: string;      // e.g. "MBTG6"
  price: number;
  volume?: number;
};

/** Spliced front-month reference series; dates with no front bar are absent. */
export type ContinuousPoint = {
  date: ISODate;
  price: number;
  code: string;        // contract the price came from
};
