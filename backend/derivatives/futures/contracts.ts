// futures/contracts.ts
// Contract symbol helpers: CME month letters, exchange symbols ("MBTG6") and
// the YYYYMM codes the calendar works in.

import { parseYYYYMM, yyyymm } from "./calendars";

/** ===== Month codes (CME standard) ===== */
export const CME_MONTH_CODES: { [m: number]: string } = {
  1: "F", 2: "G", 3: "H", 4: "J", 5: "K", 6: "M",
  7: "N", 8: "Q", 9: "U", 10: "V", 11: "X", 12: "Z",
};

/**
 * Exchange symbols carry a single year digit; it is decoded against this
 * base ("1" = 2021 ... "9" = 2029, "0" = 2020).
 */
export const YEAR_DIGIT_BASE = 2020;

export type ParsedContract = {
  root: string;   // e.g. "MBT"
  year: number;   // four-digit
  month: number;  // 1..12
  code: string;   // YYYYMM
};

export function monthCodeToNumber(letter: string): number {
  const up = letter.toUpperCase();
  for (const m in CME_MONTH_CODES) {
    if (CME_MONTH_CODES[+m] === up) return +m;
  }
  return NaN;
}

/**
 * "MBTG6" -> { root: "MBT", year: 2026, month: 2, code: "202602" }.
 * Calendar spreads ("MBTG6-MBTH6") and anything shorter than root+letter+digit
 * are rejected.
 */
export function parseContractSymbol(symbol: string): ParsedContract | undefined {
  const s = symbol.trim();
  if (s.includes("-") || s.length < 4) return undefined;

  const yearDigit = s[s.length - 1];
  const month = monthCodeToNumber(s[s.length - 2]);
  if (!/^\d$/.test(yearDigit) || Number.isNaN(month)) return undefined;

  const year = YEAR_DIGIT_BASE + parseInt(yearDigit, 10);
  return { root: s.slice(0, -2), year, month, code: yyyymm(year, month) };
}

/** "202602" -> "G6" */
export function contractSuffix(code: string): string | undefined {
  const parsed = parseYYYYMM(code);
  if (!parsed) return undefined;
  return `${CME_MONTH_CODES[parsed.month]}${parsed.year % 10}`;
}

/** ("MBT", "202602") -> "MBTG6" */
export function contractSymbol(root: string, code: string): string | undefined {
  const suffix = contractSuffix(code);
  return suffix ? `${root}${suffix}` : undefined;
}

/** Display name, e.g. "MBT 2026-02". */
export function contractName(root: string, code: string): string {
  const parsed = parseYYYYMM(code);
  if (!parsed) return `${root} ${code}`;
  return `${root} ${parsed.year}-${String(parsed.month).padStart(2, "0")}`;
}
