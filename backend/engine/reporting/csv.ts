// reporting/csv.ts
// CSV in and out for observation series, report rows and Databento exports,
// plus the fixed-width console table the CLI prints.

import * as fs from "fs";
import * as path from "path";

/* =========================
   Types
   ========================= */

export type Row = Record<string, unknown>;
/** A parsed CSV record: header -> trimmed cell text. */
export type TextRow = Record<string, string>;

export type ToCSVOptions = {
  /** Column order; inferred from the rows (first-seen order) when omitted. */
  columns?: string[];
  /** Default true */
  header?: boolean;
  sep?: string;
};

export type PrintTableOptions = {
  columns?: string[];
  /** Truncate cells wider than this (0 = never). */
  maxWidth?: number;
  /** Default console.log */
  out?: (line: string) => void;
};

/* =========================
   Cells
   ========================= */

export function stringifyCell(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (v instanceof Date) return v.toISOString();
  if (typeof v === "object") return JSON.stringify(v);
  return String(v);
}

function quoteCell(text: string, sep: string): string {
  return /[",\r\n]/.test(text) || text.includes(sep) ? `"${text.replace(/"/g, '""')}"` : text;
}

function columnsOf(rows: readonly Row[], explicit?: string[]): string[] {
  if (explicit && explicit.length > 0) return explicit;
  const seen = new Set<string>();
  for (const r of rows) for (const k of Object.keys(r)) seen.add(k);
  return [...seen];
}

/** One CSV line into cells; a quoted cell may hold the separator or "" escapes. */
function splitLine(line: string, sep: string): string[] {
  const cells: string[] = [];
  let cell = "";
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch !== '"') cell += ch;
      else if (line[i + 1] === '"') { cell += '"'; i++; }
      else inQuotes = false;
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === sep) {
      cells.push(cell);
      cell = "";
    } else {
      cell += ch;
    }
  }
  cells.push(cell);
  return cells;
}

/* =========================
   Write
   ========================= */

/** "" for no rows and no columns; header only when columns are given for no rows. */
export function toCSV(rows: readonly Row[], opts: ToCSVOptions = {}): string {
  const cols = columnsOf(rows, opts.columns);
  if (cols.length === 0) return "";
  const sep = opts.sep ?? ",";
  const line = (cells: string[]) => cells.map(c => quoteCell(c, sep)).join(sep);

  const lines = rows.map(r => line(cols.map(c => stringifyCell(r[c]))));
  if (opts.header !== false) lines.unshift(line(cols));
  return lines.join("\n") + "\n";
}

/** Creates parent directories; returns the absolute path written. */
export function writeCSV(rows: readonly Row[], outPath: string, opts: ToCSVOptions = {}): string {
  const abs = path.resolve(outPath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, toCSV(rows, opts), "utf8");
  return abs;
}

/* =========================
   Read
   ========================= */

/**
 * Header-keyed records. Cells are trimmed, blank lines skipped, and missing
 * trailing cells come back as "".
 */
export function parseCSV(text: string, sep = ","): TextRow[] {
  const [head, ...body] = text.split(/\r?\n/).filter(l => l.trim() !== "");
  if (head === undefined) return [];
  const headers = splitLine(head, sep).map(h => h.trim());
  return body.map(l => {
    const cells = splitLine(l, sep);
    const row: TextRow = {};
    headers.forEach((h, i) => { row[h] = (cells[i] ?? "").trim(); });
    return row;
  });
}

export function readCSV(filePath: string, sep = ","): TextRow[] {
  return parseCSV(fs.readFileSync(filePath, "utf8"), sep);
}

/* =========================
   Console
   ========================= */

/**
 * Fixed-width table with a dashed rule under the header. Columns whose cells
 * are all numbers are right-aligned.
 */
export function printTable(rows: readonly Row[], opts: PrintTableOptions = {}): void {
  const out = opts.out ?? ((line: string) => console.log(line));
  if (rows.length === 0) {
    out("(empty)");
    return;
  }

  const cols = columnsOf(rows, opts.columns);
  const limit = Math.max(0, opts.maxWidth ?? 0);
  const clip = (s: string) => (limit > 0 && s.length > limit ? s.slice(0, Math.max(0, limit - 1)) + "…" : s);

  const body = rows.map(r => cols.map(c => clip(stringifyCell(r[c]))));
  const numeric = cols.map(c => rows.every(r => typeof r[c] === "number"));
  const widths = cols.map((c, i) => body.reduce((w, cells) => Math.max(w, cells[i].length), clip(c).length));

  const render = (cells: string[]) =>
    cells
      .map((s, i) => (numeric[i] ? s.padStart(widths[i]) : s.padEnd(widths[i])))
      .join("  ")
      .trimEnd();

  out(render(cols.map(clip)));
  out(render(widths.map(w => "-".repeat(w))));
  body.forEach(cells => out(render(cells)));
}
