// errors/boundary.ts
// Typed application errors and the async boundary the CLI runs commands in.

export type ErrorKind =
  | "Config"     // bad flag, config file or params file
  | "Data"       // missing/unreadable input series
  | "Fetch"      // a contract source returned nothing usable
  | "Backtest"   // engine misuse (e.g. closing a closed trade)
  | "Optimizer"  // bad grid definition
  | "Runtime"
  | "Unknown";

export interface AppError extends Error {
  kind: ErrorKind;
  cause?: unknown;
  details?: Record<string, unknown>;
}

/** Process exit status per kind; anything unexpected is 1. */
export const EXIT_CODES: Readonly<Record<ErrorKind, number>> = {
  Config: 2,
  Data: 3,
  Fetch: 3,
  Backtest: 4,
  Optimizer: 4,
  Runtime: 1,
  Unknown: 1,
};

export function makeError(
  kind: ErrorKind,
  msg: string,
  cause?: unknown,
  details?: Record<string, unknown>
): AppError {
  return Object.assign(new Error(msg), { kind, cause, details });
}

function carriesKind(e: Error): e is AppError {
  return "kind" in e && typeof e.kind === "string";
}

/** Typed errors pass through; anything else is wrapped under `fallbackKind`. */
export function toAppError(e: unknown, fallbackKind: ErrorKind = "Unknown"): AppError {
  if (e instanceof Error) return carriesKind(e) ? e : makeError(fallbackKind, e.message, e);
  if (typeof e === "string") return makeError(fallbackKind, e);
  if (e === null || e === undefined) return makeError(fallbackKind, "Unknown error (null/undefined)");
  return makeError(fallbackKind, "Non-error thrown", e, { value: e });
}

/** "Data: Observation file not found: x.csv (file=x.csv)" */
export function formatError(e: AppError): string {
  const details = Object.entries(e.details ?? {})
    .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`)
    .join(", ");
  return details ? `${e.kind}: ${e.message} (${details})` : `${e.kind}: ${e.message}`;
}

export type BoundaryOptions = {
  kind?: ErrorKind;
  rethrow?: boolean;
  logger?: (err: AppError) => void;
};

/**
 * Run `fn`, normalising whatever it throws. The error goes to `logger`, then
 * is rethrown or turned into `undefined`.
 */
export async function runWithBoundary<T>(fn: () => Promise<T>, opts: BoundaryOptions = {}): Promise<T | undefined> {
  try {
    return await fn();
  } catch (e) {
    const err = toAppError(e, opts.kind ?? "Unknown");
    opts.logger?.(err);
    if (opts.rethrow) throw err;
    return undefined;
  }
}
