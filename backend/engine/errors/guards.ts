// errors/guards.ts
// Narrowing helpers for values read from JSON, CSV cells, env vars and flags.

import { makeError, type ErrorKind } from "./boundary";

export function isObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

export function isString(v: unknown): v is string {
  return typeof v === "string";
}

/** Finite numbers only. */
export function isNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

export function isOneOf<T extends string>(v: unknown, options: readonly T[]): v is T {
  return options.some(o => o === v);
}

/** Numeric strings ("0.005", " 30 ") count; empty strings do not. */
export function toFiniteNumber(v: unknown): number | undefined {
  if (isNumber(v)) return v;
  if (isString(v) && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/** true/false, "true"/"false" and "1"/"0"; anything else is undefined. */
export function toBoolean(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return undefined;
}

export function invariant(
  cond: unknown,
  msg: string,
  kind: ErrorKind = "Runtime",
  details?: Record<string, unknown>
): asserts cond {
  if (!cond) throw makeError(kind, msg, undefined, details);
}
