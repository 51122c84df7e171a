// errors/index.ts
// Single entry for the errors module, plus the Result type the data layer
// returns instead of throwing.

import { makeError, type AppError } from "./boundary";

export type { AppError, BoundaryOptions, ErrorKind } from "./boundary";
export { EXIT_CODES, formatError, makeError, runWithBoundary, toAppError } from "./boundary";
export {
  invariant,
  isNumber,
  isObject,
  isOneOf,
  isString,
  toBoolean,
  toFiniteNumber,
} from "./guards";

/* ===================== Result ===================== */

export type Ok<T> = { ok: true; value: T };
export type Err<E extends Error = Error> = { ok: false; error: E };
export type Result<T, E extends Error = Error> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E extends Error>(error: E): Err<E> => ({ ok: false, error });

export function mapResult<T, U, E extends Error>(r: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return r.ok ? ok(fn(r.value)) : r;
}

/** Value of an Ok; throws the error of an Err. */
export function unwrap<T>(r: Result<T>): T {
  if (!r.ok) throw r.error;
  return r.value;
}

/** Run `fn`, capturing a throw as Err. Non-Error throws become Runtime errors. */
export function resultifySync<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (e) {
    return err(e instanceof Error ? e : makeError("Runtime", String(e)));
  }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof Error && "kind" in e && typeof e.kind === "string";
}
