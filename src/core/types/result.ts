import type { AppError } from "../errors/app-error.js";

/**
 * Every fallible operation returns Result<T, E> instead of throwing.
 * Branch on `ok`; nothing in the domain or the transports throws.
 */
export type Result<T, E = AppError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });
