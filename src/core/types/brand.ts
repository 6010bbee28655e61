/**
 * Branded / Opaque type utility.
 * Prevents accidental interchange of structurally identical primitives.
 *
 * @example
 * type PostId = Brand<number, "PostId">;
 * const id: PostId = brand(7);
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Store-assigned numeric identifiers */
export type UserId = Brand<number, "UserId">;
export type PostId = Brand<number, "PostId">;
export type RequestId = Brand<string, "RequestId">;
/** Milliseconds since the Unix epoch */
export type Timestamp = Brand<number, "Timestamp">;

/** Helper to create branded values (runtime no-op, compile-time safety) */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;

export const userId = (value: number): UserId => brand(value);
export const postId = (value: number): PostId => brand(value);
export const timestamp = (value: number): Timestamp => brand(value);
