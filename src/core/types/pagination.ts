/**
 * Offset pagination shared by both transports.
 *
 * HTTP speaks `limit`/`offset`, RPC speaks 1-based `page`/`pageSize`;
 * both are normalized into a `PageRequest` before reaching a service.
 */

export interface PageRequest {
  readonly limit: number;
  readonly offset: number;
}

export interface Page<T> {
  readonly items: readonly T[];
  readonly total: number;
  readonly limit: number;
  readonly offset: number;
}

export interface PaginationLimits {
  readonly defaultLimit: number;
  readonly maxLimit: number;
}

export const DEFAULT_PAGINATION: PaginationLimits = { defaultLimit: 10, maxLimit: 100 };

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export interface NumberedPageRequest extends PageRequest {
  readonly page: number;
}

/**
 * Apply defaults and clamp limit to [1, max], offset to [0, ∞). Offsets past
 * the safe integer range are capped there; they still select an empty page.
 */
export const normalizeOffsetPage = (
  input: { readonly limit?: number | undefined; readonly offset?: number | undefined },
  limits: PaginationLimits = DEFAULT_PAGINATION,
): PageRequest => ({
  limit: clamp(Math.trunc(input.limit ?? limits.defaultLimit), 1, limits.maxLimit),
  offset: clamp(Math.trunc(input.offset ?? 0), 0, Number.MAX_SAFE_INTEGER),
});

/**
 * Convert a 1-based page into a `PageRequest`.
 * A page below 1 is read as 1; a page size of 0 means "use the default".
 */
export const pageToOffset = (
  page: number,
  pageSize: number,
  limits: PaginationLimits = DEFAULT_PAGINATION,
): NumberedPageRequest => {
  const size = clamp(pageSize === 0 ? limits.defaultLimit : Math.trunc(pageSize), 1, limits.maxLimit);
  const current = Math.max(Math.trunc(page), 1);
  return { page: current, limit: size, offset: (current - 1) * size };
};

/** Inverse of `pageToOffset`, used by clients that think in limit/offset. */
export const offsetToPage = (req: PageRequest): { page: number; pageSize: number } => {
  const pageSize = Math.max(req.limit, 1);
  return { page: Math.floor(Math.max(req.offset, 0) / pageSize) + 1, pageSize };
};
