export {
  type Brand,
  type UserId,
  type PostId,
  type RequestId,
  type Timestamp,
  brand,
  userId,
  postId,
  timestamp,
} from "./brand.js";
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
} from "./result.js";
export {
  type PageRequest,
  type Page,
  type PaginationLimits,
  DEFAULT_PAGINATION,
  normalizeOffsetPage,
  pageToOffset,
  offsetToPage,
} from "./pagination.js";
