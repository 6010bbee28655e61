import type { Logger } from "../core/ports/logger.js";
import type { RequestId } from "../core/types/brand.js";

/** Per-request values the server hands every route handler. */
export interface RequestContext {
  readonly requestId: RequestId;
  readonly path: string;
  /** Query string without the leading `?` */
  readonly search: string;
  /** Carries `requestId` */
  readonly logger: Logger;
}
