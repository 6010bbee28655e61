import type { PostId, Timestamp, UserId } from "../types/index.js";

export interface Post {
  readonly id: PostId;
  readonly title: string;
  readonly content: string;
  /** Set once at creation. */
  readonly authorId: UserId;
  /** Only resolved on reads joined with users. */
  readonly authorUsername: string | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}
