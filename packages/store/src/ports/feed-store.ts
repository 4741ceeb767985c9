import type { FeedImageRecord } from "./feed-image"
import type { DeleteResult, InsertResult, RetrieveResult } from "./feed-store-result"

/**
 * Single-slot cache for a feed.
 *
 * Every operation settles exactly once with a result and never rejects;
 * failures are reported as `{ kind: "failure" }`.
 */
export interface FeedStore {
  /**
   * Reads the slot without changing it.
   *
   * `empty` when nothing was ever inserted (or the slot was deleted),
   * `found` with the last inserted feed and timestamp, `failure` when the
   * slot exists but cannot be read or decoded.
   */
  retrieve(): Promise<RetrieveResult>

  /** Replaces whatever the slot holds with `feed` taken at `timestamp`. */
  insert(feed: readonly FeedImageRecord[], timestamp: Date): Promise<InsertResult>

  /** Clears the slot. Succeeds on an already empty slot. */
  deleteCachedFeed(): Promise<DeleteResult>
}
