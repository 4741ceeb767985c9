/**
 * One image entry of a feed. Plain immutable data; two records are equal
 * when all four fields are equal.
 */
export interface FeedImageRecord {
  /** Opaque unique token, typically a UUID. */
  readonly id: string
  readonly description: string | null
  readonly location: string | null
  /** Absolute URL of the image. */
  readonly url: string
}

/**
 * The single value a feed store holds: the feed exactly as inserted and the
 * instant it was inserted at.
 */
export interface CachedFeed {
  readonly feed: readonly FeedImageRecord[]
  readonly timestamp: Date
}
