import { z } from "zod"
import type { CachedFeed, FeedImageRecord } from "../../ports/feed-image"
import { FeedStoreError } from "../errors/feed-store-error"

export const feedImageSchema = z.object({
  id: z.string().min(1),
  description: z.string().nullable(),
  location: z.string().nullable(),
  url: z.url(),
})

export const cachedFeedSchema = z.object({
  feed: z.array(feedImageSchema),
  timestamp: z.date(),
})

export type FeedImageInput = z.input<typeof feedImageSchema>

export type ParsedCachedFeed = z.output<typeof cachedFeedSchema>

/**
 * Validates `input` and returns it as a frozen record.
 *
 * @throws {FeedStoreError} `invalid_feed` when a field is missing or malformed.
 */
export function createFeedImage(input: FeedImageInput): FeedImageRecord {
  const result = feedImageSchema.safeParse(input)

  if (!result.success) {
    throw FeedStoreError.invalidFeed({ issues: z.prettifyError(result.error) }, result.error)
  }

  return Object.freeze(result.data)
}

/**
 * Freezes a parsed feed so neither the records nor the array can be mutated
 * by whoever receives it.
 */
export function freezeCachedFeed(parsed: ParsedCachedFeed): CachedFeed {
  return Object.freeze({
    feed: Object.freeze(parsed.feed.map((record) => Object.freeze(record))),
    timestamp: parsed.timestamp,
  })
}

/**
 * Validates a feed and timestamp and returns a frozen copy of both.
 *
 * @throws {FeedStoreError} `invalid_feed`
 */
export function createCachedFeed(feed: readonly FeedImageInput[], timestamp: Date): CachedFeed {
  const result = cachedFeedSchema.safeParse({ feed, timestamp })

  if (!result.success) {
    throw FeedStoreError.invalidFeed({ issues: z.prettifyError(result.error) }, result.error)
  }

  return freezeCachedFeed(result.data)
}
