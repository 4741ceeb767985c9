import superjson from "superjson"
import type { Codec } from "../../ports/codec"
import type { CachedFeed } from "../../ports/feed-image"
import { cachedFeedSchema, freezeCachedFeed } from "../model/feed-image"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Persists a CachedFeed as superjson-flavoured UTF-8 JSON, which keeps the
 * timestamp a `Date`. Decoding validates the payload; unknown fields are
 * dropped and anything malformed throws.
 */
export function createFeedCodec(): Codec<CachedFeed> {
  return {
    encode: (value: CachedFeed) =>
      encoder.encode(
        superjson.stringify({
          feed: value.feed.map(({ id, description, location, url }) => ({
            id,
            description,
            location,
            url,
          })),
          timestamp: value.timestamp,
        }),
      ),
    decode: (bytes: Uint8Array) =>
      freezeCachedFeed(cachedFeedSchema.parse(superjson.parse<unknown>(decoder.decode(bytes)))),
  }
}
