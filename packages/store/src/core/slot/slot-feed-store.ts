import { z } from "zod"
import type { Codec } from "../../ports/codec"
import type { CachedFeed, FeedImageRecord } from "../../ports/feed-image"
import type { FeedStore } from "../../ports/feed-store"
import type { DeleteResult, InsertResult, RetrieveResult } from "../../ports/feed-store-result"
import type { SlotBackend, SlotRead } from "../../ports/slot-backend"
import { createFeedCodec } from "../codec/feed-codec"
import { FeedStoreError, type SlotRef } from "../errors/feed-store-error"
import { cachedFeedSchema, freezeCachedFeed } from "../model/feed-image"

export type SlotFeedStoreDeps = {
  backend: SlotBackend
  codec?: Codec<CachedFeed>
}

const EMPTY: RetrieveResult = { kind: "empty" }
const INSERTED: InsertResult = { kind: "inserted" }
const DELETED: DeleteResult = { kind: "deleted" }

/**
 * FeedStore over any SlotBackend. Translates backend and codec failures into
 * results; never throws and never rejects.
 *
 * @remarks
 * Not safe for concurrent use on its own. Wrap it in a SerialFeedStore.
 */
export class SlotFeedStore implements FeedStore {
  private readonly backend: SlotBackend
  private readonly codec: Codec<CachedFeed>

  constructor(deps: SlotFeedStoreDeps) {
    this.backend = deps.backend
    this.codec = deps.codec ?? createFeedCodec()
  }

  get slot(): SlotRef {
    return { backend: this.backend.name, location: this.backend.location }
  }

  async retrieve(): Promise<RetrieveResult> {
    let read: SlotRead

    try {
      read = await this.backend.read()
    } catch (err) {
      return { kind: "failure", error: FeedStoreError.unreadable(this.slot, err) }
    }

    if (read.kind === "absent") return EMPTY

    try {
      const cached = this.codec.decode(read.bytes)
      return { kind: "found", feed: cached.feed, timestamp: cached.timestamp }
    } catch (err) {
      return { kind: "failure", error: FeedStoreError.corrupted(this.slot, err) }
    }
  }

  async insert(feed: readonly FeedImageRecord[], timestamp: Date): Promise<InsertResult> {
    const parsed = cachedFeedSchema.safeParse({ feed, timestamp })

    if (!parsed.success) {
      return {
        kind: "failure",
        error: FeedStoreError.invalidFeed(
          { ...this.slot, issues: z.prettifyError(parsed.error) },
          parsed.error,
        ),
      }
    }

    try {
      await this.backend.write(this.codec.encode(freezeCachedFeed(parsed.data)))
      return INSERTED
    } catch (err) {
      return { kind: "failure", error: FeedStoreError.insertionFailed(this.slot, err) }
    }
  }

  async deleteCachedFeed(): Promise<DeleteResult> {
    try {
      await this.backend.remove()
      return DELETED
    } catch (err) {
      return { kind: "failure", error: FeedStoreError.deletionFailed(this.slot, err) }
    }
  }
}
