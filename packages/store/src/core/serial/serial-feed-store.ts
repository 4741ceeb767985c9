import { type Clock, SystemClock } from "@feedstore/clock"
import { type Logger, NullLogger } from "@feedstore/logger"
import { z } from "zod"
import type { FeedImageRecord } from "../../ports/feed-image"
import type { FeedStore } from "../../ports/feed-store"
import type {
  DeleteResult,
  FeedStoreFailure,
  FeedStoreOperation,
  FeedStoreResult,
  InsertResult,
  RetrieveResult,
} from "../../ports/feed-store-result"
import { FeedStoreError, type SlotRef } from "../errors/feed-store-error"
import { cachedFeedSchema } from "../model/feed-image"
import { SerialQueue } from "./serial-queue"

export type SerialFeedStoreDeps = {
  store: FeedStore
  /** Names the wrapped store's slot in logs and in `store_fault` errors. */
  slot: SlotRef
  logger?: Logger
  clock?: Clock
}

/**
 * Runs every operation of the wrapped store one at a time, in submission
 * order, and settles each result before the next operation starts.
 */
export class SerialFeedStore implements FeedStore {
  private readonly store: FeedStore
  private readonly logger: Logger
  private readonly clock: Clock
  private readonly slot: SlotRef
  private readonly queue = new SerialQueue()
  private sequence = 0

  constructor(deps: SerialFeedStoreDeps) {
    this.store = deps.store
    this.slot = deps.slot
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "serial-feed-store",
      backend: deps.slot.backend,
      location: deps.slot.location,
    })
  }

  retrieve(): Promise<RetrieveResult> {
    return this.schedule("retrieve", () => this.store.retrieve())
  }

  insert(feed: readonly FeedImageRecord[], timestamp: Date): Promise<InsertResult> {
    // Parsing copies the records when submitted, so later mutations of the
    // caller's array never reach the store. The date is copied by hand.
    const parsed = cachedFeedSchema.safeParse({ feed, timestamp })

    if (!parsed.success) {
      const error = FeedStoreError.invalidFeed(
        { ...this.slot, issues: z.prettifyError(parsed.error) },
        parsed.error,
      )
      return this.schedule("insert", async (): Promise<InsertResult> => ({ kind: "failure", error }))
    }

    const snapshot = parsed.data.feed
    const at = new Date(parsed.data.timestamp.getTime())

    return this.schedule("insert", () => this.store.insert(snapshot, at))
  }

  deleteCachedFeed(): Promise<DeleteResult> {
    return this.schedule("delete", () => this.store.deleteCachedFeed())
  }

  /** Resolves once every operation submitted so far has settled. */
  onIdle(): Promise<void> {
    return this.queue.onIdle()
  }

  private schedule<R extends FeedStoreResult>(
    operation: FeedStoreOperation,
    run: () => Promise<R>,
  ): Promise<R | FeedStoreFailure> {
    const sequence = ++this.sequence
    const log = this.logger.child({ operation, sequence })

    log.trace("Operation queued", { queueDepth: this.queue.size })

    return this.queue.enqueue(async () => {
      const startedAt = this.clock.nowMs()
      const result = await this.guard(operation, run)
      const durationMs = this.clock.nowMs() - startedAt

      const outcome: FeedStoreResult = result
      if (outcome.kind === "failure") {
        log.warn("Operation failed", { outcome: "failure", durationMs, err: outcome.error })
      } else {
        log.debug("Operation completed", { outcome: outcome.kind, durationMs })
      }

      return result
    })
  }

  private async guard<R extends FeedStoreResult>(
    operation: FeedStoreOperation,
    run: () => Promise<R>,
  ): Promise<R | FeedStoreFailure> {
    try {
      return await run()
    } catch (err) {
      return { kind: "failure", error: FeedStoreError.fault({ ...this.slot, operation }, err) }
    }
  }
}
