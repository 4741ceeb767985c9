import { BaseError } from "@feedstore/errors"

export type FeedStoreErrorCode =
  | "cache_unreadable"
  | "cache_corrupted"
  | "invalid_feed"
  | "insertion_failed"
  | "deletion_failed"
  | "store_fault"

/** Identifies the slot an error happened on. */
export type SlotRef = {
  backend: string
  location: string
}

export class FeedStoreError extends BaseError<FeedStoreErrorCode> {
  static unreadable(slot: SlotRef, cause: unknown): FeedStoreError {
    return new FeedStoreError(`Cached feed at ${slot.location} could not be read`, {
      code: "cache_unreadable",
      context: { ...slot },
      cause,
      isRetryable: true,
    })
  }

  static corrupted(slot: SlotRef, cause: unknown): FeedStoreError {
    return new FeedStoreError(`Cached feed at ${slot.location} is corrupted`, {
      code: "cache_corrupted",
      context: { ...slot },
      cause,
    })
  }

  static invalidFeed(input: { issues: string } & Partial<SlotRef>, cause?: unknown): FeedStoreError {
    return new FeedStoreError(`Feed is invalid:\n${input.issues}`, {
      code: "invalid_feed",
      context: { ...input },
      ...(cause !== undefined && { cause }),
    })
  }

  static insertionFailed(slot: SlotRef, cause: unknown): FeedStoreError {
    return new FeedStoreError(`Feed could not be written to ${slot.location}`, {
      code: "insertion_failed",
      context: { ...slot },
      cause,
      isRetryable: true,
    })
  }

  static deletionFailed(slot: SlotRef, cause: unknown): FeedStoreError {
    return new FeedStoreError(`Cached feed at ${slot.location} could not be deleted`, {
      code: "deletion_failed",
      context: { ...slot },
      cause,
      isRetryable: true,
    })
  }

  /**
   * A wrapped store threw instead of returning a result. This is a broken
   * contract, not a storage condition.
   */
  static fault(input: SlotRef & { operation: string }, cause: unknown): FeedStoreError {
    return new FeedStoreError(`Feed store threw during ${input.operation}`, {
      code: "store_fault",
      context: { ...input },
      cause,
      isOperational: false,
    })
  }
}
