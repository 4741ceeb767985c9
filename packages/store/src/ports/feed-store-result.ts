import type { FeedStoreError } from "../core/errors/feed-store-error"
import type { FeedImageRecord } from "./feed-image"

export type FeedStoreFailure = {
  kind: "failure"
  error: FeedStoreError
}

export type RetrieveResult =
  | { kind: "empty" }
  | { kind: "found"; feed: readonly FeedImageRecord[]; timestamp: Date }
  | FeedStoreFailure

export type InsertResult = { kind: "inserted" } | FeedStoreFailure

export type DeleteResult = { kind: "deleted" } | FeedStoreFailure

export type FeedStoreResult = RetrieveResult | InsertResult | DeleteResult

export type FeedStoreOperation = "retrieve" | "insert" | "delete"
