export {
  type CreateFeedStoreOptions,
  type CreateFileFeedStoreOptions,
  type CreateMemoryFeedStoreOptions,
  createFileFeedStore,
  createMemoryFeedStore,
  createSlotFeedStore,
} from "./adapters/create"
export { FileSlotBackend, type FsSlotBackendOptions } from "./adapters/fs/fs-slot-backend"
export {
  MemorySlotBackend,
  type MemorySlotBackendOptions,
} from "./adapters/memory/memory-slot-backend"
export {
  type CreateFeedStoreFromConfigDeps,
  createFeedStoreFromConfig,
  createLoggerFromConfig,
} from "./config/create-feed-store-from-config"
export {
  applyOverrides,
  loadFeedStoreConfig,
  mapEnvToConfig,
} from "./config/load-feed-store-config"
export {
  type EnvConfig,
  envSchema,
  type FeedStoreBackend,
  type FeedStoreConfig,
  type FeedStoreConfigOverrides,
  feedStoreBackends,
} from "./config/schema"
export { createFeedCodec } from "./core/codec/feed-codec"
export {
  FeedStoreError,
  type FeedStoreErrorCode,
  type SlotRef,
} from "./core/errors/feed-store-error"
export {
  cachedFeedSchema,
  createCachedFeed,
  createFeedImage,
  type FeedImageInput,
  feedImageSchema,
} from "./core/model/feed-image"
export { SerialFeedStore, type SerialFeedStoreDeps } from "./core/serial/serial-feed-store"
export { SerialQueue } from "./core/serial/serial-queue"
export { SlotFeedStore, type SlotFeedStoreDeps } from "./core/slot/slot-feed-store"
export type { Codec } from "./ports/codec"
export type { CachedFeed, FeedImageRecord } from "./ports/feed-image"
export type { FeedStore } from "./ports/feed-store"
export type {
  DeleteResult,
  FeedStoreFailure,
  FeedStoreOperation,
  FeedStoreResult,
  InsertResult,
  RetrieveResult,
} from "./ports/feed-store-result"
export type { SlotBackend, SlotRead } from "./ports/slot-backend"
