import type { Clock } from "@feedstore/clock"
import type { Logger } from "@feedstore/logger"
import { SerialFeedStore } from "../core/serial/serial-feed-store"
import { SlotFeedStore } from "../core/slot/slot-feed-store"
import type { SlotBackend } from "../ports/slot-backend"
import { FileSlotBackend } from "./fs/fs-slot-backend"
import { MemorySlotBackend } from "./memory/memory-slot-backend"

export interface CreateFeedStoreOptions {
  logger?: Logger
  clock?: Clock
}

export interface CreateMemoryFeedStoreOptions extends CreateFeedStoreOptions {
  location?: string
}

export interface CreateFileFeedStoreOptions extends CreateFeedStoreOptions {
  filePath: string
  createDirectories?: boolean
}

/** Composes backend, slot store and serialization wrapper. */
export function createSlotFeedStore(
  backend: SlotBackend,
  options: CreateFeedStoreOptions = {},
): SerialFeedStore {
  const store = new SlotFeedStore({ backend })

  return new SerialFeedStore({
    store,
    slot: store.slot,
    ...(options.logger !== undefined && { logger: options.logger }),
    ...(options.clock !== undefined && { clock: options.clock }),
  })
}

export function createMemoryFeedStore(
  options: CreateMemoryFeedStoreOptions = {},
): SerialFeedStore {
  const backend = new MemorySlotBackend({
    ...(options.location !== undefined && { location: options.location }),
  })

  return createSlotFeedStore(backend, options)
}

export function createFileFeedStore(options: CreateFileFeedStoreOptions): SerialFeedStore {
  const backend = new FileSlotBackend({
    filePath: options.filePath,
    ...(options.createDirectories !== undefined && {
      createDirectories: options.createDirectories,
    }),
  })

  return createSlotFeedStore(backend, options)
}
