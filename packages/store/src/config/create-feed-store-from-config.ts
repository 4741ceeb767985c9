import type { Clock } from "@feedstore/clock"
import { createPinoLogger, type Logger } from "@feedstore/logger"
import { createFileFeedStore, createMemoryFeedStore } from "../adapters/create"
import type { SerialFeedStore } from "../core/serial/serial-feed-store"
import type { FeedStoreConfig } from "./schema"

export type CreateFeedStoreFromConfigDeps = {
  /** Replaces the pino logger built from `config.logging`. */
  logger?: Logger
  clock?: Clock
}

export function createLoggerFromConfig(config: FeedStoreConfig): Logger {
  return createPinoLogger(
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName, env: config.app.env },
  )
}

export function createFeedStoreFromConfig(
  config: FeedStoreConfig,
  deps: CreateFeedStoreFromConfigDeps = {},
): SerialFeedStore {
  const options = {
    logger: deps.logger ?? createLoggerFromConfig(config),
    ...(deps.clock !== undefined && { clock: deps.clock }),
  }

  switch (config.store.backend) {
    case "memory":
      return createMemoryFeedStore(options)
    case "file":
      return createFileFeedStore({
        ...options,
        filePath: config.store.filePath,
        createDirectories: config.store.createDirectories,
      })
  }
}
