import { type LogLevelName, logLevelNames } from "@feedstore/logger"
import { z } from "zod"

export const feedStoreBackends = ["file", "memory"] as const

export type FeedStoreBackend = (typeof feedStoreBackends)[number]

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("feed-store"),

  FEED_STORE_BACKEND: z.enum(feedStoreBackends).default("file"),
  FEED_STORE_PATH: z.string().min(1).default(".cache/feed-store.json"),
  FEED_STORE_CREATE_DIRECTORIES: z.stringbool().default(true),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type FeedStoreConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  store: {
    backend: FeedStoreBackend
    filePath: string
    createDirectories: boolean
  }
}

export type FeedStoreConfigOverrides = {
  [K in keyof FeedStoreConfig]?: Partial<FeedStoreConfig[K]>
}
