import { createError } from "@feedstore/errors"
import { z } from "zod"
import {
  type EnvConfig,
  envSchema,
  type FeedStoreConfig,
  type FeedStoreConfigOverrides,
} from "./schema"

export function mapEnvToConfig(env: EnvConfig): FeedStoreConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    store: {
      backend: env.FEED_STORE_BACKEND,
      filePath: env.FEED_STORE_PATH,
      createDirectories: env.FEED_STORE_CREATE_DIRECTORIES,
    },
  }
}

/** Section-wise merge; a field present in `overrides` replaces the mapped one. */
export function applyOverrides(
  config: FeedStoreConfig,
  overrides: FeedStoreConfigOverrides = {},
): FeedStoreConfig {
  return {
    app: { ...config.app, ...overrides.app },
    logging: { ...config.logging, ...overrides.logging },
    store: { ...config.store, ...overrides.store },
  }
}

/**
 * Reads feed store settings from environment variables.
 *
 * Blank values count as unset, so `FEED_STORE_PATH=` falls back to the default.
 *
 * @throws {BaseError} `invalid_config` listing every rejected variable.
 */
export function loadFeedStoreConfig(
  env: NodeJS.ProcessEnv,
  overrides?: FeedStoreConfigOverrides,
): FeedStoreConfig {
  const provided: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") provided[key] = value
  }

  const result = envSchema.safeParse(provided)

  if (!result.success) {
    throw createError(
      "invalid_config",
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      {
        context: { keys: result.error.issues.map((issue) => issue.path.join(".")) },
        cause: result.error,
      },
    )
  }

  return applyOverrides(mapEnvToConfig(result.data), overrides)
}
