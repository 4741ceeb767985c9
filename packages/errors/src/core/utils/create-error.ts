import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Build a BaseError without declaring a subclass.
 *
 * @example
 * ```ts
 * throw createError("invalid_config", "FEED_STORE_PATH must not be empty", {
 *   context: { key: "FEED_STORE_PATH" },
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
