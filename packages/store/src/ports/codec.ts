/**
 * Bidirectional transformation between a typed value and its persisted bytes.
 *
 * @remarks
 * `decode` throws on bytes it does not recognize; callers treat that as
 * corrupted storage.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
