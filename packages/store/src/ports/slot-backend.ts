export type SlotRead = { kind: "absent" } | { kind: "present"; bytes: Uint8Array }

/**
 * Byte-level storage for exactly one value.
 *
 * @remarks
 * Backends know nothing about feeds; they move opaque bytes. Every mutating
 * call either fully succeeds or throws with the slot unchanged.
 */
export interface SlotBackend {
  /** Backend kind, e.g. "file" or "memory". */
  readonly name: string

  /** Where the slot lives, e.g. an absolute file path. */
  readonly location: string

  /**
   * Resolves `absent` when the slot was never written or has been removed.
   * Throws when the slot exists but cannot be read.
   */
  read(): Promise<SlotRead>

  /** Atomically replaces the slot contents. */
  write(bytes: Uint8Array): Promise<void>

  /** Clears the slot. A no-op when it is already absent. */
  remove(): Promise<void>
}
