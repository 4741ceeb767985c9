import type { SlotBackend, SlotRead } from "../../ports/slot-backend"

export interface MemorySlotBackendOptions {
  /** Label used in errors and logs. */
  location?: string
}

/**
 * In-process slot. Bytes are copied on the way in and on the way out, so no
 * caller ever holds a reference to the stored buffer.
 */
export class MemorySlotBackend implements SlotBackend {
  readonly name = "memory"
  readonly location: string

  private bytes: Uint8Array | null = null

  constructor(options: MemorySlotBackendOptions = {}) {
    this.location = options.location ?? "memory://feed-store"
  }

  async read(): Promise<SlotRead> {
    if (this.bytes === null) return { kind: "absent" }

    return { kind: "present", bytes: this.bytes.slice() }
  }

  async write(bytes: Uint8Array): Promise<void> {
    this.bytes = bytes.slice()
  }

  async remove(): Promise<void> {
    this.bytes = null
  }
}
