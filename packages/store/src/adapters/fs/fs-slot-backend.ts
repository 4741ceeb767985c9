import { randomUUID } from "node:crypto"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { SlotBackend, SlotRead } from "../../ports/slot-backend"

export interface FsSlotBackendOptions {
  filePath: string

  /**
   * Create the parent directory on write when it does not exist.
   *
   * @default true
   */
  createDirectories?: boolean
}

/**
 * One file per slot. Writes go to a temporary sibling that is renamed over
 * the slot, so readers never observe a partially written file.
 */
export class FileSlotBackend implements SlotBackend {
  readonly name = "file"
  readonly location: string

  private readonly createDirectories: boolean

  constructor(options: FsSlotBackendOptions) {
    this.location = path.resolve(options.filePath)
    this.createDirectories = options.createDirectories ?? true
  }

  async read(): Promise<SlotRead> {
    try {
      const content = await fs.readFile(this.location)
      return { kind: "present", bytes: new Uint8Array(content) }
    } catch (err) {
      if (this.isMissingError(err)) return { kind: "absent" }
      throw err
    }
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.createDirectories) {
      await fs.mkdir(path.dirname(this.location), { recursive: true })
    }

    const tempPath = `${this.location}.${randomUUID()}.tmp`

    try {
      await fs.writeFile(tempPath, bytes)
      await fs.rename(tempPath, this.location)
    } catch (err) {
      await this.unlinkSafe(tempPath)
      throw err
    }
  }

  async remove(): Promise<void> {
    await this.unlinkSafe(this.location)
  }

  private async unlinkSafe(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath)
    } catch (err) {
      if (!this.isMissingError(err)) throw err
    }
  }

  /**
   * ENOTDIR: some ancestor of the path is a regular file. ENAMETOOLONG: the
   * name exceeds what the file system stores. Nothing can exist there either way.
   */
  private isMissingError(err: unknown): boolean {
    if (!(err instanceof Error) || !("code" in err)) return false
    return err.code === "ENOENT" || err.code === "ENOTDIR" || err.code === "ENAMETOOLONG"
  }
}
