import {Buffer} from 'node:buffer'
import {mkdir, open, writeFile, type FileHandle} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {unzipSync} from 'fflate'
import {BaseJarInvalidError, BaseJarNotFoundError} from '../errors.js'

/**
 * Read-only handle on the base jar, the runtime skeleton every topology jar
 * is built from.
 *
 * The underlying file stays open until `close()` is called.
 */
export class BaseArchive {
  /**
   * Opens the base jar and checks it is a readable zip archive.
   * @throws {BaseJarNotFoundError} When nothing exists at `path`
   * @throws {BaseJarInvalidError} When `path` is not a zip archive
   */
  static async open(path: string): Promise<BaseArchive> {
    let handle: FileHandle
    try {
      handle = await open(path, 'r')
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new BaseJarNotFoundError({cause: error})
      }

      throw error
    }

    const archive = new BaseArchive(path, handle)
    try {
      await archive.entries()
    } catch (error) {
      await archive.close()
      throw new BaseJarInvalidError({cause: error})
    }

    return archive
  }

  private closed = false

  private constructor(
    readonly path: string,
    private readonly handle: FileHandle
  ) {}

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Lists the entry names of the archive, directories included.
   */
  async entries(): Promise<string[]> {
    const data = await this.read()
    const names: string[] = []
    unzipSync(data, {
      filter(file) {
        names.push(file.name)
        return false
      }
    })
    return names
  }

  /**
   * Extracts every entry under `targetDir`, keeping archive paths as they are.
   * @returns Number of files written
   */
  async extractTo(targetDir: string): Promise<number> {
    const files = unzipSync(await this.read())
    let count = 0

    for (const [name, content] of Object.entries(files)) {
      const target = join(targetDir, name)
      if (name.endsWith('/')) {
        await mkdir(target, {recursive: true})
        continue
      }

      await mkdir(dirname(target), {recursive: true})
      await writeFile(target, content)
      count++
    }

    return count
  }

  /**
   * Releases the file handle. Later calls are no-ops.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }

    this.closed = true
    await this.handle.close()
  }

  private async read(): Promise<Uint8Array> {
    const {size} = await this.handle.stat()
    const buffer = Buffer.alloc(size)
    let offset = 0
    while (offset < size) {
      const {bytesRead} = await this.handle.read(buffer, offset, size - offset, offset)
      if (bytesRead === 0) {
        break
      }

      offset += bytesRead
    }

    return buffer.subarray(0, offset)
  }
}
