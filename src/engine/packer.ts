import {lstat, open, readFile, readdir, stat, type FileHandle} from 'node:fs/promises'
import {join, relative, sep} from 'node:path'
import {Zip, ZipDeflate} from 'fflate'
import {OutputExistsError} from '../errors.js'

const COMPRESSION_LEVEL = 6

// Zip timestamps are DOS dates: 1980-01-01 to 2099-12-31, two-second resolution
const MIN_ZIP_TIME = new Date(1980, 0, 1).getTime()
const MAX_ZIP_TIME = new Date(2099, 11, 31, 23, 59, 58).getTime()

// Regular file type bits, kept next to the permissions in the external attributes
const S_IFREG = 0o100000

export type PackedFile = {
  /** Absolute path on disk */
  path: string;
  /** Path inside the archive, `/`-separated */
  name: string;
}

/**
 * Lists every file under `root` in a stable order, with its archive name
 * relative to `root`.
 *
 * Symbolic links to files are followed. Symbolic links to directories are
 * not descended.
 */
export async function * walkFiles(root: string, dir: string = root): AsyncGenerator<PackedFile> {
  const entries = await readdir(dir, {withFileTypes: true})
  entries.sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)))

  for (const entry of entries) {
    const path = join(dir, entry.name)

    if (entry.isDirectory()) {
      yield * walkFiles(root, path)
      continue
    }

    if (entry.isSymbolicLink() && !(await stat(path)).isFile()) {
      continue
    }

    if (entry.isFile() || entry.isSymbolicLink()) {
      yield {path, name: relative(root, path).split(sep).join('/')}
    }
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch {
    return false
  }
}

/**
 * Packs the content of `root` into a new deflate-compressed jar at
 * `destination`.
 *
 * The destination is never overwritten nor appended to. On failure the
 * partially written file is left in place and the file handle is closed.
 *
 * @returns Number of files written
 * @throws {OutputExistsError} When something already exists at `destination`
 */
export async function packArchive(root: string, destination: string): Promise<number> {
  if (await pathExists(destination)) {
    throw new OutputExistsError(destination)
  }

  let handle: FileHandle
  try {
    handle = await open(destination, 'wx')
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
      throw new OutputExistsError(destination, {cause: error})
    }

    throw error
  }

  try {
    return await writeArchive(root, handle)
  } finally {
    await handle.close()
  }
}

async function writeArchive(root: string, handle: FileHandle): Promise<number> {
  let pending: Promise<unknown> = Promise.resolve()
  const status: {failure?: Error} = {}

  const zip = new Zip((error, chunk) => {
    if (error) {
      status.failure = error
      return
    }

    pending = pending.then(async () => handle.write(chunk))
  })

  let count = 0
  try {
    for await (const file of walkFiles(root)) {
      const info = await stat(file.path)
      const entry = new ZipDeflate(file.name, {level: COMPRESSION_LEVEL})
      entry.mtime = Math.min(Math.max(info.mtimeMs, MIN_ZIP_TIME), MAX_ZIP_TIME)
      // Unix origin, file mode in the high word of the external attributes
      entry.os = 3
      entry.attrs = ((info.mode & 0o777) | S_IFREG) * 0x10000
      zip.add(entry)
      entry.push(await readFile(file.path), true)
      await pending
      count++
    }
  } catch (error) {
    zip.terminate()
    await pending
    throw error
  }

  zip.end()
  await pending

  if (status.failure) {
    throw status.failure
  }

  return count
}
