import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {LAYOUT} from '../constants.js'

/**
 * Private scratch directory where the jar is assembled.
 *
 * The base jar is extracted at the root, the topology content lands in
 * `resources/` and, when dependencies are installed, the virtualenv in
 * `resources/{envName}/`. The whole tree is packed into the output jar and
 * then deleted.
 *
 * @example
 * ```typescript
 * const ws = await ScratchWorkspace.create()
 * try {
 *   // ... extract, copy, pack ...
 * } finally {
 *   await ws.remove()
 * }
 * ```
 */
export class ScratchWorkspace {
  /**
   * Creates a uniquely named directory under the OS temp directory.
   * @param parent - Directory to create the workspace in (defaults to the OS temp directory)
   */
  static async create(parent: string = tmpdir()): Promise<ScratchWorkspace> {
    const root = await mkdtemp(join(parent, `${LAYOUT.programName}-`))
    return new ScratchWorkspace(root)
  }

  private removed = false

  private constructor(readonly root: string) {}

  /** Directory holding the topology content inside the jar. */
  get resourcesPath(): string {
    return join(this.root, LAYOUT.resourcesDir)
  }

  /**
   * Deletes the workspace recursively. Safe to call on a partially populated
   * tree and more than once.
   */
  async remove(): Promise<void> {
    if (this.removed) {
      return
    }

    await rm(this.root, {recursive: true, force: true})
    this.removed = true
  }
}
