import {cp, mkdir, readdir, realpath} from 'node:fs/promises'
import {join} from 'node:path'
import ignore from 'ignore'
import {LAYOUT} from '../constants.js'
import type {BaseArchive} from '../engine/base-archive.js'
import type {ProjectLayout} from '../types.js'

/**
 * Returns a predicate telling which top-level entries of the topology
 * directory stay out of `resources/`.
 *
 * Patterns are anchored: a nested file named like the topology YAML or the
 * requirements manifest is still copied. Hidden entries are skipped.
 */
export function buildExclusionFilter(useEnv: boolean): (name: string) => boolean {
  const ig = ignore().add([`/${LAYOUT.jobFile}`, '/.*'])

  // The manifest only travels with the jar when its virtualenv does
  if (!useEnv) {
    ig.add(`/${LAYOUT.manifestFile}`)
  }

  return (name: string) => ig.ignores(name)
}

/**
 * Copies the content (not the directory itself) of `src` into `dst`,
 * skipping excluded top-level entries.
 *
 * Directories are copied recursively with symbolic links kept as links;
 * files keep their mode and timestamps. A top-level symbolic link is
 * replaced by what it points to.
 *
 * @returns Names of the copied entries, sorted
 */
export async function copyDirContent(src: string, dst: string, isExcluded: (name: string) => boolean): Promise<string[]> {
  const entries = await readdir(src, {withFileTypes: true})
  const copied: string[] = []

  for (const entry of entries) {
    if (isExcluded(entry.name)) {
      continue
    }

    const path = join(src, entry.name)
    const source = entry.isSymbolicLink() ? await realpath(path) : path
    await cp(source, join(dst, entry.name), {
      recursive: true,
      verbatimSymlinks: true,
      preserveTimestamps: true
    })
    copied.push(entry.name)
  }

  return copied.sort()
}

/**
 * Populates the scratch workspace:
 *
 * 1. extracts the base jar at its root
 * 2. copies the topology YAML into `resources/`
 * 3. copies the rest of the topology directory into `resources/`
 *
 * I/O errors are not caught.
 *
 * @returns Names of the top-level topology entries copied in step 3
 */
export async function stageWorkspace(
  archive: BaseArchive,
  workspaceRoot: string,
  layout: ProjectLayout,
  useEnv: boolean
): Promise<string[]> {
  await archive.extractTo(workspaceRoot)

  const resources = join(workspaceRoot, LAYOUT.resourcesDir)
  await mkdir(resources, {recursive: true})
  await cp(layout.jobFile, join(resources, LAYOUT.jobFile), {preserveTimestamps: true})

  return copyDirContent(layout.projectDir, resources, buildExclusionFilter(useEnv))
}
