import type {Stats} from 'node:fs'
import {lstat, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import {LAYOUT} from '../constants.js'
import {InvalidTopologyError, TopologyError} from '../errors.js'
import type {EnvMode, ProjectLayout, ResolvedEnvMode, ResolvedRunOptions, RunOptions} from '../types.js'

export function resolveProjectLayout(projectDir: string): ProjectLayout {
  const root = resolve(projectDir)
  return {
    projectDir: root,
    jobFile: join(root, LAYOUT.jobFile),
    manifestFile: join(root, LAYOUT.manifestFile),
    envDir: join(root, LAYOUT.envName)
  }
}

/**
 * Turns the tri-state flag into a concrete decision. An unset flag follows
 * the presence of the requirements manifest.
 */
export function resolveEnvMode(mode: EnvMode, manifestExists: boolean): ResolvedEnvMode {
  if (mode === 'unset') {
    return manifestExists ? 'enabled' : 'disabled'
  }

  return mode
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch {
    return false
  }
}

/**
 * Checks that the topology directory is in order and that nothing will be
 * overwritten:
 *
 * - it exists and is a directory
 * - the topology YAML exists inside
 * - the requirements manifest exists when the environment is used
 * - no entry already carries the environment's name
 *
 * Nothing is written to disk. The returned options carry the resolved
 * environment flag.
 */
export async function validateLayout(layout: ProjectLayout, options: RunOptions): Promise<ResolvedRunOptions> {
  let dirStat: Stats
  try {
    dirStat = await stat(layout.projectDir)
  } catch (error) {
    throw new TopologyError('TOPOLOGY_NOT_FOUND', `Topology directory not found: ${layout.projectDir}`, {cause: error})
  }

  if (!dirStat.isDirectory()) {
    throw new TopologyError('TOPOLOGY_NOT_DIRECTORY', `Topology directory is not a directory: ${layout.projectDir}`)
  }

  if (!await isFile(layout.jobFile)) {
    throw new InvalidTopologyError('TOPOLOGY_YAML_NOT_FOUND', `Topology YAML not found: ${layout.jobFile}`)
  }

  const manifestExists = await isFile(layout.manifestFile)
  const useEnv = resolveEnvMode(options.useEnv, manifestExists)

  if (useEnv === 'enabled') {
    if (!manifestExists) {
      throw new InvalidTopologyError('MANIFEST_NOT_FOUND', `${LAYOUT.manifestFile} file not found`)
    }

    if (await exists(layout.envDir)) {
      throw new InvalidTopologyError('RESERVED_PATH', `Topology directory must not contain a file named ${LAYOUT.envName}`)
    }
  }

  return Object.freeze({...options, useEnv})
}
