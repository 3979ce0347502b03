import {lstat, stat} from 'node:fs/promises'
import {OutputExistsError} from '../errors.js'
import {BaseArchive} from '../engine/base-archive.js'
import {packArchive} from '../engine/packer.js'
import {execaRunner, type ProcessRunner} from '../engine/process-runner.js'
import {ScratchWorkspace} from '../engine/workspace.js'
import type {BuildResult, PipelineState, ProjectLayout, RunOptions} from '../types.js'
import {installDependencies} from './installer.js'
import {resolveProjectLayout, validateLayout} from './layout.js'
import {silentReporter, type Reporter} from './reporter.js'
import {stageWorkspace} from './stager.js'

export type BuildDependencies = {
  /** Runs virtualenv and pip. Defaults to execa. */
  runner?: ProcessRunner;
  reporter?: Reporter;
  /** Parent directory of the scratch workspace. Defaults to the OS temp directory. */
  tmpDir?: string;
  /** Opens the base jar. Defaults to `BaseArchive.open`. */
  openArchive?: (path: string) => Promise<BaseArchive>;
}

/**
 * Builds a topology jar:
 *
 * 1. opens the base jar
 * 2. creates a scratch workspace
 * 3. validates the topology directory (resolving the virtualenv flag)
 * 4. extracts the base jar and copies the topology into the workspace
 * 5. creates the virtualenv and installs the requirements, when enabled
 * 6. packs the workspace into the output jar
 *
 * The base jar is closed and the workspace removed on every exit path,
 * whatever the error. Errors are not wrapped.
 */
export class JarBuilder {
  private readonly runner: ProcessRunner
  private readonly reporter: Reporter
  private readonly tmpDir?: string
  private readonly openArchive: (path: string) => Promise<BaseArchive>
  private current: PipelineState = 'Start'

  constructor(deps: BuildDependencies = {}) {
    this.runner = deps.runner ?? execaRunner
    this.reporter = deps.reporter ?? silentReporter
    this.tmpDir = deps.tmpDir
    this.openArchive = deps.openArchive ?? (async path => BaseArchive.open(path))
  }

  /** Last state reached by the most recent build. */
  get state(): PipelineState {
    return this.current
  }

  async build(projectDir: string, options: RunOptions): Promise<BuildResult> {
    const startedAt = Date.now()
    const layout = resolveProjectLayout(projectDir)
    this.current = 'Start'
    this.reporter.emit({event: 'BUILD_START', projectDir: layout.projectDir, outputArchive: options.outputArchive})

    try {
      // Fail before touching anything if the output is already there
      await ensureAbsent(options.outputArchive)

      const result = await this.assemble(layout, options)
      this.transition('Done')

      const {size} = await stat(result.outputArchive)
      this.reporter.emit({
        event: 'BUILD_FINISHED',
        outputArchive: result.outputArchive,
        entries: result.entries,
        archiveSize: size,
        durationMs: Date.now() - startedAt
      })

      return result
    } catch (error: unknown) {
      const reached = this.current
      this.current = 'Aborted'
      this.reporter.emit({
        event: 'BUILD_FAILED',
        state: reached,
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async assemble(layout: ProjectLayout, options: RunOptions): Promise<BuildResult> {
    const archive = await this.openArchive(options.baseArchive)
    try {
      this.transition('BaseOpened')

      const workspace = await ScratchWorkspace.create(this.tmpDir)
      try {
        this.transition('WorkspaceCreated')
        return await this.populate(archive, workspace, layout, options)
      } finally {
        await workspace.remove()
      }
    } finally {
      await archive.close()
    }
  }

  private async populate(
    archive: BaseArchive,
    workspace: ScratchWorkspace,
    layout: ProjectLayout,
    options: RunOptions
  ): Promise<BuildResult> {
    const resolved = await validateLayout(layout, options)
    const useEnv = resolved.useEnv === 'enabled'
    this.transition('Validated')

    const copied = await stageWorkspace(archive, workspace.root, layout, useEnv)
    this.transition('Staged')
    this.reporter.emit({event: 'RESOURCES_STAGED', copied})

    if (useEnv) {
      await installDependencies(workspace.resourcesPath, layout.manifestFile, resolved, this.runner, this.reporter)
    }

    this.transition('DependenciesResolved')

    const entries = await packArchive(workspace.root, options.outputArchive)
    this.transition('Packed')

    return {outputArchive: options.outputArchive, useEnv, entries}
  }

  private transition(state: PipelineState): void {
    this.current = state
    this.reporter.emit({event: 'STATE_CHANGED', state})
  }
}

async function ensureAbsent(path: string): Promise<void> {
  try {
    await lstat(path)
  } catch {
    return
  }

  throw new OutputExistsError(path)
}

