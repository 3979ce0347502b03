/**
 * Programmatic API.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {JarBuilder, resolveRunOptions} from 'topojar'
 *
 * const options = resolveRunOptions('word_count', {}, process.env, {}, process.cwd())
 * const result = await new JarBuilder().build('word_count', options)
 * console.log(result.outputArchive, result.useEnv)
 * ```
 */

export {LAYOUT, type Layout} from './constants.js'

export {JarBuilder, type BuildDependencies} from './core/builder.js'
export {resolveProjectLayout, resolveEnvMode, validateLayout} from './core/layout.js'
export {stageWorkspace, copyDirContent, buildExclusionFilter} from './core/stager.js'
export {installDependencies, buildEnvCommand, buildInstallCommand} from './core/installer.js'
export {
  ConsoleReporter,
  InteractiveReporter,
  silentReporter,
  type Reporter,
  type BuildEvent,
  type BuildStartEvent,
  type StateChangedEvent,
  type ResourcesStagedEvent,
  type CommandStartingEvent,
  type BuildFinishedEvent,
  type BuildFailedEvent
} from './core/reporter.js'

export {BaseArchive} from './engine/base-archive.js'
export {packArchive, walkFiles, type PackedFile} from './engine/packer.js'
export {ScratchWorkspace} from './engine/workspace.js'
export {
  execaRunner,
  type ProcessRunner,
  type CommandLine,
  type RunCommandOptions,
  type OnOutputLine
} from './engine/process-runner.js'

export {loadConfig, parseConfig, type TopojarConfig} from './cli/config.js'
export {resolveRunOptions, buildOutputPath, formatError, toEnvMode, type CliFlags} from './cli/options.js'

export type {
  EnvMode,
  ResolvedEnvMode,
  RunOptions,
  ResolvedRunOptions,
  ProjectLayout,
  InstallerOptions,
  PipelineState,
  BuildResult
} from './types.js'

export {
  TopojarError,
  JarError,
  BaseJarNotFoundError,
  BaseJarInvalidError,
  OutputExistsError,
  TopologyError,
  InvalidTopologyError,
  DependenciesError,
  ConfigError,
  isTopojarError,
  type ErrorKind
} from './errors.js'
