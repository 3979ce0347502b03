import {join} from 'node:path'
import {LAYOUT} from '../constants.js'
import {DependenciesError} from '../errors.js'
import type {CommandLine, ProcessRunner} from '../engine/process-runner.js'
import type {InstallerOptions} from '../types.js'
import type {Reporter} from './reporter.js'

/**
 * `virtualenv <envName> [--system-site-packages]`
 */
export function buildEnvCommand(options: Pick<InstallerOptions, 'systemPackages'>): CommandLine {
  const args = [LAYOUT.envName]

  if (options.systemPackages) {
    args.push('--system-site-packages')
  }

  return {file: LAYOUT.envTool, args}
}

/**
 * `<envName>/bin/pip install -r <manifest> [-i <indexUrl>] [--log <installLog>]`
 *
 * The executable path is relative: the command runs from the directory
 * holding the virtualenv.
 */
export function buildInstallCommand(manifest: string, options: Pick<InstallerOptions, 'indexUrl' | 'installLog'>): CommandLine {
  const args = ['install', '-r', manifest]

  if (options.indexUrl !== undefined) {
    args.push('-i', options.indexUrl)
  }

  if (options.installLog !== undefined) {
    args.push('--log', options.installLog)
  }

  return {file: join(LAYOUT.envName, 'bin', LAYOUT.installerTool), args}
}

/**
 * Creates a virtualenv in `resourcesDir` and installs the requirements
 * listed in `manifest` into it.
 *
 * Subprocess output reaches the reporter only in verbose mode. Nothing is
 * cleaned up on failure: the virtualenv goes away with the scratch workspace.
 *
 * @throws {DependenciesError} When either command exits with a non-zero code
 */
export async function installDependencies(
  resourcesDir: string,
  manifest: string,
  options: InstallerOptions,
  runner: ProcessRunner,
  reporter: Reporter
): Promise<void> {
  const onLine = options.verbose ? (line: string) => {
    reporter.log(line)
  } : undefined

  const run = async (command: CommandLine) => {
    reporter.emit({event: 'COMMAND_STARTING', cwd: resourcesDir, command: [command.file, ...command.args]})
    return runner(command, {cwd: resourcesDir, onLine})
  }

  if (await run(buildEnvCommand(options)) !== 0) {
    throw new DependenciesError(
      'ENV_CREATE_FAILED',
      'Failed to install dependencies for this topology: failed to create isolated environment.'
    )
  }

  if (await run(buildInstallCommand(manifest, options)) !== 0) {
    throw new DependenciesError(
      'INSTALL_FAILED',
      'Failed to install dependencies for this topology: rerun with --verbose for detailed info.'
    )
  }
}
