import {basename, resolve} from 'node:path'
import {LAYOUT} from '../constants.js'
import {isTopojarError} from '../errors.js'
import type {EnvMode, RunOptions} from '../types.js'
import type {TopojarConfig} from './config.js'

/**
 * Options as parsed by commander.
 */
export type CliFlags = {
  base?: string;
  out?: string;
  /** `true` for --use-env, `false` for --no-use-env, absent otherwise */
  useEnv?: boolean;
  indexUrl?: string;
  systemPackages?: boolean;
  log?: string;
  verbose?: boolean;
  json?: boolean;
}

export type Env = Record<string, string | undefined>

export function toEnvMode(flag: boolean | undefined): EnvMode {
  if (flag === undefined) {
    return 'unset'
  }

  return flag ? 'enabled' : 'disabled'
}

/**
 * Output jar path: the explicit one, or `<basename of the topology directory>.jar`
 * in the current directory.
 */
export function buildOutputPath(out: string | undefined, projectDir: string, cwd: string): string {
  if (out !== undefined) {
    return resolve(cwd, out)
  }

  return resolve(cwd, `${basename(resolve(cwd, projectDir))}.${LAYOUT.archiveExtension}`)
}

/**
 * Resolves the run options once, before the build starts.
 *
 * Precedence: flags, then environment variables, then `.topojar.yml`, then
 * built-in defaults. Every path is made absolute against `cwd`.
 */
export function resolveRunOptions(
  projectDir: string,
  flags: CliFlags,
  env: Env,
  config: TopojarConfig,
  cwd: string
): RunOptions {
  const base = flags.base ?? env.TOPOJAR_BASE_ARCHIVE ?? config.base ?? LAYOUT.defaultBaseArchive
  const indexUrl = flags.indexUrl ?? env.TOPOJAR_INDEX_URL ?? config.indexUrl

  const options: RunOptions = {
    useEnv: toEnvMode(flags.useEnv),
    systemPackages: flags.systemPackages ?? config.systemPackages ?? false,
    verbose: flags.verbose ?? false,
    baseArchive: resolve(cwd, base),
    outputArchive: buildOutputPath(flags.out, projectDir, cwd),
    ...(indexUrl === undefined ? {} : {indexUrl}),
    ...(flags.log === undefined ? {} : {installLog: resolve(cwd, flags.log)})
  }

  return Object.freeze(options)
}

/**
 * Renders an error as the single line printed before exiting.
 *
 * Known errors read `<program>: error: [<kind>] <message>`. Anything else
 * reads `<program>: error: <message>`.
 */
export function formatError(programName: string, error: unknown): string {
  if (isTopojarError(error)) {
    return `${programName}: error: ${error.toString()}`
  }

  const message = error instanceof Error ? error.message : String(error)
  return `${programName}: error: ${message}`
}
