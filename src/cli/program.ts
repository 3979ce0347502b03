import {resolve} from 'node:path'
import {Command, CommanderError} from 'commander'
import {LAYOUT} from '../constants.js'
import {isTopojarError} from '../errors.js'
import {JarBuilder, type BuildDependencies} from '../core/builder.js'
import {ConsoleReporter, InteractiveReporter, type Reporter} from '../core/reporter.js'
import {loadConfig} from './config.js'
import {formatError, resolveRunOptions, type CliFlags, type Env} from './options.js'

export type CliContext = {
  cwd: string;
  env: Env;
  /** Writes one line to the standard error stream */
  stderr: (line: string) => void;
  /** Overrides the reporter picked from --json / --verbose */
  reporter?: Reporter;
} & Pick<BuildDependencies, 'runner' | 'tmpDir'>

function pickReporter(flags: CliFlags, context: CliContext): Reporter {
  if (context.reporter) {
    return context.reporter
  }

  return flags.json ? new ConsoleReporter() : new InteractiveReporter({verbose: flags.verbose, write: context.stderr})
}

export function createProgram(context: CliContext, onExitCode: (code: number) => void): Command {
  const program = new Command()

  program
    .name(LAYOUT.programName)
    .description('Build a self-contained topology jar from a topology directory')
    .version('0.1.0')
    .argument('<topology-directory>', `Directory holding ${LAYOUT.jobFile}, the sources and an optional ${LAYOUT.manifestFile}`)
    .option('-b, --base <path>', `Base jar file path (default: ${LAYOUT.defaultBaseArchive})`)
    .option('-o, --out <path>', `Output jar path (default: <topology-directory>.${LAYOUT.archiveExtension})`)
    .option('--use-env', `Create a virtualenv and pip install ${LAYOUT.manifestFile} into the jar`)
    .option('--no-use-env', 'Do not install dependencies, even if a requirements file is present')
    .option('-i, --index-url <url>', 'Base URL of the Python Package Index used by pip')
    .option('-s, --system-packages', 'Do not install packages already present in your system')
    .option('--log <path>', 'Log location for pip')
    .option('-v, --verbose', 'Show the output of virtualenv and pip')
    .option('--json', 'Output structured JSON logs')
    .exitOverride()
    .configureOutput({
      writeErr(text) {
        context.stderr(text.trimEnd())
      }
    })
    .action(async (projectDir: string, flags: CliFlags) => {
      try {
        const config = await loadConfig(context.cwd)
        const options = resolveRunOptions(projectDir, flags, context.env, config, context.cwd)
        const builder = new JarBuilder({
          runner: context.runner,
          tmpDir: context.tmpDir,
          reporter: pickReporter(flags, context)
        })
        await builder.build(resolve(context.cwd, projectDir), options)
        onExitCode(0)
      } catch (error: unknown) {
        context.stderr(formatError(program.name(), error))
        if (flags.verbose && !isTopojarError(error) && error instanceof Error && error.stack) {
          context.stderr(error.stack)
        }

        onExitCode(1)
      }
    })

  return program
}

/**
 * Parses `argv` (user arguments only) and runs the build.
 * @returns Process exit code
 */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  let exitCode = 0
  const program = createProgram(context, code => {
    exitCode = code
  })

  try {
    await program.parseAsync(argv, {from: 'user'})
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }

    throw error
  }

  return exitCode
}
