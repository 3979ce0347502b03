import {execa} from 'execa'

/**
 * A command line: the executable and its arguments.
 */
export type CommandLine = {
  file: string;
  args: string[];
}

/**
 * Callback receiving the merged stdout/stderr of a subprocess, line by line.
 */
export type OnOutputLine = (line: string) => void

export type RunCommandOptions = {
  /** Working directory of the subprocess */
  cwd: string;
  /** Receives output lines. Output is discarded when omitted. */
  onLine?: OnOutputLine;
}

/**
 * Runs a command to completion and returns its exit code.
 *
 * Implementations must not throw on a non-zero exit. A command that cannot
 * be started reports a non-zero exit code.
 */
export type ProcessRunner = (command: CommandLine, options: RunCommandOptions) => Promise<number>

/**
 * Default runner backed by execa. Blocks until the subprocess exits; there
 * is no timeout.
 */
export const execaRunner: ProcessRunner = async (command, {cwd, onLine}) => {
  try {
    const proc = execa(command.file, command.args, {
      cwd,
      all: true,
      stdin: 'ignore',
      buffer: false,
      reject: false
    })

    for await (const line of proc.iterable({from: 'all'})) {
      onLine?.(line)
    }

    const result = await proc
    return result.exitCode ?? 1
  } catch (error: unknown) {
    onLine?.(error instanceof Error ? error.message : String(error))
    return 1
  }
}
