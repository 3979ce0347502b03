import {mkdir, mkdtemp, readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import {strFromU8, strToU8, unzipSync, zipSync} from 'fflate'
import {LAYOUT} from '../constants.js'
import type {BuildEvent, Reporter} from '../core/reporter.js'
import type {ProcessRunner} from '../engine/process-runner.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'topojar-test-'))
}

/**
 * Writes a zip archive. Names ending with `/` become directory entries.
 */
export async function writeZip(path: string, files: Record<string, string>): Promise<void> {
  const data: Record<string, Uint8Array> = {}
  for (const [name, content] of Object.entries(files)) {
    data[name] = strToU8(content)
  }

  await writeFile(path, zipSync(data))
}

/**
 * Reads every entry of a zip archive as text, keyed by entry name.
 */
export async function readZip(path: string): Promise<Record<string, string>> {
  const files = unzipSync(await readFile(path))
  const out: Record<string, string> = {}
  for (const [name, content] of Object.entries(files)) {
    out[name] = strFromU8(content)
  }

  return out
}

export const BASE_JAR_FILES = {
  'META-INF/MANIFEST.MF': 'Manifest-Version: 1.0\n',
  'resources/': '',
  'topology/Runner.class': 'bytecode'
}

/**
 * Writes a small base jar into `dir` and returns its path.
 */
export async function createBaseJar(dir: string, name = 'minimal.jar'): Promise<string> {
  const path = join(dir, name)
  await writeZip(path, BASE_JAR_FILES)
  return path
}

/**
 * Creates a topology directory named `name` under `parent` with the given files.
 */
export async function createTopology(parent: string, name: string, files: Record<string, string>): Promise<string> {
  const dir = join(parent, name)
  await mkdir(dir, {recursive: true})
  for (const [file, content] of Object.entries(files)) {
    const path = join(dir, file)
    await mkdir(dirname(path), {recursive: true})
    await writeFile(path, content)
  }

  return dir
}

/**
 * Returns a reporter that records emitted events and logged lines.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]; lines: string[]} {
  const events: BuildEvent[] = []
  const lines: string[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log(line) {
      lines.push(line)
    }
  }

  return {reporter, events, lines}
}

export type RecordedCommand = {
  file: string;
  args: string[];
  cwd: string;
}

/**
 * Process runner standing in for virtualenv and pip.
 *
 * A successful virtualenv call creates `<envName>/bin/pip` in the working
 * directory. Each call replays `output` through the line callback.
 */
export function fakeRunner(exitCodes: {env?: number; install?: number} = {}, output: string[] = []): {runner: ProcessRunner; calls: RecordedCommand[]} {
  const calls: RecordedCommand[] = []
  const runner: ProcessRunner = async (command, {cwd, onLine}) => {
    calls.push({file: command.file, args: command.args, cwd})
    for (const line of output) {
      onLine?.(line)
    }

    if (command.file === LAYOUT.envTool) {
      const code = exitCodes.env ?? 0
      if (code === 0) {
        const bin = join(cwd, LAYOUT.envName, 'bin')
        await mkdir(bin, {recursive: true})
        await writeFile(join(bin, LAYOUT.installerTool), '#!/bin/sh\n')
      }

      return code
    }

    return exitCodes.install ?? 0
  }

  return {runner, calls}
}
