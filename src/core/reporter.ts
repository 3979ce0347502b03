import process from 'node:process'
import pino from 'pino'
import chalk from 'chalk'
import type {PipelineState} from '../types.js'
import {formatDuration, formatSize} from './utils.js'

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. BUILD_START - Inputs resolved, nothing touched yet
 * 2. STATE_CHANGED - Once per pipeline transition (BaseOpened ... Packed)
 *    RESOURCES_STAGED - Right after Staged, with the topology entries copied
 * 3. COMMAND_STARTING - Before each dependency installation subprocess
 * 4. BUILD_FINISHED - Output jar written
 *    OR BUILD_FAILED - Pipeline aborted, scratch workspace removed
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  projectDir: string;
  outputArchive: string;
}

export type StateChangedEvent = {
  event: 'STATE_CHANGED';
  state: PipelineState;
}

export type ResourcesStagedEvent = {
  event: 'RESOURCES_STAGED';
  /** Top-level entries of the topology directory copied into resources/, sorted */
  copied: string[];
}

export type CommandStartingEvent = {
  event: 'COMMAND_STARTING';
  cwd: string;
  command: string[];
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  outputArchive: string;
  entries: number;
  archiveSize: number;
  durationMs: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  /** Last state reached before the failure */
  state: PipelineState;
  message: string;
}

export type BuildEvent =
  | BuildStartEvent
  | StateChangedEvent
  | ResourcesStagedEvent
  | CommandStartingEvent
  | BuildFinishedEvent
  | BuildFailedEvent

/**
 * Interface for reporting build progress.
 */
export type Reporter = {
  /** Reports build state transitions */
  emit(event: BuildEvent): void;
  /** Reports subprocess output (stdout and stderr merged) */
  log(line: string): void;
}

/**
 * Reporter that drops everything.
 */
export const silentReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: BuildEvent): void {
    if (event.event === 'BUILD_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }

  log(line: string): void {
    this.logger.info({stream: 'subprocess', line})
  }
}

/**
 * Human-readable reporter. Silent unless verbose, matching the behavior of
 * a build that succeeds without printing anything.
 */
export class InteractiveReporter implements Reporter {
  private readonly verbose: boolean
  private readonly write: (text: string) => void

  constructor(options?: {verbose?: boolean; write?: (text: string) => void}) {
    this.verbose = options?.verbose ?? false
    this.write = options?.write ?? (text => {
      process.stderr.write(text + '\n')
    })
  }

  emit(event: BuildEvent): void {
    if (!this.verbose) {
      return
    }

    switch (event.event) {
      case 'BUILD_START': {
        this.write(chalk.bold(`▶ Building ${chalk.cyan(event.outputArchive)} from ${event.projectDir}`))
        break
      }

      case 'STATE_CHANGED': {
        this.write(chalk.gray(`  · ${event.state}`))
        break
      }

      case 'RESOURCES_STAGED': {
        const names = event.copied.length > 0 ? event.copied.join(', ') : 'nothing'
        this.write(chalk.gray(`    copied ${names}`))
        break
      }

      case 'COMMAND_STARTING': {
        this.write(chalk.dim(`  $ ${event.command.join(' ')}`))
        break
      }

      case 'BUILD_FINISHED': {
        this.write(chalk.green(`✓ ${event.outputArchive} (${event.entries} files, ${formatSize(event.archiveSize)}, ${formatDuration(event.durationMs)})`))
        break
      }

      case 'BUILD_FAILED': {
        this.write(chalk.red(`✗ Aborted after ${event.state}`))
        break
      }
    }
  }

  log(line: string): void {
    if (this.verbose) {
      this.write(`    ${line}`)
    }
  }
}
