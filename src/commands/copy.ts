import { confirm } from '@inquirer/prompts'
import { Args, Command, Flags } from '@oclif/core'
import type { ChalkInstance } from 'chalk'
import fs from 'fs-extra'
import type { Ora } from 'ora'
import * as path from 'path'
import { loadConfig } from '../config/loader.js'
import type { HaulConfig, PartialHaulConfig, TransferConfig } from '../config/schema.js'
import { TransferEngine, type EngineEvent } from '../engine/engine.js'
import {
  FileTaskStatus,
  JobStatus,
  type AggregateProgress,
  type Notification,
  type TransferJob,
} from '../engine/types.js'
import { cwdFlag, forceFlag, jsonFlag, verboseFlag } from '../utils/common-flags.js'
import { ErrorHelper } from '../utils/errors.js'
import { createCommandLogger, type Logger } from '../utils/logger.js'
import { renderNotification, renderProgress } from '../utils/progressDisplay.js'

/**
 * Copy a file or directory tree
 *
 * Enumerates the source, then copies it file by file while showing live
 * progress. Ctrl+C cancels the copy at the next chunk boundary.
 */
export default class Copy extends Command {
  static description = 'Copy a file or directory with live progress'

  static examples = [
    '<%= config.bin %> <%= command.id %> ./photos /mnt/backup/photos',
    '<%= config.bin %> <%= command.id %> ./photos /mnt/backup/photos --verify',
    '<%= config.bin %> <%= command.id %> ./release.tar /mnt/usb --no-preserve-timestamps',
    '<%= config.bin %> <%= command.id %> ./photos /mnt/backup/photos --json --force',
  ]

  static args = {
    source: Args.string({
      description: 'File or directory to copy',
      required: true,
    }),
    destination: Args.string({
      description: 'Directory to copy into (created if missing)',
      required: true,
    }),
  }

  static flags = {
    verify: Flags.boolean({
      description: 'Compare SHA-256 checksums after copying each file',
      default: false,
    }),
    'preserve-timestamps': Flags.boolean({
      description: 'Copy access and modification times',
      allowNo: true,
    }),
    'chunk-size': Flags.integer({
      description: 'Bytes copied per step',
      min: 1,
    }),
    force: forceFlag,
    verbose: verboseFlag,
    cwd: cwdFlag,
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Copy)

    const { spinner, chalk } = await this.initializeUI(flags.json)
    const logger = createCommandLogger(this, {
      verbose: flags.verbose,
      json: flags.json,
      dim: chalk ? chalk.dim : undefined,
    })

    const source = path.resolve(args.source)
    const destination = path.resolve(args.destination)

    let config: HaulConfig
    try {
      config = await loadConfig({
        cwd: flags.cwd ?? process.cwd(),
        overrides: this.buildOverrides(flags),
        logger,
      })
    } catch (error) {
      ErrorHelper.fromError(this, error, 'Failed to load configuration', flags.json)
    }

    await this.validatePaths(source, destination, flags.json)

    if (!flags.force && !flags.json && (await this.isNonEmptyDirectory(destination))) {
      const proceed = await confirm({
        message: `${destination} is not empty. Copy into it anyway?`,
        default: false,
      })
      if (!proceed) {
        this.log('Copy aborted')
        return
      }
    }

    let result: { snapshot: AggregateProgress; job: TransferJob; notifications: Notification[] }
    try {
      await fs.ensureDir(destination)
      result = await this.runTransfer(source, destination, config, logger, spinner, chalk)
    } catch (error) {
      spinner?.stop()
      ErrorHelper.fromError(this, error, 'Copy failed', flags.json)
    }

    this.formatOutput(result, flags.json, chalk)

    if (result.snapshot.status === JobStatus.FAILED) {
      this.exit(1)
    }
    if (result.snapshot.status === JobStatus.CANCELLED) {
      this.exit(130)
    }
  }

  /**
   * Initialize UI components (spinner and chalk)
   */
  private async initializeUI(
    isJson: boolean
  ): Promise<{ spinner: Ora | null; chalk: ChalkInstance | null }> {
    const ora = !isJson ? (await import('ora')).default : null
    const spinner = ora ? ora() : null
    const chalk = !isJson ? (await import('chalk')).default : null

    return { spinner, chalk }
  }

  /**
   * Map CLI flags onto configuration overrides
   *
   * Flags left at their defaults do not override file or env settings.
   */
  private buildOverrides(flags: {
    verify: boolean
    'preserve-timestamps'?: boolean
    'chunk-size'?: number
  }): PartialHaulConfig | undefined {
    const transfer: Partial<TransferConfig> = {}

    if (flags.verify) {
      transfer.verify = true
    }
    if (flags['preserve-timestamps'] !== undefined) {
      transfer.preserveTimestamps = flags['preserve-timestamps']
    }
    if (flags['chunk-size'] !== undefined) {
      transfer.chunkSize = flags['chunk-size']
    }

    return Object.keys(transfer).length > 0 ? { transfer } : undefined
  }

  private async validatePaths(source: string, destination: string, json: boolean): Promise<void> {
    if (!(await fs.pathExists(source))) {
      ErrorHelper.validation(this, `Source does not exist: ${source}`, json)
    }

    if (source === destination) {
      ErrorHelper.validation(this, 'Source and destination are the same path', json)
    }

    if (destination.startsWith(source + path.sep)) {
      ErrorHelper.validation(this, `Destination is inside the source: ${destination}`, json)
    }

    if ((await fs.pathExists(destination)) && !(await fs.stat(destination)).isDirectory()) {
      ErrorHelper.validation(this, `Destination is not a directory: ${destination}`, json)
    }
  }

  private async isNonEmptyDirectory(directory: string): Promise<boolean> {
    if (!(await fs.pathExists(directory))) {
      return false
    }
    const entries = await fs.readdir(directory)
    return entries.length > 0
  }

  /**
   * Run one job to its end, rendering progress and notifications
   */
  private async runTransfer(
    source: string,
    destination: string,
    config: HaulConfig,
    logger: Logger,
    spinner: Ora | null,
    chalk: ChalkInstance | null
  ): Promise<{ snapshot: AggregateProgress; job: TransferJob; notifications: Notification[] }> {
    const engine = new TransferEngine({ config, logger })
    const printed = new Set<string>()
    const notifications: Notification[] = []

    const unsubscribe = engine.subscribe((event: EngineEvent) => {
      if (event.type === 'progress' && spinner) {
        spinner.text = renderProgress(event.snapshot)
      }

      if (event.type === 'notifications') {
        for (const notification of event.visible) {
          if (printed.has(notification.id)) {
            continue
          }
          printed.add(notification.id)
          notifications.push(notification)
          this.printNotification(notification, spinner, chalk)
        }
      }
    })

    spinner?.start('Starting…')
    const jobId = engine.start({ source, destination })

    const onInterrupt = (): void => {
      if (engine.cancel(jobId) && spinner) {
        spinner.text = 'Cancelling…'
      }
    }
    process.once('SIGINT', onInterrupt)

    try {
      const snapshot = await engine.waitForJob(jobId)
      const job = engine.getJob(jobId)
      if (!job) {
        throw new Error(`Job ${jobId} disappeared before it was reported`)
      }
      return { snapshot, job, notifications }
    } finally {
      process.removeListener('SIGINT', onInterrupt)
      spinner?.stop()
      unsubscribe()
      await engine.dispose()
    }
  }

  private printNotification(
    notification: Notification,
    spinner: Ora | null,
    chalk: ChalkInstance | null
  ): void {
    if (!spinner || !chalk) {
      return
    }

    const color = {
      info: chalk.blue,
      success: chalk.green,
      warning: chalk.yellow,
      error: chalk.red,
    }[notification.severity]

    spinner.clear()
    this.log(color(renderNotification(notification)))
    spinner.render()
  }

  /**
   * Format and output the result
   */
  private formatOutput(
    result: { snapshot: AggregateProgress; job: TransferJob; notifications: Notification[] },
    isJson: boolean,
    chalk: ChalkInstance | null
  ): void {
    const { snapshot, job } = result
    const errors = job.tasks
      .filter((task) => task.status === FileTaskStatus.ERRORED)
      .map((task) => ({ path: task.relativePath, error: task.error ?? 'unknown error' }))

    if (isJson) {
      this.log(
        JSON.stringify(
          {
            status: snapshot.status,
            message: snapshot.statusText,
            jobId: job.id,
            source: job.sourceRoot,
            destination: job.destinationRoot,
            filesDone: snapshot.filesDone,
            filesSkipped: snapshot.filesSkipped,
            filesTotal: snapshot.filesTotal,
            bytesDone: snapshot.bytesDone,
            bytesTotal: snapshot.bytesTotal,
            elapsedMs: snapshot.elapsedMs,
            errors,
            notifications: result.notifications.map(({ severity, message }) => ({
              severity,
              message,
            })),
          },
          null,
          2
        )
      )
      return
    }

    const summary = `${snapshot.filesText} files, ${snapshot.sizeText}, elapsed ${snapshot.elapsedText}`
    this.log(chalk ? chalk.gray(summary) : summary)
  }
}
