import type { Command } from '@oclif/core'

/**
 * Logging
 *
 * The engine logs through this interface and stays silent by default.
 * Commands wire it to oclif's log/warn output.
 */
export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

export interface CommandLoggerOptions {
  /** Print debug lines */
  verbose?: boolean
  /** JSON output mode: nothing but the final document goes to stdout */
  json?: boolean
  /** Style debug lines (e.g. chalk.dim) */
  dim?: (text: string) => string
}

/**
 * Create a Logger that writes through an oclif command
 *
 * Warnings and errors go to stderr via command.warn; info and debug go to
 * stdout via command.log. In JSON mode only warnings and errors are kept.
 */
export function createCommandLogger(command: Command, options: CommandLoggerOptions = {}): Logger {
  const dim = options.dim ?? ((text: string) => text)

  return {
    debug(message) {
      if (options.verbose && !options.json) {
        command.log(dim(message))
      }
    },
    info(message) {
      if (!options.json) {
        command.log(message)
      }
    },
    warn(message) {
      command.warn(message)
    },
    error(message) {
      command.warn(`Error: ${message}`)
    },
  }
}
