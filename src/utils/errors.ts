import type { Command } from '@oclif/core'
import { ZodError } from 'zod'
import { EnumerationError, JobFatalError, getErrorMessage } from '../engine/errors.js'

/**
 * Error Helper Utility
 *
 * Centralized error reporting for the Haul CLI with stack trace control
 * and JSON output support.
 *
 * Usage Guidelines:
 * - Use `validation()` for expected user errors (missing source, bad config)
 * - Use `operation()` for runtime failures (destination gone, disk full)
 * - Use `unexpected()` for internal errors/bugs that should show stack traces
 * - Use `fromError()` when the kind of a caught error is not known up front
 *
 * @example
 * if (!(await fs.pathExists(args.source))) {
 *   ErrorHelper.validation(this, `Source does not exist: ${args.source}`, flags.json)
 * }
 */
export class ErrorHelper {
  /**
   * Handle validation errors (user input, preconditions, etc.)
   *
   * Displays a clean message without a stack trace and exits with code 1.
   */
  static validation(command: Command, message: string, json?: boolean): never {
    if (json) {
      command.log(JSON.stringify({ status: 'error', error: message }, null, 2))
      command.exit(1)
    } else {
      // { exit: false } keeps oclif from printing a stack trace
      command.error(message, { exit: false })
      command.exit(1)
    }
  }

  /**
   * Handle operation errors (runtime failures, external conditions)
   *
   * @param context - Description of what operation failed
   *
   * @example
   * try {
   *   await engine.waitForJob(jobId)
   * } catch (error) {
   *   ErrorHelper.operation(this, error, 'Transfer failed', flags.json)
   * }
   */
  static operation(command: Command, error: unknown, context: string, json?: boolean): never {
    const details = getErrorMessage(error)
    const message = `${context}: ${details}`

    if (json) {
      command.log(
        JSON.stringify(
          {
            status: 'error',
            error: message,
            context,
            details,
          },
          null,
          2
        )
      )
      command.exit(1)
    } else {
      command.error(message, { exit: false })
      command.exit(1)
    }
  }

  /**
   * Handle unexpected errors (bugs, internal errors)
   *
   * oclif prints the full stack trace.
   */
  static unexpected(command: Command, error: Error): never {
    command.error(error.message)
  }

  /**
   * Route a caught error to the matching handler
   *
   * Enumeration errors and invalid configuration are the user's to fix;
   * job-fatal errors are operation failures; anything else is unexpected.
   */
  static fromError(command: Command, error: unknown, context: string, json?: boolean): never {
    if (error instanceof EnumerationError) {
      ErrorHelper.validation(command, error.message, json)
    }

    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      ErrorHelper.validation(command, `Invalid configuration\n${issues.join('\n')}`, json)
    }

    if (error instanceof JobFatalError) {
      ErrorHelper.operation(command, error, context, json)
    }

    ErrorHelper.unexpected(command, error instanceof Error ? error : new Error(getErrorMessage(error)))
  }

  /**
   * Warn the user without exiting
   */
  static warn(command: Command, message: string, json?: boolean): void {
    if (json) {
      command.log(JSON.stringify({ status: 'warning', warning: message }, null, 2))
    } else {
      command.warn(message)
    }
  }
}
