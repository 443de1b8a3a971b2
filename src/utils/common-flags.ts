import { Flags } from '@oclif/core'

/**
 * Common CLI flags shared across commands
 */

/**
 * JSON output flag
 * Enables structured JSON output instead of human-readable format
 */
export const jsonFlag = Flags.boolean({
  char: 'j',
  description: 'Output result in JSON format',
  default: false,
})

/**
 * Force operation flag
 * Bypasses confirmation prompts
 */
export const forceFlag = Flags.boolean({
  char: 'f',
  description: 'Copy without asking, even into a non-empty destination',
  default: false,
})

/**
 * Verbose flag
 * Prints debug lines from the engine
 */
export const verboseFlag = Flags.boolean({
  char: 'v',
  description: 'Print per-file debug output',
  default: false,
})

/**
 * Working directory flag
 * Directory the configuration search starts from
 */
export const cwdFlag = Flags.string({
  description: 'Directory to load configuration from (defaults to the current directory)',
  required: false,
})

/**
 * Common flags object for easy spreading
 */
export const commonFlags = {
  json: jsonFlag,
  cwd: cwdFlag,
}
