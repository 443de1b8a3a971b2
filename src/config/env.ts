import type { PartialHaulConfig } from './schema.js'
import { validatePartialConfig } from './schema.js'

/**
 * Environment Variable Parser
 *
 * Parses HAUL_* environment variables and converts them to configuration.
 *
 * Mapping rules:
 * - HAUL_CHUNK_SIZE=1048576 → transfer.chunkSize = 1048576
 * - HAUL_VERIFY=yes → transfer.verify = true
 * - HAUL_MAX_VISIBLE=5 → notifications.maxVisible = 5
 *
 * Supports:
 * - Boolean values: true/false, 1/0, yes/no
 * - Numbers: decimal, with optional underscores (10_000)
 */

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'HAUL_'

type EnvValueType = 'number' | 'boolean'

interface EnvVarSpec {
  path: string
  type: EnvValueType
}

/**
 * Supported environment variables and their config paths
 */
const ENV_VAR_MAP: Record<string, EnvVarSpec> = {
  // Transfer settings
  HAUL_CHUNK_SIZE: { path: 'transfer.chunkSize', type: 'number' },
  HAUL_SAMPLE_INTERVAL_MS: { path: 'transfer.sampleIntervalMs', type: 'number' },
  HAUL_PRESERVE_TIMESTAMPS: { path: 'transfer.preserveTimestamps', type: 'boolean' },
  HAUL_VERIFY: { path: 'transfer.verify', type: 'boolean' },
  HAUL_CHECK_FREE_SPACE: { path: 'transfer.checkFreeSpace', type: 'boolean' },

  // Estimator settings
  HAUL_WINDOW_MS: { path: 'estimator.windowMs', type: 'number' },
  HAUL_SMOOTHING_FACTOR: { path: 'estimator.smoothingFactor', type: 'number' },
  HAUL_IDLE_THRESHOLD_MS: { path: 'estimator.idleThresholdMs', type: 'number' },

  // Notification settings
  HAUL_MAX_VISIBLE: { path: 'notifications.maxVisible', type: 'number' },
  HAUL_NOTIFICATION_DURATION_MS: { path: 'notifications.durationMs', type: 'number' },
  HAUL_MAX_BACKLOG: { path: 'notifications.maxBacklog', type: 'number' },
  HAUL_NOTIFY_FILE_ERRORS: { path: 'notifications.perFileErrors', type: 'boolean' },

  // Progress settings
  HAUL_TICK_INTERVAL_MS: { path: 'progress.tickIntervalMs', type: 'number' },

  // Enumeration settings
  HAUL_FOLLOW_SYMLINKS: { path: 'enumeration.followSymlinks', type: 'boolean' },
}

/**
 * Parse a boolean value from string
 *
 * Supports: true/false, 1/0, yes/no (case insensitive)
 */
export function parseBoolean(value: string): boolean {
  const lower = value.toLowerCase().trim()
  return ['true', '1', 'yes'].includes(lower)
}

/**
 * Parse a number from string
 *
 * @returns Parsed number, or NaN when the value is not numeric
 */
export function parseNumber(value: string): number {
  const cleaned = value.trim().replace(/_/g, '')
  if (cleaned.length === 0) {
    return Number.NaN
  }
  return Number(cleaned)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Set a nested property on an object using dot notation
 *
 * @param obj - Object to modify
 * @param path - Dot-separated property path (e.g., 'transfer.verify')
 * @param value - Value to set
 */
export function setNestedProperty(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): void {
  const keys = path.split('.')
  const lastKey = keys.pop()
  if (lastKey === undefined) {
    return
  }

  let current = obj
  for (const key of keys) {
    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }

  current[lastKey] = value
}

/**
 * Parse a single environment variable value
 *
 * Unknown keys are returned as-is.
 */
export function parseEnvValue(key: string, value: string): unknown {
  const entry = ENV_VAR_MAP[key]
  if (!entry) {
    return value
  }

  return entry.type === 'number' ? parseNumber(value) : parseBoolean(value)
}

/**
 * Parse all HAUL_* environment variables
 *
 * @param env - Environment variables object (defaults to process.env)
 * @returns Partial configuration from environment variables
 * @throws {z.ZodError} If a value is out of range or not a number
 */
export function parseEnvVars(env: NodeJS.ProcessEnv = process.env): PartialHaulConfig {
  const config: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || !value) {
      continue
    }

    const entry = ENV_VAR_MAP[key]
    if (entry) {
      setNestedProperty(config, entry.path, parseEnvValue(key, value))
    }
  }

  return validatePartialConfig(config)
}

/**
 * Get configuration from environment variables
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialHaulConfig {
  return parseEnvVars(env)
}

/**
 * Check if any supported HAUL_* environment variable is set
 */
export function hasEnvConfig(env: NodeJS.ProcessEnv = process.env): boolean {
  return Object.keys(env).some((key) => key in ENV_VAR_MAP && Boolean(env[key]))
}

/**
 * List all supported environment variables
 */
export function listSupportedEnvVars(): Array<{ name: string; path: string; type: EnvValueType }> {
  return Object.entries(ENV_VAR_MAP).map(([name, entry]) => ({
    name,
    path: entry.path,
    type: entry.type,
  }))
}
