import { z } from 'zod'

/**
 * Configuration Schema for Haul
 *
 * Defines TypeScript interfaces and Zod schemas for validating
 * configuration from multiple sources (.haul.toml, package.json,
 * the global config file, environment variables and CLI flags)
 */

// ============================================================================
// Zod Schemas (for validation)
// ============================================================================

/**
 * Copy behavior schema
 */
export const TransferConfigSchema = z.object({
  chunkSize: z.number().int().positive().default(64 * 1024),
  sampleIntervalMs: z.number().int().nonnegative().default(100),
  preserveTimestamps: z.boolean().default(true),
  verify: z.boolean().default(false),
  checkFreeSpace: z.boolean().default(true),
})

export const TransferConfigSchemaPartial = z.object({
  chunkSize: z.number().int().positive().optional(),
  sampleIntervalMs: z.number().int().nonnegative().optional(),
  preserveTimestamps: z.boolean().optional(),
  verify: z.boolean().optional(),
  checkFreeSpace: z.boolean().optional(),
})

/**
 * Rate estimation schema
 */
export const EstimatorConfigSchema = z.object({
  windowMs: z.number().int().positive().default(10_000),
  smoothingFactor: z.number().gt(0).lte(1).default(0.3),
  idleThresholdMs: z.number().int().positive().default(3_000),
})

export const EstimatorConfigSchemaPartial = z.object({
  windowMs: z.number().int().positive().optional(),
  smoothingFactor: z.number().gt(0).lte(1).optional(),
  idleThresholdMs: z.number().int().positive().optional(),
})

/**
 * Notification queue schema
 */
export const NotificationConfigSchema = z.object({
  maxVisible: z.number().int().positive().default(3),
  durationMs: z.number().int().positive().default(3_500),
  maxBacklog: z.number().int().nonnegative().default(50),
  perFileErrors: z.boolean().default(true),
})

export const NotificationConfigSchemaPartial = z.object({
  maxVisible: z.number().int().positive().optional(),
  durationMs: z.number().int().positive().optional(),
  maxBacklog: z.number().int().nonnegative().optional(),
  perFileErrors: z.boolean().optional(),
})

/**
 * Snapshot refresh schema
 */
export const ProgressConfigSchema = z.object({
  tickIntervalMs: z.number().int().positive().default(1_000),
})

export const ProgressConfigSchemaPartial = z.object({
  tickIntervalMs: z.number().int().positive().optional(),
})

/**
 * Source walk schema
 */
export const EnumerationConfigSchema = z.object({
  followSymlinks: z.boolean().default(true),
})

export const EnumerationConfigSchemaPartial = z.object({
  followSymlinks: z.boolean().optional(),
})

/**
 * Complete Haul configuration schema
 */
export const HaulConfigSchema = z.object({
  transfer: TransferConfigSchema,
  estimator: EstimatorConfigSchema,
  notifications: NotificationConfigSchema,
  progress: ProgressConfigSchema,
  enumeration: EnumerationConfigSchema,
})

/**
 * Partial Haul configuration schema without defaults
 */
export const PartialHaulConfigSchema = z.object({
  transfer: TransferConfigSchemaPartial.optional(),
  estimator: EstimatorConfigSchemaPartial.optional(),
  notifications: NotificationConfigSchemaPartial.optional(),
  progress: ProgressConfigSchemaPartial.optional(),
  enumeration: EnumerationConfigSchemaPartial.optional(),
})

// ============================================================================
// TypeScript Interfaces
// ============================================================================

/**
 * Copy behavior
 */
export interface TransferConfig {
  /**
   * Bytes read and written per step; cancellation is checked between steps
   * @default 65536
   */
  chunkSize: number

  /**
   * Minimum interval between progress samples during one file
   * @default 100
   */
  sampleIntervalMs: number

  /**
   * Copy access and modification times to the destination
   * @default true
   */
  preserveTimestamps: boolean

  /**
   * Compare SHA-256 digests of source and destination after each copy
   * @default false
   */
  verify: boolean

  /**
   * Fail the job when the destination volume cannot fit the next file
   * @default true
   */
  checkFreeSpace: boolean
}

/**
 * Rate and ETA estimation
 */
export interface EstimatorConfig {
  /** @default 10000 */
  windowMs: number
  /** @default 0.3 */
  smoothingFactor: number
  /** @default 3000 */
  idleThresholdMs: number
}

/**
 * Transient notifications
 */
export interface NotificationConfig {
  /** @default 3 */
  maxVisible: number
  /** @default 3500 */
  durationMs: number
  /** @default 50 */
  maxBacklog: number
  /**
   * Raise a warning notification for every file that fails
   * @default true
   */
  perFileErrors: boolean
}

export interface ProgressConfig {
  /**
   * Interval at which elapsed time and ETA are refreshed without new samples
   * @default 1000
   */
  tickIntervalMs: number
}

export interface EnumerationConfig {
  /** @default true */
  followSymlinks: boolean
}

/**
 * Complete Haul configuration
 */
export interface HaulConfig {
  transfer: TransferConfig
  estimator: EstimatorConfig
  notifications: NotificationConfig
  progress: ProgressConfig
  enumeration: EnumerationConfig
}

/**
 * Partial configuration (used for merging)
 */
export type PartialHaulConfig = {
  transfer?: Partial<TransferConfig>
  estimator?: Partial<EstimatorConfig>
  notifications?: Partial<NotificationConfig>
  progress?: Partial<ProgressConfig>
  enumeration?: Partial<EnumerationConfig>
}

// ============================================================================
// Configuration Source Types
// ============================================================================

/**
 * Where a configuration value came from
 */
export enum ConfigSource {
  CLI_FLAG = 'cli_flag',
  ENV_VARS = 'env_vars',
  HAUL_TOML = 'haul_toml',
  PACKAGE_JSON = 'package_json',
  GLOBAL_CONFIG = 'global_config',
  DEFAULT = 'default',
}

/**
 * Configuration with source tracking
 */
export interface ConfigWithSource {
  config: HaulConfig
  sources: {
    [key: string]: ConfigSource
  }
}

/**
 * A discovered configuration file
 */
export interface ConfigFile {
  path: string
  source: ConfigSource
  priority: number
  exists: boolean
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: HaulConfig = {
  transfer: {
    chunkSize: 64 * 1024,
    sampleIntervalMs: 100,
    preserveTimestamps: true,
    verify: false,
    checkFreeSpace: true,
  },
  estimator: {
    windowMs: 10_000,
    smoothingFactor: 0.3,
    idleThresholdMs: 3_000,
  },
  notifications: {
    maxVisible: 3,
    durationMs: 3_500,
    maxBacklog: 50,
    perFileErrors: true,
  },
  progress: {
    tickIntervalMs: 1_000,
  },
  enumeration: {
    followSymlinks: true,
  },
}

/**
 * Sections of the configuration, in display order
 */
export const CONFIG_SECTIONS = [
  'transfer',
  'estimator',
  'notifications',
  'progress',
  'enumeration',
] as const satisfies ReadonlyArray<keyof HaulConfig>

export type ConfigSection = (typeof CONFIG_SECTIONS)[number]

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration against schema
 *
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): HaulConfig {
  return HaulConfigSchema.parse(config)
}

/**
 * Validate partial configuration (for merging)
 */
export function validatePartialConfig(config: unknown): PartialHaulConfig {
  return PartialHaulConfigSchema.parse(config)
}

/**
 * Check if value is a valid HaulConfig
 */
export function isHaulConfig(value: unknown): value is HaulConfig {
  return HaulConfigSchema.safeParse(value).success
}
