import { parse as parseToml } from '@iarna/toml'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { getErrorMessage } from '../engine/errors.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'
import type { ConfigFile, ConfigWithSource, HaulConfig, PartialHaulConfig } from './schema.js'
import {
  CONFIG_SECTIONS,
  ConfigSource,
  DEFAULT_CONFIG,
  validateConfig,
  validatePartialConfig,
} from './schema.js'
import { getEnvConfig, hasEnvConfig } from './env.js'

/**
 * Configuration Loader
 *
 * Discovers and loads Haul configuration from multiple sources:
 * 1. .haul.toml (working directory, walked up to a stop directory)
 * 2. package.json ("haul" key)
 * 3. Global config (~/.config/haul/config.toml)
 * 4. HAUL_* environment variables
 * 5. CLI flag overrides
 *
 * Merges configurations with proper priority handling.
 */

// ============================================================================
// Configuration File Patterns
// ============================================================================

const CONFIG_FILES = {
  HAUL_TOML: '.haul.toml',
  PACKAGE_JSON: 'package.json',
} as const

/**
 * Priority order for configuration sources (higher = more priority)
 */
export const SOURCE_PRIORITY: Record<ConfigSource, number> = {
  [ConfigSource.CLI_FLAG]: 100,
  [ConfigSource.ENV_VARS]: 90,
  [ConfigSource.HAUL_TOML]: 80,
  [ConfigSource.PACKAGE_JSON]: 70,
  [ConfigSource.GLOBAL_CONFIG]: 50,
  [ConfigSource.DEFAULT]: 0,
}

export interface LoadOptions {
  /** Directory the search starts from */
  cwd?: string
  /** Highest directory searched for project files (defaults to defaultStopDir(cwd)) */
  stopDir?: string
  /** Global config file (defaults to ~/.config/haul/config.toml) */
  globalConfigPath?: string
  /** Environment to read HAUL_* variables from */
  env?: NodeJS.ProcessEnv
  /** Values from CLI flags */
  overrides?: PartialHaulConfig
  skipCache?: boolean
  /** Receives a warning for every config file that fails to parse */
  logger?: Logger
}

// ============================================================================
// Configuration Discovery
// ============================================================================

/**
 * Search boundary for project files
 *
 * The home directory when cwd is inside it, otherwise the root of cwd's
 * file system.
 */
export function defaultStopDir(cwd: string, homeDir: string = os.homedir()): string {
  const resolved = path.resolve(cwd)
  const relative = path.relative(homeDir, resolved)
  if (!relative.startsWith('..') && !path.isAbsolute(relative)) {
    return homeDir
  }
  return path.parse(resolved).root
}

/**
 * Discover configuration files from the working directory up to stopDir
 *
 * @param startDir - Starting directory for search
 * @param stopDir - Search boundary
 * @param globalConfigPath - Global config file location
 * @returns Discovered config files with metadata, nearest first
 */
export async function discoverConfigFiles(
  startDir: string,
  stopDir: string,
  globalConfigPath: string = getGlobalConfigPath()
): Promise<ConfigFile[]> {
  const configFiles: ConfigFile[] = []
  let currentDir = path.resolve(startDir)
  const resolvedStopDir = path.resolve(stopDir)

  while (true) {
    for (const [fileName, source] of [
      [CONFIG_FILES.HAUL_TOML, ConfigSource.HAUL_TOML],
      [CONFIG_FILES.PACKAGE_JSON, ConfigSource.PACKAGE_JSON],
    ] as const) {
      const filePath = path.join(currentDir, fileName)
      configFiles.push({
        path: filePath,
        source,
        priority: SOURCE_PRIORITY[source],
        exists: await configFileExists(filePath),
      })
    }

    if (currentDir === resolvedStopDir) {
      break
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      break
    }
    currentDir = parentDir
  }

  configFiles.push({
    path: globalConfigPath,
    source: ConfigSource.GLOBAL_CONFIG,
    priority: SOURCE_PRIORITY[ConfigSource.GLOBAL_CONFIG],
    exists: await configFileExists(globalConfigPath),
  })

  return configFiles
}

/**
 * Get global configuration file path
 *
 * @returns Path to global config file (~/.config/haul/config.toml)
 */
export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), '.config', 'haul', 'config.toml')
}

/**
 * Check if a configuration file exists and is readable
 */
export async function configFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.R_OK)
    return true
  } catch {
    return false
  }
}

// ============================================================================
// Configuration Parsers
// ============================================================================

/**
 * Parse a .haul.toml (or the global config.toml) file
 */
export async function parseHaulToml(filePath: string): Promise<PartialHaulConfig> {
  const contents = await fs.readFile(filePath, 'utf-8')
  return validatePartialConfig(parseToml(contents))
}

/**
 * Parse package.json file
 *
 * Extracts the "haul" key; a package.json without one contributes nothing.
 */
export async function parsePackageJson(filePath: string): Promise<PartialHaulConfig> {
  const contents = await fs.readFile(filePath, 'utf-8')
  const parsed: unknown = JSON.parse(contents)
  if (typeof parsed !== 'object' || parsed === null || !('haul' in parsed)) {
    return {}
  }
  return validatePartialConfig(parsed.haul)
}

/**
 * Parse configuration file based on its type
 */
export async function parseConfigFile(configFile: ConfigFile): Promise<PartialHaulConfig> {
  switch (configFile.source) {
    case ConfigSource.HAUL_TOML:
    case ConfigSource.GLOBAL_CONFIG:
      return parseHaulToml(configFile.path)
    case ConfigSource.PACKAGE_JSON:
      return parsePackageJson(configFile.path)
    default:
      return {}
  }
}

// ============================================================================
// Configuration Merging
// ============================================================================

function mergeSection<T extends object>(
  base: Partial<T> | undefined,
  override: Partial<T> | undefined
): Partial<T> | undefined {
  if (override === undefined) {
    return base
  }
  return { ...base, ...override }
}

/**
 * Deep merge two configuration objects
 *
 * Higher priority values override lower priority values section by section.
 * Parsed partial configs omit keys that were not set, so they never erase
 * a lower priority value.
 */
export function mergeConfigs(
  base: PartialHaulConfig,
  override: PartialHaulConfig
): PartialHaulConfig {
  return {
    transfer: mergeSection(base.transfer, override.transfer),
    estimator: mergeSection(base.estimator, override.estimator),
    notifications: mergeSection(base.notifications, override.notifications),
    progress: mergeSection(base.progress, override.progress),
    enumeration: mergeSection(base.enumeration, override.enumeration),
  }
}

/**
 * Merge multiple configuration sources
 *
 * Configs are merged in priority order (lower priority first). Among
 * sources of equal priority the earlier entry wins, so discovery order
 * (nearest file first) decides between walked-up project files.
 */
export function mergeMultipleConfigs(
  configs: Array<{ config: PartialHaulConfig; source: ConfigSource }>
): ConfigWithSource {
  const sortedConfigs = configs
    .map((entry, index) => ({ ...entry, index }))
    .sort((a, b) => SOURCE_PRIORITY[a.source] - SOURCE_PRIORITY[b.source] || b.index - a.index)

  let mergedConfig: PartialHaulConfig = DEFAULT_CONFIG
  const sources: { [key: string]: ConfigSource } = {}

  for (const section of CONFIG_SECTIONS) {
    sources[section] = ConfigSource.DEFAULT
    for (const key of Object.keys(DEFAULT_CONFIG[section])) {
      sources[`${section}.${key}`] = ConfigSource.DEFAULT
    }
  }

  for (const { config, source } of sortedConfigs) {
    mergedConfig = mergeConfigs(mergedConfig, config)

    for (const section of CONFIG_SECTIONS) {
      const values = config[section]
      if (values === undefined) {
        continue
      }
      sources[section] = source
      for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) {
          sources[`${section}.${key}`] = source
        }
      }
    }
  }

  return {
    config: validateConfig(mergedConfig),
    sources,
  }
}

// ============================================================================
// Configuration Loading (Main API)
// ============================================================================

/**
 * Configuration loader with caching
 */
export class ConfigLoader {
  private cache: Map<string, HaulConfig> = new Map()

  /**
   * Load configuration from all sources
   *
   * Results without CLI overrides are cached per cwd and stopDir.
   */
  async load(options: LoadOptions = {}): Promise<HaulConfig> {
    const cwd = options.cwd ?? process.cwd()
    const stopDir = options.stopDir ?? defaultStopDir(cwd)
    const cacheKey = `${cwd}:${stopDir}`
    const cacheable = options.overrides === undefined && options.env === undefined

    const cached = this.cache.get(cacheKey)
    if (cacheable && !options.skipCache && cached) {
      return cached
    }

    const { config } = await this.loadWithSources(options)

    if (cacheable) {
      this.cache.set(cacheKey, config)
    }
    return config
  }

  /**
   * Load configuration with source tracking
   *
   * Useful for debugging to see where each setting comes from.
   */
  async loadWithSources(options: LoadOptions = {}): Promise<ConfigWithSource> {
    const cwd = options.cwd ?? process.cwd()
    const stopDir = options.stopDir ?? defaultStopDir(cwd)
    const env = options.env ?? process.env
    const logger = options.logger ?? silentLogger

    const configFiles = await discoverConfigFiles(
      cwd,
      stopDir,
      options.globalConfigPath ?? getGlobalConfigPath()
    )

    const parsedConfigs: Array<{ config: PartialHaulConfig; source: ConfigSource }> = []

    for (const configFile of configFiles) {
      if (!configFile.exists) {
        continue
      }

      try {
        parsedConfigs.push({
          config: await parseConfigFile(configFile),
          source: configFile.source,
        })
      } catch (error) {
        // Skip the file, keep the other sources
        logger.warn(`Failed to parse ${configFile.path}: ${getErrorMessage(error)}`)
      }
    }

    if (hasEnvConfig(env)) {
      parsedConfigs.push({
        config: getEnvConfig(env),
        source: ConfigSource.ENV_VARS,
      })
    }

    if (options.overrides !== undefined) {
      parsedConfigs.push({
        config: options.overrides,
        source: ConfigSource.CLI_FLAG,
      })
    }

    return mergeMultipleConfigs(parsedConfigs)
  }

  /**
   * Clear the configuration cache
   */
  clearCache(): void {
    this.cache.clear()
  }
}

/**
 * Default config loader instance
 */
export const configLoader = new ConfigLoader()

/**
 * Load configuration (convenience function)
 */
export async function loadConfig(options?: LoadOptions): Promise<HaulConfig> {
  return configLoader.load(options ?? {})
}
