import { Command, Flags } from '@oclif/core'
import { parse as parseToml, stringify as stringifyToml, type JsonMap } from '@iarna/toml'
import fs from 'fs-extra'
import * as path from 'path'
import { getGlobalConfigPath, mergeConfigs } from '../../config/loader.js'
import {
  CONFIG_SECTIONS,
  DEFAULT_CONFIG,
  validateConfig,
  validatePartialConfig,
  type HaulConfig,
  type PartialHaulConfig,
} from '../../config/schema.js'
import { cwdFlag, jsonFlag } from '../../utils/common-flags.js'
import { ErrorHelper } from '../../utils/errors.js'

/**
 * Represents a setting that was added during merge
 */
interface AddedSetting {
  path: string
  value: unknown
}

/**
 * Result of merging configurations
 */
interface MergeResult {
  merged: HaulConfig
  added: AddedSetting[]
}

const SECTION_COMMENTS: Record<(typeof CONFIG_SECTIONS)[number], string[]> = {
  transfer: [
    '# Transfer',
    '# chunkSize - bytes per read/write step; cancellation is checked between steps',
    '# sampleIntervalMs - minimum interval between progress samples within a file',
    '# verify - compare SHA-256 checksums after each file',
    '# checkFreeSpace - stop the job when the destination cannot fit the next file',
  ],
  estimator: [
    '# Rate and ETA estimation',
    '# windowMs - width of the sliding sample window',
    '# smoothingFactor - weight of the newest rate in the moving average, in (0, 1]',
    '# idleThresholdMs - without progress for this long the ETA shows as unknown',
  ],
  notifications: [
    '# Notifications',
    '# maxVisible - notifications shown at once; the rest wait their turn',
    '# durationMs - how long each notification stays visible',
    '# perFileErrors - raise a warning for every file that fails',
  ],
  progress: ['# Progress', '# tickIntervalMs - refresh interval for elapsed time and ETA'],
  enumeration: ['# Enumeration', '# followSymlinks - copy the targets of symbolic links'],
}

/**
 * Initialize haul configuration
 *
 * Creates a .haul.toml file with default configuration.
 * If file exists, merges missing defaults into it.
 */
export default class ConfigInit extends Command {
  static description = 'Generate a .haul.toml configuration file with defaults'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --force',
    '<%= config.bin %> <%= command.id %> --global',
    '<%= config.bin %> <%= command.id %> --no-merge',
  ]

  static flags = {
    force: Flags.boolean({
      char: 'f',
      description: 'Overwrite existing .haul.toml (ignores --merge)',
      default: false,
    }),
    merge: Flags.boolean({
      char: 'm',
      description: 'Merge missing defaults into existing config (default when file exists)',
      default: true,
      allowNo: true,
    }),
    global: Flags.boolean({
      char: 'g',
      description: 'Create global config in ~/.config/haul/config.toml',
      default: false,
    }),
    cwd: cwdFlag,
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ConfigInit)

    const configPath = flags.global
      ? getGlobalConfigPath()
      : path.join(flags.cwd ?? process.cwd(), '.haul.toml')

    if (!(await fs.pathExists(configPath))) {
      await this.writeNewConfig(configPath, flags)
      return
    }

    if (flags.force) {
      await this.writeNewConfig(configPath, flags)
    } else if (flags.merge) {
      await this.mergeExistingConfig(configPath, flags)
    } else {
      ErrorHelper.validation(
        this,
        `Configuration file already exists: ${configPath}\nUse --force to overwrite or --merge to add missing defaults`,
        flags.json
      )
    }
  }

  /**
   * Write a new config file with all defaults
   */
  private async writeNewConfig(
    configPath: string,
    flags: { json: boolean; global: boolean; force: boolean }
  ): Promise<void> {
    const action = flags.force ? 'overwritten' : 'created'

    try {
      await fs.ensureDir(path.dirname(configPath))
      await fs.writeFile(configPath, generateTomlContent(), { mode: 0o644 })
    } catch (error) {
      ErrorHelper.operation(this, error, 'Failed to create configuration file', flags.json)
    }

    if (flags.json) {
      this.log(
        JSON.stringify(
          {
            status: 'success',
            action,
            path: configPath,
            type: flags.global ? 'global' : 'local',
          },
          null,
          2
        )
      )
      return
    }

    this.log(`✓ Configuration file ${action}: ${configPath}`)
    this.log('')
    this.log('Next steps:')
    this.log('  1. Edit the file to customize your settings')
    this.log('  2. Run `haul config show` to verify configuration')
  }

  /**
   * Merge missing defaults into an existing config file
   */
  private async mergeExistingConfig(
    configPath: string,
    flags: { json: boolean; global: boolean }
  ): Promise<void> {
    let existing: PartialHaulConfig
    try {
      existing = validatePartialConfig(parseToml(await fs.readFile(configPath, 'utf-8')))
    } catch (error) {
      ErrorHelper.operation(this, error, 'Failed to parse existing configuration file', flags.json)
    }

    const { merged, added } = mergeWithDefaults(existing)
    const type = flags.global ? 'global' : 'local'

    if (added.length === 0) {
      if (flags.json) {
        this.log(
          JSON.stringify(
            {
              status: 'success',
              action: 'unchanged',
              path: configPath,
              type,
              message: 'Configuration is already up to date',
              added: [],
            },
            null,
            2
          )
        )
      } else {
        this.log(`✓ Configuration is already up to date: ${configPath}`)
        this.log('  No missing settings to add.')
      }
      return
    }

    try {
      await fs.writeFile(configPath, generateTomlContent(merged), { mode: 0o644 })
    } catch (error) {
      ErrorHelper.operation(this, error, 'Failed to merge configuration file', flags.json)
    }

    if (flags.json) {
      this.log(
        JSON.stringify(
          {
            status: 'success',
            action: 'merged',
            path: configPath,
            type,
            added,
            addedCount: added.length,
          },
          null,
          2
        )
      )
      return
    }

    this.log(`✓ Configuration updated: ${configPath}`)
    this.log('')
    this.log(`Added ${added.length} missing setting(s):`)
    for (const setting of added) {
      this.log(`  • ${setting.path} = ${JSON.stringify(setting.value)}`)
    }
  }
}

/**
 * Merge an existing partial config with defaults, tracking what was added
 */
export function mergeWithDefaults(existing: PartialHaulConfig): MergeResult {
  const added: AddedSetting[] = []

  for (const section of CONFIG_SECTIONS) {
    const values = existing[section]
    if (values === undefined) {
      added.push({ path: section, value: DEFAULT_CONFIG[section] })
      continue
    }

    const present = new Set(
      Object.entries(values)
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key)
    )
    for (const [key, value] of Object.entries(DEFAULT_CONFIG[section])) {
      if (!present.has(key)) {
        added.push({ path: `${section}.${key}`, value })
      }
    }
  }

  return { merged: validateConfig(mergeConfigs(DEFAULT_CONFIG, existing)), added }
}

/**
 * Generate TOML content with comments
 */
export function generateTomlContent(config: HaulConfig = DEFAULT_CONFIG): string {
  const header = [
    '# Haul Configuration',
    '#',
    '# Settings here override ~/.config/haul/config.toml and are overridden by',
    '# HAUL_* environment variables and command-line flags.',
    '',
    '',
  ].join('\n')

  const sections = CONFIG_SECTIONS.map((section) => {
    const table: JsonMap = {}
    for (const [key, value] of Object.entries(config[section])) {
      table[key] = value
    }
    return [...SECTION_COMMENTS[section], stringifyToml({ [section]: table })].join('\n')
  })

  return header + sections.join('\n')
}
