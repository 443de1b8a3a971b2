import { Command, Flags } from '@oclif/core'
import { SOURCE_PRIORITY, configLoader } from '../../config/loader.js'
import { CONFIG_SECTIONS, ConfigSource, type ConfigWithSource } from '../../config/schema.js'
import { cwdFlag, jsonFlag } from '../../utils/common-flags.js'
import { ErrorHelper } from '../../utils/errors.js'

/**
 * Show merged configuration
 *
 * Displays the final configuration after merging all sources.
 * Useful for debugging configuration issues and understanding
 * which settings are active.
 */
export default class ConfigShow extends Command {
  static description = 'Display merged configuration from all sources'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --sources',
    '<%= config.bin %> <%= command.id %> --json',
  ]

  static flags = {
    sources: Flags.boolean({
      char: 's',
      description: 'Show where each setting comes from',
      default: false,
    }),
    cwd: cwdFlag,
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ConfigShow)

    let configWithSources: ConfigWithSource
    try {
      configWithSources = await configLoader.loadWithSources({
        cwd: flags.cwd ?? process.cwd(),
      })
    } catch (error) {
      ErrorHelper.fromError(this, error, 'Failed to load configuration', flags.json)
    }

    if (flags.json) {
      this.log(
        JSON.stringify(flags.sources ? configWithSources : configWithSources.config, null, 2)
      )
      return
    }

    await this.displayHumanReadable(configWithSources, flags.sources)
  }

  /**
   * Display configuration in human-readable format
   */
  private async displayHumanReadable(
    configWithSources: ConfigWithSource,
    showSources: boolean
  ): Promise<void> {
    const chalk = (await import('chalk')).default
    const { config, sources } = configWithSources

    // Sources that contributed at least one setting, besides the defaults
    const uniqueSources = new Set(
      Object.values(sources).filter((source) => source !== ConfigSource.DEFAULT)
    )
    const sourceCount = uniqueSources.size + 1

    this.log(
      chalk.bold(
        `\nConfiguration (merged from ${sourceCount} source${sourceCount === 1 ? '' : 's'}):\n`
      )
    )

    for (const section of CONFIG_SECTIONS) {
      this.log(chalk.cyan.bold(`[${section}]`))
      for (const [key, value] of Object.entries(config[section])) {
        const source = sources[`${section}.${key}`] ?? ConfigSource.DEFAULT
        this.log(
          `  ${key} = ${chalk.yellow(JSON.stringify(value))}${
            showSources ? chalk.gray(` (${this.formatSource(source)})`) : ''
          }`
        )
      }
      this.log('')
    }

    if (showSources) {
      this.log(chalk.bold('Configuration sources (priority order):'))
      const sourcesList = Array.from(uniqueSources).sort(
        (a, b) => SOURCE_PRIORITY[b] - SOURCE_PRIORITY[a]
      )
      sourcesList.forEach((source, index) => {
        this.log(chalk.gray(`  ${index + 1}. ${this.formatSource(source)}`))
      })
      this.log(chalk.gray(`  ${sourcesList.length + 1}. defaults`))
      this.log('')
    }
  }

  /**
   * Format source name for display
   */
  private formatSource(source: ConfigSource): string {
    const sourceMap: Record<ConfigSource, string> = {
      [ConfigSource.HAUL_TOML]: '.haul.toml',
      [ConfigSource.PACKAGE_JSON]: 'package.json',
      [ConfigSource.GLOBAL_CONFIG]: '~/.config/haul/config.toml',
      [ConfigSource.DEFAULT]: 'default',
      [ConfigSource.CLI_FLAG]: 'CLI flag',
      [ConfigSource.ENV_VARS]: 'environment variable',
    }
    return sourceMap[source]
  }
}
