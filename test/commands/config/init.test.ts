import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest'
import { Config } from '@oclif/core'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { parse as parseToml } from '@iarna/toml'
import ConfigInit, { generateTomlContent, mergeWithDefaults } from '../../../src/commands/config/init.js'
import { DEFAULT_CONFIG, validatePartialConfig } from '../../../src/config/schema.js'

const projectRoot = fileURLToPath(new URL('../../..', import.meta.url))

describe('config init', () => {
  let oclifConfig: Config
  let tempDir: string
  let configPath: string
  let logSpy: ReturnType<typeof vi.spyOn>

  function createCommand(argv: string[]): ConfigInit {
    const command = new ConfigInit([...argv, '--cwd', tempDir], oclifConfig)
    logSpy = vi.spyOn(command, 'log').mockImplementation(() => {})
    return command
  }

  function jsonOutput(): unknown {
    const output = logSpy.mock.calls.at(-1)?.[0]
    return JSON.parse(typeof output === 'string' ? output : '')
  }

  async function readConfig(): Promise<unknown> {
    return validatePartialConfig(parseToml(await fs.readFile(configPath, 'utf-8')))
  }

  beforeAll(async () => {
    oclifConfig = await Config.load(projectRoot)
  })

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'haul-init-'))
    configPath = path.join(tempDir, '.haul.toml')
  })

  afterEach(async () => {
    await fs.remove(tempDir)
    vi.restoreAllMocks()
  })

  describe('new file', () => {
    it('creates .haul.toml with every default', async () => {
      await createCommand(['--json']).run()

      expect(jsonOutput()).toEqual({
        status: 'success',
        action: 'created',
        path: configPath,
        type: 'local',
      })
      expect(await readConfig()).toEqual(DEFAULT_CONFIG)
    })

    it('prints next steps in human mode', async () => {
      await createCommand([]).run()

      expect(logSpy).toHaveBeenCalledWith(`✓ Configuration file created: ${configPath}`)
      expect(logSpy).toHaveBeenCalledWith('  2. Run `haul config show` to verify configuration')
    })
  })

  describe('existing file', () => {
    it('overwrites with --force', async () => {
      await fs.writeFile(configPath, '[transfer]\nchunkSize = 16\n')

      await createCommand(['--force', '--json']).run()

      expect(jsonOutput()).toMatchObject({ status: 'success', action: 'overwritten' })
      expect(await readConfig()).toEqual(DEFAULT_CONFIG)
    })

    it('merges missing defaults and keeps existing values', async () => {
      await fs.writeFile(configPath, '[transfer]\nverify = true\n')

      await createCommand(['--json']).run()

      expect(jsonOutput()).toMatchObject({ status: 'success', action: 'merged', addedCount: 8 })
      expect(await readConfig()).toEqual({
        ...DEFAULT_CONFIG,
        transfer: { ...DEFAULT_CONFIG.transfer, verify: true },
      })
    })

    it('lists added settings in human mode', async () => {
      await fs.writeFile(configPath, '[transfer]\nverify = true\n')

      await createCommand([]).run()

      expect(logSpy).toHaveBeenCalledWith('Added 8 missing setting(s):')
      expect(logSpy).toHaveBeenCalledWith(`  • transfer.chunkSize = ${DEFAULT_CONFIG.transfer.chunkSize}`)
    })

    it('leaves a complete file unchanged', async () => {
      await fs.writeFile(configPath, generateTomlContent())
      const before = await fs.readFile(configPath, 'utf-8')

      await createCommand(['--json']).run()

      expect(jsonOutput()).toMatchObject({ status: 'success', action: 'unchanged', added: [] })
      expect(await fs.readFile(configPath, 'utf-8')).toBe(before)
    })

    it('refuses to touch the file with --no-merge', async () => {
      await fs.writeFile(configPath, '[transfer]\nverify = true\n')
      const command = createCommand(['--no-merge', '--json'])

      await expect(command.run()).rejects.toMatchObject({ oclif: { exit: 1 } })

      expect(jsonOutput()).toEqual({
        status: 'error',
        error: `Configuration file already exists: ${configPath}\nUse --force to overwrite or --merge to add missing defaults`,
      })
      expect(await fs.readFile(configPath, 'utf-8')).toBe('[transfer]\nverify = true\n')
    })

    it('reports an existing file that fails to parse', async () => {
      await fs.writeFile(configPath, '[notifications]\nmaxVisible = 0\n')
      const command = createCommand(['--json'])

      await expect(command.run()).rejects.toMatchObject({ oclif: { exit: 1 } })

      expect(jsonOutput()).toMatchObject({ status: 'error' })
    })
  })
})

describe('mergeWithDefaults', () => {
  it('adds missing keys and whole sections', () => {
    const { merged, added } = mergeWithDefaults({ transfer: { verify: true } })

    expect(added).toHaveLength(8)
    expect(added).toContainEqual({ path: 'transfer.chunkSize', value: DEFAULT_CONFIG.transfer.chunkSize })
    expect(added).toContainEqual({ path: 'estimator', value: DEFAULT_CONFIG.estimator })
    expect(added.some((setting) => setting.path === 'transfer.verify')).toBe(false)
    expect(merged.transfer.verify).toBe(true)
  })

  it('adds nothing to a complete config', () => {
    expect(mergeWithDefaults(DEFAULT_CONFIG).added).toEqual([])
  })
})

describe('generateTomlContent', () => {
  it('writes TOML that parses back to the given config', () => {
    const config = { ...DEFAULT_CONFIG, progress: { tickIntervalMs: 250 } }

    expect(validatePartialConfig(parseToml(generateTomlContent(config)))).toEqual(config)
  })

  it('documents each section', () => {
    const content = generateTomlContent()

    expect(content.startsWith('# Haul Configuration\n')).toBe(true)
    expect(content).toContain('# followSymlinks - copy the targets of symbolic links')
  })
})
