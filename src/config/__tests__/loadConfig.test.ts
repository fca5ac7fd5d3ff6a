import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import {
  loadConfig,
  resolveConfig,
  applyEnvOverrides,
  deepMergeConfig,
  CONFIG_FILENAME,
} from '../loadConfig.js'
import { configSchema } from '../schema.js'

describe('deepMergeConfig', () => {
  it('should merge nested mappings and let overrides win', () => {
    const merged = deepMergeConfig(
      { apiKey: 'a', polling: { pollTimeoutSeconds: 10, connectionBackoffMs: 1 } },
      { polling: { pollTimeoutSeconds: 20 }, baseUrl: null }
    )
    expect(merged).toEqual({ apiKey: 'a', polling: { pollTimeoutSeconds: 20, connectionBackoffMs: 1 } })
  })
})

describe('applyEnvOverrides', () => {
  it('should override key, URL and log level', () => {
    const config = applyEnvOverrides(configSchema.parse({ apiKey: 'from-file' }), {
      CHATPOLL_API_KEY: 'from-env',
      CHATPOLL_BASE_URL: 'http://env.local/api/bot',
      CHATPOLL_LOG_LEVEL: 'debug',
    })
    expect(config.apiKey).toBe('from-env')
    expect(config.baseUrl).toBe('http://env.local/api/bot')
    expect(config.log.level).toBe('debug')
  })

  it('should ignore an unknown log level', () => {
    const config = applyEnvOverrides(configSchema.parse({}), { CHATPOLL_LOG_LEVEL: 'loud' })
    expect(config.log.level).toBe('info')
  })
})

describe('resolveConfig', () => {
  it('should require an API key', () => {
    expect(() => resolveConfig({}, {})).toThrow('Invalid config: apiKey is required')
  })

  it('should report the failing path', () => {
    expect(() => resolveConfig({ apiKey: 'k', polling: { pollTimeoutSeconds: -1 } }, {})).toThrow(
      /polling\.pollTimeoutSeconds/
    )
  })

  it('should accept a key from the environment alone', () => {
    expect(resolveConfig({}, { CHATPOLL_API_KEY: 'test-secret' }).apiKey).toBe('test-secret')
  })
})

describe('loadConfig', () => {
  let root: string
  let home: string
  let project: string

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'chatpoll-config-'))
    home = join(root, 'home')
    project = join(root, 'project')
    mkdirSync(home)
    mkdirSync(project)
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('should layer the project file over the global file', async () => {
    writeFileSync(join(home, CONFIG_FILENAME), 'apiKey: global-key\npolling:\n  pollTimeoutSeconds: 10\n')
    writeFileSync(join(project, CONFIG_FILENAME), 'polling:\n  connectionBackoffMs: 100\n')

    const config = await loadConfig({ cwd: project, home, env: {} })

    expect(config.apiKey).toBe('global-key')
    expect(config.polling.pollTimeoutSeconds).toBe(10)
    expect(config.polling.connectionBackoffMs).toBe(100)
  })

  it('should let the environment win over files', async () => {
    writeFileSync(join(project, CONFIG_FILENAME), 'apiKey: file-key\n')
    const config = await loadConfig({ cwd: project, home, env: { CHATPOLL_API_KEY: 'env-key' } })
    expect(config.apiKey).toBe('env-key')
  })

  it('should treat an empty file as defaults', async () => {
    writeFileSync(join(project, CONFIG_FILENAME), '# nothing here\n')
    const config = await loadConfig({ cwd: project, home, env: { CHATPOLL_API_KEY: 'k' } })
    expect(config.baseUrl).toBe('http://localhost:8080/api/bot')
  })

  it('should load an explicit path only', async () => {
    writeFileSync(join(project, CONFIG_FILENAME), 'apiKey: project-key\n')
    const explicit = join(root, 'custom.yaml')
    writeFileSync(explicit, 'apiKey: custom-key\nbaseUrl: http://custom.local/api/bot\n')

    const config = await loadConfig({ path: explicit, cwd: project, home, env: {} })

    expect(config.apiKey).toBe('custom-key')
    expect(config.baseUrl).toBe('http://custom.local/api/bot')
  })

  it('should fail on a missing explicit path', async () => {
    await expect(loadConfig({ path: join(root, 'nope.yaml'), env: {} })).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
    })
  })

  it('should fail on a file that is not a mapping', async () => {
    writeFileSync(join(project, CONFIG_FILENAME), '- just\n- a list\n')
    await expect(loadConfig({ cwd: project, home, env: {} })).rejects.toThrow(/must contain a mapping/)
  })
})
