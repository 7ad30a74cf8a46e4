import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { DEFAULT_CONFIG, loadLifeConfig, parseConfig, resolveConfigPath } from '@/lib/config/config'

// ---------------------------------------------------------------------------
// Temp directory per test
// ---------------------------------------------------------------------------

let dir: string

function writeConfig(content: string): string {
  const file = path.join(dir, 'lifeboard.yml')
  fs.writeFileSync(file, content)
  return file
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lifeboard-config-'))
})

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// resolveConfigPath
// ---------------------------------------------------------------------------

describe('resolveConfigPath', () => {
  it('should default to the home directory', () => {
    expect(resolveConfigPath({})).toBe(path.join(os.homedir(), '.lifeboard', 'lifeboard.yml'))
  })

  it('should honor the environment override', () => {
    expect(resolveConfigPath({ LIFEBOARD_CONFIG_PATH: '/etc/life.yml' })).toBe('/etc/life.yml')
  })

  it('should expand a leading tilde', () => {
    expect(resolveConfigPath({ LIFEBOARD_CONFIG_PATH: '~/boards/a.yml' })).toBe(
      path.join(os.homedir(), 'boards', 'a.yml'),
    )
  })

  it('should ignore a blank override', () => {
    expect(resolveConfigPath({ LIFEBOARD_CONFIG_PATH: '  ' })).toBe(
      path.join(os.homedir(), '.lifeboard', 'lifeboard.yml'),
    )
  })
})

// ---------------------------------------------------------------------------
// loadLifeConfig
// ---------------------------------------------------------------------------

describe('loadLifeConfig', () => {
  it('should return defaults when the file is missing', () => {
    expect(loadLifeConfig(path.join(dir, 'absent.yml'))).toEqual(DEFAULT_CONFIG)
  })

  it('should return a copy that does not alias the defaults', () => {
    const config = loadLifeConfig(path.join(dir, 'absent.yml'))
    config.origin.x = 99
    expect(DEFAULT_CONFIG.origin.x).toBe(8)
  })

  it('should read every field', () => {
    const file = writeConfig(
      ['width: 60', 'height: 40', 'fps: 25', 'pattern: glider', 'origin: { x: 3, y: 4 }', 'paused: true', ''].join('\n'),
    )
    expect(loadLifeConfig(file)).toEqual({
      width: 60,
      height: 40,
      fps: 25,
      pattern: 'glider',
      origin: { x: 3, y: 4 },
      paused: true,
    })
  })

  it('should keep defaults for fields that are absent', () => {
    const file = writeConfig('fps: 30\n')
    expect(loadLifeConfig(file)).toEqual({ ...DEFAULT_CONFIG, fps: 30 })
  })

  it('should return defaults for an empty file', () => {
    expect(loadLifeConfig(writeConfig(''))).toEqual(DEFAULT_CONFIG)
  })

  it('should warn and return defaults for a top-level list', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const file = writeConfig('- 1\n- 2\n')
    expect(loadLifeConfig(file)).toEqual(DEFAULT_CONFIG)
    expect(warn).toHaveBeenCalledWith(`[config] Ignoring ${file}: expected a mapping at the top level`)
  })

  it('should warn and return defaults for invalid YAML', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const file = writeConfig('width: [1, 2\n')
    expect(loadLifeConfig(file)).toEqual(DEFAULT_CONFIG)
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

// ---------------------------------------------------------------------------
// parseConfig
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('should treat a null pattern as an empty board', () => {
    expect(parseConfig({ pattern: null }).pattern).toBeNull()
  })

  it('should trim the pattern name', () => {
    expect(parseConfig({ pattern: '  lwss ' }).pattern).toBe('lwss')
  })

  it('should fall back for a blank or non-string pattern', () => {
    expect(parseConfig({ pattern: '' }).pattern).toBe('glider-gun')
    expect(parseConfig({ pattern: 5 }).pattern).toBe('glider-gun')
  })

  it('should reject non-positive and fractional sizes one by one', () => {
    const config = parseConfig({ width: 0, height: 2.5, fps: -1 })
    expect(config.width).toBe(140)
    expect(config.height).toBe(120)
    expect(config.fps).toBe(10)
  })

  it('should reject a non-numeric size with a warning', () => {
    const config = parseConfig({ width: 'wide' })
    expect(config.width).toBe(140)
    expect(console.warn).toHaveBeenCalledWith('[config] Ignoring width: expected a positive integer, got "wide"')
  })

  it('should reject an incomplete origin', () => {
    expect(parseConfig({ origin: { x: 1 } }).origin).toEqual({ x: 8, y: 1 })
    expect(parseConfig({ origin: { x: 1, y: 0.5 } }).origin).toEqual({ x: 8, y: 1 })
  })

  it('should accept a negative origin', () => {
    expect(parseConfig({ origin: { x: -2, y: -3 } }).origin).toEqual({ x: -2, y: -3 })
  })

  it('should ignore a non-boolean paused', () => {
    expect(parseConfig({ paused: 'yes' }).paused).toBe(false)
  })
})
