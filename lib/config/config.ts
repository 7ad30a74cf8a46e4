/**
 * Board configuration loaded from YAML.
 *
 * Location: $LIFEBOARD_CONFIG_PATH, else ~/.lifeboard/lifeboard.yml.
 *
 *   width: 140
 *   height: 120
 *   fps: 10
 *   pattern: glider-gun   # null for an empty board
 *   origin: { x: 8, y: 1 }
 *   paused: false
 */

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { parse } from 'yaml'

import type { CellPoint } from '@/lib/life/types'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export interface LifeConfig {
  width: number
  height: number
  fps: number
  /** Pattern library entry pasted at startup, or null for an empty board. */
  pattern: string | null
  origin: CellPoint
  paused: boolean
}

export const DEFAULT_CONFIG: LifeConfig = {
  width: 140,
  height: 120,
  fps: 10,
  pattern: 'glider-gun',
  origin: { x: 8, y: 1 },
  paused: false,
}

type RawConfig = Partial<Record<string, unknown>>

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

function expandHome(p: string): string {
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2))
  return p
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LIFEBOARD_CONFIG_PATH?.trim()
  if (override) return expandHome(override)
  return path.join(os.homedir(), '.lifeboard', 'lifeboard.yml')
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Load configuration from `filePath`.
 *
 * Returns defaults if the file is missing, unreadable or not a mapping.
 * Invalid values fall back to their defaults one by one. Never throws.
 */
export function loadLifeConfig(filePath: string = resolveConfigPath()): LifeConfig {
  if (!fs.existsSync(filePath)) {
    console.debug(`[config] No config file at ${filePath}, using defaults`)
    return cloneDefaults()
  }

  let data: unknown
  try {
    data = parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    console.warn(`[config] Failed to load config from ${filePath}:`, err)
    return cloneDefaults()
  }

  if (data === null || data === undefined) {
    return cloneDefaults()
  }
  if (!isRecord(data)) {
    console.warn(`[config] Ignoring ${filePath}: expected a mapping at the top level`)
    return cloneDefaults()
  }

  return parseConfig(data)
}

/** Build a config from an already-parsed document. */
export function parseConfig(data: RawConfig): LifeConfig {
  const pattern = extractPattern(data)
  return {
    width: extractPositiveInt(data, 'width') ?? DEFAULT_CONFIG.width,
    height: extractPositiveInt(data, 'height') ?? DEFAULT_CONFIG.height,
    fps: extractPositiveInt(data, 'fps') ?? DEFAULT_CONFIG.fps,
    pattern: pattern === undefined ? DEFAULT_CONFIG.pattern : pattern,
    origin: extractOrigin(data) ?? { ...DEFAULT_CONFIG.origin },
    paused: typeof data.paused === 'boolean' ? data.paused : DEFAULT_CONFIG.paused,
  }
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function cloneDefaults(): LifeConfig {
  return { ...DEFAULT_CONFIG, origin: { ...DEFAULT_CONFIG.origin } }
}

// ---------------------------------------------------------------------------
// Field extraction
// ---------------------------------------------------------------------------

function extractPositiveInt(data: RawConfig, key: string): number | null {
  const value = data[key]
  if (value === undefined) return null
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    console.warn(`[config] Ignoring ${key}: expected a positive integer, got ${JSON.stringify(value)}`)
    return null
  }
  return value
}

/** `pattern: null` means an empty board; undefined means use the default. */
function extractPattern(data: RawConfig): string | null | undefined {
  if (!('pattern' in data)) return undefined
  const value = data.pattern
  if (value === null) return null
  if (typeof value === 'string' && value.trim() !== '') return value.trim()
  console.warn(`[config] Ignoring pattern: expected a name or null, got ${JSON.stringify(value)}`)
  return undefined
}

function extractOrigin(data: RawConfig): CellPoint | null {
  const value = data.origin
  if (value === undefined) return null
  if (typeof value === 'object' && value !== null && 'x' in value && 'y' in value) {
    const { x, y } = value
    if (typeof x === 'number' && typeof y === 'number' && Number.isInteger(x) && Number.isInteger(y)) {
      return { x, y }
    }
  }
  console.warn(`[config] Ignoring origin: expected { x, y } integers`)
  return null
}
