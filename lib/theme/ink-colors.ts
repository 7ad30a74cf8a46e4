/**
 * Chalk-based color mappers for terminal (Ink) rendering.
 *
 * All functions are curried: `cellColor()('⣿')` returns a colored string.
 *
 * Requires chalk@5+ (ESM). No side effects on import.
 */

import chalk from 'chalk'

import { type ThemeMode, THEME_TOKENS, detectThemeMode } from './tokens.js'

/** Lazy-resolved mode so callers don't need to pass it everywhere. */
let _resolvedMode: ThemeMode | null = null

function mode(): ThemeMode {
  if (_resolvedMode === null) {
    _resolvedMode = detectThemeMode()
  }
  return _resolvedMode
}

/** Set mode explicitly (useful for testing or forced overrides). */
export function setThemeMode(m: ThemeMode): void {
  _resolvedMode = m
}

// ---------------------------------------------------------------------------
// Board
// ---------------------------------------------------------------------------

/** Live cell dots. */
export function cellColor(): (text: string) => string {
  const hex = THEME_TOKENS[mode()].cell.alive
  return (text: string) => chalk.hex(hex)(text)
}

/** Cell dots on the cursor background; red-tinted while the pen is down. */
export function cursorColor(penDown: boolean): (text: string) => string {
  const tokens = THEME_TOKENS[mode()]
  const bg = penDown ? tokens.cell.pen : tokens.cell.cursor
  return (text: string) => chalk.bgHex(bg).hex(tokens.cell.alive)(text)
}

// ---------------------------------------------------------------------------
// Status line
// ---------------------------------------------------------------------------

export function runStateColor(paused: boolean): (text: string) => string {
  const status = THEME_TOKENS[mode()].status
  const hex = paused ? status.paused : status.running
  return (text: string) => chalk.hex(hex)(text)
}

/** Status bar foreground. */
export function statusBarFg(): (text: string) => string {
  const hex = THEME_TOKENS[mode()].statusBarFg
  return (text: string) => chalk.hex(hex)(text)
}

export function themeText(level: 'primary' | 'muted'): (text: string) => string {
  const hex = THEME_TOKENS[mode()].text[level]
  return (text: string) => chalk.hex(hex)(text)
}
