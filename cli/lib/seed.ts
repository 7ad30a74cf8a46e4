/**
 * Startup pattern placement for the terminal app.
 */

import type { LifeConfig } from '@/lib/config/config.js'
import type { LifeEngine } from '@/lib/life/engine.js'
import { getPattern, type PatternLibrary } from '@/lib/life/patterns.js'
import { UnknownPatternError } from '@/lib/life/types.js'

/**
 * Clear the board and paste the configured pattern at the configured origin.
 *
 * An unknown pattern name leaves the board empty and logs a warning.
 * Returns whether a pattern was pasted.
 */
export function seedBoard(
  engine: LifeEngine,
  config: Pick<LifeConfig, 'pattern' | 'origin'>,
  library?: PatternLibrary,
): boolean {
  engine.clear()
  if (config.pattern === null) return false

  try {
    const definition = library ? getPattern(config.pattern, library) : getPattern(config.pattern)
    engine.pasteExternalPattern(definition.rows, config.origin.x, config.origin.y)
    console.debug(
      `[life] Pasted "${definition.name}" at (${config.origin.x}, ${config.origin.y}), population ${engine.population}`,
    )
    return true
  } catch (err) {
    if (err instanceof UnknownPatternError) {
      console.warn(`[life] ${err.message}; starting with an empty board`)
      return false
    }
    throw err
  }
}
