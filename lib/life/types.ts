/**
 * Shared types and errors for the Life engine.
 *
 * No side effects on import.
 */

// ---------------------------------------------------------------------------
// Coordinates
// ---------------------------------------------------------------------------

/** Logical cell coordinate, `0 <= x < width`, `0 <= y < height`. */
export interface CellPoint {
  x: number
  y: number
}

/** Board dimensions in logical cells. */
export interface BoardSize {
  width: number
  height: number
}

/** Default character marking a live cell in pattern text. */
export const ALIVE_MARKER = 'o'

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class InvalidDimensionError extends Error {
  readonly width: number
  readonly height: number

  constructor(width: number, height: number) {
    super(`Board dimensions must be positive integers, got ${width}x${height}`)
    this.name = 'InvalidDimension'
    this.width = width
    this.height = height
  }
}

export class UnknownPatternError extends Error {
  readonly pattern: string
  readonly available: string[]

  constructor(pattern: string, available: string[]) {
    super(`Unknown pattern "${pattern}" (available: ${available.join(', ') || 'none'})`)
    this.name = 'UnknownPatternError'
    this.pattern = pattern
    this.available = available
  }
}
