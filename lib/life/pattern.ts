/**
 * Plain-text pattern codec.
 *
 * A pattern is a block of lines where one marker character (canonically
 * 'o') is a live cell and every other character is a dead one:
 *
 *   .o.
 *   ..o
 *   ooo
 *
 * Leading and trailing whitespace is trimmed from the whole block and from
 * each line before columns are counted.
 */

import type { LifeEngine } from './engine'
import type { BoardSize } from './types'
import { ALIVE_MARKER } from './types'

/** Split pattern text into rows of cell states. */
export function parsePattern(text: string, aliveChar: string = ALIVE_MARKER): boolean[][] {
  const block = text.trim()
  if (block === '') return []

  return block
    .split(/\r\n|\r|\n/)
    .map((line) => Array.from(line.trim(), (char) => char === aliveChar))
}

/** Bounding size of parsed rows; ragged rows count at their longest. */
export function patternSize(rows: boolean[][]): BoardSize {
  return {
    width: rows.reduce((max, row) => Math.max(max, row.length), 0),
    height: rows.length,
  }
}

/**
 * Render the bounding box of the engine's live cells as pattern text.
 *
 * Returns an empty string when nothing is alive. The output pastes back at
 * the box's top-left corner to the same cells.
 */
export function formatPattern(
  engine: LifeEngine,
  aliveChar: string = ALIVE_MARKER,
  deadChar: string = '.',
): string {
  let minX = Infinity
  let minY = Infinity
  let maxX = -Infinity
  let maxY = -Infinity
  for (const [x, y] of engine.liveCells()) {
    minX = Math.min(minX, x)
    minY = Math.min(minY, y)
    maxX = Math.max(maxX, x)
    maxY = Math.max(maxY, y)
  }
  if (minX === Infinity) return ''

  const lines: string[] = []
  for (let y = minY; y <= maxY; y++) {
    let line = ''
    for (let x = minX; x <= maxX; x++) {
      line += engine.isAliveAt(x, y) ? aliveChar : deadChar
    }
    lines.push(line)
  }
  return lines.join('\n')
}
