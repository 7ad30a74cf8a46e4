/**
 * Project a Life board onto Unicode braille characters.
 *
 * Each terminal character covers a 2-column x 4-row block of cells, so a
 * 140x120 board fits in 70x30 characters. Pure function; colouring is left
 * to the renderer.
 */

import type { LifeEngine } from './engine'
import type { CellPoint } from './types'

/**
 * Braille dot layout per terminal character cell (2 columns x 4 rows):
 *
 *   [dot1][dot4]     (0,0) (1,0)
 *   [dot2][dot5]     (0,1) (1,1)
 *   [dot3][dot6]     (0,2) (1,2)
 *   [dot7][dot8]     (0,3) (1,3)
 *
 * Unicode: 0x2800 + bit pattern
 */
const DOT_BITS: number[][] = [
  // [x][y] -> bit value
  [0x01, 0x02, 0x04, 0x40], // x=0: dots 1,2,3,7
  [0x08, 0x10, 0x20, 0x80], // x=1: dots 4,5,6,8
]

export const BRAILLE_BLANK = String.fromCharCode(0x2800)

export interface BrailleCell {
  char: string
  /** True when the cursor cell lies inside this character's block. */
  cursor: boolean
}

export function brailleSize(engine: LifeEngine): { cols: number; rows: number } {
  return {
    cols: Math.ceil(engine.width / 2),
    rows: Math.ceil(engine.height / 4),
  }
}

export function renderBraille(engine: LifeEngine, cursor?: CellPoint | null): BrailleCell[][] {
  const { cols, rows } = brailleSize(engine)
  const cursorCol = cursor ? Math.floor(cursor.x / 2) : -1
  const cursorRow = cursor ? Math.floor(cursor.y / 4) : -1

  const result: BrailleCell[][] = []
  for (let cy = 0; cy < rows; cy++) {
    const line: BrailleCell[] = []
    for (let cx = 0; cx < cols; cx++) {
      let code = 0x2800
      for (let dx = 0; dx < 2; dx++) {
        for (let dy = 0; dy < 4; dy++) {
          // isAliveAt() reads false past the right and bottom edges
          if (engine.isAliveAt(cx * 2 + dx, cy * 4 + dy)) {
            code |= DOT_BITS[dx][dy]
          }
        }
      }
      line.push({
        char: String.fromCharCode(code),
        cursor: cx === cursorCol && cy === cursorRow,
      })
    }
    result.push(line)
  }
  return result
}
