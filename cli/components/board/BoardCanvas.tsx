/**
 * Braille-character board renderer.
 *
 * Each terminal character shows a 2x4 block of cells. The character holding
 * the cursor is drawn on a highlighted background (red-tinted while the pen
 * is down).
 */

import React, { useMemo } from 'react'
import { Box, Text } from 'ink'

import { renderBraille } from '@/lib/life/braille.js'
import type { LifeEngine } from '@/lib/life/engine.js'
import type { CellPoint } from '@/lib/life/types.js'
import { cellColor, cursorColor } from '@/lib/theme/ink-colors.js'

export interface BoardCanvasProps {
  engine: LifeEngine
  cursor: CellPoint
  penDown: boolean
  /** Changes whenever the board should be redrawn. */
  frame: number
}

export function BoardCanvas({
  engine,
  cursor,
  penDown,
  frame,
}: BoardCanvasProps): React.ReactElement {
  const rows = useMemo(() => {
    const alive = cellColor()
    const highlight = cursorColor(penDown)

    return renderBraille(engine, cursor).map((line, cy) => {
      // One string per row keeps Ink's node count proportional to height
      const text = line.map((cell) => (cell.cursor ? highlight(cell.char) : alive(cell.char))).join('')
      return <Text key={cy}>{text}</Text>
    })
    // frame is the redraw signal; the engine mutates in place
  }, [engine, cursor.x, cursor.y, penDown, frame])

  return <Box flexDirection="column">{rows}</Box>
}
