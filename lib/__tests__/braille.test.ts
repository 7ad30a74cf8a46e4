import { describe, it, expect } from 'vitest'
import { BRAILLE_BLANK, brailleSize, renderBraille } from '@/lib/life/braille'
import { LifeEngine } from '@/lib/life/engine'

function chars(engine: LifeEngine): string[] {
  return renderBraille(engine).map((line) => line.map((cell) => cell.char).join(''))
}

describe('brailleSize', () => {
  it('should cover two columns and four rows per character', () => {
    expect(brailleSize(new LifeEngine(4, 4))).toEqual({ cols: 2, rows: 1 })
    expect(brailleSize(new LifeEngine(140, 120))).toEqual({ cols: 70, rows: 30 })
  })

  it('should round partial blocks up', () => {
    expect(brailleSize(new LifeEngine(5, 9))).toEqual({ cols: 3, rows: 3 })
  })
})

describe('renderBraille', () => {
  it('should render an empty board as blank characters', () => {
    expect(chars(new LifeEngine(4, 4))).toEqual([BRAILLE_BLANK + BRAILLE_BLANK])
  })

  it('should light dot 1 for the top-left cell', () => {
    const engine = new LifeEngine(4, 4)
    engine.setCellAt(0, 0, true)
    expect(chars(engine)).toEqual(['⠁' + BRAILLE_BLANK])
  })

  it('should light dot 8 for the bottom-right cell of a block', () => {
    const engine = new LifeEngine(4, 4)
    engine.setCellAt(3, 3, true)
    expect(chars(engine)).toEqual([BRAILLE_BLANK + '⢀'])
  })

  it('should fill every dot for a full block', () => {
    const engine = new LifeEngine(2, 4)
    engine.pasteExternalPattern('oo\noo\noo\noo', 0, 0)
    expect(chars(engine)).toEqual(['⣿'])
  })

  it('should combine dots from both columns', () => {
    const engine = new LifeEngine(2, 4)
    // (0,1) -> dot 2, (1,2) -> dot 6
    engine.setCellAt(0, 1, true)
    engine.setCellAt(1, 2, true)
    expect(chars(engine)).toEqual(['⠢'])
  })

  it('should mark the character holding the cursor', () => {
    const engine = new LifeEngine(8, 8)
    const frame = renderBraille(engine, { x: 5, y: 6 })
    const marked = frame.flatMap((line, row) =>
      line.flatMap((cell, col) => (cell.cursor ? [`${col},${row}`] : [])),
    )
    expect(marked).toEqual(['2,1'])
  })

  it('should mark nothing without a cursor', () => {
    const frame = renderBraille(new LifeEngine(8, 8), null)
    expect(frame.flat().some((cell) => cell.cursor)).toBe(false)
  })
})
