import { describe, it, expect } from 'vitest'
import { LifeEngine } from '@/lib/life/engine'
import { formatPattern, parsePattern, patternSize } from '@/lib/life/pattern'

describe('parsePattern', () => {
  it('should map the alive marker to true and everything else to false', () => {
    expect(parsePattern('.o.\no.x')).toEqual([
      [false, true, false],
      [true, false, false],
    ])
  })

  it('should return no rows for blank text', () => {
    expect(parsePattern('')).toEqual([])
    expect(parsePattern('  \n\t\n ')).toEqual([])
  })

  it('should trim the block and every line', () => {
    expect(parsePattern('\n\n   oo  \n  .o\n\n')).toEqual([
      [true, true],
      [false, true],
    ])
  })

  it('should accept CRLF and CR line endings', () => {
    expect(parsePattern('o.\r\n.o\ro.')).toEqual([
      [true, false],
      [false, true],
      [true, false],
    ])
  })

  it('should keep ragged rows at their own length', () => {
    const rows = parsePattern('o\nooo\n.o')
    expect(rows.map((row) => row.length)).toEqual([1, 3, 2])
  })

  it('should honor a custom alive marker', () => {
    expect(parsePattern('#o#', '#')).toEqual([[true, false, true]])
  })
})

describe('patternSize', () => {
  it('should use the longest row as the width', () => {
    expect(patternSize(parsePattern('o\nooo\n.o'))).toEqual({ width: 3, height: 3 })
  })

  it('should be zero for no rows', () => {
    expect(patternSize([])).toEqual({ width: 0, height: 0 })
  })
})

describe('formatPattern', () => {
  it('should render the bounding box of live cells', () => {
    const engine = new LifeEngine(10, 10)
    engine.pasteExternalPattern('.o.\n..o\nooo', 4, 2)
    expect(formatPattern(engine)).toBe('.o.\n..o\nooo')
  })

  it('should return an empty string for an empty board', () => {
    expect(formatPattern(new LifeEngine(5, 5))).toBe('')
  })

  it('should use the given markers', () => {
    const engine = new LifeEngine(5, 5)
    engine.setCellAt(1, 1, true)
    engine.setCellAt(3, 1, true)
    expect(formatPattern(engine, '#', ' ')).toBe('# #')
  })

  it('should paste back onto the same cells', () => {
    const source = new LifeEngine(12, 12)
    source.pasteExternalPattern('.oo\noo.\n.o.', 3, 5)
    const copy = new LifeEngine(12, 12)
    copy.pasteExternalPattern(formatPattern(source), 3, 5)
    expect([...copy.liveCells()]).toEqual([...source.liveCells()])
  })
})
