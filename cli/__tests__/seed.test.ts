import { afterEach, describe, it, expect, vi } from 'vitest'
import { LifeEngine } from '@/lib/life/engine.js'
import type { PatternLibrary } from '@/lib/life/patterns.js'
import { seedBoard } from '../lib/seed.js'

const library: PatternLibrary = new Map([
  ['blinker', { name: 'blinker', description: 'Period-2 oscillator', rows: 'ooo' }],
])

function live(engine: LifeEngine): string[] {
  return [...engine.liveCells()].map(([x, y]) => `${x},${y}`)
}

describe('seedBoard', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should paste the named pattern at the origin', () => {
    const engine = new LifeEngine(10, 10)
    const pasted = seedBoard(engine, { pattern: 'blinker', origin: { x: 2, y: 7 } }, library)
    expect(pasted).toBe(true)
    expect(live(engine)).toEqual(['2,7', '3,7', '4,7'])
  })

  it('should replace whatever was on the board', () => {
    const engine = new LifeEngine(10, 10)
    engine.setCellAt(0, 0, true)
    engine.advance(2)
    seedBoard(engine, { pattern: 'blinker', origin: { x: 0, y: 5 } }, library)
    expect(live(engine)).toEqual(['0,5', '1,5', '2,5'])
    expect(engine.generation).toBe(0)
  })

  it('should leave the board empty for a null pattern', () => {
    const engine = new LifeEngine(10, 10)
    engine.setCellAt(4, 4, true)
    expect(seedBoard(engine, { pattern: null, origin: { x: 0, y: 0 } }, library)).toBe(false)
    expect(engine.population).toBe(0)
  })

  it('should warn and start empty for an unknown pattern', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const engine = new LifeEngine(10, 10)

    const pasted = seedBoard(engine, { pattern: 'nope', origin: { x: 0, y: 0 } }, library)

    expect(pasted).toBe(false)
    expect(engine.population).toBe(0)
    expect(warn).toHaveBeenCalledWith(
      '[life] Unknown pattern "nope" (available: blinker); starting with an empty board',
    )
  })

  it('should use the bundled library by default', () => {
    const engine = new LifeEngine(40, 20)
    expect(seedBoard(engine, { pattern: 'glider-gun', origin: { x: 1, y: 1 } })).toBe(true)
    expect(engine.population).toBe(36)
  })
})
