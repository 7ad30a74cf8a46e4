/**
 * Incremental Game of Life engine on a bounded board.
 *
 * The board is stored with a one-cell dead border on every side so that the
 * 8 neighbors of any interior cell are valid storage indices. Neighbor
 * counts are maintained on every state change, and only cells whose state or
 * count changed since the previous generation are re-examined when the
 * board advances. Cost per generation follows the size of the active region,
 * not the board area.
 *
 * No React, no DOM, no timers -- pure TypeScript. Rendering and tick loops
 * live in the driver and the terminal front end, which hold an engine.
 */

import { parsePattern } from './pattern'
import type { BoardSize } from './types'
import { ALIVE_MARKER, InvalidDimensionError } from './types'

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Snapshot entry taken at the start of a generation. */
type PendingCell = [index: number, wasAlive: boolean, neighbors: number]

function neighborOffsets(stride: number): number[] {
  const offsets: number[] = []
  for (const dx of [-1, 0, 1]) {
    for (const dy of [-1, 0, 1]) {
      if (dx === 0 && dy === 0) continue
      offsets.push(dy * stride + dx)
    }
  }
  return offsets
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class LifeEngine {
  readonly width: number
  readonly height: number

  private readonly _stride: number
  private readonly _live: boolean[]
  private readonly _inBounds: boolean[]
  private readonly _neighbors: Uint8Array
  private readonly _offsets: readonly number[]
  private _needsUpdate: Set<number> = new Set()

  private _generation: number = 0
  private _population: number = 0

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new InvalidDimensionError(width, height)
    }

    this.width = width
    this.height = height
    this._stride = width + 2

    const cells = (width + 2) * (height + 2)
    this._live = new Array<boolean>(cells).fill(false)
    this._inBounds = new Array<boolean>(cells).fill(true)
    this._neighbors = new Uint8Array(cells)

    // Top and bottom rows of the padded grid
    for (let i = 0; i < this._stride; i++) {
      this._inBounds[i] = false
      this._inBounds[cells - 1 - i] = false
    }
    // Left and right columns
    for (let row = 1; row <= height; row++) {
      this._inBounds[row * this._stride] = false
      this._inBounds[row * this._stride + width + 1] = false
    }

    this._offsets = neighborOffsets(this._stride)
  }

  // -----------------------------------------------------------------------
  // Addressing
  // -----------------------------------------------------------------------

  /**
   * Storage index of the logical cell (x, y).
   *
   * Not validated: coordinates outside the board map onto the border ring,
   * onto a cell of an adjacent row, or past the end of storage.
   */
  cellIndex(x: number, y: number): number {
    return this._stride * (y + 1) + (x + 1)
  }

  /** Whether (x, y) is a logical coordinate of this board. */
  contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height
  }

  /** True for interior storage slots, false for the border and outside storage. */
  isInBounds(index: number): boolean {
    return this._inBounds[index] === true
  }

  get size(): BoardSize {
    return { width: this.width, height: this.height }
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  isAlive(index: number): boolean {
    return this._live[index] === true
  }

  /** Bounds-checked query by logical coordinate. */
  isAliveAt(x: number, y: number): boolean {
    return this.contains(x, y) && this.isAlive(this.cellIndex(x, y))
  }

  neighborCount(index: number): number {
    return this._neighbors[index] ?? 0
  }

  /** Live cells as [x, y] pairs in row-major order. */
  *liveCells(): IterableIterator<[number, number]> {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this._live[this.cellIndex(x, y)]) yield [x, y]
      }
    }
  }

  /** Storage indices due for re-examination on the next generation. */
  get pendingUpdates(): ReadonlySet<number> {
    return this._needsUpdate
  }

  /** Generations advanced since construction or the last clear(). */
  get generation(): number {
    return this._generation
  }

  get population(): number {
    return this._population
  }

  // -----------------------------------------------------------------------
  // Mutation
  // -----------------------------------------------------------------------

  /**
   * Set storage cell `index` alive or dead.
   *
   * No-op when the value is unchanged or the index is not an interior cell.
   * Otherwise the cell and its in-bounds neighbors join the dirty set and
   * the neighbors' counts move by one.
   */
  setCell(index: number, value: boolean): void {
    if (this._live[index] === value || !this._inBounds[index]) return

    this._live[index] = value
    this._population += value ? 1 : -1
    this._needsUpdate.add(index)

    const adjust = value ? 1 : -1
    for (const offset of this._offsets) {
      const n = index + offset
      if (this._inBounds[n]) {
        this._neighbors[n] += adjust
        this._needsUpdate.add(n)
      }
    }
  }

  /** Bounds-checked mutation by logical coordinate. */
  setCellAt(x: number, y: number, value: boolean): void {
    if (!this.contains(x, y)) return
    this.setCell(this.cellIndex(x, y), value)
  }

  /** Flip the cell at (x, y). Returns the new state, false outside the board. */
  toggleCellAt(x: number, y: number): boolean {
    if (!this.contains(x, y)) return false
    const index = this.cellIndex(x, y)
    const next = !this._live[index]
    this.setCell(index, next)
    return next
  }

  /**
   * Advance the board by `steps` generations (B3/S23).
   *
   * Each generation snapshots the dirty set with the state and count of
   * every member, then empties it before any rule is applied. setCell()
   * calls made while applying the rules refill it for the next generation
   * and never change the counts this generation reads.
   */
  advance(steps: number = 1): void {
    for (let step = 0; step < steps; step++) {
      const pending: PendingCell[] = Array.from(this._needsUpdate, (index): PendingCell => [
        index,
        this._live[index],
        this._neighbors[index],
      ])
      this._needsUpdate = new Set()

      for (const [index, wasAlive, neighbors] of pending) {
        if (wasAlive && (neighbors < 2 || neighbors > 3)) {
          this.setCell(index, false)
        } else if (!wasAlive && neighbors === 3) {
          this.setCell(index, true)
        }
      }

      this._generation++
    }
  }

  /**
   * Paste pattern text with its top-left corner at (originX, originY).
   *
   * Every character sets its cell: `aliveChar` alive, anything else dead.
   * The block and each line are trimmed first. Cells falling outside the
   * board are dropped; the logical range is checked before indexing since a
   * column two or more past an edge would otherwise land in the next row.
   */
  pasteExternalPattern(
    text: string,
    originX: number,
    originY: number,
    aliveChar: string = ALIVE_MARKER,
  ): void {
    const rows = parsePattern(text, aliveChar)
    rows.forEach((row, dy) => {
      row.forEach((alive, dx) => {
        this.setCellAt(originX + dx, originY + dy, alive)
      })
    })
  }

  /** Kill every cell, drop pending work, and reset the generation counter. */
  clear(): void {
    for (let index = 0; index < this._live.length; index++) {
      if (this._live[index]) this.setCell(index, false)
    }
    this._needsUpdate = new Set()
    this._generation = 0
  }
}
