/**
 * Tick loop that drives a LifeEngine.
 *
 * Each tick advances the engine by exactly one generation unless the driver
 * is paused, then notifies subscribers so a renderer can redraw. Stepping
 * one generation at a time gives hosts a place to stop between generations;
 * the engine itself has none inside advance().
 *
 * The driver ticks via setInterval (injectable for testing). tick() can also
 * be called manually for external timing control.
 *
 * No React, no DOM -- pure TypeScript.
 */

import type { LifeEngine } from './engine'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Called after every tick or step with the driven engine. */
export type TickListener = (engine: LifeEngine) => void

/** Interval timer functions; `globalThis` satisfies this. */
export interface IntervalTimers {
  setInterval(callback: () => void, ms: number): unknown
  clearInterval(handle: unknown): void
}

export interface LifeDriverOptions {
  /** Generations per second while running. Default 10. */
  fps?: number
  /** Start paused. Default false. */
  paused?: boolean
  /** Injectable timer for testing. Defaults to the global timers. */
  timers?: IntervalTimers
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

const DEFAULT_FPS = 10

export class LifeDriver {
  readonly engine: LifeEngine

  private _fps: number
  private _paused: boolean
  private _timerId: unknown = null
  private _listeners: Set<TickListener> = new Set()

  private _timers: IntervalTimers

  constructor(engine: LifeEngine, opts?: LifeDriverOptions) {
    this.engine = engine
    this._fps = Math.max(1, opts?.fps ?? DEFAULT_FPS)
    this._paused = opts?.paused ?? false
    this._timers = opts?.timers ?? globalThis
  }

  // -----------------------------------------------------------------------
  // Stepping
  // -----------------------------------------------------------------------

  /**
   * One timer tick: advance a generation unless paused, then notify.
   *
   * Listeners are notified while paused as well, so edits made between
   * ticks still reach the renderer.
   */
  tick(): void {
    if (!this._paused) {
      this.engine.advance(1)
    }
    this._notify()
  }

  /** Advance `count` generations regardless of the pause state. */
  step(count: number = 1): void {
    for (let i = 0; i < count; i++) {
      this.engine.advance(1)
    }
    this._notify()
  }

  /** Notify listeners without advancing, e.g. after an edit. */
  refresh(): void {
    this._notify()
  }

  // -----------------------------------------------------------------------
  // Subscription
  // -----------------------------------------------------------------------

  /** Register a listener. Returns a function that removes it. */
  subscribe(listener: TickListener): () => void {
    this._listeners.add(listener)
    return () => {
      this._listeners.delete(listener)
    }
  }

  // -----------------------------------------------------------------------
  // Pause
  // -----------------------------------------------------------------------

  get paused(): boolean {
    return this._paused
  }

  set paused(value: boolean) {
    this._paused = value
  }

  /** Flip the pause state. Returns the new state. */
  togglePause(): boolean {
    this._paused = !this._paused
    return this._paused
  }

  // -----------------------------------------------------------------------
  // Timer lifecycle
  // -----------------------------------------------------------------------

  /** Set the tick rate (ticks per second). Minimum 1. */
  setFPS(fps: number): void {
    this._fps = Math.max(1, fps)
    // Restart timer if running
    if (this._timerId !== null) {
      this.stop()
      this.start()
    }
  }

  get fps(): number {
    return this._fps
  }

  /** Whether the timer is running (independent of pause). */
  get isRunning(): boolean {
    return this._timerId !== null
  }

  start(): void {
    if (this._timerId !== null) return
    const interval = Math.round(1000 / this._fps)
    this._timerId = this._timers.setInterval(() => this.tick(), interval)
  }

  /** Stop the timer. Engine state is untouched. */
  stop(): void {
    if (this._timerId !== null) {
      this._timers.clearInterval(this._timerId)
      this._timerId = null
    }
  }

  /** Stop the timer and drop every listener. */
  destroy(): void {
    this.stop()
    this._listeners.clear()
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private _notify(): void {
    for (const listener of this._listeners) {
      listener(this.engine)
    }
  }
}
