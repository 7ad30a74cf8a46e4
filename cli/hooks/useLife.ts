/**
 * React hook binding a LifeDriver to the Ink tree.
 *
 * Starts the driver's timer on mount and stops it on unmount. Every tick is
 * mirrored into the UI store (generation, population) and bumps a frame
 * counter so the board re-renders. The pause flag in the store is pushed
 * down to the driver.
 */

import { useEffect, useState } from 'react'

import type { LifeDriver } from '@/lib/life/driver.js'
import { useLifeStore } from '@/lib/store/index.js'

export interface UseLifeResult {
  /** Increments on every driver notification. */
  frame: number
}

export function useLife(driver: LifeDriver): UseLifeResult {
  const [frame, setFrame] = useState(0)
  const dispatch = useLifeStore((s) => s.dispatch)
  const paused = useLifeStore((s) => s.paused)

  useEffect(() => {
    driver.paused = paused
  }, [driver, paused])

  useEffect(() => {
    const { engine } = driver
    dispatch({ type: 'RECORD_TICK', generation: engine.generation, population: engine.population })

    const unsubscribe = driver.subscribe((eng) => {
      dispatch({ type: 'RECORD_TICK', generation: eng.generation, population: eng.population })
      setFrame((f) => f + 1)
    })
    driver.start()

    return () => {
      unsubscribe()
      driver.stop()
    }
  }, [driver, dispatch])

  return { frame }
}
