/**
 * Root application component for the terminal board.
 *
 * Lays out the board and the footer, and connects key bindings to the
 * engine, the driver and the UI store.
 *
 * Data flow:
 *   Driver tick -> Store (generation/population via useLife)
 *   Keys -> Store (pause, cursor, pen) and Engine (cell edits)
 *   Store.paused -> Driver
 */

import React, { useCallback, useMemo } from "react";
import { Box, useApp } from "ink";

import type { LifeConfig } from "@/lib/config/config.js";
import { brailleSize } from "@/lib/life/braille.js";
import type { LifeDriver } from "@/lib/life/driver.js";
import type { LifeEngine } from "@/lib/life/engine.js";
import { lifeStore, useLifeStore } from "@/lib/store/index.js";

import { useKeyBindings } from "./hooks/useKeyBindings.js";
import { useLife } from "./hooks/useLife.js";
import { BoardCanvas } from "./components/board/BoardCanvas.js";
import { Footer } from "./components/layout/Footer.js";
import { seedBoard } from "./lib/seed.js";

export interface AppProps {
  engine: LifeEngine;
  driver: LifeDriver;
  config: LifeConfig;
}

export function App({ engine, driver, config }: AppProps) {
  const app = useApp();
  const dispatch = useLifeStore((s) => s.dispatch);
  const paused = useLifeStore((s) => s.paused);
  const cursor = useLifeStore((s) => s.cursor);
  const pen = useLifeStore((s) => s.pen);
  const generation = useLifeStore((s) => s.generation);
  const population = useLifeStore((s) => s.population);

  const { frame } = useLife(driver);

  // -- Cursor movement (paints when the pen is down) ------------------------

  const moveCursor = useCallback(
    (dx: number, dy: number) => {
      dispatch({ type: "MOVE_CURSOR", dx, dy });
      const state = lifeStore.getState();
      if (state.pen !== null) {
        engine.setCellAt(state.cursor.x, state.cursor.y, state.pen);
      }
      driver.refresh();
    },
    [dispatch, engine, driver],
  );

  // -- Key bindings ---------------------------------------------------------

  const handlers = useMemo<Record<string, () => void>>(
    () => ({
      quit: () => {
        driver.stop();
        app.exit();
      },
      toggle_pause: () => dispatch({ type: "TOGGLE_PAUSE" }),
      step: () => {
        dispatch({ type: "SET_PAUSED", paused: true });
        driver.step();
      },
      clear: () => {
        engine.clear();
        driver.refresh();
      },
      reset: () => {
        seedBoard(engine, config);
        driver.refresh();
      },
      cursor_up: () => moveCursor(0, -1),
      cursor_down: () => moveCursor(0, 1),
      cursor_left: () => moveCursor(-1, 0),
      cursor_right: () => moveCursor(1, 0),
      toggle_cell: () => {
        const { cursor: at } = lifeStore.getState();
        engine.toggleCellAt(at.x, at.y);
        dispatch({ type: "SET_PAUSED", paused: true });
        driver.refresh();
      },
      toggle_pen: () => {
        const { cursor: at, pen: current } = lifeStore.getState();
        if (current !== null) {
          dispatch({ type: "PEN_UP" });
          return;
        }
        // Pen paints the opposite of the cell it starts on
        const value = !engine.isAliveAt(at.x, at.y);
        engine.setCellAt(at.x, at.y, value);
        dispatch({ type: "PEN_DOWN", value });
        driver.refresh();
      },
    }),
    [app, config, dispatch, driver, engine, moveCursor],
  );

  useKeyBindings("board", handlers);

  return (
    <Box flexDirection="column">
      <BoardCanvas engine={engine} cursor={cursor} penDown={pen !== null} frame={frame} />
      <Footer
        viewContext="board"
        width={brailleSize(engine).cols}
        paused={paused}
        penDown={pen !== null}
        generation={generation}
        population={population}
      />
    </Box>
  );
}
