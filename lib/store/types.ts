/**
 * UI state types and Intent discriminated union.
 *
 * Only presentation state lives here. Cell state belongs to the LifeEngine
 * owned by the front end; generation and population are mirrored after each
 * tick for the status line.
 */

import type { BoardSize, CellPoint } from "@/lib/life/types";

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface LifeUiState {
  board: BoardSize;
  paused: boolean;
  cursor: CellPoint;
  /**
   * Value painted onto every cell the cursor enters, or null when the pen
   * is lifted.
   */
  pen: boolean | null;
  generation: number;
  population: number;
}

// ---------------------------------------------------------------------------
// Intents
// ---------------------------------------------------------------------------

export type Intent =
  | { type: "INIT_BOARD"; board: BoardSize; paused: boolean }
  | { type: "TOGGLE_PAUSE" }
  | { type: "SET_PAUSED"; paused: boolean }
  | { type: "MOVE_CURSOR"; dx: number; dy: number }
  | { type: "PEN_DOWN"; value: boolean }
  | { type: "PEN_UP" }
  | { type: "RECORD_TICK"; generation: number; population: number };

export interface LifeUiStore extends LifeUiState {
  dispatch: (intent: Intent) => void;
}
