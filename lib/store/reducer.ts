/**
 * Pure reducer for UI intents.
 *
 * Uses Immer's produce() so handlers can write mutating syntax
 * while producing immutable snapshots.
 */

import { produce } from "immer";

import type { Intent, LifeUiState } from "./types";

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function reduce(state: LifeUiState, intent: Intent): LifeUiState {
  return produce(state, (draft) => {
    switch (intent.type) {
      case "INIT_BOARD": {
        draft.board = { ...intent.board };
        draft.paused = intent.paused;
        draft.cursor = {
          x: Math.floor(intent.board.width / 2),
          y: Math.floor(intent.board.height / 2),
        };
        draft.pen = null;
        draft.generation = 0;
        draft.population = 0;
        return;
      }

      case "TOGGLE_PAUSE": {
        draft.paused = !draft.paused;
        return;
      }

      case "SET_PAUSED": {
        draft.paused = intent.paused;
        return;
      }

      // Cursor stays on the board; moves past an edge stop at the edge.
      case "MOVE_CURSOR": {
        const { width, height } = draft.board;
        draft.cursor.x = clamp(draft.cursor.x + intent.dx, 0, width - 1);
        draft.cursor.y = clamp(draft.cursor.y + intent.dy, 0, height - 1);
        return;
      }

      // Drawing pauses the simulation, as a click on the board did.
      case "PEN_DOWN": {
        draft.pen = intent.value;
        draft.paused = true;
        return;
      }

      case "PEN_UP": {
        draft.pen = null;
        return;
      }

      case "RECORD_TICK": {
        draft.generation = intent.generation;
        draft.population = intent.population;
        return;
      }
    }
  });
}
