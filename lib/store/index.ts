/**
 * Zustand store for UI state.
 *
 * The reducer already uses Immer's produce() for immutable updates,
 * so the store itself does not need the immer middleware.
 *
 * Provides both:
 * - `useLifeStore` hook for Ink components
 * - `lifeStore` vanilla store for driver listeners and non-React code
 */

import { create } from "zustand";

import { reduce } from "./reducer";
import type { Intent, LifeUiState, LifeUiStore } from "./types";

export function createInitialState(): LifeUiState {
  return {
    board: { width: 1, height: 1 },
    paused: false,
    cursor: { x: 0, y: 0 },
    pen: null,
    generation: 0,
    population: 0,
  };
}

export const useLifeStore = create<LifeUiStore>()((set, get) => ({
  ...createInitialState(),

  dispatch: (intent: Intent) => {
    const { dispatch: _, ...currentState } = get();
    const nextState = reduce(currentState, intent);
    set(nextState);
  },
}));

/**
 * Vanilla (non-React) store reference.
 *
 * Examples:
 *   lifeStore.getState().dispatch({ type: "SET_PAUSED", paused: true })
 */
export const lifeStore = useLifeStore;

export type { Intent, LifeUiState, LifeUiStore } from "./types";
