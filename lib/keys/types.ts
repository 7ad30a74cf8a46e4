/**
 * Keyboard binding types for the board UI.
 */

/**
 * Where a key binding is active.
 *
 * `global` bindings work at all times; `board` bindings edit cells and only
 * apply while the board has focus.
 */
export type ViewContext = 'global' | 'board'

/**
 * A single keyboard binding definition
 *
 * Bindings are pure data - they describe WHAT keys do WHERE, not HOW.
 * The action handlers are connected in the app component.
 */
export interface KeyBinding {
  /** The key character or name ('q', 'upArrow', ' ', etc.) */
  key: string

  /** Requires Ctrl modifier */
  ctrl?: boolean

  /** Requires Shift modifier */
  shift?: boolean

  /** Requires Meta/Alt modifier */
  meta?: boolean

  /** Human-readable description for the footer */
  description: string

  /** Action identifier (e.g. 'quit', 'toggle_pause', 'cursor_up') */
  action: string

  context: ViewContext

  /** Don't show in the footer */
  hidden?: boolean
}

/**
 * Ink's useInput key input structure
 * Used for mapping between Ink and our binding system
 */
export interface InkKeyInput {
  upArrow: boolean
  downArrow: boolean
  leftArrow: boolean
  rightArrow: boolean
  return: boolean
  escape: boolean
  tab: boolean
  backspace: boolean
  delete: boolean
  pageUp: boolean
  pageDown: boolean
}

export interface KeyModifiers {
  ctrl?: boolean
  shift?: boolean
  meta?: boolean
}
