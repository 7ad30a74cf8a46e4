/**
 * Keyboard binding map for the board UI.
 *
 * Global keys follow the classic desktop controls: q or Esc quits, Space or
 * p pauses. The board context replaces mouse drawing with a cursor: Enter
 * toggles the cell under it, d lowers or lifts a pen that paints while the
 * cursor moves.
 */

import type { KeyBinding, KeyModifiers, ViewContext } from './types'

export const BINDINGS: KeyBinding[] = [
  // ========================================================================
  // GLOBAL BINDINGS
  // ========================================================================
  {
    key: 'q',
    description: 'Quit',
    action: 'quit',
    context: 'global',
  },
  {
    key: 'escape',
    description: 'Quit',
    action: 'quit',
    context: 'global',
    hidden: true, // Same as q
  },
  {
    key: ' ',
    description: 'Pause',
    action: 'toggle_pause',
    context: 'global',
  },
  {
    key: 'p',
    description: 'Pause',
    action: 'toggle_pause',
    context: 'global',
    hidden: true, // Same as Space
  },
  {
    key: 'n',
    description: 'Step',
    action: 'step',
    context: 'global',
  },
  {
    key: 'c',
    description: 'Clear',
    action: 'clear',
    context: 'global',
  },
  {
    key: 'r',
    description: 'Reset',
    action: 'reset',
    context: 'global',
  },

  // ========================================================================
  // BOARD BINDINGS
  // ========================================================================
  {
    key: 'upArrow',
    description: 'Move',
    action: 'cursor_up',
    context: 'board',
  },
  {
    key: 'k',
    description: 'Move up',
    action: 'cursor_up',
    context: 'board',
    hidden: true, // Vi-style, same as upArrow
  },
  {
    key: 'downArrow',
    description: 'Move',
    action: 'cursor_down',
    context: 'board',
    hidden: true, // Footer shows one arrow hint
  },
  {
    key: 'j',
    description: 'Move down',
    action: 'cursor_down',
    context: 'board',
    hidden: true,
  },
  {
    key: 'leftArrow',
    description: 'Move',
    action: 'cursor_left',
    context: 'board',
    hidden: true,
  },
  {
    key: 'h',
    description: 'Move left',
    action: 'cursor_left',
    context: 'board',
    hidden: true,
  },
  {
    key: 'rightArrow',
    description: 'Move',
    action: 'cursor_right',
    context: 'board',
    hidden: true,
  },
  {
    key: 'l',
    description: 'Move right',
    action: 'cursor_right',
    context: 'board',
    hidden: true,
  },
  {
    key: 'return',
    description: 'Toggle cell',
    action: 'toggle_cell',
    context: 'board',
  },
  {
    key: 'd',
    description: 'Pen',
    action: 'toggle_pen',
    context: 'board',
  },
]

/**
 * Get all bindings for a specific context (including global bindings)
 */
export function getBindingsForContext(context: ViewContext): KeyBinding[] {
  return BINDINGS.filter(
    (binding) => binding.context === context || binding.context === 'global'
  )
}

/**
 * Find a binding that matches the key and modifiers in a specific context
 */
export function findBinding(
  key: string,
  modifiers: KeyModifiers,
  context: ViewContext
): KeyBinding | undefined {
  const contextBindings = getBindingsForContext(context)

  return contextBindings.find((binding) => {
    if (binding.key !== key) return false

    // Check modifiers (undefined/false are equivalent)
    const ctrlMatch = (binding.ctrl ?? false) === (modifiers.ctrl ?? false)
    const shiftMatch = (binding.shift ?? false) === (modifiers.shift ?? false)
    const metaMatch = (binding.meta ?? false) === (modifiers.meta ?? false)

    return ctrlMatch && shiftMatch && metaMatch
  })
}

const KEY_LABELS: Record<string, string> = {
  upArrow: '↑↓←→',
  return: 'Enter',
  escape: 'Esc',
  ' ': 'Space',
}

/**
 * Get footer hints for a specific context (non-hidden bindings only)
 */
export function getFooterHints(
  context: ViewContext
): Array<{ key: string; description: string }> {
  return getBindingsForContext(context)
    .filter((binding) => !binding.hidden)
    .map((binding) => {
      let displayKey = KEY_LABELS[binding.key] ?? binding.key
      if (binding.ctrl) displayKey = `Ctrl+${displayKey}`
      if (binding.shift) displayKey = `Shift+${displayKey}`
      if (binding.meta) displayKey = `Meta+${displayKey}`
      return { key: displayKey, description: binding.description }
    })
}
