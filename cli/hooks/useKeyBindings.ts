/**
 * Keyboard handler for the board UI.
 *
 * Bridges Ink's `useInput` hook with the declarative binding map from
 * `@/lib/keys/bindings.ts`. Callers pass a context and a handler map keyed
 * by action name; this hook matches the physical keypress to the action.
 */

import { useInput } from "ink";

import { findBinding } from "@/lib/keys/bindings.js";
import type { InkKeyInput, KeyModifiers, ViewContext } from "@/lib/keys/types.js";

/**
 * Derive the canonical key name that our binding map uses from Ink's input
 * callback arguments.
 *
 * Ink delivers special keys via boolean flags on the `key` object and
 * printable characters via the `input` string.
 */
export function resolveKeyName(input: string, key: InkKeyInput): string {
  if (key.upArrow) return "upArrow";
  if (key.downArrow) return "downArrow";
  if (key.leftArrow) return "leftArrow";
  if (key.rightArrow) return "rightArrow";
  if (key.return) return "return";
  if (key.escape) return "escape";
  if (key.tab) return "tab";
  if (key.backspace) return "backspace";
  if (key.delete) return "delete";
  if (key.pageUp) return "pageUp";
  if (key.pageDown) return "pageDown";

  // Printable character (or space)
  return input;
}

/**
 * Register keyboard handlers for the active context.
 *
 * @param handlers - Map of action name to callback. Actions without a
 *                   handler are ignored.
 */
export function useKeyBindings(
  context: ViewContext,
  handlers: Record<string, () => void>,
): void {
  useInput((input, key) => {
    const keyName = resolveKeyName(input, key);
    if (!keyName) return;

    // Ink reports no shift flag for printable keys; uppercase implies it.
    const modifiers: KeyModifiers = {
      ctrl: false,
      shift: input.length === 1 && input >= "A" && input <= "Z",
      meta: false,
    };

    const binding = findBinding(keyName, modifiers, context);
    if (!binding) return;

    handlers[binding.action]?.();
  });
}
