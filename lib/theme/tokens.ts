/**
 * Design tokens for the terminal board.
 *
 * Semantic hex colors for dark and light terminals. No side effects on import.
 */

export type ThemeMode = 'dark' | 'light'

export interface ThemeTokens {
  readonly cell: {
    /** Live cell dots. */
    readonly alive: string
    /** Background of the character holding the cursor. */
    readonly cursor: string
    /** Cursor background while the pen is down. */
    readonly pen: string
  }
  readonly status: {
    readonly running: string
    readonly paused: string
  }
  readonly text: {
    readonly primary: string
    readonly muted: string
  }
  readonly statusBarFg: string
}

export const THEME_TOKENS: Record<ThemeMode, ThemeTokens> = {
  dark: {
    cell: {
      alive: '#e8e8e8',
      cursor: '#3a5f8f',
      pen: '#8f3a3a',
    },
    status: {
      running: '#5faf5f',
      paused: '#d7af5f',
    },
    text: {
      primary: '#e0e0e0',
      muted: '#7a7a7a',
    },
    statusBarFg: '#a8a8a8',
  },
  light: {
    cell: {
      alive: '#202020',
      cursor: '#b5cdee',
      pen: '#eeb5b5',
    },
    status: {
      running: '#2f7d32',
      paused: '#9a6700',
    },
    text: {
      primary: '#202020',
      muted: '#8a8a8a',
    },
    statusBarFg: '#5a5a5a',
  },
}

/**
 * Resolve the theme from APPEARANCE_MODE ('dark' or 'light').
 * Defaults to dark.
 */
export function detectThemeMode(env: NodeJS.ProcessEnv = process.env): ThemeMode {
  const value = env.APPEARANCE_MODE?.trim().toLowerCase()
  if (value === 'light') return 'light'
  return 'dark'
}
