export { LifeEngine } from './engine'
export { LifeDriver } from './driver'
export type { IntervalTimers, LifeDriverOptions, TickListener } from './driver'
export { parsePattern, patternSize, formatPattern } from './pattern'
export { loadPatternLibrary, getPatternLibrary, getPattern, DEFAULT_PATTERNS_PATH } from './patterns'
export type { PatternDefinition, PatternLibrary } from './patterns'
export { renderBraille, brailleSize, BRAILLE_BLANK } from './braille'
export type { BrailleCell } from './braille'
export { ALIVE_MARKER, InvalidDimensionError, UnknownPatternError } from './types'
export type { BoardSize, CellPoint } from './types'
