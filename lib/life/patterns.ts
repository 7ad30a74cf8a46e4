import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { parse } from "yaml";

import { UnknownPatternError } from "./types";

export interface PatternDefinition {
  name: string;
  description: string;
  /** Pattern text, 'o' for live cells. */
  rows: string;
}

export type PatternLibrary = Map<string, PatternDefinition>;

export const DEFAULT_PATTERNS_PATH = fileURLToPath(new URL("./patterns.yaml", import.meta.url));

let cachedLibrary: PatternLibrary | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toDefinition(name: string, entry: unknown): PatternDefinition | null {
  if (!isRecord(entry) || typeof entry.rows !== "string" || entry.rows.trim() === "") {
    return null;
  }
  return {
    name,
    description: typeof entry.description === "string" ? entry.description : "",
    rows: entry.rows,
  };
}

/**
 * Read a pattern library from YAML.
 *
 * Entries without a non-empty `rows` string are skipped with a warning.
 * A missing or unparseable file is an error.
 */
export function loadPatternLibrary(filePath: string = DEFAULT_PATTERNS_PATH): PatternLibrary {
  let doc: unknown;
  try {
    doc = parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[patterns] Failed to load patterns from ${filePath}:`, message);
    throw new Error(`Failed to load pattern library at ${filePath}: ${message}`);
  }

  const library: PatternLibrary = new Map();
  const entries = isRecord(doc) && isRecord(doc.patterns) ? doc.patterns : {};

  for (const [name, entry] of Object.entries(entries)) {
    const definition = toDefinition(name, entry);
    if (definition === null) {
      console.warn(`[patterns] Skipping malformed pattern "${name}" in ${filePath}`);
      continue;
    }
    library.set(name, definition);
  }

  console.debug(`[patterns] Loaded ${library.size} patterns from ${filePath}`);
  return library;
}

/** The bundled library, read once. */
export function getPatternLibrary(): PatternLibrary {
  if (cachedLibrary === null) {
    cachedLibrary = loadPatternLibrary();
  }
  return cachedLibrary;
}

export function getPattern(name: string, library: PatternLibrary = getPatternLibrary()): PatternDefinition {
  const definition = library.get(name);
  if (!definition) {
    throw new UnknownPatternError(name, [...library.keys()]);
  }
  return definition;
}
