import type { InputError } from "../core/errors.js";

export const LEVEL_IDS = [1, 2, 3, 4, 5] as const;
export type LevelId = (typeof LEVEL_IDS)[number];

export function isLevelId(x: unknown): x is LevelId {
  return typeof x === "number" && LEVEL_IDS.some(id => id === x);
}

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;

export type LevelParse = { ok: true; level: LevelId } | { ok: false; error: InputError };

/**
 * Parse a level coming from the caller (query param, JSON field, ...).
 * Integer-looking strings are accepted with surrounding whitespace and sign.
 */
export function parseLevel(raw: unknown): LevelParse {
  let n: number;
  if (typeof raw === "number") {
    n = raw;
  } else if (typeof raw === "string" && INTEGER_TEXT.test(raw)) {
    n = Number.parseInt(raw.trim(), 10);
  } else {
    n = NaN;
  }

  if (!Number.isInteger(n)) {
    return { ok: false, error: { code: "invalid_level_format", message: "Invalid or missing 'level' parameter." } };
  }
  if (!isLevelId(n)) {
    return { ok: false, error: { code: "unknown_level", message: "Invalid level provided." } };
  }
  return { ok: true, level: n };
}
