import type { ChallengeTable } from "../challenge/table.js";
import { parseLevel, type LevelId } from "../challenge/levels.js";
import type { InputError } from "../core/errors.js";

export interface FlagCheckResult {
  level: LevelId;
  flagIssued: boolean;
  /** Completion token; present only when flagIssued. */
  token?: string | undefined;
  message: string;
}

export type FlagCheckOutcome = { ok: true; result: FlagCheckResult } | { ok: false; error: InputError };

export interface FlagCheckOptions {
  formatFlag?: ((level: LevelId) => string) | undefined;
  incorrectMessage?: string | undefined;
}

export function defaultFlagFormat(level: LevelId): string {
  return `FLAG-LEVEL${level}-REVEALED`;
}

const DEFAULT_INCORRECT = "Incorrect prompt. Try again.";

function normalizeForCompare(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Exact-match check of a submitted reconstruction against the hidden instruction.
 * Case and surrounding whitespace are ignored; nothing else is. No partial credit.
 */
export function checkFlag(
  table: ChallengeTable,
  level: unknown,
  submitted: unknown,
  opts: FlagCheckOptions = {}
): FlagCheckOutcome {
  const parsed = parseLevel(level);
  if (!parsed.ok) return parsed;

  const expected = normalizeForCompare(table.get(parsed.level).instruction);
  const got = typeof submitted === "string" ? normalizeForCompare(submitted) : "";

  if (got !== "" && got === expected) {
    const format = opts.formatFlag ?? defaultFlagFormat;
    return {
      ok: true,
      result: { level: parsed.level, flagIssued: true, token: format(parsed.level), message: "Correct prompt." },
    };
  }

  return {
    ok: true,
    result: { level: parsed.level, flagIssued: false, message: opts.incorrectMessage ?? DEFAULT_INCORRECT },
  };
}
