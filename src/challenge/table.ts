import { ChallengeConfigError } from "../core/errors.js";
import { assertRuleThreshold } from "../judge/thresholds.js";
import type { JudgeRule } from "../judge/types.js";
import { LEVEL_IDS, type LevelId } from "./levels.js";

export type InputEncoding = "plain" | "base64";

export interface LevelDefinition {
  level: LevelId;
  /** Hidden system instruction for this level. */
  instruction: string;
  rule: JudgeRule;
  /** How the attacker input is expected to arrive (route hint only). */
  input: InputEncoding;
}

export interface ChallengeTable {
  readonly title: string;
  readonly objective: string;
  get(level: LevelId): Readonly<LevelDefinition>;
  levels(): readonly Readonly<LevelDefinition>[];
}

export interface ChallengeTableInit {
  title?: string;
  objective?: string;
  levels: LevelDefinition[];
}

const DEFAULT_TITLE = "Prompt Injection CTF";
const DEFAULT_OBJECTIVE = "Extract or reconstruct the hidden prompt per level. No real secrets are used.";

/**
 * Build an immutable table. Every level of the closed enumeration must be
 * defined exactly once with a non-empty instruction.
 */
export function createChallengeTable(init: ChallengeTableInit, source = "inline"): ChallengeTable {
  const byLevel = new Map<LevelId, Readonly<LevelDefinition>>();

  for (const def of init.levels) {
    if (byLevel.has(def.level)) {
      throw new ChallengeConfigError(`duplicate level ${def.level}`, source);
    }
    if (!def.instruction.trim()) {
      throw new ChallengeConfigError(`level ${def.level} has an empty instruction`, source);
    }
    assertRuleThreshold(def.rule, `level ${def.level}.rule`, source);
    byLevel.set(def.level, Object.freeze({ ...def, rule: Object.freeze({ ...def.rule }) }));
  }

  const ordered: Readonly<LevelDefinition>[] = [];
  for (const id of LEVEL_IDS) {
    const def = byLevel.get(id);
    if (!def) throw new ChallengeConfigError(`level ${id} is not defined`, source);
    ordered.push(def);
  }
  Object.freeze(ordered);

  const title = init.title ?? DEFAULT_TITLE;
  const objective = init.objective ?? DEFAULT_OBJECTIVE;

  return Object.freeze({
    title,
    objective,
    get(level: LevelId) {
      const def = byLevel.get(level);
      // LevelId is closed and createChallengeTable checked every id above.
      if (!def) throw new ChallengeConfigError(`level ${level} is not defined`, source);
      return def;
    },
    levels() {
      return ordered;
    },
  });
}
