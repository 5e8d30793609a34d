import { ChallengeConfigError } from "../core/errors.js";
import type { JudgeRule } from "./types.js";

/**
 * Thresholds live in (0, 1]. A threshold of 0 or below would let a score of 0
 * (empty reply, failed call, undecodable input) count as exposure.
 */
export function isValidThreshold(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x) && x > 0 && x <= 1;
}

/** A score can only expose when it is positive and reaches the threshold. */
export function meetsThreshold(score: number, threshold: number): boolean {
  return score > 0 && score >= threshold;
}

/** Throws ChallengeConfigError when a scoring rule carries an out-of-range threshold. */
export function assertRuleThreshold(rule: JudgeRule, where: string, source: string): void {
  if (rule.kind !== "similarity" && rule.kind !== "overlap") return;
  if (!isValidThreshold(rule.threshold)) {
    throw new ChallengeConfigError(`${where}.threshold must be a number in (0, 1], got ${String(rule.threshold)}`, source);
  }
}
