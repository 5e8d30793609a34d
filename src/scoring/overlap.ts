import { tokenize } from "../text/tokenize.js";

export interface OverlapScore {
  precision: number;
  recall: number;
  f1: number;
}

export const ZERO_OVERLAP: Readonly<OverlapScore> = Object.freeze({ precision: 0, recall: 0, f1: 0 });

/**
 * Token-set overlap between a predicted text and a target text.
 * - precision = |P ∩ T| / |P|, recall = |P ∩ T| / |T|
 * - order and multiplicity are ignored
 * - an empty side never matches: all scores are 0
 */
export function overlapScores(predicted: unknown, target: unknown): OverlapScore {
  const p = tokenize(predicted);
  const t = tokenize(target);
  if (!p.size || !t.size) return { ...ZERO_OVERLAP };

  let inter = 0;
  for (const tok of p) {
    if (t.has(tok)) inter += 1;
  }

  const precision = inter / p.size;
  const recall = inter / t.size;
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);

  return { precision, recall, f1 };
}
