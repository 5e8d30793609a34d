import type { JudgeContext, JudgeMessages, JudgeRule, Verdict } from "./types.js";
import { judgePassthrough } from "./rules/passthrough.js";
import { judgeLiteral } from "./rules/literal.js";
import { judgeParaphrase } from "./rules/paraphrase.js";
import { judgeSimilarity } from "./rules/similarity.js";
import { judgeOverlap } from "./rules/overlap.js";

export const DEFAULT_JUDGE_MESSAGES: JudgeMessages = {
  refusal: "Nice try, but try again.",
  similaritySuccess: "Success: Semantically similar to the original prompt.",
  similarityTooLow: score => `Similarity too low (${score.toFixed(2)}). Refine your reconstruction.`,
  overlapSuccess: "Success: High partial match to the original prompt.",
  overlapTooLow: "Not close enough yet, increase overlap with the true instructions.",
};

/**
 * Apply one judge rule. Total: capability failures are folded into the verdict.
 */
export async function runJudgeRule(rule: JudgeRule, ctx: JudgeContext): Promise<Verdict> {
  switch (rule.kind) {
    case "passthrough": return judgePassthrough(ctx);
    case "literal":     return judgeLiteral(ctx);
    case "paraphrase":  return judgeParaphrase(ctx, rule);
    case "similarity":  return judgeSimilarity(ctx, rule);
    case "overlap":     return judgeOverlap(ctx, rule);
    default: {
      const unreachable: never = rule;
      throw new Error(`runJudgeRule: unknown rule ${JSON.stringify(unreachable)}`);
    }
  }
}
