import { bagOfWordsCosine, embeddingSimilarity, type SimilarityMethod } from "../../scoring/similarity.js";
import { decodeBase64Text } from "../../text/decode.js";
import { meetsThreshold } from "../thresholds.js";
import type { JudgeContext, RuleOf, Verdict } from "../types.js";
import { obtainReply, replyFields } from "./shared.js";

interface Scored {
  score: number;
  method: SimilarityMethod;
  error?: string | undefined;
}

async function score(ctx: JudgeContext, method: SimilarityMethod, text: string): Promise<Scored> {
  if (method === "embedding" && ctx.embed) {
    const res = await embeddingSimilarity(ctx.embed, text, ctx.hiddenInstruction);
    return { score: res.score, method, error: res.error };
  }
  return { score: bagOfWordsCosine(text, ctx.hiddenInstruction), method: "bag_of_words" };
}

/**
 * Semantic similarity against the hidden instruction.
 *
 * target "decoded": the user's Base64 payload is a reconstruction attempt;
 *   reaching the threshold is a success. No model call is made.
 * target "reply": the model's reply is compared instead; reaching the threshold
 *   withholds the reply like the literal rule does.
 *
 * Without an embed capability the bag-of-words cosine is used.
 */
export async function judgeSimilarity(ctx: JudgeContext, rule: RuleOf<"similarity">): Promise<Verdict> {
  if (rule.target === "decoded") {
    const decoded = decodeBase64Text(ctx.userText);
    const s = await score(ctx, rule.method, decoded);
    const exposed = meetsThreshold(s.score, rule.threshold);

    if (s.error) ctx.logger("warn", "[judge] embedding failed", { level: ctx.level, error: s.error });

    return {
      level: ctx.level,
      rule: "similarity",
      exposed,
      message: exposed ? ctx.messages.similaritySuccess : ctx.messages.similarityTooLow(s.score),
      evidence: {
        rule: "similarity",
        target: "decoded",
        method: s.method,
        decoded,
        similarity: s.score,
        threshold: rule.threshold,
        replyWithheld: false,
      },
      upstreamErrors: s.error ? [s.error] : [],
    };
  }

  const { reply, errors } = await obtainReply(ctx);
  const s = await score(ctx, rule.method, reply);
  const exposed = meetsThreshold(s.score, rule.threshold);

  if (s.error) ctx.logger("warn", "[judge] embedding failed", { level: ctx.level, error: s.error });

  return {
    level: ctx.level,
    rule: "similarity",
    exposed,
    message: exposed ? ctx.messages.refusal : reply,
    evidence: {
      rule: "similarity",
      target: "reply",
      method: s.method,
      similarity: s.score,
      threshold: rule.threshold,
      ...replyFields(reply, exposed),
    },
    upstreamErrors: s.error ? [...errors, s.error] : errors,
  };
}
