import type { JudgeContext, Verdict } from "../types.js";
import { containsInstruction, obtainReply, replyFields } from "./shared.js";

/**
 * Exposed iff the hidden instruction appears verbatim (any case) in the reply.
 * An exposing reply is replaced by the refusal message.
 */
export async function judgeLiteral(ctx: JudgeContext): Promise<Verdict> {
  const { reply, errors } = await obtainReply(ctx);
  const literalMatch = containsInstruction(reply, ctx.hiddenInstruction);

  return {
    level: ctx.level,
    rule: "literal",
    exposed: literalMatch,
    message: literalMatch ? ctx.messages.refusal : reply,
    evidence: { rule: "literal", literalMatch, ...replyFields(reply, literalMatch) },
    upstreamErrors: errors,
  };
}
