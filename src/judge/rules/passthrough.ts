import type { JudgeContext, Verdict } from "../types.js";
import { obtainReply, replyFields } from "./shared.js";

/** Unmitigated baseline: whatever the model says goes straight back. */
export async function judgePassthrough(ctx: JudgeContext): Promise<Verdict> {
  const { reply, errors } = await obtainReply(ctx);

  return {
    level: ctx.level,
    rule: "passthrough",
    exposed: false,
    message: reply,
    evidence: { rule: "passthrough", ...replyFields(reply, false) },
    upstreamErrors: errors,
  };
}
