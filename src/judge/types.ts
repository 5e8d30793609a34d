import type { LevelId } from "../challenge/levels.js";
import type { ChatCapability, EmbedCapability } from "../capability/types.js";
import type { OverlapScore } from "../scoring/overlap.js";
import type { SimilarityMethod } from "../scoring/similarity.js";
import type { Logger } from "../core/logger.js";

export type SimilarityTarget = "decoded" | "reply";

/**
 * Verdict rule attached to a level, held as data.
 */
export type JudgeRule =
  | { kind: "passthrough" }
  | { kind: "literal" }
  | {
      kind: "paraphrase";
      /** Builds the second-stage judge instruction; default asks for a Yes/No prefix. */
      judgeInstruction?: ((hiddenInstruction: string) => string) | undefined;
    }
  | { kind: "similarity"; target: SimilarityTarget; threshold: number; method: SimilarityMethod }
  | { kind: "overlap"; threshold: number };

export type JudgeRuleKind = JudgeRule["kind"];

export type RuleOf<K extends JudgeRuleKind> = Extract<JudgeRule, { kind: K }>;

// ── Evidence (one shape per rule kind) ─────────────────────────────

interface ReplyEvidence {
  /** Raw model reply. Absent whenever it was withheld. */
  reply?: string | undefined;
  replyWithheld: boolean;
}

export type VerdictEvidence =
  | ({ rule: "passthrough" } & ReplyEvidence)
  | ({ rule: "literal"; literalMatch: boolean } & ReplyEvidence)
  | ({
      rule: "paraphrase";
      literalMatch: boolean;
      /** Second-stage judgment text; absent when the stage did not run. */
      judgment?: string | undefined;
      paraphraseMatch: boolean;
    } & ReplyEvidence)
  | ({
      rule: "similarity";
      target: SimilarityTarget;
      method: SimilarityMethod;
      /** Decoded reconstruction ("" when undecodable); decoded target only. */
      decoded?: string | undefined;
      similarity: number;
      threshold: number;
    } & ReplyEvidence)
  | ({
      rule: "overlap";
      literalMatch: boolean;
      overlap: OverlapScore;
      threshold: number;
    } & ReplyEvidence);

export interface Verdict {
  level: LevelId;
  rule: JudgeRuleKind;
  /** Hidden instruction revealed (verbatim or in substance). */
  exposed: boolean;
  /** Text the caller is allowed to see. */
  message: string;
  evidence: VerdictEvidence;
  /** Capability failures recovered while judging. */
  upstreamErrors: string[];
}

// ── Evaluation context ─────────────────────────────────────────────

export interface JudgeMessages {
  refusal: string;
  similaritySuccess: string;
  similarityTooLow: (score: number) => string;
  overlapSuccess: string;
  overlapTooLow: string;
}

export interface JudgeContext {
  level: LevelId;
  hiddenInstruction: string;
  userText: string;
  chat: ChatCapability;
  embed?: EmbedCapability | undefined;
  messages: JudgeMessages;
  logger: Logger;
}
