import type { ChatCapability, EmbedCapability } from "../capability/types.js";
import type { ChallengeTable } from "../challenge/table.js";
import { parseLevel, type LevelId } from "../challenge/levels.js";
import { checkFlag, defaultFlagFormat, type FlagCheckOutcome } from "../flag/check_flag.js";
import { DEFAULT_JUDGE_MESSAGES, runJudgeRule } from "../judge/evaluate.js";
import type { JudgeContext, JudgeMessages, JudgeRule, RuleOf, Verdict } from "../judge/types.js";
import { assertRuleThreshold } from "../judge/thresholds.js";
import type { InputError } from "./errors.js";
import { noopLogger, type Logger } from "./logger.js";
import { describeChallenge, type ChallengeOverview } from "./response_body.js";

export interface EngineConfig {
  messages: JudgeMessages;
  formatFlag: (level: LevelId) => string;
  incorrectFlagMessage: string;

  /** Applied to every level judged by a similarity rule. */
  similarity: Partial<Omit<RuleOf<"similarity">, "kind">>;
  /** Applied to every level judged by an overlap rule. */
  overlap: Partial<Omit<RuleOf<"overlap">, "kind">>;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  messages: DEFAULT_JUDGE_MESSAGES,
  formatFlag: defaultFlagFormat,
  incorrectFlagMessage: "Incorrect prompt. Try again.",
  similarity: {},
  overlap: {},
};

export interface EngineOptions {
  challenge: ChallengeTable;
  chat: ChatCapability;
  embed?: EmbedCapability | undefined;
  logger?: Logger | undefined;
  config?: Partial<Omit<EngineConfig, "messages">> & { messages?: Partial<JudgeMessages> | undefined };
}

export type JudgeOutcome = { ok: true; verdict: Verdict } | { ok: false; error: InputError };

export interface LeakJudgeEngine {
  judge(level: unknown, userText: unknown): Promise<JudgeOutcome>;
  checkFlag(level: unknown, submitted: unknown): FlagCheckOutcome;
  describe(): ChallengeOverview;
  /** Effective rule per level after config overrides. */
  ruleFor(level: LevelId): JudgeRule;
}

/**
 * Merge config overrides into a table rule. The result is frozen and its
 * threshold re-checked, so a bad override fails at construction.
 */
function applyOverrides(rule: JudgeRule, cfg: EngineConfig, level: LevelId): JudgeRule {
  let merged: JudgeRule = rule;
  if (rule.kind === "similarity") merged = { ...rule, ...cfg.similarity, kind: "similarity" };
  else if (rule.kind === "overlap") merged = { ...rule, ...cfg.overlap, kind: "overlap" };

  assertRuleThreshold(merged, `config override for level ${level}`, "engine config");
  return Object.freeze(merged);
}

/**
 * Wire a challenge table to the chat/embed capabilities.
 *
 * The engine keeps no per-request state: each judge() call is independent and
 * may run concurrently with any other.
 */
export function createLeakJudgeEngine(opts: EngineOptions): LeakJudgeEngine {
  const { config, ...rest } = opts;
  const cfg: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...(config ?? {}),
    messages: { ...DEFAULT_ENGINE_CONFIG.messages, ...(config?.messages ?? {}) },
    similarity: { ...DEFAULT_ENGINE_CONFIG.similarity, ...(config?.similarity ?? {}) },
    overlap: { ...DEFAULT_ENGINE_CONFIG.overlap, ...(config?.overlap ?? {}) },
  };
  const log = rest.logger ?? noopLogger;
  const table = rest.challenge;

  const rules = new Map<LevelId, JudgeRule>();
  for (const def of table.levels()) {
    rules.set(def.level, applyOverrides(def.rule, cfg, def.level));
  }

  const ruleFor = (level: LevelId): JudgeRule => rules.get(level) ?? table.get(level).rule;

  return {
    async judge(level, userText) {
      const parsed = parseLevel(level);
      if (!parsed.ok) {
        log("info", "[engine] rejected judge request", { code: parsed.error.code });
        return parsed;
      }

      const def = table.get(parsed.level);
      const rule = ruleFor(parsed.level);

      const ctx: JudgeContext = {
        level: parsed.level,
        hiddenInstruction: def.instruction,
        userText: typeof userText === "string" ? userText : "",
        chat: rest.chat,
        embed: rest.embed,
        messages: cfg.messages,
        logger: log,
      };

      const verdict = await runJudgeRule(rule, ctx);

      log("info", "[engine] verdict", {
        level: verdict.level,
        rule: verdict.rule,
        exposed: verdict.exposed,
        replyWithheld: verdict.evidence.replyWithheld,
        upstreamErrors: verdict.upstreamErrors.length,
      });

      return { ok: true, verdict };
    },

    checkFlag(level, submitted) {
      const out = checkFlag(table, level, submitted, {
        formatFlag: cfg.formatFlag,
        incorrectMessage: cfg.incorrectFlagMessage,
      });
      if (out.ok) log("info", "[engine] flag check", { level: out.result.level, flagIssued: out.result.flagIssued });
      else log("info", "[engine] rejected flag check", { code: out.error.code });
      return out;
    },

    describe() {
      return describeChallenge(table);
    },

    ruleFor,
  };
}
