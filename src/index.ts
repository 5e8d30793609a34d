// --- L0: text ---
export { tokenize, termFrequencies } from "./text/tokenize.js";
export { decodeBase64Text } from "./text/decode.js";

// --- L1: scoring ---
export { overlapScores, ZERO_OVERLAP } from "./scoring/overlap.js";
export type { OverlapScore } from "./scoring/overlap.js";
export { cosineSimilarity, bagOfWordsCosine, embeddingSimilarity } from "./scoring/similarity.js";
export type { SimilarityMethod, EmbeddingSimilarity } from "./scoring/similarity.js";

// --- L2: capabilities ---
export type { ChatCapability, EmbedCapability, CapabilityResult } from "./capability/types.js";
export { safeChat, safeEmbed, chatFailureText } from "./capability/safe_call.js";
export { OpenAICompatibleClient, ModelClientError, DEFAULT_MODEL_CLIENT_CONFIG } from "./capability/model_client.js";
export type { ModelClientConfig } from "./capability/model_client.js";
export { resolveModelClientConfigFromEnv } from "./capability/env.js";
export type { EnvLike } from "./capability/env.js";

// --- L2: challenge table ---
export { LEVEL_IDS, isLevelId, parseLevel } from "./challenge/levels.js";
export type { LevelId, LevelParse } from "./challenge/levels.js";
export { createChallengeTable } from "./challenge/table.js";
export type { ChallengeTable, ChallengeTableInit, LevelDefinition, InputEncoding } from "./challenge/table.js";
export { loadChallengeTable, parseChallengeTable, DEFAULT_CHALLENGE_URL } from "./challenge/load.js";

// --- L3: judges ---
export { runJudgeRule, DEFAULT_JUDGE_MESSAGES } from "./judge/evaluate.js";
export { defaultParaphraseJudgeInstruction, isAffirmativeJudgment } from "./judge/rules/paraphrase.js";
export type {
  JudgeRule,
  JudgeRuleKind,
  RuleOf,
  SimilarityTarget,
  Verdict,
  VerdictEvidence,
  JudgeMessages,
  JudgeContext,
} from "./judge/types.js";

// --- L3: flags ---
export { checkFlag, defaultFlagFormat } from "./flag/check_flag.js";
export type { FlagCheckResult, FlagCheckOutcome, FlagCheckOptions } from "./flag/check_flag.js";

// --- L4: engine + presentation ---
export { createLeakJudgeEngine, DEFAULT_ENGINE_CONFIG } from "./core/engine.js";
export type { EngineConfig, EngineOptions, JudgeOutcome, LeakJudgeEngine } from "./core/engine.js";
export { describeChallenge, toVerdictBody, toFlagBody, toErrorBody } from "./core/response_body.js";
export type { ChallengeOverview, LevelSummary, OverviewOptions, VerdictBody, FlagBody } from "./core/response_body.js";

export { ChallengeConfigError } from "./core/errors.js";
export type { InputError, InputErrorCode } from "./core/errors.js";
export { noopLogger, consoleLogger } from "./core/logger.js";
export type { Logger, LogLevel } from "./core/logger.js";
