import type { ChallengeTable, InputEncoding } from "../challenge/table.js";
import type { LevelId } from "../challenge/levels.js";
import type { FlagCheckResult } from "../flag/check_flag.js";
import type { JudgeRuleKind, Verdict } from "../judge/types.js";
import type { InputError } from "./errors.js";

// ── Challenge overview ─────────────────────────────────────────────

export interface LevelSummary {
  level: LevelId;
  rule: JudgeRuleKind;
  input: InputEncoding;
  route: string;
}

export interface ChallengeOverview {
  message: string;
  objective: string;
  levels: LevelSummary[];
  check: string;
}

export interface OverviewOptions {
  /** Route prefix used in the hints. Default: "/ctf". */
  basePath?: string;
  checkPath?: string;
}

/**
 * Public description of the exercise. Never includes hidden instructions.
 */
export function describeChallenge(table: ChallengeTable, opts: OverviewOptions = {}): ChallengeOverview {
  const base = (opts.basePath ?? "/ctf").replace(/\/+$/, "");
  const checkPath = opts.checkPath ?? "/check";
  const levels = table.levels();
  const first = levels[0]?.level ?? 1;
  const last = levels[levels.length - 1]?.level ?? first;

  return {
    message: table.title,
    objective: table.objective,
    levels: levels.map(def => ({
      level: def.level,
      rule: def.rule.kind,
      input: def.input,
      route: `${base}/${def.level}?text=...${def.input === "base64" ? " (base64)" : ""}`,
    })),
    check: `${checkPath}?level=${first}..${last}&prompt=... (exact match)`,
  };
}

// ── Verdict body ───────────────────────────────────────────────────

function round3(x: number): number {
  return Math.round(x * 1000) / 1000;
}

export interface VerdictBody {
  level: LevelId;
  result: string;
  success?: boolean;
  decoded?: string;
  similarity?: number;
  modelReply?: string;
  overlap?: { precision: number; recall: number; f1: number };
  thresholds?: { similarityMin?: number; f1Min?: number };
}

/**
 * JSON body for a judged attempt. The raw reply only appears where the verdict
 * kept it; `result` is already the refusal text when the reply was withheld.
 */
export function toVerdictBody(verdict: Verdict): VerdictBody {
  const body: VerdictBody = { level: verdict.level, result: verdict.message };
  const ev = verdict.evidence;

  switch (ev.rule) {
    case "passthrough":
    case "literal":
    case "paraphrase":
      return body;
    case "similarity":
      body.similarity = ev.similarity;
      body.thresholds = { similarityMin: ev.threshold };
      if (ev.target === "decoded") {
        body.success = verdict.exposed;
        body.decoded = ev.decoded ?? "";
      }
      return body;
    case "overlap":
      if (ev.reply !== undefined) body.modelReply = ev.reply;
      body.overlap = {
        precision: round3(ev.overlap.precision),
        recall: round3(ev.overlap.recall),
        f1: round3(ev.overlap.f1),
      };
      body.thresholds = { f1Min: ev.threshold };
      body.success = verdict.exposed && !ev.literalMatch;
      return body;
  }
}

// ── Flag / error bodies ────────────────────────────────────────────

export type FlagBody = { level: LevelId; flag: string } | { level: LevelId; message: string };

export function toFlagBody(result: FlagCheckResult): FlagBody {
  if (result.flagIssued && result.token) return { level: result.level, flag: result.token };
  return { level: result.level, message: result.message };
}

export function toErrorBody(error: InputError): { error: string; code: InputError["code"] } {
  return { error: error.message, code: error.code };
}
