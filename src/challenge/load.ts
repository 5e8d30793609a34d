import fs from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";

import { ChallengeConfigError } from "../core/errors.js";
import { resolveAssetPath } from "../core/asset_path.js";
import { isValidThreshold } from "../judge/thresholds.js";
import type { JudgeRule } from "../judge/types.js";
import { isLevelId } from "./levels.js";
import { createChallengeTable, type ChallengeTable, type InputEncoding, type LevelDefinition } from "./table.js";

/** Document versions this loader understands. */
export const SUPPORTED_CHALLENGE_VERSIONS: readonly string[] = ["1"];

export const DEFAULT_CHALLENGE_URL = pathToFileURL(resolveAssetPath("challenge.default.json", import.meta.url));

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function parseRule(o: unknown, where: string, source: string): JudgeRule {
  if (!isObject(o)) throw new ChallengeConfigError(`${where}.rule must be an object`, source);

  switch (o["kind"]) {
    case "passthrough":
      return { kind: "passthrough" };
    case "literal":
      return { kind: "literal" };
    case "paraphrase":
      return { kind: "paraphrase" };
    case "similarity": {
      const { target, method, threshold } = o;
      if (target !== "decoded" && target !== "reply") {
        throw new ChallengeConfigError(`${where}.rule.target must be "decoded" or "reply"`, source);
      }
      if (method !== "embedding" && method !== "bag_of_words") {
        throw new ChallengeConfigError(`${where}.rule.method must be "embedding" or "bag_of_words"`, source);
      }
      if (!isValidThreshold(threshold)) {
        throw new ChallengeConfigError(`${where}.rule.threshold must be a number in (0, 1]`, source);
      }
      return { kind: "similarity", target, method, threshold };
    }
    case "overlap": {
      const { threshold } = o;
      if (!isValidThreshold(threshold)) {
        throw new ChallengeConfigError(`${where}.rule.threshold must be a number in (0, 1]`, source);
      }
      return { kind: "overlap", threshold };
    }
    default:
      throw new ChallengeConfigError(`${where}.rule.kind "${String(o["kind"])}" is not supported`, source);
  }
}

function parseLevelDefinition(o: unknown, index: number, source: string): LevelDefinition {
  const where = `levels[${index}]`;
  if (!isObject(o)) throw new ChallengeConfigError(`${where} must be an object`, source);

  const { level, instruction } = o;
  if (!isLevelId(level)) throw new ChallengeConfigError(`${where}.level must be one of 1..5`, source);
  if (typeof instruction !== "string") throw new ChallengeConfigError(`${where}.instruction must be a string`, source);

  const inputRaw = o["input"] ?? "plain";
  if (inputRaw !== "plain" && inputRaw !== "base64") {
    throw new ChallengeConfigError(`${where}.input must be "plain" or "base64"`, source);
  }
  const input: InputEncoding = inputRaw;

  return { level, instruction, input, rule: parseRule(o["rule"], where, source) };
}

/**
 * Parse an already-decoded challenge document.
 */
export function parseChallengeTable(doc: unknown, source = "inline"): ChallengeTable {
  if (!isObject(doc)) throw new ChallengeConfigError("challenge file must contain an object", source);

  const version: unknown = doc["version"];
  if (version !== undefined && !(typeof version === "string" && SUPPORTED_CHALLENGE_VERSIONS.includes(version))) {
    throw new ChallengeConfigError(
      `unsupported challenge version ${JSON.stringify(version)} (expected one of ${SUPPORTED_CHALLENGE_VERSIONS.join(", ")})`,
      source
    );
  }

  const levelsRaw: unknown = doc["levels"];
  if (!Array.isArray(levelsRaw)) throw new ChallengeConfigError("levels must be an array", source);

  const { title, objective } = doc;
  if (title !== undefined && typeof title !== "string") throw new ChallengeConfigError("title must be a string", source);
  if (objective !== undefined && typeof objective !== "string") {
    throw new ChallengeConfigError("objective must be a string", source);
  }

  const levels = levelsRaw.map((l: unknown, i: number) => parseLevelDefinition(l, i, source));

  return createChallengeTable(
    {
      levels,
      ...(title !== undefined ? { title } : {}),
      ...(objective !== undefined ? { objective } : {}),
    },
    source
  );
}

/**
 * Load a challenge table from a JSON file. Meant to run once at startup;
 * the resulting table is frozen and shared by every request.
 */
export function loadChallengeTable(url: URL = DEFAULT_CHALLENGE_URL): ChallengeTable {
  const file = fileURLToPath(url);

  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (e: unknown) {
    throw new ChallengeConfigError(`cannot read challenge file: ${e instanceof Error ? e.message : String(e)}`, file);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (e: unknown) {
    throw new ChallengeConfigError(`JSON parse failed: ${e instanceof Error ? e.message : String(e)}`, file);
  }

  return parseChallengeTable(doc, file);
}
