import type { ModelClientConfig } from "./model_client.js";

export type EnvLike = Record<string, string | undefined>;

function nonEmpty(v: string | undefined): string | undefined {
  const t = v?.trim();
  return t ? t : undefined;
}

/**
 * Build a ModelClientConfig from environment variables.
 * LEAKJUDGE_MODEL_API_KEY may hold several comma-separated keys (round-robin).
 */
export function resolveModelClientConfigFromEnv(env: EnvLike = process.env): ModelClientConfig {
  const keys = (env["LEAKJUDGE_MODEL_API_KEY"] ?? "")
    .split(",")
    .map(k => k.trim())
    .filter(Boolean);

  const timeoutRaw = nonEmpty(env["LEAKJUDGE_TIMEOUT_MS"]);
  const timeout = timeoutRaw === undefined ? NaN : Number(timeoutRaw);

  return {
    baseUrl: nonEmpty(env["LEAKJUDGE_MODEL_BASE_URL"]),
    apiKey: keys.length ? keys : undefined,
    chatModel: nonEmpty(env["LEAKJUDGE_CHAT_MODEL"]),
    embeddingModel: nonEmpty(env["LEAKJUDGE_EMBEDDING_MODEL"]),
    timeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : undefined,
  };
}
