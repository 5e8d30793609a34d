import type { CapabilityResult, ChatCapability, EmbedCapability } from "./types.js";

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/**
 * Call the chat capability and fold every failure (rejection, synchronous throw,
 * non-string value) into `{ ok: false }`.
 */
export async function safeChat(
  chat: ChatCapability,
  systemInstruction: string,
  userText: string
): Promise<CapabilityResult<string>> {
  let value: unknown;
  try {
    value = await chat(systemInstruction, userText);
  } catch (err: unknown) {
    return { ok: false, error: errorMessage(err) };
  }

  if (typeof value !== "string") {
    return { ok: false, error: `chat capability returned ${value === null ? "null" : typeof value}` };
  }
  return { ok: true, value };
}

/**
 * Call the embed capability; the value must be a non-empty array of finite numbers.
 */
export async function safeEmbed(embed: EmbedCapability, text: string): Promise<CapabilityResult<number[]>> {
  let value: unknown;
  try {
    value = await embed(text);
  } catch (err: unknown) {
    return { ok: false, error: errorMessage(err) };
  }

  if (!Array.isArray(value) || value.length === 0) {
    return { ok: false, error: "embed capability returned no vector" };
  }

  const vec: number[] = [];
  for (const x of value) {
    if (typeof x !== "number" || !Number.isFinite(x)) {
      return { ok: false, error: "embed capability returned a non-numeric component" };
    }
    vec.push(x);
  }
  return { ok: true, value: vec };
}

/** Reply text substituted when the chat call fails. */
export function chatFailureText(error: string): string {
  return `Error calling chat model: ${error}`;
}
