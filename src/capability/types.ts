/**
 * Text completion: one system instruction, one user message, one reply.
 * Implementations may reject; callers go through safeChat().
 */
export type ChatCapability = (systemInstruction: string, userText: string) => Promise<string>;

/** Text -> dense embedding vector. */
export type EmbedCapability = (text: string) => Promise<number[]>;

export type CapabilityResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };
