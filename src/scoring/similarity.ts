import type { EmbedCapability } from "../capability/types.js";
import { safeEmbed } from "../capability/safe_call.js";
import { termFrequencies } from "../text/tokenize.js";

export type SimilarityMethod = "embedding" | "bag_of_words";

function finiteOrZero(x: number): number {
  return Number.isFinite(x) ? x : 0;
}

/**
 * Dense cosine similarity.
 * Returns 0 when either vector has zero magnitude, when lengths differ,
 * or when the inputs contain non-finite values.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }

  const denom = Math.sqrt(na) * Math.sqrt(nb);
  if (denom === 0) return 0;
  return finiteOrZero(dot / denom);
}

/**
 * Cosine over raw term-frequency vectors (`\w+`, case-sensitive).
 * No embedding call is involved.
 */
export function bagOfWordsCosine(a: unknown, b: unknown): number {
  const fa = termFrequencies(a);
  const fb = termFrequencies(b);
  if (!fa.size || !fb.size) return 0;

  let dot = 0;
  for (const [term, n] of fa) {
    const m = fb.get(term);
    if (m !== undefined) dot += n * m;
  }

  let na = 0;
  for (const n of fa.values()) na += n * n;
  let nb = 0;
  for (const n of fb.values()) nb += n * n;

  const denom = Math.sqrt(na) * Math.sqrt(nb);
  if (denom === 0) return 0;
  return finiteOrZero(dot / denom);
}

export interface EmbeddingSimilarity {
  score: number;
  error?: string | undefined;
}

/**
 * Embed both texts and compare them. Fails closed: an empty text or any
 * embedding failure scores 0.
 */
export async function embeddingSimilarity(
  embed: EmbedCapability,
  a: string,
  b: string
): Promise<EmbeddingSimilarity> {
  if (!a.trim() || !b.trim()) return { score: 0 };

  const [va, vb] = await Promise.all([safeEmbed(embed, a), safeEmbed(embed, b)]);
  if (!va.ok) return { score: 0, error: va.error };
  if (!vb.ok) return { score: 0, error: vb.error };

  return { score: cosineSimilarity(va.value, vb.value) };
}
