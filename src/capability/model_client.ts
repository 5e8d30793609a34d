/**
 * OpenAI-compatible REST client for chat completions and embeddings.
 *
 * Uses Node.js built-in `fetch`. `chat` and `embed` are bound arrow properties,
 * so they can be handed to the engine directly as capabilities.
 */

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface ModelClientConfig {
  /** API base URL without the trailing path (e.g. "https://api.deepseek.com"). */
  baseUrl?: string | undefined;
  /**
   * API key sent as `Authorization: Bearer <apiKey>`.
   * An array is rotated round-robin, one key per request.
   */
  apiKey?: string | string[] | undefined;
  chatModel?: string | undefined;
  embeddingModel?: string | undefined;
  /** Request timeout in milliseconds. Default: 10 000. */
  timeoutMs?: number | undefined;
  /** Extra headers merged into every request. */
  headers?: Record<string, string> | undefined;
}

export const DEFAULT_MODEL_CLIENT_CONFIG = {
  baseUrl: "https://api.deepseek.com",
  chatModel: "deepseek-chat",
  embeddingModel: "text-embedding-3-small",
  timeoutMs: 10_000,
} as const;

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

/** Error thrown when a model API call fails. */
export class ModelClientError extends Error {
  /** HTTP status code (if the request reached the server). */
  status?: number | undefined;
  /** Machine-readable error code from the server response body. */
  code?: string | undefined;

  constructor(message: string, opts?: { status?: number | undefined; code?: string | undefined }) {
    super(message);
    this.name = "ModelClientError";
    this.status = opts?.status;
    this.code = opts?.code;
  }
}

// ---------------------------------------------------------------------------
// Response shape checks
// ---------------------------------------------------------------------------

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function firstOf(x: unknown): unknown {
  return Array.isArray(x) ? x[0] : undefined;
}

function readChatContent(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const choice = firstOf(body["choices"]);
  if (!isRecord(choice)) return undefined;
  const message = choice["message"];
  if (!isRecord(message)) return undefined;
  const content = message["content"];
  return typeof content === "string" ? content : undefined;
}

function readEmbedding(body: unknown): number[] | undefined {
  if (!isRecord(body)) return undefined;
  const item = firstOf(body["data"]);
  if (!isRecord(item)) return undefined;
  const embedding = item["embedding"];
  if (!Array.isArray(embedding)) return undefined;

  const out: number[] = [];
  for (const x of embedding) {
    if (typeof x !== "number") return undefined;
    out.push(x);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class OpenAICompatibleClient {
  private readonly baseUrl: string;
  private readonly apiKeys: string[];
  private readonly chatModel: string;
  private readonly embeddingModel: string;
  private readonly timeoutMs: number;
  private readonly extraHeaders: Record<string, string>;
  private keyIdx = 0;

  constructor(config: ModelClientConfig = {}) {
    // Strip trailing slash for consistent URL joining.
    this.baseUrl = (config.baseUrl ?? DEFAULT_MODEL_CLIENT_CONFIG.baseUrl).replace(/\/+$/, "");
    this.chatModel = config.chatModel ?? DEFAULT_MODEL_CLIENT_CONFIG.chatModel;
    this.embeddingModel = config.embeddingModel ?? DEFAULT_MODEL_CLIENT_CONFIG.embeddingModel;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_MODEL_CLIENT_CONFIG.timeoutMs;
    this.extraHeaders = config.headers ?? {};

    const keys = Array.isArray(config.apiKey) ? config.apiKey : config.apiKey ? [config.apiKey] : [];
    this.apiKeys = keys.map(k => k.trim()).filter(Boolean);
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * POST {baseUrl}/chat/completions with a system + user message pair.
   */
  readonly chat = async (systemInstruction: string, userText: string): Promise<string> => {
    const body = await this.post("/chat/completions", {
      model: this.chatModel,
      messages: [
        { role: "system", content: systemInstruction },
        { role: "user", content: userText },
      ],
      stream: false,
    });

    const content = readChatContent(body);
    if (content === undefined) {
      throw new ModelClientError("Chat completion response has no choices[0].message.content");
    }
    return content;
  };

  /**
   * POST {baseUrl}/embeddings for a single input string.
   */
  readonly embed = async (text: string): Promise<number[]> => {
    const body = await this.post("/embeddings", { model: this.embeddingModel, input: text });

    const embedding = readEmbedding(body);
    if (!embedding) {
      throw new ModelClientError("Embedding response has no data[0].embedding");
    }
    return embedding;
  };

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private nextApiKey(): string | undefined {
    if (!this.apiKeys.length) return undefined;
    const key = this.apiKeys[this.keyIdx % this.apiKeys.length];
    this.keyIdx = (this.keyIdx + 1) % this.apiKeys.length;
    return key;
  }

  private headers(): Record<string, string> {
    const key = this.nextApiKey();
    return {
      "Content-Type": "application/json",
      Accept: "application/json",
      ...(key ? { Authorization: `Bearer ${key}` } : {}),
      ...this.extraHeaders,
    };
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err: unknown) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new ModelClientError(`Model request timed out after ${this.timeoutMs}ms: POST ${path}`);
      }
      const msg = err instanceof Error ? err.message : String(err);
      throw new ModelClientError(`Model API network error: ${msg}`);
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      let serverCode: string | undefined;
      let serverMessage: string | undefined;
      try {
        const errBody: unknown = await res.json();
        // OpenAI-style bodies nest details under "error"
        const detail = isRecord(errBody) && isRecord(errBody["error"]) ? errBody["error"] : errBody;
        if (isRecord(detail)) {
          if (typeof detail["code"] === "string") serverCode = detail["code"];
          if (typeof detail["message"] === "string") serverMessage = detail["message"];
        }
      } catch {
        serverMessage = undefined; // error body was not JSON
      }

      throw new ModelClientError(
        serverMessage ?? `Request failed, error code: ${res.status}`,
        { status: res.status, code: serverCode },
      );
    }

    try {
      return await res.json();
    } catch {
      throw new ModelClientError(`Model API returned a non-JSON body: POST ${path}`, { status: res.status });
    }
  }
}
