import { afterEach, describe, it, expect, vi } from "vitest";
import { ModelClientError, OpenAICompatibleClient } from "../src/capability/model_client.js";
import { resolveModelClientConfigFromEnv } from "../src/capability/env.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function stubFetch(impl: (url: string, init: RequestInit) => Promise<Response>) {
  const fn = vi.fn(impl);
  vi.stubGlobal("fetch", fn);
  return fn;
}

function requestOf(fn: ReturnType<typeof stubFetch>, call = 0): { url: string; init: RequestInit; body: unknown } {
  const args = fn.mock.calls[call]!;
  return { url: args[0], init: args[1], body: JSON.parse(String(args[1].body)) };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAICompatibleClient.chat", () => {
  it("posts a system + user message pair and returns the content", async () => {
    const fetchFn = stubFetch(async () => jsonResponse({ choices: [{ message: { content: "Sure thing." } }] }));
    const client = new OpenAICompatibleClient({ apiKey: "test-key" });

    await expect(client.chat("hidden instruction", "hello")).resolves.toBe("Sure thing.");

    const req = requestOf(fetchFn);
    expect(req.url).toBe("https://api.deepseek.com/chat/completions");
    expect(req.init.method).toBe("POST");
    expect(req.body).toEqual({
      model: "deepseek-chat",
      messages: [
        { role: "system", content: "hidden instruction" },
        { role: "user", content: "hello" },
      ],
      stream: false,
    });
    expect((req.init.headers as Record<string, string>)["Authorization"]).toBe("Bearer test-key");
  });

  it("works as a detached capability", async () => {
    stubFetch(async () => jsonResponse({ choices: [{ message: { content: "ok" } }] }));
    const { chat } = new OpenAICompatibleClient({ baseUrl: "http://model.local/v1/" });
    await expect(chat("s", "u")).resolves.toBe("ok");
  });

  it("maps an HTTP error body to ModelClientError", async () => {
    stubFetch(async () => jsonResponse({ error: { message: "bad key", code: "invalid_api_key" } }, 401));
    const client = new OpenAICompatibleClient();

    const err = await client.chat("s", "u").then(() => undefined, (e: unknown) => e);
    expect(err).toBeInstanceOf(ModelClientError);
    if (err instanceof ModelClientError) {
      expect(err.message).toBe("bad key");
      expect(err.status).toBe(401);
      expect(err.code).toBe("invalid_api_key");
    }
  });

  it("falls back to the status code when the error body is not JSON", async () => {
    stubFetch(async () => new Response("oops", { status: 500 }));
    const client = new OpenAICompatibleClient();
    await expect(client.chat("s", "u")).rejects.toThrow("Request failed, error code: 500");
  });

  it("rejects a response without choices", async () => {
    stubFetch(async () => jsonResponse({ choices: [] }));
    const client = new OpenAICompatibleClient();
    await expect(client.chat("s", "u")).rejects.toThrow(/no choices\[0\]\.message\.content/);
  });

  it("reports an aborted request as a timeout", async () => {
    stubFetch(async () => {
      throw Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
    });
    const client = new OpenAICompatibleClient({ timeoutMs: 250 });
    await expect(client.chat("s", "u")).rejects.toThrow("Model request timed out after 250ms: POST /chat/completions");
  });

  it("reports network failures", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });
    const client = new OpenAICompatibleClient();
    await expect(client.chat("s", "u")).rejects.toThrow("Model API network error: fetch failed");
  });

  it("rotates several API keys round-robin", async () => {
    const fetchFn = stubFetch(async () => jsonResponse({ choices: [{ message: { content: "." } }] }));
    const client = new OpenAICompatibleClient({ apiKey: ["k1", "k2"] });

    await client.chat("s", "u");
    await client.chat("s", "u");
    await client.chat("s", "u");

    const auth = fetchFn.mock.calls.map(c => (c[1].headers as Record<string, string>)["Authorization"]);
    expect(auth).toEqual(["Bearer k1", "Bearer k2", "Bearer k1"]);
  });
});

describe("OpenAICompatibleClient.embed", () => {
  it("returns the first embedding", async () => {
    const fetchFn = stubFetch(async () => jsonResponse({ data: [{ embedding: [0.1, 0.2, 0.3] }] }));
    const client = new OpenAICompatibleClient({ baseUrl: "https://api.openai.com/v1" });

    await expect(client.embed("text")).resolves.toEqual([0.1, 0.2, 0.3]);

    const req = requestOf(fetchFn);
    expect(req.url).toBe("https://api.openai.com/v1/embeddings");
    expect(req.body).toEqual({ model: "text-embedding-3-small", input: "text" });
  });

  it("rejects a malformed embedding", async () => {
    stubFetch(async () => jsonResponse({ data: [{ embedding: ["x"] }] }));
    const client = new OpenAICompatibleClient();
    await expect(client.embed("text")).rejects.toThrow("Embedding response has no data[0].embedding");
  });
});

describe("resolveModelClientConfigFromEnv()", () => {
  it("reads base URL, keys and timeout", () => {
    const cfg = resolveModelClientConfigFromEnv({
      LEAKJUDGE_MODEL_BASE_URL: "http://localhost:8080/v1",
      LEAKJUDGE_MODEL_API_KEY: "a, b,",
      LEAKJUDGE_TIMEOUT_MS: "2500",
    });

    expect(cfg.baseUrl).toBe("http://localhost:8080/v1");
    expect(cfg.apiKey).toEqual(["a", "b"]);
    expect(cfg.timeoutMs).toBe(2500);
    expect(cfg.chatModel).toBeUndefined();
  });

  it("ignores blank and invalid values", () => {
    const cfg = resolveModelClientConfigFromEnv({ LEAKJUDGE_MODEL_API_KEY: " ", LEAKJUDGE_TIMEOUT_MS: "soon" });
    expect(cfg.apiKey).toBeUndefined();
    expect(cfg.timeoutMs).toBeUndefined();
  });
});
