import { describe, it, expect, vi } from "vitest";
import { chatFailureText, safeChat, safeEmbed } from "../src/capability/safe_call.js";
import type { ChatCapability, EmbedCapability } from "../src/capability/types.js";

describe("safeChat()", () => {
  it("wraps a reply as ok", async () => {
    const chat = vi.fn<ChatCapability>(async () => "hello");
    await expect(safeChat(chat, "sys", "user")).resolves.toEqual({ ok: true, value: "hello" });
    expect(chat).toHaveBeenCalledWith("sys", "user");
  });

  it("folds a rejection into a failure result", async () => {
    const chat = vi.fn<ChatCapability>(async () => {
      throw new Error("Request timed out");
    });
    await expect(safeChat(chat, "sys", "user")).resolves.toEqual({ ok: false, error: "Request timed out" });
  });

  it("folds a synchronous throw of a non-Error value", async () => {
    const chat: ChatCapability = () => {
      throw "boom";
    };
    await expect(safeChat(chat, "sys", "user")).resolves.toEqual({ ok: false, error: "boom" });
  });

  it("rejects a non-string reply", async () => {
    const chat = vi.fn(async () => 42) as unknown as ChatCapability;
    await expect(safeChat(chat, "sys", "user")).resolves.toEqual({
      ok: false,
      error: "chat capability returned number",
    });
  });

  it("formats the substitute reply text", () => {
    expect(chatFailureText("HTTP 500")).toBe("Error calling chat model: HTTP 500");
  });
});

describe("safeEmbed()", () => {
  it("accepts a vector of finite numbers", async () => {
    const embed = vi.fn<EmbedCapability>(async () => [0.5, -0.25]);
    await expect(safeEmbed(embed, "x")).resolves.toEqual({ ok: true, value: [0.5, -0.25] });
  });

  it("rejects empty vectors and non-finite components", async () => {
    await expect(safeEmbed(async () => [], "x")).resolves.toEqual({
      ok: false,
      error: "embed capability returned no vector",
    });
    await expect(safeEmbed(async () => [1, Number.NaN], "x")).resolves.toEqual({
      ok: false,
      error: "embed capability returned a non-numeric component",
    });
  });
});
