import { describe, it, expect, beforeAll, vi } from "vitest";
import { ChatRelay, parseCommand, type CompletionClient } from "../src/lib/chat-relay.js";
import { ExternalApiError } from "../src/lib/errors.js";
import { configureLogging } from "../src/lib/logger.js";

function fakeClient(reply = "assistant reply") {
  return {
    complete: vi.fn(async (_channelId: string, _text: string) => reply),
  } satisfies CompletionClient;
}

describe("ChatRelay", () => {
  beforeAll(() => {
    configureLogging({ console: false });
  });

  it("never calls the API for a channel outside the allow-set", async () => {
    const client = fakeClient();
    const relay = new ChatRelay({ client, allowedChannels: new Set(["111", "222"]) });

    await expect(relay.onMessage("333", "hello?")).resolves.toBeNull();
    expect(client.complete).not.toHaveBeenCalled();
  });

  it("calls the API exactly once and returns its reply unmodified", async () => {
    const reply = "  Line one【4:0†faq.json】\n\nLine two  ";
    const client = fakeClient(reply);
    const relay = new ChatRelay({ client, allowedChannels: new Set(["111"]) });

    await expect(relay.onMessage("111", "What is X?")).resolves.toBe(reply);
    expect(client.complete).toHaveBeenCalledTimes(1);
    expect(client.complete).toHaveBeenCalledWith("111", "What is X?");
  });

  it("answers everywhere when no allow-set is configured", async () => {
    const client = fakeClient("ok");
    const relay = new ChatRelay({ client, allowedChannels: new Set() });

    expect(relay.isAllowed("999")).toBe(true);
    await expect(relay.onMessage("999", "hi")).resolves.toBe("ok");
  });

  it("ignores blank text", async () => {
    const client = fakeClient();
    const relay = new ChatRelay({ client, allowedChannels: new Set(["111"]) });

    await expect(relay.onMessage("111", "   ")).resolves.toBeNull();
    expect(client.complete).not.toHaveBeenCalled();
  });

  it("propagates API errors", async () => {
    const client = fakeClient();
    client.complete.mockRejectedValue(new ExternalApiError("openai", "Run failed (HTTP 429)"));
    const relay = new ChatRelay({ client, allowedChannels: new Set() });

    await expect(relay.onMessage("111", "hi")).rejects.toBeInstanceOf(ExternalApiError);
  });
});

describe("parseCommand", () => {
  it("returns the question after the command", () => {
    expect(parseCommand("!ava What is X?", "!", "ava")).toBe("What is X?");
  });

  it("keeps multi-line questions", () => {
    expect(parseCommand("!ava first line\nsecond line", "!", "ava")).toBe("first line\nsecond line");
  });

  it("returns an empty string for a bare command", () => {
    expect(parseCommand("!ava", "!", "ava")).toBe("");
    expect(parseCommand("  !AVA  ", "!", "ava")).toBe("");
  });

  it("returns null for other messages", () => {
    expect(parseCommand("ava what?", "!", "ava")).toBeNull();
    expect(parseCommand("!avatar please", "!", "ava")).toBeNull();
    expect(parseCommand("!help", "!", "ava")).toBeNull();
    expect(parseCommand("", "!", "ava")).toBeNull();
  });

  it("supports multi-character prefixes", () => {
    expect(parseCommand("?? ava ask", "??", "ava")).toBeNull();
    expect(parseCommand("??ava ask", "??", "ava")).toBe("ask");
  });
});
