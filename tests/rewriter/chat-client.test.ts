import { describe, it, expect } from "vitest";
import { OpenRouterClient } from "../../src/rewriter/chat-client.js";

describe("OpenRouterClient", () => {
  it("posts the transcript and returns the first choice", async () => {
    let sent: { url: string; init?: RequestInit } | undefined;
    const client = new OpenRouterClient({
      apiKey: "test-secret",
      model: "test/model",
      baseUrl: "http://llm.test/api/v1/",
      fetch: async (input, init) => {
        sent = { url: String(input), init };
        return new Response(JSON.stringify({ choices: [{ message: { content: "hello" } }] }), {
          status: 200,
        });
      },
    });

    const reply = await client.complete({
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.3,
      maxTokens: 10,
    });

    expect(reply).toBe("hello");
    expect(sent?.url).toBe("http://llm.test/api/v1/chat/completions");
    expect(sent?.init?.headers).toEqual({
      authorization: "Bearer test-secret",
      "content-type": "application/json",
    });
    expect(JSON.parse(String(sent?.init?.body))).toEqual({
      model: "test/model",
      messages: [{ role: "user", content: "hi" }],
      temperature: 0.3,
      max_tokens: 10,
    });
  });

  it("throws with the body of a failed call", async () => {
    const client = new OpenRouterClient({
      apiKey: "test-secret",
      model: "test/model",
      baseUrl: "http://llm.test/api/v1",
      fetch: async () => new Response("rate limited", { status: 429 }),
    });
    await expect(
      client.complete({ messages: [{ role: "user", content: "hi" }] })
    ).rejects.toThrow("Chat completion failed: 429 rate limited");
  });

  it("throws when the completion has no content", async () => {
    const client = new OpenRouterClient({
      apiKey: "test-secret",
      model: "test/model",
      baseUrl: "http://llm.test/api/v1",
      fetch: async () =>
        new Response(JSON.stringify({ choices: [{ message: { content: null } }] })),
    });
    await expect(
      client.complete({ messages: [{ role: "user", content: "hi" }] })
    ).rejects.toThrow("Chat completion returned no content");
  });
});
