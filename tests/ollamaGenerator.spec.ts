import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BackendCallFailedError } from "../src/errors";
import { OllamaGenerator, extractResponseText } from "../src/generation/ollamaGenerator";
import { resolveRequest } from "../src/generation/roles";
import { memoryLogger } from "./helpers";

const BASE_URL = "http://ollama.test";

function parseBody(body: unknown): unknown {
  return typeof body === "string" ? JSON.parse(body) : undefined;
}

describe("OllamaGenerator", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  function createGenerator() {
    const { logger, sink } = memoryLogger();
    const generator = new OllamaGenerator({
      baseUrl: BASE_URL,
      model: "llama3.2",
      timeoutMs: 1000,
      probeTimeoutMs: 500,
      logger,
      dispatcher: agent
    });
    return { generator, sink };
  }

  test("posts the composed prompt to /api/generate", async () => {
    let sent: unknown;
    agent
      .get(BASE_URL)
      .intercept({ path: "/api/generate", method: "POST" })
      .reply((opts) => {
        sent = parseBody(opts.body);
        return { statusCode: 200, data: { response: "  A capsule.  " } };
      });

    const { generator } = createGenerator();
    const text = await generator.generate(
      resolveRequest({ prompt: "Idea", systemPrompt: "System", temperature: 0.3 }, { temperature: 0.7, maxRetries: 0 })
    );

    expect(text).toBe("A capsule.");
    expect(sent).toEqual({
      model: "llama3.2",
      prompt: "System\n\nIdea",
      stream: false,
      options: { temperature: 0.3 }
    });
  });

  test("falls back to /api/chat with role-tagged messages on 404", async () => {
    let sent: unknown;
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: "/api/generate", method: "POST" }).reply(404, "404 page not found");
    pool.intercept({ path: "/api/chat", method: "POST" }).reply((opts) => {
      sent = parseBody(opts.body);
      return { statusCode: 200, data: { message: { role: "assistant", content: "From chat" } } };
    });

    const { generator, sink } = createGenerator();
    const text = await generator.generate(
      resolveRequest({ prompt: "Idea", systemPrompt: "System" }, { temperature: 0.5, maxRetries: 0 })
    );

    expect(text).toBe("From chat");
    expect(sent).toEqual({
      model: "llama3.2",
      messages: [
        { role: "system", content: "System" },
        { role: "user", content: "Idea" }
      ],
      stream: false,
      options: { temperature: 0.5 }
    });
    expect(sink.lines.some((l) => l.includes("retrying with /api/chat"))).toBe(true);
  });

  test("retries a failing status max_retries + 1 times, then throws", async () => {
    let calls = 0;
    agent
      .get(BASE_URL)
      .intercept({ path: "/api/generate", method: "POST" })
      .reply(() => {
        calls++;
        return { statusCode: 500, data: "model crashed" };
      })
      .persist();

    const { generator, sink } = createGenerator();
    const failure = await generator
      .generate(resolveRequest({ prompt: "Idea" }, { temperature: 0.7, maxRetries: 2 }))
      .catch((error: unknown) => error);

    expect(calls).toBe(3);
    expect(failure).toBeInstanceOf(BackendCallFailedError);
    if (failure instanceof BackendCallFailedError) {
      expect(failure.statusCode).toBe(500);
      expect(failure.attempts).toBe(3);
      expect(failure.body).toBe("model crashed");
      expect(failure.message).toBe("Ollama request failed (500) (after 3 attempts)");
    }
    expect(sink.lines.filter((l) => l.includes("Generation attempt failed"))).toHaveLength(3);
  });

  test("treats an unrecognized payload as a failed attempt", async () => {
    agent
      .get(BASE_URL)
      .intercept({ path: "/api/generate", method: "POST" })
      .reply(200, { done: true });

    const { generator } = createGenerator();
    await expect(
      generator.generate(resolveRequest({ prompt: "Idea" }, { temperature: 0.7, maxRetries: 0 }))
    ).rejects.toThrow("Ollama returned a malformed payload (after 1 attempt)");
  });

  test("recovers when a later attempt succeeds", async () => {
    const pool = agent.get(BASE_URL);
    pool.intercept({ path: "/api/generate", method: "POST" }).reply(503, "busy");
    pool.intercept({ path: "/api/generate", method: "POST" }).reply(200, { response: "second try" });

    const { generator } = createGenerator();
    await expect(
      generator.generate(resolveRequest({ prompt: "Idea" }, { temperature: 0.7, maxRetries: 1 }))
    ).resolves.toBe("second try");
  });

  describe("isAvailable", () => {
    test("is true when the model is listed under its :latest tag", async () => {
      agent
        .get(BASE_URL)
        .intercept({ path: "/api/tags", method: "GET" })
        .reply(200, { models: [{ name: "llama3.2:latest", model: "llama3.2:latest" }] });

      await expect(createGenerator().generator.isAvailable()).resolves.toBe(true);
    });

    test("is false when the model is missing", async () => {
      agent
        .get(BASE_URL)
        .intercept({ path: "/api/tags", method: "GET" })
        .reply(200, { models: [{ name: "mistral:latest" }] });

      await expect(createGenerator().generator.isAvailable()).resolves.toBe(false);
    });

    test("is false on a non-200 reply", async () => {
      agent.get(BASE_URL).intercept({ path: "/api/tags", method: "GET" }).reply(500, "down");

      await expect(createGenerator().generator.isAvailable()).resolves.toBe(false);
    });

    test("is false when the server cannot be reached", async () => {
      await expect(createGenerator().generator.isAvailable()).resolves.toBe(false);
    });
  });
});

describe("extractResponseText", () => {
  test("normalizes both endpoint shapes", () => {
    expect(extractResponseText({ response: "flat" })).toBe("flat");
    expect(extractResponseText({ message: { content: "nested" } })).toBe("nested");
    expect(extractResponseText("bare")).toBe("bare");
  });

  test("returns undefined for anything else", () => {
    expect(extractResponseText({ message: {} })).toBeUndefined();
    expect(extractResponseText(null)).toBeUndefined();
    expect(extractResponseText([1, 2])).toBeUndefined();
  });
});
