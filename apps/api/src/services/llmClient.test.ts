import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ProviderError, RequestAbortedError } from "./errors.js";
import { extractCompletionText, HttpChatClient, UsageTally, type ChatMessage } from "./llmClient.js";

const messages: ChatMessage[] = [
  { role: "system", content: "Be brief." },
  { role: "user", content: "Say hi." }
];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function chatBody(content: string, model = "test-model") {
  return {
    model,
    choices: [{ message: { role: "assistant", content } }],
    usage: { prompt_tokens: 7, completion_tokens: 3, total_tokens: 10 }
  };
}

const fetchMock = vi.fn<typeof fetch>();

function requestBody(call: number): { model: string; temperature: number; messages: ChatMessage[] } {
  return JSON.parse(String(fetchMock.mock.calls[call][1]?.body));
}

function client(overrides: Partial<ConstructorParameters<typeof HttpChatClient>[0]> = {}) {
  return new HttpChatClient({
    apiUrl: "https://llm.test/v1/chat/completions",
    apiKey: "test-secret",
    model: "test-model",
    retryDelayMs: 0,
    ...overrides
  });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("HttpChatClient", () => {
  it("posts an OpenAI-style chat request and reads the reply", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(chatBody("hi")));

    const result = await client().complete(messages, { temperature: 0.2 });

    expect(result).toEqual({ text: "hi", model: "test-model", usage: { promptTokens: 7, completionTokens: 3, totalTokens: 10 } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    expect(requestBody(0)).toEqual({ model: "test-model", messages, temperature: 0.2 });
  });

  it("accepts the plain-text completion shape", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ text: "plain" }] }));
    const result = await client().complete(messages, { temperature: 0 });
    expect(result).toEqual({ text: "plain", model: "test-model", usage: null });
  });

  it("joins content parts", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: [{ type: "text", text: "a" }, { type: "text", text: "b" }] } }] })
    );
    expect((await client().complete(messages, { temperature: 0 })).text).toBe("ab");
  });

  it("retries 5xx responses and succeeds", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("upstream down", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse(chatBody("recovered")));

    const result = await client().complete(messages, { temperature: 0 });
    expect(result.text).toBe("recovered");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("retries network failures with status 0", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed")).mockResolvedValueOnce(jsonResponse(chatBody("ok")));
    expect((await client().complete(messages, { temperature: 0 })).text).toBe("ok");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after maxRetries", async () => {
    fetchMock.mockImplementation(async () => new Response("boom", { status: 500 }));

    const err = await client({ maxRetries: 2 }).complete(messages, { temperature: 0 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ providerStatus: 500, detail: "boom", status: 502 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("does not retry other client errors", async () => {
    fetchMock.mockResolvedValueOnce(new Response("bad auth", { status: 401 }));
    await expect(client().complete(messages, { temperature: 0 })).rejects.toMatchObject({ providerStatus: 401 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("switches to the fallback model when the model is rejected", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('{"error":"model not found"}', { status: 404 }))
      .mockResolvedValueOnce(jsonResponse(chatBody("from fallback", "small-model")));

    const result = await client({ fallbackModel: "small-model" }).complete(messages, { temperature: 0 });
    expect(result).toMatchObject({ text: "from fallback", model: "small-model" });
    expect(requestBody(0).model).toBe("test-model");
    expect(requestBody(1).model).toBe("small-model");
  });

  it("does not fall back on unrelated 400s", async () => {
    fetchMock.mockResolvedValueOnce(new Response("messages too long", { status: 400 }));
    await expect(client({ fallbackModel: "small-model" }).complete(messages, { temperature: 0 })).rejects.toMatchObject({
      providerStatus: 400
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects non-JSON and unexpected bodies", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
    await expect(client().complete(messages, { temperature: 0 })).rejects.toThrow("LLM response was not JSON");

    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [] }));
    await expect(client().complete(messages, { temperature: 0 })).rejects.toThrow("Unexpected LLM response shape");
  });

  it("stops before calling when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(client().complete(messages, { temperature: 0, signal: controller.signal })).rejects.toBeInstanceOf(
      RequestAbortedError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("extractCompletionText", () => {
  it("returns null without choices", () => {
    expect(extractCompletionText({})).toBeNull();
    expect(extractCompletionText({ choices: [{ message: { content: null } }] })).toBeNull();
  });
});

describe("UsageTally", () => {
  it("counts every call and sums reported tokens", () => {
    const tally = new UsageTally();
    tally.add({ promptTokens: 5, completionTokens: 2, totalTokens: 7 });
    tally.add(null);
    tally.add({ promptTokens: 1, completionTokens: 1, totalTokens: 2 });
    expect(tally.toJSON()).toEqual({ calls: 3, promptTokens: 6, completionTokens: 3, totalTokens: 9 });
  });
});
