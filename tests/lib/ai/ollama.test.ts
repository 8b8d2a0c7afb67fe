import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createOllamaClient } from "@/lib/ai/ollama";
import { SYSTEM_PROMPT, buildPrompt } from "@/lib/ai/system";
import type { GenerationConfig } from "@/lib/config";

const config: GenerationConfig = {
  provider: "ollama",
  model: "mistral",
  temperature: 0.3,
  maxTokens: 500,
  timeoutMs: 60_000,
  ollamaUrl: "http://localhost:11434/",
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("createOllamaClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a non-streaming request and maps the reply", async () => {
    fetchMock.mockResolvedValueOnce(
      json({ response: "Flipkart is valued at $37.6 B.", model: "mistral:latest", total_duration: 2_500_000_000, eval_count: 42 }),
    );
    const client = createOllamaClient(config);
    const result = await client.generate("Tell me about Flipkart", "**Company: Flipkart**");

    expect(result).toEqual({
      content: "Flipkart is valued at $37.6 B.",
      model: "mistral:latest",
      success: true,
      totalDurationMs: 2500,
      evalCount: 42,
    });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:11434/api/generate");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "mistral",
      prompt: buildPrompt("Tell me about Flipkart", "**Company: Flipkart**"),
      system: SYSTEM_PROMPT,
      stream: false,
      options: { temperature: 0.3, num_predict: 500 },
    });
  });

  it("defaults missing counters", async () => {
    fetchMock.mockResolvedValueOnce(json({ response: "ok" }));
    const result = await createOllamaClient(config).generate("q", "c");
    expect(result).toEqual({ content: "ok", model: "mistral", success: true, totalDurationMs: 0, evalCount: 0 });
  });

  it("reports the status and body of a failed request", async () => {
    fetchMock.mockResolvedValueOnce(new Response("model 'mistral' not found", { status: 404 }));
    const result = await createOllamaClient(config).generate("q", "c");
    expect(result).toEqual({
      content: "",
      model: "mistral",
      success: false,
      error: "HTTP 404: model 'mistral' not found",
    });
  });

  it("rejects a body without a response field", async () => {
    fetchMock.mockResolvedValueOnce(json({ done: true }));
    const result = await createOllamaClient(config).generate("q", "c");
    expect(result.success).toBe(false);
    expect(result.error).toBe('Malformed response from Ollama at "response": Required');
  });

  it("rejects a body that is not JSON", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
    const result = await createOllamaClient(config).generate("q", "c");
    expect(result.success).toBe(false);
    expect(result.error?.startsWith("Malformed response from Ollama: ")).toBe(true);
  });

  it("explains a refused connection", async () => {
    fetchMock.mockRejectedValueOnce(
      new TypeError("fetch failed", {
        cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:11434"), { code: "ECONNREFUSED" }),
      }),
    );
    const result = await createOllamaClient(config).generate("q", "c");
    expect(result.error).toBe(
      "Cannot connect to Ollama at http://localhost:11434. Make sure it is running: `ollama serve`",
    );
  });

  it("reports a timeout with the configured duration", async () => {
    fetchMock.mockRejectedValueOnce(new DOMException("The operation was aborted due to timeout", "TimeoutError"));
    const result = await createOllamaClient(config).generate("q", "c");
    expect(result).toEqual({
      content: "",
      model: "mistral",
      success: false,
      error: "Request timed out after 60s. The model may be loading or overloaded.",
    });
  });

  it("checks health against the tags endpoint", async () => {
    fetchMock.mockResolvedValueOnce(json({ models: [] }));
    const client = createOllamaClient(config);
    expect((await client.health()).ok).toBe(true);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:11434/api/tags");

    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const down = await client.health();
    expect(down.ok).toBe(false);
    expect(down.message).toBe("fetch failed");
  });

  it("lists pulled models", async () => {
    fetchMock.mockResolvedValueOnce(json({ models: [{ name: "mistral:latest" }, { name: "llama3:8b" }] }));
    expect(await createOllamaClient(config).listModels()).toEqual(["mistral:latest", "llama3:8b"]);
  });
});
