import { afterEach, describe, expect, it, vi } from "vitest";
import { emptyAnalysis } from "../src/ai/analysis.js";
import { AnthropicProvider } from "../src/ai/anthropic.js";
import { AIClient, createProvider } from "../src/ai/client.js";
import { OllamaProvider } from "../src/ai/ollama.js";
import type { AIProvider, GenerateOptions } from "../src/ai/types.js";
import { aiSettingsSchema, bddSettingsSchema } from "../src/config/schema.js";

function fakeProvider() {
  const prompts: { prompt: string; options: GenerateOptions }[] = [];
  const provider: AIProvider = {
    name: "fake",
    generate: (prompt, options) => {
      prompts.push({ prompt, options });
      return Promise.resolve({ content: "{}", model: options.model, tokensUsed: 4, responseTime: 2 });
    },
    listModels: () => Promise.resolve(["fake-model"]),
  };
  return { provider, prompts };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("AIClient", () => {
  it("sends the analysis prompt with the configured generation options", async () => {
    const { provider, prompts } = fakeProvider();
    const client = new AIClient(aiSettingsSchema.parse({}), bddSettingsSchema.parse({}), provider);

    const response = await client.analyzeHtml("<form></form>", "https://example.com", "test-model");

    expect(response.content).toBe("{}");
    expect(prompts).toHaveLength(1);
    expect(prompts[0].prompt).toContain("URL: https://example.com");
    expect(prompts[0].options).toEqual({
      model: "test-model",
      temperature: 0.7,
      maxTokens: 2048,
      timeoutMs: 60000,
    });
  });

  it("asks for BDD scenarios and lists models through the provider", async () => {
    const { provider, prompts } = fakeProvider();
    const client = new AIClient(aiSettingsSchema.parse({}), bddSettingsSchema.parse({}), provider);

    await client.generateBddScenarios(emptyAnalysis("some page notes"), "test-model");

    expect(prompts[0].prompt).toContain("some page notes");
    await expect(client.listModels()).resolves.toEqual(["fake-model"]);
  });
});

describe("createProvider", () => {
  it("picks the provider named in the settings", () => {
    expect(createProvider(aiSettingsSchema.parse({ provider: "anthropic" })).name).toBe("anthropic");
    expect(createProvider(aiSettingsSchema.parse({ provider: "localai" })).name).toBe("ollama");
  });
});

describe("OllamaProvider", () => {
  const options: GenerateOptions = { model: "test-model", temperature: 0.2, maxTokens: 100, timeoutMs: 1000 };

  it("posts to /api/generate and reads the completion", async () => {
    const fetchMock = vi.fn((_url: string, _init?: RequestInit) =>
      Promise.resolve(new Response(JSON.stringify({ response: "hello", eval_count: 12 }), { status: 200 }))
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await new OllamaProvider("http://localhost:11434/", 1000).generate("hi", options);

    expect(response).toMatchObject({ content: "hello", model: "test-model", tokensUsed: 12 });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:11434/api/generate");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      prompt: "hi",
      stream: false,
      options: { temperature: 0.2, num_predict: 100 },
    });
  });

  it("raises on an HTTP error", async () => {
    vi.stubGlobal("fetch", vi.fn(() => Promise.resolve(new Response("oops", { status: 500 }))));

    await expect(new OllamaProvider("http://localhost:11434", 1000).generate("hi", options)).rejects.toThrow(
      "AI request failed with HTTP 500: oops"
    );
  });

  it("lists model names from /api/tags", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(() =>
        Promise.resolve(
          new Response(JSON.stringify({ models: [{ name: "llama3:latest" }, { name: "mistral" }] }), {
            status: 200,
          })
        )
      )
    );

    await expect(new OllamaProvider("http://localhost:11434", 1000).listModels()).resolves.toEqual([
      "llama3:latest",
      "mistral",
    ]);
  });
});

describe("AnthropicProvider", () => {
  it("needs an API key before it sends anything", async () => {
    await expect(new AnthropicProvider("").generate("hi", { model: "m", temperature: 0, maxTokens: 1, timeoutMs: 1 })).rejects.toThrow(
      "ANTHROPIC_API_KEY environment variable is required for the anthropic provider."
    );
  });
});
