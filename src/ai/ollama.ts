import { z } from "zod";
import type { AIProvider, AIResponse, GenerateOptions } from "./types.js";

const generateResponseSchema = z.object({
  response: z.string().default(""),
  eval_count: z.number().default(0),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Talks the Ollama HTTP API (`/api/generate`, `/api/tags`). LocalAI and
 * custom servers exposing the same endpoints work through it too.
 */
export class OllamaProvider implements AIProvider {
  readonly name = "ollama";

  constructor(
    private readonly baseUrl: string,
    private readonly listTimeoutMs: number
  ) {}

  private url(path: string): string {
    return `${this.baseUrl.replace(/\/+$/, "")}${path}`;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<AIResponse> {
    const start = Date.now();
    const response = await fetch(this.url("/api/generate"), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: options.model,
        prompt,
        stream: false,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
      }),
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`AI request failed with HTTP ${response.status}: ${body.slice(0, 200)}`);
    }

    const payload = generateResponseSchema.parse(await response.json());
    return {
      content: payload.response,
      model: options.model,
      tokensUsed: payload.eval_count,
      responseTime: Date.now() - start,
    };
  }

  async listModels(): Promise<string[]> {
    const response = await fetch(this.url("/api/tags"), {
      signal: AbortSignal.timeout(this.listTimeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Model listing failed with HTTP ${response.status}`);
    }
    const payload = tagsResponseSchema.parse(await response.json());
    return payload.models.map((model) => model.name);
  }
}
