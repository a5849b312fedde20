import Anthropic from "@anthropic-ai/sdk";
import type { AIProvider, AIResponse, GenerateOptions } from "./types.js";

export class AnthropicProvider implements AIProvider {
  readonly name = "anthropic";
  private client: Anthropic | undefined;

  constructor(private readonly apiKey: string | undefined = process.env.ANTHROPIC_API_KEY) {}

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.apiKey) {
        throw new Error(
          "ANTHROPIC_API_KEY environment variable is required for the anthropic provider."
        );
      }
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<AIResponse> {
    const start = Date.now();
    const response = await this.getClient().messages.create(
      {
        model: options.model,
        max_tokens: options.maxTokens,
        // Anthropic caps temperature at 1
        temperature: Math.min(options.temperature, 1),
        messages: [{ role: "user", content: prompt }],
      },
      { timeout: options.timeoutMs }
    );

    let content = "";
    for (const block of response.content) {
      if (block.type === "text") {
        content = block.text;
        break;
      }
    }

    return {
      content,
      model: options.model,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
      responseTime: Date.now() - start,
    };
  }

  async listModels(): Promise<string[]> {
    const models: string[] = [];
    for await (const model of this.getClient().models.list()) {
      models.push(model.id);
    }
    return models;
  }
}
