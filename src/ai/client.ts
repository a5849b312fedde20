import type { AiSettings, BddSettings } from "../config/schema.js";
import { log } from "../utils/logger.js";
import type { HtmlAnalysis } from "./analysis.js";
import { AnthropicProvider } from "./anthropic.js";
import { OllamaProvider } from "./ollama.js";
import { buildAnalysisPrompt, buildBddPrompt } from "./prompts.js";
import type { AIProvider, AIResponse, GenerateOptions, PageAnalyst } from "./types.js";

export function createProvider(settings: AiSettings): AIProvider {
  switch (settings.provider) {
    case "anthropic":
      return new AnthropicProvider();
    case "ollama":
    case "localai":
    case "custom":
      return new OllamaProvider(settings.api_url, settings.timeout * 1000);
  }
}

export class AIClient implements PageAnalyst {
  private readonly provider: AIProvider;

  constructor(
    private readonly settings: AiSettings,
    private readonly bdd: BddSettings,
    provider?: AIProvider
  ) {
    this.provider = provider ?? createProvider(settings);
  }

  private options(model: string): GenerateOptions {
    return {
      model,
      temperature: this.settings.temperature,
      maxTokens: this.settings.max_tokens,
      timeoutMs: this.settings.timeout * 1000,
    };
  }

  private async request(prompt: string, model: string): Promise<AIResponse> {
    log.debug(`Sending prompt to ${this.provider.name} (model: ${model})`);
    const response = await this.provider.generate(prompt, this.options(model));
    log.debug(
      `Response from ${model} in ${response.responseTime}ms (${response.tokensUsed} tokens)`
    );
    return response;
  }

  analyzeHtml(html: string, url: string, model: string): Promise<AIResponse> {
    return this.request(buildAnalysisPrompt(url, html), model);
  }

  generateBddScenarios(analysis: HtmlAnalysis, model: string): Promise<AIResponse> {
    return this.request(buildBddPrompt(analysis, this.bdd), model);
  }

  listModels(): Promise<string[]> {
    return this.provider.listModels();
  }
}
