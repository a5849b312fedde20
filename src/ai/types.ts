import type { HtmlAnalysis } from "./analysis.js";

export interface AIResponse {
  content: string;
  model: string;
  tokensUsed: number;
  /** Milliseconds. */
  responseTime: number;
}

export interface GenerateOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * A model backend: one prompt in, one completion out.
 */
export interface AIProvider {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<AIResponse>;
  listModels(): Promise<string[]>;
}

/**
 * Collaborator the pipeline uses for everything model-related.
 */
export interface PageAnalyst {
  analyzeHtml(html: string, url: string, model: string): Promise<AIResponse>;
  generateBddScenarios(analysis: HtmlAnalysis, model: string): Promise<AIResponse>;
  listModels(): Promise<string[]>;
}

export interface AIAnalysisResult {
  readonly htmlAnalysis: HtmlAnalysis;
  /** Gherkin text returned by the model; may be empty. */
  readonly bddContent: string;
  readonly aiModel: string;
  readonly tokensUsed: number;
  /** Milliseconds spent in the analysis stage. */
  readonly responseTime: number;
}
