export type {
  AIResponse,
  AIProvider,
  AIAnalysisResult,
  GenerateOptions,
  PageAnalyst,
} from "./types.js";
export {
  normalizeAnalysis,
  classifyAnalysis,
  emptyAnalysis,
  extractJson,
  type HtmlAnalysis,
  type AnalysisOutcome,
  type StructuredAnalysis,
  type AnalyzedForm,
  type AnalyzedField,
  type AnalyzedButton,
  type AnalyzedLink,
  type NavigationItem,
} from "./analysis.js";
export { AIClient, createProvider } from "./client.js";
export { AnthropicProvider } from "./anthropic.js";
export { OllamaProvider } from "./ollama.js";
export { buildAnalysisPrompt, buildBddPrompt } from "./prompts.js";
