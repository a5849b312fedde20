import type { AIAnalysisResult } from "../ai/types.js";
import type { ScrapeResult } from "../scraper/types.js";

export type Priority = "high" | "medium" | "low";
export type TestType = "functional" | "validation" | "performance";
export type GherkinLanguage = "english" | "turkish";

export interface BDDScenario {
  feature: string;
  scenario: string;
  given: string[];
  when: string[];
  then: string[];
  tags: string[];
  priority: Priority;
  testType: TestType;
}

export interface BDDFeature {
  name: string;
  description: string;
  scenarios: BDDScenario[];
  background?: string;
  tags: string[];
}

/**
 * Collaborator that turns page structure and model output into features.
 * Feature order is generation order and must be stable for a given input.
 */
export interface FeatureGenerator {
  generateFeatures(scrape: ScrapeResult, analysis: AIAnalysisResult): BDDFeature[];
  writeFeatureFiles(features: readonly BDDFeature[], dir: string): Promise<string[]>;
}
