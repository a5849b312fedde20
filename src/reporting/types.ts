import type { AIAnalysisResult } from "../ai/types.js";
import type { TestExecutionResult } from "../automation/types.js";
import type { BDDFeature } from "../bdd/types.js";
import type { PerformanceMetrics } from "../orchestrator/types.js";
import type { ScrapeResult } from "../scraper/types.js";

export interface ReportInput {
  testResults: TestExecutionResult;
  features: readonly BDDFeature[];
  scrapeResult: ScrapeResult;
  aiAnalysis: AIAnalysisResult;
  metrics: PerformanceMetrics;
}

/**
 * Collaborator that writes the run's reports. Returns report format to
 * file path for every format it wrote.
 */
export interface ReportRenderer {
  generateReports(input: ReportInput, outputDir: string): Promise<Record<string, string>>;
}
