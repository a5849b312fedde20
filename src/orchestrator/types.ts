import type { AIAnalysisResult, PageAnalyst } from "../ai/types.js";
import type { TestExecutionResult, TestSuiteGenerator } from "../automation/types.js";
import type { BDDFeature, FeatureGenerator } from "../bdd/types.js";
import type { ReportRenderer } from "../reporting/types.js";
import type { PageScraper, ScrapeResult } from "../scraper/types.js";

export type PipelineStage =
  | "scraping"
  | "analyzing"
  | "generatingBdd"
  | "generatingTests"
  | "executing"
  | "reporting";

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  "scraping",
  "analyzing",
  "generatingBdd",
  "generatingTests",
  "executing",
  "reporting",
];

export type PipelineState =
  | { kind: "idle" }
  | { kind: "running"; stage: PipelineStage }
  | { kind: "done" }
  | { kind: "failed"; stage: PipelineStage };

export interface StageTransition {
  state: PipelineState;
  at: Date;
}

/**
 * Parameters of one run. Built once at run start and frozen.
 */
export interface RunConfiguration {
  readonly url: string;
  readonly aiModel: string;
  readonly outputDir: string;
  readonly headless: boolean;
  readonly parallelTests: boolean;
  readonly generateReports: boolean;
  readonly saveArtifacts: boolean;
}

export type RunOverrides = Partial<Omit<RunConfiguration, "url">>;

/**
 * Timings of the current run. Durations are milliseconds; every field is
 * null until its stage has finished.
 */
export interface PerformanceMetrics {
  readonly startTime: Date | null;
  readonly endTime: Date | null;
  readonly pageLoadTime: number | null;
  readonly aiResponseTime: number | null;
  readonly testExecutionTime: number | null;
  readonly totalExecutionTime: number | null;
}

export interface ExecutionResult {
  readonly success: boolean;
  /** Milliseconds. */
  readonly totalExecutionTime: number;
  readonly scrapeResult: ScrapeResult | null;
  readonly aiAnalysis: AIAnalysisResult | null;
  readonly features: readonly BDDFeature[];
  readonly testResults: TestExecutionResult | null;
  /** Report format to written file path. */
  readonly reports: Readonly<Record<string, string>>;
  readonly errorMessage?: string;
  readonly failedStage?: PipelineStage;
  readonly artifactsSaved: boolean;
  readonly metrics: PerformanceMetrics;
}

export interface ExecutionStatus {
  readonly metrics: PerformanceMetrics;
  readonly configValid: boolean;
  readonly availableModels: readonly string[];
}

export interface Collaborators {
  scraper: PageScraper;
  analyst: PageAnalyst;
  featureGenerator: FeatureGenerator;
  testGenerator: TestSuiteGenerator;
  reportRenderer: ReportRenderer;
}
