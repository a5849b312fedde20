import type { BDDFeature } from "../bdd/types.js";
import type { ScrapeResult } from "../scraper/types.js";

export type TestStatus = "passed" | "failed" | "skipped";

export interface TestCaseResult {
  name: string;
  feature: string;
  status: TestStatus;
  /** Milliseconds. */
  duration: number;
  error?: string;
  screenshotPath?: string;
}

export interface TestExecutionResult {
  readonly name: string;
  readonly tests: readonly TestCaseResult[];
  readonly startTime: Date;
  readonly endTime: Date;
  /** Milliseconds. */
  readonly totalDuration: number;
  readonly passedCount: number;
  readonly failedCount: number;
  readonly skippedCount: number;
}

export type TestAction =
  | { type: "navigate"; url: string; description: string }
  | { type: "click"; role: "button" | "link"; name: string; description: string }
  | { type: "submit"; selector: string; description: string }
  | { type: "fill"; selector: string; value: string; description: string }
  | { type: "loadWithin"; ms: number; description: string }
  | { type: "assertVisible"; selector: string; description: string };

export interface PlannedTest {
  id: string;
  name: string;
  feature: string;
  skip: boolean;
  actions: TestAction[];
}

export interface TestSuiteOptions {
  outputDir: string;
  headless: boolean;
  parallel: boolean;
}

/**
 * Collaborator that turns features into a runnable test suite on disk and
 * runs it.
 */
export interface TestSuiteGenerator {
  generateTestSuite(
    features: readonly BDDFeature[],
    scrape: ScrapeResult,
    options: TestSuiteOptions
  ): Promise<string>;
  runTests(suitePath: string): Promise<TestExecutionResult>;
}
