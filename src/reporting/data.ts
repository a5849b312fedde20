import type { TestStatus } from "../automation/types.js";
import { summarizeFeatures, type FeatureSummary } from "../bdd/summary.js";
import type { Priority, TestType } from "../bdd/types.js";
import type { PerformanceMetrics } from "../orchestrator/types.js";
import type { ReportInput } from "./types.js";

export interface ReportData {
  timestamp: string;
  summary: {
    url: string;
    title: string;
    totalTests: number;
    passed: number;
    failed: number;
    skipped: number;
    /** Percentage of all tests that passed, one decimal. */
    successRate: number;
    duration: number;
  };
  tests: {
    name: string;
    feature: string;
    status: TestStatus;
    duration: number;
    error: string | null;
    screenshotPath: string | null;
  }[];
  scenarios: {
    feature: string;
    scenario: string;
    priority: Priority;
    testType: TestType;
    tags: string[];
    given: string[];
    when: string[];
    then: string[];
  }[];
  bddSummary: FeatureSummary;
  scrape: {
    url: string;
    title: string;
    statusCode: number;
    loadTime: number;
    forms: number;
    links: number;
    buttons: number;
    inputs: number;
    images: number;
  };
  analysis: {
    aiModel: string;
    source: "structured" | "raw";
    tokensUsed: number;
    responseTime: number;
    forms: number;
    buttons: number;
    links: number;
    navigation: number;
  };
  metrics: {
    startTime: string | null;
    endTime: string | null;
    pageLoadTime: number | null;
    aiResponseTime: number | null;
    testExecutionTime: number | null;
    totalExecutionTime: number | null;
  };
}

function serializeMetrics(metrics: PerformanceMetrics): ReportData["metrics"] {
  return {
    startTime: metrics.startTime?.toISOString() ?? null,
    endTime: metrics.endTime?.toISOString() ?? null,
    pageLoadTime: metrics.pageLoadTime,
    aiResponseTime: metrics.aiResponseTime,
    testExecutionTime: metrics.testExecutionTime,
    totalExecutionTime: metrics.totalExecutionTime,
  };
}

export function createReportData(input: ReportInput, now: Date = new Date()): ReportData {
  const { testResults, features, scrapeResult, aiAnalysis, metrics } = input;
  const totalTests = testResults.tests.length;
  const successRate =
    totalTests === 0 ? 0 : Math.round((testResults.passedCount / totalTests) * 1000) / 10;

  return {
    timestamp: now.toISOString(),
    summary: {
      url: scrapeResult.url,
      title: scrapeResult.title,
      totalTests,
      passed: testResults.passedCount,
      failed: testResults.failedCount,
      skipped: testResults.skippedCount,
      successRate,
      duration: testResults.totalDuration,
    },
    tests: testResults.tests.map((test) => ({
      name: test.name,
      feature: test.feature,
      status: test.status,
      duration: test.duration,
      error: test.error ?? null,
      screenshotPath: test.screenshotPath ?? null,
    })),
    scenarios: features.flatMap((feature) =>
      feature.scenarios.map((scenario) => ({
        feature: feature.name,
        scenario: scenario.scenario,
        priority: scenario.priority,
        testType: scenario.testType,
        tags: scenario.tags,
        given: scenario.given,
        when: scenario.when,
        then: scenario.then,
      }))
    ),
    bddSummary: summarizeFeatures(features),
    scrape: {
      url: scrapeResult.url,
      title: scrapeResult.title,
      statusCode: scrapeResult.statusCode,
      loadTime: scrapeResult.loadTime,
      forms: scrapeResult.forms.length,
      links: scrapeResult.links.length,
      buttons: scrapeResult.buttons.length,
      inputs: scrapeResult.inputs.length,
      images: scrapeResult.images.length,
    },
    analysis: {
      aiModel: aiAnalysis.aiModel,
      source: aiAnalysis.htmlAnalysis.source,
      tokensUsed: aiAnalysis.tokensUsed,
      responseTime: aiAnalysis.responseTime,
      forms: aiAnalysis.htmlAnalysis.forms.length,
      buttons: aiAnalysis.htmlAnalysis.buttons.length,
      links: aiAnalysis.htmlAnalysis.links.length,
      navigation: aiAnalysis.htmlAnalysis.navigation.length,
    },
    metrics: serializeMetrics(metrics),
  };
}
