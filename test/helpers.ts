import { emptyAnalysis, type HtmlAnalysis } from "../src/ai/analysis.js";
import type { AIAnalysisResult, AIResponse, PageAnalyst } from "../src/ai/types.js";
import type { TestExecutionResult, TestSuiteGenerator } from "../src/automation/types.js";
import type { BDDFeature, FeatureGenerator } from "../src/bdd/types.js";
import { parseConfig } from "../src/config/loader.js";
import type { LoadedConfig } from "../src/config/schema.js";
import type { ReportRenderer } from "../src/reporting/types.js";
import type { FormInfo, PageScraper, ScrapeResult } from "../src/scraper/types.js";

export const FULL_CONFIG_YAML = `
ai:
  provider: ollama
  model_name: test-model
  api_url: http://localhost:11434
scraper:
  browser: chromium
  headless: true
bdd:
  language: english
  include_negative_tests: true
  include_performance_tests: false
automation:
  framework: playwright
  parallel_execution: true
reporting:
  format: [json]
`;

export function testConfig(yaml: string = FULL_CONFIG_YAML): LoadedConfig {
  return parseConfig(yaml, "/virtual/autobdd.config.yaml");
}

export const LOGIN_FORM: FormInfo = {
  id: "login",
  name: "",
  action: "/session",
  method: "POST",
  enctype: "application/x-www-form-urlencoded",
  fields: [
    {
      tag: "input",
      type: "email",
      name: "email",
      id: "email",
      placeholder: "Email",
      required: true,
      value: "",
    },
    {
      tag: "input",
      type: "password",
      name: "password",
      id: "",
      placeholder: "Password",
      required: true,
      value: "",
    },
    {
      tag: "input",
      type: "submit",
      name: "",
      id: "",
      placeholder: "",
      required: false,
      value: "Sign in",
    },
  ],
};

export function makeScrape(overrides: Partial<ScrapeResult> = {}): ScrapeResult {
  return {
    url: "https://example.com",
    html: "<html><body><form id=\"login\"></form></body></html>",
    title: "Example",
    forms: [LOGIN_FORM],
    links: [],
    buttons: [],
    inputs: [],
    images: [],
    metaTags: [],
    pageStructure: { headings: {}, sections: [], navigation: [] },
    loadTime: 120,
    statusCode: 200,
    ...overrides,
  };
}

export function makeAnalysis(
  htmlAnalysis: HtmlAnalysis = emptyAnalysis(""),
  bddContent = ""
): AIAnalysisResult {
  return { htmlAnalysis, bddContent, aiModel: "test-model", tokensUsed: 10, responseTime: 5 };
}

export function makeTestResults(): TestExecutionResult {
  return {
    name: "Example",
    tests: [
      { name: "passes", feature: "Form Submission", status: "passed", duration: 30 },
      { name: "breaks", feature: "Form Validation", status: "failed", duration: 20, error: "boom" },
    ],
    startTime: new Date("2024-01-01T00:00:00.000Z"),
    endTime: new Date("2024-01-01T00:00:01.000Z"),
    totalDuration: 1000,
    passedCount: 1,
    failedCount: 1,
    skippedCount: 0,
  };
}

function response(content: string): AIResponse {
  return { content, model: "test-model", tokensUsed: 7, responseTime: 3 };
}

/**
 * In-process collaborators that count their calls. `failAt` makes the
 * matching call reject.
 */
export function createStubs(
  failAt?: "scrape" | "analyze" | "bdd" | "suite" | "run" | "report" | "close"
) {
  const calls = {
    scrape: 0,
    close: 0,
    analyzeHtml: 0,
    generateBddScenarios: 0,
    listModels: 0,
    generateFeatures: 0,
    writeFeatureFiles: 0,
    generateTestSuite: 0,
    runTests: 0,
    generateReports: 0,
  };
  const reject = (what: string) => Promise.reject(new Error(`${what} exploded`));

  const scraper: PageScraper = {
    scrape: () => {
      calls.scrape++;
      return failAt === "scrape" ? reject("connect ECONNREFUSED") : Promise.resolve(makeScrape());
    },
    close: () => {
      calls.close++;
      return failAt === "close" ? reject("browser") : Promise.resolve();
    },
  };

  const analyst: PageAnalyst = {
    analyzeHtml: () => {
      calls.analyzeHtml++;
      return failAt === "analyze"
        ? reject("model")
        : Promise.resolve(
            response(
              JSON.stringify({
                forms: [
                  {
                    id: "login",
                    fields: [
                      { name: "email", type: "email", required: true },
                      { name: "password", type: "password", required: true },
                    ],
                  },
                ],
              })
            )
          );
    },
    generateBddScenarios: () => {
      calls.generateBddScenarios++;
      return Promise.resolve(response("Feature: Login\n  Scenario: Valid login\n    Given the login page\n    When the user signs in\n    Then the dashboard is shown"));
    },
    listModels: () => {
      calls.listModels++;
      return Promise.resolve(["test-model", "other-model"]);
    },
  };

  const features: BDDFeature[] = [
    {
      name: "Login",
      description: "Scenarios covering Login",
      tags: ["@automated"],
      scenarios: [
        {
          feature: "Login",
          scenario: "Valid login",
          given: ["the login page"],
          when: ["the user signs in"],
          then: ["the dashboard is shown"],
          tags: ["@automated"],
          priority: "medium",
          testType: "functional",
        },
      ],
    },
  ];

  const featureGenerator: FeatureGenerator = {
    generateFeatures: () => {
      calls.generateFeatures++;
      if (failAt === "bdd") throw new Error("bdd exploded");
      return features;
    },
    writeFeatureFiles: () => {
      calls.writeFeatureFiles++;
      return Promise.resolve(["/virtual/features/login.feature"]);
    },
  };

  const testGenerator: TestSuiteGenerator = {
    generateTestSuite: () => {
      calls.generateTestSuite++;
      return failAt === "suite" ? reject("suite") : Promise.resolve("/virtual/tests/suite.mjs");
    },
    runTests: () => {
      calls.runTests++;
      return failAt === "run" ? reject("runner") : Promise.resolve(makeTestResults());
    },
  };

  const reportRenderer: ReportRenderer = {
    generateReports: () => {
      calls.generateReports++;
      return failAt === "report"
        ? reject("report")
        : Promise.resolve({ json: "/virtual/automation_report.json" });
    },
  };

  return {
    calls,
    collaborators: { scraper, analyst, featureGenerator, testGenerator, reportRenderer },
  };
}
