import { mkdtemp, readFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { normalizeAnalysis } from "../src/ai/analysis.js";
import { reportingSettingsSchema } from "../src/config/schema.js";
import { emptyMetrics } from "../src/orchestrator/metrics.js";
import { createReportData } from "../src/reporting/data.js";
import { ReportGenerator } from "../src/reporting/generator.js";
import type { ReportInput } from "../src/reporting/types.js";
import { makeAnalysis, makeScrape, makeTestResults } from "./helpers.js";

function reportInput(): ReportInput {
  return {
    testResults: makeTestResults(),
    features: [
      {
        name: "Login",
        description: "Scenarios covering Login",
        tags: ["@automated"],
        scenarios: [
          {
            feature: "Login",
            scenario: "Valid <login>",
            given: ["a"],
            when: ["b"],
            then: ["c"],
            tags: ["@smoke"],
            priority: "high",
            testType: "functional",
          },
        ],
      },
    ],
    scrapeResult: makeScrape(),
    aiAnalysis: makeAnalysis(normalizeAnalysis('{"links": [{"href": "/a", "text": "A"}]}')),
    metrics: {
      ...emptyMetrics(),
      startTime: new Date("2024-01-01T00:00:00.000Z"),
      pageLoadTime: 120,
    },
  };
}

describe("createReportData", () => {
  it("summarizes the run", () => {
    const data = createReportData(reportInput(), new Date("2024-01-02T00:00:00.000Z"));

    expect(data.timestamp).toBe("2024-01-02T00:00:00.000Z");
    expect(data.summary).toEqual({
      url: "https://example.com",
      title: "Example",
      totalTests: 2,
      passed: 1,
      failed: 1,
      skipped: 0,
      successRate: 50,
      duration: 1000,
    });
    expect(data.tests[1]).toEqual({
      name: "breaks",
      feature: "Form Validation",
      status: "failed",
      duration: 20,
      error: "boom",
      screenshotPath: null,
    });
    expect(data.scenarios).toHaveLength(1);
    expect(data.bddSummary.byPriority.high).toBe(1);
    expect(data.scrape.forms).toBe(1);
    expect(data.analysis).toMatchObject({ source: "structured", links: 1, aiModel: "test-model" });
    expect(data.metrics).toEqual({
      startTime: "2024-01-01T00:00:00.000Z",
      endTime: null,
      pageLoadTime: 120,
      aiResponseTime: null,
      testExecutionTime: null,
      totalExecutionTime: null,
    });
  });
});

describe("ReportGenerator", () => {
  it("writes the HTML and JSON reports and skips formats it cannot render", async () => {
    const outputDir = await mkdtemp(join(tmpdir(), "autobdd-report-"));
    const generator = new ReportGenerator(
      reportingSettingsSchema.parse({ format: ["html", "json", "pdf", "docx"], include_logs: false })
    );

    const reports = await generator.generateReports(reportInput(), outputDir);

    expect(reports).toEqual({
      html: join(outputDir, "automation_report.html"),
      json: join(outputDir, "automation_report.json"),
    });

    const json = JSON.parse(await readFile(reports.json, "utf-8"));
    expect(json.summary.successRate).toBe(50);

    const html = await readFile(reports.html, "utf-8");
    expect(html).toContain("<td>Valid &lt;login&gt;</td>");
    expect(html).toContain('<td class="failed">failed</td>');
    expect(html).not.toContain("<h2>Logs</h2>");
  });

  it("includes the log tail when logs are enabled", async () => {
    const outputDir = await mkdtemp(join(tmpdir(), "autobdd-report-"));
    const generator = new ReportGenerator(
      reportingSettingsSchema.parse({ format: ["html"], include_logs: true })
    );

    const reports = await generator.generateReports(reportInput(), outputDir);
    const html = await readFile(reports.html, "utf-8");

    expect(html).toContain("<h2>Logs</h2>");
    expect(html).toContain("<pre>No log file configured.</pre>");
  });
});
