import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import type { LoadedConfig } from "../src/config/schema.js";
import { Orchestrator, createRunConfiguration } from "../src/orchestrator/orchestrator.js";
import type { PipelineStage } from "../src/orchestrator/types.js";
import { ConfigurationError } from "../src/utils/errors.js";
import { createStubs, FULL_CONFIG_YAML, testConfig } from "./helpers.js";

function configWith(find: string, replace: string): LoadedConfig {
  return testConfig(FULL_CONFIG_YAML.replace(find, replace));
}

function orchestratorWith(failAt?: Parameters<typeof createStubs>[0]) {
  const stubs = createStubs(failAt);
  return { ...stubs, orchestrator: new Orchestrator(testConfig(), stubs.collaborators) };
}

describe("createRunConfiguration", () => {
  it("fills defaults from the configuration", () => {
    const run = createRunConfiguration(testConfig(), "https://example.com");
    expect(run).toEqual({
      url: "https://example.com",
      aiModel: "test-model",
      outputDir: "reports",
      headless: true,
      parallelTests: true,
      generateReports: true,
      saveArtifacts: true,
    });
    expect(Object.isFrozen(run)).toBe(true);
  });

  it("prefers explicit overrides", () => {
    const run = createRunConfiguration(testConfig(), "https://example.com", {
      aiModel: "override",
      outputDir: "out",
      parallelTests: false,
    });
    expect(run.aiModel).toBe("override");
    expect(run.outputDir).toBe("out");
    expect(run.parallelTests).toBe(false);
  });
});

describe("Orchestrator.executeFullAutomation", () => {
  it("runs every stage in order and returns a successful result", async () => {
    const { orchestrator, calls } = orchestratorWith();

    const result = await orchestrator.executeFullAutomation("https://example.com");

    expect(result.success).toBe(true);
    expect(result.errorMessage).toBeUndefined();
    expect(result.reports).toEqual({ json: "/virtual/automation_report.json" });
    expect(result.artifactsSaved).toBe(true);
    expect(result.features).toHaveLength(1);
    expect(result.testResults?.passedCount).toBe(1);
    expect(result.aiAnalysis?.htmlAnalysis.source).toBe("structured");
    expect(result.aiAnalysis?.tokensUsed).toBe(14);
    expect(result.aiAnalysis?.aiModel).toBe("test-model");
    expect(calls).toMatchObject({
      scrape: 1,
      analyzeHtml: 1,
      generateBddScenarios: 1,
      generateFeatures: 1,
      writeFeatureFiles: 1,
      generateTestSuite: 1,
      runTests: 1,
      generateReports: 1,
      close: 1,
    });
    expect(orchestrator.state).toEqual({ kind: "done" });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("records every metric with end time not before start time", async () => {
    const { orchestrator } = orchestratorWith();

    const { metrics } = await orchestrator.executeFullAutomation("https://example.com");

    expect(metrics.startTime).toBeInstanceOf(Date);
    expect(metrics.endTime).toBeInstanceOf(Date);
    expect(metrics.pageLoadTime).not.toBeNull();
    expect(metrics.aiResponseTime).not.toBeNull();
    expect(metrics.testExecutionTime).not.toBeNull();
    expect(metrics.totalExecutionTime).not.toBeNull();
    const start = metrics.startTime?.getTime() ?? 0;
    const end = metrics.endTime?.getTime() ?? -1;
    expect(end).toBeGreaterThanOrEqual(start);
  });

  it("skips reporting and artifacts when the run disables them", async () => {
    const { orchestrator, calls } = orchestratorWith();

    const result = await orchestrator.executeFullAutomation("https://example.com", {
      generateReports: false,
      saveArtifacts: false,
    });

    expect(result.success).toBe(true);
    expect(result.reports).toEqual({});
    expect(result.artifactsSaved).toBe(false);
    expect(calls.generateReports).toBe(0);
    expect(calls.writeFeatureFiles).toBe(0);
    expect(orchestrator.stageHistory().map((t) => t.state.kind)).toEqual([
      "idle",
      "running",
      "running",
      "running",
      "running",
      "running",
      "done",
    ]);
  });

  const failures: [Parameters<typeof createStubs>[0], PipelineStage][] = [
    ["scrape", "scraping"],
    ["analyze", "analyzing"],
    ["bdd", "generatingBdd"],
    ["suite", "generatingTests"],
    ["run", "executing"],
    ["report", "reporting"],
  ];

  it.each(failures)("cleans up exactly once when %s fails", async (failAt, stage) => {
    const { orchestrator, calls } = orchestratorWith(failAt);

    const result = await orchestrator.executeFullAutomation("https://example.com");

    expect(result.success).toBe(false);
    expect(result.failedStage).toBe(stage);
    expect(calls.close).toBe(1);
    expect(orchestrator.state).toEqual({ kind: "failed", stage });
  });

  it("reports a scrape failure without touching later stages", async () => {
    const { orchestrator, calls } = orchestratorWith("scrape");

    const result = await orchestrator.executeFullAutomation("https://example.com");

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe("Page scraping failed: connect ECONNREFUSED exploded");
    expect(result.errorMessage).toContain("scrap");
    expect(result.scrapeResult).toBeNull();
    expect(result.aiAnalysis).toBeNull();
    expect(result.features).toEqual([]);
    expect(calls).toMatchObject({
      analyzeHtml: 0,
      generateBddScenarios: 0,
      generateFeatures: 0,
      generateTestSuite: 0,
      runTests: 0,
      generateReports: 0,
      close: 1,
    });
    expect(result.metrics.pageLoadTime).toBeNull();
    expect(result.metrics.startTime).toBeInstanceOf(Date);
  });

  it("keeps metrics recorded before the failing stage and leaves the rest unset", async () => {
    const { orchestrator } = orchestratorWith("run");

    const result = await orchestrator.executeFullAutomation("https://example.com");

    expect(result.metrics.pageLoadTime).not.toBeNull();
    expect(result.metrics.aiResponseTime).not.toBeNull();
    expect(result.metrics.testExecutionTime).toBeNull();
    expect(result.metrics.endTime).toBeNull();
    expect(result.metrics.totalExecutionTime).toBeNull();
    expect(result.scrapeResult?.title).toBe("Example");
    expect(result.testResults).toBeNull();
    expect(result.errorMessage).toBe("Test execution failed: runner exploded");
  });

  it("does not let a cleanup failure change a successful outcome", async () => {
    const { orchestrator, calls } = orchestratorWith("close");

    const result = await orchestrator.executeFullAutomation("https://example.com");

    expect(result.success).toBe(true);
    expect(calls.close).toBe(1);
  });

  it("raises a ConfigurationError for an ill-typed run setting before any stage", async () => {
    const { calls, collaborators } = createStubs();
    const orchestrator = new Orchestrator(
      configWith("headless: true", 'headless: "yes"'),
      collaborators
    );

    const error = await orchestrator.executeFullAutomation("https://example.com").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError ? error.cause : undefined).toBeInstanceOf(ZodError);
    expect(calls.scrape).toBe(0);
    expect(orchestrator.state).toEqual({ kind: "idle" });
  });

  it("answers a second call during a run with a failed result and leaves the first run alone", async () => {
    const { orchestrator, calls } = orchestratorWith();

    const first = orchestrator.executeFullAutomation("https://example.com");
    const second = await orchestrator.executeFullAutomation("https://example.com");
    const quick = await orchestrator.quickTest("https://example.com");

    expect(second.success).toBe(false);
    expect(second.errorMessage).toBe("A run is already in progress on this orchestrator");
    expect(second.failedStage).toBeUndefined();
    expect(second.metrics.startTime).toBeNull();
    expect(quick).toBe(false);
    expect((await first).success).toBe(true);
    expect(calls.scrape).toBe(1);
    expect(calls.close).toBe(1);
  });

  it("starts every run with fresh metrics", async () => {
    const { orchestrator, calls } = orchestratorWith();

    await orchestrator.executeFullAutomation("https://example.com");
    const second = await orchestrator.executeFullAutomation("https://example.com");

    expect(second.success).toBe(true);
    expect(calls.close).toBe(2);
  });
});

describe("Orchestrator.quickTest", () => {
  it("returns true after scraping and analysis only", async () => {
    const { orchestrator, calls } = orchestratorWith();

    await expect(orchestrator.quickTest("https://example.com")).resolves.toBe(true);

    expect(calls.scrape).toBe(1);
    expect(calls.analyzeHtml).toBe(1);
    expect(calls.generateFeatures).toBe(0);
    expect(calls.generateTestSuite).toBe(0);
    expect(calls.close).toBe(1);
    expect(orchestrator.getMetrics().aiResponseTime).not.toBeNull();
    expect(orchestrator.state).toEqual({ kind: "done" });
  });

  it("returns false and discards partial metrics when analysis fails", async () => {
    const { orchestrator, calls } = orchestratorWith("analyze");

    await expect(orchestrator.quickTest("https://example.com", "other-model")).resolves.toBe(false);

    expect(calls.close).toBe(1);
    expect(calls.generateReports).toBe(0);
    expect(orchestrator.getMetrics()).toEqual({
      startTime: null,
      endTime: null,
      pageLoadTime: null,
      aiResponseTime: null,
      testExecutionTime: null,
      totalExecutionTime: null,
    });
  });

  it("returns false without analysis when scraping fails", async () => {
    const { orchestrator, calls } = orchestratorWith("scrape");

    await expect(orchestrator.quickTest("https://example.com")).resolves.toBe(false);

    expect(calls.scrape).toBe(1);
    expect(calls.analyzeHtml).toBe(0);
    expect(calls.close).toBe(1);
    expect(orchestrator.state).toEqual({ kind: "failed", stage: "scraping" });
  });

  it("returns false and still cleans up when the ai section is ill-typed", async () => {
    const { calls, collaborators } = createStubs();
    const orchestrator = new Orchestrator(
      configWith("model_name: test-model", "model_name: 5"),
      collaborators
    );

    await expect(orchestrator.quickTest("https://example.com")).resolves.toBe(false);

    expect(calls.scrape).toBe(0);
    expect(calls.close).toBe(1);
    expect(orchestrator.state).toEqual({ kind: "failed", stage: "scraping" });
    expect(orchestrator.getMetrics().startTime).toBeNull();
  });
});

describe("Orchestrator.validateConfig", () => {
  const allSections = { ai: {}, scraper: {}, bdd: {}, automation: {}, reporting: {} };

  it.each(Object.keys(allSections))("fails when %s is missing", (missing) => {
    const raw: Record<string, unknown> = { ...allSections };
    delete raw[missing];
    const config: LoadedConfig = { path: "/virtual/config.yaml", raw };

    expect(new Orchestrator(config, createStubs().collaborators).validateConfig()).toBe(false);
  });

  it("passes with every section plus unknown extras", () => {
    const config: LoadedConfig = {
      path: "/virtual/config.yaml",
      raw: { ...allSections, logging: {}, experimental: { flag: true } },
    };

    expect(new Orchestrator(config, createStubs().collaborators).validateConfig()).toBe(true);
  });
});

describe("Orchestrator.getExecutionStatus", () => {
  it("returns the same snapshot twice when no run happened", async () => {
    const { orchestrator } = orchestratorWith();

    const first = await orchestrator.getExecutionStatus();
    const second = await orchestrator.getExecutionStatus();

    expect(first.configValid).toBe(true);
    expect(second.configValid).toBe(first.configValid);
    expect(second.metrics).toEqual(first.metrics);
    expect(first.metrics.startTime).toBeNull();
    expect(first.metrics.totalExecutionTime).toBeNull();
    expect(first.availableModels).toEqual(["test-model", "other-model"]);
  });

  it("reports no models when the provider fails", async () => {
    const { orchestrator, collaborators } = orchestratorWith();
    collaborators.analyst.listModels = () => Promise.reject(new Error("offline"));

    const status = await orchestrator.getExecutionStatus();

    expect(status.availableModels).toEqual([]);
    expect(status.configValid).toBe(true);
  });
});

describe("Orchestrator.fromFile", () => {
  it("raises a ConfigurationError when no configuration exists", async () => {
    const dir = await mkdtemp(join(tmpdir(), "autobdd-"));

    await expect(Orchestrator.fromFile(dir)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
