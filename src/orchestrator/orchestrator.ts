import { join } from "path";
import { normalizeAnalysis } from "../ai/analysis.js";
import { AIClient } from "../ai/client.js";
import type { AIAnalysisResult, PageAnalyst } from "../ai/types.js";
import { PlaywrightTestGenerator } from "../automation/generator.js";
import type { TestExecutionResult, TestSuiteGenerator } from "../automation/types.js";
import { BddGenerator } from "../bdd/generator.js";
import type { BDDFeature, FeatureGenerator } from "../bdd/types.js";
import { loadConfig } from "../config/loader.js";
import {
  aiSettings,
  automationSettings,
  bddSettings,
  findMissingSection,
  loggingSettings,
  reportingSettings,
  scraperSettings,
  type LoadedConfig,
} from "../config/schema.js";
import { ReportGenerator } from "../reporting/generator.js";
import type { ReportRenderer } from "../reporting/types.js";
import { WebScraper } from "../scraper/scraper.js";
import type { PageScraper, ScrapeResult } from "../scraper/types.js";
import { CleanupFailure, errorMessage, StageFailure, stageLabel } from "../utils/errors.js";
import { log, spinner } from "../utils/logger.js";
import { emptyMetrics, MetricsRecorder } from "./metrics.js";
import { StageTracker } from "./state.js";
import type {
  Collaborators,
  ExecutionResult,
  ExecutionStatus,
  PerformanceMetrics,
  PipelineStage,
  PipelineState,
  RunConfiguration,
  RunOverrides,
  StageTransition,
} from "./types.js";

export const DEFAULT_OUTPUT_DIR = "reports";
const RUN_IN_PROGRESS = "A run is already in progress on this orchestrator";

export function createRunConfiguration(
  config: LoadedConfig,
  url: string,
  overrides: RunOverrides = {}
): RunConfiguration {
  return Object.freeze({
    url,
    aiModel: overrides.aiModel ?? aiSettings(config).model_name,
    outputDir: overrides.outputDir ?? DEFAULT_OUTPUT_DIR,
    headless: overrides.headless ?? scraperSettings(config).headless,
    parallelTests: overrides.parallelTests ?? automationSettings(config).parallel_execution,
    generateReports: overrides.generateReports ?? true,
    saveArtifacts: overrides.saveArtifacts ?? true,
  });
}

interface RunArtifacts {
  scrapeResult: ScrapeResult | null;
  aiAnalysis: AIAnalysisResult | null;
  features: BDDFeature[];
  testResults: TestExecutionResult | null;
  reports: Record<string, string>;
  artifactsSaved: boolean;
}

/**
 * Drives one URL through scrape, analysis, BDD generation, test generation,
 * execution and reporting. One instance runs one pipeline at a time; runs
 * sharing an output directory overwrite each other's files.
 *
 * Only a ConfigurationError raised while building the run configuration
 * escapes `executeFullAutomation`; every other failure comes back as a
 * failed result, and `quickTest` turns any failure into `false`. A call made
 * while another run is in progress fails without touching that run. Once a
 * run has started, the scraper is closed exactly once, whatever happened.
 */
export class Orchestrator {
  private readonly metrics = new MetricsRecorder();
  private readonly tracker = new StageTracker();

  private scraperInstance: PageScraper | undefined;
  private analystInstance: PageAnalyst | undefined;
  private featureGeneratorInstance: FeatureGenerator | undefined;
  private testGeneratorInstance: TestSuiteGenerator | undefined;
  private reportRendererInstance: ReportRenderer | undefined;

  constructor(
    private readonly config: LoadedConfig,
    collaborators: Partial<Collaborators> = {}
  ) {
    this.scraperInstance = collaborators.scraper;
    this.analystInstance = collaborators.analyst;
    this.featureGeneratorInstance = collaborators.featureGenerator;
    this.testGeneratorInstance = collaborators.testGenerator;
    this.reportRendererInstance = collaborators.reportRenderer;
  }

  static async fromFile(
    cwd: string,
    configPath?: string,
    collaborators: Partial<Collaborators> = {}
  ): Promise<Orchestrator> {
    return new Orchestrator(await loadConfig(cwd, configPath), collaborators);
  }

  // Default collaborators are built on first use so that a section with bad
  // field values only fails the stage that reads it.

  private get scraper(): PageScraper {
    this.scraperInstance ??= new WebScraper(scraperSettings(this.config));
    return this.scraperInstance;
  }

  private get analyst(): PageAnalyst {
    this.analystInstance ??= new AIClient(aiSettings(this.config), bddSettings(this.config));
    return this.analystInstance;
  }

  private get featureGenerator(): FeatureGenerator {
    this.featureGeneratorInstance ??= new BddGenerator(bddSettings(this.config));
    return this.featureGeneratorInstance;
  }

  private get testGenerator(): TestSuiteGenerator {
    this.testGeneratorInstance ??= new PlaywrightTestGenerator(
      automationSettings(this.config),
      scraperSettings(this.config)
    );
    return this.testGeneratorInstance;
  }

  private get reportRenderer(): ReportRenderer {
    this.reportRendererInstance ??= new ReportGenerator(
      reportingSettings(this.config),
      loggingSettings(this.config).file
    );
    return this.reportRendererInstance;
  }

  get state(): PipelineState {
    return this.tracker.state;
  }

  stageHistory(): readonly StageTransition[] {
    return this.tracker.history();
  }

  createRunConfiguration(url: string, overrides: RunOverrides = {}): RunConfiguration {
    return createRunConfiguration(this.config, url, overrides);
  }

  async executeFullAutomation(url: string, overrides: RunOverrides = {}): Promise<ExecutionResult> {
    const run = this.createRunConfiguration(url, overrides);
    const artifacts: RunArtifacts = {
      scrapeResult: null,
      aiAnalysis: null,
      features: [],
      testResults: null,
      reports: {},
      artifactsSaved: false,
    };
    if (this.isRunning()) {
      const busy = new Error(RUN_IN_PROGRESS);
      log.fail(busy.message);
      return this.buildResult(false, 0, artifacts, busy, emptyMetrics());
    }

    this.beginRun();
    const startTime = this.metrics.start();
    log.heading(`Full automation for ${run.url}`);

    try {
      const scrape = await this.runStage("scraping", "Scraping page...", () =>
        this.scraper.scrape(run.url, { headless: run.headless })
      );
      this.metrics.recordPageLoad(scrape.duration);
      artifacts.scrapeResult = scrape.value;

      const analysis = await this.runStage("analyzing", "Analyzing page with AI...", () =>
        this.analyze(scrape.value, run.aiModel)
      );
      artifacts.aiAnalysis = this.withResponseTime(analysis.value, analysis.duration);
      this.metrics.recordAiResponse(analysis.duration);

      const aiAnalysis = artifacts.aiAnalysis;
      const bdd = await this.runStage("generatingBdd", "Generating BDD scenarios...", async () => {
        const features = this.featureGenerator.generateFeatures(scrape.value, aiAnalysis);
        if (run.saveArtifacts) {
          await this.featureGenerator.writeFeatureFiles(features, join(run.outputDir, "features"));
        }
        return features;
      });
      artifacts.features = bdd.value;
      artifacts.artifactsSaved = run.saveArtifacts;

      const suite = await this.runStage("generatingTests", "Generating test code...", () =>
        this.testGenerator.generateTestSuite(bdd.value, scrape.value, {
          outputDir: run.outputDir,
          headless: run.headless,
          parallel: run.parallelTests,
        })
      );

      const execution = await this.runStage("executing", "Running generated tests...", () =>
        this.testGenerator.runTests(suite.value)
      );
      this.metrics.recordTestExecution(execution.duration);
      artifacts.testResults = execution.value;

      if (run.generateReports) {
        const testResults = execution.value;
        const reports = await this.runStage("reporting", "Generating reports...", () =>
          this.reportRenderer.generateReports(
            {
              testResults,
              features: bdd.value,
              scrapeResult: scrape.value,
              aiAnalysis,
              metrics: this.metrics.snapshot(),
            },
            run.outputDir
          )
        );
        artifacts.reports = reports.value;
      }

      const total = this.metrics.finish();
      this.tracker.complete();
      log.success(`Full automation completed in ${(total / 1000).toFixed(2)}s`);
      return this.buildResult(true, total, artifacts);
    } catch (error) {
      this.tracker.fail();
      const failure = error instanceof StageFailure ? error : new StageFailure(this.currentStage(), error);
      log.fail(failure.message);
      return this.buildResult(false, Date.now() - startTime.getTime(), artifacts, failure);
    } finally {
      await this.cleanup();
    }
  }

  /**
   * Scrape and analyze only. Returns whether both stages succeeded; the data
   * they produced is not kept.
   */
  async quickTest(url: string, aiModel?: string): Promise<boolean> {
    if (this.isRunning()) {
      log.fail(`Quick test failed: ${RUN_IN_PROGRESS}`);
      return false;
    }

    this.beginRun();
    this.metrics.start();
    log.heading(`Quick test for ${url}`);

    try {
      const model = aiModel ?? aiSettings(this.config).model_name;
      const headless = scraperSettings(this.config).headless;
      const scrape = await this.runStage("scraping", "Scraping page...", () =>
        this.scraper.scrape(url, { headless })
      );
      this.metrics.recordPageLoad(scrape.duration);

      const analysis = await this.runStage("analyzing", "Analyzing page with AI...", () =>
        this.analyze(scrape.value, model)
      );
      this.metrics.recordAiResponse(analysis.duration);
      this.tracker.complete();

      const page = scrape.value;
      log.success("Quick test completed");
      log.dim(`  Title: ${page.title || "(none)"}`);
      log.dim(
        `  Forms: ${page.forms.length}, links: ${page.links.length}, buttons: ${page.buttons.length}, inputs: ${page.inputs.length}`
      );
      log.dim(`  AI analysis: ${analysis.value.htmlAnalysis.source}, ${analysis.value.tokensUsed} tokens`);
      return true;
    } catch (error) {
      this.tracker.fail();
      log.fail(`Quick test failed: ${errorMessage(error)}`);
      this.metrics.reset();
      return false;
    } finally {
      await this.cleanup();
    }
  }

  validateConfig(): boolean {
    const missing = findMissingSection(this.config.raw);
    if (missing) {
      log.error(`Missing configuration section: ${missing}`);
      return false;
    }
    return true;
  }

  /** Never throws: a failing provider yields an empty list. */
  async getAvailableModels(): Promise<string[]> {
    try {
      return await this.analyst.listModels();
    } catch (error) {
      log.warn(`Could not list AI models: ${errorMessage(error)}`);
      return [];
    }
  }

  async getExecutionStatus(): Promise<ExecutionStatus> {
    return Object.freeze({
      metrics: this.metrics.snapshot(),
      configValid: this.validateConfig(),
      availableModels: Object.freeze(await this.getAvailableModels()),
    });
  }

  getMetrics(): PerformanceMetrics {
    return this.metrics.snapshot();
  }

  private isRunning(): boolean {
    return this.tracker.state.kind === "running";
  }

  private beginRun(): void {
    this.metrics.reset();
    this.tracker.reset();
  }

  private async analyze(scrape: ScrapeResult, model: string): Promise<AIAnalysisResult> {
    const response = await this.analyst.analyzeHtml(scrape.html, scrape.url, model);
    const htmlAnalysis = normalizeAnalysis(response.content);
    if (htmlAnalysis.source === "raw") {
      log.warn("AI response was not JSON; continuing with the raw text");
    }

    const bdd = await this.analyst.generateBddScenarios(htmlAnalysis, model);
    return {
      htmlAnalysis,
      bddContent: bdd.content,
      aiModel: model,
      tokensUsed: response.tokensUsed + bdd.tokensUsed,
      responseTime: response.responseTime + bdd.responseTime,
    };
  }

  private withResponseTime(analysis: AIAnalysisResult, ms: number): AIAnalysisResult {
    return Object.freeze({ ...analysis, responseTime: ms });
  }

  private async runStage<T>(
    stage: PipelineStage,
    text: string,
    action: () => Promise<T>
  ): Promise<{ value: T; duration: number }> {
    this.tracker.enter(stage);
    const s = spinner(text);
    const started = Date.now();

    try {
      const value = await action();
      const duration = Date.now() - started;
      s.succeed(`${stageLabel(stage)} completed in ${(duration / 1000).toFixed(2)}s`);
      return { value, duration };
    } catch (error) {
      s.fail(`${stageLabel(stage)} failed`);
      throw new StageFailure(stage, error);
    }
  }

  private currentStage(): PipelineStage {
    const state = this.tracker.state;
    return state.kind === "running" || state.kind === "failed" ? state.stage : "scraping";
  }

  private buildResult(
    success: boolean,
    totalExecutionTime: number,
    artifacts: RunArtifacts,
    failure?: Error,
    metrics: PerformanceMetrics = this.metrics.snapshot()
  ): ExecutionResult {
    return Object.freeze({
      success,
      totalExecutionTime,
      scrapeResult: artifacts.scrapeResult,
      aiAnalysis: artifacts.aiAnalysis,
      features: Object.freeze([...artifacts.features]),
      testResults: artifacts.testResults,
      reports: Object.freeze({ ...artifacts.reports }),
      errorMessage: failure?.message,
      failedStage: failure instanceof StageFailure ? failure.stage : undefined,
      artifactsSaved: artifacts.artifactsSaved,
      metrics,
    });
  }

  private async cleanup(): Promise<void> {
    const scraper = this.scraperInstance;
    if (!scraper) return;

    try {
      await scraper.close();
      log.debug("Cleanup completed");
    } catch (error) {
      log.error(new CleanupFailure(error).message);
    }
  }
}

