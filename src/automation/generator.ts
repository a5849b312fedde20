import { spawn } from "child_process";
import { existsSync } from "fs";
import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { createRequire } from "module";
import { basename, dirname, join, resolve } from "path";
import { pathToFileURL } from "url";
import Mustache from "mustache";
import type { BDDFeature } from "../bdd/types.js";
import type { AutomationSettings, ScraperSettings } from "../config/schema.js";
import { browserTypeFor } from "../scraper/scraper.js";
import type { ScrapeResult } from "../scraper/types.js";
import { log } from "../utils/logger.js";
import { templatePath } from "../utils/paths.js";
import { planFeatures } from "./planner.js";
import { parseSuiteResults } from "./results.js";
import type {
  TestExecutionResult,
  TestSuiteGenerator,
  TestSuiteOptions,
} from "./types.js";

export const SUITE_FILENAME = "generated_tests.mjs";
export const RESULTS_FILENAME = "test_results.json";
const RUN_TIMEOUT_MS = 5 * 60 * 1000;
const SUPPORTED_FRAMEWORKS = new Set(["playwright"]);

function playwrightModuleUrl(): string {
  const require = createRequire(import.meta.url);
  return pathToFileURL(require.resolve("playwright-core")).href;
}

/**
 * Writes a standalone Playwright suite for the generated features and runs
 * it in a child Node.js process.
 */
export class PlaywrightTestGenerator implements TestSuiteGenerator {
  constructor(
    private readonly automation: AutomationSettings,
    private readonly scraper: ScraperSettings
  ) {}

  async generateTestSuite(
    features: readonly BDDFeature[],
    scrape: ScrapeResult,
    options: TestSuiteOptions
  ): Promise<string> {
    if (!SUPPORTED_FRAMEWORKS.has(this.automation.framework.toLowerCase())) {
      throw new Error(`Unsupported test framework: ${this.automation.framework}`);
    }

    const outputDir = resolve(options.outputDir);
    const testsDir = join(outputDir, "tests");
    const suitePath = join(testsDir, SUITE_FILENAME);
    const tests = planFeatures(features, scrape);

    const config = {
      name: scrape.title || scrape.url,
      browser: browserTypeFor(this.scraper.browser).name(),
      headless: options.headless,
      workers: options.parallel ? this.automation.max_workers : 1,
      screenshotOnFailure: this.automation.screenshot_on_failure,
      video: this.automation.video_recording,
      timeoutMs: this.scraper.timeout * 1000,
      outputDir,
    };

    const template = await readFile(templatePath("test-suite.mustache"), "utf-8");
    const source = Mustache.render(template, {
      url: scrape.url,
      generatedAt: new Date().toISOString(),
      fileName: SUITE_FILENAME,
      playwrightUrl: JSON.stringify(playwrightModuleUrl()),
      config: JSON.stringify(config, null, 2),
      tests: JSON.stringify(tests, null, 2),
    });

    await mkdir(testsDir, { recursive: true });
    await writeFile(suitePath, source, "utf-8");
    log.info(`Generated ${tests.length} tests in ${suitePath}`);
    return suitePath;
  }

  async runTests(suitePath: string): Promise<TestExecutionResult> {
    const resultsPath = join(dirname(suitePath), RESULTS_FILENAME);
    await rm(resultsPath, { force: true });
    log.debug(`Running ${basename(suitePath)}`);

    const code = await new Promise<number | null>((resolvePromise, reject) => {
      const proc = spawn(process.execPath, [suitePath, resultsPath], {
        cwd: dirname(suitePath),
        stdio: ["ignore", "pipe", "pipe"],
      });

      proc.stdout?.on("data", (data: Buffer) => {
        for (const line of data.toString().split("\n")) {
          if (line.trim()) log.debug(line);
        }
      });
      proc.stderr?.on("data", (data: Buffer) => {
        log.debug(data.toString().trim());
      });

      const timeout = setTimeout(() => {
        proc.kill("SIGTERM");
        log.warn("Test run timed out (5 min)");
      }, RUN_TIMEOUT_MS);

      proc.on("close", (exitCode) => {
        clearTimeout(timeout);
        resolvePromise(exitCode);
      });
      proc.on("error", (error) => {
        clearTimeout(timeout);
        reject(error);
      });
    });

    if (!existsSync(resultsPath)) {
      throw new Error(`Test run exited with code ${code} without writing ${resultsPath}`);
    }

    const result = parseSuiteResults(await readFile(resultsPath, "utf-8"));
    log.info(
      `Tests finished: ${result.passedCount} passed, ${result.failedCount} failed, ${result.skippedCount} skipped`
    );
    return result;
  }
}
