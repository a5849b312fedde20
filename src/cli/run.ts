import chalk from "chalk";
import { log } from "../utils/logger.js";
import { createOrchestrator, type CommonOptions } from "./shared.js";

export interface RunOptions extends CommonOptions {
  aiModel?: string;
  outputDir: string;
  headless?: boolean;
  parallel: boolean;
  reports: boolean;
  artifacts: boolean;
}

export async function runCommand(url: string, options: RunOptions): Promise<void> {
  const orchestrator = await createOrchestrator(options);
  if (!orchestrator.validateConfig()) {
    process.exitCode = 1;
    return;
  }

  const result = await orchestrator.executeFullAutomation(url, {
    aiModel: options.aiModel,
    outputDir: options.outputDir,
    headless: options.headless,
    parallelTests: options.parallel ? undefined : false,
    generateReports: options.reports,
    saveArtifacts: options.artifacts,
  });

  log.heading("Summary");
  log.info(`Elapsed: ${(result.totalExecutionTime / 1000).toFixed(2)}s`);

  if (result.testResults) {
    const { tests, passedCount, failedCount, skippedCount } = result.testResults;
    for (const test of tests) {
      if (test.status !== "skipped") log.scenario(test.name, test.status === "passed");
    }
    log.info(
      `Tests: ${chalk.green(`${passedCount} passed`)}, ${chalk.red(`${failedCount} failed`)}, ${skippedCount} skipped`
    );
  }

  const reports = Object.entries(result.reports);
  if (reports.length > 0) {
    for (const [format, path] of reports) {
      log.dim(`  ${format}: ${path}`);
    }
  } else {
    log.dim("  No reports generated");
  }
  log.dim(`  Artifacts saved: ${result.artifactsSaved ? "yes" : "no"}`);

  if (!result.success) {
    log.fail(result.errorMessage ?? "Automation failed");
    process.exitCode = 1;
  }
}
