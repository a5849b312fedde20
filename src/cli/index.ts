#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./init.js";
import { modelsCommand } from "./models.js";
import { quickCommand } from "./quick.js";
import { runCommand } from "./run.js";
import { command } from "./shared.js";
import { statusCommand } from "./status.js";
import { validateCommand } from "./validate.js";

const program = new Command();

program
  .name("autobdd")
  .description(
    "Scrape a page, derive BDD scenarios with an AI model, then generate and run browser tests"
  )
  .version("0.1.0");

program
  .command("run")
  .description("Run the full pipeline against a URL")
  .argument("<url>", "Page to test")
  .option("-m, --ai-model <model>", "AI model to use (defaults to ai.model_name)")
  .option("-o, --output-dir <dir>", "Directory for tests, features and reports", "reports")
  .option("--headless", "Run the browser headless (defaults to scraper.headless)")
  .option("--no-parallel", "Run generated tests one at a time")
  .option("--no-reports", "Skip report generation")
  .option("--no-artifacts", "Do not write .feature files")
  .option("-c, --config <path>", "Configuration file")
  .option("-v, --verbose", "Debug logging")
  .action(command(runCommand));

program
  .command("quick")
  .description("Scrape and analyze a URL without generating tests")
  .argument("<url>", "Page to test")
  .option("-m, --ai-model <model>", "AI model to use (defaults to ai.model_name)")
  .option("-c, --config <path>", "Configuration file")
  .option("-v, --verbose", "Debug logging")
  .action(command(quickCommand));

program
  .command("models")
  .description("List the models the configured AI provider offers")
  .option("-c, --config <path>", "Configuration file")
  .option("-v, --verbose", "Debug logging")
  .action(command(modelsCommand));

program
  .command("validate")
  .description("Check that the configuration has every required section")
  .option("-c, --config <path>", "Configuration file")
  .option("-v, --verbose", "Debug logging")
  .action(command(validateCommand));

program
  .command("status")
  .description("Print metrics, configuration validity and available models as JSON")
  .option("-c, --config <path>", "Configuration file")
  .option("-v, --verbose", "Debug logging")
  .action(command(statusCommand));

program
  .command("init")
  .description("Write a starter autobdd.config.yaml in the current directory")
  .action(command(initCommand));

await program.parseAsync();
