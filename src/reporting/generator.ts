import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { join, resolve } from "path";
import Mustache from "mustache";
import type { ReportingSettings } from "../config/schema.js";
import { log } from "../utils/logger.js";
import { templatePath } from "../utils/paths.js";
import { createReportData, type ReportData } from "./data.js";
import type { ReportInput, ReportRenderer } from "./types.js";

export const HTML_REPORT_FILENAME = "automation_report.html";
export const JSON_REPORT_FILENAME = "automation_report.json";
const LOG_TAIL_LINES = 200;

function formatMs(value: number | null): string {
  return value === null ? "n/a" : `${value} ms`;
}

export class ReportGenerator implements ReportRenderer {
  constructor(
    private readonly settings: ReportingSettings,
    private readonly logFile?: string
  ) {}

  async generateReports(input: ReportInput, outputDir: string): Promise<Record<string, string>> {
    await mkdir(outputDir, { recursive: true });
    const data = createReportData(input);
    const reports: Record<string, string> = {};

    for (const format of this.settings.format) {
      switch (format.toLowerCase()) {
        case "html":
          reports.html = await this.writeHtml(data, outputDir);
          break;
        case "json":
          reports.json = await this.writeJson(data, outputDir);
          break;
        case "pdf":
          log.warn("PDF reports are not supported; skipping");
          break;
        default:
          log.warn(`Unknown report format "${format}"; skipping`);
      }
    }

    for (const [format, path] of Object.entries(reports)) {
      log.success(`${format.toUpperCase()} report: ${path}`);
    }
    return reports;
  }

  private async writeJson(data: ReportData, outputDir: string): Promise<string> {
    const path = join(outputDir, JSON_REPORT_FILENAME);
    await writeFile(path, JSON.stringify(data, null, 2), "utf-8");
    return path;
  }

  private async writeHtml(data: ReportData, outputDir: string): Promise<string> {
    const path = join(outputDir, HTML_REPORT_FILENAME);
    const template = await readFile(this.templateFile(), "utf-8");
    await writeFile(path, Mustache.render(template, await this.htmlView(data)), "utf-8");
    return path;
  }

  private templateFile(): string {
    return this.settings.template === "default"
      ? templatePath("report.mustache")
      : resolve(this.settings.template);
  }

  private async htmlView(data: ReportData) {
    return {
      ...data,
      metricRows: [
        { label: "Started", value: data.metrics.startTime ?? "n/a" },
        { label: "Page load", value: formatMs(data.metrics.pageLoadTime) },
        { label: "AI response", value: formatMs(data.metrics.aiResponseTime) },
        { label: "Test execution", value: formatMs(data.metrics.testExecutionTime) },
      ],
      tests: data.tests.map((test) => ({
        ...test,
        showScreenshot: this.settings.include_screenshots && test.screenshotPath !== null,
      })),
      scenarios: data.scenarios.map((scenario) => ({
        ...scenario,
        tagList: scenario.tags.join(" "),
      })),
      includeLogs: this.settings.include_logs,
      logs: this.settings.include_logs ? await this.readLogTail() : "",
    };
  }

  private async readLogTail(): Promise<string> {
    if (!this.logFile || !existsSync(this.logFile)) {
      return "No log file configured.";
    }
    const lines = (await readFile(this.logFile, "utf-8")).trimEnd().split("\n");
    return lines.slice(-LOG_TAIL_LINES).join("\n");
  }
}
