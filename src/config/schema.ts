import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";

export const REQUIRED_SECTIONS = [
  "ai",
  "scraper",
  "bdd",
  "automation",
  "reporting",
] as const;

export type RequiredSection = (typeof REQUIRED_SECTIONS)[number];

export const aiSettingsSchema = z.object({
  provider: z.enum(["ollama", "localai", "custom", "anthropic"]).default("ollama"),
  model_name: z.string().min(1).default("llama3:latest"),
  api_url: z.string().url().default("http://localhost:11434"),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().positive().default(2048),
  // seconds
  timeout: z.number().positive().default(60),
});

export const scraperSettingsSchema = z.object({
  browser: z.string().default("chrome"),
  headless: z.boolean().default(true),
  // seconds
  timeout: z.number().positive().default(30),
  wait_time: z.number().nonnegative().default(2),
  user_agent: z
    .string()
    .default("Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36"),
});

export const bddSettingsSchema = z.object({
  language: z.enum(["english", "turkish"]).default("english"),
  scenario_count: z.number().int().positive().default(10),
  include_negative_tests: z.boolean().default(true),
  include_performance_tests: z.boolean().default(true),
});

export const automationSettingsSchema = z.object({
  framework: z.string().default("playwright"),
  parallel_execution: z.boolean().default(true),
  max_workers: z.number().int().positive().default(4),
  screenshot_on_failure: z.boolean().default(true),
  video_recording: z.boolean().default(false),
});

export const reportingSettingsSchema = z.object({
  format: z.array(z.string()).default(["html", "json"]),
  include_screenshots: z.boolean().default(true),
  include_logs: z.boolean().default(true),
  template: z.string().default("default"),
});

export const loggingSettingsSchema = z.object({
  level: z
    .string()
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error", "silent"]))
    .default("info"),
  file: z.string().optional(),
});

export type AiSettings = z.infer<typeof aiSettingsSchema>;
export type ScraperSettings = z.infer<typeof scraperSettingsSchema>;
export type BddSettings = z.infer<typeof bddSettingsSchema>;
export type AutomationSettings = z.infer<typeof automationSettingsSchema>;
export type ReportingSettings = z.infer<typeof reportingSettingsSchema>;
export type LoggingSettings = z.infer<typeof loggingSettingsSchema>;

/**
 * A loaded configuration file. `raw` is the top-level YAML mapping as
 * written; sections are only parsed when a collaborator asks for them.
 */
export interface LoadedConfig {
  readonly path: string;
  readonly raw: Readonly<Record<string, unknown>>;
}

export function findMissingSection(
  raw: Readonly<Record<string, unknown>>
): RequiredSection | undefined {
  return REQUIRED_SECTIONS.find((section) => !(section in raw));
}

/**
 * Parse one section with its schema. Ill-typed fields raise a
 * ConfigurationError whose `cause` is the ZodError.
 */
function section<T extends z.ZodTypeAny>(
  config: LoadedConfig,
  name: string,
  schema: T
): z.output<T> {
  const result = schema.safeParse(config.raw[name] ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid "${name}" section in ${config.path}: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export const aiSettings = (config: LoadedConfig): AiSettings =>
  section(config, "ai", aiSettingsSchema);

export const scraperSettings = (config: LoadedConfig): ScraperSettings =>
  section(config, "scraper", scraperSettingsSchema);

export const bddSettings = (config: LoadedConfig): BddSettings =>
  section(config, "bdd", bddSettingsSchema);

export const automationSettings = (config: LoadedConfig): AutomationSettings =>
  section(config, "automation", automationSettingsSchema);

export const reportingSettings = (config: LoadedConfig): ReportingSettings =>
  section(config, "reporting", reportingSettingsSchema);

export const loggingSettings = (config: LoadedConfig): LoggingSettings =>
  section(config, "logging", loggingSettingsSchema);
