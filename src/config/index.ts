export {
  REQUIRED_SECTIONS,
  findMissingSection,
  aiSettings,
  scraperSettings,
  bddSettings,
  automationSettings,
  reportingSettings,
  loggingSettings,
  type RequiredSection,
  type LoadedConfig,
  type AiSettings,
  type ScraperSettings,
  type BddSettings,
  type AutomationSettings,
  type ReportingSettings,
  type LoggingSettings,
} from "./schema.js";
export { loadConfig, parseConfig, resolveConfigPath, CONFIG_FILENAMES } from "./loader.js";
