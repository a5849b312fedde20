export * from "./config/index.js";
export * from "./scraper/index.js";
export * from "./ai/index.js";
export * from "./bdd/index.js";
export * from "./automation/index.js";
export * from "./reporting/index.js";
export * from "./orchestrator/index.js";
export { log, spinner, configureLogger, getLogLevel, setLogLevel, type LogLevel } from "./utils/logger.js";
export {
  ConfigurationError,
  StageFailure,
  CleanupFailure,
  errorMessage,
  stageLabel,
} from "./utils/errors.js";
