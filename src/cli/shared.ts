import { resolve } from "path";
import { loadConfig } from "../config/loader.js";
import { loggingSettings } from "../config/schema.js";
import { Orchestrator } from "../orchestrator/orchestrator.js";
import { errorMessage } from "../utils/errors.js";
import { configureLogger, log } from "../utils/logger.js";

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load the configuration, point the logger at its `logging` section and
 * build an orchestrator over it.
 */
export async function createOrchestrator(options: CommonOptions): Promise<Orchestrator> {
  const cwd = process.cwd();
  const config = await loadConfig(cwd, options.config);
  const logging = loggingSettings(config);

  configureLogger({
    level: options.verbose ? "debug" : logging.level,
    file: logging.file ? resolve(cwd, logging.file) : undefined,
  });
  log.debug(`Using configuration ${config.path}`);

  return new Orchestrator(config);
}

/**
 * Wrap a command action so that anything it throws is printed and turns
 * into exit code 1.
 */
export function command<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      log.fail(errorMessage(error));
      process.exitCode = 1;
    }
  };
}
