import { log } from "../utils/logger.js";
import { createOrchestrator, type CommonOptions } from "./shared.js";

export async function validateCommand(options: CommonOptions): Promise<void> {
  const orchestrator = await createOrchestrator(options);
  if (orchestrator.validateConfig()) {
    log.success("Configuration is valid");
  } else {
    process.exitCode = 1;
  }
}
