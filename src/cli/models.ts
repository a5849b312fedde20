import { log } from "../utils/logger.js";
import { createOrchestrator, type CommonOptions } from "./shared.js";

export async function modelsCommand(options: CommonOptions): Promise<void> {
  const orchestrator = await createOrchestrator(options);
  const models = await orchestrator.getAvailableModels();

  if (models.length === 0) {
    log.warn("No AI models available. Is the model server running?");
    return;
  }

  log.heading("Available models");
  for (const model of models) {
    log.info(model);
  }
}
