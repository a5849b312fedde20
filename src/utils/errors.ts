import type { PipelineStage } from "../orchestrator/types.js";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The configuration file is missing, unreadable or not a YAML mapping.
 * Raised before any run starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

const STAGE_LABELS: Record<PipelineStage, string> = {
  scraping: "Page scraping",
  analyzing: "AI analysis",
  generatingBdd: "BDD generation",
  generatingTests: "Test code generation",
  executing: "Test execution",
  reporting: "Report generation",
};

export function stageLabel(stage: PipelineStage): string {
  return STAGE_LABELS[stage];
}

/**
 * A collaborator raised while the pipeline was in `stage`.
 */
export class StageFailure extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, cause: unknown) {
    super(`${stageLabel(stage)} failed: ${errorMessage(cause)}`, { cause });
    this.name = "StageFailure";
    this.stage = stage;
  }
}

export class CleanupFailure extends Error {
  constructor(cause: unknown) {
    super(`Cleanup failed: ${errorMessage(cause)}`, { cause });
    this.name = "CleanupFailure";
  }
}
