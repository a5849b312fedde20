export type {
  Collaborators,
  ExecutionResult,
  ExecutionStatus,
  PerformanceMetrics,
  PipelineStage,
  PipelineState,
  RunConfiguration,
  RunOverrides,
  StageTransition,
} from "./types.js";
export { PIPELINE_STAGES } from "./types.js";
export { Orchestrator, createRunConfiguration, DEFAULT_OUTPUT_DIR } from "./orchestrator.js";
export { MetricsRecorder, emptyMetrics } from "./metrics.js";
export { StageTracker } from "./state.js";
