import { PIPELINE_STAGES, type PipelineStage, type PipelineState, type StageTransition } from "./types.js";

function isTerminal(state: PipelineState): boolean {
  return state.kind === "done" || state.kind === "failed";
}

/**
 * Tracks where the current run is in the stage sequence. Stages only move
 * forward; `done` and `failed` end the run until the next `reset`.
 */
export class StageTracker {
  private transitions: StageTransition[] = [{ state: { kind: "idle" }, at: new Date() }];

  get state(): PipelineState {
    return this.transitions[this.transitions.length - 1].state;
  }

  history(): readonly StageTransition[] {
    return [...this.transitions];
  }

  reset(): void {
    this.transitions = [{ state: { kind: "idle" }, at: new Date() }];
  }

  enter(stage: PipelineStage): void {
    const current = this.state;
    if (isTerminal(current)) {
      throw new Error(`Cannot enter ${stage}: run already ${current.kind}`);
    }
    if (current.kind === "idle" && stage !== "scraping") {
      throw new Error(`A run must start with scraping, not ${stage}`);
    }
    if (
      current.kind === "running" &&
      PIPELINE_STAGES.indexOf(stage) <= PIPELINE_STAGES.indexOf(current.stage)
    ) {
      throw new Error(`Cannot move from ${current.stage} back to ${stage}`);
    }
    this.push({ kind: "running", stage });
  }

  complete(): void {
    if (isTerminal(this.state)) return;
    this.push({ kind: "done" });
  }

  /**
   * Mark the run failed at the stage it is in. Without a running stage the
   * failure is attributed to `fallback`.
   */
  fail(fallback: PipelineStage = "scraping"): void {
    const current = this.state;
    if (isTerminal(current)) return;
    this.push({ kind: "failed", stage: current.kind === "running" ? current.stage : fallback });
  }

  private push(state: PipelineState): void {
    this.transitions.push({ state, at: new Date() });
  }
}
