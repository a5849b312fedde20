import type { PerformanceMetrics } from "./types.js";

type MetricField = keyof PerformanceMetrics;
type MutableMetrics = { -readonly [K in MetricField]: PerformanceMetrics[K] };

/** Field that must already be set before each field may be recorded. */
const PREREQUISITE: Record<MetricField, MetricField | undefined> = {
  startTime: undefined,
  pageLoadTime: "startTime",
  aiResponseTime: "pageLoadTime",
  testExecutionTime: "aiResponseTime",
  endTime: "startTime",
  totalExecutionTime: "endTime",
};

export function emptyMetrics(): PerformanceMetrics {
  return Object.freeze({
    startTime: null,
    endTime: null,
    pageLoadTime: null,
    aiResponseTime: null,
    testExecutionTime: null,
    totalExecutionTime: null,
  });
}

/**
 * Owns the metrics of the current run. Each field is written at most once
 * per run and only after the field it follows; readers get frozen copies.
 */
export class MetricsRecorder {
  private values: MutableMetrics = { ...emptyMetrics() };

  reset(): void {
    this.values = { ...emptyMetrics() };
  }

  start(at: Date = new Date()): Date {
    this.set("startTime", at);
    return at;
  }

  recordPageLoad(ms: number): void {
    this.set("pageLoadTime", ms);
  }

  recordAiResponse(ms: number): void {
    this.set("aiResponseTime", ms);
  }

  recordTestExecution(ms: number): void {
    this.set("testExecutionTime", ms);
  }

  /** Record the end time and the total duration since `start`. */
  finish(at: Date = new Date()): number {
    const { startTime } = this.values;
    if (!startTime) {
      throw new Error("Cannot finish metrics before start");
    }
    const total = Math.max(0, at.getTime() - startTime.getTime());
    this.set("endTime", new Date(Math.max(at.getTime(), startTime.getTime())));
    this.set("totalExecutionTime", total);
    return total;
  }

  snapshot(): PerformanceMetrics {
    return Object.freeze({ ...this.values });
  }

  private set<K extends MetricField>(field: K, value: NonNullable<PerformanceMetrics[K]>): void {
    if (this.values[field] !== null) {
      throw new Error(`Metric ${field} already recorded for this run`);
    }
    const prerequisite = PREREQUISITE[field];
    if (prerequisite && this.values[prerequisite] === null) {
      throw new Error(`Cannot record ${field} before ${prerequisite}`);
    }
    this.values[field] = value;
  }
}
