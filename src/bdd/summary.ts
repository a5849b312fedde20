import type { BDDFeature, Priority, TestType } from "./types.js";

export interface FeatureSummary {
  totalFeatures: number;
  totalScenarios: number;
  byPriority: Record<Priority, number>;
  byType: Record<TestType, number>;
  byTag: Record<string, number>;
}

export function summarizeFeatures(features: readonly BDDFeature[]): FeatureSummary {
  const summary: FeatureSummary = {
    totalFeatures: features.length,
    totalScenarios: 0,
    byPriority: { high: 0, medium: 0, low: 0 },
    byType: { functional: 0, validation: 0, performance: 0 },
    byTag: {},
  };

  for (const feature of features) {
    for (const scenario of feature.scenarios) {
      summary.totalScenarios++;
      summary.byPriority[scenario.priority]++;
      summary.byType[scenario.testType]++;
      for (const tag of scenario.tags) {
        summary.byTag[tag] = (summary.byTag[tag] ?? 0) + 1;
      }
    }
  }

  return summary;
}
