export type {
  BDDFeature,
  BDDScenario,
  FeatureGenerator,
  GherkinLanguage,
  Priority,
  TestType,
} from "./types.js";
export { BddGenerator, formFeatureName, groupByFeature, PAGE_LOAD_BUDGET_SECONDS } from "./generator.js";
export { parseGherkin, uniqueTags, DEFAULT_FEATURE_NAME } from "./parser.js";
export { renderFeature, featureFileName, writeFeatureFiles } from "./writer.js";
export { summarizeFeatures, type FeatureSummary } from "./summary.js";
export { KEYWORDS, type GherkinKeywords } from "./keywords.js";
