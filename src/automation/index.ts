export type {
  PlannedTest,
  TestAction,
  TestCaseResult,
  TestExecutionResult,
  TestStatus,
  TestSuiteGenerator,
  TestSuiteOptions,
} from "./types.js";
export {
  PlaywrightTestGenerator,
  SUITE_FILENAME,
  RESULTS_FILENAME,
} from "./generator.js";
export { planScenario, planFeatures, sampleValue, fieldSelector, SUBMIT_SELECTOR } from "./planner.js";
export { parseSuiteResults } from "./results.js";
